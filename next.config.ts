import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  // puppeteer-core and mammoth load Node-only modules at runtime; keep them out of the server bundle
  serverExternalPackages: ["puppeteer-core", "mammoth"],
};

export default nextConfig;
