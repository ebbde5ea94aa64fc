import { NextResponse } from "next/server";
import path from "path";
import fs from "fs/promises";
import { errorResponse } from "@/lib/api";
import { loadConfig } from "@/lib/config";

export const runtime = "nodejs";

const CONTENT_TYPES: Record<string, string> = {
  ".html": "text/html; charset=utf-8",
  ".pdf": "application/pdf",
  ".docx": "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
  ".txt": "text/plain; charset=utf-8",
};

/** Only names this app writes: Resume_<label>_<stamp>.<ext> or CoverLetter_... */
const OUTPUT_FILE = /^(?:Resume|CoverLetter)_[A-Za-z0-9_-]+\.(?:html|pdf|docx|txt)$/;

export async function GET(request: Request) {
  try {
    const { searchParams } = new URL(request.url);
    const file = searchParams.get("file") ?? "";
    if (!OUTPUT_FILE.test(file)) {
      return NextResponse.json({ error: "Unknown file" }, { status: 400 });
    }
    const config = loadConfig();
    let buffer: Buffer;
    try {
      buffer = await fs.readFile(path.join(config.outputDir, file));
    } catch {
      return NextResponse.json({ error: "File not found" }, { status: 404 });
    }
    return new NextResponse(new Uint8Array(buffer), {
      status: 200,
      headers: {
        "Content-Type": CONTENT_TYPES[path.extname(file)] ?? "application/octet-stream",
        "Content-Disposition": `attachment; filename="${file}"`,
        "Content-Length": String(buffer.length),
      },
    });
  } catch (err) {
    return errorResponse(err, "Export", "Export failed");
  }
}
