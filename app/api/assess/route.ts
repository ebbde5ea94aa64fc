import { NextResponse } from "next/server";
import { assessBodySchema, errorResponse, parseBody, resolveResumeText } from "@/lib/api";
import { loadConfig } from "@/lib/config";
import { assessFit } from "@/lib/fit";
import { textGeneratorFromConfig } from "@/lib/llm";

export const runtime = "nodejs";

export async function POST(request: Request) {
  try {
    const body = await parseBody(request, assessBodySchema);
    const config = loadConfig();
    const resumeText = await resolveResumeText(config, body.resumeText);
    const assessment = await assessFit(body.jobText, resumeText, textGeneratorFromConfig(config));
    return NextResponse.json(assessment);
  } catch (err) {
    return errorResponse(err, "Assess", "Fit assessment failed");
  }
}
