import { NextResponse } from "next/server";
import path from "path";
import { coverLetterBodySchema, errorResponse, parseBody, resolveResumeText } from "@/lib/api";
import { loadConfig } from "@/lib/config";
import { defaultDeps, generateCoverLetter } from "@/lib/generate";
import { readTemplate } from "@/lib/resume-source";

export const runtime = "nodejs";

export async function POST(request: Request) {
  try {
    const body = await parseBody(request, coverLetterBodySchema);
    const config = loadConfig();
    const resumeText = await resolveResumeText(config, body.resumeText);
    const templateHtml = await readTemplate(config.templatePath);
    const result = await generateCoverLetter(
      { resumeText, templateHtml, jobText: body.jobText, label: body.label },
      defaultDeps(config)
    );
    return NextResponse.json({
      text: result.text,
      txt: path.basename(result.textPath),
      html: path.basename(result.htmlPath),
      pdf: path.basename(result.pdfPath),
    });
  } catch (err) {
    return errorResponse(err, "Cover letter", "Cover letter generation failed");
  }
}
