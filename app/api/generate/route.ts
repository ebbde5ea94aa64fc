import { NextResponse } from "next/server";
import path from "path";
import { errorResponse, generateBodySchema, parseBody, resolveResumeText } from "@/lib/api";
import { loadConfig } from "@/lib/config";
import { defaultDeps, generateResume } from "@/lib/generate";
import { readTemplate } from "@/lib/resume-source";

export const runtime = "nodejs";

export async function POST(request: Request) {
  try {
    const body = await parseBody(request, generateBodySchema);
    const config = loadConfig();
    const resumeText = await resolveResumeText(config, body.resumeText);
    const templateHtml = await readTemplate(config.templatePath);
    const result = await generateResume(
      { resumeText, templateHtml, jobText: body.jobText, label: body.label },
      defaultDeps(config)
    );
    return NextResponse.json({
      html: path.basename(result.htmlPath),
      pdf: path.basename(result.pdfPath),
      docx: path.basename(result.docxPath),
      pages: result.pages,
      withinBudget: result.withinBudget,
      tagline: result.tagline,
    });
  } catch (err) {
    return errorResponse(err, "Generate", "Resume generation failed");
  }
}
