import { NextResponse } from "next/server";
import { z } from "zod";
import type { AppConfig } from "./config";
import { ConfigurationError, InputError } from "./errors";
import { readResumeText } from "./resume-source";

export const generateBodySchema = z.object({
  jobText: z.string().default(""),
  label: z.string().max(120).optional(),
  resumeText: z.string().optional(),
});

export const coverLetterBodySchema = generateBodySchema.extend({
  jobText: z.string().trim().min(1, "Job description is required"),
});

export const assessBodySchema = z.object({
  jobText: z.string().default(""),
  resumeText: z.string().optional(),
});

export async function parseBody<T extends z.ZodTypeAny>(request: Request, schema: T): Promise<z.output<T>> {
  let json: unknown;
  try {
    json = await request.json();
  } catch {
    throw new InputError("Request body must be JSON");
  }
  const result = schema.safeParse(json);
  if (!result.success) {
    throw new InputError(result.error.issues.map((i) => i.message).join("; "));
  }
  return result.data;
}

/** Resume text from the request, else the configured default resume file. */
export async function resolveResumeText(config: AppConfig, resumeText: string | undefined): Promise<string> {
  if (resumeText?.trim()) return resumeText;
  if (!config.resumePath) {
    throw new InputError("No resume provided. Paste resume text, upload a file, or set RESUME_TXT.");
  }
  return readResumeText(config.resumePath);
}

/** 400 for bad input, 503 for missing configuration, 500 for everything else. */
export function errorResponse(err: unknown, context: string, fallback: string): NextResponse {
  if (err instanceof InputError) {
    return NextResponse.json({ error: err.message }, { status: 400 });
  }
  if (err instanceof ConfigurationError) {
    return NextResponse.json({ error: err.message }, { status: 503 });
  }
  console.error(`${context} error:`, err);
  return NextResponse.json({ error: err instanceof Error ? err.message : fallback }, { status: 500 });
}
