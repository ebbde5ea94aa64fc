import OpenAI from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import type { AppConfig, LLMSettings } from "./config";
import { extractTagline, validateTagline } from "./tailored-parser";

export interface CompletionRequest {
  system?: string;
  prompt: string;
  /** Ask the provider for a JSON object reply */
  json?: boolean;
}

/** Anything that turns a prompt into text; the OpenAI client in production, fakes in tests. */
export interface TextGenerator {
  complete(request: CompletionRequest): Promise<string>;
}

/** OpenAI-compatible chat completions. Works for OpenAI, Moonshot (Kimi K2) and OpenRouter. */
export class OpenAITextGenerator implements TextGenerator {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string
  ) {}

  async complete({ system, prompt, json }: CompletionRequest): Promise<string> {
    const messages: ChatCompletionMessageParam[] = [];
    if (system) messages.push({ role: "system", content: system });
    messages.push({ role: "user", content: prompt });

    const completion = await this.client.chat.completions.create({
      model: this.model,
      messages,
      ...(json ? { response_format: { type: "json_object" as const } } : {}),
    });
    const raw = completion.choices[0]?.message?.content?.trim();
    if (!raw) {
      throw new Error("Empty LLM response");
    }
    return raw;
  }
}

export function createTextGenerator(settings: LLMSettings): TextGenerator {
  const client = new OpenAI({
    apiKey: settings.apiKey,
    ...(settings.baseURL ? { baseURL: settings.baseURL } : {}),
  });
  return new OpenAITextGenerator(client, settings.model);
}

/** Generator for the configured provider, or null when no API key is set. */
export function textGeneratorFromConfig(config: AppConfig): TextGenerator | null {
  return config.llm ? createTextGenerator(config.llm) : null;
}

const TAILOR_INSTRUCTIONS = `You are a professional resume writer and ATS optimisation expert.

I will provide you with a job description and my current resume.

Your task: update my resume so it is tailored specifically to the job description.

Strict rules (must follow):
- DO NOT invent, exaggerate, or add any new experience, skills, certifications, tools, or qualifications.
- DO NOT claim I have done something that is not already written in my resume.
- You may only rewrite, restructure, reword, reorder, and remove content based on what already exists.
- If something is not relevant to the job description, remove it completely.
- If something is important but buried, move it higher and make it more visible.
- Improve bullet points to sound more achievement-based, but only using the same meaning and information already provided.
- Optimise for ATS keyword matching using wording from the job description, but only when it truthfully matches my existing experience.

Output requirements: return the updated resume with these sections (only include sections that apply):
Professional Summary, Key Skills / Technical Skills, Professional Experience, Projects, Education, Certifications, Additional Information (only if relevant).
Keep it concise, modern, and recruiter-friendly. Use bullet points and action verbs. Avoid fluff.

Formatting constraints:
Output plain text only.
Start your response with a single line: 'TAGLINE: <short role-specific tagline>'.
Use section headers starting with '## '`;

const TAILOR_FORMAT_RULES = `Use entry headers starting with '### ' in the form 'Title | Organisation | Dates'.
Use bullet lines starting with '- '.
Do not include name/contact at the top.
Do not include separators like '---'.
Do not include notes, disclaimers, or meta commentary.`;

export function buildTailorInstructions(allowedSections: string[]): string {
  const sectionRule =
    allowedSections.length > 0
      ? ` and ONLY these exact section titles:\n${allowedSections.join("\n")}\n`
      : ".\n";
  return `${TAILOR_INSTRUCTIONS}${sectionRule}${TAILOR_FORMAT_RULES}`;
}

/**
 * Ask the model for a tailored resume in the constrained Markdown-like format.
 * The tagline line, when present, is split off the body.
 */
export async function tailorResumeWithLLM(
  generator: TextGenerator,
  params: { jobText: string; resumeText: string; allowedSections: string[] }
): Promise<{ tagline: string | null; body: string }> {
  const text = await generator.complete({
    system: buildTailorInstructions(params.allowedSections),
    prompt: `Job description:\n${params.jobText}\n\nCurrent resume:\n${params.resumeText}\n`,
  });
  return extractTagline(text);
}

/** A short tagline made only of terms already in the resume, or null. */
export async function generateTaglineWithLLM(
  generator: TextGenerator,
  jobText: string,
  resumeText: string
): Promise<string | null> {
  const text = await generator.complete({
    prompt:
      "Create a very short, role-specific resume tagline based on the job description and the resume. " +
      "Return a single line only, no quotes, no extra text. " +
      "Use 3 to 6 words maximum. Avoid separators like '·' or '|'. " +
      "STRICT RULE: Use only roles/skills/terms that already appear in the resume text. " +
      "Do NOT invent or add new tools, skills, or roles.\n\n" +
      `Job description:\n${jobText}\n\nResume:\n${resumeText}\n`,
  });
  const firstLine = text.trim().split(/\r?\n/)[0] ?? "";
  return validateTagline(firstLine, resumeText);
}

export async function generateCoverLetterWithLLM(
  generator: TextGenerator,
  params: { jobText: string; resumeText: string; name: string }
): Promise<string> {
  const prompt = `You are a professional cover letter writer and recruitment specialist.

Write a highly tailored cover letter for the role in the job description below, using my resume.

Strict rules (must follow):
- DO NOT invent or exaggerate experience, achievements, or skills.
- DO NOT add fake metrics, fake projects, or fake responsibilities.
- Only use information that already exists in my resume. If something is not in my resume, do not mention it.
- You may reword and present my experience in a stronger way, but the meaning must stay truthful.
- Use keywords and language from the job description where relevant, but only when it matches my actual experience.

Cover letter requirements:
- Tone must be confident, professional, and modern; it must sound like a real person wrote it.
- Keep it concise: 300-450 words max.
- Structure: strong opening paragraph (role + excitement + value), middle paragraph(s) linking my skills/projects to the job requirements, closing paragraph with enthusiasm + call to action.
- Use Australian/UK spelling. Avoid outdated wording such as "To whom it may concern".
- Address the company by name. If the company name is not present in the job description, use: "Dear Hiring Manager".

End with:
Kind regards,

${params.name}

Return plain text only. Do not include a subject line.

Job description:
${params.jobText}

Resume:
${params.resumeText}
`;
  return (await generator.complete({ prompt })).trim();
}
