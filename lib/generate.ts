import fs from "fs/promises";
import path from "path";
import { filterSkillsForJob } from "./analyze";
import type { AppConfig } from "./config";
import { MISSING_LLM_MESSAGE } from "./config";
import { buildResumeDocx } from "./docx-export";
import { ConfigurationError } from "./errors";
import {
  generateCoverLetterWithLLM,
  generateTaglineWithLLM,
  tailorResumeWithLLM,
  textGeneratorFromConfig,
} from "./llm";
import type { TextGenerator } from "./llm";
import { createPageRenderer, fitToPageBudget, PdfLibPageCounter } from "./page-fit";
import type { PageCounter, PageRenderer } from "./page-fit";
import {
  applyTaglineToHeader,
  buildCoverLetterHtml,
  buildResumeHtml,
  extractTemplateHeader,
  extractTemplateSections,
  extractTemplateStyle,
  renderHeaderHtml,
  resumeStyle,
} from "./render";
import { buildResumeModel } from "./resume-model";
import { parseHeader, splitSections } from "./resume-parser";
import { parseTailoredText, validateTagline } from "./tailored-parser";
import type { GeneratedCoverLetter, GeneratedResume, Header, Section } from "./types";

export interface GenerateDeps {
  config: AppConfig;
  generator: TextGenerator | null;
  /** Called once per run; the renderer is closed when the run ends. */
  createRenderer: () => PageRenderer;
  counter: PageCounter;
  now?: () => Date;
}

export interface GenerateInput {
  resumeText: string;
  templateHtml: string;
  jobText?: string;
  label?: string;
}

export function defaultDeps(config: AppConfig): GenerateDeps {
  return {
    config,
    generator: textGeneratorFromConfig(config),
    createRenderer: () => createPageRenderer(config),
    counter: new PdfLibPageCounter(),
  };
}

const pad = (n: number) => String(n).padStart(2, "0");

/** Local time as YYYYMMDD_HHMMSS. */
export function timestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function safeLabel(label: string | undefined): string {
  const cleaned = (label || "Tailored").replace(/[^A-Za-z0-9_-]+/g, "-").replace(/^-+|-+$/g, "");
  return cleaned || "Tailored";
}

async function withRenderer<T>(deps: GenerateDeps, run: (renderer: PageRenderer) => Promise<T>): Promise<T> {
  const renderer = deps.createRenderer();
  try {
    return await run(renderer);
  } finally {
    await renderer.close();
  }
}

async function outputBase(deps: GenerateDeps, prefix: string, label: string | undefined): Promise<string> {
  await fs.mkdir(deps.config.outputDir, { recursive: true });
  const stamp = timestamp(deps.now ? deps.now() : new Date());
  return path.join(deps.config.outputDir, `${prefix}_${safeLabel(label)}_${stamp}`);
}

interface TailoredContent {
  sections: Section[];
  allowedSections: string[];
  tagline: string | null;
}

async function tailorWithLLM(
  generator: TextGenerator,
  header: Header,
  input: GenerateInput & { jobText: string },
  templateSections: string[]
): Promise<TailoredContent> {
  const { resumeText, jobText } = input;
  const reply = await tailorResumeWithLLM(generator, { jobText, resumeText, allowedSections: templateSections });
  const tagline =
    validateTagline(reply.tagline, resumeText) ?? (await generateTaglineWithLLM(generator, jobText, resumeText));
  const parsed = parseTailoredText(reply.body, { name: header.name, allowedSections: templateSections });
  for (const section of parsed.sections) {
    if (section.title.toLowerCase().includes("skill") && section.skills.length > 0) {
      section.skills = filterSkillsForJob(section.skills, jobText);
    }
  }
  return { sections: parsed.sections, allowedSections: parsed.allowedSections, tagline };
}

/**
 * One resume run: tailor (with the model when configured and a job is given,
 * else locally), fit the page budget, then write HTML, PDF and DOCX.
 */
export async function generateResume(input: GenerateInput, deps: GenerateDeps): Promise<GeneratedResume> {
  const { resumeText, templateHtml, label } = input;
  const jobText = input.jobText ?? "";
  const header = parseHeader(splitSections(resumeText).headerLines);
  const templateSections = extractTemplateSections(templateHtml);

  let content: TailoredContent;
  if (deps.generator && jobText.trim()) {
    content = await tailorWithLLM(deps.generator, header, { ...input, jobText }, templateSections);
  } else {
    const model = buildResumeModel(resumeText, jobText);
    const tagline = validateTagline(model.tagline, resumeText) ?? validateTagline(model.headline, resumeText);
    content = { sections: model.sections, allowedSections: [], tagline };
  }

  const headerHtml = applyTaglineToHeader(
    extractTemplateHeader(templateHtml) ?? renderHeaderHtml(header.name, content.tagline ?? "", header.contact),
    content.tagline
  );
  const styleCss = resumeStyle(templateHtml);
  const buildHtml = (sections: Section[]) =>
    buildResumeHtml({ styleCss, headerHtml, sections, allowedSections: content.allowedSections });

  const fit = await withRenderer(deps, (renderer) =>
    fitToPageBudget({
      sections: content.sections,
      buildHtml,
      renderer,
      counter: deps.counter,
      maxPages: deps.config.maxPages,
    })
  );

  const docx = await buildResumeDocx({
    header,
    tagline: content.tagline,
    sections: content.sections,
    allowedSections: content.allowedSections,
  });

  const base = await outputBase(deps, "Resume", label);
  const result: GeneratedResume = {
    htmlPath: `${base}.html`,
    pdfPath: `${base}.pdf`,
    docxPath: `${base}.docx`,
    pages: fit.pages,
    withinBudget: fit.withinBudget,
    tagline: content.tagline,
    sections: content.sections,
  };
  await fs.writeFile(result.htmlPath, fit.html, "utf-8");
  await fs.writeFile(result.pdfPath, fit.pdf);
  await fs.writeFile(result.docxPath, docx);
  return result;
}

/** Cover letter as text, HTML and PDF. Needs a configured model. */
export async function generateCoverLetter(input: GenerateInput, deps: GenerateDeps): Promise<GeneratedCoverLetter> {
  const { generator } = deps;
  if (!generator) throw new ConfigurationError(MISSING_LLM_MESSAGE);

  const { resumeText, templateHtml, label } = input;
  const jobText = input.jobText ?? "";
  const header = parseHeader(splitSections(resumeText).headerLines);

  const text = await generateCoverLetterWithLLM(generator, {
    jobText,
    resumeText,
    name: header.name || "Candidate",
  });
  const tagline = jobText.trim() ? await generateTaglineWithLLM(generator, jobText, resumeText) : null;
  const headerHtml = applyTaglineToHeader(
    extractTemplateHeader(templateHtml) ?? renderHeaderHtml(header.name, "", header.contact),
    tagline
  );
  const html = buildCoverLetterHtml({ styleCss: extractTemplateStyle(templateHtml), headerHtml, coverText: text });
  const pdf = await withRenderer(deps, (renderer) => renderer.renderPdf(html));

  const base = await outputBase(deps, "CoverLetter", label);
  const result: GeneratedCoverLetter = {
    textPath: `${base}.txt`,
    htmlPath: `${base}.html`,
    pdfPath: `${base}.pdf`,
    text,
  };
  await fs.writeFile(result.textPath, text, "utf-8");
  await fs.writeFile(result.htmlPath, html, "utf-8");
  await fs.writeFile(result.pdfPath, pdf);
  return result;
}
