import path from "path";
import { z } from "zod";
import { ConfigurationError } from "./errors";

const MOONSHOT_BASE_URL = "https://api.moonshot.ai/v1";
const OPENROUTER_BASE_URL = "https://openrouter.ai/api/v1";

const DEFAULT_MODELS = {
  openai: "gpt-4o-mini",
  moonshot: "kimi-k2-turbo-preview",
  openrouter: "moonshotai/kimi-k2-0905",
} as const;

export type LLMProvider = keyof typeof DEFAULT_MODELS;

export interface LLMSettings {
  provider: LLMProvider;
  apiKey: string;
  model: string;
  baseURL?: string;
}

export interface AppConfig {
  /** null when no provider key is set; generation then runs the local heuristics */
  llm: LLMSettings | null;
  /** Page budget for the PDF; 0 disables page fitting */
  maxPages: number;
  outputDir: string;
  /** Default resume (.txt or .docx) for the web form */
  resumePath: string | null;
  templatePath: string;
  /** Chrome/Chromium used by puppeteer-core */
  chromePath: string | null;
}

const maxPagesSchema = z.coerce.number().int().min(0);

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function resolveLLM(env: Partial<NodeJS.ProcessEnv>): LLMSettings | null {
  const modelOverride = nonEmpty(env.LLM_MODEL) ?? nonEmpty(env.OPENAI_MODEL);

  const openaiKey = nonEmpty(env.OPENAI_API_KEY);
  if (openaiKey) {
    return { provider: "openai", apiKey: openaiKey, model: modelOverride ?? DEFAULT_MODELS.openai };
  }
  const moonshotKey = nonEmpty(env.MOONSHOT_API_KEY);
  if (moonshotKey) {
    return {
      provider: "moonshot",
      apiKey: moonshotKey,
      baseURL: MOONSHOT_BASE_URL,
      model: modelOverride ?? DEFAULT_MODELS.moonshot,
    };
  }
  const openrouterKey = nonEmpty(env.OPENROUTER_API_KEY);
  if (openrouterKey) {
    return {
      provider: "openrouter",
      apiKey: openrouterKey,
      baseURL: OPENROUTER_BASE_URL,
      model: modelOverride ?? DEFAULT_MODELS.openrouter,
    };
  }
  return null;
}

/**
 * Read settings from the environment once, at the edge. Everything below the
 * route handlers and the CLI takes the resulting struct instead of process.env.
 */
export function loadConfig(env: Partial<NodeJS.ProcessEnv> = process.env, cwd: string = process.cwd()): AppConfig {
  const rawMaxPages = nonEmpty(env.RESUME_MAX_PAGES) ?? "2";
  const maxPages = maxPagesSchema.safeParse(rawMaxPages);
  if (!maxPages.success) {
    throw new ConfigurationError(`RESUME_MAX_PAGES must be a non-negative integer, got "${rawMaxPages}"`);
  }

  const resumePath = nonEmpty(env.RESUME_TXT);
  const chromePath = nonEmpty(env.CHROME_PATH) ?? nonEmpty(env.PUPPETEER_EXECUTABLE_PATH);

  return {
    llm: resolveLLM(env),
    maxPages: maxPages.data,
    outputDir: path.resolve(cwd, nonEmpty(env.RESUME_OUTPUT_DIR) ?? "outputs"),
    resumePath: resumePath ? path.resolve(cwd, resumePath) : null,
    templatePath: path.resolve(cwd, nonEmpty(env.RESUME_TEMPLATE) ?? path.join("templates", "resume-template.html")),
    chromePath: chromePath ?? null,
  };
}

/** Same wording the API returns when a feature needs a model. */
export const MISSING_LLM_MESSAGE =
  "No LLM API key set. Set one of: OPENAI_API_KEY, MOONSHOT_API_KEY, OPENROUTER_API_KEY (e.g. in .env or .env.local)";
