import { z } from "zod";
import { compareKeywordList, contentTokens, topTokens } from "./analyze";
import type { TextGenerator } from "./llm";
import { RECOMMENDATIONS } from "./types";
import type { FitAssessment, Recommendation } from "./types";

const MAX_REQUIREMENTS = 15;
const HEURISTIC_TOP_WORDS = 18;

const requirementList = z
  .array(z.unknown())
  .catch([])
  .transform((items) =>
    items
      .map((item) => String(item).trim())
      .filter(Boolean)
      .slice(0, MAX_REQUIREMENTS)
  );

/** Model reply, coerced field by field; a bad field falls back instead of failing the whole reply. */
const fitReplySchema = z.object({
  recommendation: z
    .preprocess((v) => String(v ?? "").toUpperCase().trim(), z.enum(RECOMMENDATIONS))
    .catch("MAYBE"),
  confidence: z.coerce
    .number()
    .finite()
    .transform((n) => Math.max(0, Math.min(100, Math.trunc(n))))
    .catch(50),
  rationale: z.unknown().transform((v) => (v == null ? "" : String(v).trim())),
  matched_requirements: requirementList,
  missing_requirements: requirementList,
});

function fitPrompt(jobText: string, resumeText: string): string {
  return `Assess whether the candidate should apply for this role based only on the resume.
Return strict JSON only with keys: recommendation, confidence, rationale, matched_requirements, missing_requirements.
Rules:
- recommendation: one of APPLY, MAYBE, NO
- confidence: integer 0-100
- rationale: one short sentence
- matched_requirements: array of concise requirement statements found in both job description and resume
- missing_requirements: array of concise requirement statements present in job description but not evidenced in resume
- keep each array item short and specific
- Do not invent resume facts.

Job description:
${jobText}

Resume:
${resumeText}
`;
}

/** Parse the first JSON object in a model reply into an assessment. Throws on unparseable replies. */
export function parseFitReply(reply: string): FitAssessment {
  const match = reply.match(/\{[\s\S]*\}/);
  const data: unknown = JSON.parse(match ? match[0] : reply);
  const parsed = fitReplySchema.parse(data);
  return {
    recommendation: parsed.recommendation,
    confidence: parsed.confidence,
    rationale: parsed.rationale,
    matchedRequirements: parsed.matched_requirements,
    missingRequirements: parsed.missing_requirements,
    gaps: parsed.missing_requirements.slice(0, 3),
    source: "llm",
  };
}

function recommendationFor(confidence: number): Recommendation {
  if (confidence >= 65) return "APPLY";
  if (confidence >= 40) return "MAYBE";
  return "NO";
}

/** Keyword overlap between the job's most frequent words and the resume. */
export function assessFitHeuristic(jobText: string, resumeText: string): FitAssessment {
  const words = contentTokens(jobText);
  if (words.length === 0) {
    return {
      recommendation: "MAYBE",
      confidence: 40,
      rationale: "Not enough detail in the job description to score fit accurately.",
      matchedRequirements: [],
      missingRequirements: [],
      gaps: [],
      source: "heuristic",
    };
  }
  const top = topTokens(words, HEURISTIC_TOP_WORDS);
  const { matchedKeywords, missingKeywords } = compareKeywordList(resumeText, top);
  const confidence = Math.floor((matchedKeywords.length / top.length) * 100);
  return {
    recommendation: recommendationFor(confidence),
    confidence,
    rationale: `Match score based on keyword overlap: ${confidence}%.`,
    matchedRequirements: matchedKeywords,
    missingRequirements: missingKeywords,
    gaps: missingKeywords.slice(0, 3),
    source: "heuristic",
  };
}

/**
 * Apply/no-apply recommendation. Uses the model when one is configured and
 * falls back to keyword overlap if the call or its reply fails.
 */
export async function assessFit(
  jobText: string,
  resumeText: string,
  generator: TextGenerator | null
): Promise<FitAssessment> {
  if (!jobText.trim()) {
    return {
      recommendation: "MAYBE",
      confidence: 0,
      rationale: "Paste a job description to get an apply recommendation.",
      matchedRequirements: [],
      missingRequirements: [],
      gaps: [],
      source: "heuristic",
    };
  }

  if (generator) {
    try {
      const reply = await generator.complete({ prompt: fitPrompt(jobText, resumeText), json: true });
      return parseFitReply(reply);
    } catch (err) {
      console.warn("LLM fit assessment failed, using keyword overlap:", err);
    }
  }
  return assessFitHeuristic(jobText, resumeText);
}
