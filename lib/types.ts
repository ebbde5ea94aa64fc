/**
 * Shared types for the structured resume model and API payloads.
 */

export interface Header {
  name: string;
  /** Emails, URLs, phone numbers and the like, in source order */
  contact: string[];
}

/** One job, project or degree. */
export interface Entry {
  title: string;
  subtitle: string;
  /** Free-form, usually "MM/YYYY - MM/YYYY" or "MM/YYYY - Present" */
  date: string;
  bullets: string[];
  /** Joined source block, used only for relevance scoring */
  raw?: string;
}

export interface Section {
  title: string;
  entries: Entry[];
  bullets: string[];
  paragraphs: string[];
  skills: string[];
}

export interface SplitResume {
  headerLines: string[];
  /** Section title as it appeared → body lines (blank lines kept as "") */
  sections: Map<string, string[]>;
}

export interface ResumeModel {
  header: Header;
  /** Title of the summary section, used as a headline */
  headline: string;
  tagline: string;
  keywords: string[];
  sections: Section[];
}

export interface TailoredParseResult {
  sections: Section[];
  /** Lower-cased allow-list used for ordering */
  allowedSections: string[];
  tagline: string | null;
}

export const RECOMMENDATIONS = ["APPLY", "MAYBE", "NO"] as const;
export type Recommendation = (typeof RECOMMENDATIONS)[number];

export interface FitAssessment {
  recommendation: Recommendation;
  /** Integer 0-100 */
  confidence: number;
  rationale: string;
  matchedRequirements: string[];
  missingRequirements: string[];
  /** First three missing requirements */
  gaps: string[];
  source: "llm" | "heuristic";
}

export interface GeneratedResume {
  htmlPath: string;
  pdfPath: string;
  docxPath: string;
  /** null when the PDF page count could not be read */
  pages: number | null;
  withinBudget: boolean;
  tagline: string | null;
  sections: Section[];
}

export interface GeneratedCoverLetter {
  textPath: string;
  htmlPath: string;
  pdfPath: string;
  text: string;
}

export function emptySection(title: string): Section {
  return { title, entries: [], bullets: [], paragraphs: [], skills: [] };
}

export function emptyEntry(): Entry {
  return { title: "", subtitle: "", date: "", bullets: [] };
}
