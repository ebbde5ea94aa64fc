import { normalizeText } from "./normalize";
import { emptyEntry, emptySection } from "./types";
import type { Entry, Section, TailoredParseResult } from "./types";

const FALLBACK_SECTION_TITLE = "Tailored Resume";
const DATE_LIKE = /\b\d{2}\/\d{4}\b|\b\d{4}\b|\bPresent\b/i;
/** "---", "- - -", and em/en dash rules once normalized to "-" */
const HORIZONTAL_RULE = /^-(?:\s*-)*$/;
const TAGLINE_PREFIX = /^tagline:/i;
const MAX_TAGLINE_WORDS = 6;

/** Connectives and generic role nouns a tagline may add without them being in the resume. */
const TAGLINE_ALLOWED_WORDS: ReadonlySet<string> = new Set([
  "and", "or", "for", "with", "in", "on", "to", "of", "the", "a", "an",
  "developer", "engineer", "analyst", "specialist",
]);

export function looksLikeDate(s: string): boolean {
  return DATE_LIKE.test(s);
}

function stripBold(s: string): string {
  return s
    .replace(/\*\*(.*?)\*\*/g, "$1")
    .replace(/__([^_]+)__/g, "$1")
    .trim();
}

/** "Title | Org | 01/2020 - Present" → title, subtitle, date. */
export function parseEntryHeading(content: string): Entry {
  const entry = emptyEntry();
  const parts = content.split("|").map((p) => p.trim());
  if (parts.length >= 2 && looksLikeDate(parts[parts.length - 1])) {
    entry.date = parts[parts.length - 1];
    entry.title = parts[0];
    entry.subtitle = parts.slice(1, -1).join(" | ");
  } else {
    entry.title = parts[0];
    entry.subtitle = parts.slice(1).join(" | ");
  }
  return entry;
}

/** "Degree - School | Date" shorthand used in education sections. */
function parseEducationShorthand(line: string): Entry {
  const bar = line.indexOf("|");
  const left = line.slice(0, bar).trim();
  const entry = emptyEntry();
  entry.date = line.slice(bar + 1).trim();
  const dash = left.indexOf(" - ");
  if (dash >= 0) {
    entry.title = left.slice(0, dash).trim();
    entry.subtitle = left.slice(dash + 3).trim();
  } else {
    entry.title = left;
  }
  return entry;
}

function splitSkillItem(item: string): string[] {
  const colon = item.indexOf(":");
  const list = colon >= 0 ? item.slice(colon + 1) : item;
  return list
    .split(",")
    .map((p) => p.trim())
    .filter(Boolean);
}

/**
 * Parse model output in the constrained Markdown-like format ("## Section",
 * "### Title | Org | Date", "- bullet") into sections. Pure and deterministic.
 *
 * Sections whose title is not in `allowedSections` are dropped together with
 * everything up to the next accepted "## " heading.
 */
export function parseTailoredText(
  text: string,
  options: { name?: string; allowedSections?: string[] } = {}
): TailoredParseResult {
  const allowedSections = (options.allowedSections ?? []).map((s) => s.toLowerCase());
  const allowed = new Set(allowedSections);
  const nameKey = options.name?.trim().toLowerCase();

  const sections: Section[] = [];
  let current: Section | null = null;
  let currentEntry: Entry | null = null;
  let tagline: string | null = null;
  let seenContent = false;

  const openSection = (title: string): Section => {
    const section = emptySection(title);
    sections.push(section);
    current = section;
    currentEntry = null;
    return section;
  };

  /** Active section, or null when the line must be dropped. */
  const activeSection = (): Section | null => {
    if (current) return current;
    if (allowed.size > 0) return null;
    return openSection(FALLBACK_SECTION_TITLE);
  };

  for (const raw of text.split(/\r\n|\r|\n/)) {
    const trimmed = normalizeText(raw.trimEnd()).trim();
    if (!trimmed) continue;
    const line = stripBold(trimmed);

    if (!seenContent) {
      seenContent = true;
      if (TAGLINE_PREFIX.test(line)) {
        tagline = line.slice(line.indexOf(":") + 1).trim() || null;
        continue;
      }
    }

    if (/^#+$/.test(line) || line.startsWith("# ")) continue;

    if (line.startsWith("## ")) {
      const title = line.slice(3).trim();
      if (nameKey && title.toLowerCase() === nameKey) continue;
      if (allowed.size === 0 || allowed.has(title.toLowerCase())) {
        openSection(title);
      } else {
        current = null;
        currentEntry = null;
      }
      continue;
    }

    if (line.startsWith("### ")) {
      const section = activeSection();
      if (!section) continue;
      const entry = parseEntryHeading(line.slice(4).trim());
      section.entries.push(entry);
      currentEntry = entry;
      continue;
    }

    if (HORIZONTAL_RULE.test(line)) continue;

    if (line.startsWith("- ") || line.startsWith("* ")) {
      const section = activeSection();
      if (!section) continue;
      const item = line.slice(2).trim();
      if (section.title.toLowerCase().includes("skill")) {
        section.skills.push(...splitSkillItem(item));
      } else if (currentEntry) {
        currentEntry.bullets.push(item);
      } else {
        section.bullets.push(item);
      }
      continue;
    }

    const section = activeSection();
    if (!section) continue;
    if (section.title.toLowerCase().includes("education") && line.includes("|")) {
      const entry = parseEducationShorthand(line);
      section.entries.push(entry);
      currentEntry = entry;
      continue;
    }
    if (currentEntry && looksLikeDate(line)) {
      currentEntry.date = line;
    } else if (currentEntry && !currentEntry.subtitle) {
      currentEntry.subtitle = line;
    } else {
      section.paragraphs.push(line);
    }
  }

  return { sections, allowedSections, tagline };
}

/** Split a leading "TAGLINE: ..." line off model output. */
export function extractTagline(text: string): { tagline: string | null; body: string } {
  const lines = text
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter(Boolean);
  if (lines.length > 0 && TAGLINE_PREFIX.test(lines[0])) {
    const tagline = lines[0].slice(lines[0].indexOf(":") + 1).trim();
    return { tagline: tagline || null, body: lines.slice(1).join("\n") };
  }
  return { tagline: null, body: text };
}

/**
 * A tagline survives only if it is short and every meaningful word already
 * occurs in the resume; otherwise null.
 */
export function validateTagline(tagline: string | null | undefined, resumeText: string): string | null {
  const candidate = tagline?.trim();
  if (!candidate) return null;
  const words = candidate.match(/[A-Za-z0-9+#-]+/g) ?? [];
  if (words.length > MAX_TAGLINE_WORDS) return null;

  const resumeLower = normalizeText(resumeText).toLowerCase();
  const tokens = candidate.toLowerCase().match(/[a-z][a-z0-9+#-]+/g) ?? [];
  for (const token of tokens) {
    if (token.length < 3 || TAGLINE_ALLOWED_WORDS.has(token)) continue;
    if (!resumeLower.includes(token)) return null;
  }
  return candidate;
}
