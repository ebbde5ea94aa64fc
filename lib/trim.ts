import type { Entry, Section } from "./types";

/** Sections trimmed first come first. Matched case-insensitively on the full title. */
export const TRIM_PRIORITY = [
  "additional information",
  "certifications",
  "projects",
  "professional experience",
  "education",
  "key skills / technical skills",
  "key skills",
  "technical skills",
  "professional summary",
] as const;

const PROTECTED_SUMMARY = "professional summary";

type TrimAction =
  | { kind: "entry-bullet"; entry: Entry }
  | { kind: "bullet" }
  | { kind: "skill" }
  | { kind: "paragraph" }
  | { kind: "remove-section" };

function entryHasContent(e: Entry): boolean {
  return Boolean(e.title || e.subtitle || e.date || e.bullets.length > 0);
}

export function sectionHasContent(section: Section): boolean {
  if (section.skills.length > 0 || section.bullets.length > 0 || section.paragraphs.length > 0) return true;
  return section.entries.some(entryHasContent);
}

/** The single removal that applies to a section, or null if it has nothing left to give. */
function nextTrim(section: Section): TrimAction | null {
  const entry = [...section.entries].reverse().find((e) => e.bullets.length > 0);
  if (entry) return { kind: "entry-bullet", entry };
  if (section.bullets.length > 0) return { kind: "bullet" };
  if (section.skills.length > 0) return { kind: "skill" };
  const keepsLastSummary = section.title.toLowerCase() === PROTECTED_SUMMARY && section.paragraphs.length <= 1;
  if (section.paragraphs.length > 0 && !keepsLastSummary) return { kind: "paragraph" };
  if (!sectionHasContent(section)) return { kind: "remove-section" };
  return null;
}

function applyTrim(sections: Section[], section: Section, action: TrimAction): void {
  switch (action.kind) {
    case "entry-bullet":
      action.entry.bullets.pop();
      return;
    case "bullet":
      section.bullets.pop();
      return;
    case "skill":
      section.skills.pop();
      return;
    case "paragraph":
      section.paragraphs.pop();
      return;
    case "remove-section":
      sections.splice(sections.indexOf(section), 1);
      return;
  }
}

/**
 * Remove one unit of the least important content (a bullet, skill, paragraph
 * or an empty section), mutating `sections`. Returns false once nothing in
 * the priority list can be removed.
 */
export function trimOnce(sections: Section[]): boolean {
  for (const key of TRIM_PRIORITY) {
    const section = sections.find((s) => s.title.toLowerCase() === key);
    if (!section) continue;
    const action = nextTrim(section);
    if (!action) continue;
    applyTrim(sections, section, action);
    return true;
  }
  return false;
}

/** Bullets, skills, paragraphs, entries and sections: what a trim can remove. */
export function contentUnits(sections: Section[]): number {
  let units = sections.length;
  for (const s of sections) {
    units += s.bullets.length + s.skills.length + s.paragraphs.length + s.entries.length;
    for (const e of s.entries) units += e.bullets.length;
  }
  return units;
}
