import { normalizeText } from "./normalize";
import type { Entry, Header, SplitResume } from "./types";

/** One or more dashes, optionally space-separated, and nothing else. */
const DASH_LINE = /^-(?:\s*-)*$/;
const DATE_RANGE_REGEX = /\b\d{2}\/\d{4}\s*-\s*(?:Present|\d{2}\/\d{4})\b/i;
const CONTACT_PATTERN = /https?:\/\/|@/;
const COLOR_MARKER = "x-t-c2-color:";

/** Titles that mark a work entry as paid experience rather than a project. */
const EXPERIENCE_TITLE_MARKERS = ["independent contractor", "web developer", "driver"] as const;

export function isDashLine(line: string): boolean {
  return DASH_LINE.test(line.trim());
}

function nextNonBlank(lines: string[], from: number): number {
  let j = from;
  while (j < lines.length && !lines[j].trim()) j++;
  return j;
}

/**
 * Split resume text into a header block and titled sections. A title is a
 * non-empty line whose next non-blank line is a dashed separator.
 */
export function splitSections(text: string): SplitResume {
  const lines = text.split(/\r\n|\r|\n/).map((l) => normalizeText(l.trimEnd()));
  const headerLines: string[] = [];
  const sections = new Map<string, string[]>();
  let current: string[] | null = null;

  let i = 0;
  while (i < lines.length) {
    const stripped = lines[i].trim();
    if (!stripped) {
      (current ?? headerLines).push("");
      i++;
      continue;
    }
    if (DASH_LINE.test(stripped)) {
      i++;
      continue;
    }

    const j = nextNonBlank(lines, i + 1);
    const isTitle = !CONTACT_PATTERN.test(stripped) && j < lines.length && DASH_LINE.test(lines[j].trim());
    if (isTitle) {
      current = sections.get(stripped) ?? [];
      sections.set(stripped, current);
      i = j + 1;
      continue;
    }

    (current ?? headerLines).push(stripped);
    i++;
  }

  return { headerLines, sections };
}

export function parseHeader(headerLines: string[]): Header {
  const lines = headerLines.map((l) => l.trim()).filter(Boolean);
  const contact: string[] = [];
  for (const line of lines.slice(1)) {
    const item = line.includes(COLOR_MARKER) ? (line.split(COLOR_MARKER).pop() ?? "").trim() : line;
    if (item) contact.push(item);
  }
  return { name: lines[0] ?? "", contact };
}

/** Group body lines into blocks separated by blank lines. */
export function splitEntries(blockLines: string[]): string[][] {
  const entries: string[][] = [];
  let current: string[] = [];
  for (const line of blockLines) {
    if (!line.trim()) {
      if (current.length > 0) {
        entries.push(current);
        current = [];
      }
      continue;
    }
    current.push(line);
  }
  if (current.length > 0) entries.push(current);
  return entries;
}

function stripBullet(line: string): string {
  return line.replace(/^-+/, "").trim();
}

export function parseEducation(blockLines: string[]): Entry[] {
  return splitEntries(blockLines).map((lines) => {
    const bullets: string[] = [];
    for (const line of lines.slice(3)) {
      if (line.toLowerCase().startsWith("courses")) continue;
      if (line.startsWith("-")) bullets.push(stripBullet(line));
    }
    return {
      title: lines[0],
      subtitle: lines[1] ?? "",
      date: lines[2] ?? "",
      bullets,
    };
  });
}

export function parseExperience(blockLines: string[]): Entry[] {
  return splitEntries(blockLines).map((lines) => {
    let date = "";
    let start = 1;
    if (lines.length > 1 && DATE_RANGE_REGEX.test(lines[1])) {
      date = lines[1];
      start = 2;
    }
    const bullets = lines
      .slice(start)
      .filter((l) => l.startsWith("-"))
      .map(stripBullet);
    return { title: lines[0], subtitle: "", date, bullets, raw: lines.join(" ") };
  });
}

export function parseSkills(blockLines: string[]): string[] {
  const seen = new Set<string>();
  const skills: string[] = [];
  for (const line of blockLines) {
    const content = line.startsWith("-") ? stripBullet(line) : line;
    for (const part of content.split(/[|,]/)) {
      const skill = part.trim();
      const key = skill.toLowerCase();
      if (!skill || seen.has(key)) continue;
      seen.add(key);
      skills.push(skill);
    }
  }
  return skills;
}

/** Flat list (certificates, interests): one item per non-empty line. */
export function parseList(blockLines: string[]): string[] {
  const items: string[] = [];
  for (const line of blockLines) {
    const item = line.startsWith("-") ? stripBullet(line) : line.trim();
    if (item) items.push(item);
  }
  return items;
}

export function isExperienceTitle(title: string): boolean {
  const lower = title.toLowerCase();
  return EXPERIENCE_TITLE_MARKERS.some((marker) => lower.includes(marker));
}

/**
 * Split a mixed "work experience / projects" block by title keywords.
 * Deterministic: keyed on literal substrings only.
 */
export function classifyWorkEntries(entries: Entry[]): { experience: Entry[]; projects: Entry[] } {
  const experience: Entry[] = [];
  const projects: Entry[] = [];
  for (const entry of entries) {
    (isExperienceTitle(entry.title) ? experience : projects).push(entry);
  }
  return { experience, projects };
}
