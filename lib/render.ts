/**
 * HTML for resumes and cover letters: section markup, the page header,
 * helpers that lift the stylesheet/header/section titles out of an HTML
 * template, and full-document assembly.
 */
import type { Entry, Section } from "./types";

export const DEFAULT_SECTION_ORDER = [
  "professional summary",
  "key skills / technical skills",
  "key skills",
  "technical skills",
  "professional experience",
  "projects",
  "education",
  "certifications",
  "additional information",
];

const PRINT_CSS = "@media print { .page { padding-top: 6mm; } }";
const RESUME_EXTRA_CSS = `.section-title { font-weight: 700; margin-top: 16px; }
.summary { margin: 6px 0; }
ul { margin: 6px 0 12px 18px; }`;
const COVER_LETTER_EXTRA_CSS = `.section-title { font-weight: 700; margin-top: 16px; }
.cover-letter p { margin: 0 0 10px; }
.cover-letter .signature { margin-top: 10px; }
@media print {
  .page { padding-top: 6mm; }
}
@media screen {
  .page { padding-top: 24px; }
}`;

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/** Sections in preferred order (allow-list first, else the default), others after by title. */
export function orderSections(sections: Section[], allowedSections: string[]): Section[] {
  const preferred = (allowedSections.length > 0 ? allowedSections : DEFAULT_SECTION_ORDER).map((s) => s.toLowerCase());
  const rank = (s: Section): [number, number, string] => {
    const title = s.title.toLowerCase();
    const idx = preferred.indexOf(title);
    return idx >= 0 ? [0, idx, ""] : [1, 0, title];
  };
  return [...sections].sort((a, b) => {
    const [ga, ia, ta] = rank(a);
    const [gb, ib, tb] = rank(b);
    if (ga !== gb) return ga - gb;
    if (ia !== ib) return ia - ib;
    return ta < tb ? -1 : ta > tb ? 1 : 0;
  });
}

function renderList(items: string[], out: string[]): void {
  out.push("<ul>");
  for (const item of items) out.push(`<li>${escapeHtml(item)}</li>`);
  out.push("</ul>");
}

function renderEntry(entry: Entry, out: string[]): void {
  out.push('<div class="entry">');
  out.push('<div class="entry-header">');
  out.push(`<span class="entry-title">${escapeHtml(entry.title)}</span>`);
  if (entry.date) out.push(`<span class="entry-date">${escapeHtml(entry.date)}</span>`);
  out.push("</div>");
  if (entry.subtitle) out.push(`<div class="entry-subtitle">${escapeHtml(entry.subtitle)}</div>`);
  if (entry.bullets.length > 0) renderList(entry.bullets, out);
  out.push("</div>");
}

export function renderSectionsHtml(sections: Section[], allowedSections: string[] = []): string {
  const out: string[] = [];
  for (const section of orderSections(sections, allowedSections)) {
    out.push('<div class="section">');
    out.push(`<div class="section-title">${escapeHtml(section.title)}</div>`);
    if (section.skills.length > 0) {
      out.push('<div class="skills-grid">');
      for (const skill of section.skills) out.push(`<span class="skill-tag">${escapeHtml(skill)}</span>`);
      out.push("</div>");
    }
    for (const p of section.paragraphs) out.push(`<p class="summary">${escapeHtml(p)}</p>`);
    for (const entry of section.entries) renderEntry(entry, out);
    if (section.bullets.length > 0) renderList(section.bullets, out);
    out.push("</div>");
  }
  return out.join("\n");
}

function renderContactItem(item: string): string {
  if (item.startsWith("http")) {
    const label = item.replace(/^https?:\/\//, "");
    return `<a href="${escapeHtml(item)}">${escapeHtml(label)}</a>`;
  }
  return escapeHtml(item);
}

export function renderHeaderHtml(name: string, tagline: string, contact: string[]): string {
  const contactRow = contact.map(renderContactItem).join(" <span>·</span> ");
  return `
<div class="header">
  <h1>${escapeHtml(name)}</h1>
  <div class="tagline">${escapeHtml(tagline)}</div>
  <div class="contact-row">${contactRow}</div>
</div>
`;
}

/** Replace the contents of the header's tagline div. */
export function applyTaglineToHeader(headerHtml: string, tagline: string | null): string {
  if (!headerHtml || !tagline) return headerHtml;
  const startToken = '<div class="tagline">';
  const startIdx = headerHtml.indexOf(startToken);
  if (startIdx === -1) return headerHtml;
  const start = startIdx + startToken.length;
  const end = headerHtml.indexOf("</div>", start);
  if (end === -1) return headerHtml;
  return headerHtml.slice(0, start) + escapeHtml(tagline) + headerHtml.slice(end);
}

export function extractTemplateStyle(templateHtml: string): string {
  const match = templateHtml.match(/<style>([\s\S]*?)<\/style>/i);
  return match ? match[1].trim() : "";
}

/** The template's `<div class="header">` block, with its nested divs balanced. */
export function extractTemplateHeader(templateHtml: string): string | null {
  const start = templateHtml.indexOf('<div class="header">');
  if (start === -1) return null;
  let depth = 0;
  for (let i = start; i < templateHtml.length; i++) {
    if (templateHtml.startsWith("<div", i)) {
      depth++;
    } else if (templateHtml.startsWith("</div>", i)) {
      depth--;
      if (depth === 0) return templateHtml.slice(start, i + "</div>".length);
    }
  }
  return null;
}

/** Section titles the template shows, which become the allow-list. */
export function extractTemplateSections(templateHtml: string): string[] {
  const titles: string[] = [];
  const pattern = /<div\s+class="section-title"\s*>\s*([\s\S]*?)\s*<\/div>/gi;
  for (const match of templateHtml.matchAll(pattern)) {
    const title = match[1].replace(/<[^>]*>/g, "").trim();
    if (title && title.toLowerCase() !== "additional information") titles.push(title);
  }
  return titles;
}

/** Template stylesheet plus the print padding every generated page gets. */
export function resumeStyle(templateHtml: string): string {
  return `${extractTemplateStyle(templateHtml)}\n${PRINT_CSS}\n`;
}

function htmlDocument(title: string, styleCss: string, body: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>${escapeHtml(title)}</title>
<style>
${styleCss}
</style>
</head>
<body>
<div class="page">
${body}
</div>
</body>
</html>
`;
}

export function buildResumeHtml(params: {
  styleCss: string;
  headerHtml: string;
  sections: Section[];
  allowedSections: string[];
}): string {
  const body = params.headerHtml + renderSectionsHtml(params.sections, params.allowedSections);
  return htmlDocument("Tailored Resume", `${params.styleCss}\n${RESUME_EXTRA_CSS}`, body);
}

export interface CoverLetterParagraph {
  kind: "body" | "signature";
  text: string;
}

/**
 * Blank-line separated paragraphs. The "Kind regards" closing and the
 * paragraph after it (the name) are signature lines; anything later is dropped.
 */
export function parseCoverLetterParagraphs(coverText: string): CoverLetterParagraph[] {
  const paragraphs: string[] = [];
  let buf: string[] = [];
  for (const line of coverText.trim().split(/\r?\n/)) {
    if (!line.trim()) {
      if (buf.length > 0) {
        paragraphs.push(buf.join(" ").trim());
        buf = [];
      }
      continue;
    }
    buf.push(line.trim());
  }
  if (buf.length > 0) paragraphs.push(buf.join(" ").trim());

  const styled: CoverLetterParagraph[] = [];
  for (let i = 0; i < paragraphs.length; i++) {
    if (paragraphs[i].toLowerCase().startsWith("kind regards")) {
      styled.push({ kind: "signature", text: "Kind regards," });
      if (i + 1 < paragraphs.length) styled.push({ kind: "signature", text: paragraphs[i + 1] });
      break;
    }
    styled.push({ kind: "body", text: paragraphs[i] });
  }
  return styled;
}

export function buildCoverLetterHtml(params: { styleCss: string; headerHtml: string; coverText: string }): string {
  const blocks = parseCoverLetterParagraphs(params.coverText)
    .map((p) => `<p class="${p.kind}">${escapeHtml(p.text)}</p>`)
    .join("\n");
  const body = `${params.headerHtml}
<div class="section">
  <div class="section-title">Cover Letter</div>
  <div class="cover-letter">
${blocks}
  </div>
</div>`;
  return htmlDocument("Cover Letter", `${params.styleCss}\n${COVER_LETTER_EXTRA_CSS}`, body);
}
