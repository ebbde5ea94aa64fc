import { Document, HeadingLevel, Packer, Paragraph, TextRun } from "docx";
import { orderSections } from "./render";
import type { Entry, Header, Section } from "./types";

const spacingAfter = (points: number) => ({ spacing: { after: points } });

const bulletParagraph = (text: string) =>
  new Paragraph({
    children: [new TextRun(`• ${text}`)],
    ...spacingAfter(60),
  });

function entryParagraphs(entry: Entry): Paragraph[] {
  const out: Paragraph[] = [];
  const heading = [entry.title, entry.date].filter(Boolean).join("  |  ");
  if (heading) {
    out.push(new Paragraph({ children: [new TextRun({ text: heading, bold: true })], ...spacingAfter(60) }));
  }
  if (entry.subtitle) {
    out.push(new Paragraph({ children: [new TextRun({ text: entry.subtitle, italics: true })], ...spacingAfter(60) }));
  }
  out.push(...entry.bullets.map(bulletParagraph));
  out.push(new Paragraph({ text: "", ...spacingAfter(60) }));
  return out;
}

/** Word version of the fitted resume, same section order as the HTML. */
export async function buildResumeDocx(params: {
  header: Header;
  tagline: string | null;
  sections: Section[];
  allowedSections: string[];
}): Promise<Buffer> {
  const { header, tagline, sections, allowedSections } = params;
  const children: Paragraph[] = [];

  children.push(
    new Paragraph({
      text: (header.name || "Resume").toUpperCase(),
      heading: HeadingLevel.TITLE,
      ...spacingAfter(120),
    })
  );
  if (tagline) {
    children.push(new Paragraph({ children: [new TextRun(tagline)], ...spacingAfter(60) }));
  }
  if (header.contact.length > 0) {
    children.push(new Paragraph({ children: [new TextRun(header.contact.join("  |  "))], ...spacingAfter(240) }));
  }

  for (const section of orderSections(sections, allowedSections)) {
    children.push(
      new Paragraph({
        text: section.title.toUpperCase(),
        heading: HeadingLevel.HEADING_1,
        ...spacingAfter(120),
      })
    );
    if (section.skills.length > 0) {
      children.push(new Paragraph({ children: [new TextRun(section.skills.join(", "))], ...spacingAfter(120) }));
    }
    for (const p of section.paragraphs) {
      children.push(new Paragraph({ children: [new TextRun(p)], ...spacingAfter(120) }));
    }
    for (const entry of section.entries) {
      children.push(...entryParagraphs(entry));
    }
    children.push(...section.bullets.map(bulletParagraph));
  }

  const doc = new Document({
    sections: [{ children }],
  });
  const buffer = await Packer.toBuffer(doc);
  return Buffer.from(buffer);
}
