import JSZip from "jszip";
import { describe, it, expect } from "vitest";
import { buildResumeDocx } from "./docx-export";
import { emptySection } from "./types";
import type { Section } from "./types";

async function documentXml(buffer: Buffer): Promise<string> {
  const zip = await JSZip.loadAsync(buffer);
  const file = zip.file("word/document.xml");
  if (!file) throw new Error("word/document.xml missing");
  return file.async("string");
}

function sections(): Section[] {
  const projects = emptySection("Projects");
  projects.entries = [{ title: "Inventory Tracker", subtitle: "Personal", date: "2020", bullets: ["Written in Go"] }];
  const summary = emptySection("Professional Summary");
  summary.paragraphs = ["Backend developer."];
  const skills = emptySection("Technical Skills");
  skills.skills = ["TypeScript", "Go"];
  return [projects, summary, skills];
}

describe("buildResumeDocx", () => {
  it("writes a Word document with the header and every section", async () => {
    const buffer = await buildResumeDocx({
      header: { name: "Jordan Avery", contact: ["jordan.avery@example.com", "Springfield"] },
      tagline: "Backend Engineer",
      sections: sections(),
      allowedSections: [],
    });
    const xml = await documentXml(buffer);

    expect(xml).toContain("JORDAN AVERY");
    expect(xml).toContain("Backend Engineer");
    expect(xml).toContain("jordan.avery@example.com  |  Springfield");
    expect(xml).toContain("TypeScript, Go");
    expect(xml).toContain("Inventory Tracker  |  2020");
    expect(xml).toContain("• Written in Go");
  });

  it("orders sections the same way as the HTML", async () => {
    const buffer = await buildResumeDocx({
      header: { name: "", contact: [] },
      tagline: null,
      sections: sections(),
      allowedSections: [],
    });
    const xml = await documentXml(buffer);

    expect(xml).toContain("RESUME");
    const order = ["PROFESSIONAL SUMMARY", "TECHNICAL SKILLS", "PROJECTS"].map((t) => xml.indexOf(t));
    expect(order.every((i) => i >= 0)).toBe(true);
    expect([...order].sort((a, b) => a - b)).toEqual(order);
  });
});
