import { describe, it, expect } from "vitest";
import { extractTagline, parseEntryHeading, parseTailoredText, validateTagline } from "./tailored-parser";

describe("tailored-parser", () => {
  describe("parseTailoredText", () => {
    it("parses skills and experience sections from model output", () => {
      const text =
        "## Key Skills\n- Languages: Java, Go, Rust\n## Professional Experience\n" +
        "### Backend Engineer | Acme | 01/2020 - Present\n- Built service X";
      const result = parseTailoredText(text, { allowedSections: ["key skills", "professional experience"] });

      expect(result.sections).toEqual([
        { title: "Key Skills", entries: [], bullets: [], paragraphs: [], skills: ["Java", "Go", "Rust"] },
        {
          title: "Professional Experience",
          entries: [{ title: "Backend Engineer", subtitle: "Acme", date: "01/2020 - Present", bullets: ["Built service X"] }],
          bullets: [],
          paragraphs: [],
          skills: [],
        },
      ]);
      expect(result.allowedSections).toEqual(["key skills", "professional experience"]);
      expect(result.tagline).toBeNull();
    });

    it("captures a leading TAGLINE line", () => {
      const result = parseTailoredText("tagline: Backend Engineer\n## Projects\n- Built a CLI");
      expect(result.tagline).toBe("Backend Engineer");
      expect(result.sections).toEqual([
        { title: "Projects", entries: [], bullets: ["Built a CLI"], paragraphs: [], skills: [] },
      ]);
    });

    it("discards a disallowed section up to the next accepted heading", () => {
      const result = parseTailoredText("## Hobbies\n- Chess\nPlain text\n## Projects\n- CLI", {
        allowedSections: ["Projects"],
      });
      expect(result.sections.map((s) => s.title)).toEqual(["Projects"]);
      expect(result.sections[0].bullets).toEqual(["CLI"]);
    });

    it("skips document titles and a heading that repeats the name", () => {
      const result = parseTailoredText("# Resume\n##\n## Jane Doe\n## Summary\nI build things.", { name: "jane doe" });
      expect(result.sections).toEqual([
        { title: "Summary", entries: [], bullets: [], paragraphs: ["I build things."], skills: [] },
      ]);
    });

    it("opens a fallback section for loose lines when there is no allow-list", () => {
      const result = parseTailoredText("Loose line\n- bullet");
      expect(result.sections).toEqual([
        { title: "Tailored Resume", entries: [], bullets: ["bullet"], paragraphs: ["Loose line"], skills: [] },
      ]);
    });

    it("drops loose lines when an allow-list is given", () => {
      expect(parseTailoredText("Loose line\n- bullet", { allowedSections: ["projects"] }).sections).toEqual([]);
    });

    it("fills subtitle and date from plain lines and ignores rules and bold", () => {
      const text = [
        "## Professional Experience",
        "### **Lead Engineer**",
        "Platform Team",
        "2021 - 2023",
        "---",
        "— — —",
        "* Cut costs by 30%",
        "Extra context",
      ].join("\n");
      expect(parseTailoredText(text).sections).toEqual([
        {
          title: "Professional Experience",
          entries: [{ title: "Lead Engineer", subtitle: "Platform Team", date: "2021 - 2023", bullets: ["Cut costs by 30%"] }],
          bullets: [],
          paragraphs: ["Extra context"],
          skills: [],
        },
      ]);
    });

    it("reads the one-line education shorthand", () => {
      const result = parseTailoredText(
        "## Education\nBSc Computer Science - State University | 2019\n- Dean's list",
        { allowedSections: ["education"] }
      );
      expect(result.sections[0].entries).toEqual([
        { title: "BSc Computer Science", subtitle: "State University", date: "2019", bullets: ["Dean's list"] },
      ]);
    });

    it("splits skill bullets without a category on commas", () => {
      const result = parseTailoredText("## Technical Skills\n- Go, Rust\n* Docker");
      expect(result.sections[0].skills).toEqual(["Go", "Rust", "Docker"]);
    });

    it("gives identical output for identical input", () => {
      const text = "## Projects\n### CLI | 2022\n- Parses logs";
      expect(parseTailoredText(text, { allowedSections: ["projects"] })).toEqual(
        parseTailoredText(text, { allowedSections: ["projects"] })
      );
    });
  });

  describe("parseEntryHeading", () => {
    it("joins middle fields into the subtitle when the last field is a date", () => {
      expect(parseEntryHeading("Engineer | Acme | Remote | 2020 - Present")).toEqual({
        title: "Engineer",
        subtitle: "Acme | Remote",
        date: "2020 - Present",
        bullets: [],
      });
    });

    it("treats every field after the title as subtitle when there is no date", () => {
      expect(parseEntryHeading("Engineer | Acme | Remote")).toEqual({
        title: "Engineer",
        subtitle: "Acme | Remote",
        date: "",
        bullets: [],
      });
    });
  });

  describe("extractTagline", () => {
    it("splits the tagline line off the body", () => {
      expect(extractTagline("TAGLINE: Platform Engineer\n\n## Summary\nText")).toEqual({
        tagline: "Platform Engineer",
        body: "## Summary\nText",
      });
    });

    it("returns the text unchanged without a tagline line", () => {
      expect(extractTagline("## Summary\nText")).toEqual({ tagline: null, body: "## Summary\nText" });
    });

    it("returns a null tagline for an empty TAGLINE line", () => {
      expect(extractTagline("TAGLINE:   \n## Summary")).toEqual({ tagline: null, body: "## Summary" });
    });
  });

  describe("validateTagline", () => {
    const resume = "Backend engineer working with TypeScript and Kubernetes";

    it("accepts a short tagline made of resume terms", () => {
      expect(validateTagline(" TypeScript Backend Engineer ", resume)).toBe("TypeScript Backend Engineer");
    });

    it("allows connectives, role nouns and short tokens", () => {
      expect(validateTagline("Go Developer for Kubernetes", resume)).toBe("Go Developer for Kubernetes");
    });

    it("rejects terms the resume does not contain", () => {
      expect(validateTagline("Rust Backend Engineer", resume)).toBeNull();
    });

    it("rejects taglines longer than six words", () => {
      expect(validateTagline("backend engineer typescript kubernetes backend engineer typescript", resume)).toBeNull();
    });

    it("rejects empty input", () => {
      expect(validateTagline("", resume)).toBeNull();
      expect(validateTagline(null, resume)).toBeNull();
    });
  });
});
