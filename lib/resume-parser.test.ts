import fs from "fs";
import path from "path";
import { describe, it, expect } from "vitest";
import {
  classifyWorkEntries,
  isDashLine,
  parseEducation,
  parseExperience,
  parseHeader,
  parseList,
  parseSkills,
  splitEntries,
  splitSections,
} from "./resume-parser";

const SAMPLE_RESUME = fs.readFileSync(path.join(process.cwd(), "fixtures", "sample-resume.txt"), "utf-8");

describe("resume-parser", () => {
  describe("isDashLine", () => {
    it("accepts runs of dashes with optional spaces", () => {
      expect(isDashLine("---")).toBe(true);
      expect(isDashLine("- - -")).toBe(true);
      expect(isDashLine("-")).toBe(true);
    });

    it("rejects bullets and empty lines", () => {
      expect(isDashLine("- Built APIs")).toBe(false);
      expect(isDashLine("--a")).toBe(false);
      expect(isDashLine("")).toBe(false);
    });
  });

  describe("splitSections", () => {
    it("splits header lines from titled sections and keeps blank lines", () => {
      const result = splitSections("Jane Doe\njane@example.com\n\nSummary\n-------\nLine one\n\nSkills\n- - -\nGo, Rust\n");
      expect(result.headerLines).toEqual(["Jane Doe", "jane@example.com", ""]);
      expect([...result.sections.entries()]).toEqual([
        ["Summary", ["Line one", ""]],
        ["Skills", ["Go, Rust", ""]],
      ]);
    });

    it("looks past blank lines for the separator", () => {
      const result = splitSections("Title\n\n---\nbody");
      expect(result.sections.get("Title")).toEqual(["body"]);
    });

    it("never treats a contact line as a title", () => {
      const result = splitSections("https://jane.dev\n---\nrest");
      expect(result.headerLines).toEqual(["https://jane.dev", "rest"]);
      expect(result.sections.size).toBe(0);
    });

    it("puts everything in the header block when there are no titles", () => {
      const result = splitSections("Name\nTrailing\n\n\n");
      expect(result.headerLines).toEqual(["Name", "Trailing", "", "", ""]);
      expect(result.sections.size).toBe(0);
    });

    it("appends a repeated title to the existing section", () => {
      const result = splitSections("Skills\n---\nGo\nSkills\n---\nRust");
      expect(result.sections.size).toBe(1);
      expect(result.sections.get("Skills")).toEqual(["Go", "Rust"]);
    });

    it("normalizes lines, so em dash rules are separators", () => {
      const result = splitSections("Work\r\n———\r\nLead – Ops");
      expect(result.sections.get("Work")).toEqual(["Lead - Ops"]);
    });

    it("finds every section of the sample resume in order", () => {
      const result = splitSections(SAMPLE_RESUME);
      expect(result.headerLines).toEqual([
        "Jordan Avery",
        "jordan.avery@example.com",
        "https://github.com/jordan-avery",
        "Springfield",
        "",
      ]);
      expect([...result.sections.keys()]).toEqual([
        "Software Engineer",
        "Education",
        "Skills",
        "Work experience/Projects",
        "Volunteer Experience",
        "Certificates",
        "Interests",
      ]);
    });
  });

  describe("parseHeader", () => {
    it("takes the first non-blank line as the name and the rest as contact items", () => {
      const header = parseHeader([
        "",
        "Jane Doe",
        "jane@example.com",
        "",
        "foo x-t-c2-color: #fff x-t-c2-color: +1 555 0100",
      ]);
      expect(header).toEqual({ name: "Jane Doe", contact: ["jane@example.com", "+1 555 0100"] });
    });

    it("returns an empty header for no lines", () => {
      expect(parseHeader([])).toEqual({ name: "", contact: [] });
    });
  });

  describe("splitEntries", () => {
    it("groups lines into blank-separated blocks", () => {
      expect(splitEntries(["a", "b", "", "", "c", ""])).toEqual([["a", "b"], ["c"]]);
    });
  });

  describe("parseEducation", () => {
    it("reads title, school and date, keeps dash bullets and drops course lists", () => {
      const entries = parseEducation([
        "BSc Computing",
        "University of Somewhere",
        "09/2016 - 06/2020",
        "- First class honours",
        "Courses: Databases",
        "-- Dean's list",
        "",
        "Diploma",
        "City College",
      ]);
      expect(entries).toEqual([
        {
          title: "BSc Computing",
          subtitle: "University of Somewhere",
          date: "09/2016 - 06/2020",
          bullets: ["First class honours", "Dean's list"],
        },
        { title: "Diploma", subtitle: "City College", date: "", bullets: [] },
      ]);
    });
  });

  describe("parseExperience", () => {
    it("uses a date range on the second line as the date", () => {
      const [entry] = parseExperience([
        "Backend Engineer",
        "03/2020 - Present",
        "- Built APIs",
        "Not a bullet",
        "- Ran on-call",
      ]);
      expect(entry).toEqual({
        title: "Backend Engineer",
        subtitle: "",
        date: "03/2020 - Present",
        bullets: ["Built APIs", "Ran on-call"],
        raw: "Backend Engineer 03/2020 - Present - Built APIs Not a bullet - Ran on-call",
      });
    });

    it("starts bullets on the second line when there is no date", () => {
      const [entry] = parseExperience(["Side Project", "- Wrote a CLI"]);
      expect(entry.date).toBe("");
      expect(entry.bullets).toEqual(["Wrote a CLI"]);
    });

    it("ignores dates that are not MM/YYYY ranges", () => {
      const [entry] = parseExperience(["Role", "2019 - 2020", "- Shipped"]);
      expect(entry.date).toBe("");
      expect(entry.bullets).toEqual(["Shipped"]);
    });
  });

  describe("parseSkills", () => {
    it("splits on pipes and commas and deduplicates case-insensitively", () => {
      expect(parseSkills(["- TypeScript | React, typescript", "Go,, ", "react | Rust"])).toEqual([
        "TypeScript",
        "React",
        "Go",
        "Rust",
      ]);
    });
  });

  describe("parseList", () => {
    it("returns one item per non-empty line", () => {
      expect(parseList(["- AWS Certified", "", "Chess", "--  "])).toEqual(["AWS Certified", "Chess"]);
    });
  });

  describe("classifyWorkEntries", () => {
    it("splits paid roles from projects by title", () => {
      const entry = (title: string) => ({ title, subtitle: "", date: "", bullets: [] });
      const { experience, projects } = classifyWorkEntries([
        entry("Independent Contractor"),
        entry("Open Source CLI"),
        entry("Senior Web Developer"),
        entry("Delivery Driver"),
      ]);
      expect(experience.map((e) => e.title)).toEqual(["Independent Contractor", "Senior Web Developer", "Delivery Driver"]);
      expect(projects.map((e) => e.title)).toEqual(["Open Source CLI"]);
    });

    it("matches the marker anywhere in the title", () => {
      const { experience } = classifyWorkEntries([
        { title: "Independent Contractor — Web Systems", subtitle: "", date: "", bullets: [] },
      ]);
      expect(experience).toHaveLength(1);
    });
  });
});
