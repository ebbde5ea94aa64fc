import { extractKeywords, filterSkillsForJob, rankSkills, sortByRelevance } from "./analyze";
import {
  classifyWorkEntries,
  parseEducation,
  parseExperience,
  parseHeader,
  parseList,
  parseSkills,
  splitSections,
} from "./resume-parser";
import { emptySection } from "./types";
import type { Entry, ResumeModel, Section } from "./types";

type SourceKind = "volunteer" | "education" | "skills" | "certifications" | "interests" | "work";

/** First match wins, so "Volunteer Experience" is not read as work. */
const SOURCE_KINDS: ReadonlyArray<[SourceKind, RegExp]> = [
  ["volunteer", /volunteer/],
  ["education", /educat/],
  ["skills", /skill/],
  ["certifications", /certific/],
  ["interests", /interest|hobb/],
  ["work", /experience|project|employment|work/],
];

export function classifySourceSection(title: string): SourceKind | null {
  const lower = title.toLowerCase();
  for (const [kind, pattern] of SOURCE_KINDS) {
    if (pattern.test(lower)) return kind;
  }
  return null;
}

function withTerminalPunctuation(text: string): string {
  return /[.!?]$/.test(text) ? text : `${text}.`;
}

/** `focus` holds only skills from the resume, so the summary names nothing the resume lacks. */
function summaryText(lines: string[], focus: string[]): string {
  const summary = lines.filter((l) => l.trim()).join(" ");
  if (!summary) return "";
  if (focus.length === 0) return withTerminalPunctuation(summary);
  return `${summary.replace(/[. ]+$/, "")}. Relevant focus: ${focus.slice(0, 4).join(", ")}.`;
}

function entriesSection(title: string, entries: Entry[]): Section {
  const section = emptySection(title);
  section.entries = entries;
  return section;
}

/**
 * Restructure a dashed-header plain-text resume for a job: split and parse the
 * sections, keep the skills the job asks for, and put the most relevant
 * projects and roles first. Pure; the caller owns the returned sections.
 */
export function buildResumeModel(resumeText: string, jobText: string, allowedSections: string[] = []): ResumeModel {
  const { headerLines, sections: source } = splitSections(resumeText);
  const header = parseHeader(headerLines);

  let headline = "";
  let summaryLines: string[] = [];
  const education: Entry[] = [];
  const work: Entry[] = [];
  const volunteer: Entry[] = [];
  let skills: string[] = [];
  const certifications: string[] = [];
  const interests: string[] = [];

  for (const [title, body] of source) {
    switch (classifySourceSection(title)) {
      case "volunteer":
        volunteer.push(...parseExperience(body));
        break;
      case "education":
        education.push(...parseEducation(body));
        break;
      case "skills":
        skills.push(...parseSkills(body));
        break;
      case "certifications":
        certifications.push(...parseList(body));
        break;
      case "interests":
        interests.push(...parseList(body));
        break;
      case "work":
        work.push(...parseExperience(body));
        break;
      case null:
        if (!headline) {
          headline = title;
          summaryLines = body;
        }
        break;
    }
  }

  skills = filterSkillsForJob(skills, jobText);
  const keywords = extractKeywords(jobText, skills);
  let { experience, projects } = classifyWorkEntries(work);
  if (keywords.length > 0) {
    skills = rankSkills(skills, keywords);
    const rawText = (e: Entry) => e.raw ?? "";
    projects = sortByRelevance(projects, rawText, keywords);
    experience = sortByRelevance(experience, rawText, keywords);
  }

  const sections: Section[] = [];
  const skillKeys = new Set(skills.map((s) => s.toLowerCase()));
  const summary = summaryText(
    summaryLines,
    keywords.filter((k) => skillKeys.has(k.toLowerCase()))
  );
  if (summary) {
    const section = emptySection("Professional Summary");
    section.paragraphs.push(summary);
    sections.push(section);
  }
  if (education.length > 0) sections.push(entriesSection("Education", education));
  if (skills.length > 0) {
    const section = emptySection("Technical Skills");
    section.skills = skills;
    sections.push(section);
  }
  if (projects.length > 0) sections.push(entriesSection("Projects", projects));
  if (experience.length > 0) sections.push(entriesSection("Professional Experience", experience));
  if (volunteer.length > 0) sections.push(entriesSection("Volunteer Experience", volunteer));
  if (certifications.length > 0) {
    const section = emptySection("Certifications");
    section.bullets = certifications;
    sections.push(section);
  }
  if (interests.length > 0) {
    const section = emptySection("Interests");
    section.paragraphs.push(interests.join(" - "));
    sections.push(section);
  }

  const allowed = new Set(allowedSections.map((s) => s.toLowerCase()));
  const kept = allowed.size > 0 ? sections.filter((s) => allowed.has(s.title.toLowerCase())) : sections;

  const topKeywords = keywords.slice(0, 3).join(", ");
  const tagline = topKeywords ? (headline ? `${headline} - ${topKeywords}` : topKeywords) : headline;

  return { header, headline, tagline, keywords, sections: kept };
}
