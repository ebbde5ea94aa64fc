import fs from "fs";
import path from "path";
import { describe, it, expect } from "vitest";
import {
  applyTaglineToHeader,
  buildCoverLetterHtml,
  buildResumeHtml,
  escapeHtml,
  extractTemplateHeader,
  extractTemplateSections,
  extractTemplateStyle,
  orderSections,
  parseCoverLetterParagraphs,
  renderHeaderHtml,
  renderSectionsHtml,
  resumeStyle,
} from "./render";
import { emptySection } from "./types";
import type { Section } from "./types";

const TEMPLATE = fs.readFileSync(path.join(process.cwd(), "templates", "resume-template.html"), "utf-8");

function section(title: string, fields: Partial<Omit<Section, "title">> = {}): Section {
  return { ...emptySection(title), ...fields };
}

describe("render", () => {
  describe("escapeHtml", () => {
    it("escapes markup and quotes", () => {
      expect(escapeHtml(`<a href="x">'&'</a>`)).toBe("&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;");
    });
  });

  describe("orderSections", () => {
    it("puts allow-listed titles first in allow-list order, then the rest alphabetically", () => {
      const ordered = orderSections(
        [section("Zeta"), section("Projects"), section("alpha"), section("Education")],
        ["Education", "projects"]
      );
      expect(ordered.map((s) => s.title)).toEqual(["Education", "Projects", "alpha", "Zeta"]);
    });

    it("uses the default order without an allow-list", () => {
      const ordered = orderSections(
        [section("Projects"), section("Interests"), section("Technical Skills"), section("Professional Summary")],
        []
      );
      expect(ordered.map((s) => s.title)).toEqual(["Professional Summary", "Technical Skills", "Projects", "Interests"]);
    });
  });

  describe("renderSectionsHtml", () => {
    it("renders skills, paragraphs, entries and escapes text", () => {
      const html = renderSectionsHtml([
        section("Projects", {
          entries: [{ title: "CLI <tool>", subtitle: "Personal", date: "2022", bullets: ["Parses & reports"] }],
        }),
        section("Professional Summary", { paragraphs: ["Builds things."] }),
        section("Technical Skills", { skills: ["Go", "C++"] }),
      ]);
      expect(html).toBe(
        [
          '<div class="section">',
          '<div class="section-title">Professional Summary</div>',
          '<p class="summary">Builds things.</p>',
          "</div>",
          '<div class="section">',
          '<div class="section-title">Technical Skills</div>',
          '<div class="skills-grid">',
          '<span class="skill-tag">Go</span>',
          '<span class="skill-tag">C++</span>',
          "</div>",
          "</div>",
          '<div class="section">',
          '<div class="section-title">Projects</div>',
          '<div class="entry">',
          '<div class="entry-header">',
          '<span class="entry-title">CLI &lt;tool&gt;</span>',
          '<span class="entry-date">2022</span>',
          "</div>",
          '<div class="entry-subtitle">Personal</div>',
          "<ul>",
          "<li>Parses &amp; reports</li>",
          "</ul>",
          "</div>",
          "</div>",
        ].join("\n")
      );
    });

    it("renders section bullets after entries and skips empty parts", () => {
      const html = renderSectionsHtml([
        section("Certifications", { entries: [{ title: "AWS", subtitle: "", date: "", bullets: [] }], bullets: ["CKA"] }),
      ]);
      expect(html.split("\n")).toEqual([
        '<div class="section">',
        '<div class="section-title">Certifications</div>',
        '<div class="entry">',
        '<div class="entry-header">',
        '<span class="entry-title">AWS</span>',
        "</div>",
        "</div>",
        "<ul>",
        "<li>CKA</li>",
        "</ul>",
        "</div>",
      ]);
    });
  });

  describe("renderHeaderHtml", () => {
    it("links URLs and separates contact items", () => {
      expect(renderHeaderHtml("Jane & Co", "Engineer", ["jane@example.com", "https://jane.dev"])).toBe(
        '\n<div class="header">\n  <h1>Jane &amp; Co</h1>\n  <div class="tagline">Engineer</div>\n' +
          '  <div class="contact-row">jane@example.com <span>·</span> <a href="https://jane.dev">jane.dev</a></div>\n</div>\n'
      );
    });
  });

  describe("applyTaglineToHeader", () => {
    const header = '<div class="header"><h1>Jane</h1><div class="tagline">Old</div></div>';

    it("replaces the tagline text", () => {
      expect(applyTaglineToHeader(header, "Lead <Dev>")).toBe(
        '<div class="header"><h1>Jane</h1><div class="tagline">Lead &lt;Dev&gt;</div></div>'
      );
    });

    it("leaves the header alone without a tagline or tagline div", () => {
      expect(applyTaglineToHeader(header, null)).toBe(header);
      expect(applyTaglineToHeader("<div>no tagline</div>", "New")).toBe("<div>no tagline</div>");
    });
  });

  describe("template helpers", () => {
    it("extracts the balanced header block", () => {
      const html =
        '<body><div class="page"><div class="header"><h1>X</h1><div class="tagline">T</div></div>' +
        '<div class="section">S</div></div></body>';
      expect(extractTemplateHeader(html)).toBe('<div class="header"><h1>X</h1><div class="tagline">T</div></div>');
    });

    it("returns null when the template has no header", () => {
      expect(extractTemplateHeader(TEMPLATE)).toBeNull();
    });

    it("reads section titles except Additional Information", () => {
      expect(extractTemplateSections(TEMPLATE)).toEqual([
        "Professional Summary",
        "Key Skills / Technical Skills",
        "Professional Experience",
        "Projects",
        "Education",
        "Certifications",
      ]);
    });

    it("extracts the stylesheet and adds the print rule", () => {
      expect(extractTemplateStyle("<style>\n a { color: red; } \n</style>")).toBe("a { color: red; }");
      expect(extractTemplateStyle("<p>no style</p>")).toBe("");
      expect(resumeStyle("<style>a{}</style>")).toBe("a{}\n@media print { .page { padding-top: 6mm; } }\n");
    });
  });

  describe("buildResumeHtml", () => {
    it("wraps header and sections in a full document", () => {
      const html = buildResumeHtml({
        styleCss: "body { margin: 0; }",
        headerHtml: '<div class="header">H</div>',
        sections: [section("Projects", { bullets: ["One"] })],
        allowedSections: [],
      });
      expect(html.startsWith("<!DOCTYPE html>")).toBe(true);
      expect(html).toContain("<title>Tailored Resume</title>");
      expect(html).toContain("body { margin: 0; }\n.section-title { font-weight: 700; margin-top: 16px; }");
      expect(html).toContain('<div class="page">\n<div class="header">H</div><div class="section">');
    });
  });

  describe("cover letter", () => {
    const letter = "Dear Hiring Manager,\n\nI build\nthings.\n\nKind regards,\n\nJane Doe\n\nP.S. ignored";

    it("marks the closing and name as signature lines and drops what follows", () => {
      expect(parseCoverLetterParagraphs(letter)).toEqual([
        { kind: "body", text: "Dear Hiring Manager," },
        { kind: "body", text: "I build things." },
        { kind: "signature", text: "Kind regards," },
        { kind: "signature", text: "Jane Doe" },
      ]);
    });

    it("renders paragraphs inside a Cover Letter section", () => {
      const html = buildCoverLetterHtml({ styleCss: "", headerHtml: "<header/>", coverText: letter });
      expect(html).toContain('<div class="section-title">Cover Letter</div>');
      expect(html).toContain(
        '<p class="body">I build things.</p>\n<p class="signature">Kind regards,</p>\n<p class="signature">Jane Doe</p>'
      );
      expect(html).not.toContain("P.S.");
    });
  });
});
