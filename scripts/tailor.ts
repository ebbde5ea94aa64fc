/**
 * Tailor a resume from the command line.
 *
 * Run: npx tsx scripts/tailor.ts --resume resume.txt --job job.txt [--template t.html]
 *      [--out-dir outputs] [--label Acme] [--cover-letter] [--assess]
 *
 * Settings not given as flags come from the environment (see lib/config.ts).
 */
import path from "path";
import fs from "fs/promises";
import { parseArgs } from "util";
import { loadConfig } from "../lib/config";
import { assessFit } from "../lib/fit";
import { defaultDeps, generateCoverLetter, generateResume } from "../lib/generate";
import { readResumeText, readTemplate } from "../lib/resume-source";

const USAGE =
  "Usage: tsx scripts/tailor.ts --resume <file> [--template <file>] [--job <file>] " +
  "[--out-dir <dir>] [--label <text>] [--cover-letter] [--assess]";

async function main() {
  const { values } = parseArgs({
    options: {
      resume: { type: "string" },
      template: { type: "string" },
      job: { type: "string" },
      "out-dir": { type: "string" },
      label: { type: "string" },
      "cover-letter": { type: "boolean", default: false },
      assess: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });
  if (values.help) {
    console.log(USAGE);
    return;
  }

  const base = loadConfig();
  const config = {
    ...base,
    outputDir: values["out-dir"] ? path.resolve(values["out-dir"]) : base.outputDir,
    templatePath: values.template ? path.resolve(values.template) : base.templatePath,
    resumePath: values.resume ? path.resolve(values.resume) : base.resumePath,
  };
  if (!config.resumePath) {
    throw new Error(`No resume given.\n${USAGE}`);
  }

  let jobText = "";
  if (values.job) {
    try {
      jobText = await fs.readFile(values.job, "utf-8");
    } catch {
      throw new Error(`Job description file not found: ${values.job}`);
    }
  }
  const label = values.label ?? (values.job ? path.parse(values.job).name : undefined);

  console.log("Reading resume:", config.resumePath);
  const resumeText = await readResumeText(config.resumePath);
  const templateHtml = await readTemplate(config.templatePath);
  const deps = defaultDeps(config);

  if (values.assess) {
    const fit = await assessFit(jobText, resumeText, deps.generator);
    console.log(`Recommendation: ${fit.recommendation} (${fit.confidence}%, ${fit.source})`);
    console.log(fit.rationale);
    if (fit.gaps.length > 0) console.log("Gaps:", fit.gaps.join(", "));
  }

  const resume = await generateResume({ resumeText, templateHtml, jobText, label }, deps);
  console.log(`Wrote HTML: ${resume.htmlPath}`);
  console.log(`Wrote PDF:  ${resume.pdfPath}`);
  console.log(`Wrote DOCX: ${resume.docxPath}`);
  if (resume.pages !== null) {
    const note = resume.withinBudget ? "" : ` (over the ${config.maxPages}-page budget)`;
    console.log(`Pages: ${resume.pages}${note}`);
  }

  if (values["cover-letter"]) {
    const letter = await generateCoverLetter({ resumeText, templateHtml, jobText, label }, deps);
    console.log(`Wrote cover letter: ${letter.textPath}`);
    console.log(`Wrote cover letter PDF: ${letter.pdfPath}`);
  }
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
