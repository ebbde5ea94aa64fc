"use client";

import { useState, useCallback } from "react";
import type { FitAssessment } from "@/lib/types";

interface GenerateResponse {
  html: string;
  pdf: string;
  docx: string;
  pages: number | null;
  withinBudget: boolean;
  tagline: string | null;
}

interface CoverLetterResponse {
  text: string;
  txt: string;
  html: string;
  pdf: string;
}

async function postJson<T>(url: string, body: unknown, fallback: string): Promise<T> {
  const res = await fetch(url, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
  const data = await res.json();
  if (!res.ok) throw new Error(data.error ?? fallback);
  return data;
}

const inputClass =
  "rounded-md border border-neutral-300 dark:border-neutral-700 bg-white dark:bg-neutral-900 px-3 py-2 text-sm placeholder:text-neutral-400 focus:outline-none focus:ring-2 focus:ring-neutral-400 dark:focus:ring-neutral-600 w-full";
const buttonClass =
  "rounded-md bg-neutral-900 text-white dark:bg-neutral-100 dark:text-neutral-900 px-4 py-2 text-sm font-medium hover:opacity-90 disabled:opacity-50";

function DownloadLink({ file, label }: { file: string; label: string }) {
  return (
    <a href={`/api/export?file=${encodeURIComponent(file)}`} className="underline mr-3">
      {label}
    </a>
  );
}

const recommendationColor: Record<FitAssessment["recommendation"], string> = {
  APPLY: "text-green-700 dark:text-green-400",
  MAYBE: "text-amber-700 dark:text-amber-400",
  NO: "text-red-700 dark:text-red-400",
};

export default function Home() {
  const [jobText, setJobText] = useState("");
  const [label, setLabel] = useState("");
  const [resumeText, setResumeText] = useState("");
  const [uploading, setUploading] = useState(false);
  const [busy, setBusy] = useState<"assess" | "generate" | "cover" | null>(null);
  const [error, setError] = useState<string | null>(null);
  const [assessment, setAssessment] = useState<FitAssessment | null>(null);
  const [resume, setResume] = useState<GenerateResponse | null>(null);
  const [coverLetter, setCoverLetter] = useState<CoverLetterResponse | null>(null);

  const requestBody = useCallback(
    () => ({
      jobText,
      label: label.trim() || undefined,
      resumeText: resumeText.trim() || undefined,
    }),
    [jobText, label, resumeText]
  );

  const handleUpload = useCallback(async (e: React.ChangeEvent<HTMLInputElement>) => {
    const file = e.target.files?.[0];
    if (!file) return;
    setError(null);
    setUploading(true);
    try {
      const formData = new FormData();
      formData.append("file", file);
      const res = await fetch("/api/upload", { method: "POST", body: formData });
      const data = await res.json();
      if (!res.ok) throw new Error(data.error ?? "Upload failed");
      setResumeText(data.resumeText ?? "");
    } catch (err) {
      setError(err instanceof Error ? err.message : "Upload failed");
    } finally {
      setUploading(false);
    }
  }, []);

  const handleAssess = useCallback(async () => {
    setError(null);
    setBusy("assess");
    try {
      const { jobText: job, resumeText: resumeBody } = requestBody();
      setAssessment(await postJson<FitAssessment>("/api/assess", { jobText: job, resumeText: resumeBody }, "Assessment failed"));
    } catch (err) {
      setError(err instanceof Error ? err.message : "Assessment failed");
    } finally {
      setBusy(null);
    }
  }, [requestBody]);

  const handleGenerate = useCallback(async () => {
    setError(null);
    setBusy("generate");
    try {
      setResume(await postJson<GenerateResponse>("/api/generate", requestBody(), "Generation failed"));
    } catch (err) {
      setError(err instanceof Error ? err.message : "Generation failed");
    } finally {
      setBusy(null);
    }
  }, [requestBody]);

  const handleCoverLetter = useCallback(async () => {
    if (!jobText.trim()) return;
    setError(null);
    setBusy("cover");
    try {
      setCoverLetter(await postJson<CoverLetterResponse>("/api/cover-letter", requestBody(), "Cover letter failed"));
    } catch (err) {
      setError(err instanceof Error ? err.message : "Cover letter failed");
    } finally {
      setBusy(null);
    }
  }, [jobText, requestBody]);

  return (
    <div className="min-h-screen bg-background text-foreground p-6 max-w-4xl mx-auto">
      <header className="mb-8">
        <h1 className="text-2xl font-semibold tracking-tight">Resume Tailor</h1>
        <p className="text-sm text-neutral-500 mt-1">
          Paste a job description to get a tailored resume that fits the page budget, a cover letter, and an apply
          recommendation.
        </p>
      </header>

      <section className="mb-8 space-y-3">
        <h2 className="text-lg font-medium">1. Job description</h2>
        <textarea
          rows={10}
          placeholder="Paste the job description here"
          value={jobText}
          onChange={(e) => setJobText(e.target.value)}
          className={inputClass}
        />
        <label className="block">
          <span className="text-neutral-500 text-xs block mb-0.5">Label for output files</span>
          <input
            type="text"
            placeholder="e.g. Acme-Platform"
            value={label}
            onChange={(e) => setLabel(e.target.value)}
            className={inputClass}
          />
        </label>
      </section>

      <section className="mb-8 space-y-3">
        <h2 className="text-lg font-medium">2. Resume (optional)</h2>
        <input
          type="file"
          accept=".docx,.txt"
          onChange={handleUpload}
          disabled={uploading}
          className="block text-sm file:mr-3 file:py-2 file:px-3 file:rounded file:border-0 file:bg-neutral-200 file:text-neutral-800 dark:file:bg-neutral-700 dark:file:text-neutral-200"
        />
        <textarea
          rows={10}
          placeholder="Leave empty to use the resume configured with RESUME_TXT"
          value={resumeText}
          onChange={(e) => setResumeText(e.target.value)}
          className={`${inputClass} font-mono`}
        />
      </section>

      <section className="mb-8 flex flex-wrap gap-3">
        <button type="button" onClick={handleAssess} disabled={busy !== null} className={buttonClass}>
          {busy === "assess" ? "Assessing…" : "Should I apply?"}
        </button>
        <button type="button" onClick={handleGenerate} disabled={busy !== null} className={buttonClass}>
          {busy === "generate" ? "Generating…" : "Generate resume"}
        </button>
        <button
          type="button"
          onClick={handleCoverLetter}
          disabled={busy !== null || !jobText.trim()}
          className={buttonClass}
        >
          {busy === "cover" ? "Writing…" : "Cover letter"}
        </button>
      </section>

      {error && <p className="mb-6 text-sm text-red-600 dark:text-red-400">{error}</p>}

      {assessment && (
        <section className="mb-8 rounded-lg border border-neutral-200 dark:border-neutral-800 p-4 text-sm space-y-2">
          <h2 className="text-lg font-medium">
            <span className={recommendationColor[assessment.recommendation]}>{assessment.recommendation}</span>{" "}
            <span className="text-neutral-500">({assessment.confidence}% confidence)</span>
          </h2>
          <p>{assessment.rationale}</p>
          {assessment.matchedRequirements.length > 0 && (
            <p>
              <span className="font-medium">Matched:</span> {assessment.matchedRequirements.join(", ")}
            </p>
          )}
          {assessment.gaps.length > 0 && (
            <p>
              <span className="font-medium">Gaps:</span> {assessment.gaps.join(", ")}
            </p>
          )}
        </section>
      )}

      {resume && (
        <section className="mb-8 rounded-lg border border-neutral-200 dark:border-neutral-800 p-4 text-sm space-y-2">
          <h2 className="text-lg font-medium">Tailored resume</h2>
          {resume.tagline && <p className="text-neutral-500">{resume.tagline}</p>}
          <p>
            {resume.pages === null ? "Page count unavailable" : `${resume.pages} page(s)`}
            {!resume.withinBudget && " (could not fit the page budget)"}
          </p>
          <p>
            <DownloadLink file={resume.pdf} label="PDF" />
            <DownloadLink file={resume.docx} label="Word" />
            <DownloadLink file={resume.html} label="HTML" />
          </p>
        </section>
      )}

      {coverLetter && (
        <section className="mb-8 rounded-lg border border-neutral-200 dark:border-neutral-800 p-4 text-sm space-y-2">
          <h2 className="text-lg font-medium">Cover letter</h2>
          <pre className="whitespace-pre-wrap font-sans">{coverLetter.text}</pre>
          <p>
            <DownloadLink file={coverLetter.pdf} label="PDF" />
            <DownloadLink file={coverLetter.txt} label="Text" />
            <DownloadLink file={coverLetter.html} label="HTML" />
          </p>
        </section>
      )}
    </div>
  );
}
