import fs from "fs/promises";
import path from "path";
import mammoth from "mammoth";

async function readTextFile(filePath: string, kind: string): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (isNotFound(err)) throw new Error(`${kind} file not found: ${filePath}`);
    throw err;
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export function isDocx(fileName: string): boolean {
  return path.extname(fileName).toLowerCase() === ".docx";
}

/**
 * Plain text of a resume on disk. Word documents go through mammoth's raw
 * text extraction; anything else is read as UTF-8.
 */
export async function readResumeText(filePath: string): Promise<string> {
  if (!isDocx(filePath)) return readTextFile(filePath, "Resume");
  try {
    await fs.access(filePath);
  } catch {
    throw new Error(`Resume file not found: ${filePath}`);
  }
  const result = await mammoth.extractRawText({ path: filePath });
  return result.value;
}

/** Plain text of an uploaded .docx or .txt resume. */
export async function resumeTextFromUpload(buffer: Buffer, fileName: string): Promise<string> {
  if (isDocx(fileName)) {
    const result = await mammoth.extractRawText({ buffer });
    return result.value;
  }
  return buffer.toString("utf-8");
}

export function readTemplate(filePath: string): Promise<string> {
  return readTextFile(filePath, "Template");
}
