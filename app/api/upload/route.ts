import { NextResponse } from "next/server";
import path from "path";
import { errorResponse } from "@/lib/api";
import { resumeTextFromUpload } from "@/lib/resume-source";

export const runtime = "nodejs";

const ACCEPTED_EXTENSIONS = [".docx", ".txt"];

/** Extract plain text from an uploaded resume so the form can edit it before generating. */
export async function POST(request: Request) {
  try {
    const formData = await request.formData();
    const file = formData.get("file");
    if (!(file instanceof File) || file.size === 0) {
      return NextResponse.json({ error: "No file provided" }, { status: 400 });
    }
    const ext = path.extname(file.name).toLowerCase();
    if (!ACCEPTED_EXTENSIONS.includes(ext)) {
      return NextResponse.json({ error: "File must be a .docx or .txt document" }, { status: 400 });
    }
    const buffer = Buffer.from(await file.arrayBuffer());
    const resumeText = await resumeTextFromUpload(buffer, file.name);
    return NextResponse.json({ resumeText });
  } catch (err) {
    return errorResponse(err, "Upload", "Upload failed");
  }
}
