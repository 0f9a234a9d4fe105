import * as mammoth from "mammoth";
import pdfParse from "pdf-parse";

/**
 * A file handed in by the student: its original name and raw bytes.
 */
export interface UploadedFile {
  name: string;
  data: Buffer;
}

export type TextExtractor = (file: UploadedFile) => Promise<string | null>;

export const SUPPORTED_EXTENSIONS: readonly string[] = [".pdf", ".docx"];

/**
 * Extract plain text from a PDF or DOCX upload.
 *
 * Picks the parser from the file name suffix. Returns null for any other
 * suffix or when parsing fails; an empty document yields "".
 */
export async function extractText(file: UploadedFile): Promise<string | null> {
  const name = file.name.toLowerCase();

  try {
    if (name.endsWith(".pdf")) {
      return await extractPdfText(file.data);
    }
    if (name.endsWith(".docx")) {
      return await extractDocxText(file.data);
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`[Extractor] Error extracting text from ${file.name}: ${message}`);
    return null;
  }

  console.warn(`[Extractor] Unsupported file type: ${file.name}`);
  return null;
}

async function extractPdfText(data: Buffer): Promise<string> {
  const result = await pdfParse(data);
  // pdf-parse starts every page with a blank line; pages without a text layer come out empty
  return result.text
    .split("\n\n")
    .map((page) => page.trimEnd())
    .filter((page) => page.trim() !== "")
    .join("\n");
}

async function extractDocxText(data: Buffer): Promise<string> {
  const result = await mammoth.extractRawText({ buffer: data });
  // mammoth ends every paragraph with a blank line
  const paragraphs = result.value.split("\n\n");
  if (paragraphs[paragraphs.length - 1] === "") {
    paragraphs.pop();
  }
  return paragraphs.join("\n");
}
