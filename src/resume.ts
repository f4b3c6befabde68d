import { readFile } from "fs/promises";
import { fileTypeFromBuffer } from "file-type";
import mammoth from "mammoth";
import pdfParse from "pdf-parse/lib/pdf-parse.js";
import { ConfigurationError, errorMessage } from "./utils/errors.ts";
import type { Logger } from "./utils/logger.ts";

const DOCX_MIME = "application/vnd.openxmlformats-officedocument.wordprocessingml.document";

export interface ParsedResume {
  text: string;
  format: "pdf" | "docx" | "text";
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export async function parseResume(buffer: Buffer): Promise<ParsedResume> {
  const ft = await fileTypeFromBuffer(buffer);
  if (ft?.mime === "application/pdf") {
    const data = await pdfParse(buffer);
    return { text: collapseWhitespace(data.text), format: "pdf" };
  }
  if (ft?.mime === DOCX_MIME) {
    const { value } = await mammoth.extractRawText({ buffer });
    return { text: collapseWhitespace(value), format: "docx" };
  }
  return { text: collapseWhitespace(buffer.toString("utf8")), format: "text" };
}

/**
 * Read the resume once per run. An unreadable or empty resume is a
 * configuration problem: nothing can be matched without it.
 */
export async function loadResume(path: string, logger: Logger): Promise<string> {
  let parsed: ParsedResume;
  try {
    parsed = await parseResume(await readFile(path));
  } catch (err) {
    throw new ConfigurationError(`Could not read resume '${path}': ${errorMessage(err)}`);
  }
  if (!parsed.text) {
    throw new ConfigurationError(`Resume '${path}' contains no text`);
  }
  logger.info(`Loaded ${parsed.format} resume (${parsed.text.length} chars)`);
  return parsed.text;
}
