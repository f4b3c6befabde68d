import { MalformedRecordError } from "./utils/errors.ts";
import type { JobPosting } from "./utils/types.ts";

/**
 * Field extraction for listing cards.
 *
 * Card text is expected as blank-line separated paragraphs: the first
 * paragraph ends with the title, then company, then location. Everything
 * else (posted time, badges) floats around in later paragraphs.
 */

const NBSP = /\u00a0/g;
const BLANK_LINE = /\n[ \t\r]*\n/;
const POSTED_ON = /^Posted on /;
const RELATIVE_MARKER = /ago|just posted/i;
const RELATIVE_VALUE = /ago|now|just posted/i;
const CURRENCY_MARKER = /[$€£¥₹]|CAD/;
const MAX_SALARY_SENTENCE = 100;

export interface DetailView {
  text: string | null; // null when the panel never loaded
  isReposted: boolean;
  url: string | null;
}

export type ExtractResult =
  | { ok: true; posting: JobPosting }
  | { ok: false; error: MalformedRecordError };

function clean(text: string): string {
  return text.replace(NBSP, " ").trim();
}

export function splitSegments(cardText: string): string[] {
  return cardText
    .replace(/\r\n/g, "\n")
    .split(BLANK_LINE)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

// ── Posted time ──────────────────────────────────────────────────────

export function parsePostedTime(segments: string[]): {
  postedAt: string | null;
  postedAgo: string | null;
} {
  let postedAt: string | null = null;
  let postedAgo: string | null = null;

  const corpus = segments
    .flatMap((s) => s.split("\n"))
    .map((line) => clean(line))
    .filter((line) => RELATIVE_MARKER.test(line) || POSTED_ON.test(line));

  for (const line of corpus) {
    if (POSTED_ON.test(line)) {
      const ts = Date.parse(line.replace(POSTED_ON, ""));
      if (!isNaN(ts)) postedAt = new Date(ts).toISOString();
    } else if (RELATIVE_VALUE.test(line)) {
      postedAgo = line;
    }
  }

  return { postedAt, postedAgo };
}

// ── Description & salary ────────────────────────────────────────────

export function normalizeDescription(detailText: string | null): string {
  if (!detailText) return "";
  return detailText
    .replace(/\r\n/g, "\n")
    .split("\n")
    .filter((line) => line.trim().length > 0)
    .map((line) => line.trimEnd())
    .join("\n");
}

/**
 * Pull salary-looking sentences out of a description. Lines mentioning
 * a currency are split into sentences; sentences about raises and long
 * prose are dropped.
 */
export function extractSalaryText(description: string): string {
  const kept: string[] = [];

  for (const line of description.split("\n")) {
    if (!CURRENCY_MARKER.test(line)) continue;

    for (const sentence of line.split(". ")) {
      if (!CURRENCY_MARKER.test(sentence) || sentence.includes(" raise")) continue;
      const trimmed = sentence.trim();
      if (trimmed.length < MAX_SALARY_SENTENCE) {
        kept.push(trimmed);
      }
    }
  }

  return kept.join(" | ");
}

// ── Public API ───────────────────────────────────────────────────────

export function extractPosting(cardText: string, detail?: DetailView): ExtractResult {
  const segments = splitSegments(cardText);
  if (segments.length < 3) {
    return {
      ok: false,
      error: new MalformedRecordError(
        `Expected at least 3 text segments, found ${segments.length}`
      ),
    };
  }

  const titleLines = segments[0].split("\n");
  const title = clean(titleLines[titleLines.length - 1]);
  const company = clean(segments[1]);
  const location = clean(segments[2]);
  const { postedAt, postedAgo } = parsePostedTime(segments);

  const description = normalizeDescription(detail?.text ?? null);

  return {
    ok: true,
    posting: {
      title,
      company,
      location,
      postedAt,
      postedAgo,
      isReposted: detail?.isReposted ?? false,
      salaryRaw: extractSalaryText(description),
      url: detail?.url?.trim() ?? "",
      description,
    },
  };
}
