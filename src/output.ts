import { writeFileSync, existsSync, mkdirSync } from "fs";
import { join } from "path";
import { toCSV } from "./utils/csv.ts";
import type { JobPosting, MatchResult, SalaryRange } from "./utils/types.ts";

// Column order is relied on by downstream spreadsheets; append only.
export const CSV_COLUMNS = [
  "Job Title",
  "Company",
  "Location",
  "Posted Time",
  "Posted Ago",
  "Reposted",
  "Salary",
  "Min Salary",
  "Max Salary",
  "Currency",
  "URL",
  "Job Description",
  "Match Score",
  "Reasoning",
  "Missing Skills",
  "Recommend Apply",
  "Match Status",
] as const;

export type CsvColumn = (typeof CSV_COLUMNS)[number];

/** A posting at any stage: enrichment fields are absent before they run. */
export type OutputPosting = JobPosting & {
  salary?: SalaryRange;
  match?: MatchResult;
  recommendApply?: boolean;
};

export function toRow(posting: OutputPosting): Record<CsvColumn, string> {
  const { salary, match } = posting;
  return {
    "Job Title": posting.title,
    Company: posting.company,
    Location: posting.location,
    "Posted Time": posting.postedAt ?? "",
    "Posted Ago": posting.postedAgo ?? "",
    Reposted: String(posting.isReposted),
    Salary: posting.salaryRaw,
    "Min Salary": salary ? String(salary.min) : "",
    "Max Salary": salary ? String(salary.max) : "",
    Currency: salary?.currency ?? "",
    URL: posting.url,
    "Job Description": posting.description,
    "Match Score": match && match.score !== null ? String(match.score) : "",
    Reasoning: match?.reasoning ?? "",
    "Missing Skills": match ? match.missingSkills.join("; ") : "",
    "Recommend Apply": posting.recommendApply === undefined ? "" : String(posting.recommendApply),
    "Match Status": match?.status ?? "",
  };
}

export function renderCsv(postings: readonly OutputPosting[]): string {
  return toCSV(CSV_COLUMNS, postings.map(toRow));
}

// ── Files ────────────────────────────────────────────────────────────

function fileNamePart(value: string): string {
  return value.trim().replace(/[^A-Za-z0-9]+/g, "_").replace(/^_+|_+$/g, "") || "run";
}

function datestamp(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, "0");
  const d = String(date.getDate()).padStart(2, "0");
  return `${y}${m}${d}`;
}

/** `<yyyymmdd>_<user>_<keyword>_<kind>.csv` */
export function outputFileName(
  userName: string,
  keyword: string,
  kind: "raw" | "matched",
  date: Date = new Date()
): string {
  return `${datestamp(date)}_${fileNamePart(userName)}_${fileNamePart(keyword)}_${kind}.csv`;
}

export function writeCsvFile(dir: string, fileName: string, postings: readonly OutputPosting[]): string {
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
  const path = join(dir, fileName);
  writeFileSync(path, renderCsv(postings));
  return path;
}
