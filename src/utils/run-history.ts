import { readFileSync, writeFileSync, existsSync, mkdirSync } from "fs";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import type { PipelineSummary } from "./types.ts";

const __dirname = dirname(fileURLToPath(import.meta.url));
export const DEFAULT_HISTORY_PATH = join(__dirname, "../../data/run-history.json");
const MAX_AGE_MONTHS = 18;
const TOP_COMPANY_LIMIT = 5;

// ── Run record schema ────────────────────────────────────────────────

export interface RunRecord {
  timestamp: string;
  durationMs: number;
  userName: string;
  keyword: string;
  city: string;
  summary: PipelineSummary;
  outputs: {
    raw: string | null;
    matched: string | null;
  };
  /** Companies with the most recommended postings, most first. */
  topCompanies: string[];
  /** Fatal error that ended the run early, if any. */
  error: string | null;
}

/** Ties keep first-seen order. */
export function topCompanies(
  postings: ReadonlyArray<{ company: string; recommendApply: boolean }>,
  limit: number = TOP_COMPANY_LIMIT
): string[] {
  const counts = new Map<string, number>();
  for (const p of postings) {
    if (!p.recommendApply) continue;
    counts.set(p.company, (counts.get(p.company) ?? 0) + 1);
  }
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit)
    .map(([company]) => company);
}

// ── Core operations ──────────────────────────────────────────────────

export function getRunHistory(path: string = DEFAULT_HISTORY_PATH): RunRecord[] {
  if (!existsSync(path)) return [];
  try {
    const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
    return Array.isArray(parsed) ? parsed.filter(isRunRecord) : [];
  } catch {
    return [];
  }
}

function isRunRecord(value: unknown): value is RunRecord {
  return (
    typeof value === "object" &&
    value !== null &&
    "timestamp" in value &&
    typeof value.timestamp === "string" &&
    "summary" in value &&
    typeof value.summary === "object"
  );
}

export function appendRunHistory(record: RunRecord, path: string = DEFAULT_HISTORY_PATH): void {
  const history = getRunHistory(path);
  history.push(record);

  const cutoff = new Date();
  cutoff.setMonth(cutoff.getMonth() - MAX_AGE_MONTHS);
  const pruned = history.filter((r) => new Date(r.timestamp) >= cutoff);

  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  writeFileSync(path, JSON.stringify(pruned, null, 2) + "\n");
}

/** Most recent run for the same user and keyword, if any. */
export function lastRunFor(
  userName: string,
  keyword: string,
  path: string = DEFAULT_HISTORY_PATH
): RunRecord | null {
  const matching = getRunHistory(path).filter(
    (r) => r.userName === userName && r.keyword === keyword
  );
  return matching.length > 0 ? matching[matching.length - 1] : null;
}
