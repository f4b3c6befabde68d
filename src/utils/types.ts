// ── Posting extracted from a listing card ───────────────────────────

export interface JobPosting {
  title: string;
  company: string;
  location: string;
  postedAt: string | null; // ISO date, from "Posted on ..." lines
  postedAgo: string | null; // "3 days ago", "Just posted"
  isReposted: boolean;
  salaryRaw: string;
  url: string;
  description: string;
}

// ── Salary normalization ────────────────────────────────────────────

/**
 * Sentinel currencies: "N/A" means no salary text, "Error" means the
 * model call failed, "ParseError" means the reply could not be read,
 * "NotEvaluated" means the run stopped before the posting was reached.
 */
export type SalaryCurrency = string;

export interface SalaryRange {
  min: number;
  max: number;
  currency: SalaryCurrency;
}

// ── Resume matching ─────────────────────────────────────────────────

export type MatchStatus =
  | "scored"
  | "over-token-limit"
  | "service-error"
  | "parse-error"
  | "not-evaluated";

export interface MatchResult {
  score: number | null; // null for "over-token-limit" and "not-evaluated"
  reasoning: string;
  missingSkills: string[];
  status: MatchStatus;
}

// ── Posting after every pipeline stage ──────────────────────────────

export interface MatchedPosting extends JobPosting {
  salary: SalaryRange;
  match: MatchResult;
  recommendApply: boolean;
}

// ── Run configuration (validated) ───────────────────────────────────

export type SearchPeriod = "Past 24 hours" | "Past week" | "Past month";

export interface SearchParams {
  keyword: string;
  city: string;
  distance: number;
  period: string;
}

export interface RunParams {
  userName: string;
  resume: string;
  search: SearchParams;
  maxPage: number;
  companyList: string[];
  companyFile: string | null;
  repost: boolean;
  salary: boolean;
  jobType: string | null;
  currentSalary: string | null;
  matchThreshold: number;
  maxDescriptionTokens: number;
  headless: boolean;
  tracing: boolean;
  tracePath: string;
}

// ── Pipeline run summary ────────────────────────────────────────────

export interface PipelineSummary {
  pagesVisited: number;
  totalScraped: number;
  itemsSkipped: number;
  afterFilter: number;
  salaryCalls: number;
  matchCalls: number;
  matchCacheHits: number;
  matched: number;
  /** Matched-set rows the run stopped before evaluating. */
  notEvaluated: number;
  recommended: number;
  persistedRaw: number;
  persistedMatched: number;
  droppedNoUrl: number;
  degraded: boolean;
  aborted: boolean;
  errors: number;
}
