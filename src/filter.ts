import type { Logger } from "./utils/logger.ts";
import type { JobPosting } from "./utils/types.ts";

export interface EligibilityPrefs {
  companyList: readonly string[];
  salaryRequired: boolean;
  keepReposted: boolean;
}

export interface FilterOutcome<T extends JobPosting> {
  kept: T[];
  removed: T[];
}

// ── Rules ────────────────────────────────────────────────────────────

export function normalizeCompanyName(name: string): string {
  return name.replace(/\s+/g, " ").trim();
}

function hasSalary(posting: JobPosting): boolean {
  return posting.salaryRaw.trim() !== "";
}

/** Allow-list OR salary when an allow-list is set; otherwise the salary flag alone. */
function passesCompanyRule(
  posting: JobPosting,
  allowed: ReadonlySet<string>,
  salaryRequired: boolean
): boolean {
  if (allowed.size > 0) {
    return allowed.has(normalizeCompanyName(posting.company)) || hasSalary(posting);
  }
  return salaryRequired ? hasSalary(posting) : true;
}

function passesRepostRule(posting: JobPosting, keepReposted: boolean): boolean {
  return keepReposted || !posting.isReposted;
}

// ── Public API ───────────────────────────────────────────────────────

export function filterEligible<T extends JobPosting>(
  postings: readonly T[],
  prefs: EligibilityPrefs,
  logger?: Logger
): FilterOutcome<T> {
  const allowed = new Set(prefs.companyList.map(normalizeCompanyName).filter(Boolean));
  const kept: T[] = [];
  const removed: T[] = [];

  for (const posting of postings) {
    if (
      passesCompanyRule(posting, allowed, prefs.salaryRequired) &&
      passesRepostRule(posting, prefs.keepReposted)
    ) {
      kept.push(posting);
    } else {
      removed.push(posting);
    }
  }

  logger?.info(`Filter: ${postings.length} → ${kept.length} postings kept`);
  return { kept, removed };
}
