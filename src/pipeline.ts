import type { NavigationDriver } from "./browser/driver.ts";
import type { SiteLayout } from "./browser/layout.ts";
import type { JobStore } from "./db/job-store.ts";
import { filterEligible } from "./filter.ts";
import type { LanguageModel } from "./llm.ts";
import type { MatchCache } from "./match-cache.ts";
import { matchPostings } from "./matcher.ts";
import { outputFileName, writeCsvFile } from "./output.ts";
import type { OutputPosting } from "./output.ts";
import { collectPostings } from "./paginate.ts";
import { persistMatches, persistPostings, runTag } from "./persist.ts";
import { normalizeSalaries } from "./salary.ts";
import { prepareSearch } from "./search.ts";
import type { Credentials } from "./search.ts";
import { errorMessage } from "./utils/errors.ts";
import type { Logger } from "./utils/logger.ts";
import type { JobPosting, MatchedPosting, PipelineSummary, RunParams } from "./utils/types.ts";

export interface PipelineDeps<H> {
  params: RunParams;
  resume: string;
  openDriver: () => Promise<NavigationDriver<H>>;
  layout: SiteLayout;
  credentials: Credentials | null;
  model: LanguageModel;
  /** null skips persistence (dry run, or no database configured). */
  store: JobStore | null;
  matchCache: MatchCache | null;
  outputDir: string;
  logger: Logger;
  signal?: AbortSignal;
}

/** What each stage hands to the next. Stages return a new value. */
export interface RunAccumulator {
  scraped: JobPosting[];
  eligible: JobPosting[];
  matched: MatchedPosting[];
}

export interface PipelineRun {
  summary: PipelineSummary;
  accumulator: RunAccumulator;
  outputs: { raw: string | null; matched: string | null };
  /** Set when the run ended before its last stage. */
  error: string | null;
  /** No navigation session could be established; nothing was gathered. */
  fatal: boolean;
}

export function emptySummary(): PipelineSummary {
  return {
    pagesVisited: 0,
    totalScraped: 0,
    itemsSkipped: 0,
    afterFilter: 0,
    salaryCalls: 0,
    matchCalls: 0,
    matchCacheHits: 0,
    matched: 0,
    notEvaluated: 0,
    recommended: 0,
    persistedRaw: 0,
    persistedMatched: 0,
    droppedNoUrl: 0,
    degraded: false,
    aborted: false,
    errors: 0,
  };
}

// ── Stages ───────────────────────────────────────────────────────────

async function scrape<H>(
  deps: PipelineDeps<H>,
  summary: PipelineSummary
): Promise<{ postings: JobPosting[]; error: string | null }> {
  const { params, logger, signal } = deps;
  const driver = await deps.openDriver();
  try {
    await prepareSearch(driver, deps.layout, params.search, deps.credentials, logger.child("search"), signal);

    const result = await collectPostings(
      driver,
      { layout: deps.layout, maxPage: params.maxPage, signal },
      logger.child("scrape")
    );
    summary.pagesVisited = result.pagesVisited;
    summary.totalScraped = result.postings.length;
    summary.itemsSkipped = result.itemsSkipped;
    summary.degraded = result.degraded;
    if (result.error) summary.errors++;
    return { postings: result.postings, error: result.error };
  } finally {
    try {
      await driver.close();
    } catch (err) {
      logger.warn(`Browser did not close cleanly: ${errorMessage(err)}`);
    }
  }
}

function writeOutput<H>(
  deps: PipelineDeps<H>,
  kind: "raw" | "matched",
  postings: readonly OutputPosting[],
  summary: PipelineSummary
): string | null {
  const { params, logger } = deps;
  try {
    const path = writeCsvFile(
      deps.outputDir,
      outputFileName(params.userName, params.search.keyword, kind),
      postings
    );
    logger.info(`Wrote ${postings.length} ${kind} row(s) to ${path}`);
    return path;
  } catch (err) {
    logger.error(`Failed to write ${kind} CSV: ${errorMessage(err)}`);
    summary.errors++;
    return null;
  }
}

// ── Main pipeline ────────────────────────────────────────────────────

/**
 * Scrape, filter, normalize salaries, match and persist, in that order.
 * Aborting (timeout or interrupt) stops the current stage between units
 * of work; whatever was gathered is still written and persisted.
 */
export async function runPipeline<H>(deps: PipelineDeps<H>): Promise<PipelineRun> {
  const { params, logger, signal } = deps;
  const summary = emptySummary();
  const outputs: PipelineRun["outputs"] = { raw: null, matched: null };
  let acc: RunAccumulator = { scraped: [], eligible: [], matched: [] };
  let error: string | null = null;
  const tag = runTag(params.userName, params.search.keyword);

  // ── Step 1: Scrape ──────────────────────────────────────────────────
  logger.info("=== Step 1: Scraping listings ===");
  try {
    const scraped = await scrape(deps, summary);
    acc = { ...acc, scraped: scraped.postings };
    error = scraped.error;
  } catch (err) {
    logger.error("Navigation session failed", err);
    summary.errors++;
    summary.aborted = signal?.aborted ?? false;
    return { summary, accumulator: acc, outputs, error: errorMessage(err), fatal: true };
  }

  outputs.raw = writeOutput(deps, "raw", acc.scraped, summary);
  if (deps.store) {
    const raw = await persistPostings(deps.store, acc.scraped, tag, logger.child("store"));
    summary.persistedRaw = raw.written;
    summary.droppedNoUrl = raw.droppedNoUrl;
    if (raw.error) summary.errors++;
  }

  // ── Step 2: Filter ──────────────────────────────────────────────────
  logger.info("=== Step 2: Filtering ===");
  const { kept } = filterEligible(
    acc.scraped,
    {
      companyList: params.companyList,
      salaryRequired: params.salary,
      keepReposted: params.repost,
    },
    logger
  );
  acc = { ...acc, eligible: kept };
  summary.afterFilter = kept.length;

  // ── Step 3: Salary ──────────────────────────────────────────────────
  logger.info("=== Step 3: Normalizing salaries ===");
  const salaried = await normalizeSalaries(acc.eligible, deps.model, logger.child("salary"), signal);
  summary.salaryCalls = salaried.modelCalls;

  // ── Step 4: Match ───────────────────────────────────────────────────
  logger.info("=== Step 4: Matching against resume ===");
  const matched = await matchPostings(
    salaried.postings,
    deps.model,
    {
      resume: deps.resume,
      jobType: params.jobType,
      currentSalary: params.currentSalary,
      threshold: params.matchThreshold,
      maxDescriptionTokens: params.maxDescriptionTokens,
      cache: deps.matchCache,
      signal,
    },
    logger.child("match")
  );
  acc = { ...acc, matched: matched.postings };
  summary.matchCalls = matched.modelCalls;
  summary.matchCacheHits = matched.cacheHits;
  summary.matched = acc.matched.length;
  summary.notEvaluated = matched.notEvaluated;
  summary.recommended = acc.matched.filter((p) => p.recommendApply).length;

  // ── Step 5: Outputs ─────────────────────────────────────────────────
  logger.info("=== Step 5: Writing results ===");
  outputs.matched = writeOutput(deps, "matched", acc.matched, summary);
  if (deps.store) {
    const result = await persistMatches(deps.store, acc.matched, tag, logger.child("store"));
    summary.persistedMatched = result.written;
    if (result.error) summary.errors++;
  }

  summary.aborted = signal?.aborted ?? false;
  if (summary.aborted) {
    logger.warn("Run was interrupted; partial results were saved");
  }
  return { summary, accumulator: acc, outputs, error, fatal: false };
}

export function logSummary(summary: PipelineSummary, logger: Logger): void {
  logger.info("=== Pipeline Summary ===");
  logger.info(`  Pages visited:   ${summary.pagesVisited}`);
  logger.info(`  Scraped:         ${summary.totalScraped} (${summary.itemsSkipped} skipped)`);
  logger.info(`  After filter:    ${summary.afterFilter}`);
  logger.info(`  Salary calls:    ${summary.salaryCalls}`);
  logger.info(`  Match calls:     ${summary.matchCalls} (${summary.matchCacheHits} cache hits)`);
  logger.info(`  Matched:         ${summary.matched} (${summary.notEvaluated} not evaluated)`);
  logger.info(`  Recommended:     ${summary.recommended}`);
  logger.info(`  Persisted:       ${summary.persistedRaw} raw, ${summary.persistedMatched} matched`);
  logger.info(`  Without url:     ${summary.droppedNoUrl}`);
  logger.info(`  Degraded:        ${summary.degraded}`);
  logger.info(`  Aborted:         ${summary.aborted}`);
  logger.info(`  Errors:          ${summary.errors}`);
}
