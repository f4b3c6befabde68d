import { dedupeByUrl } from "./dedup.ts";
import type { KeyedPosting } from "./dedup.ts";
import type { JobStore, RunTag } from "./db/job-store.ts";
import { StorageUnavailableError, errorMessage } from "./utils/errors.ts";
import type { Logger } from "./utils/logger.ts";
import type { JobPosting, MatchedPosting } from "./utils/types.ts";

/** Tag for rows written by a run started at `date` (local calendar day). */
export function runTag(userName: string, keyword: string, date: Date = new Date()): RunTag {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, "0");
  const d = String(date.getDate()).padStart(2, "0");
  return { userName, keyword, runDate: `${y}-${m}-${d}` };
}

export interface PersistOutcome {
  written: number;
  droppedNoUrl: number;
  duplicates: number;
  error: StorageUnavailableError | null;
}

async function persistBatch<T extends JobPosting>(
  table: string,
  postings: readonly T[],
  write: (records: KeyedPosting<T>[]) => Promise<number>,
  logger: Logger
): Promise<PersistOutcome> {
  const { records, droppedNoUrl, duplicates } = dedupeByUrl(postings);
  if (droppedNoUrl > 0) {
    logger.warn(`${table}: ${droppedNoUrl} posting(s) without a url not persisted`);
  }

  try {
    const written = await write(records);
    logger.info(`${table}: ${written} row(s) upserted (${duplicates} in-batch duplicate(s))`);
    return { written, droppedNoUrl, duplicates, error: null };
  } catch (err) {
    const error = new StorageUnavailableError(`${table} upsert failed: ${errorMessage(err)}`, {
      cause: err,
    });
    logger.error(error.message);
    return { written: 0, droppedNoUrl, duplicates, error };
  }
}

/** Upsert scraped postings. Storage failures are reported, never thrown. */
export function persistPostings(
  store: JobStore,
  postings: readonly JobPosting[],
  tag: RunTag,
  logger: Logger
): Promise<PersistOutcome> {
  return persistBatch("job_posts", postings, (records) => store.upsertPostings(records, tag), logger);
}

/** Upsert matched postings. Storage failures are reported, never thrown. */
export function persistMatches(
  store: JobStore,
  postings: readonly MatchedPosting[],
  tag: RunTag,
  logger: Logger
): Promise<PersistOutcome> {
  return persistBatch("match_results", postings, (records) => store.upsertMatches(records, tag), logger);
}
