import { postingKey } from "./utils/hash.ts";
import type { JobPosting } from "./utils/types.ts";

/**
 * Batch deduplication by URL identity.
 *
 * The key is the md5 of the trimmed url. Postings without a url have no
 * stable identity and are dropped here (they still appear in the CSVs).
 * When the same key appears twice in a batch, the later posting replaces
 * the earlier one but keeps the earlier one's position.
 */

export interface KeyedPosting<T extends JobPosting> {
  id: string;
  posting: T;
}

export interface DedupResult<T extends JobPosting> {
  records: KeyedPosting<T>[];
  droppedNoUrl: number;
  duplicates: number;
}

export function dedupeByUrl<T extends JobPosting>(postings: readonly T[]): DedupResult<T> {
  const byKey = new Map<string, T>();
  let droppedNoUrl = 0;
  let duplicates = 0;

  for (const posting of postings) {
    const id = postingKey(posting.url);
    if (id === null) {
      droppedNoUrl++;
      continue;
    }
    if (byKey.has(id)) duplicates++;
    byKey.set(id, posting);
  }

  const records = [...byKey].map(([id, posting]) => ({ id, posting }));
  return { records, droppedNoUrl, duplicates };
}
