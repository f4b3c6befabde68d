import { readFileSync, writeFileSync, existsSync, mkdirSync } from "fs";
import { dirname } from "path";
import { z } from "zod";
import { md5 } from "./utils/hash.ts";
import type { Logger } from "./utils/logger.ts";
import type { MatchResult } from "./utils/types.ts";

// ── Match cache (per resume + posting + prompt hints) ────────────────

const MAX_AGE_DAYS = 90;

const cacheEntrySchema = z.object({
  result: z.object({
    score: z.number().nullable(),
    reasoning: z.string(),
    missingSkills: z.array(z.string()),
    status: z.literal("scored"),
  }),
  generatedAt: z.string(),
});

const cacheFileSchema = z.record(z.string(), cacheEntrySchema);

type CacheEntry = z.infer<typeof cacheEntrySchema>;

export interface MatchCache {
  get(key: string): MatchResult | undefined;
  set(key: string, result: MatchResult): void;
  save(): void;
  readonly size: number;
}

/** Everything that shapes the match prompt. */
export interface MatchCacheKeyInput {
  resume: string;
  url: string;
  description: string;
  jobType: string | null;
  currentSalary: string | null;
}

export function matchCacheKey(input: MatchCacheKeyInput): string {
  return md5(
    [md5(input.resume), input.url, input.description, input.jobType ?? "", input.currentSalary ?? ""].join("|")
  );
}

function loadEntries(path: string, logger: Logger): Record<string, CacheEntry> {
  if (!existsSync(path)) return {};
  try {
    const parsed = cacheFileSchema.safeParse(JSON.parse(readFileSync(path, "utf-8")));
    if (parsed.success) return parsed.data;
    logger.warn(`Match cache at ${path} has an unexpected shape, starting empty`);
  } catch {
    logger.warn(`Could not read match cache at ${path}, starting empty`);
  }
  return {};
}

/** Drops entries generated before the cutoff. Returns how many went. */
function pruneEntries(entries: Record<string, CacheEntry>, cutoff: Date): number {
  let pruned = 0;
  for (const [key, entry] of Object.entries(entries)) {
    // An unparseable timestamp compares false and counts as expired
    if (!(new Date(entry.generatedAt) >= cutoff)) {
      delete entries[key];
      pruned++;
    }
  }
  return pruned;
}

export interface MatchCacheOptions {
  /** Ignore stored scores but still record new ones (`--rematch`). */
  refresh?: boolean;
  /** Entries older than this many days are dropped on open. */
  maxAgeDays?: number;
  now?: Date;
}

/**
 * File-backed cache of genuine match scores. Failures and sentinels are
 * never cached, so they are retried on the next run.
 */
export function openMatchCache(
  path: string,
  logger: Logger,
  options: MatchCacheOptions = {}
): MatchCache {
  const entries = loadEntries(path, logger);

  const cutoff = new Date((options.now ?? new Date()).getTime());
  cutoff.setDate(cutoff.getDate() - (options.maxAgeDays ?? MAX_AGE_DAYS));
  const pruned = pruneEntries(entries, cutoff);
  if (pruned > 0) logger.info(`Match cache: dropped ${pruned} expired entries`);
  let dirty = pruned > 0;

  return {
    get(key) {
      if (options.refresh) return undefined;
      const entry = entries[key];
      return entry ? { ...entry.result, missingSkills: [...entry.result.missingSkills] } : undefined;
    },
    set(key, result) {
      if (result.status !== "scored") return;
      entries[key] = {
        result: { ...result, status: "scored" },
        generatedAt: new Date().toISOString(),
      };
      dirty = true;
    },
    save() {
      if (!dirty) return;
      const dir = dirname(path);
      if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
      writeFileSync(path, JSON.stringify(entries, null, 2));
      dirty = false;
    },
    get size() {
      return Object.keys(entries).length;
    },
  };
}
