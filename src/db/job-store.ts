import type { KeyedPosting } from "../dedup.ts";
import type { JobPosting, MatchedPosting } from "../utils/types.ts";
import { withTransaction } from "./client.ts";
import type { ConnectionSource, Queryable } from "./client.ts";

/** Which user and search produced a row, and on which day (YYYY-MM-DD). */
export interface RunTag {
  userName: string;
  keyword: string;
  runDate: string;
}

/**
 * Keyed storage for postings. Writes are last-write-wins upserts: every
 * column of an existing row is replaced by the incoming record.
 */
export interface JobStore {
  upsertPostings(records: KeyedPosting<JobPosting>[], tag: RunTag): Promise<number>;
  upsertMatches(records: KeyedPosting<MatchedPosting>[], tag: RunTag): Promise<number>;
  close(): Promise<void>;
}

// ── SQL ──────────────────────────────────────────────────────────────

const UPSERT_POSTING = `INSERT INTO job_posts (
    id, title, company, location, posted_at, posted_ago,
    is_reposted, salary_raw, url, description,
    user_name, keyword, run_date, updated_at
  ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, NOW())
  ON CONFLICT (id) DO UPDATE SET
    title = EXCLUDED.title,
    company = EXCLUDED.company,
    location = EXCLUDED.location,
    posted_at = EXCLUDED.posted_at,
    posted_ago = EXCLUDED.posted_ago,
    is_reposted = EXCLUDED.is_reposted,
    salary_raw = EXCLUDED.salary_raw,
    url = EXCLUDED.url,
    description = EXCLUDED.description,
    user_name = EXCLUDED.user_name,
    keyword = EXCLUDED.keyword,
    run_date = EXCLUDED.run_date,
    updated_at = NOW()`;

const UPSERT_MATCH = `INSERT INTO match_results (
    id, title, company, location, posted_at, posted_ago,
    is_reposted, salary_raw, url, description,
    user_name, keyword, run_date,
    min_salary, max_salary, currency,
    match_score, reasoning, missing_skills, recommend_apply, match_status, updated_at
  ) VALUES (
    $1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13,
    $14, $15, $16, $17, $18, $19, $20, $21, NOW()
  )
  ON CONFLICT (id) DO UPDATE SET
    title = EXCLUDED.title,
    company = EXCLUDED.company,
    location = EXCLUDED.location,
    posted_at = EXCLUDED.posted_at,
    posted_ago = EXCLUDED.posted_ago,
    is_reposted = EXCLUDED.is_reposted,
    salary_raw = EXCLUDED.salary_raw,
    url = EXCLUDED.url,
    description = EXCLUDED.description,
    user_name = EXCLUDED.user_name,
    keyword = EXCLUDED.keyword,
    run_date = EXCLUDED.run_date,
    min_salary = EXCLUDED.min_salary,
    max_salary = EXCLUDED.max_salary,
    currency = EXCLUDED.currency,
    match_score = EXCLUDED.match_score,
    reasoning = EXCLUDED.reasoning,
    missing_skills = EXCLUDED.missing_skills,
    recommend_apply = EXCLUDED.recommend_apply,
    match_status = EXCLUDED.match_status,
    updated_at = NOW()`;

function postingValues(id: string, p: JobPosting, tag: RunTag): unknown[] {
  return [
    id,
    p.title,
    p.company,
    p.location,
    p.postedAt,
    p.postedAgo,
    p.isReposted,
    p.salaryRaw,
    p.url,
    p.description,
    tag.userName,
    tag.keyword,
    tag.runDate,
  ];
}

function matchValues(id: string, p: MatchedPosting, tag: RunTag): unknown[] {
  return [
    ...postingValues(id, p, tag),
    p.salary.min,
    p.salary.max,
    p.salary.currency,
    p.match.score,
    p.match.reasoning,
    p.match.missingSkills,
    p.recommendApply,
    p.match.status,
  ];
}

async function upsertAll<T extends JobPosting>(
  client: Queryable,
  sql: string,
  records: KeyedPosting<T>[],
  tag: RunTag,
  values: (id: string, posting: T, tag: RunTag) => unknown[]
): Promise<number> {
  for (const { id, posting } of records) {
    await client.query(sql, values(id, posting, tag));
  }
  return records.length;
}

// ── Postgres ─────────────────────────────────────────────────────────

/** One transaction per batch: a failed row rolls back the whole batch. */
export class PostgresJobStore implements JobStore {
  constructor(private readonly source: ConnectionSource) {}

  async upsertPostings(records: KeyedPosting<JobPosting>[], tag: RunTag): Promise<number> {
    if (records.length === 0) return 0;
    return withTransaction(this.source, (client) =>
      upsertAll(client, UPSERT_POSTING, records, tag, postingValues)
    );
  }

  async upsertMatches(records: KeyedPosting<MatchedPosting>[], tag: RunTag): Promise<number> {
    if (records.length === 0) return 0;
    return withTransaction(this.source, (client) =>
      upsertAll(client, UPSERT_MATCH, records, tag, matchValues)
    );
  }

  async close(): Promise<void> {
    await this.source.end();
  }
}
