import { describe, it, expect } from "vitest";
import { dedupeByUrl } from "../src/dedup.ts";
import type { ConnectionSource, TransactionClient } from "../src/db/client.ts";
import { PostgresJobStore } from "../src/db/job-store.ts";
import { persistMatches, persistPostings, runTag } from "../src/persist.ts";
import { postingKey } from "../src/utils/hash.ts";
import { InMemoryJobStore, makeMatched, makePosting, silentLogger } from "./helpers.ts";

const TAG = runTag("Jane", "Engineer", new Date(2024, 4, 1, 9, 30));

// ── Fake pg pool ─────────────────────────────────────────────────────

class FakeClient implements TransactionClient {
  released = false;
  constructor(private readonly pool: FakePool) {}

  async query(text: string, values?: unknown[]): Promise<unknown> {
    this.pool.statements.push(text.trim().split(/\s+/).slice(0, 3).join(" "));
    if (values) this.pool.values.push(values);
    if (values && this.pool.failOnValue !== null && values.includes(this.pool.failOnValue)) {
      throw new Error("duplicate key value violates check constraint");
    }
    return { rows: [] };
  }

  release(): void {
    this.released = true;
  }
}

class FakePool implements ConnectionSource {
  readonly statements: string[] = [];
  readonly values: unknown[][] = [];
  readonly clients: FakeClient[] = [];
  failOnValue: unknown = null;
  ended = false;

  async connect(): Promise<TransactionClient> {
    const client = new FakeClient(this);
    this.clients.push(client);
    return client;
  }

  async end(): Promise<void> {
    this.ended = true;
  }
}

describe("dedupeByUrl", () => {
  it("keys by md5 of the url and lets the last record win", () => {
    const first = makePosting({ title: "Old title", url: "https://x.test/1" });
    const second = makePosting({ title: "Other", url: "https://x.test/2" });
    const latest = makePosting({ title: "New title", url: " https://x.test/1 " });

    const result = dedupeByUrl([first, second, latest]);

    expect(result.records.map((r) => r.posting.title)).toEqual(["New title", "Other"]);
    expect(result.records[0].id).toBe(postingKey("https://x.test/1"));
    expect(result.records[0].id).toMatch(/^[0-9a-f]{32}$/);
    expect(result.duplicates).toBe(1);
  });

  it("drops postings without a url", () => {
    const result = dedupeByUrl([makePosting({ url: "" }), makePosting({ url: "   " })]);
    expect(result.records).toEqual([]);
    expect(result.droppedNoUrl).toBe(2);
  });
});

describe("runTag", () => {
  it("uses the local calendar day", () => {
    expect(runTag("Jane", "Engineer", new Date(2024, 0, 9, 23, 59))).toEqual({
      userName: "Jane",
      keyword: "Engineer",
      runDate: "2024-01-09",
    });
  });
});

describe("persistPostings", () => {
  it("is idempotent and last-write-wins across runs", async () => {
    const store = new InMemoryJobStore();
    const batch = [
      makePosting({ url: "https://x.test/1", title: "A" }),
      makePosting({ url: "https://x.test/2", title: "B" }),
    ];
    await persistPostings(store, batch, TAG, silentLogger);

    const rerun = [
      makePosting({ url: "https://x.test/1", title: "A (edited)" }),
      makePosting({ url: "https://x.test/2", title: "B" }),
    ];
    const outcome = await persistPostings(store, rerun, TAG, silentLogger);

    expect(outcome).toEqual({ written: 2, droppedNoUrl: 0, duplicates: 0, error: null });
    expect(store.postings.size).toBe(2);
    expect([...store.postings.values()].map((p) => p.title)).toEqual(["A (edited)", "B"]);
    expect([...store.tags.values()]).toEqual([TAG, TAG]);
  });

  it("reports storage failures instead of throwing", async () => {
    const store = new InMemoryJobStore();
    store.failWith = new Error("connection refused");
    const batch = [makePosting(), makePosting({ url: "" })];

    const outcome = await persistPostings(store, batch, TAG, silentLogger);

    expect(outcome.written).toBe(0);
    expect(outcome.droppedNoUrl).toBe(1);
    expect(outcome.error?.kind).toBe("storage-unavailable");
    expect(outcome.error?.message).toBe("job_posts upsert failed: connection refused");
    expect(batch).toHaveLength(2);
  });
});

describe("PostgresJobStore", () => {
  it("wraps a batch in one transaction", async () => {
    const pool = new FakePool();
    const store = new PostgresJobStore(pool);

    const outcome = await persistPostings(
      store,
      [makePosting({ url: "https://x.test/1" }), makePosting({ url: "https://x.test/2" })],
      TAG,
      silentLogger
    );

    expect(outcome.written).toBe(2);
    expect(pool.statements).toEqual([
      "BEGIN",
      "INSERT INTO job_posts",
      "INSERT INTO job_posts",
      "COMMIT",
    ]);
    expect(pool.clients).toHaveLength(1);
    expect(pool.clients[0].released).toBe(true);
    expect(pool.values[0].slice(8, 13)).toEqual([
      "https://x.test/1",
      "Build services in TypeScript.",
      "Jane",
      "Engineer",
      "2024-05-01",
    ]);
  });

  it("tags match rows with the run and keeps the match columns after it", async () => {
    const pool = new FakePool();
    const store = new PostgresJobStore(pool);

    await persistMatches(store, [makeMatched({ url: "https://x.test/1" })], TAG, silentLogger);

    expect(pool.values[0]).toHaveLength(21);
    expect(pool.values[0].slice(10)).toEqual([
      "Jane",
      "Engineer",
      "2024-05-01",
      0,
      0,
      "N/A",
      85,
      "Good fit.",
      [],
      true,
      "scored",
    ]);
  });

  it("rolls back the whole batch when a row fails", async () => {
    const pool = new FakePool();
    pool.failOnValue = "https://x.test/bad";
    const store = new PostgresJobStore(pool);

    const outcome = await persistMatches(
      store,
      [makeMatched({ url: "https://x.test/ok" }), makeMatched({ url: "https://x.test/bad" })],
      TAG,
      silentLogger
    );

    expect(outcome.written).toBe(0);
    expect(outcome.error?.message).toBe(
      "match_results upsert failed: duplicate key value violates check constraint"
    );
    expect(pool.statements).toEqual([
      "BEGIN",
      "INSERT INTO match_results",
      "INSERT INTO match_results",
      "ROLLBACK",
    ]);
    expect(pool.clients[0].released).toBe(true);
  });

  it("skips the connection for an empty batch", async () => {
    const pool = new FakePool();
    const store = new PostgresJobStore(pool);

    expect(await store.upsertPostings([], TAG)).toBe(0);
    expect(pool.clients).toHaveLength(0);

    await store.close();
    expect(pool.ended).toBe(true);
  });
});
