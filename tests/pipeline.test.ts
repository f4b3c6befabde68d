import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { LISTING_SITE } from "../src/browser/layout.ts";
import type { CompletionRequest } from "../src/llm.ts";
import { outputFileName } from "../src/output.ts";
import { runTag } from "../src/persist.ts";
import { runPipeline } from "../src/pipeline.ts";
import type { PipelineDeps } from "../src/pipeline.ts";
import { parseConfig } from "../src/utils/config.ts";
import { parseCSV } from "../src/utils/csv.ts";
import { ServiceUnavailableError } from "../src/utils/errors.ts";
import { FakeDriver, InMemoryJobStore, ScriptedModel, silentLogger } from "./helpers.ts";
import type { FakeHandle, FakePage } from "./helpers.ts";

const pages: FakePage[] = [
  {
    cards: [
      {
        text: "Engineer A\n\nAcme Corp\n\nToronto, ON\n\n1 day ago",
        detailText: "About the job\nPay: $100,000 - $120,000 per year",
        url: "https://x.test/a",
      },
      {
        text: "Engineer B\n\nOther Inc\n\nToronto, ON\n\n2 days ago",
        detailText: "About the job\nNo pay listed",
        reposted: true,
        url: "https://x.test/b",
      },
      {
        text: "Engineer C\n\nContoso\n\nRemote\n\n3 days ago",
        detailText: "About the job\nSalary $90k",
        url: null,
      },
    ],
  },
];

const SALARY_A = '{"min": 100000, "max": 120000, "currency": "CAD"}';
const SALARY_C = '{"min": 0, "max": 90000, "currency": "CAD"}';
const MATCH_A = '{"match_score": 85, "reasoning": "Fits.", "missing_skills": []}';
const MATCH_C = '{"match_score": 70, "reasoning": "Partial.", "missing_skills": ["Go"]}';

describe("runPipeline", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "pipeline-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function deps(overrides: Partial<PipelineDeps<FakeHandle>> = {}): PipelineDeps<FakeHandle> {
    const params = parseConfig({
      user_name: "Jane",
      resume: "resume.txt",
      search: { keyword: "Engineer", city: "Toronto" },
      company_list: ["Acme Corp"],
    });
    return {
      params,
      resume: "TypeScript engineer",
      openDriver: async () => new FakeDriver(pages),
      layout: LISTING_SITE,
      credentials: null,
      model: new ScriptedModel([SALARY_A, SALARY_C, MATCH_A, MATCH_C]),
      store: new InMemoryJobStore(),
      matchCache: null,
      outputDir: dir,
      logger: silentLogger,
      ...overrides,
    };
  }

  it("scrapes, filters, normalizes, matches and persists in order", async () => {
    const store = new InMemoryJobStore();
    let driver: FakeDriver | undefined;

    const run = await runPipeline(
      deps({
        store,
        openDriver: async () => {
          driver = new FakeDriver(pages);
          return driver;
        },
      })
    );

    expect(run.fatal).toBe(false);
    expect(run.error).toBeNull();
    expect(run.accumulator.scraped.map((p) => p.title)).toEqual(["Engineer A", "Engineer B", "Engineer C"]);
    expect(run.accumulator.eligible.map((p) => p.title)).toEqual(["Engineer A", "Engineer C"]);
    expect(run.accumulator.matched.map((p) => [p.title, p.salary.max, p.match.score, p.recommendApply])).toEqual([
      ["Engineer A", 120000, 85, true],
      ["Engineer C", 90000, 70, false],
    ]);
    expect(run.summary).toMatchObject({
      pagesVisited: 1,
      totalScraped: 3,
      afterFilter: 2,
      salaryCalls: 2,
      matchCalls: 2,
      matched: 2,
      notEvaluated: 0,
      recommended: 1,
      persistedRaw: 2,
      persistedMatched: 1,
      droppedNoUrl: 1,
      degraded: false,
      aborted: false,
      errors: 0,
    });
    expect(store.postings.size).toBe(2);
    expect(store.matches.size).toBe(1);
    const tag = runTag("Jane", "Engineer");
    expect([...store.tags.values()]).toEqual([tag, tag]);
    expect(driver).not.toBeNull();
    expect(driver?.closed).toBe(true);

    expect(run.outputs.matched).toBe(join(dir, outputFileName("Jane", "Engineer", "matched")));
    const rawCsv = readFileSync(join(dir, outputFileName("Jane", "Engineer", "raw")), "utf-8");
    expect(parseCSV(rawCsv).map((row) => [row["Job Title"], row.URL, row["Match Status"]])).toEqual([
      ["Engineer A", "https://x.test/a", ""],
      ["Engineer B", "https://x.test/b", ""],
      ["Engineer C", "", ""],
    ]);
  });

  it("stops with nothing written when the session cannot start", async () => {
    const store = new InMemoryJobStore();

    const run = await runPipeline(
      deps({
        store,
        openDriver: async () => {
          throw new ServiceUnavailableError("navigation", "Failed to launch browser");
        },
      })
    );

    expect(run.fatal).toBe(true);
    expect(run.error).toBe("Failed to launch browser");
    expect(run.outputs).toEqual({ raw: null, matched: null });
    expect(store.postings.size).toBe(0);
    expect(existsSync(join(dir, outputFileName("Jane", "Engineer", "raw")))).toBe(false);
  });

  it("keeps unreached postings, and salaries already paid for, when aborted mid-run", async () => {
    const controller = new AbortController();
    class AbortingModel extends ScriptedModel {
      async complete(request: CompletionRequest): Promise<string> {
        const reply = await super.complete(request);
        controller.abort();
        return reply;
      }
    }
    const store = new InMemoryJobStore();

    const run = await runPipeline(
      deps({ store, model: new AbortingModel([SALARY_A]), signal: controller.signal })
    );

    expect(run.fatal).toBe(false);
    expect(run.summary.aborted).toBe(true);
    expect(run.summary.salaryCalls).toBe(1);
    expect(run.summary.notEvaluated).toBe(2);
    expect(run.accumulator.matched.map((p) => [p.title, p.salary, p.match.status, p.recommendApply])).toEqual([
      ["Engineer A", { min: 100000, max: 120000, currency: "CAD" }, "not-evaluated", false],
      ["Engineer C", { min: 0, max: 0, currency: "NotEvaluated" }, "not-evaluated", false],
    ]);
    expect(store.postings.size).toBe(2);
    expect(store.matches.size).toBe(1);
    expect(run.outputs.raw).not.toBeNull();
    expect(run.outputs.matched).not.toBeNull();
  });

  it("completes with CSVs when storage is down", async () => {
    const store = new InMemoryJobStore();
    store.failWith = new Error("connection refused");

    const run = await runPipeline(deps({ store }));

    expect(run.fatal).toBe(false);
    expect(run.summary.persistedRaw).toBe(0);
    expect(run.summary.persistedMatched).toBe(0);
    expect(run.summary.errors).toBe(2);
    expect(run.accumulator.matched).toHaveLength(2);
    expect(run.outputs.matched).not.toBeNull();
  });

  it("skips persistence without a store", async () => {
    const run = await runPipeline(deps({ store: null }));
    expect(run.summary.persistedRaw).toBe(0);
    expect(run.summary.droppedNoUrl).toBe(0);
    expect(run.summary.matched).toBe(2);
  });
});
