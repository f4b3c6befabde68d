import { describeLocator } from "../src/browser/driver.ts";
import type { DriverKey, Locator, NavigationDriver } from "../src/browser/driver.ts";
import { LISTING_SITE } from "../src/browser/layout.ts";
import type { KeyedPosting } from "../src/dedup.ts";
import type { JobStore, RunTag } from "../src/db/job-store.ts";
import type { CompletionRequest, LanguageModel } from "../src/llm.ts";
import { createLogger } from "../src/utils/logger.ts";
import type { JobPosting, MatchedPosting } from "../src/utils/types.ts";

export const silentLogger = createLogger({ logDir: null, silent: true });

export function makePosting(overrides: Partial<JobPosting> = {}): JobPosting {
  return {
    title: "Senior Engineer",
    company: "Acme Corp",
    location: "Toronto, ON",
    postedAt: null,
    postedAgo: "2 days ago",
    isReposted: false,
    salaryRaw: "",
    url: "https://jobs.example.com/view/1",
    description: "Build services in TypeScript.",
    ...overrides,
  };
}

export function makeMatched(overrides: Partial<MatchedPosting> = {}): MatchedPosting {
  return {
    ...makePosting(),
    salary: { min: 0, max: 0, currency: "N/A" },
    match: { score: 85, reasoning: "Good fit.", missingSkills: [], status: "scored" },
    recommendApply: true,
    ...overrides,
  };
}

// ── Language model ───────────────────────────────────────────────────

/** Replays canned replies in order; an Error entry is thrown instead. */
export class ScriptedModel implements LanguageModel {
  readonly requests: CompletionRequest[] = [];
  private readonly replies: Array<string | Error>;

  constructor(replies: Array<string | Error>) {
    this.replies = [...replies];
  }

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    const next = this.replies.shift();
    if (next === undefined) throw new Error("ScriptedModel ran out of replies");
    if (next instanceof Error) throw next;
    return next;
  }
}

// ── Navigation driver ────────────────────────────────────────────────

export interface FakeCard {
  text: string;
  detailText?: string | null;
  reposted?: boolean;
  url?: string | null;
  failRead?: boolean;
  failClick?: boolean;
}

export interface FakePage {
  cards: FakeCard[];
  /** false simulates a results container that never appears. */
  ready?: boolean;
}

export interface FakeHandle {
  page: number;
  index: number;
}

function sameLocator(a: Locator, b: Locator): boolean {
  return describeLocator(a) === describeLocator(b);
}

/** In-memory stand-in for a browser session over canned result pages. */
export class FakeDriver implements NavigationDriver<FakeHandle> {
  readonly calls: string[] = [];
  page = 0;
  closed = false;
  private selected: FakeCard | null = null;

  constructor(
    private readonly pages: FakePage[],
    private readonly layout = LISTING_SITE
  ) {}

  private card(handle: FakeHandle): FakeCard {
    const card = this.pages[handle.page]?.cards[handle.index];
    if (!card) throw new Error(`No card at ${handle.page}/${handle.index}`);
    return card;
  }

  async goto(url: string): Promise<void> {
    this.calls.push(`goto ${url}`);
  }

  async waitFor(locator: Locator): Promise<boolean> {
    if (sameLocator(locator, this.layout.resultsContainer)) {
      return this.pages[this.page]?.ready !== false;
    }
    return true;
  }

  async findAll(locator: Locator): Promise<FakeHandle[]> {
    if (!sameLocator(locator, this.layout.card)) return [];
    const cards = this.pages[this.page]?.cards ?? [];
    return cards.map((_, index) => ({ page: this.page, index }));
  }

  async count(locator: Locator): Promise<number> {
    if (sameLocator(locator, this.layout.repostedMarker)) {
      return this.selected?.reposted ? 1 : 0;
    }
    if (sameLocator(locator, this.layout.nextPage)) {
      return this.page < this.pages.length - 1 ? 1 : 0;
    }
    return 0;
  }

  async isVisible(_locator: Locator): Promise<boolean> {
    return false;
  }

  async isEnabled(): Promise<boolean> {
    return true;
  }

  async scrollIntoView(handle: FakeHandle): Promise<void> {
    if (this.card(handle).failRead) throw new Error("element detached");
  }

  async readText(handle: FakeHandle): Promise<string> {
    return this.card(handle).text;
  }

  async click(handle: FakeHandle): Promise<void> {
    const card = this.card(handle);
    if (card.failClick) throw new Error("click intercepted");
    this.selected = card;
  }

  async clickFirst(locator: Locator): Promise<void> {
    this.calls.push(`click ${describeLocator(locator)}`);
    if (sameLocator(locator, this.layout.nextPage)) {
      this.page++;
      this.selected = null;
    }
  }

  async fill(locator: Locator, value: string): Promise<void> {
    this.calls.push(`fill ${describeLocator(locator)} ${value}`);
  }

  async press(locator: Locator, key: DriverKey): Promise<void> {
    this.calls.push(`press ${describeLocator(locator)} ${key}`);
  }

  async textOf(locator: Locator): Promise<string | null> {
    if (sameLocator(locator, this.layout.detailPanel)) {
      return this.selected?.detailText ?? null;
    }
    return null;
  }

  async attributeOf(locator: Locator, name: string): Promise<string | null> {
    if (sameLocator(locator, this.layout.applyLink) && name === "href") {
      return this.selected?.url ?? null;
    }
    return null;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

// ── Storage ──────────────────────────────────────────────────────────

/** Keyed in-memory store with the same last-write-wins upsert contract. */
export class InMemoryJobStore implements JobStore {
  readonly postings = new Map<string, JobPosting>();
  readonly matches = new Map<string, MatchedPosting>();
  readonly tags = new Map<string, RunTag>();
  failWith: Error | null = null;

  async upsertPostings(records: KeyedPosting<JobPosting>[], tag: RunTag): Promise<number> {
    if (this.failWith) throw this.failWith;
    for (const { id, posting } of records) {
      this.postings.set(id, posting);
      this.tags.set(id, tag);
    }
    return records.length;
  }

  async upsertMatches(records: KeyedPosting<MatchedPosting>[], tag: RunTag): Promise<number> {
    if (this.failWith) throw this.failWith;
    for (const { id, posting } of records) {
      this.matches.set(id, posting);
      this.tags.set(id, tag);
    }
    return records.length;
  }

  async close(): Promise<void> {}
}
