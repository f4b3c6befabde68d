import { extractPosting } from "./extract.ts";
import type { DetailView } from "./extract.ts";
import type { NavigationDriver } from "./browser/driver.ts";
import type { SiteLayout } from "./browser/layout.ts";
import { DetailUnavailableError, errorMessage } from "./utils/errors.ts";
import type { Logger } from "./utils/logger.ts";
import type { JobPosting } from "./utils/types.ts";

export type PaginationState = "LOADING" | "EXTRACTING" | "ADVANCING" | "DONE";

export type ListingLayout = Pick<
  SiteLayout,
  "resultsContainer" | "card" | "detailPanel" | "repostedMarker" | "applyLink" | "nextPage"
>;

export interface PaginationOptions {
  layout: ListingLayout;
  maxPage: number;
  loadTimeoutMs?: number;
  detailTimeoutMs?: number;
  signal?: AbortSignal;
}

export interface PaginationResult {
  postings: JobPosting[];
  pagesVisited: number;
  itemsSeen: number;
  itemsSkipped: number;
  /** Kept items whose detail panel never loaded. */
  detailsUnavailable: DetailUnavailableError[];
  /** Results container never showed up. */
  degraded: boolean;
  aborted: boolean;
  error: string | null;
}

const DEFAULT_LOAD_TIMEOUT_MS = 15_000;
const DEFAULT_DETAIL_TIMEOUT_MS = 5_000;

// ── Single item ──────────────────────────────────────────────────────

async function readDetail<H>(
  driver: NavigationDriver<H>,
  layout: ListingLayout,
  timeoutMs: number,
  label: string,
  logger: Logger
): Promise<{ view: DetailView; error: DetailUnavailableError | null }> {
  const isReposted = (await driver.count(layout.repostedMarker)) > 0;

  let text: string | null = null;
  try {
    text = await driver.textOf(layout.detailPanel, timeoutMs);
  } catch (err) {
    logger.debug(`Detail panel read failed for ${label}`, errorMessage(err));
  }
  const error =
    text === null ? new DetailUnavailableError(`Could not extract description for ${label}`) : null;

  let url: string | null = null;
  try {
    url = await driver.attributeOf(layout.applyLink, "href");
  } catch {
    logger.debug(`No apply link for ${label}`);
  }

  return { view: { text, isReposted, url }, error };
}

async function processItem<H>(
  driver: NavigationDriver<H>,
  handle: H,
  index: number,
  options: Required<Omit<PaginationOptions, "signal">>,
  logger: Logger
): Promise<{ posting: JobPosting; detailError: DetailUnavailableError | null } | null> {
  let cardText: string;
  try {
    await driver.scrollIntoView(handle);
    cardText = await driver.readText(handle);
  } catch (err) {
    logger.warn(`Failed to read text for job #${index}: ${errorMessage(err)}`);
    return null;
  }

  // Reject malformed cards before paying for a click
  const preview = extractPosting(cardText);
  if (!preview.ok) {
    logger.warn(`Job #${index} has an unexpected text structure, skipping: ${preview.error.message}`);
    return null;
  }
  const label = `${preview.posting.title} at ${preview.posting.company}`;

  try {
    await driver.click(handle);
  } catch (err) {
    logger.warn(`Interaction failed for ${label}: ${errorMessage(err)}`);
    return null;
  }

  let detail: DetailView;
  let detailError: DetailUnavailableError | null;
  try {
    const read = await readDetail(driver, options.layout, options.detailTimeoutMs, label, logger);
    detail = read.view;
    detailError = read.error;
  } catch (err) {
    detail = { text: null, isReposted: false, url: null };
    detailError = new DetailUnavailableError(`Detail view failed for ${label}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
  if (detailError) logger.warn(`${detailError.message}, keeping card fields only`);

  const result = extractPosting(cardText, detail);
  if (!result.ok) return null;

  logger.info(`Scraped: ${label}`);
  return { posting: result.posting, detailError };
}

// ── State machine ───────────────────────────────────────────────────

/**
 * Walk the result pages and extract every card. Failures on one card
 * never end the page; an unexpected failure of the page itself ends the
 * walk but keeps whatever was collected. No deduplication happens here.
 */
export async function collectPostings<H>(
  driver: NavigationDriver<H>,
  options: PaginationOptions,
  logger: Logger
): Promise<PaginationResult> {
  const resolved = {
    layout: options.layout,
    maxPage: options.maxPage,
    loadTimeoutMs: options.loadTimeoutMs ?? DEFAULT_LOAD_TIMEOUT_MS,
    detailTimeoutMs: options.detailTimeoutMs ?? DEFAULT_DETAIL_TIMEOUT_MS,
  };
  const { layout, signal } = options;

  const postings: JobPosting[] = [];
  const detailsUnavailable: DetailUnavailableError[] = [];
  let state: PaginationState = "LOADING";
  let page = 1;
  let pagesVisited = 0;
  let itemsSeen = 0;
  let itemsSkipped = 0;
  let degraded = false;
  let aborted = false;
  let error: string | null = null;

  while (state !== "DONE") {
    logger.debug(`Pagination state: ${state} (page ${page})`);
    try {
      switch (state) {
        case "LOADING": {
          const ready = await driver.waitFor(layout.resultsContainer, resolved.loadTimeoutMs);
          if (!ready) {
            logger.warn(`Results did not load on page ${page}, ending scrape`);
            degraded = true;
            state = "DONE";
            break;
          }
          pagesVisited++;
          state = "EXTRACTING";
          break;
        }

        case "EXTRACTING": {
          const items = await driver.findAll(layout.card);
          logger.info(`Found ${items.length} jobs on page ${page}`);

          for (let i = 0; i < items.length; i++) {
            if (signal?.aborted) {
              aborted = true;
              break;
            }
            itemsSeen++;
            const item = await processItem(driver, items[i], i + 1, resolved, logger);
            if (item) {
              postings.push(item.posting);
              if (item.detailError) detailsUnavailable.push(item.detailError);
            } else {
              itemsSkipped++;
            }
          }

          state = aborted ? "DONE" : "ADVANCING";
          break;
        }

        case "ADVANCING": {
          const hasNext =
            (await driver.count(layout.nextPage)) > 0 && (await driver.isEnabled(layout.nextPage));
          if (!hasNext) {
            logger.info("Pagination end reached");
            state = "DONE";
          } else if (page >= resolved.maxPage) {
            logger.info(`Max page (${resolved.maxPage}) reached`);
            state = "DONE";
          } else if (signal?.aborted) {
            aborted = true;
            state = "DONE";
          } else {
            logger.info("Navigating to next page...");
            await driver.clickFirst(layout.nextPage);
            page++;
            state = "LOADING";
          }
          break;
        }
      }
    } catch (err) {
      logger.error(`Unexpected error during pagination on page ${page}`, err);
      error = errorMessage(err);
      state = "DONE";
    }
  }

  logger.info(
    `Scrape finished: ${postings.length} postings from ${pagesVisited} page(s), ${itemsSkipped} skipped`
  );

  return {
    postings,
    pagesVisited,
    itemsSeen,
    itemsSkipped,
    detailsUnavailable,
    degraded,
    aborted,
    error,
  };
}
