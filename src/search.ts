import type { NavigationDriver } from "./browser/driver.ts";
import type { SiteLayout } from "./browser/layout.ts";
import { ServiceUnavailableError, errorMessage } from "./utils/errors.ts";
import type { Logger } from "./utils/logger.ts";
import type { SearchParams, SearchPeriod } from "./utils/types.ts";

export const VALID_PERIODS: readonly SearchPeriod[] = ["Past 24 hours", "Past week", "Past month"];

const SECURITY_CHECK_POLL_MS = 2_000;
const SECURITY_CHECK_MAX_WAIT_MS = 5 * 60_000;

export interface Credentials {
  email: string;
  password: string;
}

export function credentialsFromEnv(): Credentials | null {
  const email = process.env.SITE_EMAIL;
  const password = process.env.SITE_PASSWORD;
  if (!email || !password) return null;
  return { email, password };
}

export function resolvePeriod(period: string, logger: Logger): SearchPeriod {
  const match = VALID_PERIODS.find((p) => p === period);
  if (match) return match;
  logger.warn(
    `Invalid period '${period}', defaulting to 'Past 24 hours'. Valid options: ${VALID_PERIODS.join(", ")}`
  );
  return "Past 24 hours";
}

/** The site's distance slider moves in steps of 5. */
export function roundDistance(distance: number): number {
  return Math.round(distance / 5) * 5;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ── Session steps ────────────────────────────────────────────────────

/**
 * Open the jobs page and sign in if the site asks for it. A failure
 * here ends the run: nothing else works without a session.
 */
export async function signIn<H>(
  driver: NavigationDriver<H>,
  layout: SiteLayout,
  credentials: Credentials | null,
  logger: Logger,
  signal?: AbortSignal
): Promise<void> {
  try {
    logger.info("Opening job search page...");
    await driver.goto(layout.jobsUrl);

    if (await driver.isVisible(layout.signInButton)) {
      if (!credentials) {
        throw new Error("Sign-in required but SITE_EMAIL / SITE_PASSWORD are not set");
      }
      logger.info("Sign-in button detected, submitting credentials");
      await driver.fill(layout.emailField, credentials.email);
      await driver.fill(layout.passwordField, credentials.password);
      await driver.clickFirst(layout.signInButton);
    } else {
      logger.info("Sign-in button not found, session already authenticated");
    }
  } catch (err) {
    throw new ServiceUnavailableError("navigation", `Authentication failed: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  if (await driver.isVisible(layout.securityCheck)) {
    logger.warn("Security check detected, waiting for it to be completed in the browser...");
    let waited = 0;
    while (await driver.isVisible(layout.securityCheck)) {
      if (signal?.aborted || waited >= SECURITY_CHECK_MAX_WAIT_MS) {
        throw new ServiceUnavailableError("navigation", "Security check was not completed");
      }
      await sleep(SECURITY_CHECK_POLL_MS);
      waited += SECURITY_CHECK_POLL_MS;
    }
    logger.info("Security check cleared, resuming");
  }
}

export async function searchJobs<H>(
  driver: NavigationDriver<H>,
  layout: SiteLayout,
  search: Pick<SearchParams, "keyword" | "city">,
  logger: Logger
): Promise<void> {
  logger.info(`Searching for '${search.keyword}' in '${search.city}'`);
  try {
    await driver.fill(layout.searchBox, `${search.keyword} in ${search.city}`);
    await driver.press(layout.searchBox, "Enter");
  } catch (err) {
    logger.error(`Search execution failed: ${errorMessage(err)}`);
  }
}

export async function filterPeriod<H>(
  driver: NavigationDriver<H>,
  layout: SiteLayout,
  period: string,
  logger: Logger
): Promise<void> {
  const resolved = resolvePeriod(period, logger);
  logger.info(`Applying time filter: ${resolved}`);
  try {
    await driver.clickFirst(layout.datePostedFilter);
    await driver.clickFirst(layout.periodOption(resolved));
    await driver.clickFirst(layout.showResults);
  } catch (err) {
    logger.error(`Failed to apply time filter: ${errorMessage(err)}`);
  }
}

export async function setDistance<H>(
  driver: NavigationDriver<H>,
  layout: SiteLayout,
  distance: number,
  logger: Logger
): Promise<void> {
  const rounded = roundDistance(distance);
  logger.info(`Setting location radius: ${rounded}km`);
  try {
    await driver.waitFor(layout.locationFilter, 10_000);
    await driver.clickFirst(layout.locationFilter);
    await driver.clickFirst(layout.distanceEdit);
    await driver.fill(layout.distanceSlider, String(rounded));
    await driver.clickFirst(layout.showResults);
  } catch (err) {
    logger.error(`Failed to set location radius: ${errorMessage(err)}`);
  }
}

/** Sign in, search, then narrow by date and distance. */
export async function prepareSearch<H>(
  driver: NavigationDriver<H>,
  layout: SiteLayout,
  search: SearchParams,
  credentials: Credentials | null,
  logger: Logger,
  signal?: AbortSignal
): Promise<void> {
  await signIn(driver, layout, credentials, logger, signal);
  await searchJobs(driver, layout, search, logger);
  await filterPeriod(driver, layout, search.period, logger);
  await setDistance(driver, layout, search.distance, logger);
}
