import "dotenv/config";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import { LISTING_SITE } from "./browser/layout.ts";
import { PuppeteerDriver } from "./browser/puppeteer-driver.ts";
import { createPool } from "./db/client.ts";
import { PostgresJobStore } from "./db/job-store.ts";
import type { JobStore } from "./db/job-store.ts";
import { createModelFromEnv, offlineModel } from "./llm.ts";
import { openMatchCache } from "./match-cache.ts";
import { logSummary, runPipeline } from "./pipeline.ts";
import { loadResume } from "./resume.ts";
import { credentialsFromEnv } from "./search.ts";
import { createRunCancellation } from "./utils/cancellation.ts";
import { loadConfig } from "./utils/config.ts";
import { ConfigurationError, errorMessage } from "./utils/errors.ts";
import { createLogger } from "./utils/logger.ts";
import { appendRunHistory, lastRunFor, topCompanies } from "./utils/run-history.ts";

const __dirname = dirname(fileURLToPath(import.meta.url));
const ROOT = join(__dirname, "..");
const DEFAULT_CONFIG_PATH = join(ROOT, "config/config.json");
const OUTPUT_DIR = join(ROOT, "data/output");
const MATCH_CACHE_PATH = join(ROOT, "data/match-cache.json");

const logger = createLogger({
  logDir: join(ROOT, "logs"),
  debug: Boolean(process.env.DEBUG),
});

// ── CLI args ─────────────────────────────────────────────────────────

const args = process.argv.slice(2);

function flagValue(name: string): string | undefined {
  const idx = args.indexOf(name);
  return idx >= 0 ? args[idx + 1] : undefined;
}

function positiveInt(raw: string | undefined, name: string): number | undefined {
  if (raw === undefined) return undefined;
  const value = parseInt(raw, 10);
  if (isNaN(value) || value <= 0) {
    logger.warn(`Invalid ${name} value '${raw}', ignoring`);
    return undefined;
  }
  return value;
}

const configPath = flagValue("--config") ?? DEFAULT_CONFIG_PATH;
const dryRun = args.includes("--dry-run");
const rematch = args.includes("--rematch");
const timeoutMinutes = positiveInt(
  flagValue("--timeout") ?? process.env.RUN_TIMEOUT_MINUTES,
  "--timeout"
);
const maxPageOverride = positiveInt(flagValue("--max-page"), "--max-page");

if (dryRun) logger.info("DRY RUN MODE: nothing is written to the database");
if (rematch) logger.info("Ignoring cached match scores (--rematch)");

// ── Cancellation ─────────────────────────────────────────────────────

const cancellation = createRunCancellation(logger);

process.on("SIGINT", () => cancellation.onSignal("SIGINT"));
process.on("SIGTERM", () => cancellation.onSignal("SIGTERM"));

// ── Main ─────────────────────────────────────────────────────────────

function openStore(): JobStore | null {
  if (dryRun) return null;
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) {
    logger.warn("DATABASE_URL not set, skipping database persistence");
    return null;
  }
  return new PostgresJobStore(createPool(databaseUrl, logger.child("db")));
}

async function run(): Promise<number> {
  const startTime = Date.now();

  const params = loadConfig(configPath, logger);
  if (maxPageOverride) params.maxPage = maxPageOverride;

  const executablePath = process.env.CHROME_PATH;
  if (!executablePath) {
    throw new ConfigurationError("CHROME_PATH not set: point it at a Chrome or Chromium binary");
  }

  const resume = await loadResume(params.resume, logger);

  let model = createModelFromEnv();
  if (!model) {
    logger.warn("ANTHROPIC_API_KEY not set: salaries and matches will carry error defaults");
    model = offlineModel;
  }

  const previous = lastRunFor(params.userName, params.search.keyword);
  if (previous) {
    logger.info(
      `Last run for this search: ${previous.timestamp} (${previous.summary.matched} matched, ${previous.summary.recommended} recommended)`
    );
  }

  let timer: NodeJS.Timeout | undefined;
  if (timeoutMinutes) {
    logger.info(`Run timeout: ${timeoutMinutes} minute(s)`);
    timer = setTimeout(() => cancellation.abort("Run timeout reached"), timeoutMinutes * 60_000);
  }

  const store = openStore();
  const matchCache = openMatchCache(MATCH_CACHE_PATH, logger, { refresh: rematch });

  try {
    const result = await runPipeline({
      params,
      resume,
      openDriver: () =>
        PuppeteerDriver.launch(
          {
            executablePath,
            headless: params.headless,
            tracePath: params.tracing ? params.tracePath : undefined,
          },
          logger.child("browser")
        ),
      layout: LISTING_SITE,
      credentials: credentialsFromEnv(),
      model,
      store,
      matchCache,
      outputDir: OUTPUT_DIR,
      logger,
      signal: cancellation.signal,
    });

    logSummary(result.summary, logger);

    try {
      appendRunHistory({
        timestamp: new Date().toISOString(),
        durationMs: Date.now() - startTime,
        userName: params.userName,
        keyword: params.search.keyword,
        city: params.search.city,
        summary: result.summary,
        outputs: result.outputs,
        topCompanies: topCompanies(result.accumulator.matched),
        error: result.error,
      });
      logger.info("Run history updated");
    } catch (err) {
      logger.warn("Failed to save run history", err);
    }

    return result.fatal ? 1 : 0;
  } finally {
    if (timer) clearTimeout(timer);
    if (store) {
      try {
        await store.close();
      } catch (err) {
        logger.warn(`Database pool did not close cleanly: ${errorMessage(err)}`);
      }
    }
  }
}

run()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    logger.error(err instanceof ConfigurationError ? err.message : "Fatal error", err);
    process.exit(1);
  });
