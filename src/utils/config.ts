import { readFileSync, existsSync } from "fs";
import { z } from "zod";
import { ConfigurationError } from "./errors.ts";
import { parseCSV } from "./csv.ts";
import type { Logger } from "./logger.ts";
import type { RunParams } from "./types.ts";

const requiredText = (field: string) =>
  z
    .string({ required_error: `Missing required field '${field}'` })
    .trim()
    .min(1, `Field '${field}' cannot be empty`);

// ── Config document schema ───────────────────────────────────────────

export const configSchema = z.object({
  user_name: z.string().trim().min(1).default("User"),
  resume: requiredText("resume"),
  search: z.object(
    {
      keyword: requiredText("search.keyword"),
      city: requiredText("search.city"),
      distance: z.number().nonnegative().default(10),
      period: z.string().default("Past 24 hours"),
    },
    { required_error: "Missing 'search' section" }
  ),
  max_page: z.number().int().positive().default(8),
  company_list: z.array(z.string()).default([]),
  company_file: z.string().optional(),
  repost: z.boolean().default(false),
  salary: z.boolean().default(false),
  job_type: z.string().optional(),
  current_salary: z.string().optional(),
  match_threshold: z.number().min(0).max(100).default(80),
  max_description_tokens: z.number().int().positive().default(10_000),
  options: z
    .object({
      headless: z.boolean().default(false),
      tracing: z.boolean().default(false),
      trace_path: z.string().default("trace.json"),
    })
    .default({}),
});

function formatIssues(issues: z.ZodIssue[]): string {
  return issues
    .map((issue) => {
      const path = issue.path.join(".");
      return issue.message.includes("'") || !path ? issue.message : `${path}: ${issue.message}`;
    })
    .join("; ");
}

/**
 * Validate a parsed config document and map it to run parameters.
 * Throws ConfigurationError naming every offending field.
 */
export function parseConfig(raw: unknown): RunParams {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(result.error.issues)}`);
  }

  const c = result.data;
  return {
    userName: c.user_name,
    resume: c.resume,
    search: { ...c.search },
    maxPage: c.max_page,
    companyList: c.company_list.map((name) => name.trim()).filter(Boolean),
    companyFile: c.company_file ?? null,
    repost: c.repost,
    salary: c.salary,
    jobType: c.job_type ?? null,
    currentSalary: c.current_salary ?? null,
    matchThreshold: c.match_threshold,
    maxDescriptionTokens: c.max_description_tokens,
    headless: c.options.headless,
    tracing: c.options.tracing,
    tracePath: c.options.trace_path,
  };
}

export function loadConfig(path: string, logger: Logger): RunParams {
  if (!existsSync(path)) {
    throw new ConfigurationError(`Config file not found: ${path}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(
      `Error parsing config file ${path}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  logger.info(`Loading configuration from: ${path}`);
  const params = parseConfig(raw);

  if (params.companyFile) {
    const fromFile = loadCompanyFile(params.companyFile, logger);
    params.companyList = [...new Set([...params.companyList, ...fromFile])];
  }

  return params;
}

/**
 * Read an allow-list of companies from a CSV with a "Company" column.
 * A missing or unreadable file leaves the list empty.
 */
export function loadCompanyFile(path: string, logger: Logger): string[] {
  try {
    const rows = parseCSV(readFileSync(path, "utf-8"));
    const names = rows.map((row) => (row["Company"] ?? "").trim()).filter(Boolean);
    logger.info(`Loaded ${names.length} companies from ${path}`);
    return names;
  } catch {
    logger.warn(`Could not read company file ${path}, ignoring it`);
    return [];
  }
}
