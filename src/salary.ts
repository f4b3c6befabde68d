import { z } from "zod";
import type { LanguageModel } from "./llm.ts";
import { errorMessage } from "./utils/errors.ts";
import { parseJsonObject } from "./utils/json.ts";
import type { Logger } from "./utils/logger.ts";
import type { JobPosting, SalaryRange } from "./utils/types.ts";

export const NO_SALARY: SalaryRange = { min: 0, max: 0, currency: "N/A" };
export const SALARY_ERROR: SalaryRange = { min: 0, max: 0, currency: "Error" };
export const SALARY_PARSE_ERROR: SalaryRange = { min: 0, max: 0, currency: "ParseError" };
export const SALARY_NOT_EVALUATED: SalaryRange = { min: 0, max: 0, currency: "NotEvaluated" };

const amount = z.union([
  z.number(),
  z
    .string()
    .regex(/^\s*\d+(\.\d+)?\s*$/)
    .transform(Number),
]);

const salaryReplySchema = z.object({
  min: amount,
  max: amount,
  currency: z.string().trim().min(1).default("CAD"),
});

export function buildSalaryPrompt(rawText: string): string {
  return `You are a data extraction engine. Extract annual salary details from the text.

### RULES:
1. Standardize to annual: if the text is hourly (e.g. "$60/hr"), multiply by 2000. If monthly, multiply by 12.
2. Ranges: "100k - 150k" -> min=100000, max=150000. "80k+" -> min=80000, max=80000.
3. Single values: if the text says "Up to X", "Max X", or gives one number X, set min to 0 and max to X.
4. Noise: if no specific numbers are found (e.g. "Competitive"), output 0 for both.
5. Currency: "CAD" unless "USD" is explicitly mentioned.

### OUTPUT FORMAT:
Strictly output a JSON object: {"min": <int>, "max": <int>, "currency": "<str>"}

### INPUT TEXT:
"${rawText}"`;
}

function toWhole(n: number): number {
  return Math.max(0, Math.round(n));
}

/**
 * Read the model's reply into a SalaryRange. Unreadable replies map to
 * the ParseError sentinel; a reversed range is put back in order.
 */
export function parseSalaryReply(reply: string): SalaryRange {
  const obj = parseJsonObject(reply);
  if (!obj) return { ...SALARY_PARSE_ERROR };

  const parsed = salaryReplySchema.safeParse(obj);
  if (!parsed.success) return { ...SALARY_PARSE_ERROR };

  let min = toWhole(parsed.data.min);
  let max = toWhole(parsed.data.max);
  if (min > 0 && max > 0 && max < min) {
    [min, max] = [max, min];
  }
  return { min, max, currency: parsed.data.currency };
}

export async function normalizeSalary(
  rawText: string,
  model: LanguageModel,
  logger: Logger
): Promise<SalaryRange> {
  if (rawText.trim() === "") {
    return { ...NO_SALARY };
  }

  let reply: string;
  try {
    reply = await model.complete({
      prompt: buildSalaryPrompt(rawText),
      temperature: 0,
      maxTokens: 100,
    });
  } catch (err) {
    logger.warn(`Error normalizing salary '${rawText}': ${errorMessage(err)}`);
    return { ...SALARY_ERROR };
  }

  const range = parseSalaryReply(reply);
  if (range.currency === SALARY_PARSE_ERROR.currency) {
    logger.warn(`Unparseable salary reply for '${rawText}'`, reply.slice(0, 200));
  }
  return range;
}

// ── Batch ────────────────────────────────────────────────────────────

export interface SalaryBatchResult<T extends JobPosting> {
  postings: Array<T & { salary: SalaryRange }>;
  modelCalls: number;
}

export async function normalizeSalaries<T extends JobPosting>(
  postings: T[],
  model: LanguageModel,
  logger: Logger,
  signal?: AbortSignal
): Promise<SalaryBatchResult<T>> {
  const out: Array<T & { salary: SalaryRange }> = [];
  let modelCalls = 0;
  let notEvaluated = 0;

  for (const posting of postings) {
    if (signal?.aborted) {
      if (notEvaluated++ === 0) {
        logger.warn(`Salary normalization stopped after ${out.length}/${postings.length} postings`);
      }
      // Kept so the rest of the run still reports and persists them
      out.push({ ...posting, salary: { ...SALARY_NOT_EVALUATED } });
      continue;
    }
    if (posting.salaryRaw.trim() !== "") modelCalls++;
    const salary = await normalizeSalary(posting.salaryRaw, model, logger);
    out.push({ ...posting, salary });
  }

  logger.info(`Salary: ${out.length - notEvaluated} postings normalized, ${modelCalls} model calls`);
  return { postings: out, modelCalls };
}
