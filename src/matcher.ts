import { z } from "zod";
import type { LanguageModel } from "./llm.ts";
import type { MatchCache } from "./match-cache.ts";
import { matchCacheKey } from "./match-cache.ts";
import { errorMessage } from "./utils/errors.ts";
import { parseJsonObject } from "./utils/json.ts";
import type { Logger } from "./utils/logger.ts";
import { countTokens } from "./utils/tokens.ts";
import type { JobPosting, MatchResult } from "./utils/types.ts";

export const DEFAULT_MAX_DESCRIPTION_TOKENS = 10_000;
export const DEFAULT_MATCH_THRESHOLD = 80;
export const OVER_TOKEN_LIMIT_REASONING = "exceeded token limit, manual review required";
export const SERVICE_ERROR_REASONING = "service error";
export const NOT_EVALUATED_REASONING = "run stopped before evaluation";

// ── Sentinels ────────────────────────────────────────────────────────

export function overTokenLimitResult(): MatchResult {
  return {
    score: null,
    reasoning: OVER_TOKEN_LIMIT_REASONING,
    missingSkills: [],
    status: "over-token-limit",
  };
}

export function defaultMatchResult(status: "service-error" | "parse-error"): MatchResult {
  return { score: 0, reasoning: SERVICE_ERROR_REASONING, missingSkills: [], status };
}

export function notEvaluatedResult(): MatchResult {
  return { score: null, reasoning: NOT_EVALUATED_REASONING, missingSkills: [], status: "not-evaluated" };
}

export function recommendApply(score: number | null, threshold: number): boolean {
  return score !== null && score >= threshold;
}

// ── Prompt ───────────────────────────────────────────────────────────

export const MATCH_SYSTEM_PROMPT = `You are an elite technical talent acquisition specialist with 20 years of experience.
Analyze the alignment between a candidate's resume and a job description.

### SCORING RUBRIC:
* 90-100: Perfect fit. Candidate meets ALL hard requirements and the seniority level.
* 80-89: Strong match. Only missing minor nice-to-have tools, or a small seniority gap (within 25%).
* 60-79: Moderate match. Core skills match but specific domain knowledge or tools are missing.
* 0-59: Reject. Deal-breakers present (language mismatch, large seniority gap, missing core stack).

### CRITICAL RULES:
* Be skeptical: prioritize verifiable skills and evidence over self-claims and keyword lists.
* Seniority gap: if the candidate's years of experience are significantly below the requirement, the score must be below 60.
* Overqualification: if the candidate is far more senior than the role (e.g. a staff engineer applying to a junior role), subtract 10-20 points.
* Anti-assumption: do not infer unstated expertise (no "React, therefore Redux"). Do not invent experience the resume does not show.
* Ignore protected attributes (name, gender, age, nationality).
* Missing skills: only critical requirements from the job description that are absent from the resume, using the job description's wording. At most 5 items.

### OUTPUT:
Output strictly in JSON. No preamble. No markdown code blocks.
Keys: "match_score" (int 0-100), "reasoning" (2-sentence string), "missing_skills" (list of strings).`;

export interface MatchInput {
  resume: string;
  description: string;
  jobType?: string | null;
  currentSalary?: string | null;
}

export function buildMatchPrompt(input: MatchInput): string {
  const parts = [`RESUME:\n${input.resume}`, `JOB DESCRIPTION:\n${input.description}`];
  if (input.jobType) parts.push(`TARGET JOB TYPE: ${input.jobType}`);
  if (input.currentSalary) parts.push(`CANDIDATE CURRENT SALARY: ${input.currentSalary}`);
  return parts.join("\n\n\n");
}

// ── Reply parsing ────────────────────────────────────────────────────

const matchReplySchema = z.object({
  match_score: z.union([
    z.number(),
    z
      .string()
      .regex(/^\s*\d+(\.\d+)?\s*$/)
      .transform(Number),
  ]),
  reasoning: z.string().default(""),
  missing_skills: z.array(z.union([z.string(), z.number()]).transform(String)).default([]),
});

/** Returns null when the reply holds no usable score. */
export function parseMatchReply(reply: string): MatchResult | null {
  const obj = parseJsonObject(reply);
  if (!obj) return null;

  const parsed = matchReplySchema.safeParse(obj);
  if (!parsed.success) return null;

  const score = Math.min(100, Math.max(0, Math.round(parsed.data.match_score)));
  return {
    score,
    reasoning: parsed.data.reasoning.trim(),
    missingSkills: parsed.data.missing_skills.map((s) => s.trim()).filter(Boolean),
    status: "scored",
  };
}

// ── Single match ─────────────────────────────────────────────────────

export interface MatcherDeps {
  model: LanguageModel;
  logger: Logger;
  maxDescriptionTokens?: number;
}

/**
 * Score one job description against the resume. Never throws: oversized
 * descriptions get the token-limit sentinel without a model call, and
 * failed calls get the local default with a status saying why.
 */
export async function matchResume(input: MatchInput, deps: MatcherDeps): Promise<MatchResult> {
  const ceiling = deps.maxDescriptionTokens ?? DEFAULT_MAX_DESCRIPTION_TOKENS;
  const tokens = countTokens(input.description);
  if (tokens > ceiling) {
    deps.logger.warn(`Job description too long (${tokens} tokens > ${ceiling}), skipping model call`);
    return overTokenLimitResult();
  }

  const startedAt = Date.now();
  let reply: string;
  try {
    reply = await deps.model.complete({
      system: MATCH_SYSTEM_PROMPT,
      prompt: buildMatchPrompt(input),
      temperature: 0.1,
      maxTokens: 600,
    });
  } catch (err) {
    deps.logger.error(`Match request failed: ${errorMessage(err)}`);
    return defaultMatchResult("service-error");
  }

  deps.logger.debug(`Match reply in ${((Date.now() - startedAt) / 1000).toFixed(2)}s`);

  const result = parseMatchReply(reply);
  if (!result) {
    deps.logger.warn("Unparseable match reply", reply.slice(0, 200));
    return defaultMatchResult("parse-error");
  }
  return result;
}

// ── Batch ────────────────────────────────────────────────────────────

export interface MatchBatchOptions {
  resume: string;
  jobType: string | null;
  currentSalary: string | null;
  threshold: number;
  maxDescriptionTokens: number;
  cache: MatchCache | null;
  signal?: AbortSignal;
}

export interface MatchBatchResult<T extends JobPosting> {
  postings: Array<T & { match: MatchResult; recommendApply: boolean }>;
  modelCalls: number;
  cacheHits: number;
  /** Postings the run stopped before reaching; kept with a not-evaluated result. */
  notEvaluated: number;
}

/**
 * Match every posting in order. Once the signal aborts, the remaining
 * postings are still emitted, marked not-evaluated, so they are written
 * and persisted with whatever the earlier stages gathered.
 */
export async function matchPostings<T extends JobPosting>(
  postings: T[],
  model: LanguageModel,
  options: MatchBatchOptions,
  logger: Logger
): Promise<MatchBatchResult<T>> {
  const out: Array<T & { match: MatchResult; recommendApply: boolean }> = [];
  let modelCalls = 0;
  let cacheHits = 0;
  let notEvaluated = 0;

  for (let i = 0; i < postings.length; i++) {
    const posting = postings[i];

    if (options.signal?.aborted) {
      if (notEvaluated++ === 0) {
        logger.warn(`Matching stopped after ${i}/${postings.length} postings`);
      }
      out.push({ ...posting, match: notEvaluatedResult(), recommendApply: false });
      continue;
    }

    const stepLabel = `[${i + 1}/${postings.length}]`;
    const key = matchCacheKey({
      resume: options.resume,
      url: posting.url,
      description: posting.description,
      jobType: options.jobType,
      currentSalary: options.currentSalary,
    });
    let match = options.cache?.get(key);

    if (match) {
      cacheHits++;
      logger.debug(`${stepLabel} Match cache hit: ${posting.title} at ${posting.company}`);
    } else {
      logger.info(`${stepLabel} Matching: ${posting.title} at ${posting.company}`);
      match = await matchResume(
        {
          resume: options.resume,
          description: posting.description,
          jobType: options.jobType,
          currentSalary: options.currentSalary,
        },
        { model, logger, maxDescriptionTokens: options.maxDescriptionTokens }
      );
      if (match.status !== "over-token-limit") modelCalls++;
      options.cache?.set(key, match);
    }

    out.push({ ...posting, match, recommendApply: recommendApply(match.score, options.threshold) });
  }

  options.cache?.save();
  logger.info(
    `Matching: ${out.length - notEvaluated} postings, ${modelCalls} model calls, ${cacheHits} cache hits`
  );
  return { postings: out, modelCalls, cacheHits, notEvaluated };
}
