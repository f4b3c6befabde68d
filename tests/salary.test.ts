import { describe, it, expect } from "vitest";
import { normalizeSalaries, normalizeSalary, parseSalaryReply } from "../src/salary.ts";
import { ServiceUnavailableError } from "../src/utils/errors.ts";
import { ScriptedModel, makePosting, silentLogger } from "./helpers.ts";

describe("normalizeSalary", () => {
  it.each(["", "   ", "\n\t"])("returns N/A for blank input %j without calling the model", async (raw) => {
    const model = new ScriptedModel([]);
    expect(await normalizeSalary(raw, model, silentLogger)).toEqual({ min: 0, max: 0, currency: "N/A" });
    expect(model.requests).toHaveLength(0);
  });

  it("issues one deterministic request and reads the range", async () => {
    const model = new ScriptedModel(['{"min": 100000, "max": 150000, "currency": "CAD"}']);

    const range = await normalizeSalary("$100k - $150k", model, silentLogger);

    expect(range).toEqual({ min: 100000, max: 150000, currency: "CAD" });
    expect(model.requests).toHaveLength(1);
    expect(model.requests[0].temperature).toBe(0);
    expect(model.requests[0].prompt).toContain('"$100k - $150k"');
  });

  it("returns the Error sentinel when the service fails", async () => {
    const model = new ScriptedModel([new ServiceUnavailableError("model", "connection reset")]);
    expect(await normalizeSalary("$50/hr", model, silentLogger)).toEqual({
      min: 0,
      max: 0,
      currency: "Error",
    });
  });

  it("returns the ParseError sentinel for an unreadable reply", async () => {
    const model = new ScriptedModel(["I could not find a salary."]);
    expect(await normalizeSalary("Competitive", model, silentLogger)).toEqual({
      min: 0,
      max: 0,
      currency: "ParseError",
    });
  });
});

describe("parseSalaryReply", () => {
  it("finds an embedded object inside prose and code fences", () => {
    const reply = 'Sure! Here is the result:\n```json\n{"min": "90000", "max": 120000}\n```';
    expect(parseSalaryReply(reply)).toEqual({ min: 90000, max: 120000, currency: "CAD" });
  });

  it("keeps the reply when a braced note follows it", () => {
    const reply = 'Result: {"min":100000,"max":120000,"currency":"CAD"}\nNote: {assumed annual}';
    expect(parseSalaryReply(reply)).toEqual({ min: 100000, max: 120000, currency: "CAD" });
  });

  it("puts a reversed range back in order", () => {
    expect(parseSalaryReply('{"min": 150000, "max": 100000, "currency": "USD"}')).toEqual({
      min: 100000,
      max: 150000,
      currency: "USD",
    });
  });

  it("rounds and clamps amounts at zero", () => {
    expect(parseSalaryReply('{"min": -5, "max": 1000.6, "currency": "CAD"}')).toEqual({
      min: 0,
      max: 1001,
      currency: "CAD",
    });
  });

  it("rejects non-numeric amounts", () => {
    expect(parseSalaryReply('{"min": "lots", "max": 1}').currency).toBe("ParseError");
  });

  it("rejects a JSON array", () => {
    expect(parseSalaryReply("[1, 2]").currency).toBe("ParseError");
  });
});

describe("normalizeSalaries", () => {
  it("only calls the model for postings with salary text", async () => {
    const model = new ScriptedModel([
      '{"min": 0, "max": 100000, "currency": "CAD"}',
      '{"min": 180000, "max": 180000, "currency": "CAD"}',
    ]);
    const postings = [
      makePosting({ url: "https://x.test/1", salaryRaw: "" }),
      makePosting({ url: "https://x.test/2", salaryRaw: "Up to $100k" }),
      makePosting({ url: "https://x.test/3", salaryRaw: "$90/hr" }),
    ];

    const result = await normalizeSalaries(postings, model, silentLogger);

    expect(result.modelCalls).toBe(2);
    expect(result.postings.map((p) => p.salary)).toEqual([
      { min: 0, max: 0, currency: "N/A" },
      { min: 0, max: 100000, currency: "CAD" },
      { min: 180000, max: 180000, currency: "CAD" },
    ]);
    expect(result.postings[1].url).toBe("https://x.test/2");
  });

  it("keeps unreached postings unevaluated once aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const model = new ScriptedModel([]);

    const result = await normalizeSalaries([makePosting({ salaryRaw: "$1" })], model, silentLogger, controller.signal);

    expect(result.postings.map((p) => p.salary)).toEqual([{ min: 0, max: 0, currency: "NotEvaluated" }]);
    expect(result.modelCalls).toBe(0);
    expect(model.requests).toHaveLength(0);
  });
});
