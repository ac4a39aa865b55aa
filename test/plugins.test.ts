import { describe, expect, test } from "vitest";
import { z } from "zod";
import { FlowBuilder } from "../src";
import { parseJsonOutput, withRateLimit, withStepLogging } from "../plugins";
import { capturingLogger, flush } from "./fakes";

// ─────────────────────────────────────────────────────────────────────────────
// withRateLimit
// ─────────────────────────────────────────────────────────────────────────────

describe("withRateLimit", () => {
  test("spaces consecutive steps by at least intervalMs", async () => {
    const starts: number[] = [];
    const flow = new FlowBuilder().use(withRateLimit({ intervalMs: 30 }));
    for (let i = 0; i < 3; i++) {
      flow.then(() => {
        starts.push(Date.now());
      });
    }
    await flow.run({});
    expect(starts).toHaveLength(3);
    for (let i = 1; i < starts.length; i++) {
      expect((starts[i] ?? 0) - (starts[i - 1] ?? 0)).toBeGreaterThanOrEqual(25);
    }
  });

  test("does not delay the first step of a run", async () => {
    const flow = new FlowBuilder().use(withRateLimit({ intervalMs: 200 })).then(() => {});
    await flow.run({});
    const started = Date.now();
    await flow.run({});
    expect(Date.now() - started).toBeLessThan(150);
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// withStepLogging
// ─────────────────────────────────────────────────────────────────────────────

describe("withStepLogging", () => {
  test("logs start and finish of each labelled step at debug", async () => {
    const { logger, entries } = capturingLogger();
    await new FlowBuilder()
      .use(withStepLogging(logger))
      .then(() => {}, { label: "identify" })
      .run({});
    await flush();
    expect(entries.map((e) => [e.level, e.message, e.step])).toEqual([
      ["debug", "step started", "identify"],
      ["debug", "step finished", "identify"],
    ]);
    expect(typeof entries[1]?.durationMs).toBe("number");
  });

  test("logs settled parallel failures at warn with their position", async () => {
    const { logger, entries } = capturingLogger();
    await new FlowBuilder()
      .use(withStepLogging(logger))
      .parallel(
        [
          () => {},
          () => {
            throw new Error("tavily down");
          },
        ],
        { settle: true, label: "research" },
      )
      .run({});
    await flush();
    const failure = entries.find((e) => e.level === "warn");
    expect(failure).toMatchObject({
      message: "step failed",
      step: "research",
      fnIndex: 1,
      error: "tavily down",
    });
  });

  test("unlabelled steps are named by type and index", async () => {
    const { logger, entries } = capturingLogger();
    await new FlowBuilder()
      .use(withStepLogging(logger))
      .branch(() => undefined, {})
      .run({});
    await flush();
    expect(entries[0]?.step).toBe("branch#0");
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// parseJsonOutput
// ─────────────────────────────────────────────────────────────────────────────

describe("parseJsonOutput", () => {
  test("parses raw JSON", () => {
    expect(parseJsonOutput('{"intent":"care_advice"}')).toEqual({ intent: "care_advice" });
  });

  test("parses JSON inside a markdown fence", () => {
    const text = 'Here you go:\n```json\n{"confidence": 0.8}\n```\nDone.';
    expect(parseJsonOutput(text)).toEqual({ confidence: 0.8 });
  });

  test("extracts the outermost object from surrounding prose", () => {
    const text = 'Sure! {"a": {"b": 1}} Hope that helps.';
    expect(parseJsonOutput(text)).toEqual({ a: { b: 1 } });
  });

  test("extracts an array", () => {
    expect(parseJsonOutput('keywords: ["water", "light"]')).toEqual(["water", "light"]);
  });

  test("validates through a schema", () => {
    const schema = z.object({ intent: z.string(), confidence: z.number() });
    const parsed = parseJsonOutput('{"intent":"seasonal_care","confidence":0.7}', schema);
    expect(parsed.intent).toBe("seasonal_care");
    expect(() => parseJsonOutput('{"intent":3}', schema)).toThrow();
  });

  test("throws when no JSON can be found", () => {
    expect(() => parseJsonOutput("no json here")).toThrow(
      "parseJsonOutput: could not extract valid JSON from input",
    );
  });
});
