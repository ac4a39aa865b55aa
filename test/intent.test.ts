import { describe, expect, test } from "vitest";
import { classifyIntent, isIntent, type IntentRequest } from "../orchestrator/intent";
import { ScriptedLlm, silentLogger } from "./fakes";

const request: IntentRequest = {
  query: "My plant has yellow leaves",
  hasImage: true,
  hasLocation: false,
};

function replying(text: string): ScriptedLlm {
  return new ScriptedLlm(() => text);
}

const opts = (llm?: ScriptedLlm) => ({ llm, minConfidence: 0.4, logger: silentLogger });

describe("classifyIntent", () => {
  test("returns the classified intent and confidence", async () => {
    const llm = replying('{"intent": "Disease_Diagnosis", "confidence": 0.85}');
    expect(await classifyIntent(request, opts(llm))).toEqual({
      intent: "disease_diagnosis",
      confidence: 0.85,
    });
  });

  test("sends the query, input flags and recent history", async () => {
    const llm = replying('{"intent": "care_advice", "confidence": 0.9}');
    await classifyIntent(
      {
        ...request,
        history: [
          { role: "user", content: "first" },
          { role: "assistant", content: "second" },
          { role: "user", content: "third" },
          { role: "assistant", content: "fourth" },
          { role: "user", content: "fifth" },
        ],
      },
      opts(llm),
    );
    const prompt = llm.calls[0]?.prompt ?? "";
    expect(prompt).toContain('Query: "My plant has yellow leaves"');
    expect(prompt).toContain("Has image: true");
    expect(prompt).toContain("Location provided: false");
    expect(prompt).not.toContain("first");
    expect(prompt).toContain("user: fifth");
  });

  test("is unknown at 0.5 without a classifier", async () => {
    expect(await classifyIntent(request, opts())).toEqual({
      intent: "unknown",
      confidence: 0.5,
      ambiguity: "no intent classifier configured",
    });
  });

  test("is unknown at 0.5 when the classifier fails", async () => {
    const llm = new ScriptedLlm(() => {
      throw new Error("rate limited");
    });
    expect(await classifyIntent(request, opts(llm))).toEqual({
      intent: "unknown",
      confidence: 0.5,
      ambiguity: "classifier failed: rate limited",
    });
  });

  test("is unknown at 0.5 when the answer is not JSON", async () => {
    const result = await classifyIntent(request, opts(replying("probably care advice")));
    expect(result).toEqual({
      intent: "unknown",
      confidence: 0.5,
      ambiguity: "classifier output unparseable",
    });
  });

  test("discards labels outside the closed set", async () => {
    const result = await classifyIntent(
      request,
      opts(replying('{"intent": "pruning", "confidence": 0.9}')),
    );
    expect(result).toEqual({
      intent: "unknown",
      confidence: 0.9,
      ambiguity: 'unrecognised intent "pruning"',
    });
  });

  test("demotes low-confidence answers to unknown", async () => {
    const result = await classifyIntent(
      request,
      opts(replying('{"intent": "care_advice", "confidence": 0.3}')),
    );
    expect(result).toEqual({
      intent: "unknown",
      confidence: 0.3,
      ambiguity: "low confidence 0.3 for care_advice",
    });
  });

  test("coerces numeric strings and defaults unreadable confidence", async () => {
    const numeric = await classifyIntent(
      request,
      opts(replying('{"intent": "seasonal_care", "confidence": "0.7"}')),
    );
    expect(numeric).toEqual({ intent: "seasonal_care", confidence: 0.7 });

    const unreadable = await classifyIntent(
      request,
      opts(replying('{"intent": "seasonal_care", "confidence": "high"}')),
    );
    expect(unreadable).toEqual({ intent: "seasonal_care", confidence: 0.5 });
  });
});

describe("isIntent", () => {
  test("accepts only the closed set", () => {
    expect(isIntent("watering_schedule")).toBe(true);
    expect(isIntent("repotting")).toBe(false);
  });
});
