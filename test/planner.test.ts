import { describe, expect, test } from "vitest";
import { INCOMPLETE_RESPONSE, runPlanner } from "../orchestrator/planner";
import type { StageContext } from "../orchestrator/stages";
import { WEATHER_NO_LOCATION, createTurnState, type TurnInput } from "../orchestrator/state";
import { resolveOrchestratorConfig, type OrchestratorConfigInput } from "../utils/config";
import {
  KNOWLEDGE,
  fakeCapabilities,
  intentLlm,
  silentLogger,
  type FakeCapabilities,
} from "./fakes";
import type { LlmClient } from "../utils/callLlm";

function context(
  capabilities: FakeCapabilities,
  llm?: LlmClient,
  config: OrchestratorConfigInput = {},
): StageContext {
  return {
    capabilities,
    llm,
    logger: silentLogger,
    config: resolveOrchestratorConfig({ webSearchDelayMs: 0, ...config }),
  };
}

function turn(input: TurnInput) {
  return createTurnState("t-plan", "dynamic_planner", input);
}

describe("runPlanner", () => {
  test("diagnoses a photographed plant with research in parallel", async () => {
    const caps = fakeCapabilities();
    const s = turn({ query: "My monstera has yellow spots", image: "aGVsbG8=" });
    await runPlanner(s, context(caps, intentLlm("disease_diagnosis")));

    const record = s.planning;
    expect(record?.intent).toBe("disease_diagnosis");
    expect(record?.plans[0]?.strategy).toBe("parallel");
    expect(record?.runs.map((r) => `${r.capability}:${r.status}`).sort()).toEqual([
      "detect_disease:ok",
      "identify:ok",
      "search_knowledge:ok",
      "search_web:ok",
      "synthesize_advice:ok",
    ]);
    expect(record?.runs[0]?.capability).toBe("identify");
    expect(record?.runs[4]?.capability).toBe("synthesize_advice");
    expect(record?.completeness?.complete).toBe(true);
    expect(record?.completeness?.coverage).toBe(1);

    const advice = caps.synthesize_advice.mock.calls[0]?.[0];
    expect(advice?.healthIssues).toEqual([
      { type: "disease", name: "Leaf spot", probability: 0.6 },
    ]);
    expect(advice?.diseaseInfo?.severity).toBe("High");
    expect(s.finalResponse).toBe("Advice for Monstera deliciosa");
    expect(s.provenance?.steps.map((p) => p.name)).toEqual([
      "Plant Identification",
      "Disease Detection",
      "Knowledge Base Search",
      "Web Research",
      "Weather Analysis",
      "Image Analysis",
      "Advice Generation",
    ]);
  });

  test("activates a reserved fallback when its target fails", async () => {
    const caps = fakeCapabilities({
      identify: async () => ({ ok: false, error: "Plant.id error: 503 - busy" }),
    });
    const s = turn({ query: "What plant is this?", image: "aGVsbG8=" });
    await runPlanner(s, context(caps, intentLlm("plant_identification")));

    expect(s.planning?.runs).toEqual([
      { capability: "identify", status: "failed", fallback: false },
      { capability: "search_knowledge", status: "ok", fallback: true },
      { capability: "synthesize_advice", status: "ok", fallback: false },
    ]);
    expect(s.identifiedPlant?.identified).toBe(false);
    expect(s.issues).toContainEqual({
      kind: "capability_unavailable",
      message: "Plant.id error: 503 - busy",
      capability: "identify",
      timedOut: false,
    });
    // identification is the only required field and it is missing
    expect(s.planning?.completeness?.coverage).toBe(0);
    expect(s.planning?.completeness?.complete).toBe(false);
  });

  test("an unidentified plant activates the knowledge search fallback", async () => {
    const caps = fakeCapabilities({
      identify: async () => ({
        ok: true,
        data: {
          identified: false,
          name: "Unknown",
          scientificName: "",
          confidence: 0.5,
          commonNames: [],
        },
      }),
    });
    const s = turn({ query: "What plant is this?", image: "aGVsbG8=" });
    await runPlanner(s, context(caps, intentLlm("plant_identification")));

    expect(s.planning?.runs).toEqual([
      { capability: "identify", status: "ok", fallback: false },
      { capability: "search_knowledge", status: "ok", fallback: true },
      { capability: "synthesize_advice", status: "ok", fallback: false },
    ]);
    expect(caps.synthesize_advice).toHaveBeenCalledTimes(1);
    expect(s.finalResponse).toBe("Advice for Unknown");
  });

  test.each(["care_advice", "general_info"])(
    "%s turns without a location report weather as not provided",
    async (intent) => {
      const caps = fakeCapabilities();
      const s = turn({ query: "How often should I water succulents?" });
      await runPlanner(s, context(caps, intentLlm(intent)));

      expect(caps.get_weather).not.toHaveBeenCalled();
      expect(s.weather).toEqual({ kind: "error", error: WEATHER_NO_LOCATION });
      expect(caps.synthesize_advice.mock.calls[0]?.[0].weather).toEqual({
        kind: "error",
        error: WEATHER_NO_LOCATION,
      });
      const weather = s.provenance?.steps.find((p) => p.key === "weather");
      expect(weather?.status).toBe("skipped");
      expect(weather?.details).toEqual({ reason: WEATHER_NO_LOCATION });
    },
  );

  test("web queries carry the plant named in the question", async () => {
    const caps = fakeCapabilities();
    const s = turn({ query: "How often should I water succulents?" });
    await runPlanner(s, context(caps, intentLlm("care_advice")));

    expect(caps.search_web.mock.calls.map(([input]) => input.query)).toEqual([
      "How often should I water succulents?",
      "Succulents care guide",
      "Succulents growing conditions",
      "how to care for Succulents",
      "Succulents care requirements",
    ]);
  });

  test("substitutes knowledge search for identification without an image", async () => {
    const caps = fakeCapabilities();
    const s = turn({ query: "What plant has heart shaped leaves?" });
    await runPlanner(s, context(caps, intentLlm("plant_identification")));

    expect(caps.identify).not.toHaveBeenCalled();
    expect(s.planning?.runs.map((r) => r.capability)).toEqual([
      "search_knowledge",
      "synthesize_advice",
    ]);
  });

  test("serves unclassified queries with general information", async () => {
    const caps = fakeCapabilities();
    const s = turn({ query: "Tell me about orchids" });
    await runPlanner(s, context(caps));

    expect(s.planning?.intent).toBe("unknown");
    expect(s.planning?.intentConfidence).toBe(0.5);
    expect(s.planning?.plans[0]?.template).toBe("general_info");
    expect(s.issues).toContainEqual({
      kind: "classification_ambiguous",
      message: "no intent classifier configured",
    });
    expect(s.planning?.runs.map((r) => r.capability)).toEqual([
      "search_knowledge",
      "search_web",
      "synthesize_advice",
    ]);
  });

  test("skips synthesis whose precondition is unmet and apologises", async () => {
    const caps = fakeCapabilities({
      search_knowledge: async () => ({ ok: true, data: [] }),
      search_web: async () => ({ ok: false, error: "Tavily error: 429 - slow down" }),
    });
    const s = turn({ query: "Why are the leaves dropping?" });
    await runPlanner(s, context(caps, intentLlm("troubleshooting")));

    expect(caps.synthesize_advice).not.toHaveBeenCalled();
    expect(s.finalResponse).toBe(INCOMPLETE_RESPONSE);
    expect(s.issues).toContainEqual({
      kind: "plan_unsatisfiable",
      message: "synthesize_advice skipped (unmet: has_results)",
      capability: "synthesize_advice",
    });
    expect(s.identifiedPlant?.name).toBe("Unknown");
    expect(s.provenance).toBeDefined();
  });

  test("falls back to web search when knowledge search fails", async () => {
    const caps = fakeCapabilities({
      search_knowledge: async () => ({ ok: false, error: "store offline" }),
    });
    const s = turn({ query: "How often should I water succulents?" });
    await runPlanner(s, context(caps, intentLlm("watering_schedule")));

    expect(s.planning?.runs).toEqual([
      { capability: "search_knowledge", status: "failed", fallback: false },
      { capability: "search_web", status: "ok", fallback: true },
      { capability: "synthesize_advice", status: "ok", fallback: false },
    ]);
    expect(s.webResults.length).toBeGreaterThan(0);
  });

  test("later passes never rerun a capability", async () => {
    const caps = fakeCapabilities({
      identify: async () => ({ ok: false, error: "Plant.id error: 500 - down" }),
    });
    const s = turn({ query: "What plant is this?", image: "aGVsbG8=" });
    await runPlanner(s, context(caps, intentLlm("plant_identification"), { planningPasses: 3 }));

    expect(s.planning?.plans).toHaveLength(2);
    expect(s.planning?.plans[1]?.tasks).toEqual([]);
    expect(caps.identify).toHaveBeenCalledTimes(1);
    expect(caps.synthesize_advice).toHaveBeenCalledTimes(1);
  });

  test("records knowledge results the planner gathered", async () => {
    const caps = fakeCapabilities();
    const s = turn({ query: "Tell me about monstera" });
    await runPlanner(s, context(caps, intentLlm("general_info")));
    expect(s.knowledge).toEqual(KNOWLEDGE);
  });
});
