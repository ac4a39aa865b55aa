import { describe, expect, test } from "vitest";
import { analyzeKeywords, detectPlantName, heuristicKeywords } from "../orchestrator/keywords";
import { ScriptedLlm, silentLogger } from "./fakes";

describe("detectPlantName", () => {
  test("maps a common name to its canonical name", () => {
    expect(detectPlantName("Any tips for my snake plant?")).toBe("Sansevieria trifasciata");
    expect(detectPlantName("Is a pothos ok in a bathroom")).toBe("Epipremnum aureum");
  });

  test("prefers the longest matching alias", () => {
    expect(detectPlantName("my boston fern is shedding")).toBe("Nephrolepis exaltata");
    expect(detectPlantName("my fern is shedding")).toBe("Polypodiopsida");
  });

  test("matches whole words only", () => {
    expect(detectPlantName("roselle tea")).toBeUndefined();
  });

  test("returns undefined when no known plant is named", () => {
    expect(detectPlantName("why is my plant sad")).toBeUndefined();
  });
});

describe("heuristicKeywords", () => {
  test("extracts symptom keywords and the named plant", () => {
    expect(heuristicKeywords("My monstera has yellow leaves")).toEqual({
      optimizedQuery: "monstera yellow leaves",
      primaryKeywords: ["yellow"],
      secondaryKeywords: ["monstera", "leaves"],
      careCategories: ["symptoms"],
      plantName: "Monstera deliciosa",
      source: "heuristic",
    });
  });

  test("drops stop words and categorises care terms", () => {
    expect(heuristicKeywords("How often should I water succulents?")).toEqual({
      optimizedQuery: "water succulents",
      primaryKeywords: ["water"],
      secondaryKeywords: ["succulents"],
      careCategories: ["watering"],
      plantName: "Succulents",
      source: "heuristic",
    });
  });

  test("falls back to non-care words when no care term appears", () => {
    const k = heuristicKeywords("tell me about orchids");
    expect(k.primaryKeywords).toEqual(["orchids"]);
    expect(k.careCategories).toEqual([]);
    expect(k.plantName).toBe("Orchidaceae");
  });

  test("keeps the raw query when every word is a stop word", () => {
    const k = heuristicKeywords("  how do I?  ");
    expect(k.optimizedQuery).toBe("how do I?");
    expect(k.primaryKeywords).toEqual([]);
  });
});

describe("analyzeKeywords", () => {
  test("uses the language model's analysis when it parses", async () => {
    const llm = new ScriptedLlm(() =>
      JSON.stringify({
        optimized_query: "monstera yellow leaves overwatering",
        primary_keywords: ["yellow leaves", "overwatering", "monstera", "drainage"],
        secondary_keywords: ["soil"],
        care_categories: ["watering", "symptoms"],
        plant_name: null,
      }),
    );
    const k = await analyzeKeywords("My monstera has yellow leaves", "Unknown", {
      llm,
      logger: silentLogger,
    });
    expect(k).toEqual({
      optimizedQuery: "monstera yellow leaves overwatering",
      primaryKeywords: ["yellow leaves", "overwatering", "monstera"],
      secondaryKeywords: ["soil"],
      careCategories: ["watering", "symptoms"],
      plantName: "Monstera deliciosa",
      source: "llm",
    });
    expect(llm.calls[0]?.prompt).toContain("Identified plant: Unknown");
  });

  test("falls back to heuristics on malformed output", async () => {
    const llm = new ScriptedLlm(() => "Sure, the keywords are water and light.");
    const k = await analyzeKeywords("water succulents", "Unknown", { llm, logger: silentLogger });
    expect(k.source).toBe("heuristic");
    expect(k.optimizedQuery).toBe("water succulents");
  });

  test("falls back to heuristics when the call fails", async () => {
    const llm = new ScriptedLlm(() => {
      throw new Error("rate limited");
    });
    const k = await analyzeKeywords("water succulents", "Unknown", { llm, logger: silentLogger });
    expect(k.source).toBe("heuristic");
  });

  test("uses heuristics without a language model", async () => {
    const k = await analyzeKeywords("water succulents", "Unknown", { logger: silentLogger });
    expect(k).toEqual(heuristicKeywords("water succulents"));
  });
});
