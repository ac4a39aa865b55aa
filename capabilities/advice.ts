import type { AdviceContext, CapabilityFn } from "../orchestrator/capabilities";
import { errorMessage } from "../orchestrator/errors";
import type { LlmClient } from "../utils/callLlm";

const NONE = "None available.";

function plantSection(ctx: AdviceContext): string {
  const { plant } = ctx;
  if (!plant.identified) return `Not identified from an image. Working name: ${plant.name}.`;
  const pct = (plant.confidence * 100).toFixed(1);
  return `${plant.name} (${plant.scientificName || "scientific name unknown"}), confidence ${pct}%.`;
}

function healthSection(ctx: AdviceContext): string {
  const lines = ctx.healthIssues.map(
    (h) => `- ${h.type}: ${h.name} (${(h.probability * 100).toFixed(0)}%)`,
  );
  if (ctx.diseaseInfo) {
    lines.unshift(
      `Severity ${ctx.diseaseInfo.severity}, health score ${ctx.diseaseInfo.healthScore}.`,
    );
  }
  return lines.length > 0 ? lines.join("\n") : "No health issues reported.";
}

function weatherSection(ctx: AdviceContext): string {
  const w = ctx.weather;
  if (!w) return NONE;
  if (w.kind === "error") return w.error;
  return `${ctx.location ?? "Local"}: ${w.temperature}°C, ${w.humidity}% humidity, ${w.description}.`;
}

/** Assemble the system prompt from everything the turn gathered. */
export function buildAdvicePrompt(ctx: AdviceContext): { system: string; user: string } {
  const knowledge = ctx.knowledge.map((k) => `- ${k.content}`).join("\n") || NONE;
  const web =
    ctx.webResults.map((w) => `- ${w.title} (${w.url}): ${w.snippet}`).join("\n") || NONE;
  const visual = ctx.image
    ? ctx.image.description ?? "The user attached a photo of the plant."
    : "No image provided.";

  const system = [
    `You are a friendly, knowledgeable plant care expert advising on ${ctx.plant.name}.`,
    "Answer conversationally and practically, using only the research below where it applies.",
    "",
    `Plant identification:\n${plantSection(ctx)}`,
    `Knowledge base research:\n${knowledge}`,
    `Web research:\n${web}`,
    `Health assessment:\n${healthSection(ctx)}`,
    `Current weather:\n${weatherSection(ctx)}`,
    `Visual analysis:\n${visual}`,
    "",
    "Cover watering, light and placement, soil and nutrition, environment, problem prevention,",
    "immediate actions and ongoing care, as far as they bear on the question.",
  ].join("\n");

  const user = `Please provide care advice for ${ctx.plant.name}. Specific question: ${ctx.query}`;
  return { system, user };
}

export interface AdviceOptions {
  llm?: LlmClient;
  temperature?: number;
  maxTokens?: number;
}

export function createAdviceSynthesizer(options: AdviceOptions): CapabilityFn<"synthesize_advice"> {
  return async (ctx) => {
    if (!options.llm) return { ok: false, error: "No language model configured" };
    const { system, user } = buildAdvicePrompt(ctx);
    try {
      const text = await options.llm.complete(user, {
        system,
        temperature: options.temperature ?? 0.7,
        maxTokens: options.maxTokens ?? 1_500,
      });
      return { ok: true, data: text.trim() };
    } catch (err) {
      return { ok: false, error: `Advice generation failed: ${errorMessage(err)}` };
    }
  };
}
