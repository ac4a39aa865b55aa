import type winston from "winston";
import { z } from "zod";
import { parseJsonOutput } from "../plugins";
import type { LlmClient } from "../utils/callLlm";
import { errorMessage } from "./errors";

export const INTENTS = [
  "plant_identification",
  "disease_diagnosis",
  "care_advice",
  "watering_schedule",
  "general_info",
  "troubleshooting",
  "seasonal_care",
  "unknown",
] as const;

export type Intent = (typeof INTENTS)[number];

export interface IntentResult {
  intent: Intent;
  confidence: number;
  /** Set when the classifier could not be used or its answer was discarded. */
  ambiguity?: string;
}

export interface HistoryEntry {
  role: "user" | "assistant";
  content: string;
}

export interface IntentRequest {
  query: string;
  hasImage: boolean;
  hasLocation: boolean;
  history?: HistoryEntry[];
}

export interface ClassifyOptions {
  llm?: LlmClient;
  minConfidence: number;
  logger: winston.Logger;
}

export const DEFAULT_INTENT: IntentResult = Object.freeze({
  intent: "unknown",
  confidence: 0.5,
});

export function isIntent(value: string): value is Intent {
  return INTENTS.some((i) => i === value);
}

const classifierSchema = z.object({
  intent: z.string(),
  confidence: z.coerce.number().catch(0.5),
});

const SYSTEM_PROMPT = `You classify questions sent to a plant care assistant into one category:
plant_identification - wants a plant identified ("What plant is this?")
disease_diagnosis - reports health problems ("My plant has yellow leaves")
care_advice - general care ("How do I care for roses?")
watering_schedule - watering frequency or amount
general_info - facts about plants ("Tell me about orchids")
troubleshooting - a specific problem ("Why are the leaves dropping?")
seasonal_care - seasonal tasks ("Winter care tips")
unknown - none of the above
Reply with JSON only: {"intent": string, "confidence": number between 0 and 1}`;

function userPrompt(req: IntentRequest): string {
  const lines = [
    `Query: "${req.query}"`,
    `Has image: ${req.hasImage}`,
    `Location provided: ${req.hasLocation}`,
  ];
  const recent = (req.history ?? []).slice(-4);
  if (recent.length > 0) {
    lines.push("Recent conversation:");
    for (const h of recent) lines.push(`${h.role}: ${h.content.slice(0, 200)}`);
  }
  return lines.join("\n");
}

/**
 * Classify a query. Never throws: missing classifier, call failures and
 * malformed answers give `unknown` at 0.5; answers under `minConfidence`
 * become `unknown` with the reported confidence.
 */
export async function classifyIntent(
  req: IntentRequest,
  { llm, minConfidence, logger }: ClassifyOptions,
): Promise<IntentResult> {
  if (!llm) {
    return { ...DEFAULT_INTENT, ambiguity: "no intent classifier configured" };
  }

  let raw: string;
  try {
    raw = await llm.complete(userPrompt(req), {
      system: SYSTEM_PROMPT,
      temperature: 0.1,
      maxTokens: 200,
    });
  } catch (err) {
    logger.warn("intent classifier call failed", { error: errorMessage(err) });
    return { ...DEFAULT_INTENT, ambiguity: `classifier failed: ${errorMessage(err)}` };
  }

  let parsed: z.infer<typeof classifierSchema>;
  try {
    parsed = parseJsonOutput(raw, classifierSchema);
  } catch (err) {
    logger.debug("intent classifier output unparseable", { error: errorMessage(err) });
    return { ...DEFAULT_INTENT, ambiguity: "classifier output unparseable" };
  }

  const label = parsed.intent.trim().toLowerCase();
  const confidence = Math.min(1, Math.max(0, parsed.confidence));
  if (!isIntent(label)) {
    return { intent: "unknown", confidence, ambiguity: `unrecognised intent "${label}"` };
  }
  if (label !== "unknown" && confidence < minConfidence) {
    return {
      intent: "unknown",
      confidence,
      ambiguity: `low confidence ${confidence} for ${label}`,
    };
  }
  return { intent: label, confidence };
}
