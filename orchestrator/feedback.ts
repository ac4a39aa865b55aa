import type winston from "winston";
import { z } from "zod";
import type { FlatMetadata, SemanticStore } from "../store";
import type { OrchestratorConfig } from "../utils/config";
import { errorMessage } from "./errors";
import { effectivePlantName, recordError, type TurnState } from "./state";

export const feedbackScoreSchema = z.number().int().min(0).max(100);

/** Raised for feedback scores outside 0–100. */
export class FeedbackError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FeedbackError";
  }
}

export interface FeedbackOutcome {
  score: number;
  /** Score cleared the threshold. */
  accepted: boolean;
  /** A document was appended to the store by this call. */
  stored: boolean;
}

export interface FeedbackDocument {
  text: string;
  metadata: FlatMetadata;
}

/** Cut `text` to at most `max` characters, marking the cut with "...". */
export function truncate(text: string, max: number): string {
  if (text.length <= max) return text;
  return `${text.slice(0, Math.max(0, max - 3))}...`;
}

/** Validate and record a score on the turn. */
export function recordFeedback(state: TurnState, score: number, comments = ""): void {
  const parsed = feedbackScoreSchema.safeParse(score);
  if (!parsed.success) {
    throw new FeedbackError(
      `Feedback score must be an integer between 0 and 100, got ${score}`,
    );
  }
  state.feedbackScore = parsed.data;
  state.feedbackComments = comments;
}

/**
 * Condense a turn into one store document. Free text is truncated and the
 * provenance details are stringified so the metadata stays flat.
 */
export function buildFeedbackDocument(
  state: TurnState,
  config: OrchestratorConfig,
): FeedbackDocument {
  const limits = config.truncation;
  const plant = effectivePlantName(state);
  const query = truncate(state.input.query, limits.query);
  const response = truncate(state.finalResponse ?? "", limits.response);

  return {
    text: `Plant: ${plant}\nQuery: ${query}\nAdvice: ${response}`,
    metadata: {
      plant_name: plant,
      query,
      response,
      sources: (state.provenance?.summary ?? []).join(" | "),
      sources_details: truncate(
        JSON.stringify(state.provenance?.details ?? {}),
        limits.details,
      ),
      feedback_score: state.feedbackScore ?? null,
      feedback_comments: truncate(state.feedbackComments ?? "", limits.comments),
      source: "user_feedback",
      type: "feedback_learning",
      turn_id: state.turnId,
      strategy: state.strategy,
    },
  };
}

/**
 * Append the turn to the store when its score clears the threshold. At most
 * one write per turn: the write is claimed on `storeUpdated` before the
 * append is awaited and released again if the append fails. Returns whether
 * this call wrote.
 */
export async function persistFeedback(
  state: TurnState,
  store: SemanticStore,
  config: OrchestratorConfig,
  logger: winston.Logger,
): Promise<boolean> {
  const score = state.feedbackScore;
  if (score === undefined || score < config.feedbackThreshold) return false;
  if (state.storeUpdated) return false;

  const doc = buildFeedbackDocument(state, config);
  state.storeUpdated = true;
  try {
    const ok = await store.append(doc.text, doc.metadata);
    if (!ok) {
      state.storeUpdated = false;
      recordError(state, "knowledge update rejected by store");
      return false;
    }
  } catch (err) {
    state.storeUpdated = false;
    logger.warn("knowledge update failed", { error: errorMessage(err) });
    recordError(state, `knowledge update failed: ${errorMessage(err)}`);
    return false;
  }

  logger.info("knowledge store updated from feedback", { score });
  return true;
}
