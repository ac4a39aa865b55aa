import type winston from "winston";
import { z } from "zod";
import type { SemanticStore } from "../store";
import type { LlmClient } from "../utils/callLlm";
import {
  resolveOrchestratorConfig,
  type OrchestratorConfig,
  type OrchestratorConfigInput,
  type Strategy,
} from "../utils/config";
import { genCorrelationId, getLogger } from "../utils/logger";
import type { CapabilityId, CapabilitySet } from "./capabilities";
import { errorMessage, type TurnIssue } from "./errors";
import { persistFeedback, recordFeedback, type FeedbackOutcome } from "./feedback";
import type { HistoryEntry, Intent } from "./intent";
import {
  buildFeedbackFlow,
  buildPipeline,
  type FeedbackWrite,
  type PipelineContext,
} from "./pipeline";
import { runPlanner } from "./planner";
import type { Provenance } from "./provenance";
import { createTurnState, type TurnInput, type TurnState } from "./state";
import type { CompletenessReport } from "./tasks";

export interface OrchestratorOptions {
  capabilities: CapabilitySet;
  store: SemanticStore;
  /** Keyword extraction and intent classification; heuristics without it. */
  llm?: LlmClient;
  config?: OrchestratorConfigInput;
  logger?: winston.Logger;
}

export interface TurnOptions {
  strategy?: Strategy;
  /** Earlier messages, shown to the intent classifier. */
  history?: HistoryEntry[];
  turnId?: string;
  /** Aborting stops the turn before its next step. */
  signal?: AbortSignal;
}

export interface ExecutionSummary {
  totalCapabilities: number;
  successfulCapabilities: number;
  failedCapabilities: CapabilityId[];
  confidenceScores: Partial<Record<CapabilityId, number>>;
}

export interface TurnResult {
  /** False only when the turn hit an unexpected internal error. */
  success: boolean;
  turnId: string;
  strategy: Strategy;
  response: string;
  provenance?: Provenance;
  confidence: number;
  intent?: Intent;
  intentConfidence?: number;
  completeness?: CompletenessReport;
  executionSummary: ExecutionSummary;
  issues: TurnIssue[];
  error?: string;
  state: TurnState;
}

export const FAILURE_RESPONSE =
  "I apologize, but something went wrong while answering your question";

const turnInputSchema = z.object({
  query: z.string().trim().min(1, "query must not be empty"),
  image: z.string().min(1).optional(),
  imageDescription: z.string().optional(),
  location: z.string().optional(),
});

export function executionSummary(state: TurnState): ExecutionSummary {
  const entries = Object.entries(state.invocations);
  return {
    totalCapabilities: entries.length,
    successfulCapabilities: entries.filter(([, inv]) => inv?.status === "ok").length,
    failedCapabilities: [...state.failedCapabilities],
    confidenceScores: { ...state.confidenceScores },
  };
}

/**
 * Entry point for plant-care turns. One instance may serve many concurrent
 * turns: all per-turn data lives in the `TurnState` each call creates.
 */
export class PlantCareOrchestrator {
  readonly config: OrchestratorConfig;
  private readonly capabilities: CapabilitySet;
  private readonly store: SemanticStore;
  private readonly llm?: LlmClient;
  private readonly logger: winston.Logger;

  constructor(options: OrchestratorOptions) {
    this.config = resolveOrchestratorConfig(options.config);
    this.capabilities = options.capabilities;
    this.store = options.store;
    this.llm = options.llm;
    this.logger = options.logger ?? getLogger();
  }

  private context(logger: winston.Logger): PipelineContext {
    return {
      capabilities: this.capabilities,
      store: this.store,
      llm: this.llm,
      config: this.config,
      logger,
    };
  }

  /** Answer one query. Never throws. */
  async handleTurn(input: TurnInput, options: TurnOptions = {}): Promise<TurnResult> {
    const turnId = options.turnId ?? genCorrelationId();
    const strategy = options.strategy ?? this.config.strategy;
    const logger = this.logger.child({ turnId, strategy });
    const state = createTurnState(turnId, strategy, input);
    const started = Date.now();

    try {
      const checked = turnInputSchema.safeParse(input);
      if (!checked.success) {
        throw new Error(checked.error.issues.map((i) => i.message).join("; "));
      }
      const ctx = this.context(logger);
      if (strategy === "fixed_pipeline") {
        await buildPipeline(ctx).run(state, undefined, { signal: options.signal });
      } else {
        await runPlanner(state, ctx, {
          history: options.history,
          signal: options.signal,
        });
      }
      logger.info("turn complete", {
        durationMs: Date.now() - started,
        issues: state.issues.length,
      });
      return this.toResult(state);
    } catch (err) {
      const message = errorMessage(err);
      logger.error("turn failed", { error: message });
      return {
        ...this.toResult(state),
        success: false,
        response: `${FAILURE_RESPONSE}: ${message}`,
        error: message,
      };
    }
  }

  /**
   * Attach a 0–100 score to a finished turn. Scores at or above the
   * feedback threshold write the turn to the semantic store once.
   */
  async submitFeedback(
    turn: TurnResult | TurnState,
    score: number,
    comments = "",
  ): Promise<FeedbackOutcome> {
    const state = "state" in turn ? turn.state : turn;
    recordFeedback(state, score, comments);

    const logger = this.logger.child({ turnId: state.turnId, strategy: state.strategy });
    let stored: boolean;
    if (state.strategy === "fixed_pipeline") {
      const write: FeedbackWrite = { stored: false };
      await buildFeedbackFlow(this.context(logger), write).run(state);
      stored = write.stored;
    } else {
      stored = await persistFeedback(state, this.store, this.config, logger);
    }

    return {
      score,
      accepted: score >= this.config.feedbackThreshold,
      stored,
    };
  }

  private toResult(state: TurnState): TurnResult {
    const planning = state.planning;
    return {
      success: true,
      turnId: state.turnId,
      strategy: state.strategy,
      response: state.finalResponse ?? "",
      provenance: state.provenance,
      confidence: state.confidence,
      intent: planning?.intent,
      intentConfidence: planning?.intentConfidence,
      completeness: planning?.completeness,
      executionSummary: executionSummary(state),
      issues: [...state.issues],
      error: state.errorMessage,
      state,
    };
  }
}
