import { CAPABILITY_IDS, type CapabilityId } from "./capabilities";
import type { FeedbackOutcome } from "./feedback";
import type { HistoryEntry, Intent } from "./intent";
import type {
  PlantCareOrchestrator,
  TurnOptions,
  TurnResult,
} from "./orchestrator";
import type { TurnInput } from "./state";

export interface ConversationMessage {
  role: "user" | "assistant";
  content: string;
  timestamp: Date;
  intent?: Intent;
  capabilitiesUsed?: CapabilityId[];
  completeness?: number;
  feedback?: { score: number; comments: string };
  turn?: TurnResult;
}

export interface SessionStats {
  totalQueries: number;
  totalResponses: number;
  /** Mean planner completeness over answered turns; 0 when none reported one. */
  averageCompleteness: number;
  capabilityUsage: Partial<Record<CapabilityId, number>>;
}

/**
 * A conversation across turns. History feeds the intent classifier;
 * feedback is addressed by message index.
 */
export class ConversationSession {
  private readonly messages: ConversationMessage[] = [];

  constructor(
    private readonly orchestrator: PlantCareOrchestrator,
    private readonly options: Omit<TurnOptions, "history" | "turnId"> = {},
  ) {}

  get history(): readonly ConversationMessage[] {
    return this.messages;
  }

  async ask(input: TurnInput): Promise<TurnResult> {
    const history: HistoryEntry[] = this.messages.map((m) => ({
      role: m.role,
      content: m.content,
    }));
    this.messages.push({ role: "user", content: input.query, timestamp: new Date() });

    const turn = await this.orchestrator.handleTurn(input, { ...this.options, history });
    this.messages.push({
      role: "assistant",
      content: turn.response,
      timestamp: new Date(),
      intent: turn.intent,
      capabilitiesUsed: CAPABILITY_IDS.filter((id) => turn.state.invocations[id]),
      completeness: turn.completeness?.score,
      turn,
    });
    return turn;
  }

  /** Score the assistant message at `index`. */
  async feedback(index: number, score: number, comments = ""): Promise<FeedbackOutcome> {
    const message = this.messages[index];
    if (!message?.turn) {
      throw new RangeError(`No assistant message at index ${index}`);
    }
    const outcome = await this.orchestrator.submitFeedback(message.turn, score, comments);
    message.feedback = { score, comments };
    return outcome;
  }

  stats(): SessionStats {
    const answers = this.messages.filter((m) => m.role === "assistant");
    const scores = answers.flatMap((m) =>
      m.completeness === undefined ? [] : [m.completeness],
    );
    const usage: Partial<Record<CapabilityId, number>> = {};
    for (const m of answers) {
      for (const id of m.capabilitiesUsed ?? []) usage[id] = (usage[id] ?? 0) + 1;
    }
    return {
      totalQueries: this.messages.length - answers.length,
      totalResponses: answers.length,
      averageCompleteness: scores.length
        ? scores.reduce((a, b) => a + b, 0) / scores.length
        : 0,
      capabilityUsage: usage,
    };
  }

  clear(): void {
    this.messages.length = 0;
  }
}
