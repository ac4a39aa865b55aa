import type { CapabilityId } from "./capabilities";

/** Closed taxonomy of problems a turn can record without aborting. */
export type IssueKind =
  | "capability_unavailable"
  | "synthesis_failure"
  | "classification_ambiguous"
  | "plan_unsatisfiable";

export interface TurnIssue {
  kind: IssueKind;
  message: string;
  capability?: CapabilityId;
  timedOut?: boolean;
}

/** A capability could not be reached, timed out, or returned `ok: false`. */
export class CapabilityError extends Error {
  readonly kind = "capability_unavailable" as const;
  readonly capability: CapabilityId;
  readonly timedOut: boolean;

  constructor(capability: CapabilityId, message: string, timedOut = false) {
    super(message);
    this.name = "CapabilityError";
    this.capability = capability;
    this.timedOut = timedOut;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
