// ---------------------------------------------------------------------------
// Flow engine — error classes
// ---------------------------------------------------------------------------

/** Wraps step failures with context about which step failed. */
export class FlowError extends Error {
  readonly step: string;
  override readonly cause: unknown;

  constructor(step: string, cause: unknown) {
    super(
      `Flow failed at ${step}: ${cause instanceof Error ? cause.message : String(cause)}`,
    );
    this.name = "FlowError";
    this.step = step;
    this.cause = cause;
  }
}

/** Raised by `withTimeout` when the wrapped work outlives its budget. */
export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(what: string, timeoutMs: number) {
    super(`${what} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}
