import type winston from "winston";
import type { FlowHooks, FlowParams, StepMeta } from "../../src";

function stepName(meta: StepMeta): string {
  return meta.label ?? `${meta.type}#${meta.index}`;
}

/**
 * Logs the start, end and duration of every step at `debug`, and step
 * failures at `warn`. Failures inside a settled parallel step carry
 * `fnIndex`.
 */
export function withStepLogging<S, P extends FlowParams = FlowParams>(
  logger: winston.Logger,
): FlowHooks<S, P> {
  const starts = new Map<number, number>();
  return {
    beforeStep: (meta) => {
      starts.set(meta.index, Date.now());
      logger.debug("step started", { step: stepName(meta) });
    },
    afterStep: (meta) => {
      const start = starts.get(meta.index) ?? Date.now();
      starts.delete(meta.index);
      logger.debug("step finished", {
        step: stepName(meta),
        durationMs: Date.now() - start,
      });
    },
    onError: (meta, error) => {
      logger.warn("step failed", {
        step: stepName(meta),
        fnIndex: meta.fnIndex,
        error: error instanceof Error ? error.message : String(error),
      });
    },
  };
}
