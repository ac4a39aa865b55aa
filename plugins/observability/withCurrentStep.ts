import type { FlowHooks, FlowParams } from "../../src";

/** State that can record which labelled step is executing. */
export interface StepTracking {
  currentStep?: string;
}

/** Writes the label of each step to `shared.currentStep` before it runs. */
export function withCurrentStep<
  S extends StepTracking,
  P extends FlowParams = FlowParams,
>(): FlowHooks<S, P> {
  return {
    beforeStep: (meta, shared) => {
      if (meta.label) shared.currentStep = meta.label;
    },
  };
}
