export { withStepLogging } from "./withStepLogging";
export { withCurrentStep } from "./withCurrentStep";

export type { StepTracking } from "./withCurrentStep";
