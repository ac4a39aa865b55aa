export { PlantCareOrchestrator, executionSummary, FAILURE_RESPONSE } from "./orchestrator";
export type {
  ExecutionSummary,
  OrchestratorOptions,
  TurnOptions,
  TurnResult,
} from "./orchestrator";

export { ConversationSession } from "./session";
export type { ConversationMessage, SessionStats } from "./session";

export { CAPABILITY_IDS, callCapability, projectInput } from "./capabilities";
export type {
  AdviceContext,
  CapabilityContracts,
  CapabilityFn,
  CapabilityId,
  CapabilityInput,
  CapabilityOutput,
  CapabilityResult,
  CapabilitySet,
  DetectDiseaseInput,
  GetWeatherInput,
  IdentifyInput,
  SearchKnowledgeInput,
  SearchWebInput,
} from "./capabilities";

export { CapabilityError } from "./errors";
export type { IssueKind, TurnIssue } from "./errors";

export {
  FeedbackError,
  buildFeedbackDocument,
  persistFeedback,
  recordFeedback,
  truncate,
} from "./feedback";
export type { FeedbackDocument, FeedbackOutcome } from "./feedback";

export { INTENTS, classifyIntent } from "./intent";
export type { HistoryEntry, Intent, IntentResult } from "./intent";

export { analyzeKeywords, detectPlantName, heuristicKeywords } from "./keywords";

export { buildFeedbackFlow, buildPipeline } from "./pipeline";
export type { FeedbackWrite } from "./pipeline";
export { INCOMPLETE_RESPONSE, executePlan, runPlanner } from "./planner";
export { buildProvenance } from "./provenance";
export type { Provenance, ProvenanceStep, StepKey, StepStatus } from "./provenance";

export { SYNTHESIS_APOLOGY, STAGES, buildWebQueries } from "./stages";
export type { Stage, StageContext } from "./stages";

export {
  UNKNOWN_PLANT,
  WEATHER_NO_LOCATION,
  WEATHER_UNAVAILABLE,
  collectHealthIssues,
  createTurnState,
  effectivePlantName,
  setOnce,
} from "./state";
export type {
  DiseaseInfo,
  HealthAssessment,
  HealthIssue,
  HealthIssueRecord,
  IdentifiedPlant,
  KeywordAnalysis,
  KnowledgeSnippet,
  SeverityLevel,
  TurnInput,
  TurnState,
  WeatherReading,
  WeatherRecord,
  WebSnippet,
} from "./state";

export {
  PLAN_TEMPLATES,
  PREDICATES,
  assessCompleteness,
  buildPlan,
  executionWaves,
  requiredFields,
  templateFor,
} from "./tasks";
export type {
  CompletenessReport,
  ExecutionPlan,
  ExecutionStrategy,
  PlanningRecord,
  PredicateName,
  Task,
  TaskRun,
} from "./tasks";
