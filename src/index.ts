// steadyhand — public API

export * from "./types.js";

export {
  EngineError,
  PlanValidationError,
  FAILURE_KINDS,
  describeFailure,
  isEngineError,
  toEngineError,
  type FailureKind,
} from "./errors.js";

export { createLogger, silentLogger, isLogLevel, type Logger, type LogLevel, type LogSink } from "./log.js";

export {
  DEFAULT_CONFIG_PATH,
  coerceValue,
  configFromEnv,
  envVarName,
  getDefaults,
  isValidConfigKey,
  loadConfig,
  readConfig,
  resolveConfig,
  type ConfigKey,
  type ConfigValue,
  type EngineConfig,
} from "./config.js";

export {
  backoffDelay,
  buildSuggestion,
  classifyError,
  policyFromConfig,
  sleep,
  withRetry,
  withTimeout,
  type ErrorClass,
  type RetryPolicy,
} from "./retry.js";

export {
  ChangeGate,
  contentHash,
  gridDiffRatio,
  sharpThumbnailer,
  type ChangeGateOptions,
  type GateDecision,
  type GateReason,
  type GateStats,
  type Thumbnailer,
} from "./change-gate.js";

export {
  describeElement,
  findByRole,
  findBySelector,
  findByText,
  foldText,
  index,
  normalizeText,
  parse,
  type MarkupIndex,
} from "./indexer.js";

export { StateTracker, type LoopEvent, type StateTrackerOptions, type TrackerStatus } from "./state-tracker.js";
export { RingBuffer } from "./ring-buffer.js";

export {
  DecisionController,
  type ActionFailure,
  type ActionOutcome,
  type ControllerOptions,
} from "./controller.js";
export {
  CONSENT_DISMISS_SELECTORS,
  MODAL_DISMISS_SELECTORS,
  OVERLAY_DISMISS_SELECTORS,
  dismissOverlays,
} from "./overlays.js";
export type { ControllerStatsSnapshot, RetryStatsSnapshot } from "./stats.js";

export {
  PLAN_DEFAULTS,
  isActionPlan,
  parseAnchors,
  parseCondition,
  parsePlan,
  parseTargets,
  type ActionPlan,
  type ActionStep,
  type ConditionInput,
  type PlanInput,
  type ScreenAnchor,
  type TargetSpec,
  type VerifyCondition,
} from "./plan.js";
export { describeCondition, type ConditionResult } from "./conditions.js";
export {
  ContractEngine,
  describeStep,
  type AnalyzeOptions,
  type ContractEngineOptions,
  type ExecutionFailure,
  type ExecutionResult,
  type StepReport,
} from "./contract.js";

export { SurfaceRegistry, type Surface, type SurfaceBackends, type SurfaceRegistryOptions } from "./surface.js";
export { PlaywrightDriver, PlaywrightInput, playwrightBackends, type MarkupMode } from "./drivers/playwright.js";
