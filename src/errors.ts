// errors.ts — Failure taxonomy shared by the controller and the contract engine
// Structured failures travel inside results; EngineError is what external calls raise.

export const FAILURE_KINDS = {
  CAPTURE_FAILURE: "capture_failure",           // no frame or markup snapshot
  TARGET_NOT_FOUND: "target_not_found",         // neither structural nor perceptual lookup found it
  EXECUTION_FAILURE: "execution_failure",       // driver/input call raised
  VERIFICATION_FAILURE: "verification_failure", // a pre/post condition did not hold
  ABORT_TRIGGERED: "abort_triggered",           // a global abort condition matched
  TIMEOUT: "timeout",                           // external call exceeded its budget
  CANCELLED: "cancelled",                       // plan deadline or caller signal
  INVALID_PLAN: "invalid_plan",                 // rejected before execution
} as const;

export type FailureKind = (typeof FAILURE_KINDS)[keyof typeof FAILURE_KINDS];

export class EngineError extends Error {
  readonly kind: FailureKind;
  readonly suggestion?: string;

  constructor(kind: FailureKind, message: string, opts: { suggestion?: string; cause?: unknown } = {}) {
    super(message, opts.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = "EngineError";
    this.kind = kind;
    if (opts.suggestion) this.suggestion = opts.suggestion;
  }
}

export class PlanValidationError extends EngineError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(FAILURE_KINDS.INVALID_PLAN, `Invalid input: ${issues.join("; ")}`, {
      suggestion: "Fix the listed fields; nothing was executed.",
    });
    this.name = "PlanValidationError";
    this.issues = issues;
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Map a raw driver error onto an EngineError with a readable message.
 * Playwright phrasing is recognised; anything else becomes an execution failure.
 */
export function toEngineError(error: unknown, selector: string): EngineError {
  if (isEngineError(error)) return error;
  const message = errorMessage(error);

  if (message.includes("strict mode violation")) {
    const countMatch = message.match(/resolved to (\d+) elements/);
    const count = countMatch ? countMatch[1] : "multiple";
    return new EngineError(
      FAILURE_KINDS.EXECUTION_FAILURE,
      `Selector "${selector}" matched ${count} elements`,
      { suggestion: "Re-index the surface to get a unique selector.", cause: error },
    );
  }

  if (
    (message.includes("Timeout") || message.includes("waiting for")) &&
    (message.includes("to be visible") || message.includes("not visible"))
  ) {
    return new EngineError(
      FAILURE_KINDS.TARGET_NOT_FOUND,
      `Element "${selector}" not found or not visible`,
      { suggestion: "Re-index the surface to see current elements.", cause: error },
    );
  }

  if (
    message.includes("intercepts pointer events") ||
    message.includes("not visible") ||
    message.includes("not receive pointer events")
  ) {
    return new EngineError(
      FAILURE_KINDS.EXECUTION_FAILURE,
      `Element "${selector}" is not interactable (hidden or covered)`,
      { suggestion: "Dismiss overlays or scroll the element into view.", cause: error },
    );
  }

  if (/timeout|timed out/i.test(message)) {
    return new EngineError(FAILURE_KINDS.TIMEOUT, `"${selector}": ${message}`, { cause: error });
  }

  return new EngineError(FAILURE_KINDS.EXECUTION_FAILURE, message, { cause: error });
}

/** One-line rendering for logs: `kind: message (suggestion)`. */
export function describeFailure(failure: { kind: FailureKind; message: string; suggestion?: string }): string {
  const hint = failure.suggestion ? ` (${failure.suggestion})` : "";
  return `${failure.kind}: ${failure.message}${hint}`;
}
