// retry.ts — Bounded retry policy, timeouts and cancellation for external calls
// Every driver/perception call goes through withTimeout; plan steps go through withRetry.

import type { EngineConfig } from "./config.js";
import { EngineError, FAILURE_KINDS, errorMessage } from "./errors.js";
import type { RetryStats } from "./stats.js";

// --- Error classification ---

export type ErrorClass =
  | "stale_target"
  | "not_interactable"
  | "ambiguous"
  | "timeout"
  | "overlay_interference"
  | "captcha_detected"
  | "unknown";

export interface ErrorContext {
  /** Count of consecutive not_interactable failures on the same target */
  notInteractableCount?: number;
}

function isNotInteractable(message: string): boolean {
  return (
    message.includes("not interactable") ||
    message.includes("hidden or covered") ||
    message.includes("intercepts pointer events") ||
    message.includes("not receive pointer events")
  );
}

export function classifyError(message: string, ctx?: ErrorContext): ErrorClass {
  const lower = message.toLowerCase();

  if (
    lower.includes("captcha") ||
    message.includes("I'm not a robot") ||
    message.includes("Cloudflare") ||
    lower.includes("human verification") ||
    lower.includes("bot detection")
  ) {
    return "captcha_detected";
  }

  if (
    message.includes("not found or not visible") ||
    message.includes("not attached to the DOM") ||
    message.includes("Element is detached") ||
    lower.includes("stale")
  ) {
    return "stale_target";
  }

  if (message.includes("strict mode violation") || (message.includes("matched") && message.includes("elements"))) {
    return "ambiguous";
  }

  if (isNotInteractable(message)) {
    // persisting after two attempts means something is on top of it
    return (ctx?.notInteractableCount ?? 0) >= 2 ? "overlay_interference" : "not_interactable";
  }

  if (lower.includes("timeout") || lower.includes("timed out")) {
    return "timeout";
  }

  return "unknown";
}

export function buildSuggestion(errorClass: ErrorClass, attempts: number): string {
  switch (errorClass) {
    case "stale_target":
      return `Target went stale after ${attempts} attempt(s). Re-index the surface and retry.`;
    case "not_interactable":
      return `Target not interactable after ${attempts} attempt(s). Check that it is visible and not overlapped.`;
    case "ambiguous":
      return `Selector matched several elements after ${attempts} attempt(s). Re-index for a unique selector.`;
    case "timeout":
      return `Timed out after ${attempts} attempt(s). Raise the step timeout or check the surface is responsive.`;
    case "overlay_interference":
      return `Target blocked by an overlay after ${attempts} attempt(s). Dismissal was attempted; analyze the screen again.`;
    case "captcha_detected":
      return "Manual intervention required: solve the CAPTCHA and retry.";
    default:
      return `Action failed after ${attempts} attempt(s).`;
  }
}

// --- Policy ---

export interface RetryPolicy {
  /** Retries after the first failure (total attempts = retries + 1) */
  retries: number;
  backoffMs: number;
  factor: number;
  maxBackoffMs: number;
}

export function policyFromConfig(config: EngineConfig, retries = config["step-retries"]): RetryPolicy {
  return {
    retries,
    backoffMs: config["retry-backoff-ms"],
    factor: config["retry-backoff-factor"],
    maxBackoffMs: config["retry-max-backoff-ms"],
  };
}

/** Delay before the attempt that follows failed attempt number `attempt` (1-based). */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const raw = policy.backoffMs * Math.pow(policy.factor, Math.max(0, attempt - 1));
  return Math.min(raw, policy.maxBackoffMs);
}

// --- Cancellation primitives ---

function cancelled(label: string, signal: AbortSignal): EngineError {
  const reason: unknown = signal.reason;
  if (reason instanceof EngineError) return reason;
  return new EngineError(FAILURE_KINDS.CANCELLED, `${label} cancelled`, { cause: reason });
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(cancelled("sleep", signal));
  return new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      if (signal) reject(cancelled("sleep", signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export interface TimeoutOptions {
  signal?: AbortSignal;
  label?: string;
}

/**
 * Run `task` with a time budget. The task receives a signal that aborts on
 * timeout or when the outer signal aborts; the returned promise settles first
 * either way, so a task that ignores its signal cannot hold the caller.
 */
export function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  ms: number,
  opts: TimeoutOptions = {},
): Promise<T> {
  const label = opts.label ?? "operation";
  const outer = opts.signal;
  if (outer?.aborted) return Promise.reject(cancelled(label, outer));

  const controller = new AbortController();
  return new Promise<T>((resolve, reject) => {
    let settled = false;
    const finish = (settle: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      outer?.removeEventListener("abort", onAbort);
      settle();
    };
    const onAbort = () => {
      if (!outer) return;
      const err = cancelled(label, outer);
      controller.abort(err);
      finish(() => reject(err));
    };
    const timer = setTimeout(() => {
      const err = new EngineError(FAILURE_KINDS.TIMEOUT, `${label} timed out after ${ms}ms`);
      controller.abort(err);
      finish(() => reject(err));
    }, ms);
    outer?.addEventListener("abort", onAbort, { once: true });

    let pending: Promise<T>;
    try {
      pending = task(controller.signal);
    } catch (err) {
      pending = Promise.reject(err);
    }
    pending.then(
      (value) => finish(() => resolve(value)),
      (err: unknown) => finish(() => reject(err)),
    );
  });
}

// --- Core retry wrapper ---

export interface RetryOptions {
  /** Return false to stop retrying and rethrow immediately */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
  signal?: AbortSignal;
  stats?: RetryStats;
}

export interface RetryResult<T> {
  result: T;
  attempts: number;
}

export async function withRetry<T>(
  action: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  opts: RetryOptions = {},
): Promise<RetryResult<T>> {
  const maxAttempts = Math.max(0, policy.retries) + 1;
  let retryAttempted = false;

  for (let attempt = 1; ; attempt++) {
    try {
      const result = await action(attempt);
      if (retryAttempted) opts.stats?.recordOutcome(true);
      return { result, attempts: attempt };
    } catch (err) {
      const retryable = opts.shouldRetry ? opts.shouldRetry(err) : true;
      if (!retryable || attempt >= maxAttempts) {
        if (retryAttempted) opts.stats?.recordOutcome(false);
        throw err;
      }
      opts.stats?.recordAttempt(classifyError(errorMessage(err)));
      retryAttempted = true;
      const delay = backoffDelay(policy, attempt);
      opts.onRetry?.(attempt, err, delay);
      if (delay > 0) await sleep(delay, opts.signal);
    }
  }
}
