// contract.ts — Contract Engine: screen state analysis and verified plan execution
// Everything above the controller. executePlan never throws once the plan is valid.

import { randomUUID } from "node:crypto";
import type { ChangeGate } from "./change-gate.js";
import {
  bestTextMatch,
  describeCondition,
  describeVisually,
  evaluateAll,
  evaluateCondition,
  firstMatching,
  locateVisually,
  type ConditionContext,
  type ConditionResult,
  type NameKind,
} from "./conditions.js";
import { getDefaults, type EngineConfig } from "./config.js";
import type { DecisionController } from "./controller.js";
import {
  EngineError,
  FAILURE_KINDS,
  describeFailure,
  errorMessage,
  isEngineError,
  toEngineError,
  type FailureKind,
} from "./errors.js";
import { describeElement } from "./indexer.js";
import { silentLogger, type Logger } from "./log.js";
import {
  isActionPlan,
  parseAnchors,
  parseCondition,
  parsePlan,
  parseTargets,
  type ActionPlan,
  type ActionStep,
  type ConditionInput,
  type PlanDefaults,
  type PlanInput,
  type ScreenAnchor,
  type TargetSpec,
  type VerifyCondition,
} from "./plan.js";
import { policyFromConfig, sleep, withRetry, withTimeout, type RetryPolicy } from "./retry.js";
import type { StateTracker } from "./state-tracker.js";
import { RetryStats, type RetryStatsSnapshot } from "./stats.js";
import { normalizeText } from "./text.js";
import type {
  ActionTarget,
  AnchorResult,
  ExecutionMethod,
  InputBackend,
  InteractiveElement,
  PerceivedElement,
  PerceptionBackend,
  Region,
  ScreenElement,
  ScreenState,
  StructuralDriver,
  TargetDescriptor,
} from "./types.js";

// --- Types ---

export interface StepReport {
  index: number;
  op: ActionStep["op"];
  attempts: number;
  success: boolean;
  method?: ExecutionMethod;
}

export interface ExecutionFailure {
  kind: FailureKind;
  message: string;
  /** Rendered condition that failed or matched, when one did */
  condition?: string;
}

export interface ExecutionResult {
  success: boolean;
  goal: string;
  completedSteps: number;
  totalSteps: number;
  /** Zero-based index of the step that stopped the plan */
  failedStep?: number;
  failure?: ExecutionFailure;
  finalState?: ScreenState;
  elapsedMs: number;
  steps: StepReport[];
  logs: string[];
}

export interface AnalyzeOptions {
  region?: Region;
  /** Skip the change gate and re-evaluate */
  force?: boolean;
  signal?: AbortSignal;
}

export interface ContractEngineOptions<TNode> {
  surfaceId: string;
  driver: StructuralDriver<TNode>;
  controller: DecisionController<TNode>;
  gate: ChangeGate;
  tracker: StateTracker;
  perception?: PerceptionBackend;
  input?: InputBackend;
  config?: EngineConfig;
  logger?: Logger;
  /** Backoff shape for step retries; the retry count comes from each step */
  retryPolicy?: Omit<RetryPolicy, "retries">;
}

class StepError extends EngineError {
  readonly retryable: boolean;
  readonly condition?: string;

  constructor(
    kind: FailureKind,
    message: string,
    opts: { retryable: boolean; condition?: string; suggestion?: string },
  ) {
    super(kind, message, opts.suggestion ? { suggestion: opts.suggestion } : {});
    this.name = "StepError";
    this.retryable = opts.retryable;
    if (opts.condition) this.condition = opts.condition;
  }
}

/** An analyzed state with the anchor definitions it was built from. */
type AnalyzedState = {
  state: ScreenState;
  anchors: readonly ScreenAnchor[];
};

type NameResolver = (name: string, kind: NameKind) => TargetDescriptor | undefined;

const MAX_REMEMBERED_STATES = 8;

function anchorTarget(anchor: ScreenAnchor): TargetDescriptor {
  switch (anchor.type) {
    case "text":
      return { text: anchor.text ?? anchor.name };
    case "element":
      return anchor.selector ? { selector: anchor.selector } : { text: anchor.text ?? anchor.name };
    case "template":
      return { description: anchor.template ?? anchor.name };
  }
}

function elementTarget(element: ScreenElement): TargetDescriptor {
  if (element.method !== "perceptual") {
    return { selector: element.selector, ...(element.text ? { text: element.text } : {}) };
  }
  const description = element.text || element.label || element.name;
  const b = element.bounds;
  if (!b) return { description };
  return { description, point: { x: b.x + Math.floor(b.width / 2), y: b.y + Math.floor(b.height / 2) } };
}

/**
 * Resolve names declared in an analyzed state: elements by target name, anchors by
 * anchor name. Unknown names yield undefined and are treated as text or selectors.
 */
export function nameResolver(scope: AnalyzedState | undefined): NameResolver {
  return (name, kind) => {
    if (!scope) return undefined;
    if (kind === "anchor") {
      const anchor = scope.anchors.find((a) => a.name === name);
      if (anchor) return anchorTarget(anchor);
    }
    const element = scope.state.elements.find((e) => e.name === name);
    return element ? elementTarget(element) : undefined;
  };
}

type OpReport = {
  hashBefore?: string;
  hashAfter?: string;
  method?: ExecutionMethod;
};

type RegionCondition = VerifyCondition & { type: "screen_changed" | "screen_unchanged"; region: Region };

function hasRegion(cond: VerifyCondition): cond is RegionCondition {
  return (cond.type === "screen_changed" || cond.type === "screen_unchanged") && cond.region !== undefined;
}

function isCancellation(err: unknown): boolean {
  return isEngineError(err) && err.kind === FAILURE_KINDS.CANCELLED;
}

function isVerifyCondition(value: VerifyCondition | ConditionInput): value is VerifyCondition {
  return "minConfidence" in value && typeof value.minConfidence === "number";
}

export function describeStep(step: ActionStep): string {
  const target = (t: ActionTarget) => (typeof t === "string" ? t : t.selector ?? t.text ?? t.role ?? t.description ?? "?");
  switch (step.op) {
    case "click":
      return `click(${target(step.target)})`;
    case "type":
      return step.target !== undefined ? `type(${target(step.target)}, "${step.text}")` : `type("${step.text}")`;
    case "wait":
      return `wait(${step.durationMs}ms)`;
    case "verify":
      return "verify";
    case "scroll":
      return step.target !== undefined ? `scroll(${target(step.target)}, ${step.dx}, ${step.dy})` : `scroll(${step.dx}, ${step.dy})`;
  }
}

function syntheticElement(name: string, selector: string, spec: TargetSpec): InteractiveElement {
  const text = spec.text ?? "";
  return {
    id: name,
    tag: "",
    role: spec.role ?? "generic",
    text,
    normalizedText: normalizeText(text),
    selector,
    path: selector,
    disabled: false,
  };
}

function fromPerceived(perceived: PerceivedElement): InteractiveElement {
  const { confidence: _confidence, ...element } = perceived;
  return element;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

// --- Engine ---

export class ContractEngine<TNode = unknown> {
  readonly surfaceId: string;
  private readonly driver: StructuralDriver<TNode>;
  private readonly controller: DecisionController<TNode>;
  private readonly gate: ChangeGate;
  private readonly tracker: StateTracker;
  private readonly perception?: PerceptionBackend;
  private readonly input?: InputBackend;
  private readonly config: EngineConfig;
  private readonly log: Logger;
  private readonly policy: Omit<RetryPolicy, "retries">;
  private readonly retryStats = new RetryStats();

  private cached: { key: string; state: ScreenState } | undefined;
  private readonly states = new Map<string, AnalyzedState>();
  private lastAnchors: ScreenAnchor[] = [];
  private lastTargets: TargetSpec[] = [];
  private lastAttempts = 0;

  constructor(opts: ContractEngineOptions<TNode>) {
    this.surfaceId = opts.surfaceId;
    this.driver = opts.driver;
    this.controller = opts.controller;
    this.gate = opts.gate;
    this.tracker = opts.tracker;
    this.perception = opts.perception;
    this.input = opts.input;
    this.config = opts.config ?? getDefaults();
    this.log = opts.logger ?? silentLogger;
    this.policy = opts.retryPolicy ?? policyFromConfig(this.config);
  }

  getRetryStats(): RetryStatsSnapshot {
    return this.retryStats.snapshot();
  }

  /** Last analyzed state, if any. */
  cachedState(): ScreenState | undefined {
    return this.cached?.state;
  }

  reset(): void {
    this.cached = undefined;
    this.states.clear();
    this.lastAnchors = [];
    this.lastTargets = [];
  }

  private remember(state: ScreenState, anchors: readonly ScreenAnchor[]): void {
    this.states.delete(state.id);
    this.states.set(state.id, { state, anchors });
    if (this.states.size > MAX_REMEMBERED_STATES) {
      const oldest = this.states.keys().next();
      if (!oldest.done) this.states.delete(oldest.value);
    }
  }

  /** The state a plan names, else the latest analyzed one. */
  private scopeFor(screenId: string | undefined, note?: (line: string) => void): AnalyzedState | undefined {
    const latest = this.cached ? this.states.get(this.cached.state.id) : undefined;
    if (screenId === undefined) return latest;
    const named = this.states.get(screenId);
    if (!named) note?.(`screen ${screenId} is not a known state; resolving names against the latest`);
    return named ?? latest;
  }

  private context(signal?: AbortSignal, extra: Partial<ConditionContext<TNode>> = {}): ConditionContext<TNode> {
    return {
      resolveName: nameResolver(this.scopeFor(undefined)),
      controller: this.controller,
      driver: this.driver,
      ...(this.perception ? { perception: this.perception } : {}),
      ...(this.input ? { input: this.input } : {}),
      perceptionTimeoutMs: this.config["perception-timeout-ms"],
      structuralTimeoutMs: this.config["structural-timeout-ms"],
      logger: this.log,
      ...(signal ? { signal } : {}),
      ...extra,
    };
  }

  // --- State analysis ---

  /**
   * Evaluate anchors and resolve targets against the current surface.
   * When the gate reports no change and the same request was answered before,
   * the cached state object is returned as is.
   */
  async analyzeState(anchors: unknown = [], targets: unknown = [], opts: AnalyzeOptions = {}): Promise<ScreenState> {
    const anchorList = parseAnchors(anchors);
    const targetList = parseTargets(targets);
    this.lastAnchors = anchorList;
    this.lastTargets = targetList;

    const key = JSON.stringify({ anchorList, targetList, region: opts.region ?? null });
    const decision = await this.gate.shouldAnalyze(opts.region, { signal: opts.signal });
    if (!opts.force && !decision.changed && this.cached?.key === key) {
      this.log.debug(`screen unchanged (${decision.reason}), reusing state ${this.cached.state.id}`);
      this.remember(this.cached.state, anchorList);
      return this.cached.state;
    }

    const warnings: string[] = [];
    if (decision.reason === "capture_failed") warnings.push("frame capture failed; change detection unavailable");

    const observation = await this.controller.observe({ signal: opts.signal });
    if (!observation) warnings.push("no markup or frame available");
    else if (!observation.flags.structural) warnings.push("markup unavailable; structural lookups skipped");
    if (observation?.flags.overlay) warnings.push("an overlay is covering the surface");

    const ctx = this.context(opts.signal);
    let perceived: Promise<PerceivedElement[]> | undefined;
    const perceive = () => (perceived ??= describeVisually(ctx, opts.region));

    const anchorResults: AnchorResult[] = [];
    for (const anchor of anchorList) {
      const result = await this.evaluateAnchor(anchor, ctx, perceive);
      if (!result.found) warnings.push(`anchor "${anchor.name}" not found`);
      anchorResults.push(result);
    }

    const elements: ScreenElement[] = [];
    const missing: string[] = [];
    for (const spec of targetList) {
      const minConfidence = spec.minConfidence ?? this.config["min-confidence"];
      const element = await this.resolveSpec(spec, ctx, perceive, perceived !== undefined);
      if (!element) {
        missing.push(spec.name);
        warnings.push(`target "${spec.name}" not found`);
      } else if (element.confidence < minConfidence) {
        missing.push(spec.name);
        warnings.push(`target "${spec.name}" found with confidence ${element.confidence.toFixed(2)} < ${minConfidence}`);
      } else {
        elements.push(element);
      }
    }

    const state = deepFreeze<ScreenState>({
      id: randomUUID(),
      surfaceId: this.surfaceId,
      timestamp: Date.now(),
      anchors: anchorResults,
      elements,
      warnings,
      missing,
    });
    this.cached = { key, state };
    this.remember(state, anchorList);
    this.log.info(
      `state ${state.id}: ${anchorResults.filter((a) => a.found).length}/${anchorResults.length} anchors, ` +
        `${elements.length}/${targetList.length} targets`,
    );
    return state;
  }

  private async evaluateAnchor(
    anchor: ScreenAnchor,
    ctx: ConditionContext<TNode>,
    perceive: () => Promise<PerceivedElement[]>,
  ): Promise<AnchorResult> {
    const minConfidence = anchor.minConfidence ?? this.config["min-confidence"];
    const base = {
      name: anchor.name,
      type: anchor.type,
      ...(anchor.expectedLocation ? { expectedLocation: anchor.expectedLocation } : {}),
    };
    const hit = (confidence: number, method: AnchorResult["method"], bounds?: Region): AnchorResult => ({
      ...base,
      found: confidence > 0 && confidence >= minConfidence,
      confidence,
      ...(method ? { method } : {}),
      ...(bounds ? { bounds: { ...bounds } } : {}),
    });
    const miss = () => hit(0, undefined);

    switch (anchor.type) {
      case "text": {
        const text = anchor.text ?? "";
        const idx = this.controller.getIndex();
        if (idx && idx.text.includes(normalizeText(text))) return hit(1, "structural");
        const seen = bestTextMatch(await perceive(), text);
        return seen ? hit(seen.confidence, "perceptual", seen.bounds) : miss();
      }
      case "element": {
        const resolved = await this.controller.resolveTarget(
          anchor.selector ? { selector: anchor.selector } : { text: anchor.text ?? "" },
          ctx.signal,
        );
        if (resolved) return hit(1, "structural", resolved.element?.bounds);
        const located = await locateVisually(ctx, anchor.text ?? anchor.selector ?? "");
        return located ? hit(located.confidence, "perceptual") : miss();
      }
      case "template": {
        const located = await locateVisually(ctx, anchor.template ?? "");
        return located ? hit(located.confidence, "perceptual") : miss();
      }
    }
  }

  private async resolveSpec(
    spec: TargetSpec,
    ctx: ConditionContext<TNode>,
    perceive: () => Promise<PerceivedElement[]>,
    perceptionConsulted: boolean,
  ): Promise<ScreenElement | undefined> {
    const { name, minConfidence: _min, ...descriptor } = spec;

    if (descriptor.selector || descriptor.text || descriptor.role) {
      const resolved = await this.controller.resolveTarget(descriptor, ctx.signal);
      if (resolved) {
        const element = resolved.element ?? syntheticElement(name, resolved.selector, spec);
        // Structural hit; upgrade to combined when perception already saw the same element.
        const label = element.text || element.label || spec.text;
        const seen = perceptionConsulted && label ? bestTextMatch(await perceive(), label) : undefined;
        if (seen) {
          return {
            ...element,
            ...(element.bounds || !seen.bounds ? {} : { bounds: { ...seen.bounds } }),
            name,
            confidence: 1,
            method: "combined",
          };
        }
        return { ...element, name, confidence: 1, method: "structural" };
      }
    }

    if (!this.perception) return undefined;
    const wanted = descriptor.text ?? descriptor.description;
    const seen = wanted ? bestTextMatch(await perceive(), wanted) : undefined;
    if (seen) return { ...fromPerceived(seen), name, confidence: seen.confidence, method: "perceptual" };

    const description = descriptor.description ?? descriptor.text ?? descriptor.selector ?? descriptor.role ?? name;
    const located = await locateVisually(ctx, description, descriptor.region);
    if (!located) return undefined;
    const x = Math.round(located.x + (descriptor.region?.x ?? 0));
    const y = Math.round(located.y + (descriptor.region?.y ?? 0));
    return {
      ...syntheticElement(name, `point=${x},${y}`, spec),
      bounds: { x, y, width: 1, height: 1 },
      name,
      confidence: located.confidence,
      method: "perceptual",
    };
  }

  // --- Single-condition verification ---

  /** Evaluate one condition against the surface as it is now. */
  async verify(condition: VerifyCondition | ConditionInput, opts: { signal?: AbortSignal } = {}): Promise<ConditionResult> {
    const cond = isVerifyCondition(condition) ? condition : parseCondition(condition, this.config["min-confidence"]);
    const hashBefore = this.tracker.latest(this.surfaceId)?.hash;
    const hashAfter = (await this.controller.observe({ signal: opts.signal }))?.hash;
    const regionChanged = new Map<VerifyCondition, boolean>();
    if (hasRegion(cond)) {
      regionChanged.set(cond, (await this.gate.shouldAnalyze(cond.region, { signal: opts.signal })).changed);
    }
    return evaluateCondition(
      cond,
      this.context(opts.signal, {
        ...(hashBefore ? { hashBefore } : {}),
        ...(hashAfter ? { hashAfter } : {}),
        regionChanged,
      }),
    );
  }

  // --- Plan execution ---

  private planDefaults(): PlanDefaults {
    return {
      retries: this.config["step-retries"],
      timeoutMs: this.config["step-timeout-ms"],
      minConfidence: this.config["min-confidence"],
      deadlineMs: this.config["plan-deadline-ms"],
    };
  }

  /**
   * Run a plan step by step. Invalid input throws PlanValidationError before
   * anything touches the surface; after that every outcome is a result.
   */
  async executePlan(input: ActionPlan | PlanInput, opts: { signal?: AbortSignal } = {}): Promise<ExecutionResult> {
    const plan = isActionPlan(input) ? input : parsePlan(input, this.planDefaults());
    const start = performance.now();
    const logs: string[] = [];
    const note = (line: string) => {
      logs.push(line);
      this.log.info(line);
    };
    const reports: StepReport[] = [];
    const total = plan.steps.length;

    const deadline = new AbortController();
    const timer = setTimeout(() => {
      deadline.abort(new EngineError(FAILURE_KINDS.CANCELLED, `plan deadline of ${plan.deadlineMs}ms exceeded`));
    }, plan.deadlineMs);
    const outer = opts.signal;
    const onOuterAbort = () => {
      deadline.abort(new EngineError(FAILURE_KINDS.CANCELLED, "plan cancelled by caller", { cause: outer?.reason }));
    };
    if (outer?.aborted) onOuterAbort();
    else outer?.addEventListener("abort", onOuterAbort, { once: true });
    const signal = deadline.signal;

    note(`plan "${plan.goal}": ${total} step(s), deadline ${plan.deadlineMs}ms`);
    const names = nameResolver(this.scopeFor(plan.screenId, note));

    let completed = 0;
    let failure: ExecutionFailure | undefined;
    let failedStep: number | undefined;

    try {
      const current = (await this.controller.observe({ signal }))?.hash;
      const opening = await firstMatching(
        plan.abortConditions,
        this.context(signal, { resolveName: names, ...(current ? { hashBefore: current, hashAfter: current } : {}) }),
      );
      if (opening) {
        const condition = describeCondition(opening.condition);
        throw new StepError(FAILURE_KINDS.ABORT_TRIGGERED, `abort condition ${condition} matched: ${opening.detail}`, {
          retryable: false,
          condition,
        });
      }

      for (let i = 0; i < total; i++) {
        failedStep = i;
        const report = await this.runStep(plan, i, signal, note, names);
        reports.push(report);
        completed++;
      }
      failedStep = undefined;
    } catch (err) {
      const e = toEngineError(err, failedStep !== undefined ? describeStep(plan.steps[failedStep]) : plan.goal);
      failure = {
        kind: e.kind,
        message: e.message,
        ...(err instanceof StepError && err.condition ? { condition: err.condition } : {}),
      };
      if (failedStep !== undefined && reports.length === failedStep) {
        reports.push({ index: failedStep, op: plan.steps[failedStep].op, attempts: this.lastAttempts, success: false });
      }
      note(`plan failed${failedStep !== undefined ? ` at step ${failedStep + 1}/${total}` : ""}: ${describeFailure(e)}`);
    } finally {
      clearTimeout(timer);
      outer?.removeEventListener("abort", onOuterAbort);
    }

    if (!failure) note(`plan completed: ${completed}/${total} steps`);

    let finalState: ScreenState | undefined;
    try {
      finalState = await this.analyzeState(this.lastAnchors, this.lastTargets, { force: failure !== undefined });
    } catch (err) {
      note(`could not capture final state: ${errorMessage(err)}`);
    }

    return {
      success: failure === undefined,
      goal: plan.goal,
      completedSteps: completed,
      totalSteps: total,
      ...(failedStep !== undefined ? { failedStep } : {}),
      ...(failure ? { failure } : {}),
      ...(finalState ? { finalState } : {}),
      elapsedMs: performance.now() - start,
      steps: reports,
      logs,
    };
  }

  private async runStep(
    plan: ActionPlan,
    i: number,
    signal: AbortSignal,
    note: (line: string) => void,
    names: NameResolver,
  ): Promise<StepReport> {
    const step = plan.steps[i];
    const label = `step ${i + 1}/${plan.steps.length} ${describeStep(step)}`;
    this.lastAttempts = 0;

    if (step.verifyBefore.length > 0) {
      const current = this.tracker.latest(this.surfaceId)?.hash;
      const pre = await evaluateAll(
        step.verifyBefore,
        this.context(signal, { resolveName: names, ...(current ? { hashBefore: current, hashAfter: current } : {}) }),
      );
      if (pre.failed) {
        const condition = describeCondition(pre.failed.condition);
        throw new StepError(FAILURE_KINDS.VERIFICATION_FAILURE, `precondition ${condition} failed: ${pre.failed.detail}`, {
          retryable: false,
          condition,
        });
      }
    }

    const attemptOnce = async (attempt: number): Promise<OpReport> => {
      this.lastAttempts = attempt;
      note(`${label}: attempt ${attempt}/${step.retries + 1}`);
      let report: OpReport | undefined;
      let failed = false;
      let error: unknown;
      try {
        report = await this.attempt(step, signal, names);
      } catch (err) {
        if (isCancellation(err)) throw err;
        failed = true;
        error = err;
        note(`${label}: ${describeFailure(toEngineError(err, describeStep(step)))}`);
      }

      const matched = await firstMatching(
        plan.abortConditions,
        this.context(signal, {
          resolveName: names,
          ...(report?.hashBefore ? { hashBefore: report.hashBefore } : {}),
          ...(report?.hashAfter ? { hashAfter: report.hashAfter } : {}),
        }),
      );
      if (matched) {
        const condition = describeCondition(matched.condition);
        throw new StepError(FAILURE_KINDS.ABORT_TRIGGERED, `abort condition ${condition} matched: ${matched.detail}`, {
          retryable: false,
          condition,
        });
      }
      if (failed || !report) throw error;
      return report;
    };

    const { result, attempts } = await withRetry(attemptOnce, { ...this.policy, retries: step.retries }, {
      signal,
      stats: this.retryStats,
      shouldRetry: (err) =>
        err instanceof StepError ? err.retryable : isEngineError(err) && err.kind === FAILURE_KINDS.TIMEOUT,
      onRetry: (attempt, _err, delayMs) => note(`${label}: retrying after attempt ${attempt} in ${delayMs}ms`),
    });

    note(`${label}: ok${result.method ? ` (${result.method})` : ""}`);
    return {
      index: i,
      op: step.op,
      attempts,
      success: true,
      ...(result.method ? { method: result.method } : {}),
    };
  }

  private async attempt(step: ActionStep, signal: AbortSignal, names: NameResolver): Promise<OpReport> {
    const regional = step.verifyAfter.filter(hasRegion);
    for (const cond of regional) await this.gate.shouldAnalyze(cond.region, { signal });

    const op = await this.runOp(step, signal, names);

    const regionChanged = new Map<VerifyCondition, boolean>();
    for (const cond of regional) {
      regionChanged.set(cond, (await this.gate.shouldAnalyze(cond.region, { signal })).changed);
    }
    const post = await evaluateAll(
      step.verifyAfter,
      this.context(signal, {
        resolveName: names,
        ...(op.hashBefore ? { hashBefore: op.hashBefore } : {}),
        ...(op.hashAfter ? { hashAfter: op.hashAfter } : {}),
        regionChanged,
      }),
    );
    if (post.failed) {
      const condition = describeCondition(post.failed.condition);
      throw new StepError(FAILURE_KINDS.VERIFICATION_FAILURE, `${condition} failed: ${post.failed.detail}`, {
        retryable: true,
        condition,
      });
    }
    return op;
  }

  private bindTarget(target: ActionTarget, names: NameResolver): ActionTarget {
    if (typeof target !== "string") return target;
    const bound = names(target, "element");
    if (bound) this.log.debug(`target "${target}" resolved from screen state`);
    return bound ?? target;
  }

  private async observeHash(signal: AbortSignal): Promise<string | undefined> {
    return (await this.controller.observe({ signal }))?.hash;
  }

  private async runOp(step: ActionStep, signal: AbortSignal, names: NameResolver): Promise<OpReport> {
    switch (step.op) {
      case "wait": {
        const hashBefore = this.tracker.latest(this.surfaceId)?.hash;
        await sleep(step.durationMs, signal);
        const hashAfter = await this.observeHash(signal);
        return { ...(hashBefore ? { hashBefore } : {}), ...(hashAfter ? { hashAfter } : {}) };
      }
      case "verify": {
        const hash = await this.observeHash(signal);
        return hash ? { hashBefore: hash, hashAfter: hash } : {};
      }
      case "click":
      case "type":
      case "scroll":
        break;
    }

    const target = step.target === undefined ? undefined : this.bindTarget(step.target, names);
    const action =
      step.op === "click"
        ? { type: "click" as const, target: target ?? step.target }
        : step.op === "type"
          ? {
              type: "type" as const,
              ...(target !== undefined ? { target } : {}),
              params: { text: step.text, clear: step.clear, pressEnter: step.pressEnter },
            }
          : {
              type: "scroll" as const,
              ...(target !== undefined ? { target } : {}),
              params: { dx: step.dx, dy: step.dy },
            };

    const outcome = await withTimeout((s) => this.controller.execute(action, { signal: s }), step.timeoutMs, {
      signal,
      label: describeStep(step),
    });
    if (!outcome.success) {
      const failure = outcome.failure ?? {
        kind: FAILURE_KINDS.EXECUTION_FAILURE,
        message: `${describeStep(step)} failed`,
      };
      throw new StepError(failure.kind, failure.message, {
        retryable: failure.kind !== FAILURE_KINDS.CANCELLED && failure.errorClass !== "captcha_detected",
        ...(failure.suggestion ? { suggestion: failure.suggestion } : {}),
      });
    }
    if (outcome.element) this.log.debug(`${describeStep(step)} acted on ${describeElement(outcome.element)}`);
    return {
      ...(outcome.hashBefore ? { hashBefore: outcome.hashBefore } : {}),
      ...(outcome.hashAfter ? { hashAfter: outcome.hashAfter } : {}),
      method: outcome.method,
    };
  }
}
