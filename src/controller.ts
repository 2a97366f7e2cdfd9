// controller.ts — Decision Controller: structural execution first, perceptual fallback
// One controller per surface. execute() never throws; failures come back as outcomes.

import { contentHash, type ChangeGate } from "./change-gate.js";
import { getDefaults, type EngineConfig } from "./config.js";
import {
  EngineError,
  FAILURE_KINDS,
  errorMessage,
  toEngineError,
  type FailureKind,
} from "./errors.js";
import { describeElement, findByRole, findBySelector, findByText, index, type MarkupIndex } from "./indexer.js";
import { silentLogger, type Logger } from "./log.js";
import { CONSENT_DISMISS_SELECTORS, OVERLAY_DISMISS_SELECTORS, dismissOverlays } from "./overlays.js";
import { buildSuggestion, classifyError, withTimeout, type ErrorClass } from "./retry.js";
import { ControllerStats, type ControllerStatsSnapshot } from "./stats.js";
import type { StateTracker } from "./state-tracker.js";
import { normalizeText } from "./text.js";
import type {
  ActionTarget,
  CallOptions,
  ControllerAction,
  ExecutionMethod,
  ExpectedOutcome,
  InputBackend,
  InteractiveElement,
  LocateResult,
  Observation,
  PerceptionBackend,
  Point,
  StructuralDriver,
  TargetDescriptor,
} from "./types.js";

// --- Types ---

export interface ActionFailure {
  kind: FailureKind;
  message: string;
  suggestion?: string;
  errorClass?: ErrorClass;
}

export interface ActionOutcome {
  method: ExecutionMethod;
  success: boolean;
  elapsedMs: number;
  fellBack: boolean;
  /** Present only when the action carried an expectedOutcome */
  verified?: boolean;
  loopDetected: boolean;
  failure?: ActionFailure;
  /** Element acted on structurally */
  element?: InteractiveElement;
  /** Surface coordinates used on the perceptual path */
  point?: Point;
  /** Structural hash before and after the action */
  hashBefore?: string;
  hashAfter?: string;
}

export interface ControllerOptions<TNode> {
  surfaceId: string;
  driver: StructuralDriver<TNode>;
  gate: ChangeGate;
  tracker: StateTracker;
  perception?: PerceptionBackend;
  input?: InputBackend;
  config?: EngineConfig;
  logger?: Logger;
}

export type Resolved<TNode> = {
  node: TNode;
  selector: string;
  element?: InteractiveElement;
};

type PartialOutcome = Omit<ActionOutcome, "elapsedMs" | "loopDetected" | "hashAfter" | "verified">;

// --- Target helpers ---

const SELECTOR_LIKE = /^(#|\.|\[|role=|css=|xpath=|text=|\/\/)|^[a-z][a-z0-9-]*(#|\.|\[|:[a-z-]+\(| > )/i;

export function looksLikeSelector(value: string): boolean {
  return SELECTOR_LIKE.test(value.trim());
}

export function toDescriptor(target: ActionTarget): TargetDescriptor {
  if (typeof target !== "string") return target;
  return looksLikeSelector(target) ? { selector: target.trim() } : { text: target };
}

function isStructurallyDescribed(target: TargetDescriptor): boolean {
  return Boolean(target.selector || target.text || target.role);
}

function pickEnabled(matches: InteractiveElement[]): InteractiveElement | undefined {
  return matches.find((m) => !m.disabled) ?? matches[0];
}

function isCancellation(err: unknown): boolean {
  return err instanceof EngineError && err.kind === FAILURE_KINDS.CANCELLED;
}

function describeTarget(target: TargetDescriptor): string {
  const point = target.point ? `point=${target.point.x},${target.point.y}` : undefined;
  return target.selector ?? target.text ?? target.role ?? target.description ?? point ?? "(untargeted)";
}

function failureFrom(err: unknown, label: string): ActionFailure {
  const e = toEngineError(err, label);
  return { kind: e.kind, message: e.message, ...(e.suggestion ? { suggestion: e.suggestion } : {}) };
}

// --- Controller ---

export class DecisionController<TNode = unknown> {
  readonly surfaceId: string;
  private readonly driver: StructuralDriver<TNode>;
  private readonly gate: ChangeGate;
  private readonly tracker: StateTracker;
  private readonly perception?: PerceptionBackend;
  private readonly input?: InputBackend;
  private readonly config: EngineConfig;
  private readonly log: Logger;
  private readonly stats = new ControllerStats();

  private markupIndex: MarkupIndex | undefined;
  private overlayChecked = false;
  private consecutiveLoops = 0;
  private forcePerceptual = false;
  private notInteractableCount = 0;

  constructor(opts: ControllerOptions<TNode>) {
    this.surfaceId = opts.surfaceId;
    this.driver = opts.driver;
    this.gate = opts.gate;
    this.tracker = opts.tracker;
    this.perception = opts.perception;
    this.input = opts.input;
    this.config = opts.config ?? getDefaults();
    this.log = opts.logger ?? silentLogger;
  }

  // --- Observation ---

  /**
   * Refresh the element index from the driver's markup and record an observation.
   * Falls back to the change gate's frame hash when markup is unavailable.
   * Returns undefined only when both captures fail.
   */
  async observe(opts: CallOptions = {}): Promise<Observation | undefined> {
    const timeoutMs = opts.timeoutMs ?? this.config["structural-timeout-ms"];
    try {
      const markup = await withTimeout(
        (signal) => this.driver.getMarkup({ timeoutMs, signal }),
        timeoutMs,
        { signal: opts.signal, label: "markup capture" },
      );
      const idx = index(markup);
      this.markupIndex = idx;
      return this.tracker.observe(
        this.surfaceId,
        contentHash(markup),
        idx.elements.map((e) => e.selector),
        { structural: true, overlay: idx.overlay },
      );
    } catch (err) {
      if (isCancellation(err)) throw err;
      this.log.warn(`markup capture failed, using frame hash: ${errorMessage(err)}`);
    }

    this.markupIndex = undefined;
    const decision = await this.gate.shouldAnalyze(undefined, { signal: opts.signal });
    if (!decision.hash) return undefined;
    return this.tracker.observe(
      this.surfaceId,
      decision.hash,
      [],
      { structural: false, overlay: false },
      this.gate.lastObservation()?.fingerprint,
    );
  }

  /** Copy of the current element index, if markup was captured. */
  getIndex(): MarkupIndex | undefined {
    const idx = this.markupIndex;
    if (!idx) return undefined;
    return { ...idx, elements: idx.elements.map((e) => ({ ...e, ...(e.bounds ? { bounds: { ...e.bounds } } : {}) })) };
  }

  getStats(): ControllerStatsSnapshot {
    return this.stats.snapshot();
  }

  /** Drop cached index and per-surface flags; counters are kept. */
  reset(): void {
    this.markupIndex = undefined;
    this.overlayChecked = false;
    this.consecutiveLoops = 0;
    this.forcePerceptual = false;
    this.notInteractableCount = 0;
  }

  // --- Execution ---

  async execute(action: ControllerAction, opts: { signal?: AbortSignal } = {}): Promise<ActionOutcome> {
    const start = performance.now();
    const signal = opts.signal;
    let hashBefore: string | undefined;

    try {
      if (!this.markupIndex) await this.observe({ signal });
      await this.handleOverlays(signal);
      hashBefore = this.tracker.latest(this.surfaceId)?.hash;

      const partial = await this.run(action, signal);
      return await this.finish(action, { ...partial, ...(hashBefore ? { hashBefore } : {}) }, start, signal);
    } catch (err) {
      const failure = failureFrom(err, describeTarget(toDescriptor(action.target ?? {})));
      this.stats.increment("failures");
      this.log.warn(`${action.type} aborted: ${failure.message}`);
      return {
        method: "structural",
        success: false,
        elapsedMs: performance.now() - start,
        fellBack: false,
        loopDetected: false,
        failure,
        ...(hashBefore ? { hashBefore } : {}),
      };
    }
  }

  private perceptualAvailable(): boolean {
    return this.perception !== undefined && this.input !== undefined;
  }

  private async run(action: ControllerAction, signal?: AbortSignal): Promise<PartialOutcome> {
    if (action.target === undefined) return this.runUntargeted(action, signal);

    const target = toDescriptor(action.target);
    const forced = this.forcePerceptual && this.perceptualAvailable();
    this.forcePerceptual = false;

    let structuralError: unknown;
    let element: InteractiveElement | undefined;

    if (target.point && !isStructurallyDescribed(target)) {
      const input = this.input;
      if (!input) {
        return {
          method: "perceptual",
          success: false,
          fellBack: false,
          failure: { kind: FAILURE_KINDS.EXECUTION_FAILURE, message: `No input backend to act at ${describeTarget(target)}` },
        };
      }
      const result = await this.actAt(action, target.point, input, describeTarget(target), signal);
      if (result.success) this.stats.increment("perceptualActions");
      return { ...result, fellBack: false };
    }

    if (forced) {
      this.log.info(`forced perceptual execution for ${describeTarget(target)}`);
    } else if (isStructurallyDescribed(target)) {
      const resolved = await this.resolveTarget(target, signal);
      element = resolved?.element;
      if (resolved) {
        try {
          await this.runStructural(action, resolved, signal);
          this.notInteractableCount = 0;
          this.stats.increment("structuralActions");
          return { method: "structural", success: true, fellBack: false, ...(element ? { element } : {}) };
        } catch (err) {
          if (isCancellation(err)) throw err;
          structuralError = err;
          const errorClass = classifyError(errorMessage(err), { notInteractableCount: this.notInteractableCount });
          this.log.info(`structural ${action.type} on ${resolved.selector} failed (${errorClass}): ${errorMessage(err)}`);
          if (errorClass === "captcha_detected") {
            return {
              method: "structural",
              success: false,
              fellBack: false,
              failure: {
                kind: FAILURE_KINDS.EXECUTION_FAILURE,
                message: errorMessage(err),
                suggestion: buildSuggestion(errorClass, 1),
                errorClass,
              },
            };
          }
          if (errorClass === "not_interactable" || errorClass === "overlay_interference") {
            this.notInteractableCount++;
            await this.tryDismiss(signal);
          }
        }
      }
    }

    const fellBack = isStructurallyDescribed(target);
    if (!this.perception || !this.input) {
      const failure: ActionFailure = structuralError !== undefined
        ? failureFrom(structuralError, describeTarget(target))
        : { kind: FAILURE_KINDS.TARGET_NOT_FOUND, message: `Target not found: ${describeTarget(target)}` };
      return { method: "structural", success: false, fellBack: false, failure, ...(element ? { element } : {}) };
    }

    const description = target.description ?? target.text ?? (element ? describeElement(element) : describeTarget(target));
    if (fellBack) this.stats.increment("fallbacks");
    const result = await this.runPerceptual(action, description, target, this.perception, this.input, signal);
    if (result.success) this.stats.increment("perceptualActions");
    return { ...result, fellBack };
  }

  private async runUntargeted(action: ControllerAction, signal?: AbortSignal): Promise<PartialOutcome> {
    const timeoutMs = this.config["structural-timeout-ms"];
    const params = action.params ?? {};
    try {
      if (action.type === "scroll" && this.driver.scroll) {
        const scroll = this.driver.scroll.bind(this.driver);
        await withTimeout((s) => scroll(null, params.dx ?? 0, params.dy ?? 0, { timeoutMs, signal: s }), timeoutMs, {
          signal,
          label: "scroll",
        });
        this.stats.increment("structuralActions");
        return { method: "structural", success: true, fellBack: false };
      }
      const input = this.input;
      if (input && action.type === "scroll") {
        await withTimeout(() => input.scroll(params.dx ?? 0, params.dy ?? 0), timeoutMs, { signal, label: "scroll" });
        this.stats.increment("perceptualActions");
        return { method: "perceptual", success: true, fellBack: false };
      }
      if (input && action.type === "type") {
        const text = (params.text ?? "") + (params.pressEnter ? "\n" : "");
        await withTimeout(() => input.typeText(text), timeoutMs, { signal, label: "type" });
        this.stats.increment("perceptualActions");
        return { method: "perceptual", success: true, fellBack: false };
      }
    } catch (err) {
      if (isCancellation(err)) throw err;
      return { method: "structural", success: false, fellBack: false, failure: failureFrom(err, action.type) };
    }
    return {
      method: "structural",
      success: false,
      fellBack: false,
      failure: { kind: FAILURE_KINDS.TARGET_NOT_FOUND, message: `${action.type} needs a target` },
    };
  }

  private async query(selector: string, signal?: AbortSignal): Promise<TNode[]> {
    const timeoutMs = this.config["structural-timeout-ms"];
    try {
      return await withTimeout((s) => this.driver.queryAll(selector, { timeoutMs, signal: s }), timeoutMs, {
        signal,
        label: `query ${selector}`,
      });
    } catch (err) {
      if (isCancellation(err)) throw err;
      this.log.debug(`query ${selector} failed: ${errorMessage(err)}`);
      return [];
    }
  }

  /**
   * Find a live node for a target: selector, then text, then role against the
   * current index. A selector missing from the index is confirmed with queryAll.
   */
  async resolveTarget(input: ActionTarget, signal?: AbortSignal): Promise<Resolved<TNode> | undefined> {
    const target = toDescriptor(input);
    const elements = this.markupIndex?.elements ?? [];
    let element: InteractiveElement | undefined;

    if (target.selector) {
      element = findBySelector(elements, target.selector);
      if (!element) {
        const nodes = await this.query(target.selector, signal);
        if (nodes.length > 0) return { node: nodes[0], selector: target.selector };
      }
    }
    if (!element && target.text) {
      let matches = findByText(elements, target.text, { fuzzy: true });
      if (target.role) {
        const role = target.role.toLowerCase();
        matches = matches.filter((m) => m.role === role);
      }
      element = pickEnabled(matches);
    }
    if (!element && target.role && !target.text) {
      element = pickEnabled(findByRole(elements, target.role));
    }
    if (!element) return undefined;

    const nodes = await this.query(element.selector, signal);
    if (nodes.length === 0) return undefined;
    return { node: nodes[0], selector: element.selector, element };
  }

  private async runStructural(action: ControllerAction, resolved: Resolved<TNode>, signal?: AbortSignal): Promise<void> {
    const timeoutMs = this.config["structural-timeout-ms"];
    const call = (label: string, fn: (s: AbortSignal) => Promise<void>) =>
      withTimeout(fn, timeoutMs, { signal, label: `${label} ${resolved.selector}` });
    const params = action.params ?? {};
    const node = resolved.node;

    switch (action.type) {
      case "click":
        await call("click", (s) => this.driver.click(node, { timeoutMs, signal: s }));
        return;
      case "type": {
        const text = params.text ?? "";
        if (params.clear === false) {
          await this.append(node, text, call, timeoutMs);
        } else {
          await call("fill", (s) => this.driver.fill(node, text, { timeoutMs, signal: s }));
        }
        if (params.pressEnter) {
          const press = this.driver.press?.bind(this.driver);
          const input = this.input;
          if (press) {
            await call("press", (s) => press(node, "Enter", { timeoutMs, signal: s }));
          } else if (input) {
            await call("press", () => input.typeText("\n"));
          }
        }
        return;
      }
      case "scroll": {
        const scroll = this.driver.scroll?.bind(this.driver);
        if (!scroll) throw new EngineError(FAILURE_KINDS.EXECUTION_FAILURE, "driver cannot scroll");
        await call("scroll", (s) => scroll(node, params.dx ?? 0, params.dy ?? 0, { timeoutMs, signal: s }));
        return;
      }
    }
  }

  /** Keep the field's current value: fill with it prefixed, or click and type. */
  private async append(
    node: TNode,
    text: string,
    call: (label: string, fn: (s: AbortSignal) => Promise<void>) => Promise<void>,
    timeoutMs: number,
  ): Promise<void> {
    const readValue = this.driver.inputValue?.bind(this.driver);
    if (readValue) {
      let current = "";
      await call("inputValue", async (s) => {
        current = await readValue(node, { timeoutMs, signal: s });
      });
      await call("fill", (s) => this.driver.fill(node, current + text, { timeoutMs, signal: s }));
      return;
    }
    const input = this.input;
    if (!input) throw new EngineError(FAILURE_KINDS.EXECUTION_FAILURE, "driver cannot append to a field without inputValue");
    await call("focus", (s) => this.driver.click(node, { timeoutMs, signal: s }));
    await call("type", () => input.typeText(text));
  }

  private async runPerceptual(
    action: ControllerAction,
    description: string,
    target: TargetDescriptor,
    perception: PerceptionBackend,
    input: InputBackend,
    signal?: AbortSignal,
  ): Promise<Omit<PartialOutcome, "fellBack">> {
    const perceptionMs = this.config["perception-timeout-ms"];
    const fail = (kind: FailureKind, message: string) => ({
      method: "perceptual" as const,
      success: false,
      failure: { kind, message },
    });

    let image: Buffer;
    try {
      image = await withTimeout((s) => this.driver.screenshot(target.region, { timeoutMs: perceptionMs, signal: s }), perceptionMs, {
        signal,
        label: "screenshot",
      });
    } catch (err) {
      if (isCancellation(err)) throw err;
      return fail(FAILURE_KINDS.CAPTURE_FAILURE, `Screenshot failed: ${errorMessage(err)}`);
    }

    let located: LocateResult | null;
    try {
      located = await withTimeout((s) => perception.locate(image, description, { timeoutMs: perceptionMs, signal: s }), perceptionMs, {
        signal,
        label: "locate",
      });
    } catch (err) {
      if (isCancellation(err)) throw err;
      const e = toEngineError(err, description);
      return fail(e.kind, `Perception failed: ${e.message}`);
    }

    const minConfidence = this.config["min-confidence"];
    if (!located || located.confidence < minConfidence) {
      const why = located ? ` (confidence ${located.confidence.toFixed(2)} < ${minConfidence})` : "";
      return fail(FAILURE_KINDS.TARGET_NOT_FOUND, `Could not locate "${description}"${why}`);
    }

    const point: Point = {
      x: Math.round(located.x + (target.region?.x ?? 0)),
      y: Math.round(located.y + (target.region?.y ?? 0)),
    };
    return this.actAt(action, point, input, description, signal);
  }

  private async actAt(
    action: ControllerAction,
    point: Point,
    input: InputBackend,
    description: string,
    signal?: AbortSignal,
  ): Promise<Omit<PartialOutcome, "fellBack">> {
    const inputMs = this.config["structural-timeout-ms"];
    const params = action.params ?? {};
    const step = (label: string, fn: () => Promise<void>) => withTimeout(fn, inputMs, { signal, label });

    try {
      await step("move", () => input.moveTo(point.x, point.y));
      switch (action.type) {
        case "click":
          await step("click", () => input.click(point.x, point.y));
          break;
        case "type":
          await step("focus", () => input.click(point.x, point.y));
          await step("type", () => input.typeText((params.text ?? "") + (params.pressEnter ? "\n" : "")));
          break;
        case "scroll":
          await step("scroll", () => input.scroll(params.dx ?? 0, params.dy ?? 0));
          break;
      }
    } catch (err) {
      if (isCancellation(err)) throw err;
      const e = toEngineError(err, description);
      return { method: "perceptual", success: false, failure: { kind: e.kind, message: e.message }, point };
    }
    this.notInteractableCount = 0;
    return { method: "perceptual", success: true, point };
  }

  // --- Overlays, verification, loop recovery ---

  private async tryDismiss(signal?: AbortSignal, selectors = OVERLAY_DISMISS_SELECTORS): Promise<boolean> {
    if (!this.config["dismiss-overlays"]) return false;
    const clicked = await dismissOverlays(this.driver, {
      timeoutMs: this.config["structural-timeout-ms"],
      signal,
      selectors,
      logger: this.log,
    });
    if (!clicked) return false;
    this.stats.increment("overlaysDismissed");
    await this.observe({ signal });
    return true;
  }

  private async handleOverlays(signal?: AbortSignal): Promise<void> {
    const firstAction = !this.overlayChecked;
    this.overlayChecked = true;
    const flagged = this.tracker.latest(this.surfaceId)?.flags.overlay ?? false;
    // Generic dialog buttons only once the index has seen an overlay.
    if (flagged) await this.tryDismiss(signal);
    else if (firstAction) await this.tryDismiss(signal, CONSENT_DISMISS_SELECTORS);
  }

  private async verify(expected: ExpectedOutcome, hashBefore?: string, hashAfter?: string, signal?: AbortSignal): Promise<boolean> {
    if (expected.changed !== undefined) {
      const changed = hashBefore === undefined || hashAfter === undefined || hashBefore !== hashAfter;
      if (changed !== expected.changed) return false;
    }
    if (expected.textPresent !== undefined) {
      const text = this.markupIndex?.text ?? "";
      if (!text.includes(normalizeText(expected.textPresent))) return false;
    }
    if (expected.selectorPresent !== undefined) {
      const known = this.markupIndex ? findBySelector(this.markupIndex.elements, expected.selectorPresent) : undefined;
      if (!known && (await this.query(expected.selectorPresent, signal)).length === 0) return false;
    }
    return true;
  }

  private async finish(
    action: ControllerAction,
    partial: PartialOutcome,
    start: number,
    signal?: AbortSignal,
  ): Promise<ActionOutcome> {
    const after = await this.observe({ signal });
    const hashAfter = after?.hash;
    const loopDetected = this.tracker.detectLoop(this.config["loop-window"], this.surfaceId);
    this.trackLoop(loopDetected);

    let verified: boolean | undefined;
    if (partial.success && action.expectedOutcome) {
      verified = await this.verify(action.expectedOutcome, partial.hashBefore, hashAfter, signal);
      this.stats.increment(verified ? "verificationsPassed" : "verificationsFailed");
    }
    if (!partial.success) this.stats.increment("failures");

    return {
      ...partial,
      elapsedMs: performance.now() - start,
      loopDetected,
      ...(verified !== undefined ? { verified } : {}),
      ...(hashAfter ? { hashAfter } : {}),
    };
  }

  private trackLoop(loopDetected: boolean): void {
    if (!loopDetected) {
      this.consecutiveLoops = 0;
      return;
    }
    this.consecutiveLoops++;
    this.stats.increment("loopWarnings");
    if (this.consecutiveLoops < this.config["loop-recovery-threshold"]) return;

    this.log.warn(`${this.consecutiveLoops} consecutive loops on ${this.surfaceId}: resetting gate and index`);
    this.gate.reset();
    this.markupIndex = undefined;
    this.forcePerceptual = true;
    this.consecutiveLoops = 0;
    this.stats.increment("forcedRecoveries");
  }
}
