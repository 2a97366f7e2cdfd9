// conditions.ts — Evaluate verify conditions against the current surface
// Structural evidence first (confidence 1.0), perception as fallback.

import { toDescriptor, type DecisionController } from "./controller.js";
import { EngineError, FAILURE_KINDS, errorMessage } from "./errors.js";
import { describeElement } from "./indexer.js";
import { silentLogger, type Logger } from "./log.js";
import type { VerifyCondition } from "./plan.js";
import { withTimeout } from "./retry.js";
import { foldText, normalizeText } from "./text.js";
import type {
  ActionTarget,
  DetectionMethod,
  InputBackend,
  LocateResult,
  PerceivedElement,
  PerceptionBackend,
  Region,
  StructuralDriver,
  TargetDescriptor,
} from "./types.js";

export type NameKind = "element" | "anchor";

export interface ConditionContext<TNode> {
  controller: DecisionController<TNode>;
  driver: StructuralDriver<TNode>;
  perception?: PerceptionBackend;
  input?: InputBackend;
  /** Budget for each perception call */
  perceptionTimeoutMs: number;
  /** Budget for each structural call */
  structuralTimeoutMs: number;
  signal?: AbortSignal;
  logger?: Logger;
  /** Structural hashes around the step's operation */
  hashBefore?: string;
  hashAfter?: string;
  /** Outcome of region-scoped change checks, keyed by condition */
  regionChanged?: ReadonlyMap<VerifyCondition, boolean>;
  /** Maps a name from an analyzed ScreenState to a live target */
  resolveName?: (name: string, kind: NameKind) => TargetDescriptor | undefined;
}

export interface ConditionResult {
  condition: VerifyCondition;
  passed: boolean;
  confidence: number;
  method?: DetectionMethod;
  detail: string;
}

function targetLabel(target: ActionTarget): string {
  const t = toDescriptor(target);
  return t.selector ?? t.text ?? t.role ?? t.description ?? "?";
}

export function describeCondition(cond: VerifyCondition): string {
  switch (cond.type) {
    case "anchor_visible":
    case "element_found":
      return `${cond.type}(${targetLabel(cond.target)})`;
    case "text_contains":
      return cond.target !== undefined
        ? `text_contains(${targetLabel(cond.target)}, "${cond.text}")`
        : `text_contains("${cond.text}")`;
    case "field_contains":
      return `field_contains(${targetLabel(cond.target)}, "${cond.text}")`;
    case "screen_changed":
    case "screen_unchanged":
      return cond.region
        ? `${cond.type}(${cond.region.x},${cond.region.y},${cond.region.width},${cond.region.height})`
        : cond.type;
    case "cursor_type":
      return `cursor_type(${cond.cursor})`;
  }
}

/** Named targets resolve through the ScreenState first; anything else is text or a selector. */
function descriptorOf<TNode>(target: ActionTarget, ctx: ConditionContext<TNode>, kind: NameKind = "element"): TargetDescriptor {
  if (typeof target === "string") {
    const bound = ctx.resolveName?.(target, kind);
    if (bound) return bound;
  }
  return toDescriptor(target);
}

function isCancellation(err: unknown): boolean {
  return err instanceof EngineError && err.kind === FAILURE_KINDS.CANCELLED;
}

// --- Perception helpers ---

async function capture<TNode>(ctx: ConditionContext<TNode>, region?: Region): Promise<Buffer | undefined> {
  const ms = ctx.perceptionTimeoutMs;
  try {
    return await withTimeout((signal) => ctx.driver.screenshot(region, { timeoutMs: ms, signal }), ms, {
      signal: ctx.signal,
      label: "screenshot",
    });
  } catch (err) {
    if (isCancellation(err)) throw err;
    (ctx.logger ?? silentLogger).warn(`screenshot failed: ${errorMessage(err)}`);
    return undefined;
  }
}

export async function locateVisually<TNode>(
  ctx: ConditionContext<TNode>,
  description: string,
  region?: Region,
): Promise<LocateResult | null> {
  const perception = ctx.perception;
  if (!perception) return null;
  const image = await capture(ctx, region);
  if (!image) return null;
  const ms = ctx.perceptionTimeoutMs;
  try {
    return await withTimeout((signal) => perception.locate(image, description, { timeoutMs: ms, signal }), ms, {
      signal: ctx.signal,
      label: "locate",
    });
  } catch (err) {
    if (isCancellation(err)) throw err;
    (ctx.logger ?? silentLogger).warn(`locate "${description}" failed: ${errorMessage(err)}`);
    return null;
  }
}

export async function describeVisually<TNode>(ctx: ConditionContext<TNode>, region?: Region): Promise<PerceivedElement[]> {
  const perception = ctx.perception;
  if (!perception) return [];
  const image = await capture(ctx, region);
  if (!image) return [];
  const ms = ctx.perceptionTimeoutMs;
  try {
    return await withTimeout((signal) => perception.describeRegion(image, { timeoutMs: ms, signal }), ms, {
      signal: ctx.signal,
      label: "describeRegion",
    });
  } catch (err) {
    if (isCancellation(err)) throw err;
    (ctx.logger ?? silentLogger).warn(`describeRegion failed: ${errorMessage(err)}`);
    return [];
  }
}

export function bestTextMatch(elements: PerceivedElement[], text: string): PerceivedElement | undefined {
  const needle = foldText(text);
  if (!needle) return undefined;
  return elements
    .filter((e) => foldText(`${e.text} ${e.label ?? ""}`).includes(needle))
    .sort((a, b) => b.confidence - a.confidence)[0];
}

// --- Evaluation ---

type Evidence = { confidence: number; method?: DetectionMethod; detail: string };

const STRUCTURAL = (detail: string): Evidence => ({ confidence: 1, method: "structural", detail });
const NONE = (detail: string): Evidence => ({ confidence: 0, detail });

async function visualEvidence<TNode>(
  ctx: ConditionContext<TNode>,
  description: string,
  region?: Region,
): Promise<Evidence> {
  const located = await locateVisually(ctx, description, region);
  if (!located) return NONE(`"${description}" not found`);
  return {
    confidence: located.confidence,
    method: "perceptual",
    detail: `"${description}" located at (${Math.round(located.x)}, ${Math.round(located.y)})`,
  };
}

async function evidenceFor<TNode>(cond: VerifyCondition, ctx: ConditionContext<TNode>): Promise<Evidence> {
  const idx = ctx.controller.getIndex();

  switch (cond.type) {
    case "anchor_visible": {
      const t = descriptorOf(cond.target, ctx, "anchor");
      if (t.selector) {
        if (await ctx.controller.resolveTarget({ selector: t.selector }, ctx.signal)) return STRUCTURAL(`${t.selector} present`);
      } else if (t.text && idx && idx.text.includes(normalizeText(t.text))) {
        return STRUCTURAL(`text "${t.text}" present`);
      } else if (t.role && !t.text && (await ctx.controller.resolveTarget({ role: t.role }, ctx.signal))) {
        return STRUCTURAL(`role ${t.role} present`);
      }
      return visualEvidence(ctx, t.description ?? t.text ?? t.selector ?? t.role ?? "", t.region);
    }

    case "element_found": {
      const t = descriptorOf(cond.target, ctx);
      if (t.selector || t.text || t.role) {
        const resolved = await ctx.controller.resolveTarget(t, ctx.signal);
        if (resolved) {
          return STRUCTURAL(resolved.element ? `found ${describeElement(resolved.element)}` : `found ${resolved.selector}`);
        }
      }
      return visualEvidence(ctx, t.description ?? t.text ?? t.selector ?? t.role ?? "", t.region);
    }

    case "text_contains": {
      const wanted = normalizeText(cond.text);
      if (cond.target === undefined) {
        if (idx && idx.text.includes(wanted)) return STRUCTURAL(`page contains "${cond.text}"`);
      } else {
        const resolved = await ctx.controller.resolveTarget(descriptorOf(cond.target, ctx), ctx.signal);
        const el = resolved?.element;
        if (el && normalizeText(`${el.text} ${el.label ?? ""}`).includes(wanted)) {
          return STRUCTURAL(`${describeElement(el)} contains "${cond.text}"`);
        }
      }
      const region = cond.target !== undefined ? descriptorOf(cond.target, ctx).region : undefined;
      const seen = bestTextMatch(await describeVisually(ctx, region), cond.text);
      return seen
        ? { confidence: seen.confidence, method: "perceptual", detail: `saw "${seen.text}"` }
        : NONE(`"${cond.text}" not on screen`);
    }

    case "field_contains": {
      const target = descriptorOf(cond.target, ctx);
      const resolved = await ctx.controller.resolveTarget(target, ctx.signal);
      const readValue = ctx.driver.inputValue?.bind(ctx.driver);
      if (resolved && readValue) {
        const ms = ctx.structuralTimeoutMs;
        try {
          const value = await withTimeout((signal) => readValue(resolved.node, { timeoutMs: ms, signal }), ms, {
            signal: ctx.signal,
            label: "inputValue",
          });
          if (normalizeText(value).includes(normalizeText(cond.text))) {
            return STRUCTURAL(`field value contains "${cond.text}"`);
          }
          return NONE(`field value is "${value}"`);
        } catch (err) {
          if (isCancellation(err)) throw err;
          (ctx.logger ?? silentLogger).warn(`inputValue failed: ${errorMessage(err)}`);
        }
      }
      const seen = bestTextMatch(await describeVisually(ctx, target.region), cond.text);
      return seen
        ? { confidence: seen.confidence, method: "perceptual", detail: `saw "${seen.text}" in field` }
        : NONE(`field does not contain "${cond.text}"`);
    }

    case "screen_changed":
    case "screen_unchanged": {
      const regional = ctx.regionChanged?.get(cond);
      const changed = regional ?? (ctx.hashBefore === undefined || ctx.hashAfter === undefined || ctx.hashBefore !== ctx.hashAfter);
      const wantChanged = cond.type === "screen_changed";
      const detail = changed ? "screen changed" : "screen unchanged";
      return changed === wantChanged ? STRUCTURAL(detail) : NONE(detail);
    }

    case "cursor_type": {
      const cursorType = ctx.input?.cursorType?.bind(ctx.input);
      if (!cursorType) {
        (ctx.logger ?? silentLogger).warn("cursor_type needs an input backend that reports the cursor");
        return NONE("cursor type unavailable");
      }
      const ms = ctx.structuralTimeoutMs;
      const actual = (await withTimeout(() => cursorType(), ms, { signal: ctx.signal, label: "cursorType" })).toLowerCase();
      return actual === cond.cursor ? STRUCTURAL(`cursor is ${actual}`) : NONE(`cursor is ${actual}`);
    }
  }
}

/** Never throws except on cancellation. */
export async function evaluateCondition<TNode>(cond: VerifyCondition, ctx: ConditionContext<TNode>): Promise<ConditionResult> {
  let evidence: Evidence;
  try {
    evidence = await evidenceFor(cond, ctx);
  } catch (err) {
    if (isCancellation(err)) throw err;
    evidence = NONE(`evaluation failed: ${errorMessage(err)}`);
  }
  return {
    condition: cond,
    passed: evidence.confidence >= cond.minConfidence && evidence.confidence > 0,
    confidence: evidence.confidence,
    ...(evidence.method ? { method: evidence.method } : {}),
    detail: evidence.detail,
  };
}

/** Evaluate in order, stopping at the first failure. */
export async function evaluateAll<TNode>(
  conditions: readonly VerifyCondition[],
  ctx: ConditionContext<TNode>,
): Promise<{ passed: boolean; results: ConditionResult[]; failed?: ConditionResult }> {
  const results: ConditionResult[] = [];
  for (const cond of conditions) {
    const result = await evaluateCondition(cond, ctx);
    results.push(result);
    if (!result.passed) return { passed: false, results, failed: result };
  }
  return { passed: true, results };
}

/** First condition that holds, if any. */
export async function firstMatching<TNode>(
  conditions: readonly VerifyCondition[],
  ctx: ConditionContext<TNode>,
): Promise<ConditionResult | undefined> {
  for (const cond of conditions) {
    const result = await evaluateCondition(cond, ctx);
    if (result.passed) return result;
  }
  return undefined;
}
