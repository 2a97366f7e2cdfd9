// plan.ts — Plan, condition, anchor and target schemas
// Plans arrive as snake_case JSON (what an agent emits) and leave as a closed,
// camelCase tagged union. Anything invalid is rejected here, before execution.

import { z } from "zod";
import { PlanValidationError } from "./errors.js";
import type { ActionTarget, AnchorType, Region, TargetDescriptor } from "./types.js";

// --- Primitives ---

const RegionSchema = z.object({
  x: z.number().min(0),
  y: z.number().min(0),
  width: z.number().positive(),
  height: z.number().positive(),
});

const DescriptorSchema = z
  .object({
    selector: z.string().min(1).optional(),
    text: z.string().min(1).optional(),
    role: z.string().min(1).optional(),
    description: z.string().min(1).optional(),
    region: RegionSchema.optional(),
  })
  .strict()
  .refine((t) => Boolean(t.selector || t.text || t.role || t.description), {
    message: "target needs one of selector, text, role or description",
  });

const TargetSchema = z.union([z.string().trim().min(1), DescriptorSchema]);

const Confidence = z.number().min(0).max(1);

// --- Conditions ---

export const CONDITION_TYPES = [
  "anchor_visible",
  "element_found",
  "text_contains",
  "field_contains",
  "screen_changed",
  "screen_unchanged",
  "cursor_type",
] as const;

export type ConditionType = (typeof CONDITION_TYPES)[number];

const ConditionBase = z.object({
  min_confidence: Confidence.optional(),
});

const TextParams = z.object({ text: z.string().min(1) }).strict();

const ConditionSchema = z.discriminatedUnion("type", [
  ConditionBase.extend({
    type: z.literal("anchor_visible"),
    target: TargetSchema,
    params: z.object({}).strict().optional(),
  }).strict(),
  ConditionBase.extend({
    type: z.literal("element_found"),
    target: TargetSchema,
    params: z.object({}).strict().optional(),
  }).strict(),
  ConditionBase.extend({
    type: z.literal("text_contains"),
    target: TargetSchema.optional(),
    params: TextParams,
  }).strict(),
  ConditionBase.extend({
    type: z.literal("field_contains"),
    target: TargetSchema,
    params: TextParams,
  }).strict(),
  ConditionBase.extend({
    type: z.literal("screen_changed"),
    params: z.object({ region: RegionSchema.optional() }).strict().optional(),
  }).strict(),
  ConditionBase.extend({
    type: z.literal("screen_unchanged"),
    params: z.object({ region: RegionSchema.optional() }).strict().optional(),
  }).strict(),
  ConditionBase.extend({
    type: z.literal("cursor_type"),
    params: z.object({ cursor: z.string().min(1) }).strict(),
  }).strict(),
]);

export type ConditionInput = z.input<typeof ConditionSchema>;
type ParsedCondition = z.infer<typeof ConditionSchema>;

type ConditionCommon = { minConfidence: number };

export type VerifyCondition =
  | (ConditionCommon & { type: "anchor_visible"; target: ActionTarget })
  | (ConditionCommon & { type: "element_found"; target: ActionTarget })
  | (ConditionCommon & { type: "text_contains"; text: string; target?: ActionTarget })
  | (ConditionCommon & { type: "field_contains"; target: ActionTarget; text: string })
  | (ConditionCommon & { type: "screen_changed"; region?: Region })
  | (ConditionCommon & { type: "screen_unchanged"; region?: Region })
  | (ConditionCommon & { type: "cursor_type"; cursor: string });

function toCondition(input: ParsedCondition, minConfidence: number): VerifyCondition {
  const common = { minConfidence: input.min_confidence ?? minConfidence };
  switch (input.type) {
    case "anchor_visible":
    case "element_found":
      return { ...common, type: input.type, target: input.target };
    case "text_contains":
      return {
        ...common,
        type: "text_contains",
        text: input.params.text,
        ...(input.target !== undefined ? { target: input.target } : {}),
      };
    case "field_contains":
      return { ...common, type: "field_contains", target: input.target, text: input.params.text };
    case "screen_changed":
    case "screen_unchanged":
      return { ...common, type: input.type, ...(input.params?.region ? { region: input.params.region } : {}) };
    case "cursor_type":
      return { ...common, type: "cursor_type", cursor: input.params.cursor.toLowerCase() };
  }
}

// --- Steps ---

const StepBase = z.object({
  verify_before: z.array(ConditionSchema).optional(),
  verify_after: z.array(ConditionSchema).optional(),
  retries: z.number().int().min(0).max(10).optional(),
  timeout_ms: z.number().int().positive().optional(),
});

const ScrollParams = z
  .object({
    dx: z.number().optional(),
    dy: z.number().optional(),
    direction: z.enum(["up", "down", "left", "right"]).optional(),
    amount: z.number().positive().optional(),
  })
  .strict();

const StepSchema = z.discriminatedUnion("op", [
  StepBase.extend({
    op: z.literal("click"),
    target: TargetSchema,
  }).strict(),
  StepBase.extend({
    op: z.literal("type"),
    target: TargetSchema.optional(),
    params: z
      .object({
        text: z.string(),
        clear: z.boolean().optional(),
        press_enter: z.boolean().optional(),
      })
      .strict(),
  }).strict(),
  StepBase.extend({
    op: z.literal("wait"),
    params: z.object({ duration_ms: z.number().int().min(0).max(600_000).optional() }).strict().optional(),
  }).strict(),
  StepBase.extend({
    op: z.literal("verify"),
  }).strict(),
  StepBase.extend({
    op: z.literal("scroll"),
    target: TargetSchema.optional(),
    params: ScrollParams.optional(),
  }).strict(),
]);

type StepInput = z.infer<typeof StepSchema>;

type StepCommon = {
  verifyBefore: VerifyCondition[];
  verifyAfter: VerifyCondition[];
  /** Retries after the first attempt */
  retries: number;
  timeoutMs: number;
};

export type ClickStep = StepCommon & { op: "click"; target: ActionTarget };
export type TypeStep = StepCommon & { op: "type"; target?: ActionTarget; text: string; clear: boolean; pressEnter: boolean };
export type WaitStep = StepCommon & { op: "wait"; durationMs: number };
export type VerifyStep = StepCommon & { op: "verify" };
export type ScrollStep = StepCommon & { op: "scroll"; target?: ActionTarget; dx: number; dy: number };

export type ActionStep = ClickStep | TypeStep | WaitStep | VerifyStep | ScrollStep;

export const DEFAULT_SCROLL_AMOUNT = 500;
export const DEFAULT_WAIT_MS = 1000;

function scrollDelta(params: z.infer<typeof ScrollParams> | undefined): { dx: number; dy: number } {
  if (!params) return { dx: 0, dy: DEFAULT_SCROLL_AMOUNT };
  if (params.direction) {
    const amount = params.amount ?? DEFAULT_SCROLL_AMOUNT;
    switch (params.direction) {
      case "up":
        return { dx: 0, dy: -amount };
      case "down":
        return { dx: 0, dy: amount };
      case "left":
        return { dx: -amount, dy: 0 };
      case "right":
        return { dx: amount, dy: 0 };
    }
  }
  return { dx: params.dx ?? 0, dy: params.dy ?? 0 };
}

function toStep(input: StepInput, defaults: PlanDefaults): ActionStep {
  const common: StepCommon = {
    verifyBefore: (input.verify_before ?? []).map((c) => toCondition(c, defaults.minConfidence)),
    verifyAfter: (input.verify_after ?? []).map((c) => toCondition(c, defaults.minConfidence)),
    retries: input.retries ?? defaults.retries,
    timeoutMs: input.timeout_ms ?? defaults.timeoutMs,
  };
  switch (input.op) {
    case "click":
      return { ...common, op: "click", target: input.target };
    case "type":
      return {
        ...common,
        op: "type",
        ...(input.target !== undefined ? { target: input.target } : {}),
        text: input.params.text,
        clear: input.params.clear ?? true,
        pressEnter: input.params.press_enter ?? false,
      };
    case "wait":
      return { ...common, op: "wait", durationMs: input.params?.duration_ms ?? DEFAULT_WAIT_MS };
    case "verify":
      return { ...common, op: "verify" };
    case "scroll":
      return {
        ...common,
        op: "scroll",
        ...(input.target !== undefined ? { target: input.target } : {}),
        ...scrollDelta(input.params),
      };
  }
}

// --- Plans ---

const PlanSchema = z
  .object({
    goal: z.string().min(1),
    screen_id: z.string().min(1).optional(),
    steps: z.array(StepSchema).min(1),
    abort_conditions: z.array(ConditionSchema).optional(),
    deadline_ms: z.number().int().positive().optional(),
    min_confidence: Confidence.optional(),
  })
  .strict();

export type PlanInput = z.input<typeof PlanSchema>;

export const PLAN_BRAND: unique symbol = Symbol("steadyhand.plan");

export type ActionPlan = {
  readonly goal: string;
  readonly screenId?: string;
  readonly steps: readonly ActionStep[];
  readonly abortConditions: readonly VerifyCondition[];
  readonly deadlineMs: number;
  readonly [PLAN_BRAND]: true;
};

export interface PlanDefaults {
  retries: number;
  timeoutMs: number;
  minConfidence: number;
  deadlineMs: number;
}

export const PLAN_DEFAULTS: PlanDefaults = {
  retries: 2,
  timeoutMs: 5000,
  minConfidence: 0.8,
  deadlineMs: 120_000,
};

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message));
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/** Validate plan input. Throws PlanValidationError listing every problem. */
export function parsePlan(input: unknown, defaults: Partial<PlanDefaults> = {}): ActionPlan {
  const merged: PlanDefaults = { ...PLAN_DEFAULTS, ...defaults };
  const parsed = PlanSchema.safeParse(input);
  if (!parsed.success) throw new PlanValidationError(issuesOf(parsed.error));

  const data = parsed.data;
  const stepDefaults = { ...merged, minConfidence: data.min_confidence ?? merged.minConfidence };
  return deepFreeze({
    goal: data.goal,
    ...(data.screen_id ? { screenId: data.screen_id } : {}),
    steps: data.steps.map((s) => toStep(s, stepDefaults)),
    abortConditions: (data.abort_conditions ?? []).map((c) => toCondition(c, stepDefaults.minConfidence)),
    deadlineMs: data.deadline_ms ?? merged.deadlineMs,
    [PLAN_BRAND]: true as const,
  });
}

export function isActionPlan(value: unknown): value is ActionPlan {
  return typeof value === "object" && value !== null && PLAN_BRAND in value;
}

/** Validate a single condition, e.g. for a one-off verify call. */
export function parseCondition(input: unknown, minConfidence = PLAN_DEFAULTS.minConfidence): VerifyCondition {
  const parsed = ConditionSchema.safeParse(input);
  if (!parsed.success) throw new PlanValidationError(issuesOf(parsed.error));
  return toCondition(parsed.data, minConfidence);
}

// --- Anchors and targets for analyzeState ---

const AnchorSchema = z
  .object({
    name: z.string().min(1),
    type: z.enum(["text", "element", "template"]),
    text: z.string().min(1).optional(),
    selector: z.string().min(1).optional(),
    template: z.string().min(1).optional(),
    expectedLocation: z.string().min(1).optional(),
    minConfidence: Confidence.optional(),
  })
  .strict()
  .superRefine((a, ctx) => {
    if (a.type === "text" && !a.text) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "text is required for text anchors", path: ["text"] });
    }
    if (a.type === "element" && !a.selector && !a.text) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "selector or text is required for element anchors",
        path: ["selector"],
      });
    }
    if (a.type === "template" && !a.template) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "template is required for template anchors", path: ["template"] });
    }
  });

export type ScreenAnchor = {
  name: string;
  type: AnchorType;
  text?: string;
  selector?: string;
  /** Description handed to the perception backend's locate() */
  template?: string;
  expectedLocation?: string;
  minConfidence?: number;
};

const TargetSpecSchema = z
  .object({
    name: z.string().min(1),
    selector: z.string().min(1).optional(),
    text: z.string().min(1).optional(),
    role: z.string().min(1).optional(),
    description: z.string().min(1).optional(),
    region: RegionSchema.optional(),
    minConfidence: Confidence.optional(),
  })
  .strict()
  .refine((t) => Boolean(t.selector || t.text || t.role || t.description), {
    message: "target needs one of selector, text, role or description",
  });

export type TargetSpec = TargetDescriptor & {
  name: string;
  minConfidence?: number;
};

function uniqueNames(items: { name: string }[], kind: string): string[] {
  const seen = new Set<string>();
  const issues: string[] = [];
  for (const item of items) {
    if (seen.has(item.name)) issues.push(`duplicate ${kind} name "${item.name}"`);
    seen.add(item.name);
  }
  return issues;
}

export function parseAnchors(input: unknown): ScreenAnchor[] {
  const parsed = z.array(AnchorSchema).safeParse(input);
  if (!parsed.success) throw new PlanValidationError(issuesOf(parsed.error).map((m) => `anchors.${m}`));
  const dupes = uniqueNames(parsed.data, "anchor");
  if (dupes.length > 0) throw new PlanValidationError(dupes);
  return parsed.data;
}

export function parseTargets(input: unknown): TargetSpec[] {
  const parsed = z.array(TargetSpecSchema).safeParse(input);
  if (!parsed.success) throw new PlanValidationError(issuesOf(parsed.error).map((m) => `targets.${m}`));
  const dupes = uniqueNames(parsed.data, "target");
  if (dupes.length > 0) throw new PlanValidationError(dupes);
  return parsed.data;
}
