// Unit tests for conditions.ts
// Conditions run against a controller over the fake driver.

import { describe, it, expect } from "vitest";
import { ChangeGate } from "../../src/change-gate.js";
import {
  bestTextMatch,
  describeCondition,
  evaluateAll,
  evaluateCondition,
  firstMatching,
  type ConditionContext,
} from "../../src/conditions.js";
import { DecisionController } from "../../src/controller.js";
import { parseCondition, type ConditionInput } from "../../src/plan.js";
import { StateTracker } from "../../src/state-tracker.js";
import type { InputBackend } from "../../src/types.js";
import { CursorInput, FakeDriver, FakeInput, FakePerception, perceived, rawThumbnailer, type FakeNode } from "../helpers/fakes.js";

const PAGE =
  "<body>" +
  "<h1>Welcome back</h1>" +
  "<p>Order confirmed</p>" +
  '<button id="go">Go</button>' +
  '<input id="q" placeholder="Search">' +
  "</body>";

async function setup(opts: { perception?: FakePerception; input?: InputBackend } = {}) {
  const driver = new FakeDriver(PAGE);
  const controller = new DecisionController({
    surfaceId: "tab",
    driver,
    gate: new ChangeGate({ source: (r) => driver.screenshot(r), thumbnailer: rawThumbnailer }),
    tracker: new StateTracker(),
  });
  await controller.observe();
  const ctx: ConditionContext<FakeNode> = {
    controller,
    driver,
    perceptionTimeoutMs: 1000,
    structuralTimeoutMs: 1000,
    ...(opts.perception ? { perception: opts.perception } : {}),
    ...(opts.input ? { input: opts.input } : {}),
  };
  return { driver, controller, ctx };
}

const cond = (input: ConditionInput) => parseCondition(input);

describe("describeCondition", () => {
  it("renders a compact label", () => {
    expect(describeCondition(cond({ type: "element_found", target: "#x" }))).toBe("element_found(#x)");
    expect(describeCondition(cond({ type: "anchor_visible", target: { role: "dialog" } }))).toBe("anchor_visible(dialog)");
    expect(describeCondition(cond({ type: "text_contains", params: { text: "Hi" } }))).toBe('text_contains("Hi")');
    expect(describeCondition(cond({ type: "text_contains", target: "Total", params: { text: "$5" } }))).toBe(
      'text_contains(Total, "$5")',
    );
    expect(describeCondition(cond({ type: "field_contains", target: "#q", params: { text: "a" } }))).toBe(
      'field_contains(#q, "a")',
    );
    expect(describeCondition(cond({ type: "screen_changed" }))).toBe("screen_changed");
    expect(
      describeCondition(cond({ type: "screen_unchanged", params: { region: { x: 1, y: 2, width: 3, height: 4 } } })),
    ).toBe("screen_unchanged(1,2,3,4)");
    expect(describeCondition(cond({ type: "cursor_type", params: { cursor: "text" } }))).toBe("cursor_type(text)");
  });
});

describe("element_found / anchor_visible", () => {
  it("passes structurally at full confidence", async () => {
    const { ctx } = await setup();
    const result = await evaluateCondition(cond({ type: "element_found", target: "#go" }), ctx);
    expect(result).toMatchObject({
      passed: true,
      confidence: 1,
      method: "structural",
      detail: "found <button id='go' text='Go'>",
    });
  });

  it("fails without perception when nothing matches", async () => {
    const { ctx } = await setup();
    const result = await evaluateCondition(cond({ type: "element_found", target: "#missing" }), ctx);
    expect(result).toMatchObject({ passed: false, confidence: 0, detail: '"#missing" not found' });
    expect(result.method).toBeUndefined();
  });

  it("falls back to locate for descriptions", async () => {
    const perception = new FakePerception();
    perception.located.set("gear icon", { x: 10.4, y: 19.6, confidence: 0.9 });
    const { ctx } = await setup({ perception });
    const result = await evaluateCondition(cond({ type: "element_found", target: { description: "gear icon" } }), ctx);
    expect(result).toMatchObject({
      passed: true,
      confidence: 0.9,
      method: "perceptual",
      detail: '"gear icon" located at (10, 20)',
    });
  });

  it("fails below the condition's minimum confidence", async () => {
    const perception = new FakePerception();
    perception.located.set("gear icon", { x: 1, y: 1, confidence: 0.7 });
    const { ctx } = await setup({ perception });
    const result = await evaluateCondition(cond({ type: "element_found", target: { description: "gear icon" } }), ctx);
    expect(result.passed).toBe(false);
    expect(result.confidence).toBe(0.7);

    const lenient = await evaluateCondition(
      cond({ type: "element_found", target: { description: "gear icon" }, min_confidence: 0.6 }),
      ctx,
    );
    expect(lenient.passed).toBe(true);
  });

  it("anchor_visible checks page text", async () => {
    const { ctx } = await setup();
    const result = await evaluateCondition(cond({ type: "anchor_visible", target: "Welcome Back" }), ctx);
    expect(result).toMatchObject({ passed: true, detail: 'text "Welcome Back" present' });
  });

  it("resolves names through the context before reading them as text", async () => {
    const { ctx } = await setup();
    const seen: string[] = [];
    ctx.resolveName = (name, kind) => {
      seen.push(`${kind} ${name}`);
      if (name === "title") return { text: "Welcome back" };
      if (name === "submit") return { selector: "#go" };
      return undefined;
    };
    expect((await evaluateCondition(cond({ type: "anchor_visible", target: "title" }), ctx)).passed).toBe(true);
    expect((await evaluateCondition(cond({ type: "element_found", target: "submit" }), ctx)).passed).toBe(true);
    expect((await evaluateCondition(cond({ type: "element_found", target: "Go" }), ctx)).passed).toBe(true);
    expect(seen).toEqual(["anchor title", "element submit", "element Go"]);
  });
});

describe("text_contains", () => {
  it("searches page text", async () => {
    const { ctx } = await setup();
    const result = await evaluateCondition(cond({ type: "text_contains", params: { text: "CONFIRMED" } }), ctx);
    expect(result).toMatchObject({ passed: true, method: "structural", detail: 'page contains "CONFIRMED"' });
  });

  it("checks a target's own text", async () => {
    const { ctx } = await setup();
    const hit = await evaluateCondition(cond({ type: "text_contains", target: "#go", params: { text: "go" } }), ctx);
    expect(hit.passed).toBe(true);
    const miss = await evaluateCondition(cond({ type: "text_contains", target: "#go", params: { text: "stop" } }), ctx);
    expect(miss).toMatchObject({ passed: false, detail: '"stop" not on screen' });
  });

  it("uses the best perceived match when the page text lacks it", async () => {
    const perception = new FakePerception();
    perception.perceived = [perceived("Saved!", 0.85), perceived("Saved", 0.92), perceived("Cancel", 0.99)];
    const { ctx } = await setup({ perception });
    const result = await evaluateCondition(cond({ type: "text_contains", params: { text: "saved" } }), ctx);
    expect(result).toMatchObject({ passed: true, confidence: 0.92, method: "perceptual", detail: 'saw "Saved"' });
    expect(perception.calls).toEqual(["describeRegion"]);
  });
});

describe("field_contains", () => {
  it("reads the field value", async () => {
    const { driver, ctx } = await setup();
    driver.values.set("#q", "Hello World");
    const hit = await evaluateCondition(cond({ type: "field_contains", target: "#q", params: { text: "world" } }), ctx);
    expect(hit).toMatchObject({ passed: true, detail: 'field value contains "world"' });

    driver.values.set("#q", "abc");
    const miss = await evaluateCondition(cond({ type: "field_contains", target: "#q", params: { text: "world" } }), ctx);
    expect(miss).toMatchObject({ passed: false, confidence: 0, detail: 'field value is "abc"' });
  });
});

describe("screen_changed / screen_unchanged", () => {
  it("compares the hashes around the operation", async () => {
    const { ctx } = await setup();
    const changed = cond({ type: "screen_changed" });
    const unchanged = cond({ type: "screen_unchanged" });
    expect((await evaluateCondition(changed, { ...ctx, hashBefore: "a", hashAfter: "b" })).passed).toBe(true);
    expect((await evaluateCondition(changed, { ...ctx, hashBefore: "a", hashAfter: "a" })).detail).toBe("screen unchanged");
    expect((await evaluateCondition(unchanged, { ...ctx, hashBefore: "a", hashAfter: "a" })).passed).toBe(true);
  });

  it("treats a missing hash as changed", async () => {
    const { ctx } = await setup();
    expect((await evaluateCondition(cond({ type: "screen_changed" }), { ...ctx, hashAfter: "b" })).passed).toBe(true);
  });

  it("prefers the regional result when present", async () => {
    const { ctx } = await setup();
    const regional = cond({ type: "screen_changed", params: { region: { x: 0, y: 0, width: 5, height: 5 } } });
    const result = await evaluateCondition(regional, {
      ...ctx,
      hashBefore: "a",
      hashAfter: "b",
      regionChanged: new Map([[regional, false]]),
    });
    expect(result).toMatchObject({ passed: false, detail: "screen unchanged" });
  });
});

describe("cursor_type", () => {
  it("fails when the input backend cannot report the cursor", async () => {
    const { ctx } = await setup({ input: new FakeInput() });
    const result = await evaluateCondition(cond({ type: "cursor_type", params: { cursor: "pointer" } }), ctx);
    expect(result).toMatchObject({ passed: false, detail: "cursor type unavailable" });
  });

  it("compares case-insensitively", async () => {
    const { ctx } = await setup({ input: new CursorInput("Pointer") });
    const result = await evaluateCondition(cond({ type: "cursor_type", params: { cursor: "POINTER" } }), ctx);
    expect(result).toMatchObject({ passed: true, detail: "cursor is pointer" });
  });
});

describe("evaluateAll / firstMatching", () => {
  it("stops at the first failure", async () => {
    const { ctx } = await setup();
    const out = await evaluateAll(
      [
        cond({ type: "element_found", target: "#go" }),
        cond({ type: "element_found", target: "#missing" }),
        cond({ type: "element_found", target: "#q" }),
      ],
      ctx,
    );
    expect(out.passed).toBe(false);
    expect(out.results).toHaveLength(2);
    expect(out.failed?.detail).toBe('"#missing" not found');
  });

  it("passes an empty list", async () => {
    const { ctx } = await setup();
    expect(await evaluateAll([], ctx)).toEqual({ passed: true, results: [] });
  });

  it("finds the first condition that holds", async () => {
    const { ctx } = await setup();
    const match = await firstMatching(
      [cond({ type: "text_contains", params: { text: "Error" } }), cond({ type: "text_contains", params: { text: "Order" } })],
      ctx,
    );
    expect(match?.detail).toBe('page contains "Order"');
    expect(await firstMatching([cond({ type: "element_found", target: "#nope" })], ctx)).toBeUndefined();
  });
});

describe("bestTextMatch", () => {
  it("matches text or label, highest confidence first", () => {
    const items = [perceived("Submit", 0.7), perceived("", 0.9, { label: "Submit form" })];
    expect(bestTextMatch(items, "submit")?.confidence).toBe(0.9);
    expect(bestTextMatch(items, "!!!")).toBeUndefined();
  });
});
