// Unit tests for drivers/playwright.ts
// A hand-built Page stand-in records the calls; no browser is started.

import { describe, it, expect, vi } from "vitest";
import type { Locator, Page } from "playwright-core";
import { PlaywrightDriver, PlaywrightInput, playwrightBackends } from "../../src/drivers/playwright.js";
import { EngineError, FAILURE_KINDS } from "../../src/errors.js";

function mockLocator(name: string) {
  return {
    toString: () => `locator('${name}')`,
    all: vi.fn(async (): Promise<Locator[]> => []),
    click: vi.fn(async (_opts?: { timeout?: number }) => {}),
    fill: vi.fn(async (_text: string, _opts?: { timeout?: number }) => {}),
    press: vi.fn(async (_key: string, _opts?: { timeout?: number }) => {}),
    inputValue: vi.fn(async (_opts?: { timeout?: number }) => "typed"),
    ariaSnapshot: vi.fn(async (_opts?: { timeout?: number }) => '- button "OK"'),
    scrollIntoViewIfNeeded: vi.fn(async (_opts?: { timeout?: number }) => {}),
  };
}

type MockLocator = ReturnType<typeof mockLocator>;

function createMockPage() {
  const locators = new Map<string, MockLocator>();
  const mocks = {
    locator: vi.fn((selector: string) => {
      const existing = locators.get(selector);
      if (existing) return existing;
      const created = mockLocator(selector);
      locators.set(selector, created);
      return created;
    }),
    content: vi.fn(async () => "<html><body><button>OK</button></body></html>"),
    screenshot: vi.fn(async (_opts?: object) => Buffer.from("png")),
    evaluate: vi.fn(async (_fn: unknown, _arg: unknown) => "pointer"),
    mouse: {
      move: vi.fn(async (_x: number, _y: number) => {}),
      click: vi.fn(async (_x: number, _y: number) => {}),
      wheel: vi.fn(async (_dx: number, _dy: number) => {}),
    },
    keyboard: {
      type: vi.fn(async (_text: string) => {}),
      press: vi.fn(async (_key: string) => {}),
    },
  };
  const page = mocks as unknown as Page;
  const locatorFor = (selector: string): MockLocator => {
    const found = locators.get(selector);
    if (!found) throw new Error(`no locator for ${selector}`);
    return found;
  };
  return { page, mocks, locatorFor };
}

function asLocator(mock: MockLocator): Locator {
  return mock as unknown as Locator;
}

async function caught(promise: Promise<unknown>): Promise<EngineError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof EngineError) return err;
    throw err;
  }
  throw new Error("expected an EngineError");
}

describe("PlaywrightDriver", () => {
  it("queryAll resolves a page locator", async () => {
    const { page, mocks, locatorFor } = createMockPage();
    const driver = new PlaywrightDriver(page);
    await driver.queryAll("#go");
    expect(mocks.locator).toHaveBeenCalledWith("#go");
    expect(locatorFor("#go").all).toHaveBeenCalledTimes(1);
  });

  it("passes the call timeout to locator actions", async () => {
    const { page } = createMockPage();
    const driver = new PlaywrightDriver(page);
    const node = mockLocator("#q");
    await driver.click(asLocator(node), { timeoutMs: 1500 });
    await driver.fill(asLocator(node), "hello", { timeoutMs: 1500 });
    await driver.press(asLocator(node), "Enter", { timeoutMs: 1500 });
    expect(await driver.inputValue(asLocator(node), { timeoutMs: 1500 })).toBe("typed");
    expect(node.click).toHaveBeenCalledWith({ timeout: 1500 });
    expect(node.fill).toHaveBeenCalledWith("hello", { timeout: 1500 });
    expect(node.press).toHaveBeenCalledWith("Enter", { timeout: 1500 });
  });

  it("maps visibility timeouts to target_not_found", async () => {
    const { page } = createMockPage();
    const driver = new PlaywrightDriver(page);
    const node = mockLocator("#go");
    node.click.mockRejectedValueOnce(new Error("Timeout 2000ms exceeded.\nwaiting for locator('#go') to be visible"));
    const err = await caught(driver.click(asLocator(node)));
    expect(err.kind).toBe(FAILURE_KINDS.TARGET_NOT_FOUND);
    expect(err.message).toBe(`Element "locator('#go')" not found or not visible`);
  });

  it("maps strict mode violations", async () => {
    const { page } = createMockPage();
    const driver = new PlaywrightDriver(page);
    const node = mockLocator("button");
    node.click.mockRejectedValueOnce(new Error("strict mode violation: locator('button') resolved to 3 elements"));
    const err = await caught(driver.click(asLocator(node)));
    expect(err.kind).toBe(FAILURE_KINDS.EXECUTION_FAILURE);
    expect(err.message).toBe(`Selector "locator('button')" matched 3 elements`);
  });

  it("reads html or aria markup", async () => {
    const { page, mocks, locatorFor } = createMockPage();
    expect(await new PlaywrightDriver(page).getMarkup()).toBe("<html><body><button>OK</button></body></html>");
    expect(mocks.content).toHaveBeenCalledTimes(1);

    const aria = new PlaywrightDriver(page, { markup: "aria", root: "main" });
    expect(await aria.getMarkup({ timeoutMs: 800 })).toBe('- button "OK"');
    expect(locatorFor("main").ariaSnapshot).toHaveBeenCalledWith({ timeout: 800 });
  });

  it("clips screenshots to a region", async () => {
    const { page, mocks } = createMockPage();
    const driver = new PlaywrightDriver(page);
    await driver.screenshot({ x: 1, y: 2, width: 30, height: 40 }, { timeoutMs: 900 });
    await driver.screenshot();
    expect(mocks.screenshot).toHaveBeenNthCalledWith(1, {
      type: "png",
      timeout: 900,
      clip: { x: 1, y: 2, width: 30, height: 40 },
    });
    expect(mocks.screenshot).toHaveBeenNthCalledWith(2, { type: "png", timeout: undefined });
  });

  it("scrolls a node into view before wheeling", async () => {
    const { page, mocks } = createMockPage();
    const driver = new PlaywrightDriver(page);
    const node = mockLocator("#list");
    await driver.scroll(asLocator(node), 0, 200);
    expect(node.scrollIntoViewIfNeeded).toHaveBeenCalledTimes(1);
    expect(mocks.mouse.wheel).toHaveBeenCalledWith(0, 200);

    await driver.scroll(asLocator(node), 0, 0);
    expect(mocks.mouse.wheel).toHaveBeenCalledTimes(1);
  });

  it("refuses calls on an aborted signal", async () => {
    const { page, mocks } = createMockPage();
    const driver = new PlaywrightDriver(page);
    const controller = new AbortController();
    controller.abort();
    const err = await caught(driver.screenshot(undefined, { signal: controller.signal }));
    expect(err.kind).toBe(FAILURE_KINDS.CANCELLED);
    expect(err.message).toBe("screenshot cancelled");
    expect(mocks.screenshot).not.toHaveBeenCalled();
  });
});

describe("PlaywrightInput", () => {
  it("moves, clicks and scrolls the mouse", async () => {
    const { page, mocks } = createMockPage();
    const input = new PlaywrightInput(page);
    await input.moveTo(10, 20);
    await input.click(10, 20);
    await input.scroll(0, -100);
    expect(mocks.mouse.move).toHaveBeenCalledWith(10, 20);
    expect(mocks.mouse.click).toHaveBeenCalledWith(10, 20);
    expect(mocks.mouse.wheel).toHaveBeenCalledWith(0, -100);
  });

  it("sends newlines as Enter presses", async () => {
    const { page, mocks } = createMockPage();
    const input = new PlaywrightInput(page);
    await input.typeText("first\nsecond\n");
    expect(mocks.keyboard.type.mock.calls).toEqual([["first"], ["second"]]);
    expect(mocks.keyboard.press.mock.calls).toEqual([["Enter"], ["Enter"]]);
  });

  it("reads the cursor under the last pointer position", async () => {
    const { page, mocks } = createMockPage();
    const input = new PlaywrightInput(page);
    await input.moveTo(5, 6);
    expect(await input.cursorType()).toBe("pointer");
    expect(mocks.evaluate.mock.calls[0][1]).toEqual({ x: 5, y: 6 });
  });
});

describe("playwrightBackends", () => {
  it("shares one page between driver, input and frames", async () => {
    const { page, mocks } = createMockPage();
    const { driver, input, frames } = playwrightBackends(page);
    expect(driver).toBeInstanceOf(PlaywrightDriver);
    expect(input).toBeInstanceOf(PlaywrightInput);
    expect((await frames()).toString()).toBe("png");
    expect(mocks.screenshot).toHaveBeenCalledTimes(1);
  });
});
