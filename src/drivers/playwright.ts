// drivers/playwright.ts — Structural driver and input backend over a playwright-core Page
// Locators are the node handles. Playwright errors leave here as EngineErrors.

import type { Locator, Page } from "playwright-core";
import { EngineError, FAILURE_KINDS, errorMessage, toEngineError } from "../errors.js";
import { silentLogger, type Logger } from "../log.js";
import type { CallOptions, FrameSource, InputBackend, Point, Region, StructuralDriver } from "../types.js";

export type MarkupMode = "html" | "aria";

export interface PlaywrightDriverOptions {
  /** "html" reads page.content(); "aria" reads the accessibility snapshot of `root` */
  markup?: MarkupMode;
  /** Root for aria snapshots (default ":root") */
  root?: string;
  logger?: Logger;
}

async function guard<T>(log: Logger, label: string, opts: CallOptions, fn: () => Promise<T>): Promise<T> {
  if (opts.signal?.aborted) {
    throw new EngineError(FAILURE_KINDS.CANCELLED, `${label} cancelled`, { cause: opts.signal.reason });
  }
  try {
    return await fn();
  } catch (error) {
    log.debug(`${label} failed: ${errorMessage(error)}`);
    throw toEngineError(error, label);
  }
}

// --- Structural ---

export class PlaywrightDriver implements StructuralDriver<Locator> {
  private readonly page: Page;
  private readonly markup: MarkupMode;
  private readonly root: string;
  private readonly log: Logger;

  constructor(page: Page, opts: PlaywrightDriverOptions = {}) {
    this.page = page;
    this.markup = opts.markup ?? "html";
    this.root = opts.root ?? ":root";
    this.log = opts.logger ?? silentLogger;
  }

  /** Frame source for a ChangeGate watching this page. */
  get frames(): FrameSource {
    return (region) => this.screenshot(region);
  }

  queryAll(selector: string, opts: CallOptions = {}): Promise<Locator[]> {
    return guard(this.log, selector, opts, () => this.page.locator(selector).all());
  }

  click(node: Locator, opts: CallOptions = {}): Promise<void> {
    return guard(this.log, String(node), opts, () => node.click({ timeout: opts.timeoutMs }));
  }

  fill(node: Locator, text: string, opts: CallOptions = {}): Promise<void> {
    return guard(this.log, String(node), opts, () => node.fill(text, { timeout: opts.timeoutMs }));
  }

  press(node: Locator, key: string, opts: CallOptions = {}): Promise<void> {
    return guard(this.log, String(node), opts, () => node.press(key, { timeout: opts.timeoutMs }));
  }

  inputValue(node: Locator, opts: CallOptions = {}): Promise<string> {
    return guard(this.log, String(node), opts, () => node.inputValue({ timeout: opts.timeoutMs }));
  }

  getMarkup(opts: CallOptions = {}): Promise<string> {
    if (this.markup === "aria") {
      return guard(this.log, "aria snapshot", opts, () =>
        this.page.locator(this.root).ariaSnapshot({ timeout: opts.timeoutMs }),
      );
    }
    return guard(this.log, "page content", opts, () => this.page.content());
  }

  screenshot(region?: Region, opts: CallOptions = {}): Promise<Buffer> {
    return guard(this.log, "screenshot", opts, () =>
      this.page.screenshot({
        type: "png",
        timeout: opts.timeoutMs,
        ...(region ? { clip: { x: region.x, y: region.y, width: region.width, height: region.height } } : {}),
      }),
    );
  }

  /** Bring `node` into view, then wheel by (dx, dy). */
  scroll(node: Locator | null, dx: number, dy: number, opts: CallOptions = {}): Promise<void> {
    return guard(this.log, node ? String(node) : "scroll", opts, async () => {
      if (node) await node.scrollIntoViewIfNeeded({ timeout: opts.timeoutMs });
      if (dx !== 0 || dy !== 0) await this.page.mouse.wheel(dx, dy);
    });
  }
}

// --- Coordinate input ---

export class PlaywrightInput implements InputBackend {
  private readonly page: Page;
  private readonly log: Logger;
  private pointer: Point = { x: 0, y: 0 };

  constructor(page: Page, opts: { logger?: Logger } = {}) {
    this.page = page;
    this.log = opts.logger ?? silentLogger;
  }

  async moveTo(x: number, y: number): Promise<void> {
    await guard(this.log, "mouse move", {}, () => this.page.mouse.move(x, y));
    this.pointer = { x, y };
  }

  async click(x: number, y: number): Promise<void> {
    await guard(this.log, "mouse click", {}, () => this.page.mouse.click(x, y));
    this.pointer = { x, y };
  }

  /** Newlines are sent as Enter presses. */
  typeText(text: string): Promise<void> {
    return guard(this.log, "keyboard", {}, async () => {
      const lines = text.split("\n");
      for (let i = 0; i < lines.length; i++) {
        if (lines[i]) await this.page.keyboard.type(lines[i]);
        if (i < lines.length - 1) await this.page.keyboard.press("Enter");
      }
    });
  }

  scroll(dx: number, dy: number): Promise<void> {
    return guard(this.log, "mouse wheel", {}, () => this.page.mouse.wheel(dx, dy));
  }

  /** Computed CSS cursor of the element under the last pointer position. */
  cursorType(): Promise<string> {
    return guard(this.log, "cursor", {}, () =>
      this.page.evaluate(({ x, y }) => {
        const el = document.elementFromPoint(x, y);
        return el ? window.getComputedStyle(el).cursor : "default";
      }, this.pointer),
    );
  }
}

/** Driver, input backend and frame source sharing one page. */
export function playwrightBackends(
  page: Page,
  opts: PlaywrightDriverOptions = {},
): { driver: PlaywrightDriver; input: PlaywrightInput; frames: FrameSource } {
  const driver = new PlaywrightDriver(page, opts);
  return { driver, input: new PlaywrightInput(page, { logger: opts.logger }), frames: driver.frames };
}
