// In-process stand-ins for the structural driver, perception and input backends.
// The fake driver resolves selectors against the indexer's own output for its markup.

import { index } from "../../src/indexer.js";
import type { Thumbnailer } from "../../src/change-gate.js";
import type {
  CallOptions,
  InputBackend,
  InteractiveElement,
  LocateResult,
  PerceivedElement,
  PerceptionBackend,
  Region,
  StructuralDriver,
} from "../../src/types.js";

export interface FakeNode {
  selector: string;
  element: InteractiveElement;
}

type Handler = (driver: FakeDriver) => void;

const TAG_ID = /^([a-z][a-z0-9]*)?#([\w-]+)$/i;
const TAG_HAS_TEXT = /^([a-z][a-z0-9]*):has-text\('([^']*)'\)$/i;

function matches(el: InteractiveElement, selector: string): boolean {
  const tagId = TAG_ID.exec(selector);
  if (tagId) return el.id === tagId[2] && (tagId[1] === undefined || el.tag === tagId[1].toLowerCase());
  const hasText = TAG_HAS_TEXT.exec(selector);
  if (hasText) return el.tag === hasText[1].toLowerCase() && el.text.toLowerCase().includes(hasText[2].toLowerCase());
  return el.selector === selector || el.path === selector;
}

export class FakeDriver implements StructuralDriver<FakeNode> {
  markup: string;
  /** Content returned by screenshot(); change it to simulate a visual change */
  frame = "frame-0";
  calls: string[] = [];
  /** Every selector passed to queryAll */
  queries: string[] = [];
  values = new Map<string, string>();
  markupReads = 0;
  screenshots = 0;
  markupError: Error | undefined;
  private clickHandlers = new Map<string, Handler>();
  private failures = new Map<string, { message: string; times: number }>();

  constructor(markup: string) {
    this.markup = markup;
  }

  /** Run `handler` after a successful click on `selector`. */
  onClick(selector: string, handler: Handler): this {
    this.clickHandlers.set(selector, handler);
    return this;
  }

  /** Make the next `times` clicks on `selector` throw `message`. */
  failClick(selector: string, message: string, times = Number.POSITIVE_INFINITY): this {
    this.failures.set(selector, { message, times });
    return this;
  }

  private elements(): InteractiveElement[] {
    return index(this.markup).elements;
  }

  async queryAll(selector: string, _opts?: CallOptions): Promise<FakeNode[]> {
    this.queries.push(selector);
    return this.elements()
      .filter((el) => matches(el, selector))
      .map((element) => ({ selector: element.selector, element }));
  }

  async click(node: FakeNode, _opts?: CallOptions): Promise<void> {
    this.calls.push(`click ${node.selector}`);
    const failure = this.failures.get(node.selector);
    if (failure && failure.times > 0) {
      failure.times--;
      throw new Error(failure.message);
    }
    this.clickHandlers.get(node.selector)?.(this);
  }

  async fill(node: FakeNode, text: string, _opts?: CallOptions): Promise<void> {
    this.calls.push(`fill ${node.selector} ${text}`);
    this.values.set(node.selector, text);
  }

  async press(node: FakeNode, key: string, _opts?: CallOptions): Promise<void> {
    this.calls.push(`press ${node.selector} ${key}`);
  }

  async inputValue(node: FakeNode, _opts?: CallOptions): Promise<string> {
    return this.values.get(node.selector) ?? "";
  }

  async getMarkup(_opts?: CallOptions): Promise<string> {
    this.markupReads++;
    if (this.markupError) throw this.markupError;
    return this.markup;
  }

  async screenshot(region?: Region, _opts?: CallOptions): Promise<Buffer> {
    this.screenshots++;
    const suffix = region ? `@${region.x},${region.y},${region.width},${region.height}` : "";
    return Buffer.from(`${this.frame}${suffix}`);
  }

  async scroll(node: FakeNode | null, dx: number, dy: number, _opts?: CallOptions): Promise<void> {
    this.calls.push(`scroll ${node ? node.selector : "page"} ${dx},${dy}`);
  }
}

export class FakePerception implements PerceptionBackend {
  calls: string[] = [];
  located = new Map<string, LocateResult | null>();
  perceived: PerceivedElement[] = [];

  async locate(_image: Buffer, description: string): Promise<LocateResult | null> {
    this.calls.push(`locate ${description}`);
    return this.located.get(description) ?? null;
  }

  async describeRegion(_image: Buffer): Promise<PerceivedElement[]> {
    this.calls.push("describeRegion");
    return this.perceived.map((p) => ({ ...p }));
  }
}

export class FakeInput implements InputBackend {
  calls: string[] = [];
  cursor: string | undefined;

  async moveTo(x: number, y: number): Promise<void> {
    this.calls.push(`move ${x},${y}`);
  }

  async click(x: number, y: number): Promise<void> {
    this.calls.push(`click ${x},${y}`);
  }

  async typeText(text: string): Promise<void> {
    this.calls.push(`type ${text}`);
  }

  async scroll(dx: number, dy: number): Promise<void> {
    this.calls.push(`scroll ${dx},${dy}`);
  }
}

/** FakeInput that also reports a cursor type. */
export class CursorInput extends FakeInput {
  constructor(cursor: string) {
    super();
    this.cursor = cursor;
  }

  async cursorType(): Promise<string> {
    return this.cursor ?? "default";
  }
}

/** Treats the frame bytes themselves as the thumbnail. */
export const rawThumbnailer: Thumbnailer = async (image) => Uint8Array.from(image);

export function perceived(text: string, confidence: number, extra: Partial<PerceivedElement> = {}): PerceivedElement {
  return {
    id: `p-${text}`,
    tag: "",
    role: "generic",
    text,
    normalizedText: text.toLowerCase(),
    selector: "",
    path: "",
    disabled: false,
    confidence,
    ...extra,
  };
}
