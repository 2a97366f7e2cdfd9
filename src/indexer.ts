// indexer.ts — Element Indexer: interactive elements, page text and overlay flag from markup
// HTML is parsed with htmlparser2 in one walk; input that does not start with "<"
// is treated as an aria snapshot (see aria.ts). Stateless, safe to call concurrently.

import { parseDocument } from "htmlparser2";
import { isTag, isText, type AnyNode, type Element } from "domhandler";
import { INTERACTIVE_ROLES, MODAL_ROLES, parseAriaSnapshot, roleSelector, type MarkupIndex } from "./aria.js";
import { foldText, normalizeText, quoteAttr, truncate } from "./text.js";
import type { InteractiveElement } from "./types.js";

export { normalizeText, foldText } from "./text.js";
export type { MarkupIndex } from "./aria.js";

// --- Tables ---

const INTERACTIVE_TAGS = new Set(["button", "a", "input", "textarea", "select", "summary"]);
const FORM_CONTROLS = new Set(["input", "textarea", "select", "button"]);
const SKIP_TEXT_TAGS = new Set(["script", "style", "noscript", "template", "head"]);
const AFFORDANCE_ATTRS = ["onclick", "ng-click", "@click", "v-on:click"];

const INPUT_ROLES: Record<string, string> = {
  button: "button",
  submit: "button",
  reset: "button",
  image: "button",
  checkbox: "checkbox",
  radio: "radio",
  search: "searchbox",
  range: "slider",
  number: "spinbutton",
};

const OVERLAY_ATTR_HINT = /cookie|consent|gdpr|onetrust|cmpbox|truste|cc-banner/i;

const SAFE_IDENT = /^-?[_a-zA-Z][_a-zA-Z0-9-]*$/;

// Hash-like or state classes change between renders and make poor selectors
const DYNAMIC_CLASS_PATTERNS = [
  /\d{3,}/,
  /^(css|sc|jsx|emotion|svelte|styled)-/i,
  /[_-](?=[a-zA-Z0-9]*\d)[a-zA-Z0-9]{5,}$/,
  /^(is|has)-/,
  /^(active|focus|focused|hover|selected|open|disabled|visible|hidden)$/,
];

export function isDynamicClass(cls: string): boolean {
  return DYNAMIC_CLASS_PATTERNS.some((re) => re.test(cls));
}

// --- DOM helpers ---

function attr(el: Element, name: string): string | undefined {
  const value = el.attribs[name];
  return value === undefined ? undefined : value;
}

function isHidden(el: Element): boolean {
  if ("hidden" in el.attribs) return true;
  if (attr(el, "aria-hidden") === "true") return true;
  if (el.name === "input" && attr(el, "type")?.toLowerCase() === "hidden") return true;
  const style = attr(el, "style")?.replace(/\s+/g, "").toLowerCase() ?? "";
  return style.includes("display:none") || style.includes("visibility:hidden");
}

function collectText(node: AnyNode, out: string[]): void {
  if (isText(node)) {
    out.push(node.data);
    return;
  }
  if (!isTag(node)) return;
  if (SKIP_TEXT_TAGS.has(node.name) || isHidden(node)) return;
  for (const child of node.children) collectText(child, out);
}

function textOf(el: Element): string {
  const parts: string[] = [];
  for (const child of el.children) collectText(child, parts);
  return parts.join(" ").replace(/\s+/g, " ").trim();
}

function classesOf(el: Element): string[] {
  return (attr(el, "class") ?? "").split(/\s+/).filter(Boolean);
}

function explicitRole(el: Element): string | undefined {
  const raw = attr(el, "role")?.trim().toLowerCase();
  return raw ? raw.split(/\s+/)[0] : undefined;
}

function implicitRole(el: Element): string {
  switch (el.name) {
    case "button":
    case "summary":
      return "button";
    case "a":
      return "link";
    case "textarea":
      return "textbox";
    case "select": {
      const size = Number(attr(el, "size") ?? "0");
      return "multiple" in el.attribs || size > 1 ? "listbox" : "combobox";
    }
    case "input":
      return INPUT_ROLES[(attr(el, "type") ?? "text").toLowerCase()] ?? "textbox";
    default:
      return "generic";
  }
}

function isInteractive(el: Element): boolean {
  if (INTERACTIVE_TAGS.has(el.name)) return true;
  const role = explicitRole(el);
  if (role && INTERACTIVE_ROLES.has(role)) return true;
  if (AFFORDANCE_ATTRS.some((a) => a in el.attribs)) return true;
  const editable = attr(el, "contenteditable");
  if (editable !== undefined && editable !== "false") return true;
  const tabindex = attr(el, "tabindex");
  if (tabindex !== undefined) {
    const n = Number.parseInt(tabindex, 10);
    if (!Number.isNaN(n) && n >= 0) return true;
  }
  return false;
}

function isOverlay(el: Element): boolean {
  const role = explicitRole(el);
  if (role && MODAL_ROLES.has(role) && attr(el, "aria-modal") === "true") return true;
  if (el.name === "dialog" && "open" in el.attribs) return true;
  return OVERLAY_ATTR_HINT.test(attr(el, "id") ?? "") || OVERLAY_ATTR_HINT.test(attr(el, "class") ?? "");
}

function nthOfType(el: Element): { index: number; total: number } {
  const siblings = el.parent ? el.parent.children.filter((c): c is Element => isTag(c) && c.name === el.name) : [el];
  return { index: siblings.indexOf(el) + 1, total: siblings.length };
}

// --- HTML walk ---

type Visited = {
  el: Element;
  path: string;
};

type WalkResult = {
  all: Visited[];
  interactive: Visited[];
  textParts: string[];
  labelFor: Map<string, string>;
  byId: Map<string, Element>;
  overlay: boolean;
};

function walk(markup: string): WalkResult {
  const doc = parseDocument(markup);
  const result: WalkResult = {
    all: [],
    interactive: [],
    textParts: [],
    labelFor: new Map(),
    byId: new Map(),
    overlay: false,
  };

  const visit = (node: AnyNode, parentPath: string): void => {
    if (isText(node)) {
      result.textParts.push(node.data);
      return;
    }
    if (!isTag(node)) return;
    if (SKIP_TEXT_TAGS.has(node.name) || isHidden(node)) return;

    const { index, total } = nthOfType(node);
    const step = total > 1 ? `${node.name}:nth-of-type(${index})` : node.name;
    const path = parentPath ? `${parentPath} > ${step}` : step;
    const visited = { el: node, path };
    result.all.push(visited);

    const id = attr(node, "id");
    if (id && !result.byId.has(id)) result.byId.set(id, node);
    if (node.name === "label") {
      const target = attr(node, "for");
      if (target) result.labelFor.set(target, textOf(node));
    }
    if (!result.overlay && isOverlay(node)) result.overlay = true;
    if (isInteractive(node)) result.interactive.push(visited);

    for (const child of node.children) visit(child, path);
  };

  for (const child of doc.children) visit(child, "");
  return result;
}

// --- Selector generation ---

function countBy(items: Visited[], key: (el: Element) => string | undefined): Map<string, number> {
  const counts = new Map<string, number>();
  for (const { el } of items) {
    const k = key(el);
    if (k) counts.set(k, (counts.get(k) ?? 0) + 1);
  }
  return counts;
}

function classSelector(el: Element, all: Visited[]): string | undefined {
  const stable = classesOf(el).filter((c) => SAFE_IDENT.test(c) && !isDynamicClass(c));
  if (stable.length === 0) return undefined;
  const matches = all.filter(({ el: other }) => {
    if (other.name !== el.name) return false;
    const otherClasses = new Set(classesOf(other));
    return stable.every((c) => otherClasses.has(c));
  });
  return matches.length === 1 ? `${el.name}.${stable.join(".")}` : undefined;
}

// --- Element construction ---

type Draft = {
  visited: Visited;
  role: string;
  text: string;
  label?: string;
  placeholder?: string;
  accessibleName: string;
};

function labelOf(el: Element, walked: WalkResult): string | undefined {
  const aria = attr(el, "aria-label")?.trim();
  if (aria) return aria;

  const labelledBy = attr(el, "aria-labelledby");
  if (labelledBy) {
    const text = labelledBy
      .split(/\s+/)
      .map((id) => walked.byId.get(id))
      .filter((ref): ref is Element => ref !== undefined)
      .map(textOf)
      .join(" ")
      .trim();
    if (text) return text;
  }

  if (FORM_CONTROLS.has(el.name)) {
    const id = attr(el, "id");
    const forLabel = id ? walked.labelFor.get(id) : undefined;
    if (forLabel) return forLabel;
    for (let p = el.parent; p && isTag(p); p = p.parent) {
      if (p.name === "label") {
        const wrapped = textOf(p);
        if (wrapped) return wrapped;
        break;
      }
    }
  }

  return attr(el, "title")?.trim() || undefined;
}

function draftOf(visited: Visited, walked: WalkResult): Draft {
  const { el } = visited;
  const role = explicitRole(el) ?? implicitRole(el);
  const inputType = (attr(el, "type") ?? "").toLowerCase();
  const text = el.name === "input" && INPUT_ROLES[inputType] === "button" ? attr(el, "value") ?? "" : textOf(el);
  const label = labelOf(el, walked);
  const placeholder = attr(el, "placeholder")?.trim() || undefined;
  return {
    visited,
    role,
    text,
    ...(label ? { label } : {}),
    ...(placeholder ? { placeholder } : {}),
    accessibleName: label ?? (text || placeholder || ""),
  };
}

function buildElements(walked: WalkResult): InteractiveElement[] {
  const drafts = walked.interactive.map((v) => draftOf(v, walked));

  const idCounts = countBy(walked.all, (el) => attr(el, "id"));
  const testIdCounts = countBy(walked.all, (el) => attr(el, "data-testid"));
  const nameCounts = countBy(walked.all, (el) => {
    const name = attr(el, "name");
    return name && FORM_CONTROLS.has(el.name) ? `${el.name}|${name}` : undefined;
  });

  const roleNameUnique = (draft: Draft): boolean => {
    const folded = foldText(draft.accessibleName);
    if (!folded) return false;
    // role selectors match names by case-insensitive substring
    return drafts.filter((d) => d.role === draft.role && foldText(d.accessibleName).includes(folded)).length === 1;
  };

  let positional = 0;
  return drafts.map((draft): InteractiveElement => {
    const { el, path } = draft.visited;
    positional++;

    const id = attr(el, "id");
    const testId = attr(el, "data-testid");
    const name = attr(el, "name");

    let selector: string | undefined;
    if (id && idCounts.get(id) === 1) {
      selector = SAFE_IDENT.test(id) ? `#${id}` : `[id=${quoteAttr(id)}]`;
    } else if (testId && testIdCounts.get(testId) === 1) {
      selector = `[data-testid=${quoteAttr(testId)}]`;
    } else if (name && FORM_CONTROLS.has(el.name) && nameCounts.get(`${el.name}|${name}`) === 1) {
      selector = `${el.name}[name=${quoteAttr(name)}]`;
    } else {
      selector = classSelector(el, walked.all);
    }
    if (!selector && roleNameUnique(draft)) {
      selector = roleSelector(draft.role, draft.accessibleName);
    }

    const disabled = "disabled" in el.attribs || attr(el, "aria-disabled") === "true";
    return {
      id: id || `e${positional}`,
      tag: el.name,
      role: draft.role,
      text: draft.text,
      normalizedText: normalizeText(draft.text),
      ...(draft.label ? { label: draft.label } : {}),
      ...(draft.placeholder ? { placeholder: draft.placeholder } : {}),
      selector: selector ?? path,
      path,
      disabled,
    };
  });
}

// --- Public API ---

function isHtml(markup: string): boolean {
  return markup.trimStart().startsWith("<");
}

export function index(markup: string): MarkupIndex {
  if (!markup.trim()) return { elements: [], text: "", overlay: false };
  if (!isHtml(markup)) return parseAriaSnapshot(markup);

  const walked = walk(markup);
  return {
    elements: buildElements(walked),
    text: normalizeText(walked.textParts.join(" ")),
    overlay: walked.overlay,
  };
}

export function parse(markup: string): InteractiveElement[] {
  return index(markup).elements;
}

export interface FindTextOptions {
  /** Fold case and strip punctuation before matching */
  fuzzy?: boolean;
}

/**
 * Elements whose text, label or placeholder contains the query.
 * Elements whose text equals the query sort first; otherwise document order.
 */
export function findByText(
  elements: readonly InteractiveElement[],
  query: string,
  opts: FindTextOptions = {},
): InteractiveElement[] {
  const prep = opts.fuzzy ? foldText : (s: string) => s;
  const needle = prep(query.trim());
  if (!needle) return [];

  const scored: { el: InteractiveElement; exact: boolean; order: number }[] = [];
  elements.forEach((el, order) => {
    const fields = [el.text, el.label ?? "", el.placeholder ?? ""].map(prep);
    if (!fields.some((f) => f.includes(needle))) return;
    scored.push({ el, exact: fields.some((f) => f === needle), order });
  });
  scored.sort((a, b) => Number(b.exact) - Number(a.exact) || a.order - b.order);
  return scored.map((s) => s.el);
}

export function findByRole(elements: readonly InteractiveElement[], role: string): InteractiveElement[] {
  const wanted = role.trim().toLowerCase();
  return elements.filter((el) => el.role === wanted);
}

export function findBySelector(
  elements: readonly InteractiveElement[],
  selector: string,
): InteractiveElement | undefined {
  const wanted = selector.trim();
  return elements.find((el) => el.selector === wanted || el.path === wanted || (wanted.startsWith("#") && el.id === wanted.slice(1)));
}

export function describeElement(el: InteractiveElement): string {
  const parts = [el.tag];
  if (el.role !== el.tag) parts.push(`role='${el.role}'`);
  if (!/^e\d+$/.test(el.id)) parts.push(`id='${el.id}'`);
  if (el.label) {
    parts.push(`label='${el.label}'`);
  } else if (el.text) {
    parts.push(`text='${truncate(el.text, 30)}'`);
  } else if (el.placeholder) {
    parts.push(`placeholder='${el.placeholder}'`);
  }
  if (el.disabled) parts.push("disabled");
  return `<${parts.join(" ")}>`;
}
