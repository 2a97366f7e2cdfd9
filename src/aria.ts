// aria.ts — Interactive elements from a Playwright-style aria snapshot
// Input lines look like `- button "Sign in"`, nested by two-space indentation.
// Pure functions, no dependencies.

import { normalizeText, quoteAttr } from "./text.js";
import type { InteractiveElement } from "./types.js";

export const INTERACTIVE_ROLES = new Set([
  "button", "link", "textbox", "checkbox", "radio", "combobox",
  "listbox", "menuitem", "menuitemcheckbox", "menuitemradio",
  "option", "searchbox", "slider", "spinbutton", "switch",
  "tab", "treeitem",
]);

/** Roles whose accessible name is a label rather than visible text */
const LABELLED_ROLES = new Set(["textbox", "searchbox", "combobox", "spinbutton", "slider", "listbox"]);

export const MODAL_ROLES = new Set(["dialog", "alertdialog"]);

export const OVERLAY_HINT = /cookie|consent|gdpr|onetrust|privacy (banner|settings)/i;

export interface MarkupIndex {
  elements: InteractiveElement[];
  /** Normalized visible text of the whole surface */
  text: string;
  /** A dismissible overlay (consent banner, modal dialog) is present */
  overlay: boolean;
}

function getIndentLevel(line: string): number {
  const match = line.match(/^(\s*)/);
  return match ? Math.floor(match[1].length / 2) : 0;
}

type RoleNameTracker = {
  getKey: (role: string, name: string) => string;
  getNextIndex: (role: string, name: string) => number;
  getDuplicateKeys: () => Set<string>;
};

function createRoleNameTracker(): RoleNameTracker {
  const counts = new Map<string, number>();
  return {
    getKey(role, name) {
      return `${role}:${name}`;
    },
    getNextIndex(role, name) {
      const key = this.getKey(role, name);
      const current = counts.get(key) ?? 0;
      counts.set(key, current + 1);
      return current;
    },
    getDuplicateKeys() {
      const out = new Set<string>();
      for (const [key, count] of counts) {
        if (count > 1) out.add(key);
      }
      return out;
    },
  };
}

export function roleSelector(role: string, name: string, nth?: number): string {
  let selector = `role=${role}`;
  if (name) selector += `[name=${quoteAttr(name)}]`;
  if (nth !== undefined) selector += ` >> nth=${nth}`;
  return selector;
}

type Pending = {
  role: string;
  name: string;
  nth: number;
  ref: string;
  path: string;
  disabled: boolean;
};

export function parseAriaSnapshot(snapshot: string): MarkupIndex {
  const tracker = createRoleNameTracker();
  const pending: Pending[] = [];
  const textParts: string[] = [];
  const ancestors: { depth: number; role: string }[] = [];
  let overlay = false;
  let counter = 0;

  for (const line of snapshot.split("\n")) {
    if (!line.trim()) continue;
    const match = line.match(/^(\s*-\s*)(\w+)(?:\s+"([^"]*)")?(.*)$/);
    if (!match) continue;

    const depth = getIndentLevel(line);
    const role = match[2].toLowerCase();
    const name = match[3] ?? "";
    const suffix = match[4] ?? "";

    while (ancestors.length > 0 && ancestors[ancestors.length - 1].depth >= depth) {
      ancestors.pop();
    }

    if (name) textParts.push(name);
    // `- paragraph: Some text` / `- heading "Title" [level=1]: extra`
    const inline = suffix.match(/^(?:\s*\[[^\]]*\])*\s*:\s*(.+)$/);
    if (inline && !LABELLED_ROLES.has(role)) textParts.push(inline[1]);

    if (MODAL_ROLES.has(role) || (name !== "" && OVERLAY_HINT.test(name))) overlay = true;

    if (INTERACTIVE_ROLES.has(role)) {
      pending.push({
        role,
        name,
        nth: tracker.getNextIndex(role, name),
        ref: `e${++counter}`,
        path: [...ancestors.map((a) => a.role), role].join(" > "),
        disabled: /\[disabled(?:=true)?\]/.test(suffix),
      });
    }

    ancestors.push({ depth, role });
  }

  const duplicates = tracker.getDuplicateKeys();
  const elements = pending.map((p): InteractiveElement => {
    const duplicated = duplicates.has(tracker.getKey(p.role, p.name));
    const labelled = LABELLED_ROLES.has(p.role);
    return {
      id: p.ref,
      tag: p.role,
      role: p.role,
      text: labelled ? "" : p.name,
      normalizedText: labelled ? "" : normalizeText(p.name),
      ...(labelled && p.name ? { label: p.name } : {}),
      selector: roleSelector(p.role, p.name, duplicated ? p.nth : undefined),
      path: duplicated ? `${p.path}[${p.nth}]` : p.path,
      disabled: p.disabled,
    };
  });

  return { elements, text: normalizeText(textParts.join(" ")), overlay };
}
