// overlays.ts — Dismissible overlay table (consent banners, modal close buttons)

import { errorMessage } from "./errors.js";
import { silentLogger, type Logger } from "./log.js";
import { withTimeout } from "./retry.js";
import type { StructuralDriver } from "./types.js";

/** Consent-platform buttons; specific enough to try before the first action. */
export const CONSENT_DISMISS_SELECTORS: readonly string[] = [
  "button#onetrust-accept-btn-handler",
  "#didomi-notice-agree-button",
  ".cmpboxbtnyes",
  ".fc-cta-consent",
  "[data-testid='cookie-banner-accept']",
];

/** Scoped to an open dialog; only tried once an overlay has been seen. */
export const MODAL_DISMISS_SELECTORS: readonly string[] = [
  "[role=dialog] button[aria-label='Accept all']",
  "[role=dialog] button[aria-label='Alle akzeptieren']",
  "[role=dialog] button:has-text('Accept')",
  "[role=dialog] button:has-text('Akzeptieren')",
  "[aria-modal=true] button:has-text('Accept')",
  "[role=dialog] button[aria-label*='close' i]",
  "[aria-modal=true] button[aria-label*='dismiss' i]",
  ".modal.show [data-dismiss='modal']",
  ".modal.show .btn-close",
];

/** Tried in order; the first selector that matches anything is clicked. */
export const OVERLAY_DISMISS_SELECTORS: readonly string[] = [...CONSENT_DISMISS_SELECTORS, ...MODAL_DISMISS_SELECTORS];

export interface DismissOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  selectors?: readonly string[];
  logger?: Logger;
}

/** Returns the selector that was clicked, or undefined when nothing matched. */
export async function dismissOverlays<TNode>(
  driver: StructuralDriver<TNode>,
  opts: DismissOptions,
): Promise<string | undefined> {
  const log = opts.logger ?? silentLogger;
  for (const selector of opts.selectors ?? OVERLAY_DISMISS_SELECTORS) {
    if (opts.signal?.aborted) return undefined;
    try {
      const nodes = await withTimeout(
        (signal) => driver.queryAll(selector, { timeoutMs: opts.timeoutMs, signal }),
        opts.timeoutMs,
        { signal: opts.signal, label: `overlay query ${selector}` },
      );
      if (nodes.length === 0) continue;
      await withTimeout(
        (signal) => driver.click(nodes[0], { timeoutMs: opts.timeoutMs, signal }),
        opts.timeoutMs,
        { signal: opts.signal, label: `overlay click ${selector}` },
      );
      log.info(`dismissed overlay via ${selector}`);
      return selector;
    } catch (err) {
      log.debug(`overlay selector ${selector} skipped: ${errorMessage(err)}`);
    }
  }
  return undefined;
}
