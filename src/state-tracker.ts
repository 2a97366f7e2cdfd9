// state-tracker.ts — Per-surface observation history and loop detection
// One ring buffer per surface id. Everything returned is a copy.

import { EventEmitter } from "node:events";
import { silentLogger, type Logger } from "./log.js";
import { RingBuffer } from "./ring-buffer.js";
import type { Observation, ObservationFlags, StateDiff } from "./types.js";

export type TrackerStatus = "stable" | "looping";

export interface LoopEvent {
  surfaceId: string;
  hash: string;
  windowSize: number;
}

export interface StateTrackerOptions {
  capacity?: number;
  loopWindow?: number;
  logger?: Logger;
}

type TrackerEvents = {
  loop: [LoopEvent];
};

function copyObservation(obs: Observation): Observation {
  return {
    ...obs,
    selectors: [...obs.selectors],
    flags: { ...obs.flags },
    ...(obs.fingerprint ? { fingerprint: obs.fingerprint.slice() } : {}),
  };
}

export class StateTracker extends EventEmitter<TrackerEvents> {
  private histories = new Map<string, RingBuffer<Observation>>();
  private statuses = new Map<string, TrackerStatus>();
  private lastSurface: string | undefined;
  readonly capacity: number;
  readonly loopWindow: number;
  private readonly log: Logger;

  constructor(opts: StateTrackerOptions = {}) {
    super();
    this.capacity = opts.capacity ?? 20;
    this.loopWindow = opts.loopWindow ?? 3;
    this.log = opts.logger ?? silentLogger;
  }

  /** Record an observation and return a copy of what was stored. */
  observe(
    surfaceId: string,
    hash: string,
    selectors: readonly string[],
    flags: Partial<ObservationFlags> = {},
    fingerprint?: Uint8Array,
  ): Observation {
    let buf = this.histories.get(surfaceId);
    if (!buf) {
      buf = new RingBuffer<Observation>(this.capacity);
      this.histories.set(surfaceId, buf);
    }
    const obs: Observation = {
      surfaceId,
      timestamp: Date.now(),
      hash,
      selectors: [...selectors],
      flags: { structural: flags.structural ?? true, overlay: flags.overlay ?? false },
      ...(fingerprint ? { fingerprint: fingerprint.slice() } : {}),
    };
    buf.push(obs);
    this.lastSurface = surfaceId;

    const looping = this.detectLoop(this.loopWindow, surfaceId);
    const previous = this.statuses.get(surfaceId) ?? "stable";
    const next: TrackerStatus = looping ? "looping" : "stable";
    this.statuses.set(surfaceId, next);
    if (previous === "stable" && next === "looping") {
      this.log.warn(`loop on ${surfaceId}: last ${this.loopWindow} observations share hash ${hash}`);
      this.emit("loop", { surfaceId, hash, windowSize: this.loopWindow });
    }
    return copyObservation(obs);
  }

  /** True when the last `windowSize` observations exist and share one hash. */
  detectLoop(windowSize = this.loopWindow, surfaceId = this.lastSurface): boolean {
    if (surfaceId === undefined || windowSize < 1) return false;
    const buf = this.histories.get(surfaceId);
    if (!buf || buf.size < windowSize) return false;
    const recent = buf.getLast(windowSize);
    return recent.every((o) => o.hash === recent[0].hash);
  }

  diff(a: Observation, b: Observation): StateDiff {
    const before = new Set(a.selectors);
    const after = new Set(b.selectors);
    const added = b.selectors.filter((s) => !before.has(s));
    const removed = a.selectors.filter((s) => !after.has(s));
    const hashChanged = a.hash !== b.hash;
    return {
      added,
      removed,
      changed: hashChanged || added.length > 0 || removed.length > 0,
      hashChanged,
      overlayAppeared: !a.flags.overlay && b.flags.overlay,
      overlayCleared: a.flags.overlay && !b.flags.overlay,
    };
  }

  latest(surfaceId = this.lastSurface): Observation | undefined {
    if (surfaceId === undefined) return undefined;
    const last = this.histories.get(surfaceId)?.peek();
    return last ? copyObservation(last) : undefined;
  }

  /** Oldest first; `limit` keeps the most recent N. */
  history(surfaceId = this.lastSurface, limit?: number): Observation[] {
    if (surfaceId === undefined) return [];
    const buf = this.histories.get(surfaceId);
    if (!buf) return [];
    const items = limit !== undefined ? buf.getLast(limit) : buf.getAll();
    return items.map(copyObservation);
  }

  uniqueStates(surfaceId = this.lastSurface): number {
    if (surfaceId === undefined) return 0;
    const buf = this.histories.get(surfaceId);
    return buf ? new Set(buf.getAll().map((o) => o.hash)).size : 0;
  }

  status(surfaceId = this.lastSurface): TrackerStatus {
    if (surfaceId === undefined) return "stable";
    return this.statuses.get(surfaceId) ?? "stable";
  }

  /** Clear history for one surface, or all surfaces. */
  clear(surfaceId?: string): void {
    if (surfaceId === undefined) {
      for (const buf of this.histories.values()) buf.clear();
      this.statuses.clear();
      return;
    }
    this.histories.get(surfaceId)?.clear();
    this.statuses.delete(surfaceId);
  }

  /** Drop all state for a surface (call on surface close). */
  destroy(surfaceId: string): void {
    this.histories.delete(surfaceId);
    this.statuses.delete(surfaceId);
    if (this.lastSurface === surfaceId) this.lastSurface = undefined;
  }

  surfaces(): string[] {
    return [...this.histories.keys()];
  }
}
