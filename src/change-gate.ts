// change-gate.ts — Decide whether the visible surface changed enough to re-analyze
// Level 1: content hash of the encoded frame. Level 2: grayscale grid diff.
// The stored frame is replaced on every check, so the next comparison is
// always against the latest capture.

import { createHash } from "node:crypto";
import sharp from "sharp";
import type { EngineConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { silentLogger, type Logger } from "./log.js";
import { withTimeout } from "./retry.js";
import type { CallOptions, FrameSource, Region } from "./types.js";

// --- Types ---

export type GateReason =
  | "first_check"
  | "identical_hash"
  | "changed"
  | "below_threshold"
  | "capture_failed";

export interface GateDecision {
  changed: boolean;
  reason: GateReason;
  elapsedMs: number;
  /** Present when the grid diff ran */
  diffRatio?: number;
  /** Hash of the captured frame, absent on capture failure */
  hash?: string;
}

export interface GateObservation {
  hash: string;
  fingerprint: Uint8Array;
  timestamp: number;
  region?: Region;
}

export interface GateStats {
  totalChecks: number;
  changesDetected: number;
  cacheHits: number;
  avgCheckMs: number;
  cacheHitRate: number;
  changeRate: number;
}

/** Reduce an encoded image to a grid x grid grayscale thumbnail, row-major. */
export type Thumbnailer = (image: Buffer, grid: number) => Promise<Uint8Array>;

export interface ChangeGateOptions {
  source: FrameSource;
  threshold?: number;
  pixelDelta?: number;
  gridSize?: number;
  /** Distinct regions remembered at once; the least recently checked is evicted */
  maxRegions?: number;
  captureTimeoutMs?: number;
  thumbnailer?: Thumbnailer;
  logger?: Logger;
}

// --- Helpers ---

export function contentHash(data: string | Uint8Array): string {
  return createHash("sha256").update(data).digest("hex").slice(0, 16);
}

export const sharpThumbnailer: Thumbnailer = async (image, grid) => {
  const { data, info } = await sharp(image)
    .greyscale()
    .resize(grid, grid, { kernel: "nearest", fit: "fill" })
    .raw()
    .toBuffer({ resolveWithObject: true });
  const channels = info.channels;
  const out = new Uint8Array(grid * grid);
  for (let i = 0; i < out.length; i++) {
    out[i] = data[i * channels];
  }
  return out;
};

/** Fraction of cells whose absolute difference exceeds pixelDelta. Shape mismatch → 1. */
export function gridDiffRatio(a: Uint8Array, b: Uint8Array, pixelDelta: number): number {
  if (a.length !== b.length || a.length === 0) return 1;
  let differing = 0;
  for (let i = 0; i < a.length; i++) {
    if (Math.abs(a[i] - b[i]) > pixelDelta) differing++;
  }
  return differing / a.length;
}

export function regionKey(region?: Region): string {
  return region ? `${region.x},${region.y},${region.width},${region.height}` : "full";
}

const DEFAULT_MAX_REGIONS = 16;

// --- Gate ---

export class ChangeGate {
  private readonly source: FrameSource;
  private readonly thumbnailer: Thumbnailer;
  private readonly pixelDelta: number;
  private readonly gridSize: number;
  private readonly maxRegions: number;
  private readonly captureTimeoutMs: number;
  private readonly log: Logger;
  private _threshold: number;
  private stored = new Map<string, GateObservation>();

  private totalChecks = 0;
  private changesDetected = 0;
  private cacheHits = 0;
  private avgCheckMs = 0;

  constructor(opts: ChangeGateOptions) {
    this.source = opts.source;
    this.thumbnailer = opts.thumbnailer ?? sharpThumbnailer;
    this.pixelDelta = opts.pixelDelta ?? 8;
    this.gridSize = opts.gridSize ?? 32;
    this.maxRegions = opts.maxRegions ?? DEFAULT_MAX_REGIONS;
    this.captureTimeoutMs = opts.captureTimeoutMs ?? 15000;
    this.log = opts.logger ?? silentLogger;
    this._threshold = 0.001;
    this.setThreshold(opts.threshold ?? 0.001);
  }

  static fromConfig(
    source: FrameSource,
    config: EngineConfig,
    extra: Pick<ChangeGateOptions, "thumbnailer" | "logger" | "maxRegions"> = {},
  ): ChangeGate {
    return new ChangeGate({
      source,
      threshold: config["change-threshold"],
      pixelDelta: config["pixel-delta"],
      gridSize: config["grid-size"],
      captureTimeoutMs: config["perception-timeout-ms"],
      ...extra,
    });
  }

  get threshold(): number {
    return this._threshold;
  }

  setThreshold(threshold: number): void {
    if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
      throw new RangeError(`threshold must be between 0 and 1, got ${threshold}`);
    }
    this._threshold = threshold;
  }

  /** Never throws; a failed capture reports changed so callers re-analyze. */
  async shouldAnalyze(region?: Region, opts: CallOptions = {}): Promise<GateDecision> {
    const start = performance.now();
    const key = regionKey(region);
    this.totalChecks++;

    const done = (decision: Omit<GateDecision, "elapsedMs">): GateDecision => {
      const elapsedMs = performance.now() - start;
      this.avgCheckMs += (elapsedMs - this.avgCheckMs) / this.totalChecks;
      if (decision.changed) this.changesDetected++;
      return { ...decision, elapsedMs };
    };

    let frame: Buffer;
    try {
      frame = await withTimeout(() => this.source(region), opts.timeoutMs ?? this.captureTimeoutMs, {
        signal: opts.signal,
        label: "frame capture",
      });
    } catch (err) {
      this.stored.delete(key);
      this.log.warn(`capture failed for ${key}: ${errorMessage(err)}`);
      return done({ changed: true, reason: "capture_failed" });
    }

    const hash = contentHash(frame);
    const previous = this.stored.get(key);

    if (previous && previous.hash === hash) {
      this.cacheHits++;
      this.remember(key, { ...previous, timestamp: Date.now() });
      return done({ changed: false, reason: "identical_hash", hash });
    }

    let fingerprint: Uint8Array;
    try {
      fingerprint = await this.thumbnailer(frame, this.gridSize);
    } catch (err) {
      this.stored.delete(key);
      this.log.warn(`could not decode frame for ${key}: ${errorMessage(err)}`);
      return done({ changed: true, reason: "capture_failed", hash });
    }

    this.remember(key, { hash, fingerprint, timestamp: Date.now(), ...(region ? { region: { ...region } } : {}) });

    if (!previous) {
      return done({ changed: true, reason: "first_check", hash });
    }

    const diffRatio = gridDiffRatio(previous.fingerprint, fingerprint, this.pixelDelta);
    const changed = diffRatio >= this._threshold;
    this.log.debug(`${key}: diff ${diffRatio.toFixed(6)} vs threshold ${this._threshold}`);
    return done({ changed, reason: changed ? "changed" : "below_threshold", diffRatio, hash });
  }

  /** Copy of the stored observation for a region (full frame when omitted). */
  lastObservation(region?: Region): GateObservation | undefined {
    const obs = this.stored.get(regionKey(region));
    if (!obs) return undefined;
    return {
      hash: obs.hash,
      fingerprint: obs.fingerprint.slice(),
      timestamp: obs.timestamp,
      ...(obs.region ? { region: { ...obs.region } } : {}),
    };
  }

  /** Forget stored frames; counters are kept. */
  reset(): void {
    this.stored.clear();
    this.log.debug("gate reset");
  }

  getStats(): GateStats {
    const total = this.totalChecks;
    return {
      totalChecks: total,
      changesDetected: this.changesDetected,
      cacheHits: this.cacheHits,
      avgCheckMs: Math.round(this.avgCheckMs * 100) / 100,
      cacheHitRate: total > 0 ? Math.round((this.cacheHits / total) * 1000) / 1000 : 0,
      changeRate: total > 0 ? Math.round((this.changesDetected / total) * 1000) / 1000 : 0,
    };
  }

  private remember(key: string, obs: GateObservation): void {
    this.stored.delete(key);
    this.stored.set(key, obs);
    while (this.stored.size > this.maxRegions) {
      const oldest = this.stored.keys().next();
      if (oldest.done) break;
      this.stored.delete(oldest.value);
    }
  }
}
