// surface.ts — Registry of open surfaces, each with its own gate, tracker, controller and engine
// Surfaces never share state; close() drops everything a surface owns.

import { ChangeGate, type Thumbnailer } from "./change-gate.js";
import { getDefaults, type EngineConfig } from "./config.js";
import { ContractEngine } from "./contract.js";
import { DecisionController } from "./controller.js";
import { createLogger, type LogSink, type Logger } from "./log.js";
import type { RetryPolicy } from "./retry.js";
import { StateTracker } from "./state-tracker.js";
import type { FrameSource, InputBackend, PerceptionBackend, StructuralDriver } from "./types.js";

export interface SurfaceBackends<TNode> {
  driver: StructuralDriver<TNode>;
  /** Defaults to the driver's screenshot() */
  frames?: FrameSource;
  perception?: PerceptionBackend;
  input?: InputBackend;
}

export interface Surface<TNode> {
  readonly id: string;
  readonly gate: ChangeGate;
  readonly tracker: StateTracker;
  readonly controller: DecisionController<TNode>;
  readonly engine: ContractEngine<TNode>;
}

export interface SurfaceRegistryOptions {
  config?: EngineConfig;
  /** Defaults to a logger at the config's log-level */
  logger?: Logger;
  /** Where the default logger writes; stderr unless given */
  logSink?: LogSink;
  thumbnailer?: Thumbnailer;
  retryPolicy?: Omit<RetryPolicy, "retries">;
}

export class SurfaceRegistry<TNode = unknown> {
  private readonly surfaces = new Map<string, Surface<TNode>>();
  private readonly config: EngineConfig;
  private readonly log: Logger;
  private readonly thumbnailer?: Thumbnailer;
  private readonly retryPolicy?: Omit<RetryPolicy, "retries">;

  constructor(opts: SurfaceRegistryOptions = {}) {
    this.config = opts.config ?? getDefaults();
    this.log = opts.logger ?? createLogger("steadyhand", this.config["log-level"], opts.logSink);
    this.thumbnailer = opts.thumbnailer;
    this.retryPolicy = opts.retryPolicy;
  }

  open(id: string, backends: SurfaceBackends<TNode>): Surface<TNode> {
    if (this.surfaces.has(id)) throw new Error(`Surface "${id}" is already open`);
    const log = this.log.child(id);
    const driver = backends.driver;
    const frames: FrameSource = backends.frames ?? ((region) => driver.screenshot(region));

    const gate = ChangeGate.fromConfig(frames, this.config, {
      logger: log.child("gate"),
      ...(this.thumbnailer ? { thumbnailer: this.thumbnailer } : {}),
    });
    const tracker = new StateTracker({
      capacity: this.config["history-capacity"],
      loopWindow: this.config["loop-window"],
      logger: log.child("tracker"),
    });
    const shared = {
      surfaceId: id,
      driver,
      gate,
      tracker,
      config: this.config,
      ...(backends.perception ? { perception: backends.perception } : {}),
      ...(backends.input ? { input: backends.input } : {}),
    };
    const controller = new DecisionController<TNode>({ ...shared, logger: log.child("controller") });
    const engine = new ContractEngine<TNode>({
      ...shared,
      controller,
      logger: log.child("contract"),
      ...(this.retryPolicy ? { retryPolicy: this.retryPolicy } : {}),
    });

    const surface: Surface<TNode> = { id, gate, tracker, controller, engine };
    this.surfaces.set(id, surface);
    this.log.info(`surface ${id} opened`);
    return surface;
  }

  get(id: string): Surface<TNode> | undefined {
    return this.surfaces.get(id);
  }

  has(id: string): boolean {
    return this.surfaces.has(id);
  }

  list(): string[] {
    return [...this.surfaces.keys()];
  }

  /** Tear down one surface. Returns false when it was not open. */
  close(id: string): boolean {
    const surface = this.surfaces.get(id);
    if (!surface) return false;
    surface.engine.reset();
    surface.controller.reset();
    surface.gate.reset();
    surface.tracker.destroy(id);
    surface.tracker.removeAllListeners();
    this.surfaces.delete(id);
    this.log.info(`surface ${id} closed`);
    return true;
  }

  closeAll(): number {
    const ids = this.list();
    for (const id of ids) this.close(id);
    return ids.length;
  }
}
