// stats.ts — Counters for the decision controller and for step retries
// One instance per surface; snapshot() returns a copy with derived rates.

export interface ControllerCounters {
  structuralActions: number;
  perceptualActions: number;
  fallbacks: number;
  failures: number;
  verificationsPassed: number;
  verificationsFailed: number;
  overlaysDismissed: number;
  loopWarnings: number;
  forcedRecoveries: number;
}

export type ControllerStatsSnapshot = ControllerCounters & {
  /** Every executed action, failed ones included */
  totalActions: number;
  /** Share of actions executed structurally, 0-100 */
  structuralRate: number;
  fallbackRate: number;
};

function emptyCounters(): ControllerCounters {
  return {
    structuralActions: 0,
    perceptualActions: 0,
    fallbacks: 0,
    failures: 0,
    verificationsPassed: 0,
    verificationsFailed: 0,
    overlaysDismissed: 0,
    loopWarnings: 0,
    forcedRecoveries: 0,
  };
}

function percent(part: number, whole: number): number {
  return whole > 0 ? Math.round((part / whole) * 100) : 0;
}

export class ControllerStats {
  private counters = emptyCounters();

  increment(key: keyof ControllerCounters, by = 1): void {
    this.counters[key] += by;
  }

  snapshot(): ControllerStatsSnapshot {
    const c = this.counters;
    const total = c.structuralActions + c.perceptualActions + c.failures;
    return {
      ...c,
      totalActions: total,
      structuralRate: percent(c.structuralActions, total),
      fallbackRate: percent(c.fallbacks, total),
    };
  }

  reset(): void {
    this.counters = emptyCounters();
  }
}

// --- Retry statistics ---

export interface RetryStatsSnapshot {
  total: number;
  recovered: number;
  failed: number;
  byType: Record<string, number>;
  recoveryRate: number;
}

export class RetryStats {
  private total = 0;
  private recovered = 0;
  private failed = 0;
  private byType: Record<string, number> = {};

  /** One call per retry (not per first attempt). */
  recordAttempt(errorClass: string): void {
    this.total++;
    this.byType[errorClass] = (this.byType[errorClass] ?? 0) + 1;
  }

  /** One call per retried operation: true = eventually succeeded. */
  recordOutcome(recovered: boolean): void {
    if (recovered) {
      this.recovered++;
    } else {
      this.failed++;
    }
  }

  snapshot(): RetryStatsSnapshot {
    return {
      total: this.total,
      recovered: this.recovered,
      failed: this.failed,
      byType: { ...this.byType },
      recoveryRate: percent(this.recovered, this.recovered + this.failed),
    };
  }

  reset(): void {
    this.total = 0;
    this.recovered = 0;
    this.failed = 0;
    this.byType = {};
  }
}
