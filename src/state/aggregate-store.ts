/**
 * Running session statistics.
 *
 * Written only from the receive path; the summary report reads a
 * snapshot at session end.
 */

import { RollingWindow } from './rolling-window.js';

/**
 * Default number of performance samples retained.
 */
export const DEFAULT_PERFORMANCE_WINDOW = 100;

/**
 * Coarse message severity.
 */
export type Severity = 'error' | 'warning' | 'info';

/**
 * Resource utilization reported by one metrics message.
 */
export interface PerformanceSample {
  /** Unix timestamp (ms) at which the client received the sample. */
  readonly capturedAt: number;
  readonly cpu: number;
  readonly memory: number;
  readonly disk: number;
  readonly gpu: number;
}

/**
 * Message counters.
 */
export interface MessageCounters {
  readonly total: number;
  readonly errors: number;
  readonly warnings: number;
  readonly info: number;
}

/**
 * Point-in-time view of the store.
 */
export interface AggregateSnapshot {
  readonly counters: MessageCounters;
  /** Retained samples, oldest first. */
  readonly samples: readonly PerformanceSample[];
  /** Mean CPU over the retained samples, `null` when there are none. */
  readonly averageCpu: number | null;
  /** Mean memory over the retained samples, `null` when there are none. */
  readonly averageMemory: number | null;
}

export class AggregateStore {
  private total = 0;
  private errors = 0;
  private warnings = 0;
  private info = 0;
  private readonly samples: RollingWindow<PerformanceSample>;

  constructor(windowSize: number = DEFAULT_PERFORMANCE_WINDOW) {
    this.samples = new RollingWindow(windowSize);
  }

  /**
   * Counts one successfully decoded message.
   */
  recordMessage(): void {
    this.total++;
  }

  recordSeverity(severity: Severity): void {
    switch (severity) {
      case 'error':
        this.errors++;
        break;
      case 'warning':
        this.warnings++;
        break;
      case 'info':
        this.info++;
        break;
    }
  }

  /**
   * Appends a sample, evicting the oldest once the window is full.
   */
  recordPerformance(sample: PerformanceSample): void {
    this.samples.push(sample);
  }

  getCounters(): MessageCounters {
    return {
      total: this.total,
      errors: this.errors,
      warnings: this.warnings,
      info: this.info,
    };
  }

  latestSample(): PerformanceSample | undefined {
    return this.samples.latest();
  }

  snapshot(): AggregateSnapshot {
    const samples = this.samples.toArray();
    return {
      counters: this.getCounters(),
      samples,
      averageCpu: mean(samples, (s) => s.cpu),
      averageMemory: mean(samples, (s) => s.memory),
    };
  }
}

function mean<T>(items: readonly T[], pick: (item: T) => number): number | null {
  if (items.length === 0) return null;
  const sum = items.reduce((acc, item) => acc + pick(item), 0);
  return sum / items.length;
}
