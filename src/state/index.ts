export { RollingWindow } from './rolling-window.js';
export { AggregateStore, DEFAULT_PERFORMANCE_WINDOW } from './aggregate-store.js';
export type {
  Severity,
  PerformanceSample,
  MessageCounters,
  AggregateSnapshot,
} from './aggregate-store.js';
