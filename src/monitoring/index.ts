export { PerformanceMonitor } from './performance-monitor.js';
export type { BreachKind, MonitorOptions, PerformanceBreach, PerformanceSummary } from './performance-monitor.js';
