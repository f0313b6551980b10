/**
 * Performance presets. Values come from config `performance.*`, whose
 * defaults are the standard, high-throughput and critical tiers.
 */

import { getConfig } from '../config.js';
import type { AgentMetrics, PerformanceSpec, PerformanceTier } from '../types/index.js';

export function performanceSpec(tier: PerformanceTier = 'default'): PerformanceSpec {
  return { ...getConfig().performance[tier] };
}

export function meetsPerformanceSpec(metrics: AgentMetrics, spec: PerformanceSpec): boolean {
  return metrics.average_response_time_ms <= spec.response_time_ms
    && metrics.current_accuracy >= spec.accuracy_threshold
    && metrics.availability >= spec.availability_threshold
    && metrics.active_requests <= spec.max_concurrent_requests;
}
