/**
 * Performance monitor: periodic metrics snapshots per agent, compared
 * against each agent's performance preset.
 */

import { getConfig } from '../config.js';
import { logger } from '../logger.js';
import { meetsPerformanceSpec } from '../agents/performance.js';
import type { AgentRegistry } from '../agents/registry.js';
import type { AgentMetrics } from '../types/index.js';

const log = logger.child({ component: 'performance-monitor' });

export interface MonitorOptions {
  interval_ms: number;
  history_size: number;
}

export type BreachKind = 'response_time' | 'accuracy' | 'availability';

export interface PerformanceBreach {
  agent_id: string;
  kind: BreachKind;
  actual: number;
  limit: number;
}

export interface PerformanceSummary {
  total_agents: number;
  available_agents: number;
  average_response_time_ms: number;
  average_accuracy: number;
  average_availability: number;
  total_requests: number;
  successful_requests: number;
  breaches: PerformanceBreach[];
  sampled_at: string | null;
}

function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : values.reduce((a, b) => a + b, 0) / values.length;
}

export class PerformanceMonitor {
  private readonly history = new Map<string, AgentMetrics[]>();
  private readonly options: MonitorOptions;
  private lastBreaches: PerformanceBreach[] = [];
  private lastSampleAt: string | null = null;
  private ticker: NodeJS.Timeout | null = null;

  constructor(
    private readonly registry: AgentRegistry,
    options: Partial<MonitorOptions> = {},
  ) {
    this.options = { ...getConfig().monitor, ...options };
  }

  /** Snapshot every agent once; returns the breaches found in this pass. */
  sample(): PerformanceBreach[] {
    const breaches: PerformanceBreach[] = [];
    for (const agent of this.registry.getAllAgents()) {
      const metrics = agent.getMetrics();
      const series = this.history.get(agent.id) ?? [];
      series.push(metrics);
      if (series.length > this.options.history_size) series.splice(0, series.length - this.options.history_size);
      this.history.set(agent.id, series);

      const spec = agent.performance;
      if (metrics.total_requests === 0 || meetsPerformanceSpec(metrics, spec)) continue;

      const found: PerformanceBreach[] = [];
      if (metrics.average_response_time_ms > spec.response_time_ms) {
        found.push({ agent_id: agent.id, kind: 'response_time', actual: metrics.average_response_time_ms, limit: spec.response_time_ms });
      }
      if (metrics.current_accuracy < spec.accuracy_threshold) {
        found.push({ agent_id: agent.id, kind: 'accuracy', actual: metrics.current_accuracy, limit: spec.accuracy_threshold });
      }
      if (metrics.availability < spec.availability_threshold) {
        found.push({ agent_id: agent.id, kind: 'availability', actual: metrics.availability, limit: spec.availability_threshold });
      }
      for (const b of found) log.warn(b, 'Performance threshold breached');
      breaches.push(...found);
    }
    this.lastBreaches = breaches;
    this.lastSampleAt = new Date().toISOString();
    return breaches;
  }

  getHistory(agentId: string): AgentMetrics[] {
    return [...(this.history.get(agentId) ?? [])];
  }

  getSummary(): PerformanceSummary {
    const agents = this.registry.getAllAgents();
    const metrics = agents.map((a) => a.getMetrics());
    return {
      total_agents: agents.length,
      available_agents: agents.filter((a) => a.isAvailable()).length,
      average_response_time_ms: mean(metrics.map((m) => m.average_response_time_ms)),
      average_accuracy: mean(metrics.map((m) => m.current_accuracy)),
      average_availability: mean(metrics.map((m) => m.availability)),
      total_requests: metrics.reduce((n, m) => n + m.total_requests, 0),
      successful_requests: metrics.reduce((n, m) => n + m.successful_requests, 0),
      breaches: [...this.lastBreaches],
      sampled_at: this.lastSampleAt,
    };
  }

  start(): void {
    if (this.ticker) return;
    this.ticker = setInterval(() => {
      try {
        this.sample();
      } catch (err) {
        log.error({ err }, 'Performance sample failed');
      }
    }, this.options.interval_ms);
    this.ticker.unref();
  }

  stop(): void {
    if (!this.ticker) return;
    clearInterval(this.ticker);
    this.ticker = null;
  }

  get running(): boolean {
    return this.ticker !== null;
  }
}
