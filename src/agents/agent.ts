/**
 * Agent: a capability-tagged unit that answers consultation requests.
 *
 * The guidance itself comes from an injected strategy. ManagedAgent wraps the
 * strategy with the bookkeeping every agent shares:
 *  - concurrency gating against max_concurrent_requests (reject, never queue)
 *  - request metrics (counts, running average, max response time)
 *  - health transitions after each call (slow → DEGRADED, throw → UNHEALTHY)
 */

import { errorMessage } from '../errors.js';
import { failureResponse, successResponse } from './responses.js';
import type {
  AgentMetrics, ConsultationRequest, GuidanceResponse, HealthState, HealthStatus, PerformanceSpec,
} from '../types/index.js';

export interface AgentDefinition {
  id: string;
  name: string;
  domain: string;
  capabilities: string[];
  dependencies?: string[];
  performance: PerformanceSpec;
}

export interface StrategyResult {
  guidance: string;
  confidence: number;
  recommendations?: string[];
  /** FAILURE counts against the agent without touching its health */
  status?: 'SUCCESS' | 'PARTIAL_SUCCESS' | 'FAILURE';
  metadata?: Record<string, unknown>;
}

export type GuidanceStrategy = (
  request: ConsultationRequest,
  agent: AgentDefinition,
) => StrategyResult | Promise<StrategyResult>;

export interface Agent {
  readonly id: string;
  readonly name: string;
  readonly domain: string;
  readonly capabilities: readonly string[];
  readonly dependencies: readonly string[];
  readonly performance: PerformanceSpec;
  consult(request: ConsultationRequest): Promise<GuidanceResponse>;
  canHandle(request: ConsultationRequest): boolean;
  getHealth(): HealthStatus;
  setHealth(state: HealthState, message: string): void;
  getMetrics(): AgentMetrics;
  isAvailable(): boolean;
}

export function isHealthAvailable(state: HealthState): boolean {
  return state === 'HEALTHY' || state === 'DEGRADED';
}

export class ManagedAgent implements Agent {
  readonly id: string;
  readonly name: string;
  readonly domain: string;
  readonly capabilities: readonly string[];
  readonly dependencies: readonly string[];
  readonly performance: PerformanceSpec;

  private health: HealthStatus;
  private total = 0;
  private successful = 0;
  private failed = 0;
  private active = 0;
  private averageMs = 0;
  private maxMs = 0;
  private lastUpdated = new Date().toISOString();

  constructor(
    private readonly definition: AgentDefinition,
    private readonly strategy: GuidanceStrategy,
  ) {
    this.id = definition.id;
    this.name = definition.name;
    this.domain = definition.domain;
    this.capabilities = Object.freeze([...definition.capabilities]);
    this.dependencies = Object.freeze([...(definition.dependencies ?? [])]);
    this.performance = Object.freeze({ ...definition.performance });
    this.health = { state: 'HEALTHY', message: 'Agent initialized', checked_at: this.lastUpdated };
  }

  async consult(request: ConsultationRequest): Promise<GuidanceResponse> {
    if (this.active >= this.performance.max_concurrent_requests) {
      return failureResponse(request.request_id, this.id, 'Agent at maximum capacity', 'CAPACITY_EXCEEDED');
    }

    this.active++;
    this.total++;
    const started = Date.now();
    try {
      const result = await this.strategy(request, this.definition);
      const elapsed = Date.now() - started;
      const ok = result.status !== 'FAILURE';
      this.recordTiming(elapsed, ok);

      if (elapsed > this.performance.response_time_ms) {
        this.setHealth('DEGRADED', 'Response time threshold exceeded');
      } else {
        this.setHealth('HEALTHY', 'Operating normally');
      }

      if (result.status === 'FAILURE') {
        return failureResponse(request.request_id, this.id, result.guidance, 'AGENT_PROCESSING_ERROR', elapsed);
      }
      return successResponse(
        request.request_id, this.id, result.guidance, result.confidence,
        result.recommendations ?? [], elapsed, result.status ?? 'SUCCESS', result.metadata ?? {},
      );
    } catch (err) {
      const elapsed = Date.now() - started;
      const msg = errorMessage(err);
      this.recordTiming(elapsed, false);
      this.setHealth('UNHEALTHY', `Processing error: ${msg}`);
      return failureResponse(request.request_id, this.id, `Internal error: ${msg}`, 'AGENT_PROCESSING_ERROR', elapsed);
    } finally {
      this.active--;
    }
  }

  canHandle(request: ConsultationRequest): boolean {
    if (this.domain === request.domain) return true;
    const query = request.query.toLowerCase();
    return this.capabilities.some((c) => query.includes(c.toLowerCase()));
  }

  getHealth(): HealthStatus {
    return { ...this.health };
  }

  setHealth(state: HealthState, message: string): void {
    this.health = { state, message, checked_at: new Date().toISOString() };
  }

  getMetrics(): AgentMetrics {
    return {
      agent_id: this.id,
      total_requests: this.total,
      successful_requests: this.successful,
      failed_requests: this.failed,
      average_response_time_ms: this.averageMs,
      max_response_time_ms: this.maxMs,
      current_accuracy: this.total === 0 ? 1.0 : this.successful / this.total,
      availability: isHealthAvailable(this.health.state) ? 1.0 : 0.0,
      active_requests: this.active,
      last_updated: this.lastUpdated,
    };
  }

  isAvailable(): boolean {
    return isHealthAvailable(this.health.state) && this.active < this.performance.max_concurrent_requests;
  }

  private recordTiming(elapsedMs: number, ok: boolean): void {
    if (ok) this.successful++;
    else this.failed++;
    const completed = this.successful + this.failed;
    this.averageMs = (this.averageMs * (completed - 1) + elapsedMs) / completed;
    if (elapsedMs > this.maxMs) this.maxMs = elapsedMs;
    this.lastUpdated = new Date().toISOString();
  }
}

export function createAgent(definition: AgentDefinition, strategy: GuidanceStrategy): Agent {
  return new ManagedAgent(definition, strategy);
}
