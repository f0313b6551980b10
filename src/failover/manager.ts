/**
 * Failover manager: keeps consultations answering while individual agents fail.
 *
 * - consultWithFailover walks primary → backups with early exit on success
 * - per-agent failure bookkeeping with a consecutive-failure threshold
 * - a fire-once recovery timer per transition into FAILED
 * - a periodic health sweep owned by start()/stop()
 *
 * All mutations of one agent's FailoverState run under that agent's key in a
 * KeyedMutex, so the counter and the status transition stay consistent when
 * concurrent consultations hit the same agent.
 */

import { getConfig } from '../config.js';
import { errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { recordAudit } from '../storage/index.js';
import { isHealthAvailable } from '../agents/agent.js';
import { failureResponse, isSuccessful } from '../agents/responses.js';
import { KeyedMutex } from './keyed-mutex.js';
import type { Agent } from '../agents/agent.js';
import type { AgentRegistry } from '../agents/registry.js';
import type {
  ConsultationRequest, FailoverState, FailoverStatistics, GuidanceResponse,
} from '../types/index.js';

const log = logger.child({ component: 'failover' });

export const FAILOVER_AGENT_ID = 'failover-manager';

export interface FailoverOptions {
  recovery_timeout_ms: number;
  enable_automatic_failover: boolean;
  health_check_interval_ms: number;
  failure_threshold: number;
}

interface Attempt {
  response: GuidanceResponse | null;
  error: string | null;
}

export class FailoverManager {
  private readonly states = new Map<string, FailoverState>();
  private readonly locks = new KeyedMutex();
  private readonly recoveryTimers = new Set<NodeJS.Timeout>();
  private readonly options: FailoverOptions;
  private ticker: NodeJS.Timeout | null = null;

  constructor(
    private readonly registry: AgentRegistry,
    options: Partial<FailoverOptions> = {},
  ) {
    const { recovery_timeout_ms, enable_automatic_failover, health_check_interval_ms, failure_threshold } = getConfig().failover;
    this.options = {
      recovery_timeout_ms, enable_automatic_failover, health_check_interval_ms, failure_threshold,
      ...options,
    };
  }

  // ---------------------------------------------------------------------------
  // Consultation
  // ---------------------------------------------------------------------------

  async consultWithFailover(request: ConsultationRequest): Promise<GuidanceResponse> {
    const primary = this.registry.findBestAgent(request);
    if (!primary) {
      log.warn({ request_id: request.request_id, domain: request.domain }, 'No available agents found');
      return failureResponse(request.request_id, FAILOVER_AGENT_ID, 'No available agents found', 'NO_AGENT_AVAILABLE');
    }

    const first = await this.invoke(primary, request);
    if (first.response && isSuccessful(first.response)) {
      await this.recordSuccess(primary.id);
      return first.response;
    }
    await this.recordFailure(primary.id, first.error ?? 'Unsuccessful response');

    if (!this.options.enable_automatic_failover) {
      return failureResponse(request.request_id, FAILOVER_AGENT_ID, 'Automatic failover disabled', 'FAILOVER_EXHAUSTED');
    }

    const backups = this.registry.getBackupAgents(primary.id);
    if (backups.length === 0) {
      log.warn({ agent_id: primary.id }, 'No backup agents available');
      return failureResponse(request.request_id, FAILOVER_AGENT_ID, 'No backup agents available', 'FAILOVER_EXHAUSTED');
    }

    for (const backup of backups) {
      log.info({ failed: primary.id, backup: backup.id, request_id: request.request_id }, 'Failing over to backup agent');
      const attempt = await this.invoke(backup, request);
      if (attempt.response && isSuccessful(attempt.response)) {
        await this.recordSuccess(backup.id);
        return attempt.response;
      }
      await this.recordFailure(backup.id, attempt.error ?? 'Unsuccessful response');
    }

    recordAudit('failover.exhausted', FAILOVER_AGENT_ID, 'request', request.request_id, {
      primary: primary.id, backups: backups.map((b) => b.id),
    });
    return failureResponse(request.request_id, FAILOVER_AGENT_ID, 'All backup agents failed', 'FAILOVER_EXHAUSTED');
  }

  private async invoke(agent: Agent, request: ConsultationRequest): Promise<Attempt> {
    try {
      const response = await agent.consult(request);
      return { response, error: isSuccessful(response) ? null : response.guidance };
    } catch (err) {
      log.error({ agent_id: agent.id, err }, 'Agent consultation threw');
      return { response: null, error: errorMessage(err) };
    }
  }

  // ---------------------------------------------------------------------------
  // Bookkeeping
  // ---------------------------------------------------------------------------

  recordFailure(agentId: string, reason: string): Promise<void> {
    return this.locks.run(agentId, () => {
      const state = this.stateFor(agentId);
      state.consecutive_failures++;
      state.total_failures++;
      state.last_failure_at = new Date().toISOString();
      log.warn({ agent_id: agentId, consecutive: state.consecutive_failures, reason }, 'Agent failure recorded');
      if (state.consecutive_failures >= this.options.failure_threshold) {
        this.markFailedLocked(state, 'Too many consecutive failures');
      }
    });
  }

  recordSuccess(agentId: string): Promise<void> {
    return this.locks.run(agentId, () => {
      this.stateFor(agentId).consecutive_failures = 0;
    });
  }

  markAgentAsFailed(agentId: string, reason: string): Promise<void> {
    return this.locks.run(agentId, () => this.markFailedLocked(this.stateFor(agentId), reason));
  }

  markAgentAsRecovered(agentId: string): Promise<void> {
    return this.locks.run(agentId, () => this.markRecoveredLocked(this.stateFor(agentId)));
  }

  /** Probe live health; recovered when available, otherwise left FAILED for the sweep. */
  attemptRecovery(agentId: string): Promise<void> {
    return this.locks.run(agentId, () => {
      const state = this.states.get(agentId);
      if (!state || state.status !== 'FAILED') return;

      state.status = 'RECOVERING';
      const agent = this.registry.getAgent(agentId);
      const health = agent?.getHealth();
      if (health && isHealthAvailable(health.state)) {
        this.markRecoveredLocked(state);
        return;
      }
      state.status = 'FAILED';
      log.warn({ agent_id: agentId, health: health?.state ?? 'UNKNOWN' }, 'Recovery deferred, agent still unavailable');
    });
  }

  private markFailedLocked(state: FailoverState, reason: string): void {
    // One pending recovery per failure episode.
    if (state.status === 'FAILED') return;
    state.status = 'FAILED';
    state.failure_reason = reason;
    log.error({ agent_id: state.agent_id, reason }, 'Agent marked as failed');
    this.scheduleRecovery(state.agent_id);
    recordAudit('agent.failed', FAILOVER_AGENT_ID, 'agent', state.agent_id, {
      reason, consecutive_failures: state.consecutive_failures,
    });
  }

  private markRecoveredLocked(state: FailoverState): void {
    if (state.status === 'HEALTHY') return;
    state.status = 'HEALTHY';
    state.consecutive_failures = 0;
    state.total_recoveries++;
    state.last_recovery_at = new Date().toISOString();
    state.failure_reason = null;
    log.info({ agent_id: state.agent_id, recoveries: state.total_recoveries }, 'Agent recovered');
    recordAudit('agent.recovered', FAILOVER_AGENT_ID, 'agent', state.agent_id, {
      total_recoveries: state.total_recoveries,
    });
  }

  private scheduleRecovery(agentId: string): void {
    const timer = setTimeout(() => {
      this.recoveryTimers.delete(timer);
      this.attemptRecovery(agentId).catch((err) => {
        log.error({ agent_id: agentId, err }, 'Recovery attempt failed');
      });
    }, this.options.recovery_timeout_ms);
    timer.unref();
    this.recoveryTimers.add(timer);
    log.info({ agent_id: agentId, delay_ms: this.options.recovery_timeout_ms }, 'Recovery scheduled');
  }

  private stateFor(agentId: string): FailoverState {
    let state = this.states.get(agentId);
    if (!state) {
      state = {
        agent_id: agentId,
        status: 'HEALTHY',
        consecutive_failures: 0,
        total_failures: 0,
        total_recoveries: 0,
        last_failure_at: null,
        last_recovery_at: null,
        failure_reason: null,
      };
      this.states.set(agentId, state);
    }
    return state;
  }

  // ---------------------------------------------------------------------------
  // Health sweep
  // ---------------------------------------------------------------------------

  /** One sweep over every registered agent. The ticker calls this; tests call it directly. */
  async monitorAgentHealth(): Promise<void> {
    const agents = this.registry.getAllAgents();
    await Promise.all(agents.map((agent) => this.locks.run(agent.id, () => {
      const health = agent.getHealth();
      const status = this.states.get(agent.id)?.status;
      if (health.state === 'UNHEALTHY' && status !== 'FAILED') {
        this.markFailedLocked(this.stateFor(agent.id), health.message);
      } else if (health.state === 'HEALTHY' && status === 'FAILED') {
        this.markRecoveredLocked(this.stateFor(agent.id));
      }
    })));
    log.debug({ agents: agents.length }, 'Health sweep complete');
  }

  start(): void {
    if (this.ticker) return;
    this.ticker = setInterval(() => {
      this.monitorAgentHealth().catch((err) => log.error({ err }, 'Health sweep failed'));
    }, this.options.health_check_interval_ms);
    this.ticker.unref();
    log.info({ interval_ms: this.options.health_check_interval_ms }, 'Health monitor started');
  }

  /** Stops the sweep and drops pending recovery timers. */
  stop(): void {
    if (this.ticker) {
      clearInterval(this.ticker);
      this.ticker = null;
    }
    for (const t of this.recoveryTimers) clearTimeout(t);
    this.recoveryTimers.clear();
  }

  get running(): boolean {
    return this.ticker !== null;
  }

  get pendingRecoveries(): number {
    return this.recoveryTimers.size;
  }

  // ---------------------------------------------------------------------------
  // Read side
  // ---------------------------------------------------------------------------

  getFailoverState(agentId: string): FailoverState | null {
    const state = this.states.get(agentId);
    return state ? { ...state } : null;
  }

  getAllFailoverStates(): FailoverState[] {
    return [...this.states.values()].map((s) => ({ ...s }));
  }

  getFailoverStatistics(): FailoverStatistics {
    const totalAgents = this.registry.size;
    const states = [...this.states.values()];
    const failed = states.filter((s) => s.status === 'FAILED').length;
    const totalFailures = states.reduce((n, s) => n + s.total_failures, 0);
    const totalRecoveries = states.reduce((n, s) => n + s.total_recoveries, 0);
    return {
      total_agents: totalAgents,
      failed_agents: failed,
      total_failures: totalFailures,
      total_recoveries: totalRecoveries,
      failure_rate: totalAgents === 0 ? 0 : failed / totalAgents,
      recovery_rate: totalFailures === 0 ? 1.0 : totalRecoveries / totalFailures,
      timestamp: new Date().toISOString(),
    };
  }
}
