import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';
import { loadConfig, resetConfig } from '../../config.js';
import { FailoverManager } from '../../failover/manager.js';
import { createRequest } from '../../agents/responses.js';
import { stubAgent, testRegistry, throws } from '../helpers/agents.js';
import { unwritableBasePath } from '../helpers/storage.js';
import type { AgentRegistry } from '../../agents/registry.js';
import type { GuidanceStrategy } from '../../agents/agent.js';

const OPTIONS = {
  recovery_timeout_ms: 1_000,
  enable_automatic_failover: true,
  health_check_interval_ms: 5_000,
  failure_threshold: 3,
};

function request() {
  return createRequest({ domain: 'security', query: 'review the login flow' });
}

describe('FailoverManager', () => {
  let manager: FailoverManager;

  afterEach(() => {
    manager.stop();
    vi.useRealTimers();
  });

  describe('consultWithFailover', () => {
    test('healthy primary answers without touching backups', async () => {
      const backup = vi.fn<GuidanceStrategy>(() => ({ guidance: 'b', confidence: 1 }));
      const registry = testRegistry([stubAgent('a', 'security'), stubAgent('b', 'security', [], backup)]);
      manager = new FailoverManager(registry, OPTIONS);

      const res = await manager.consultWithFailover(request());

      expect(res.status).toBe('SUCCESS');
      expect(res.agent_id).toBe('a');
      expect(res.guidance).toBe('a answer');
      expect(backup).not.toHaveBeenCalled();
      expect(manager.getFailoverState('a')?.consecutive_failures).toBe(0);
    });

    test('a throwing primary fails over to the first backup', async () => {
      const registry = testRegistry([stubAgent('a', 'security', [], throws), stubAgent('b', 'security')]);
      manager = new FailoverManager(registry, OPTIONS);

      const res = await manager.consultWithFailover(request());

      expect(res.status).toBe('SUCCESS');
      expect(res.agent_id).toBe('b');
      expect(manager.getFailoverState('a')?.consecutive_failures).toBe(1);
      expect(manager.getFailoverState('a')?.status).toBe('HEALTHY');
      expect(manager.getFailoverState('b')?.consecutive_failures).toBe(0);
    });

    test('reports exhaustion when every backup fails', async () => {
      const registry = testRegistry([
        stubAgent('a', 'security', [], throws),
        stubAgent('b', 'security', [], throws),
        stubAgent('c', 'security', [], throws),
      ]);
      manager = new FailoverManager(registry, OPTIONS);

      const res = await manager.consultWithFailover(request());

      expect(res.status).toBe('FAILURE');
      expect(res.guidance).toBe('All backup agents failed');
      expect(res.agent_id).toBe('failover-manager');
      expect(res.metadata).toEqual({ error: true, error_code: 'FAILOVER_EXHAUSTED' });
      expect(manager.getAllFailoverStates().map((s) => [s.agent_id, s.consecutive_failures])).toEqual([
        ['a', 1], ['b', 1], ['c', 1],
      ]);
    });

    test('an unsuccessful response counts as a failure', async () => {
      const declines: GuidanceStrategy = () => ({ guidance: 'not today', confidence: 0, status: 'FAILURE' });
      const registry = testRegistry([stubAgent('a', 'security', [], declines), stubAgent('b', 'security')]);
      manager = new FailoverManager(registry, OPTIONS);

      const res = await manager.consultWithFailover(request());

      expect(res.agent_id).toBe('b');
      expect(manager.getFailoverState('a')?.total_failures).toBe(1);
    });

    test('no available agent yields NO_AGENT_AVAILABLE', async () => {
      manager = new FailoverManager(testRegistry([stubAgent('a', 'testing')]), OPTIONS);

      const res = await manager.consultWithFailover(request());

      expect(res.guidance).toBe('No available agents found');
      expect(res.metadata.error_code).toBe('NO_AGENT_AVAILABLE');
    });

    test('without backups the primary failure is final', async () => {
      manager = new FailoverManager(testRegistry([stubAgent('a', 'security', [], throws)]), OPTIONS);

      const res = await manager.consultWithFailover(request());

      expect(res.guidance).toBe('No backup agents available');
    });

    test('disabled automatic failover skips backups', async () => {
      const backup = vi.fn<GuidanceStrategy>(() => ({ guidance: 'b', confidence: 1 }));
      const registry = testRegistry([stubAgent('a', 'security', [], throws), stubAgent('b', 'security', [], backup)]);
      manager = new FailoverManager(registry, { ...OPTIONS, enable_automatic_failover: false });

      const res = await manager.consultWithFailover(request());

      expect(res.guidance).toBe('Automatic failover disabled');
      expect(backup).not.toHaveBeenCalled();
    });
  });

  describe('failure bookkeeping and recovery', () => {
    let registry: AgentRegistry;

    beforeEach(() => {
      vi.useFakeTimers();
      registry = testRegistry([stubAgent('a', 'security'), stubAgent('b', 'security')]);
      manager = new FailoverManager(registry, { ...OPTIONS, failure_threshold: 2 });
    });

    test('reaching the threshold marks the agent FAILED once', async () => {
      await manager.recordFailure('a', 'x');
      expect(manager.getFailoverState('a')?.status).toBe('HEALTHY');
      await manager.recordFailure('a', 'x');
      await manager.recordFailure('a', 'x');

      const state = manager.getFailoverState('a');
      expect(state?.status).toBe('FAILED');
      expect(state?.failure_reason).toBe('Too many consecutive failures');
      expect(state?.consecutive_failures).toBe(3);
      expect(manager.pendingRecoveries).toBe(1);
    });

    test('a success resets the consecutive counter', async () => {
      await manager.recordFailure('a', 'x');
      await manager.recordSuccess('a');
      await manager.recordFailure('a', 'x');

      expect(manager.getFailoverState('a')?.consecutive_failures).toBe(1);
      expect(manager.getFailoverState('a')?.total_failures).toBe(2);
      expect(manager.getFailoverState('a')?.status).toBe('HEALTHY');
    });

    test('the recovery timer restores a healthy agent after the timeout', async () => {
      await manager.markAgentAsFailed('a', 'manual');

      await vi.advanceTimersByTimeAsync(999);
      expect(manager.getFailoverState('a')?.status).toBe('FAILED');

      await vi.advanceTimersByTimeAsync(1);
      expect(manager.pendingRecoveries).toBe(0);
      // queued behind the timer's attempt on the same key
      await manager.attemptRecovery('a');

      const state = manager.getFailoverState('a');
      expect(state?.status).toBe('HEALTHY');
      expect(state?.total_recoveries).toBe(1);
      expect(state?.failure_reason).toBeNull();
    });

    test('recovery is deferred while the agent is still unavailable', async () => {
      registry.getAgent('a')?.setHealth('UNHEALTHY', 'down');
      await manager.markAgentAsFailed('a', 'manual');

      await manager.attemptRecovery('a');

      expect(manager.getFailoverState('a')?.status).toBe('FAILED');
      expect(manager.getFailoverState('a')?.total_recoveries).toBe(0);
    });

    test('attemptRecovery ignores agents that are not FAILED', async () => {
      await manager.attemptRecovery('a');
      expect(manager.getFailoverState('a')).toBeNull();
    });

    test('markAgentAsRecovered on a healthy agent changes nothing', async () => {
      await manager.recordSuccess('a');
      await manager.markAgentAsRecovered('a');
      expect(manager.getFailoverState('a')?.total_recoveries).toBe(0);
    });

    test('health sweep fails unhealthy agents and recovers healthy ones', async () => {
      registry.getAgent('a')?.setHealth('UNHEALTHY', 'Processing error: boom');
      await manager.markAgentAsFailed('b', 'manual');

      await manager.monitorAgentHealth();

      expect(manager.getFailoverState('a')?.status).toBe('FAILED');
      expect(manager.getFailoverState('a')?.failure_reason).toBe('Processing error: boom');
      expect(manager.getFailoverState('b')?.status).toBe('HEALTHY');
      expect(manager.getFailoverState('b')?.total_recoveries).toBe(1);
    });

    test('start runs the sweep on its interval and stop clears timers', async () => {
      manager.start();
      expect(manager.running).toBe(true);
      registry.getAgent('a')?.setHealth('UNHEALTHY', 'down');

      await vi.advanceTimersByTimeAsync(5_000);
      await manager.recordSuccess('a');
      expect(manager.getFailoverState('a')?.status).toBe('FAILED');
      expect(manager.pendingRecoveries).toBe(1);

      manager.stop();
      expect(manager.running).toBe(false);
      expect(manager.pendingRecoveries).toBe(0);
    });

    test('statistics summarize failures and recoveries', async () => {
      await manager.markAgentAsFailed('a', 'manual');
      await manager.recordFailure('b', 'x');
      await manager.markAgentAsRecovered('a');
      await manager.markAgentAsFailed('b', 'manual');

      const stats = manager.getFailoverStatistics();
      expect(stats.total_agents).toBe(2);
      expect(stats.failed_agents).toBe(1);
      expect(stats.total_failures).toBe(1);
      expect(stats.total_recoveries).toBe(1);
      expect(stats.failure_rate).toBe(0.5);
      expect(stats.recovery_rate).toBe(1);
    });

    test('statistics with no failures report full recovery rate', () => {
      const stats = manager.getFailoverStatistics();
      expect(stats.failure_rate).toBe(0);
      expect(stats.recovery_rate).toBe(1.0);
    });
  });

  describe('default failure threshold', () => {
    const declines: GuidanceStrategy = () => ({ guidance: 'not today', confidence: 0, status: 'FAILURE' });

    test('the third consecutive failed consultation marks the agent FAILED', async () => {
      manager = new FailoverManager(testRegistry([stubAgent('a', 'security', [], declines)]));

      await manager.consultWithFailover(request());
      await manager.consultWithFailover(request());
      expect(manager.getFailoverState('a')?.status).toBe('HEALTHY');
      expect(manager.pendingRecoveries).toBe(0);

      const res = await manager.consultWithFailover(request());
      expect(res.guidance).toBe('No backup agents available');
      expect(manager.getFailoverState('a')?.status).toBe('FAILED');
      expect(manager.getFailoverState('a')?.consecutive_failures).toBe(3);
      expect(manager.pendingRecoveries).toBe(1);
    });

    test('concurrent failed consultations schedule a single recovery', async () => {
      const agent = stubAgent('a', 'security', [], declines, { max_concurrent_requests: 10 });
      manager = new FailoverManager(testRegistry([agent]));

      await Promise.all([1, 2, 3, 4].map(() => manager.consultWithFailover(request())));

      expect(manager.getFailoverState('a')?.status).toBe('FAILED');
      expect(manager.getFailoverState('a')?.total_failures).toBe(4);
      expect(manager.pendingRecoveries).toBe(1);
    });
  });

  describe('when the audit log cannot be written', () => {
    beforeEach(() => {
      resetConfig();
      loadConfig(undefined, { storage: { base_path: unwritableBasePath() } });
    });

    afterEach(() => {
      resetConfig();
    });

    test('consultations still resolve and failed agents keep their recovery', async () => {
      const registry = testRegistry([stubAgent('a', 'security', [], throws), stubAgent('b', 'security', [], throws)]);
      manager = new FailoverManager(registry, { ...OPTIONS, failure_threshold: 1 });

      const res = await manager.consultWithFailover(request());

      expect(res.status).toBe('FAILURE');
      expect(res.guidance).toBe('All backup agents failed');
      expect(manager.getFailoverState('a')?.status).toBe('FAILED');
      expect(manager.getFailoverState('b')?.status).toBe('FAILED');
      expect(manager.pendingRecoveries).toBe(2);
    });
  });
});
