import { describe, test, expect, beforeEach } from 'vitest';
import {
  ContextAwareGuidanceManager, REQUIRED_CONTEXT_KEYS, STALE_SESSION_MARKER, insufficientContextMessage,
} from '../../context/guidance-manager.js';
import { createRequest, successResponse } from '../../agents/responses.js';
import type { ContextValue } from '../../types/index.js';

function fullContext(sessionId: string): Record<string, ContextValue> {
  const ctx: Record<string, ContextValue> = {};
  for (const key of REQUIRED_CONTEXT_KEYS) ctx[key] = `${key} value`;
  ctx['session-id'] = sessionId;
  return ctx;
}

describe('ContextAwareGuidanceManager', () => {
  let manager: ContextAwareGuidanceManager;

  beforeEach(() => {
    manager = new ContextAwareGuidanceManager({ session_timeout_ms: 60_000 });
  });

  describe('validateContext', () => {
    test('an empty context misses every required input', () => {
      const result = manager.validateContext(createRequest({ domain: 'x', query: 'q' }));
      expect(result.sufficient).toBe(false);
      expect(result.missing_inputs).toEqual([...REQUIRED_CONTEXT_KEYS]);
      expect(result.missing_decisions).toEqual([]);
    });

    test('a complete context for an unknown session is sufficient', () => {
      const result = manager.validateContext(createRequest({ domain: 'x', query: 'q', context: fullContext('s1') }));
      expect(result.sufficient).toBe(true);
      expect(result.missing_inputs).toEqual([]);
    });

    test('a known session without decisions reports them as advisory', () => {
      manager.getOrCreateSession('s1');
      const result = manager.validateContext(createRequest({ domain: 'x', query: 'q', context: fullContext('s1') }));
      expect(result.sufficient).toBe(true);
      expect(result.missing_decisions).toEqual(['architectural-decisions']);
    });

    test('a stale session makes the context insufficient', () => {
      manager.getOrCreateSession('s1').touch(Date.now() - 120_000);
      const result = manager.validateContext(createRequest({ domain: 'x', query: 'q', context: fullContext('s1') }));
      expect(result.sufficient).toBe(false);
      expect(result.missing_inputs).toEqual([STALE_SESSION_MARKER]);
    });

    test('insufficientContextMessage lists what is missing', () => {
      expect(insufficientContextMessage({
        sufficient: false,
        missing_inputs: ['session-id', 'current-task'],
        missing_decisions: ['architectural-decisions'],
        validation_time_ms: 0,
      })).toBe(
        'Context insufficient – re-anchor needed\n'
        + 'Missing inputs: session-id, current-task\n'
        + 'Missing decisions: architectural-decisions\n',
      );
    });
  });

  describe('sessions', () => {
    test('getOrCreateSession returns the same session for the same id', () => {
      const a = manager.getOrCreateSession('s1', 'Build orders');
      const b = manager.getOrCreateSession('s1', 'Something else');
      expect(b).toBe(a);
      expect(b.task_objective).toBe('Build orders');
    });

    test('updateSessionProgress merges decisions and replaces next steps', () => {
      manager.updateSessionProgress('s1', 'Build orders', { db: 'postgres' }, ['schema']);
      const session = manager.updateSessionProgress('s1', null, { queue: 'kafka' }, ['api']);
      expect(session.task_objective).toBe('Build orders');
      expect(Object.fromEntries(session.architectural_decisions)).toEqual({ db: 'postgres', queue: 'kafka' });
      expect(session.next_steps).toEqual(['api']);
    });
  });

  describe('enhanceWithContext', () => {
    test('folds session and specialized context into the guidance', () => {
      const request = createRequest({
        domain: 'event-driven', query: 'q',
        context: { 'session-id': 's1', 'task-objective': 'Build orders' },
      });
      const response = successResponse(request.request_id, 'event-driven-agent',
        'Publish to Kafka with a dead letter queue.', 0.9, ['tip'], 5);

      const enhanced = manager.enhanceWithContext(response, request);

      expect(enhanced.guidance).toBe(
        '## Context-Aware Guidance\n\n'
        + '**Session Context**: s1\n'
        + '**Current Task**: Build orders\n\n'
        + '**Event-Driven Architecture Context**:\n'
        + '- Message brokers: kafka\n'
        + '- Error handling: dead-letter-queue\n\n'
        + '## Agent Guidance\n\n'
        + 'Publish to Kafka with a dead letter queue.',
      );
      expect(enhanced.recommendations).toEqual([
        'tip',
        'Consider event schema versioning and backward compatibility',
        'Implement idempotent event handlers for reliability',
        'Use dead letter queues for failed event processing',
        'Partition Kafka topics by aggregate id to preserve per-entity ordering',
      ]);
      expect(enhanced.status).toBe('SUCCESS');
      expect(enhanced.metadata).toEqual({ context_enhanced: true, session_id: 's1' });
    });

    test('architecture guidance becomes a session decision and files are tracked', () => {
      const request = createRequest({
        domain: 'integration', query: 'q',
        context: { 'session-id': 's2', 'file-path': 'src/orders.ts' },
      });
      const response = successResponse(request.request_id, 'architecture-agent', 'Split the order context.\nMore.', 1, [], 1);

      const enhanced = manager.enhanceWithContext(response, request);
      const session = manager.getSession('s2');

      expect(session?.architectural_decisions.get('agent-guidance')).toBe('Split the order context.\nMore.');
      expect(session?.accessed_files).toEqual(['src/orders.ts']);
      expect(session?.integration_points).toEqual(['architecture-agent: Split the order context.']);
      expect(enhanced.recommendations).toEqual(['Review recent file changes: src/orders.ts']);
    });

    test('requests without a session id use the default session', () => {
      const request = createRequest({ domain: 'x', query: 'q' });
      const enhanced = manager.enhanceWithContext(successResponse(request.request_id, 'a', 'g', 1, [], 1), request);
      expect(enhanced.metadata.session_id).toBe('default-session');
      expect(manager.getSession('default-session')?.task_objective).toBe('Unknown task');
    });
  });

  describe('specialized contexts', () => {
    test('markers are recorded once per session', () => {
      const response = successResponse('r', 'cicd-pipeline-agent', 'Build with Docker and deploy canary', 1, [], 1);
      expect(manager.updateSpecializedContext('s1', 'cicd-pipeline-agent', response)).toBe(2);
      expect(manager.updateSpecializedContext('s1', 'cicd-pipeline-agent', response)).toBe(0);
      expect(manager.getSpecializedContext('cicd', 's1')?.get('build_tools')).toEqual(['docker']);
    });

    test('agents outside every family add nothing', () => {
      const response = successResponse('r', 'testing-agent', 'Use Kafka', 1, [], 1);
      expect(manager.updateSpecializedContext('s1', 'testing-agent', response)).toBe(0);
      expect(manager.getSpecializedContext('event-driven', 's1')).toBeNull();
    });

    test('architecture agents see every family, others only their own', () => {
      manager.getOrCreateEventDrivenContext('s1').add('message_brokers', 'kafka');
      manager.getOrCreateResilienceContext('s1').add('circuit_breakers', 'hystrix');

      expect(Object.keys(manager.getSharedContextForAgent('s1', 'architecture-agent').contexts))
        .toEqual(['event-driven', 'resilience']);
      expect(Object.keys(manager.getSharedContextForAgent('s1', 'event-driven-agent').contexts))
        .toEqual(['event-driven']);
      expect(manager.getSharedContextForAgent('s1', 'testing-agent')).toEqual({ session: null, contexts: {} });
    });

    test('contexts are isolated per session', () => {
      manager.getOrCreateCicdContext('s1').add('build_tools', 'maven');
      expect(manager.getOrCreateCicdContext('s2').isPopulated()).toBe(false);
      expect(manager.getOrCreateConfigurationContext('s1')).toBe(manager.getOrCreateConfigurationContext('s1'));
    });
  });

  describe('lifecycle', () => {
    test('cleanupStaleContexts removes idle sessions with their contexts', () => {
      const now = Date.now();
      manager.getOrCreateSession('old').touch(now - 120_000);
      manager.getOrCreateEventDrivenContext('old');
      manager.getOrCreateSession('fresh');
      manager.getOrCreateCicdContext('fresh');

      expect(manager.cleanupStaleContexts(now)).toEqual({ sessions_removed: 1, contexts_removed: 1 });
      expect(manager.getSession('old')).toBeNull();
      expect(manager.getSession('fresh')).not.toBeNull();
      expect(manager.getSpecializedContext('cicd', 'fresh')).not.toBeNull();
    });

    test('archiveSessionContext removes the session and its contexts together', () => {
      manager.getOrCreateSession('s1');
      manager.getOrCreateEventDrivenContext('s1');
      manager.getOrCreateResilienceContext('s1');

      expect(manager.archiveSessionContext('s1')).toEqual({
        session_id: 's1', session_removed: true, contexts_removed: 2,
      });
      expect(manager.listSessions()).toEqual([]);
      expect(manager.archiveSessionContext('s1').session_removed).toBe(false);
    });
  });

  test('updateSessionProgress merges decisions and replaces next steps', () => {
    manager.updateSessionProgress('p1', 'Ship exports', { db: 'postgres' }, ['write migration']);
    const session = manager.updateSessionProgress('p1', null, { queue: 'sqs' }, ['add consumer']);
    const snapshot = session.toJSON();
    expect(snapshot.task_objective).toBe('Ship exports');
    expect(snapshot.architectural_decisions).toEqual({ db: 'postgres', queue: 'sqs' });
    expect(snapshot.next_steps).toEqual(['add consumer']);
  });
});
