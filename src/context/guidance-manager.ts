/**
 * Context-aware guidance manager.
 *
 * Keeps per-session state across consultations, feeds the specialized
 * contexts from agent guidance, checks that a request carries enough context,
 * and folds the accumulated context back into responses.
 *
 * Get-or-create operations are synchronous, so each session key gets at most
 * one SessionContext and one context per family. Different sessions never share
 * state.
 */

import { getConfig } from '../config.js';
import { logger } from '../logger.js';
import { recordAudit } from '../storage/index.js';
import { CONTEXT_FAMILIES, KeywordClassifier, loadContextVocabulary } from './classifier.js';
import { SessionContext } from './session.js';
import { SpecializedContext } from './specialized.js';
import type { ContextClassifier, ContextVocabulary } from './classifier.js';
import type { SessionSnapshot } from './session.js';
import type { SpecializedSnapshot } from './specialized.js';
import type {
  ConsultationRequest, ContextFamily, ContextValidationResult, ContextValue, GuidanceResponse,
} from '../types/index.js';

const log = logger.child({ component: 'context' });

export const DEFAULT_SESSION_ID = 'default-session';
export const STALE_SESSION_MARKER = 'stale-session-context';

export const REQUIRED_CONTEXT_KEYS: readonly string[] = [
  'session-id',
  'project-context',
  'architectural-decisions',
  'current-task',
  'domain-constraints',
  'event-driven-context',
  'cicd-context',
  'configuration-context',
  'resilience-context',
];

export interface ContextManagerOptions {
  session_timeout_ms: number;
  vocabulary: ContextVocabulary;
  classifier: ContextClassifier;
}

export interface SharedContext {
  session: SessionSnapshot | null;
  contexts: Partial<Record<ContextFamily, SpecializedSnapshot>>;
}

export interface CleanupReport {
  sessions_removed: number;
  contexts_removed: number;
}

export interface ArchiveReport {
  session_id: string;
  session_removed: boolean;
  contexts_removed: number;
}

export function insufficientContextMessage(result: ContextValidationResult): string {
  return 'Context insufficient – re-anchor needed\n'
    + `Missing inputs: ${result.missing_inputs.join(', ')}\n`
    + `Missing decisions: ${result.missing_decisions.join(', ')}\n`;
}

function stringValue(v: ContextValue | undefined): string | null {
  return typeof v === 'string' && v.length > 0 ? v : null;
}

function firstLine(text: string, max = 120): string {
  const line = text.split('\n').find((l) => l.trim().length > 0)?.trim() ?? '';
  return line.length > max ? `${line.slice(0, max - 3)}...` : line;
}

function labelFor(category: string): string {
  const words = category.replace(/_/g, ' ');
  return words.charAt(0).toUpperCase() + words.slice(1);
}

export class ContextAwareGuidanceManager {
  private readonly sessions = new Map<string, SessionContext>();
  private readonly specialized = new Map<ContextFamily, Map<string, SpecializedContext>>(
    CONTEXT_FAMILIES.map((f) => [f, new Map<string, SpecializedContext>()]),
  );
  private readonly options: ContextManagerOptions;

  constructor(options: Partial<ContextManagerOptions> = {}) {
    const config = getConfig().context;
    const vocabulary = options.vocabulary ?? loadContextVocabulary(config.vocabulary_path);
    this.options = {
      session_timeout_ms: options.session_timeout_ms ?? config.session_timeout_ms,
      vocabulary,
      classifier: options.classifier ?? new KeywordClassifier(vocabulary),
    };
  }

  // ---------------------------------------------------------------------------
  // Sessions
  // ---------------------------------------------------------------------------

  getSession(sessionId: string): SessionContext | null {
    return this.sessions.get(sessionId) ?? null;
  }

  getOrCreateSession(sessionId: string, taskObjective?: string): SessionContext {
    let session = this.sessions.get(sessionId);
    if (!session) {
      session = new SessionContext(sessionId, taskObjective ?? 'Unknown task');
      this.sessions.set(sessionId, session);
      log.info({ session_id: sessionId }, 'Session created');
    }
    return session;
  }

  updateSessionProgress(
    sessionId: string, task: string | null,
    decisions: Record<string, string> = {}, nextSteps: string[] = [],
  ): SessionContext {
    const session = this.getOrCreateSession(sessionId, task ?? undefined);
    session.updateProgress(task, decisions, nextSteps);
    return session;
  }

  listSessions(): SessionSnapshot[] {
    return [...this.sessions.values()].map((s) => s.toJSON());
  }

  // ---------------------------------------------------------------------------
  // Specialized contexts
  // ---------------------------------------------------------------------------

  private familyMap(family: ContextFamily): Map<string, SpecializedContext> {
    let map = this.specialized.get(family);
    if (!map) {
      map = new Map();
      this.specialized.set(family, map);
    }
    return map;
  }

  getOrCreateSpecializedContext(family: ContextFamily, sessionId: string): SpecializedContext {
    const map = this.familyMap(family);
    let ctx = map.get(sessionId);
    if (!ctx) {
      ctx = new SpecializedContext(family, sessionId);
      map.set(sessionId, ctx);
    }
    return ctx;
  }

  getSpecializedContext(family: ContextFamily, sessionId: string): SpecializedContext | null {
    return this.familyMap(family).get(sessionId) ?? null;
  }

  getOrCreateEventDrivenContext(sessionId: string): SpecializedContext {
    return this.getOrCreateSpecializedContext('event-driven', sessionId);
  }

  getOrCreateCicdContext(sessionId: string): SpecializedContext {
    return this.getOrCreateSpecializedContext('cicd', sessionId);
  }

  getOrCreateConfigurationContext(sessionId: string): SpecializedContext {
    return this.getOrCreateSpecializedContext('configuration', sessionId);
  }

  getOrCreateResilienceContext(sessionId: string): SpecializedContext {
    return this.getOrCreateSpecializedContext('resilience', sessionId);
  }

  /** Scan guidance for markers of the family the agent belongs to. Returns the markers added. */
  updateSpecializedContext(sessionId: string, agentId: string, response: GuidanceResponse): number {
    const family = this.options.classifier.familyFor(agentId);
    if (!family) return 0;
    const markers = this.options.classifier.classify(family, response.guidance);
    const ctx = this.getOrCreateSpecializedContext(family, sessionId);
    let added = 0;
    for (const m of markers) {
      if (ctx.add(m.category, m.value)) added++;
    }
    if (added > 0) log.debug({ session_id: sessionId, family, added }, 'Specialized context updated');
    return added;
  }

  getSharedContextForAgent(sessionId: string, agentId: string): SharedContext {
    const id = agentId.toLowerCase();
    const families: readonly ContextFamily[] = id.includes('integration') || id.includes('architecture')
      ? CONTEXT_FAMILIES
      : [this.options.classifier.familyFor(agentId)].filter((f): f is ContextFamily => f !== null);

    const contexts: Partial<Record<ContextFamily, SpecializedSnapshot>> = {};
    for (const family of families) {
      const ctx = this.getSpecializedContext(family, sessionId);
      if (ctx) contexts[family] = ctx.toJSON();
    }
    return { session: this.getSession(sessionId)?.toJSON() ?? null, contexts };
  }

  // ---------------------------------------------------------------------------
  // Validation
  // ---------------------------------------------------------------------------

  validateContext(request: ConsultationRequest): ContextValidationResult {
    const started = Date.now();
    const ctx = request.context;
    const missingInputs = REQUIRED_CONTEXT_KEYS.filter((k) => ctx[k] === undefined || ctx[k] === null);
    const missingDecisions: string[] = [];

    const sessionId = stringValue(ctx['session-id']);
    const session = sessionId ? this.getSession(sessionId) : null;
    if (session) {
      if (session.isStale(this.options.session_timeout_ms)) missingInputs.push(STALE_SESSION_MARKER);
      if (session.architectural_decisions.size === 0) missingDecisions.push('architectural-decisions');
    }

    return {
      sufficient: missingInputs.length === 0,
      missing_inputs: missingInputs,
      missing_decisions: missingDecisions,
      validation_time_ms: Date.now() - started,
    };
  }

  // ---------------------------------------------------------------------------
  // Enhancement
  // ---------------------------------------------------------------------------

  enhanceWithContext(response: GuidanceResponse, request: ConsultationRequest): GuidanceResponse {
    const sessionId = stringValue(request.context['session-id']) ?? DEFAULT_SESSION_ID;
    const task = stringValue(request.context['task-objective']) ?? undefined;
    const session = this.getOrCreateSession(sessionId, task);

    if (response.agent_id.toLowerCase().includes('architecture')) {
      session.recordDecision('agent-guidance', response.guidance);
    }
    const filePath = stringValue(request.context['file-path']);
    if (filePath) session.recordFile(filePath);
    if (request.domain === 'integration') {
      session.recordIntegrationPoint(`${response.agent_id}: ${firstLine(response.guidance)}`);
    }
    session.touch();

    this.updateSpecializedContext(sessionId, response.agent_id, response);

    return {
      ...response,
      guidance: this.renderGuidance(session, response.guidance),
      recommendations: this.collectRecommendations(session, response.recommendations),
      status: 'SUCCESS',
      metadata: { ...response.metadata, context_enhanced: true, session_id: sessionId },
    };
  }

  private populatedContexts(sessionId: string): SpecializedContext[] {
    return CONTEXT_FAMILIES
      .map((f) => this.getSpecializedContext(f, sessionId))
      .filter((c): c is SpecializedContext => c !== null && c.isPopulated());
  }

  private renderGuidance(session: SessionContext, original: string): string {
    const parts: string[] = [];
    parts.push('## Context-Aware Guidance\n\n');
    parts.push(`**Session Context**: ${session.session_id}\n`);
    parts.push(`**Current Task**: ${session.task_objective}\n\n`);

    if (session.architectural_decisions.size > 0) {
      parts.push('**Related Architectural Decisions**:\n');
      for (const [k, v] of session.architectural_decisions) parts.push(`- ${k}: ${firstLine(v)}\n`);
      parts.push('\n');
    }

    for (const ctx of this.populatedContexts(session.session_id)) {
      parts.push(`**${this.options.vocabulary.families[ctx.family].title}**:\n`);
      for (const c of ctx.categories()) parts.push(`- ${labelFor(c)}: ${ctx.get(c).join(', ')}\n`);
      parts.push('\n');
    }

    if (session.integration_points.length > 0) {
      parts.push('**Integration Points to Consider**:\n');
      for (const p of session.integration_points) parts.push(`- ${p}\n`);
      parts.push('\n');
    }

    parts.push('## Agent Guidance\n\n');
    parts.push(original);
    return parts.join('');
  }

  private collectRecommendations(session: SessionContext, original: string[]): string[] {
    const out = [...original];
    if (session.accessed_files.length > 0) {
      out.push(`Review recent file changes: ${session.accessed_files.slice(-3).join(', ')}`);
    }
    if (session.next_steps.length > 0) {
      out.push(`Continue with planned next steps: ${session.next_steps.join(', ')}`);
    }
    for (const ctx of this.populatedContexts(session.session_id)) {
      const vocab = this.options.vocabulary.families[ctx.family];
      out.push(...vocab.advice);
      for (const a of vocab.conditional_advice) {
        if (ctx.has(a.category, a.marker)) out.push(a.text);
      }
    }
    return [...new Set(out)];
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  cleanupStaleContexts(now = Date.now()): CleanupReport {
    const timeout = this.options.session_timeout_ms;
    let sessionsRemoved = 0;
    let contextsRemoved = 0;

    for (const [id, session] of this.sessions) {
      if (!session.isStale(timeout, now)) continue;
      this.sessions.delete(id);
      sessionsRemoved++;
      for (const family of CONTEXT_FAMILIES) {
        if (this.familyMap(family).delete(id)) contextsRemoved++;
      }
    }
    for (const family of CONTEXT_FAMILIES) {
      const map = this.familyMap(family);
      for (const [id, ctx] of map) {
        if (ctx.isStale(timeout, now)) {
          map.delete(id);
          contextsRemoved++;
        }
      }
    }

    if (sessionsRemoved > 0 || contextsRemoved > 0) {
      log.info({ sessions_removed: sessionsRemoved, contexts_removed: contextsRemoved }, 'Stale contexts cleaned up');
      recordAudit('session.cleaned', 'context-manager', 'session', '*', {
        sessions_removed: sessionsRemoved, contexts_removed: contextsRemoved,
      });
    }
    return { sessions_removed: sessionsRemoved, contexts_removed: contextsRemoved };
  }

  /** Removes the session and every specialized context it owns, together. */
  archiveSessionContext(sessionId: string): ArchiveReport {
    const sessionRemoved = this.sessions.delete(sessionId);
    let contextsRemoved = 0;
    for (const family of CONTEXT_FAMILIES) {
      if (this.familyMap(family).delete(sessionId)) contextsRemoved++;
    }
    log.info({ session_id: sessionId, session_removed: sessionRemoved, contexts_removed: contextsRemoved }, 'Session archived');
    recordAudit('session.archived', 'context-manager', 'session', sessionId, {
      session_removed: sessionRemoved, contexts_removed: contextsRemoved,
    });
    return { session_id: sessionId, session_removed: sessionRemoved, contexts_removed: contextsRemoved };
  }
}
