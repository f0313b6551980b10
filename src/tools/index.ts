/**
 * MCP tool registrations.
 *
 *   consult              → failover-backed consultation with session context
 *   agents_list / agent_health / failover_status → registry and failover read side
 *   context_validate / session_progress / session_archive → session lifecycle
 *   story_strengthen / story_quality_check → story pipeline
 *   audit_query          → audit trail
 *
 * Every tool returns a ToolOutput; control says who acts next.
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { createRequest, isSuccessful } from '../agents/index.js';
import { insufficientContextMessage } from '../context/index.js';
import { ProcessingContext, validateRequirementsQuality } from '../story/index.js';
import { getAuditStats, queryAuditLog, verifyAuditChain } from '../storage/index.js';
import type { Runtime } from '../runtime.js';
import type { ToolOutput } from '../types/index.js';

const AUDIT_ACTIONS = [
  'agent.registered', 'agent.failed', 'agent.recovered', 'failover.exhausted',
  'session.archived', 'session.cleaned', 'story.stopped', 'story.completed',
] as const;

export function output(o: ToolOutput) {
  const data: Record<string, unknown> = { ...o.data };
  if (o.next) data.next_action = { control: o.next.control, description: o.next.description };

  const parts = [JSON.stringify(data, null, 2), '', `**Status**: ${o.status} - ${o.message}`];
  if (o.next) {
    parts.push(`**Control returns to**: ${o.next.control}`);
    parts.push(`**Next step**: ${o.next.description}`);
  }
  return { content: [{ type: 'text' as const, text: parts.join('\n') }] };
}

export function registerTools(server: McpServer, runtime: Runtime): void {
  const { registry, failover, context, pipeline } = runtime;

  // =========================================================================
  // CONSULTATION
  // =========================================================================

  server.tool(
    'consult',
    'Ask the best available specialist agent for guidance. Fails over to backup agents when the primary fails and enriches the answer with session context (decisions, files, integration points, specialized contexts).',
    {
      domain: z.string().describe('Domain of the question, e.g. "security", "event-driven", "architecture"'),
      query: z.string().describe('The question to answer'),
      session_id: z.string().optional().describe('Session to accumulate context in'),
      context: z.record(z.string()).optional().describe('Extra context keys, e.g. {"project-context": "...", "file-path": "..."}'),
      priority: z.enum(['LOW', 'NORMAL', 'HIGH', 'CRITICAL']).optional(),
      require_context: z.boolean().optional().describe('Refuse to consult when required context keys are missing'),
    },
    async (args) => {
      const request = createRequest({
        domain: args.domain,
        query: args.query,
        priority: args.priority,
        context: { ...(args.context ?? {}), ...(args.session_id ? { 'session-id': args.session_id } : {}) },
      });

      const validation = context.validateContext(request);
      if (!validation.sufficient && args.require_context) {
        return output({
          status: 'needs_input',
          data: { request_id: request.request_id, validation },
          message: insufficientContextMessage(validation).trim(),
          next: { control: 'user', description: 'Provide the missing context keys and consult again.' },
        });
      }

      const response = await failover.consultWithFailover(request);
      if (!isSuccessful(response)) {
        return output({
          status: 'error',
          data: { response },
          message: response.guidance,
          next: { control: 'user', description: 'Check agent health with agent_health or failover_status before retrying.' },
        });
      }

      const enhanced = context.enhanceWithContext(response, request);
      return output({
        status: 'success',
        data: { response: enhanced, context_validation: validation },
        message: `Guidance from ${enhanced.agent_id} (confidence ${enhanced.confidence})`,
        next: null,
      });
    },
  );

  // =========================================================================
  // REGISTRY / FAILOVER READ SIDE
  // =========================================================================

  server.tool(
    'agents_list',
    'List registered agents with domain, capabilities, health and availability.',
    { domain: z.string().optional().describe('Only agents of this domain') },
    async (args) => {
      const agents = args.domain ? registry.getAgentsForDomain(args.domain) : registry.getAllAgents();
      return output({
        status: 'success',
        data: {
          total: agents.length,
          agents: agents.map((a) => ({
            id: a.id, name: a.name, domain: a.domain,
            capabilities: a.capabilities, health: a.getHealth().state, available: a.isAvailable(),
          })),
        },
        message: `${agents.length} agent(s)`,
        next: null,
      });
    },
  );

  server.tool(
    'agent_health',
    'Health, metrics and failover state for one agent, or the registry-wide health summary.',
    { agent_id: z.string().optional() },
    async (args) => {
      if (!args.agent_id) {
        return output({ status: 'success', data: { registry: registry.getHealthStatus() }, message: 'Registry health', next: null });
      }
      const agent = registry.getAgent(args.agent_id);
      if (!agent) {
        return output({ status: 'error', data: { agent_id: args.agent_id }, message: `Agent ${args.agent_id} not found`, next: null });
      }
      return output({
        status: 'success',
        data: {
          agent_id: agent.id,
          health: agent.getHealth(),
          metrics: agent.getMetrics(),
          failover: failover.getFailoverState(agent.id),
        },
        message: `${agent.id} is ${agent.getHealth().state}`,
        next: null,
      });
    },
  );

  server.tool(
    'failover_status',
    'Failover statistics and per-agent failover states. Optionally runs one health sweep first.',
    { sweep: z.boolean().optional().describe('Run a health sweep before reporting') },
    async (args) => {
      if (args.sweep) await failover.monitorAgentHealth();
      const stats = failover.getFailoverStatistics();
      return output({
        status: 'success',
        data: {
          statistics: stats,
          states: failover.getAllFailoverStates(),
          monitor_running: failover.running,
          pending_recoveries: failover.pendingRecoveries,
        },
        message: `${stats.failed_agents} of ${stats.total_agents} agent(s) failed`,
        next: null,
      });
    },
  );

  // =========================================================================
  // SESSION CONTEXT
  // =========================================================================

  server.tool(
    'context_validate',
    'Check whether a consultation would carry enough context. Lists missing inputs and decisions.',
    {
      domain: z.string(),
      query: z.string(),
      session_id: z.string().optional(),
      context: z.record(z.string()).optional(),
    },
    async (args) => {
      const request = createRequest({
        domain: args.domain,
        query: args.query,
        context: { ...(args.context ?? {}), ...(args.session_id ? { 'session-id': args.session_id } : {}) },
      });
      const validation = context.validateContext(request);
      return output({
        status: validation.sufficient ? 'success' : 'needs_input',
        data: { validation },
        message: validation.sufficient ? 'Context sufficient' : insufficientContextMessage(validation).trim(),
        next: validation.sufficient ? null : { control: 'user', description: 'Supply the missing inputs.' },
      });
    },
  );

  server.tool(
    'session_progress',
    'Record task progress for a session: current task, architectural decisions, next steps.',
    {
      session_id: z.string(),
      task: z.string().optional(),
      decisions: z.record(z.string()).optional(),
      next_steps: z.array(z.string()).optional(),
      agent_id: z.string().optional().describe('Agent whose view of the shared context to return'),
    },
    async (args) => {
      const session = context.updateSessionProgress(args.session_id, args.task ?? null, args.decisions ?? {}, args.next_steps ?? []);
      return output({
        status: 'success',
        data: { session: session.toJSON(), shared: context.getSharedContextForAgent(args.session_id, args.agent_id ?? 'architecture-agent') },
        message: `Session ${args.session_id} updated`,
        next: null,
      });
    },
  );

  server.tool(
    'session_archive',
    'Archive a session: drops it together with its specialized contexts. Optionally also removes every stale session.',
    { session_id: z.string(), cleanup_stale: z.boolean().optional() },
    async (args) => {
      const archived = context.archiveSessionContext(args.session_id);
      const cleaned = args.cleanup_stale ? context.cleanupStaleContexts() : null;
      return output({
        status: 'success',
        data: { archived, cleaned },
        message: archived.session_removed ? `Session ${args.session_id} archived` : `Session ${args.session_id} did not exist`,
        next: null,
      });
    },
  );

  // =========================================================================
  // STORY PIPELINE
  // =========================================================================

  server.tool(
    'story_strengthen',
    'Strengthen a backend user story issue into EARS requirements and Gherkin acceptance criteria. Stops with a STOP phrase when the issue is out of scope or processing would loop.',
    {
      title: z.string(),
      body: z.string(),
      labels: z.array(z.string()).optional(),
      repository: z.string(),
      number: z.number().int().nonnegative(),
    },
    async (args) => {
      const ctx = new ProcessingContext();
      const result = pipeline.processIssue({
        title: args.title, body: args.body, labels: args.labels ?? [], repository: args.repository, number: args.number,
      }, ctx);

      if (!result.success) {
        return output({
          status: 'stopped',
          data: { stop_phrase: result.stop_phrase, code: result.code, reason: result.reason, processing: ctx.toJSON() },
          message: result.stop_phrase,
          next: { control: 'user', description: result.reason },
        });
      }
      const quality = validateRequirementsQuality(result.output);
      return output({
        status: 'success',
        data: { document: result.output, quality, processing: ctx.toJSON() },
        message: quality.passed ? 'Story strengthened' : 'Story strengthened with review notes',
        next: null,
      });
    },
  );

  server.tool(
    'story_quality_check',
    'Review requirement text for vague terms, missing acceptance criteria, incomplete or unverifiable requirements and inconsistent terminology.',
    { text: z.string() },
    async (args) => {
      const report = validateRequirementsQuality(args.text);
      return output({
        status: 'success',
        data: { report },
        message: report.passed ? 'No quality issues found' : 'Quality issues found',
        next: null,
      });
    },
  );

  // =========================================================================
  // AUDIT
  // =========================================================================

  server.tool(
    'audit_query',
    'Query the audit trail. Returns newest entries first, plus totals and chain integrity.',
    {
      action: z.enum(AUDIT_ACTIONS).optional(),
      target_id: z.string().optional(),
      since: z.string().optional().describe('ISO timestamp'),
      limit: z.number().int().positive().optional(),
    },
    async (args) => {
      const entries = queryAuditLog({ action: args.action, target_id: args.target_id, since: args.since, limit: args.limit ?? 50 });
      return output({
        status: 'success',
        data: { entries, stats: getAuditStats(), chain: verifyAuditChain() },
        message: `${entries.length} entr${entries.length === 1 ? 'y' : 'ies'}`,
        next: null,
      });
    },
  );
}
