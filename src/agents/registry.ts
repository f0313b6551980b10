/**
 * Agent Registry: holds every registered agent in registration order and
 * resolves the agent that should answer a request.
 *
 * The registry is built from an explicit, frozen options value. Agents are
 * never removed; an unusable agent is expressed through its health.
 */

import { AgentRegistrationError } from '../errors.js';
import { logger } from '../logger.js';
import { recordAudit } from '../storage/index.js';
import type { Agent } from './agent.js';
import type { ConsultationRequest, RegistryHealth } from '../types/index.js';

const log = logger.child({ component: 'registry' });

/** A specialized domain an agent joins when it carries any of the listed capabilities. */
export interface DomainRule {
  domain: string;
  capabilities: readonly string[];
}

export interface RegistryOptions {
  max_agents: number;
  max_backup_agents: number;
  domain_rules: readonly DomainRule[];
}

export const SPECIALIZED_DOMAIN_RULES: readonly DomainRule[] = Object.freeze([
  { domain: 'event-driven', capabilities: ['event-schemas', 'kafka', 'sns-sqs', 'rabbitmq'] },
  { domain: 'cicd', capabilities: ['build-automation', 'deployment-strategies', 'security-scanning', 'pipeline-orchestration'] },
  { domain: 'configuration', capabilities: ['spring-cloud-config', 'feature-flags', 'secrets-management', 'configuration-validation'] },
  { domain: 'resilience', capabilities: ['circuit-breakers', 'retry-patterns', 'bulkhead-patterns', 'chaos-engineering'] },
]);

export class AgentRegistry {
  private readonly agents: Agent[] = [];
  private readonly byId = new Map<string, Agent>();
  private readonly specialized = new Map<string, string[]>();
  private readonly options: Readonly<RegistryOptions>;

  constructor(options: RegistryOptions) {
    this.options = Object.freeze({ ...options, domain_rules: Object.freeze([...options.domain_rules]) });
  }

  register(agent: Agent): void {
    if (this.byId.has(agent.id)) {
      throw new AgentRegistrationError(agent.id, `Agent '${agent.id}' is already registered`);
    }
    if (this.agents.length >= this.options.max_agents) {
      throw new AgentRegistrationError(agent.id, `Registry is full (${this.options.max_agents} agents)`);
    }
    this.agents.push(agent);
    this.byId.set(agent.id, agent);

    const joined: string[] = [];
    for (const rule of this.options.domain_rules) {
      if (rule.domain === agent.domain) continue;
      if (agent.capabilities.some((c) => rule.capabilities.includes(c))) {
        const ids = this.specialized.get(rule.domain) ?? [];
        ids.push(agent.id);
        this.specialized.set(rule.domain, ids);
        joined.push(rule.domain);
      }
    }
    log.info({ agent_id: agent.id, domain: agent.domain, specialized: joined }, 'Agent registered');
    recordAudit('agent.registered', 'registry', 'agent', agent.id, { domain: agent.domain, specialized: joined });
  }

  getAgent(id: string): Agent | null {
    return this.byId.get(id) ?? null;
  }

  getAllAgents(): Agent[] {
    return [...this.agents];
  }

  /** Agents whose primary domain matches, then agents classified into it. */
  getAgentsForDomain(domain: string): Agent[] {
    const extra = new Set(this.specialized.get(domain) ?? []);
    return this.agents.filter((a) => a.domain === domain || extra.has(a.id));
  }

  getAgentsWithCapabilities(capabilities: string[]): Agent[] {
    return this.agents.filter((a) => capabilities.every((c) => a.capabilities.includes(c)));
  }

  getAvailableAgents(): Agent[] {
    return this.agents.filter((a) => a.isAvailable());
  }

  /**
   * Available domain matches first, else available agents whose capabilities
   * appear in the query. Among candidates: fewest active requests, then fastest
   * average, then most accurate. Remaining ties go to the first registered.
   */
  findBestAgent(request: ConsultationRequest): Agent | null {
    let candidates = this.getAgentsForDomain(request.domain).filter((a) => a.isAvailable());
    if (candidates.length === 0) {
      candidates = this.agents.filter((a) => a.canHandle(request) && a.isAvailable());
    }

    let best: Agent | null = null;
    for (const agent of candidates) {
      if (!best || ranksBefore(agent, best)) best = agent;
    }
    return best;
  }

  /** Available agents sharing the failed agent's domain or a capability, in registration order. */
  getBackupAgents(failedId: string): Agent[] {
    const failed = this.byId.get(failedId);
    if (!failed) return [];
    return this.agents
      .filter((a) => a.id !== failedId)
      .filter((a) => a.domain === failed.domain || a.capabilities.some((c) => failed.capabilities.includes(c)))
      .filter((a) => a.isAvailable())
      .slice(0, this.options.max_backup_agents);
  }

  getHealthStatus(): RegistryHealth {
    const total = this.agents.length;
    const available = this.agents.filter((a) => a.isAvailable()).length;
    const unhealthy = this.agents.filter((a) => a.getHealth().state === 'UNHEALTHY').length;
    return {
      total_agents: total,
      available_agents: available,
      unhealthy_agents: unhealthy,
      availability: total === 0 ? 1.0 : available / total,
    };
  }

  get size(): number {
    return this.agents.length;
  }
}

function ranksBefore(a: Agent, b: Agent): boolean {
  const ma = a.getMetrics();
  const mb = b.getMetrics();
  if (ma.active_requests !== mb.active_requests) return ma.active_requests < mb.active_requests;
  if (ma.average_response_time_ms !== mb.average_response_time_ms) {
    return ma.average_response_time_ms < mb.average_response_time_ms;
  }
  return ma.current_accuracy > mb.current_accuracy;
}
