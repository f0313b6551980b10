/**
 * Default agent catalog.
 *
 * Agents are described in config/agents.json: identity, domain, capabilities,
 * performance tier and a small playbook of topics. A playbook strategy answers
 * with the first topic whose keyword appears in the query.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { bundledFile, getConfig } from '../config.js';
import { CoreError } from '../errors.js';
import { logger } from '../logger.js';
import { createAgent } from './agent.js';
import { performanceSpec } from './performance.js';
import { AgentRegistry, SPECIALIZED_DOMAIN_RULES } from './registry.js';
import type { Agent, GuidanceStrategy } from './agent.js';

const log = logger.child({ component: 'catalog' });

const TopicSchema = z.object({
  keywords: z.array(z.string().min(1)).min(1),
  guidance: z.string().min(1),
  recommendations: z.array(z.string()).default([]),
});

const CatalogEntrySchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  domain: z.string().min(1),
  capabilities: z.array(z.string()).default([]),
  dependencies: z.array(z.string()).default([]),
  tier: z.enum(['default', 'high', 'critical']).default('default'),
  confidence: z.number().min(0).max(1).default(0.95),
  topics: z.array(TopicSchema).default([]),
  fallback: z.string().min(1),
});

const CatalogSchema = z.object({ agents: z.array(CatalogEntrySchema) });

export type CatalogEntry = z.infer<typeof CatalogEntrySchema>;

export function loadAgentCatalog(path?: string): CatalogEntry[] {
  const file = path ?? getConfig().agents.catalog_path ?? bundledFile('agents.json');
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, 'utf-8'));
  } catch (err) {
    throw new CoreError('CONFIG_INVALID', `Cannot read agent catalog ${file}: ${String(err)}`);
  }
  const parsed = CatalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CoreError('CONFIG_INVALID', `Invalid agent catalog ${file}: ${parsed.error.message}`);
  }
  return parsed.data.agents;
}

export function createPlaybookStrategy(entry: CatalogEntry): GuidanceStrategy {
  return (request) => {
    const query = request.query.toLowerCase();
    const topic = entry.topics.find((t) => t.keywords.some((k) => query.includes(k.toLowerCase())));
    const header = `${entry.name} guidance for ${request.domain}:\n\n`;
    if (!topic) {
      return {
        guidance: header + entry.fallback,
        confidence: entry.confidence,
        recommendations: [],
        status: 'PARTIAL_SUCCESS',
      };
    }
    return {
      guidance: header + topic.guidance,
      confidence: entry.confidence,
      recommendations: topic.recommendations,
      metadata: { topic: topic.keywords[0] },
    };
  };
}

export function createDefaultAgents(entries: CatalogEntry[] = loadAgentCatalog()): Agent[] {
  return entries.map((entry) => createAgent(
    {
      id: entry.id,
      name: entry.name,
      domain: entry.domain,
      capabilities: entry.capabilities,
      dependencies: entry.dependencies,
      performance: performanceSpec(entry.tier),
    },
    createPlaybookStrategy(entry),
  ));
}

/** Registry options from config, with the standard specialized-domain rules. */
export function createRegistry(): AgentRegistry {
  const config = getConfig();
  return new AgentRegistry({
    max_agents: config.registry.max_agents,
    max_backup_agents: config.failover.max_backup_agents,
    domain_rules: SPECIALIZED_DOMAIN_RULES,
  });
}

export function initializeRegistry(registry: AgentRegistry, agents: Agent[] = createDefaultAgents()): AgentRegistry {
  for (const agent of agents) registry.register(agent);
  log.info({ agents: registry.size }, 'Agent registry initialized');
  return registry;
}
