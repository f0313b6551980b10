export { createAgent, isHealthAvailable, ManagedAgent } from './agent.js';
export type { Agent, AgentDefinition, GuidanceStrategy, StrategyResult } from './agent.js';
export { AgentRegistry, SPECIALIZED_DOMAIN_RULES } from './registry.js';
export type { DomainRule, RegistryOptions } from './registry.js';
export { createRequest, successResponse, failureResponse, isSuccessful } from './responses.js';
export type { RequestInput } from './responses.js';
export { performanceSpec, meetsPerformanceSpec } from './performance.js';
export {
  loadAgentCatalog, createPlaybookStrategy, createDefaultAgents, createRegistry, initializeRegistry,
} from './catalog.js';
export type { CatalogEntry } from './catalog.js';
