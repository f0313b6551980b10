/**
 * Runtime: the long-lived objects one server process owns, wired together.
 */

import { getConfig } from './config.js';
import { logger } from './logger.js';
import { createRegistry, initializeRegistry } from './agents/index.js';
import { FailoverManager } from './failover/index.js';
import { ContextAwareGuidanceManager } from './context/index.js';
import { StoryStrengtheningPipeline } from './story/index.js';
import { PerformanceMonitor } from './monitoring/index.js';
import type { Agent, AgentRegistry } from './agents/index.js';

export interface Runtime {
  registry: AgentRegistry;
  failover: FailoverManager;
  context: ContextAwareGuidanceManager;
  pipeline: StoryStrengtheningPipeline;
  monitor: PerformanceMonitor;
  start(): void;
  stop(): void;
}

export function createRuntime(agents?: Agent[]): Runtime {
  const config = getConfig();
  if (!process.env.LOG_LEVEL) logger.level = config.logging.level;

  const registry = initializeRegistry(createRegistry(), agents);
  const failover = new FailoverManager(registry);
  const monitor = new PerformanceMonitor(registry);

  return {
    registry,
    failover,
    context: new ContextAwareGuidanceManager(),
    pipeline: new StoryStrengtheningPipeline(),
    monitor,
    start() {
      failover.start();
      monitor.start();
    },
    stop() {
      failover.stop();
      monitor.stop();
    },
  };
}
