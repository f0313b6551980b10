/**
 * MCP resource registrations: read-only views over the runtime.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Runtime } from '../runtime.js';

function json(href: string, value: unknown) {
  return { contents: [{ uri: href, mimeType: 'application/json', text: JSON.stringify(value, null, 2) }] };
}

export function registerResources(server: McpServer, runtime: Runtime): void {
  const { registry, failover, monitor, context } = runtime;

  server.resource('agents', 'consult://agents', { description: 'Registered agents with health and metrics', mimeType: 'application/json' }, async (uri) => {
    const agents = registry.getAllAgents().map((a) => ({
      id: a.id, name: a.name, domain: a.domain, capabilities: a.capabilities,
      dependencies: a.dependencies, health: a.getHealth(), metrics: a.getMetrics(),
    }));
    return json(uri.href, { health: registry.getHealthStatus(), agents });
  });

  server.resource('failover', 'consult://failover', { description: 'Failover statistics and per-agent states', mimeType: 'application/json' }, async (uri) =>
    json(uri.href, { statistics: failover.getFailoverStatistics(), states: failover.getAllFailoverStates() }));

  server.resource('performance', 'consult://performance', { description: 'Performance summary from the latest monitor sample', mimeType: 'application/json' }, async (uri) =>
    json(uri.href, monitor.getSummary()));

  server.resource('sessions', 'consult://sessions', { description: 'Active consultation sessions', mimeType: 'application/json' }, async (uri) => {
    const sessions = context.listSessions();
    return json(uri.href, { total: sessions.length, sessions });
  });
}
