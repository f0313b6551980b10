/**
 * Consultation server: agent registry, failover, session context and the
 * story pipeline behind one MCP surface.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerTools } from './tools/index.js';
import { registerResources } from './resources/index.js';
import { registerPrompts } from './prompts/index.js';
import { loadConfig } from './config.js';
import { createRuntime } from './runtime.js';
import type { Runtime } from './runtime.js';

const SERVER_INSTRUCTIONS = `Agent consultation core: a registry of specialist agents (architecture, security, event-driven, CI/CD, configuration, resilience and more) with automatic failover, plus a story-strengthening pipeline for backend user stories.

## How to use

- **consult** - Ask a question in a domain. The best available agent answers; when it fails, backup agents are tried in order. Pass a session_id to accumulate decisions, files and integration points across calls.
- **context_validate** / **session_progress** - Check and record session context before important consultations.
- **story_strengthen** - Turn a "[BACKEND] [STORY]" issue into EARS requirements and Gherkin acceptance criteria.

## Critical rules

- A result with status "stopped" carries a STOP phrase. Report it to the user verbatim and do not retry with altered input.
- When control="user", present the result and wait for the user.
- Failed agents recover on their own; check failover_status instead of retrying in a loop.`;

export function createServer(runtime?: Runtime): McpServer {
  loadConfig();
  const rt = runtime ?? createRuntime();

  const server = new McpServer(
    {
      name: 'agent-consultation-core',
      version: '0.1.0',
    },
    {
      capabilities: { tools: {}, resources: {}, prompts: {}, logging: {} },
      instructions: SERVER_INSTRUCTIONS,
    },
  );

  registerTools(server, rt);
  registerResources(server, rt);
  registerPrompts(server);
  rt.start();

  return server;
}
