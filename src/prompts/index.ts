/**
 * MCP prompt registrations: step-by-step workflows over the tools.
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

export function registerPrompts(server: McpServer): void {

  server.prompt('strengthen-story', 'Strengthen a backend story issue into testable requirements.', {
    repository: z.string(), number: z.string(),
  }, async (args) => ({
    messages: [{ role: 'user' as const, content: { type: 'text' as const, text: `# Story Strengthening

Strengthen issue ${args.repository}#${args.number}:

**Step 1** - Fetch the issue title, body and labels.

**Step 2** - Run the pipeline:
\`\`\`prompt
Use story_strengthen with repository="${args.repository}" number=${args.number} title="<title>" body="<body>" labels=[...]
\`\`\`

**Step 3** - If the result status is "stopped", report the STOP phrase and reason to the user verbatim and stop. Do not retry with edited input.

**Step 4** - Otherwise review the quality notes, then present the document and its open questions to the user.` } }],
  }));

  server.prompt('consult-agent', 'Consult a specialist agent with session context.', {
    domain: z.string(), question: z.string(), session_id: z.string(),
  }, async (args) => ({
    messages: [{ role: 'user' as const, content: { type: 'text' as const, text: `# Agent Consultation

1. Check readiness:
\`\`\`prompt
Use context_validate with domain="${args.domain}" query="${args.question}" session_id="${args.session_id}"
\`\`\`
2. Supply any missing inputs the user can provide, and record decisions with \`session_progress\`.
3. Ask:
\`\`\`prompt
Use consult with domain="${args.domain}" query="${args.question}" session_id="${args.session_id}"
\`\`\`
4. If the status is "error", read \`consult://failover\` and report which agents are failed.` } }],
  }));
}
