#!/usr/bin/env node

/**
 * repo-velocity MCP Server
 *
 * Repository analytics over stdio: churn, risk, DORA metrics and
 * forecasts for records supplied by the caller. Tools live in tools.ts.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';

import { SERVER_VERSION, TOOL_DEFINITIONS, handleToolCall } from './tools.js';
import { describeError } from './errors.js';
import { log } from './logger.js';

const SERVER_INSTRUCTIONS = `repo-velocity computes engineering analytics from commit, pull request, deployment and incident records.

Use repo-velocity tools when the user asks about:
- Code churn, who changed what, risky or unusually large commits → run_analytics
- DORA metrics: lead time, deployment frequency, change failure rate, MTTR → run_analytics
- Predicting next week's churn or cycle time → forecast_series (or the forecasts in run_analytics)
- How a repository's numbers changed over time → get_history, or run_analytics with repository
- Threshold settings and where data is stored → get_capabilities`;

const server = new Server(
  { name: 'repo-velocity', version: SERVER_VERSION },
  {
    capabilities: { tools: {} },
    instructions: SERVER_INSTRUCTIONS,
  }
);

server.setRequestHandler(ListToolsRequestSchema, () => {
  return { tools: TOOL_DEFINITIONS };
});

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;
  return handleToolCall(name, args);
});

// ─── Start Server ────────────────────────────────────────────

async function main(): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log('info', `MCP server v${SERVER_VERSION} started`);
}

main().catch((error: unknown) => {
  log('error', `Fatal error: ${describeError(error)}`);
  process.exit(1);
});
