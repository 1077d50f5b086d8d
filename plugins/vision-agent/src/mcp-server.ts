#!/usr/bin/env node

/**
 * MCP server exposing the agent as a single tool.
 *
 * `browser_agent_run` runs one complete session (launch, loop, close) and
 * returns the result as JSON. Logs go to stderr; stdout carries the stdio
 * transport.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import dotenv from 'dotenv';
import { dirname, join, resolve } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { resolveConfig } from './config.js';
import { createLogger } from './log.js';
import { createAgent, serializeResult } from './run-agent.js';

// ---------- Resolve paths & load env ----------

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
// dist/src/mcp-server.js -> dist/src -> dist -> plugin-root
const PLUGIN_ROOT = resolve(__dirname, '..', '..');

dotenv.config({ path: join(PLUGIN_ROOT, '.env') });

const log = createLogger('mcp');

/** Sessions in flight, aborted on shutdown so their browsers get closed. */
const _running = new Set<AbortController>();

// ---------- Helper ----------

function json(obj: Record<string, unknown>, isError = false) {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(obj, null, 2) }],
    ...(isError ? { isError: true } : {}),
  };
}

// ---------- MCP Server ----------

const server = new McpServer({ name: 'vision-agent', version: '0.1.0' });

server.registerTool(
  'browser_agent_run',
  {
    description:
      'Complete a task in a real browser tab. A vision-language model looks at screenshots and clicks, types and scrolls until it answers, gives up, or hits the step limit. Returns the final status, answer and URL.',
    inputSchema: {
      task: z.string().describe('What the agent should accomplish, in plain language'),
      url: z.string().optional().describe('Starting URL (default: https://www.google.com)'),
      maxSteps: z.number().int().optional().describe('Maximum browser actions (default: 50)'),
      contextWindow: z
        .number()
        .int()
        .optional()
        .describe('Number of recent turns shown to the model (default: 5)'),
      model: z.string().optional().describe('Ollama model name (default: qwen3-vl:8b)'),
      saveScreenshots: z.boolean().optional().describe('Save every screenshot under ./screenshots'),
    },
  },
  async ({ task, url, maxSteps, contextWindow, model, saveScreenshots }) => {
    const controller = new AbortController();
    _running.add(controller);
    try {
      const config = resolveConfig({
        task,
        startUrl: url,
        maxSteps,
        contextWindow,
        model,
        saveScreenshots,
      });
      const { agent } = createAgent(config, createLogger('agent'));
      const result = await agent.run(controller.signal);
      return json(
        { success: result.status === 'SUCCEEDED', ...serializeResult(result) },
        result.status === 'FAILED',
      );
    } catch (err) {
      return json(
        { success: false, error: err instanceof Error ? err.message : String(err) },
        true,
      );
    } finally {
      _running.delete(controller);
    }
  },
);

// ---------- Start ----------

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info('Listening on stdio');
}

main().catch((err) => {
  console.error('MCP server failed to start:', err);
  process.exit(1);
});

// Abort running sessions; each closes its own browser before its run resolves.
function shutdown() {
  for (const controller of _running) controller.abort();
  const deadline = Date.now() + 10_000;
  const timer = setInterval(() => {
    if (_running.size === 0 || Date.now() > deadline) {
      clearInterval(timer);
      process.exit(0);
    }
  }, 100);
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
