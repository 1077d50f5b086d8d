#!/usr/bin/env node

/**
 * Command-line entry point.
 *
 * Usage:
 *   vision-agent --query "Find the weather in Paris"
 *   vision-agent -q "Search for hiking boots" --initial-url https://example.com --max-steps 20
 *
 * Exit codes: 0 succeeded, 1 failed or bad configuration, 2 step limit reached.
 */

import { Command } from 'commander';
import dotenv from 'dotenv';
import { dirname, join, resolve } from 'path';
import { fileURLToPath } from 'url';
import { resolveConfig, type AgentConfig } from './config.js';
import { ConfigurationError, errorMessage } from './errors.js';
import { createLogger } from './log.js';
import { createAgent, exitCodeFor, formatResult, type AgentHandle } from './run-agent.js';

// dist/src/cli.js -> dist/src -> dist -> plugin-root
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const PLUGIN_ROOT = resolve(__dirname, '..', '..');

dotenv.config({ path: join(PLUGIN_ROOT, '.env') });

interface CliOptions {
  query: string;
  initialUrl?: string;
  maxSteps?: string;
  contextWindow?: string;
  saveScreenshots?: boolean;
  highlightMouse?: boolean;
  model?: string;
  ollamaUrl?: string;
  timeout?: string;
  acceptTextAnswer?: boolean;
}

const program = new Command()
  .name('vision-agent')
  .description('Browser automation agent driven by a vision-language model via Ollama')
  .requiredOption('-q, --query <task>', 'The task for the agent to execute')
  .option('--initial-url <url>', 'Starting URL (default: https://www.google.com)')
  .option('--max-steps <n>', 'Maximum actions before forced stop (default: 50)')
  .option('--context-window <n>', 'Number of recent turns to keep in context (default: 5)')
  .option('--save-screenshots', 'Save screenshots to ./screenshots/<session_id>/')
  .option('--highlight-mouse', 'Show a visual cursor indicator (for debugging)')
  .option('--model <name>', 'Ollama model name (default: qwen3-vl:8b)')
  .option('--ollama-url <url>', 'Ollama endpoint (default: $OLLAMA_HOST or http://localhost:11434)')
  .option('--timeout <ms>', 'Inference timeout in milliseconds (default: 120000)')
  .option('--accept-text-answer', 'Accept a plain-text model reply as the final answer');

function toConfig(opts: CliOptions): AgentConfig {
  return resolveConfig({
    task: opts.query,
    startUrl: opts.initialUrl,
    maxSteps: opts.maxSteps,
    contextWindow: opts.contextWindow,
    saveScreenshots: opts.saveScreenshots,
    highlightMouse: opts.highlightMouse,
    model: opts.model,
    ollamaUrl: opts.ollamaUrl,
    inferenceTimeoutMs: opts.timeout,
    acceptTextAnswer: opts.acceptTextAnswer,
  });
}

async function main(): Promise<number> {
  program.parse(process.argv);
  const log = createLogger('agent');

  let config: AgentConfig;
  try {
    config = toConfig(program.opts<CliOptions>());
  } catch (err) {
    if (err instanceof ConfigurationError) {
      log.error(err.message);
      return 1;
    }
    throw err;
  }

  let handle: AgentHandle;
  try {
    handle = createAgent(config, log);
  } catch (err) {
    log.error(errorMessage(err));
    return 1;
  }
  if (handle.recorder) {
    log.info(`Saving screenshots to: ${handle.recorder.dir}`);
  }

  const controller = new AbortController();
  process.on('SIGINT', () => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    log.warn('Interrupted; stopping after the current turn (Ctrl-C again to force quit)');
    controller.abort();
  });

  const result = await handle.agent.run(controller.signal);
  console.log(`\n${formatResult(result)}`);
  return exitCodeFor(result.status);
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    console.error('[agent] Fatal error:', err);
    process.exit(1);
  });
