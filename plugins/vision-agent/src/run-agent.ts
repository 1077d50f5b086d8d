import { resolve } from 'path';
import { AgentLoop, type AgentResult } from './agent.js';
import { PlaywrightDriver } from './browser.js';
import type { AgentConfig } from './config.js';
import { ActionExecutor } from './executor.js';
import { OllamaClient } from './inference.js';
import { createLogger, type Logger } from './log.js';
import { ScreenshotRecorder } from './screenshots.js';
import type { TerminalStatus } from './types.js';

export interface AgentHandle {
  agent: AgentLoop;
  recorder?: ScreenshotRecorder;
}

/** Wire a full agent (Chrome, Ollama, optional screenshot recorder) from config. */
export function createAgent(config: AgentConfig, logger: Logger = createLogger('agent')): AgentHandle {
  const driver = new PlaywrightDriver({
    headless: config.headless,
    chromePath: config.chromePath,
    highlightMouse: config.highlightMouse,
    logger: createLogger('browser'),
  });
  const executor = new ActionExecutor(driver, config.viewport, logger);
  const inference = new OllamaClient({
    baseUrl: config.ollamaUrl,
    model: config.model,
    timeoutMs: config.inferenceTimeoutMs,
    acceptTextAnswer: config.acceptTextAnswer,
    logger: createLogger('model'),
  });
  const recorder = config.saveScreenshots
    ? new ScreenshotRecorder(resolve(config.screenshotDir), undefined, logger)
    : undefined;

  const agent = new AgentLoop(
    {
      task: config.task,
      startUrl: config.startUrl,
      maxSteps: config.maxSteps,
      contextWindow: config.contextWindow,
      malformedRetries: config.malformedRetries,
      repeatThreshold: config.repeatThreshold,
    },
    { inference, executor, recorder, logger },
  );
  return recorder ? { agent, recorder } : { agent };
}

const EXIT_CODES: Record<TerminalStatus, number> = {
  SUCCEEDED: 0,
  FAILED: 1,
  STEP_LIMIT_REACHED: 2,
};

export function exitCodeFor(status: TerminalStatus): number {
  return EXIT_CODES[status];
}

const RULE = '='.repeat(60);

export function formatResult(result: AgentResult): string {
  const lines = [
    RULE,
    `Status: ${result.status}`,
    `Actions: ${result.steps}`,
    `Final URL: ${result.finalUrl}`,
  ];
  if (result.answer !== undefined) lines.push(`Answer: ${result.answer}`);
  if (result.reportedStatus) lines.push(`Model verdict: ${result.reportedStatus}`);
  if (result.reasoning) lines.push(`Reasoning: ${result.reasoning}`);
  if (result.error) lines.push(`Error: ${result.error.name}: ${result.error.message}`);
  lines.push(RULE);
  return lines.join('\n');
}

/** JSON-safe view of a result, for tool responses. */
export function serializeResult(result: AgentResult): Record<string, unknown> {
  const { error, ...rest } = result;
  return error ? { ...rest, error: { name: error.name, message: error.message } } : { ...rest };
}
