export { AgentLoop, type AgentLoopDeps, type AgentLoopOptions, type AgentResult } from './agent.js';
export {
  ACTION_JSON_SCHEMA,
  DEFAULT_COORDINATE_BOUNDS,
  actionSchema,
  describeAction,
  parseAction,
  type CoordinateBounds,
  type ParseOptions,
} from './actions.js';
export { PlaywrightDriver, type BrowserDriver, type ClickOptions, type MouseButton } from './browser.js';
export { resolveConfig, type AgentConfig, type ConfigInput } from './config.js';
export { ContextWindow } from './context-window.js';
export { NORMALIZED_SIZE, scrollPixels, toPixel } from './coordinates.js';
export {
  ActionExecutionError,
  AgentError,
  AgentInterrupted,
  ConfigurationError,
  InferenceUnavailable,
  MalformedAction,
} from './errors.js';
export { ActionExecutor } from './executor.js';
export {
  OllamaClient,
  encodeScreenshot,
  type Decision,
  type InferenceClient,
  type InferenceRequest,
} from './inference.js';
export { createLogger, type Logger, type LogLevel } from './log.js';
export { ScreenshotRecorder } from './screenshots.js';
export { createAgent, exitCodeFor, formatResult, serializeResult } from './run-agent.js';
export type * from './types.js';
export { isTerminalAction } from './types.js';
