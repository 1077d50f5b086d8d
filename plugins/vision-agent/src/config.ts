import { z } from 'zod';
import { ConfigurationError } from './errors.js';

export const DEFAULT_VIEWPORT = { width: 1440, height: 900 } as const;

const positiveInt = z.coerce.number().int().positive();

export const ConfigSchema = z.object({
  task: z.string().trim().min(1, 'task must not be empty'),
  startUrl: z.string().url().default('https://www.google.com'),
  maxSteps: positiveInt.default(50),
  contextWindow: positiveInt.default(5),
  saveScreenshots: z.boolean().default(false),
  screenshotDir: z.string().min(1).default('screenshots'),
  highlightMouse: z.boolean().default(false),
  model: z.string().min(1).default('qwen3-vl:8b'),
  ollamaUrl: z.string().url().default('http://localhost:11434'),
  inferenceTimeoutMs: positiveInt.default(120_000),
  /** Extra inference attempts, with a corrective note, after a malformed reply. */
  malformedRetries: z.coerce.number().int().min(0).default(1),
  /** Identical consecutive actions on one URL before the model is told to change course. */
  repeatThreshold: positiveInt.default(3),
  acceptTextAnswer: z.boolean().default(false),
  headless: z.boolean().default(false),
  chromePath: z.string().min(1).optional(),
  viewport: z
    .object({ width: positiveInt, height: positiveInt })
    .default({ ...DEFAULT_VIEWPORT }),
});

export type AgentConfig = z.infer<typeof ConfigSchema>;

export type ConfigInput = Partial<Record<keyof AgentConfig, unknown>>;

type Env = Record<string, string | undefined>;

function envValue(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/** Ollama accepts OLLAMA_HOST without a scheme (e.g. "127.0.0.1:11434"). */
export function normalizeOllamaUrl(host: string): string {
  return /^https?:\/\//i.test(host) ? host : `http://${host}`;
}

function dropUndefined(input: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined));
}

/**
 * Merge explicit settings over environment over defaults and validate.
 * Throws ConfigurationError listing every problem found.
 */
export function resolveConfig(input: ConfigInput, env: Env = process.env): AgentConfig {
  const ollamaHost = envValue(env, 'OLLAMA_HOST');
  const fromEnv: Record<string, unknown> = {
    model: envValue(env, 'VISION_AGENT_MODEL'),
    ollamaUrl: ollamaHost ? normalizeOllamaUrl(ollamaHost) : undefined,
    headless: envValue(env, 'PLAYWRIGHT_HEADLESS') ? true : undefined,
    chromePath: envValue(env, 'CHROME_PATH'),
  };

  const merged = { ...dropUndefined(fromEnv), ...dropUndefined(input) };
  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigurationError(
      'Invalid configuration',
      result.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`),
    );
  }
  return result.data;
}
