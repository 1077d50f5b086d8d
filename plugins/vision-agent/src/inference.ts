/**
 * Client for the vision-language model served by Ollama.
 *
 * One request per decision: the current screenshot (resized to the model's
 * 1000x1000 grid), the task and the retained action history go in, exactly
 * one validated Action comes out.
 */

import sharp from 'sharp';
import { z } from 'zod';
import { ACTION_JSON_SCHEMA, parseAction, type CoordinateBounds } from './actions.js';
import { NORMALIZED_SIZE } from './coordinates.js';
import { InferenceUnavailable, MalformedAction, errorMessage } from './errors.js';
import { silentLogger, type Logger } from './log.js';
import { buildMessages } from './prompt.js';
import type { Action, Observation, Turn } from './types.js';

export interface InferenceRequest {
  task: string;
  /** Retained turns, oldest first. */
  history: readonly Turn[];
  observation: Observation;
  /** Corrective or advisory notes for this request only. */
  notes: readonly string[];
}

export interface Decision {
  action: Action;
  /** The model's thinking text, when the endpoint returns one. */
  reasoning?: string;
}

export interface InferenceClient {
  infer(request: InferenceRequest): Promise<Decision>;
}

export interface OllamaClientOptions {
  baseUrl: string;
  model: string;
  timeoutMs: number;
  bounds?: CoordinateBounds;
  acceptTextAnswer?: boolean;
  fetch?: typeof fetch;
  logger?: Logger;
}

const ChatResponseSchema = z.object({
  message: z
    .object({
      content: z.string().default(''),
      thinking: z.string().optional(),
    })
    .optional(),
  error: z.string().optional(),
});

/** Resize a screenshot to the model grid and return it as base64 PNG. */
export async function encodeScreenshot(image: Buffer): Promise<string> {
  const resized = await sharp(image)
    .resize(NORMALIZED_SIZE, NORMALIZED_SIZE, { fit: 'fill' })
    .png()
    .toBuffer();
  return resized.toString('base64');
}

function isTimeout(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'name' in err &&
    (err.name === 'TimeoutError' || err.name === 'AbortError')
  );
}

export class OllamaClient implements InferenceClient {
  private readonly endpoint: string;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(private readonly options: OllamaClientOptions) {
    this.endpoint = new URL('/api/chat', options.baseUrl).toString();
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = options.logger ?? silentLogger;
  }

  async infer(request: InferenceRequest): Promise<Decision> {
    const image = await encodeScreenshot(request.observation.image);
    const payload = {
      model: this.options.model,
      messages: buildMessages(request.task, request.history, request.notes, image),
      stream: false,
      format: ACTION_JSON_SCHEMA,
    };

    const body = await this.post(payload);
    const parsed = ChatResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new MalformedAction('Unexpected response envelope from Ollama', JSON.stringify(body));
    }
    if (parsed.data.error) {
      throw new InferenceUnavailable('endpoint', `Ollama error: ${parsed.data.error}`);
    }

    const content = parsed.data.message?.content ?? '';
    const thinking = parsed.data.message?.thinking?.trim();
    this.logger.debug(`Model replied: ${content.slice(0, 500)}`);

    const action = parseAction(content, {
      bounds: this.options.bounds,
      acceptTextAnswer: this.options.acceptTextAnswer,
    });
    return thinking ? { action, reasoning: thinking } : { action };
  }

  private async post(payload: unknown): Promise<unknown> {
    let res: Response;
    try {
      res = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (err) {
      throw this.unavailable(err);
    }

    if (!res.ok) {
      const errText = await res.text().catch(() => '');
      throw new InferenceUnavailable(
        'endpoint',
        `Ollama request failed (${res.status}): ${errText || res.statusText}`,
      );
    }

    let text: string;
    try {
      text = await res.text();
    } catch (err) {
      throw this.unavailable(err);
    }

    try {
      return JSON.parse(text);
    } catch {
      throw new MalformedAction('Ollama response was not JSON', text);
    }
  }

  private unavailable(err: unknown): InferenceUnavailable {
    if (isTimeout(err)) {
      return new InferenceUnavailable(
        'timeout',
        `No response from ${this.endpoint} within ${this.options.timeoutMs}ms`,
        { cause: err },
      );
    }
    return new InferenceUnavailable(
      'connection',
      `Cannot connect to Ollama at ${this.endpoint} (${errorMessage(err)}). ` +
        `Make sure it is running (ollama serve) and the model is pulled (ollama pull ${this.options.model}).`,
      { cause: err },
    );
  }
}
