/**
 * Runtime validation of model output.
 *
 * The model's reply is untrusted. It must be exactly one JSON object that
 * matches one action variant, with no extra fields and no surrounding text.
 */

import { z } from 'zod';
import { MalformedAction } from './errors.js';
import type { Action, ActionKind, PointerActionKind } from './types.js';

export interface CoordinateBounds {
  min: number;
  max: number;
}

/**
 * Accepted per-axis range for coordinates in model replies. Wider than the
 * 0-1000 grid: values slightly off the grid are clamped by the mapper.
 */
export const DEFAULT_COORDINATE_BOUNDS: CoordinateBounds = { min: -1000, max: 2000 };

export const MAX_WAIT_SECONDS = 60;

export const POINTER_ACTIONS: readonly PointerActionKind[] = [
  'left_click',
  'double_click',
  'triple_click',
  'right_click',
  'middle_click',
  'mouse_move',
];

export const ACTION_KINDS: readonly ActionKind[] = [
  ...POINTER_ACTIONS,
  'left_click_drag',
  'type',
  'key',
  'scroll',
  'wait',
  'answer',
  'terminate',
];

function coordinateSchema(bounds: CoordinateBounds) {
  const axis = z.number().finite().min(bounds.min).max(bounds.max);
  return z.tuple([axis, axis]);
}

const keysSchema = z.union([
  z.array(z.string().min(1)).min(1),
  z
    .string()
    .min(1)
    .transform((combo) => combo.split('+').map((key) => key.trim()))
    .pipe(z.array(z.string().min(1)).min(1)),
]);

export function actionSchema(
  bounds: CoordinateBounds = DEFAULT_COORDINATE_BOUNDS,
): z.ZodType<Action, z.ZodTypeDef, unknown> {
  const coordinate = coordinateSchema(bounds);
  const pointer = <K extends PointerActionKind>(kind: K) =>
    z.object({ action: z.literal(kind), coordinate }).strict();

  return z.discriminatedUnion('action', [
    pointer('left_click'),
    pointer('double_click'),
    pointer('triple_click'),
    pointer('right_click'),
    pointer('middle_click'),
    pointer('mouse_move'),
    z
      .object({
        action: z.literal('left_click_drag'),
        coordinate,
        start_coordinate: coordinate.optional(),
      })
      .strict(),
    z.object({ action: z.literal('type'), text: z.string() }).strict(),
    z.object({ action: z.literal('key'), keys: keysSchema }).strict(),
    z
      .object({
        action: z.literal('scroll'),
        direction: z.enum(['up', 'down']),
        amount: z.number().positive().max(1000),
      })
      .strict(),
    z
      .object({
        action: z.literal('wait'),
        time: z.number().positive().max(MAX_WAIT_SECONDS),
      })
      .strict(),
    z.object({ action: z.literal('answer'), text: z.string().min(1) }).strict(),
    z
      .object({
        action: z.literal('terminate'),
        status: z.enum(['success', 'failure']).optional(),
      })
      .strict(),
  ]);
}

export interface ParseOptions {
  bounds?: CoordinateBounds;
  /** Treat a reply containing no JSON object at all as a plain-text answer. */
  acceptTextAnswer?: boolean;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Parse one action from the model's message content.
 * Throws MalformedAction for anything but a single valid action object.
 */
export function parseAction(content: string, options: ParseOptions = {}): Action {
  const text = content.trim();
  if (!text) {
    throw new MalformedAction('Empty response from model', content);
  }

  if (!text.startsWith('{') || !text.endsWith('}')) {
    if (options.acceptTextAnswer && !text.includes('{')) {
      return { action: 'answer', text };
    }
    throw new MalformedAction('Expected a single JSON object with no surrounding text', content);
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new MalformedAction(
      `Invalid JSON: ${err instanceof Error ? err.message : String(err)}`,
      content,
    );
  }

  const result = actionSchema(options.bounds).safeParse(data);
  if (!result.success) {
    throw new MalformedAction(`Invalid action: ${formatIssues(result.error)}`, content);
  }
  return result.data;
}

/** One-line description used in logs and in the prompt's action history. */
export function describeAction(action: Action): string {
  return JSON.stringify(action);
}

const pointerVariant = (kinds: readonly string[]) => ({
  type: 'object',
  properties: {
    action: { type: 'string', enum: kinds },
    coordinate: {
      type: 'array',
      items: { type: 'integer' },
      minItems: 2,
      maxItems: 2,
      description: '(x, y) on the 1000x1000 grid, measured from the top-left corner.',
    },
  },
  required: ['action', 'coordinate'],
  additionalProperties: false,
});

/**
 * JSON Schema passed to the endpoint as the structured-output format.
 * It mirrors actionSchema(); the zod schema remains the authority.
 */
export const ACTION_JSON_SCHEMA = {
  oneOf: [
    pointerVariant(POINTER_ACTIONS),
    {
      type: 'object',
      properties: {
        action: { type: 'string', const: 'left_click_drag' },
        coordinate: { type: 'array', items: { type: 'integer' }, minItems: 2, maxItems: 2 },
        start_coordinate: { type: 'array', items: { type: 'integer' }, minItems: 2, maxItems: 2 },
      },
      required: ['action', 'coordinate'],
      additionalProperties: false,
    },
    {
      type: 'object',
      properties: {
        action: { type: 'string', const: 'type' },
        text: { type: 'string', description: 'The text to type. The focused field is cleared first.' },
      },
      required: ['action', 'text'],
      additionalProperties: false,
    },
    {
      type: 'object',
      properties: {
        action: { type: 'string', const: 'key' },
        keys: {
          type: 'array',
          items: { type: 'string', minLength: 1 },
          minItems: 1,
          description: 'Keys pressed together, e.g. ["Control", "c"] or ["Enter"].',
        },
      },
      required: ['action', 'keys'],
      additionalProperties: false,
    },
    {
      type: 'object',
      properties: {
        action: { type: 'string', const: 'scroll' },
        direction: { type: 'string', enum: ['up', 'down'] },
        amount: {
          type: 'integer',
          minimum: 1,
          maximum: 1000,
          description: 'Scroll distance on the grid; 1000 is one screen.',
        },
      },
      required: ['action', 'direction', 'amount'],
      additionalProperties: false,
    },
    {
      type: 'object',
      properties: {
        action: { type: 'string', const: 'wait' },
        time: { type: 'number', exclusiveMinimum: 0, maximum: MAX_WAIT_SECONDS, description: 'Seconds to wait.' },
      },
      required: ['action', 'time'],
      additionalProperties: false,
    },
    {
      type: 'object',
      properties: {
        action: { type: 'string', const: 'answer' },
        text: { type: 'string', minLength: 1, description: 'The final answer to the task.' },
      },
      required: ['action', 'text'],
      additionalProperties: false,
    },
    {
      type: 'object',
      properties: {
        action: { type: 'string', const: 'terminate' },
        status: { type: 'string', enum: ['success', 'failure'] },
      },
      required: ['action'],
      additionalProperties: false,
    },
  ],
} as const;
