/**
 * Error taxonomy for the agent.
 *
 * Only inference failures, exhausted retries and interrupts end a session.
 * ActionExecutionError is absorbed into the conversation history so the
 * model can correct itself on the next turn.
 */

import type { Action } from './types.js';

export type AgentErrorCode =
  | 'INFERENCE_UNAVAILABLE'
  | 'MALFORMED_ACTION'
  | 'ACTION_EXECUTION'
  | 'CONFIGURATION'
  | 'INTERRUPTED';

export abstract class AgentError extends Error {
  abstract readonly code: AgentErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type UnavailableReason = 'connection' | 'timeout' | 'endpoint';

/** The model endpoint could not be reached, timed out, or refused the request. */
export class InferenceUnavailable extends AgentError {
  readonly code = 'INFERENCE_UNAVAILABLE' as const;

  constructor(
    readonly reason: UnavailableReason,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** The model replied, but not with exactly one valid action. */
export class MalformedAction extends AgentError {
  readonly code = 'MALFORMED_ACTION' as const;

  constructor(
    message: string,
    readonly raw: string,
  ) {
    super(message);
  }
}

export class ActionExecutionError extends AgentError {
  readonly code = 'ACTION_EXECUTION' as const;

  constructor(
    readonly action: Action,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class ConfigurationError extends AgentError {
  readonly code = 'CONFIGURATION' as const;

  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
  }
}

export class AgentInterrupted extends AgentError {
  readonly code = 'INTERRUPTED' as const;

  constructor(message = 'Interrupted by user') {
    super(message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
