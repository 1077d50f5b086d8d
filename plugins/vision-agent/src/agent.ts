/**
 * The agent control loop.
 *
 * Each turn: render the context window, ask the model for one action, run
 * it in the browser, record the turn, check termination. Turns are strictly
 * sequential because every request depends on the previous observation.
 *
 *   RUNNING -> RUNNING | SUCCEEDED | FAILED | STEP_LIMIT_REACHED
 *
 * Terminal states are final. Browser cleanup runs on every exit path.
 */

import { describeAction } from './actions.js';
import { ContextWindow } from './context-window.js';
import {
  ActionExecutionError,
  AgentInterrupted,
  ConfigurationError,
  MalformedAction,
  errorMessage,
} from './errors.js';
import type { ActionExecutor } from './executor.js';
import type { Decision, InferenceClient } from './inference.js';
import { silentLogger, type Logger } from './log.js';
import { correctiveNote, repetitionNote } from './prompt.js';
import { ScreenshotRecorder } from './screenshots.js';
import {
  isTerminalAction,
  type Observation,
  type SessionStatus,
  type TerminalStatus,
  type Turn,
} from './types.js';

export interface AgentLoopOptions {
  task: string;
  startUrl: string;
  maxSteps: number;
  contextWindow: number;
  /** Extra inference attempts after a malformed reply before the session fails. */
  malformedRetries: number;
  /** Identical actions in a row on one URL before the model is warned. */
  repeatThreshold: number;
}

export interface AgentLoopDeps {
  inference: InferenceClient;
  executor: ActionExecutor;
  recorder?: ScreenshotRecorder;
  logger?: Logger;
}

export interface AgentResult {
  status: TerminalStatus;
  /** Browser actions attempted, failed ones included. */
  steps: number;
  finalUrl: string;
  answer?: string;
  /** The model's own verdict when it ended with `terminate`. */
  reportedStatus?: 'success' | 'failure';
  reasoning?: string;
  error?: Error;
  sessionId?: string;
}

interface Session {
  readonly task: string;
  readonly history: ContextWindow<Turn>;
  step: number;
  status: SessionStatus;
  finalUrl: string;
  answer?: string;
  reportedStatus?: 'success' | 'failure';
  reasoning?: string;
  error?: Error;
}

interface RecentAction {
  url: string;
  action: string;
}

function requireInteger(name: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError('Invalid agent options', [
      `${name} must be an integer >= ${min}, got ${String(value)}`,
    ]);
  }
}

export class AgentLoop {
  private readonly history: ContextWindow<Turn>;
  /** Last `repeatThreshold` actions with their page, independent of the prompt window. */
  private readonly recent: ContextWindow<RecentAction>;
  private readonly inference: InferenceClient;
  private readonly executor: ActionExecutor;
  private readonly recorder: ScreenshotRecorder | undefined;
  private readonly logger: Logger;

  constructor(
    private readonly options: AgentLoopOptions,
    deps: AgentLoopDeps,
  ) {
    if (!options.task.trim()) {
      throw new ConfigurationError('Invalid agent options', ['task must not be empty']);
    }
    requireInteger('maxSteps', options.maxSteps, 1);
    requireInteger('malformedRetries', options.malformedRetries, 0);
    requireInteger('repeatThreshold', options.repeatThreshold, 1);
    this.history = new ContextWindow<Turn>(options.contextWindow);
    this.recent = new ContextWindow<RecentAction>(options.repeatThreshold);

    this.inference = deps.inference;
    this.executor = deps.executor;
    this.recorder = deps.recorder;
    this.logger = deps.logger ?? silentLogger;
  }

  async run(signal?: AbortSignal): Promise<AgentResult> {
    this.history.reset();
    this.recent.reset();
    const session: Session = {
      task: this.options.task,
      history: this.history,
      step: 0,
      status: 'RUNNING',
      finalUrl: this.options.startUrl,
    };
    this.logger.info(`Task: ${session.task}`);

    try {
      let observation = await this.executor.start(this.options.startUrl);
      session.finalUrl = observation.url;
      this.recorder?.save(observation, 'initial');

      while (session.status === 'RUNNING') {
        if (signal?.aborted) {
          throw new AgentInterrupted();
        }
        observation = await this.runTurn(session, observation);
      }
    } catch (err) {
      session.status = 'FAILED';
      session.error = err instanceof Error ? err : new Error(String(err));
      this.logger.error(`Session failed: ${session.error.message}`);
    } finally {
      await this.cleanup();
    }

    return this.toResult(session);
  }

  /** One iteration of the state machine. Returns the observation for the next turn. */
  private async runTurn(session: Session, observation: Observation): Promise<Observation> {
    const decision = await this.decide(session, observation);
    const { action, reasoning } = decision;
    this.logDecision(session.step + 1, decision);

    if (isTerminalAction(action)) {
      session.reasoning = reasoning;
      if (action.action === 'answer') {
        session.answer = action.text;
        this.logger.info(`Answer: ${action.text}`);
      } else {
        session.reportedStatus = action.status;
      }
      session.status = 'SUCCEEDED';

      try {
        const trailing = await this.executor.execute(action);
        this.recorder?.save(trailing, 'final');
        session.finalUrl = trailing.url;
        return trailing;
      } catch (err) {
        this.logger.warn(`Could not capture the final page: ${errorMessage(err)}`);
        return observation;
      }
    }

    let next: Observation;
    let failure: string | undefined;
    try {
      next = await this.executor.execute(action);
    } catch (err) {
      if (!(err instanceof ActionExecutionError)) throw err;
      failure = err.message;
      this.logger.warn(`Action failed, continuing: ${failure}`);
      next = await this.executor.observe();
    }

    const turn: Turn = Object.freeze({
      observation,
      action,
      ...(reasoning ? { reasoning } : {}),
      ...(failure ? { error: failure } : {}),
    });
    session.history.append(turn);
    this.recent.append({ url: observation.url, action: describeAction(action) });
    session.step++;
    session.finalUrl = next.url;
    this.recorder?.save(next, ScreenshotRecorder.stepName(session.step));

    if (session.step >= this.options.maxSteps) {
      this.logger.warn(`Reached max steps (${this.options.maxSteps})`);
      session.status = 'STEP_LIMIT_REACHED';
    }
    return next;
  }

  /** Ask the model for an action, retrying malformed replies with a corrective note. */
  private async decide(session: Session, observation: Observation): Promise<Decision> {
    const history = session.history.render();
    let notes = this.advisoryNotes(observation.url);
    let attempt = 0;

    while (true) {
      try {
        return await this.inference.infer({ task: session.task, history, observation, notes });
      } catch (err) {
        if (!(err instanceof MalformedAction) || attempt >= this.options.malformedRetries) {
          throw err;
        }
        attempt++;
        this.logger.warn(
          `Could not parse action (${err.message}); retrying ${attempt}/${this.options.malformedRetries}`,
        );
        notes = [...notes, correctiveNote(err.message)];
      }
    }
  }

  private advisoryNotes(url: string): string[] {
    const threshold = this.options.repeatThreshold;
    if (threshold < 2 || this.recent.size < threshold) return [];
    const recent = this.recent.render();
    const first = recent[0].action;
    const stuck = recent.every((entry) => entry.url === url && entry.action === first);
    return stuck ? [repetitionNote(threshold)] : [];
  }

  private logDecision(step: number, decision: Decision): void {
    if (decision.reasoning) {
      this.logger.debug(`Reasoning: ${decision.reasoning}`);
    }
    this.logger.info(`Step ${step}: ${describeAction(decision.action)}`);
  }

  private async cleanup(): Promise<void> {
    try {
      await this.executor.close();
    } catch (err) {
      this.logger.warn(`Browser cleanup failed: ${errorMessage(err)}`);
    }
  }

  private toResult(session: Session): AgentResult {
    if (session.status === 'RUNNING') {
      throw new Error('Session result requested while still running');
    }
    const result: AgentResult = {
      status: session.status,
      steps: session.step,
      finalUrl: session.finalUrl,
    };
    if (session.answer !== undefined) result.answer = session.answer;
    if (session.reportedStatus !== undefined) result.reportedStatus = session.reportedStatus;
    if (session.reasoning !== undefined) result.reasoning = session.reasoning;
    if (session.error !== undefined) result.error = session.error;
    if (this.recorder) result.sessionId = this.recorder.sessionId;
    return result;
  }
}
