import { mkdtempSync, readFileSync, readdirSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { describe, expect, it } from 'vitest';
import { AgentLoop, type AgentLoopOptions } from './agent.js';
import {
  AgentInterrupted,
  ConfigurationError,
  InferenceUnavailable,
  MalformedAction,
} from './errors.js';
import { ActionExecutor } from './executor.js';
import type { Decision, InferenceClient, InferenceRequest } from './inference.js';
import { correctiveNote, repetitionNote } from './prompt.js';
import { ScreenshotRecorder } from './screenshots.js';
import { FakeDriver, ScriptedInference } from './test-utils/fakes.js';

const BASE_OPTIONS: AgentLoopOptions = {
  task: 'find the pricing page',
  startUrl: 'https://example.test/',
  maxSteps: 10,
  contextWindow: 5,
  malformedRetries: 1,
  repeatThreshold: 3,
};

const click = (x: number, y: number): Decision => ({
  action: { action: 'left_click', coordinate: [x, y] },
});
const terminate: Decision = { action: { action: 'terminate', status: 'success' } };

function setup(
  script: Array<Decision | Error>,
  options: Partial<AgentLoopOptions> = {},
  fallback?: Decision,
) {
  const driver = new FakeDriver();
  const executor = new ActionExecutor(driver, { width: 1440, height: 900 });
  const inference = new ScriptedInference(script, fallback);
  const agent = new AgentLoop({ ...BASE_OPTIONS, ...options }, { inference, executor });
  return { driver, inference, agent };
}

function clicks(driver: FakeDriver) {
  return driver.calls.filter((call) => call.op === 'click');
}

describe('AgentLoop', () => {
  it('stops at the step limit when the model never finishes', async () => {
    const { driver, inference, agent } = setup([], { maxSteps: 3 }, click(100, 100));
    const result = await agent.run();
    expect(result.status).toBe('STEP_LIMIT_REACHED');
    expect(result.steps).toBe(3);
    expect(result.error).toBeUndefined();
    expect(clicks(driver)).toHaveLength(3);
    expect(inference.requests).toHaveLength(3);
    expect(driver.closed).toBe(true);
  });

  it('fails without acting when the model endpoint times out', async () => {
    const timeout = new InferenceUnavailable('timeout', 'No response within 10ms');
    const { driver, agent } = setup([timeout]);
    const result = await agent.run();
    expect(result.status).toBe('FAILED');
    expect(result.error).toBe(timeout);
    expect(result.steps).toBe(0);
    expect(clicks(driver)).toHaveLength(0);
    expect(driver.closed).toBe(true);
  });

  it('succeeds on terminate and keeps the model verdict', async () => {
    const { driver, agent } = setup([{ action: { action: 'terminate', status: 'failure' } }]);
    const result = await agent.run();
    expect(result).toEqual({
      status: 'SUCCEEDED',
      steps: 0,
      finalUrl: 'https://example.test/',
      reportedStatus: 'failure',
    });
    expect(driver.actions).toEqual([{ op: 'close' }]);
  });

  it('succeeds on terminate after some steps', async () => {
    const { agent } = setup([click(10, 10), terminate], { maxSteps: 2 });
    const result = await agent.run();
    expect(result.status).toBe('SUCCEEDED');
    expect(result.steps).toBe(1);
  });

  it('records the answer as the session result', async () => {
    const { agent } = setup([
      click(500, 500),
      { action: { action: 'answer', text: '$12 per month' }, reasoning: 'The price is shown in the table.' },
    ]);
    const result = await agent.run();
    expect(result.status).toBe('SUCCEEDED');
    expect(result.answer).toBe('$12 per month');
    expect(result.reasoning).toBe('The price is shown in the table.');
    expect(result.steps).toBe(1);
  });

  it('retries a malformed reply once with a corrective note', async () => {
    const { inference, agent } = setup([
      new MalformedAction('Invalid action: coordinate: Required', '{"action":"left_click"}'),
      terminate,
    ]);
    const result = await agent.run();
    expect(result.status).toBe('SUCCEEDED');
    expect(inference.requests).toHaveLength(2);
    expect(inference.requests[0].notes).toEqual([]);
    expect(inference.requests[1].notes).toEqual([correctiveNote('Invalid action: coordinate: Required')]);
  });

  it('fails once malformed retries are exhausted', async () => {
    const second = new MalformedAction('Empty response from model', '');
    const { driver, inference, agent } = setup([new MalformedAction('Invalid JSON: x', '{'), second, terminate]);
    const result = await agent.run();
    expect(result.status).toBe('FAILED');
    expect(result.error).toBe(second);
    expect(inference.requests).toHaveLength(2);
    expect(driver.closed).toBe(true);
  });

  it('does not retry when the retry budget is zero', async () => {
    const { inference, agent } = setup([new MalformedAction('Invalid JSON: x', '{'), terminate], {
      malformedRetries: 0,
    });
    const result = await agent.run();
    expect(result.status).toBe('FAILED');
    expect(result.error).toBeInstanceOf(MalformedAction);
    expect(inference.requests).toHaveLength(1);
  });

  it('records failed actions in history and keeps going', async () => {
    const { driver, inference, agent } = setup([click(10, 10), terminate]);
    driver.failNext.add('click');
    const result = await agent.run();
    expect(result.status).toBe('SUCCEEDED');
    expect(result.steps).toBe(1);
    const [turn] = inference.requests[1].history;
    expect(turn.action).toEqual({ action: 'left_click', coordinate: [10, 10] });
    expect(turn.error).toBe('left_click failed: element at target is not interactable (click)');
  });

  it('clamps off-grid clicks instead of failing', async () => {
    const { driver, agent } = setup([click(1500, 200), terminate]);
    const result = await agent.run();
    expect(result.status).toBe('SUCCEEDED');
    expect(clicks(driver)).toEqual([
      { op: 'click', point: { x: 1439, y: 180 }, options: { button: 'left', clickCount: 1 } },
    ]);
  });

  it('shows the model only the most recent turns', async () => {
    const { inference, agent } = setup(
      [click(1, 1), click(2, 2), click(3, 3), click(4, 4)],
      { contextWindow: 2, maxSteps: 4 },
    );
    await agent.run();
    expect(inference.requests.map((request) => request.history.length)).toEqual([0, 1, 2, 2]);
    expect(inference.requests[3].history.map((turn) => turn.action)).toEqual([
      { action: 'left_click', coordinate: [2, 2] },
      { action: 'left_click', coordinate: [3, 3] },
    ]);
  });

  it('pairs each turn with the observation the model acted on', async () => {
    const { inference, agent } = setup([click(1, 1), terminate]);
    await agent.run();
    expect(inference.requests[0].observation.image.toString()).toBe('png-1');
    expect(inference.requests[1].history[0].observation.image.toString()).toBe('png-1');
    expect(inference.requests[1].observation.image.toString()).toBe('png-2');
  });

  it('warns the model when it repeats the same action on the same page', async () => {
    const { inference, agent } = setup([], { maxSteps: 4 }, click(100, 100));
    await agent.run();
    expect(inference.requests[2].notes).toEqual([]);
    expect(inference.requests[3].notes).toEqual([repetitionNote(3)]);
  });

  it('keeps warning about repeats when the prompt window is smaller than the threshold', async () => {
    const { inference, agent } = setup([], { maxSteps: 6, contextWindow: 2 }, click(100, 100));
    await agent.run();
    expect(inference.requests).toHaveLength(6);
    expect(inference.requests[2].notes).toEqual([]);
    expect(inference.requests[3].history).toHaveLength(2);
    expect(inference.requests[3].notes).toEqual([repetitionNote(3)]);
    expect(inference.requests[5].notes).toEqual([repetitionNote(3)]);
  });

  it('keeps the answer when the final page cannot be captured', async () => {
    const { driver, agent } = setup([{ action: { action: 'answer', text: '42' } }]);
    driver.failScreenshotsAfter = 1;
    const result = await agent.run();
    expect(result).toEqual({
      status: 'SUCCEEDED',
      steps: 0,
      finalUrl: 'https://example.test/',
      answer: '42',
    });
    expect(driver.closed).toBe(true);
  });

  it('keeps the verdict when the final page cannot be captured', async () => {
    const { driver, agent } = setup([click(10, 10), terminate]);
    driver.failScreenshotsAfter = 2;
    const result = await agent.run();
    expect(result.status).toBe('SUCCEEDED');
    expect(result.reportedStatus).toBe('success');
    expect(result.steps).toBe(1);
    expect(result.error).toBeUndefined();
  });

  it('stops between turns when interrupted', async () => {
    const controller = new AbortController();
    const driver = new FakeDriver();
    const executor = new ActionExecutor(driver, { width: 1440, height: 900 });
    const requests: InferenceRequest[] = [];
    const inference: InferenceClient = {
      async infer(request) {
        requests.push(request);
        controller.abort();
        return click(50, 50);
      },
    };
    const agent = new AgentLoop(BASE_OPTIONS, { inference, executor });
    const result = await agent.run(controller.signal);
    expect(result.status).toBe('FAILED');
    expect(result.error).toBeInstanceOf(AgentInterrupted);
    expect(result.steps).toBe(1);
    expect(requests).toHaveLength(1);
    expect(driver.closed).toBe(true);
  });

  it('fails and still cleans up when the browser cannot launch', async () => {
    const { driver, inference, agent } = setup([terminate]);
    driver.failNext.add('launch');
    const result = await agent.run();
    expect(result.status).toBe('FAILED');
    expect(result.error?.message).toBe('element at target is not interactable (launch)');
    expect(inference.requests).toHaveLength(0);
    expect(driver.closed).toBe(true);
  });

  it('writes a screenshot per observation when recording', async () => {
    const root = mkdtempSync(join(tmpdir(), 'vision-agent-'));
    const driver = new FakeDriver();
    const executor = new ActionExecutor(driver, { width: 1440, height: 900 });
    const recorder = new ScreenshotRecorder(root, 'abcd1234');
    const inference = new ScriptedInference([click(5, 5), terminate]);
    const agent = new AgentLoop(BASE_OPTIONS, { inference, executor, recorder });

    const result = await agent.run();
    expect(result.sessionId).toBe('abcd1234');
    const dir = join(root, 'abcd1234');
    expect(readdirSync(dir).sort()).toEqual(['final.png', 'initial.png', 'step_001.png']);
    expect(readFileSync(join(dir, 'step_001.png'), 'utf8')).toBe('png-2');
  });

  it.each([
    [{ contextWindow: 0 }],
    [{ maxSteps: 0 }],
    [{ malformedRetries: -1 }],
    [{ task: '  ' }],
  ])('rejects invalid options %o at construction', (options) => {
    expect(() => setup([], options)).toThrow(ConfigurationError);
  });
});
