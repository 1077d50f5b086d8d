import { afterEach, describe, expect, it, vi } from 'vitest';
import { ActionExecutionError } from './errors.js';
import { ActionExecutor } from './executor.js';
import { FakeDriver } from './test-utils/fakes.js';

const VIEWPORT = { width: 1440, height: 900 };

async function started() {
  const driver = new FakeDriver();
  const executor = new ActionExecutor(driver, VIEWPORT);
  const initial = await executor.start('https://example.test/');
  return { driver, executor, initial };
}

describe('ActionExecutor', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('launches at the configured viewport and observes the start page', async () => {
    const { driver, initial } = await started();
    expect(driver.calls.slice(0, 2)).toEqual([
      { op: 'launch', viewport: VIEWPORT },
      { op: 'goto', url: 'https://example.test/' },
    ]);
    expect(initial.url).toBe('https://example.test/');
    expect(initial.viewport).toEqual(VIEWPORT);
    expect(initial.image.toString()).toBe('png-1');
  });

  it('maps click coordinates and marks the target first', async () => {
    const { driver, executor } = await started();
    const observation = await executor.execute({ action: 'left_click', coordinate: [500, 500] });
    expect(driver.calls.slice(2)).toEqual([
      { op: 'highlight', point: { x: 720, y: 450 } },
      { op: 'click', point: { x: 720, y: 450 }, options: { button: 'left', clickCount: 1 } },
    ]);
    expect(observation.image.toString()).toBe('png-2');
  });

  it('uses the right button and click count for each click kind', async () => {
    const { driver, executor } = await started();
    await executor.execute({ action: 'double_click', coordinate: [0, 0] });
    await executor.execute({ action: 'triple_click', coordinate: [0, 0] });
    await executor.execute({ action: 'right_click', coordinate: [0, 0] });
    await executor.execute({ action: 'middle_click', coordinate: [0, 0] });
    const clicks = driver.actions.filter((call) => call.op === 'click');
    expect(clicks.map((call) => (call.op === 'click' ? call.options : undefined))).toEqual([
      { button: 'left', clickCount: 2 },
      { button: 'left', clickCount: 3 },
      { button: 'right', clickCount: 1 },
      { button: 'middle', clickCount: 1 },
    ]);
  });

  it('clamps out-of-range coordinates onto the viewport', async () => {
    const { driver, executor } = await started();
    await executor.execute({ action: 'left_click', coordinate: [1500, 200] });
    expect(driver.actions).toEqual([
      { op: 'click', point: { x: 1439, y: 180 }, options: { button: 'left', clickCount: 1 } },
    ]);
  });

  it('drags from the last pointer position when no start is given', async () => {
    const { driver, executor } = await started();
    await executor.execute({ action: 'mouse_move', coordinate: [500, 500] });
    await executor.execute({ action: 'left_click_drag', coordinate: [1000, 0] });
    await executor.execute({ action: 'left_click_drag', start_coordinate: [0, 1000], coordinate: [100, 100] });
    expect(driver.actions).toEqual([
      { op: 'move', point: { x: 720, y: 450 } },
      { op: 'drag', from: { x: 720, y: 450 }, to: { x: 1439, y: 0 } },
      { op: 'drag', from: { x: 0, y: 899 }, to: { x: 144, y: 90 } },
    ]);
  });

  it('clears the field before typing', async () => {
    const { driver, executor } = await started();
    await executor.execute({ action: 'type', text: 'hiking boots' });
    expect(driver.actions).toEqual([
      { op: 'keys', keys: ['ControlOrMeta', 'a'] },
      { op: 'keys', keys: ['Delete'] },
      { op: 'type', text: 'hiking boots' },
    ]);
  });

  it('passes key combos through and scrolls at the pointer', async () => {
    const { driver, executor } = await started();
    await executor.execute({ action: 'key', keys: ['Control', 'l'] });
    await executor.execute({ action: 'scroll', direction: 'up', amount: 500 });
    await executor.execute({ action: 'mouse_move', coordinate: [500, 500] });
    await executor.execute({ action: 'scroll', direction: 'down', amount: 1000 });
    expect(driver.actions).toEqual([
      { op: 'keys', keys: ['Control', 'l'] },
      { op: 'scroll', deltaY: -450, at: { x: 0, y: 0 } },
      { op: 'move', point: { x: 720, y: 450 } },
      { op: 'scroll', deltaY: 900, at: { x: 720, y: 450 } },
    ]);
  });

  it('waits for the requested time', async () => {
    vi.useFakeTimers();
    const { driver, executor } = await started();
    let done = false;
    const pending = executor.execute({ action: 'wait', time: 2 }).then(() => {
      done = true;
    });
    await vi.advanceTimersByTimeAsync(1999);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toBe(true);
    expect(driver.actions).toEqual([]);
  });

  it('returns an observation for terminal actions without touching the page', async () => {
    const { driver, executor } = await started();
    const afterAnswer = await executor.execute({ action: 'answer', text: 'done' });
    const afterTerminate = await executor.execute({ action: 'terminate' });
    expect(driver.actions).toEqual([]);
    expect(afterAnswer.url).toBe('https://example.test/');
    expect(afterTerminate.image.toString()).toBe('png-3');
  });

  it('wraps driver failures as ActionExecutionError', async () => {
    const { driver, executor } = await started();
    driver.failNext.add('click');
    const error = await executor
      .execute({ action: 'right_click', coordinate: [10, 10] })
      .catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ActionExecutionError);
    if (!(error instanceof ActionExecutionError)) return;
    expect(error.message).toBe('right_click failed: element at target is not interactable (click)');
    expect(error.action).toEqual({ action: 'right_click', coordinate: [10, 10] });
    expect(error.cause).toBeInstanceOf(Error);
  });

  it('closes the driver', async () => {
    const { driver, executor } = await started();
    await executor.close();
    expect(driver.closed).toBe(true);
  });
});
