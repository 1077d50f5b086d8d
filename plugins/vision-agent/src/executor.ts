import type { BrowserDriver, ClickOptions } from './browser.js';
import { scrollPixels, toPixel } from './coordinates.js';
import { ActionExecutionError, errorMessage } from './errors.js';
import { silentLogger, type Logger } from './log.js';
import type { Action, Observation, Point, PointerActionKind, Viewport } from './types.js';

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const CLICKS: Record<Exclude<PointerActionKind, 'mouse_move'>, ClickOptions> = {
  left_click: { button: 'left', clickCount: 1 },
  double_click: { button: 'left', clickCount: 2 },
  triple_click: { button: 'left', clickCount: 3 },
  right_click: { button: 'right', clickCount: 1 },
  middle_click: { button: 'middle', clickCount: 1 },
};

/** Select-all then delete, so `type` overwrites instead of appending. */
const CLEAR_FIELD_KEYS: string[][] = [['ControlOrMeta', 'a'], ['Delete']];

/**
 * Applies one action to the browser and reports what the page looks like
 * afterwards. The only component that touches the driver.
 */
export class ActionExecutor {
  private pointer: Point = { x: 0, y: 0 };
  private readonly logger: Logger;

  constructor(
    private readonly driver: BrowserDriver,
    private readonly viewportSize: Viewport,
    logger?: Logger,
  ) {
    this.logger = logger ?? silentLogger;
  }

  /** Launch the browser, open the start page and take the initial observation. */
  async start(url: string): Promise<Observation> {
    await this.driver.launch(this.viewportSize);
    await this.driver.goto(url);
    return this.observe();
  }

  async observe(): Promise<Observation> {
    await this.driver.settle();
    const image = await this.driver.screenshot();
    return { image, url: this.driver.currentUrl(), viewport: this.driver.viewport() };
  }

  /**
   * Perform the action and return a fresh observation. Driver failures during
   * the action become ActionExecutionError; a failure to observe afterwards
   * propagates unchanged.
   */
  async execute(action: Action): Promise<Observation> {
    try {
      await this.perform(action);
    } catch (err) {
      throw new ActionExecutionError(
        action,
        `${action.action} failed: ${errorMessage(err)}`,
        { cause: err },
      );
    }
    return this.observe();
  }

  async close(): Promise<void> {
    await this.driver.close();
  }

  private map(coordinate: [number, number]): Point {
    return toPixel(coordinate, this.driver.viewport());
  }

  private async pointAt(point: Point): Promise<void> {
    await this.driver.highlight(point);
    this.pointer = point;
  }

  private async perform(action: Action): Promise<void> {
    switch (action.action) {
      case 'left_click':
      case 'double_click':
      case 'triple_click':
      case 'right_click':
      case 'middle_click': {
        const point = this.map(action.coordinate);
        await this.pointAt(point);
        await this.driver.click(point, CLICKS[action.action]);
        return;
      }
      case 'mouse_move': {
        const point = this.map(action.coordinate);
        await this.pointAt(point);
        await this.driver.move(point);
        return;
      }
      case 'left_click_drag': {
        const from = action.start_coordinate ? this.map(action.start_coordinate) : this.pointer;
        const to = this.map(action.coordinate);
        await this.driver.highlight(from);
        await this.driver.drag(from, to);
        await this.pointAt(to);
        return;
      }
      case 'type':
        for (const combo of CLEAR_FIELD_KEYS) {
          await this.driver.pressKeys(combo);
        }
        await this.driver.typeText(action.text);
        return;
      case 'key':
        await this.driver.pressKeys(action.keys);
        return;
      case 'scroll': {
        const pixels = scrollPixels(action.amount, this.driver.viewport().height);
        await this.driver.scroll(action.direction === 'up' ? -pixels : pixels, this.pointer);
        return;
      }
      case 'wait':
        this.logger.debug(`Waiting ${action.time}s`);
        await sleep(action.time * 1000);
        return;
      case 'answer':
      case 'terminate':
        // Terminal signals for the loop; the browser is left alone.
        return;
      default: {
        const unreachable: never = action;
        throw new Error(`Unknown action: ${JSON.stringify(unreachable)}`);
      }
    }
  }
}
