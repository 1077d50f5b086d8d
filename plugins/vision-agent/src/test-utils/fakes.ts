import type { BrowserDriver, ClickOptions } from '../browser.js';
import type { Decision, InferenceClient, InferenceRequest } from '../inference.js';
import type { Point, Viewport } from '../types.js';

export type DriverCall =
  | { op: 'launch'; viewport: Viewport }
  | { op: 'goto'; url: string }
  | { op: 'click'; point: Point; options: ClickOptions }
  | { op: 'move'; point: Point }
  | { op: 'drag'; from: Point; to: Point }
  | { op: 'type'; text: string }
  | { op: 'keys'; keys: string[] }
  | { op: 'scroll'; deltaY: number; at: Point }
  | { op: 'highlight'; point: Point }
  | { op: 'close' };

/** In-memory browser that records every call. */
export class FakeDriver implements BrowserDriver {
  readonly calls: DriverCall[] = [];
  url = 'about:blank';
  closed = false;
  private size: Viewport = { width: 0, height: 0 };
  private shots = 0;
  /** Ops that throw on their next call. */
  readonly failNext = new Set<DriverCall['op']>();
  /** When set, every screenshot after this many throws as if the tab had closed. */
  failScreenshotsAfter: number | undefined;

  private record(call: DriverCall): void {
    if (this.failNext.delete(call.op)) {
      throw new Error(`element at target is not interactable (${call.op})`);
    }
    this.calls.push(call);
  }

  get actions(): DriverCall[] {
    return this.calls.filter((call) => call.op !== 'highlight' && call.op !== 'launch' && call.op !== 'goto');
  }

  async launch(viewport: Viewport): Promise<void> {
    this.size = { ...viewport };
    this.record({ op: 'launch', viewport });
  }

  async goto(url: string): Promise<void> {
    this.record({ op: 'goto', url });
    this.url = url;
  }

  viewport(): Viewport {
    return { ...this.size };
  }

  async screenshot(): Promise<Buffer> {
    this.shots++;
    if (this.failScreenshotsAfter !== undefined && this.shots > this.failScreenshotsAfter) {
      throw new Error('Target page has been closed');
    }
    return Buffer.from(`png-${this.shots}`);
  }

  currentUrl(): string {
    return this.url;
  }

  async click(point: Point, options: ClickOptions = {}): Promise<void> {
    this.record({ op: 'click', point, options });
  }

  async move(point: Point): Promise<void> {
    this.record({ op: 'move', point });
  }

  async drag(from: Point, to: Point): Promise<void> {
    this.record({ op: 'drag', from, to });
  }

  async typeText(text: string): Promise<void> {
    this.record({ op: 'type', text });
  }

  async pressKeys(keys: string[]): Promise<void> {
    this.record({ op: 'keys', keys });
  }

  async scroll(deltaY: number, at: Point): Promise<void> {
    this.record({ op: 'scroll', deltaY, at });
  }

  async highlight(point: Point): Promise<void> {
    this.record({ op: 'highlight', point });
  }

  async settle(): Promise<void> {}

  async close(): Promise<void> {
    this.closed = true;
    this.calls.push({ op: 'close' });
  }
}

/** Replays a fixed script of decisions or errors, one per call. */
export class ScriptedInference implements InferenceClient {
  readonly requests: InferenceRequest[] = [];

  constructor(
    private readonly script: Array<Decision | Error>,
    private readonly fallback?: Decision,
  ) {}

  async infer(request: InferenceRequest): Promise<Decision> {
    this.requests.push({ ...request, history: [...request.history], notes: [...request.notes] });
    const next = this.script.shift() ?? this.fallback;
    if (next === undefined) {
      throw new Error('ScriptedInference ran out of responses');
    }
    if (next instanceof Error) throw next;
    return next;
  }
}
