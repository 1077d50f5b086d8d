/**
 * In-process Playwright backend: one local Chrome, one context, one tab.
 *
 * The agent never touches Playwright directly; everything it needs from the
 * browser goes through the BrowserDriver capability set below.
 */

import { chromium, type Browser, type BrowserContext, type Page } from 'playwright-core';
import { findLocalChrome, normalizeKey, showCursor } from './browser-utils.js';
import { ConfigurationError, errorMessage } from './errors.js';
import { silentLogger, type Logger } from './log.js';
import type { Point, Viewport } from './types.js';

export type MouseButton = 'left' | 'right' | 'middle';

export interface ClickOptions {
  button?: MouseButton;
  clickCount?: number;
}

export interface BrowserDriver {
  launch(viewport: Viewport): Promise<void>;
  goto(url: string): Promise<void>;
  viewport(): Viewport;
  screenshot(): Promise<Buffer>;
  currentUrl(): string;
  click(point: Point, options?: ClickOptions): Promise<void>;
  move(point: Point): Promise<void>;
  drag(from: Point, to: Point): Promise<void>;
  typeText(text: string): Promise<void>;
  /** Hold every key but the last, press the last, release in reverse order. */
  pressKeys(keys: string[]): Promise<void>;
  /** Positive deltaY scrolls down. */
  scroll(deltaY: number, at: Point): Promise<void>;
  /** Visual marker at the point the pointer is about to act on. */
  highlight(point: Point): Promise<void>;
  /** Wait for the page to finish loading and rendering. */
  settle(): Promise<void>;
  close(): Promise<void>;
}

export interface PlaywrightDriverOptions {
  headless?: boolean;
  chromePath?: string;
  highlightMouse?: boolean;
  logger?: Logger;
}

const LAUNCH_ARGS = [
  '--disable-extensions',
  '--disable-file-system',
  '--disable-plugins',
  '--disable-dev-shm-usage',
  '--disable-background-networking',
  '--disable-default-apps',
  '--disable-sync',
];

const NAVIGATION_TIMEOUT_MS = 30_000;
const RENDER_DELAY_MS = 500;

export class PlaywrightDriver implements BrowserDriver {
  private _browser: Browser | null = null;
  private _context: BrowserContext | null = null;
  private _page: Page | null = null;
  private _viewport: Viewport = { width: 0, height: 0 };
  private readonly logger: Logger;

  constructor(private readonly options: PlaywrightDriverOptions = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  private get page(): Page {
    if (!this._page || this._page.isClosed()) {
      throw new Error('Browser is not running');
    }
    return this._page;
  }

  async launch(viewport: Viewport): Promise<void> {
    const executablePath = this.options.chromePath ?? findLocalChrome();
    if (!executablePath) {
      throw new ConfigurationError(
        'Chrome not found. Install Google Chrome or Chromium, or set CHROME_PATH.',
      );
    }

    this.logger.info('Launching browser...');
    this._browser = await chromium.launch({
      executablePath,
      headless: this.options.headless ?? false,
      args: LAUNCH_ARGS,
      // Signals belong to the caller, which stops the loop and closes the browser itself.
      handleSIGINT: false,
      handleSIGTERM: false,
      handleSIGHUP: false,
    });
    this._context = await this._browser.newContext({ viewport });
    this._page = await this._context.newPage();
    this._viewport = { ...viewport };

    this._context.on('page', (popup) => {
      this.redirectPopup(popup).catch((err: unknown) => {
        this.logger.warn(`Failed to fold new tab into the managed tab: ${errorMessage(err)}`);
      });
    });
  }

  /** Keep a single controllable tab: close any new page and follow its URL here. */
  private async redirectPopup(popup: Page): Promise<void> {
    if (popup === this._page) return;
    await popup.waitForLoadState('domcontentloaded').catch(() => undefined);
    const url = popup.url();
    await popup.close();
    if (url && url !== 'about:blank') {
      this.logger.info(`Redirecting new tab into the managed tab: ${url}`);
      await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: NAVIGATION_TIMEOUT_MS });
    }
  }

  async goto(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: NAVIGATION_TIMEOUT_MS });
    this.logger.info(`Browser ready at: ${url}`);
  }

  viewport(): Viewport {
    const size = this._page?.viewportSize();
    return size ? { width: size.width, height: size.height } : { ...this._viewport };
  }

  async screenshot(): Promise<Buffer> {
    return this.page.screenshot({ type: 'png', fullPage: false });
  }

  currentUrl(): string {
    return this.page.url();
  }

  async click(point: Point, options: ClickOptions = {}): Promise<void> {
    await this.page.mouse.click(point.x, point.y, {
      button: options.button ?? 'left',
      clickCount: options.clickCount ?? 1,
    });
  }

  async move(point: Point): Promise<void> {
    await this.page.mouse.move(point.x, point.y);
  }

  async drag(from: Point, to: Point): Promise<void> {
    const page = this.page;
    await page.mouse.move(from.x, from.y);
    await page.mouse.down();
    await page.mouse.move(to.x, to.y, { steps: 10 });
    await page.mouse.up();
  }

  async typeText(text: string): Promise<void> {
    await this.page.keyboard.type(text);
  }

  async pressKeys(keys: string[]): Promise<void> {
    const keyboard = this.page.keyboard;
    const normalized = keys.map(normalizeKey);
    const last = normalized[normalized.length - 1];
    if (last === undefined) return;
    const held = normalized.slice(0, -1);

    for (const key of held) {
      await keyboard.down(key);
    }
    await keyboard.press(last);
    for (const key of [...held].reverse()) {
      await keyboard.up(key);
    }
  }

  async scroll(deltaY: number, at: Point): Promise<void> {
    const page = this.page;
    await page.mouse.move(at.x, at.y);
    await page.mouse.wheel(0, deltaY);
  }

  async highlight(point: Point): Promise<void> {
    if (!this.options.highlightMouse) return;
    await showCursor(this.page, point);
    await this.page.waitForTimeout(RENDER_DELAY_MS);
  }

  async settle(): Promise<void> {
    const page = this.page;
    await page.waitForLoadState();
    await page.waitForTimeout(RENDER_DELAY_MS);
  }

  async close(): Promise<void> {
    try {
      if (this._context) await this._context.close();
      if (this._browser) await this._browser.close();
    } catch (err) {
      if (!errorMessage(err).includes('closed')) throw err;
    } finally {
      this._page = null;
      this._context = null;
      this._browser = null;
    }
  }
}
