import { existsSync } from 'fs';
import { platform } from 'os';
import type { Page } from 'playwright-core';
import type { Point } from './types.js';

/**
 * Finds the local Chrome installation path based on the operating system.
 */
export function findLocalChrome(): string | undefined {
  const systemPlatform = platform();
  const chromePaths: string[] = [];

  if (systemPlatform === 'darwin') {
    chromePaths.push(
      '/Applications/Google Chrome.app/Contents/MacOS/Google Chrome',
      '/Applications/Chromium.app/Contents/MacOS/Chromium',
      `${process.env.HOME}/Applications/Google Chrome.app/Contents/MacOS/Google Chrome`,
      `${process.env.HOME}/Applications/Chromium.app/Contents/MacOS/Chromium`,
    );
  } else if (systemPlatform === 'win32') {
    chromePaths.push(
      'C:\\Program Files\\Google\\Chrome\\Application\\chrome.exe',
      'C:\\Program Files (x86)\\Google\\Chrome\\Application\\chrome.exe',
      `${process.env.LOCALAPPDATA}\\Google\\Chrome\\Application\\chrome.exe`,
      'C:\\Program Files\\Chromium\\Application\\chrome.exe',
    );
  } else {
    chromePaths.push(
      '/usr/bin/google-chrome',
      '/usr/bin/google-chrome-stable',
      '/usr/bin/chromium',
      '/usr/bin/chromium-browser',
      '/snap/bin/chromium',
      '/usr/local/bin/chromium',
      '/opt/google/chrome/chrome',
    );
  }

  for (const p of chromePaths) {
    if (p && existsSync(p)) {
      return p;
    }
  }

  return undefined;
}

/** Lower-cased aliases the model tends to use, mapped to Playwright key names. */
const KEY_ALIASES: Record<string, string> = {
  backspace: 'Backspace',
  tab: 'Tab',
  return: 'Enter',
  enter: 'Enter',
  shift: 'Shift',
  control: 'Control',
  ctrl: 'Control',
  alt: 'Alt',
  option: 'Alt',
  escape: 'Escape',
  esc: 'Escape',
  space: 'Space',
  spacebar: 'Space',
  pageup: 'PageUp',
  pagedown: 'PageDown',
  end: 'End',
  home: 'Home',
  left: 'ArrowLeft',
  up: 'ArrowUp',
  right: 'ArrowRight',
  down: 'ArrowDown',
  insert: 'Insert',
  delete: 'Delete',
  del: 'Delete',
  command: 'Meta',
  cmd: 'Meta',
  meta: 'Meta',
  win: 'Meta',
  windows: 'Meta',
  super: 'Meta',
};

/**
 * Normalize a model-provided key name for Playwright's keyboard API.
 * Function keys become F1..F12; unknown names pass through unchanged.
 */
export function normalizeKey(key: string): string {
  const cleaned = key.trim();
  const lower = cleaned.toLowerCase();
  const alias = KEY_ALIASES[lower];
  if (alias) return alias;
  if (/^f([1-9]|1[0-2])$/.test(lower)) return lower.toUpperCase();
  return cleaned;
}

/**
 * Draws a short-lived red ring where the pointer is about to act.
 * Debug aid only; it ignores pointer events so it cannot steal clicks.
 */
export async function showCursor(page: Page, point: Point): Promise<void> {
  await page.evaluate(({ x, y }) => {
    const div = document.createElement('div');
    div.style.pointerEvents = 'none';
    div.style.border = '4px solid red';
    div.style.borderRadius = '50%';
    div.style.width = '20px';
    div.style.height = '20px';
    div.style.position = 'fixed';
    div.style.zIndex = '2147483647';
    div.style.left = `${x - 10}px`;
    div.style.top = `${y - 10}px`;
    document.body.appendChild(div);
    setTimeout(() => div.remove(), 2000);
  }, point);
}
