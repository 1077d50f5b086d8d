import { randomUUID } from 'crypto';
import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { errorMessage } from './errors.js';
import { silentLogger, type Logger } from './log.js';
import type { Observation } from './types.js';

export function newSessionId(): string {
  return randomUUID().slice(0, 8);
}

/**
 * Writes each observation's screenshot to `<root>/<sessionId>/<name>.png`.
 * Purely a side record: nothing reads these files back.
 */
export class ScreenshotRecorder {
  readonly dir: string;
  private readonly logger: Logger;

  constructor(
    root: string,
    readonly sessionId: string = newSessionId(),
    logger?: Logger,
  ) {
    this.dir = join(root, sessionId);
    this.logger = logger ?? silentLogger;
  }

  static stepName(step: number): string {
    return `step_${String(step).padStart(3, '0')}`;
  }

  /** Returns the written path, or undefined when the write failed. */
  save(observation: Observation, name: string): string | undefined {
    const path = join(this.dir, `${name}.png`);
    try {
      if (!existsSync(this.dir)) {
        mkdirSync(this.dir, { recursive: true });
      }
      writeFileSync(path, observation.image);
      return path;
    } catch (err) {
      this.logger.warn(`Could not save screenshot ${path}: ${errorMessage(err)}`);
      return undefined;
    }
  }
}
