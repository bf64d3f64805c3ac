/**
 * Progress Reporter
 *
 * Delivers (phase, message) pairs to an external UI callback. Delivery is
 * synchronous; with no callback registered, reporting only logs.
 */

import type { ProgressCallback, ProgressPhase } from '../types/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('progress');

export class ProgressReporter {
  private callback: ProgressCallback | null = null;

  setCallback(callback: ProgressCallback | null): void {
    this.callback = callback;
  }

  getCallback(): ProgressCallback | null {
    return this.callback;
  }

  report(phase: ProgressPhase, message: string, context: Record<string, unknown> = {}): void {
    log.debug({ phase, ...context }, message);

    if (!this.callback) {
      return;
    }

    try {
      this.callback(phase, message);
    } catch (error) {
      log.error({ phase, error }, 'Progress callback error');
    }
  }
}
