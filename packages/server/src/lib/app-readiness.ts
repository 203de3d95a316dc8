import { EventEmitter } from 'events';
import { createLogger } from './logger.js';

const logger = createLogger('app-readiness');

/**
 * Process-wide readiness signal.
 *
 * Job queues defer their first work step until the process reports it
 * is ready (database migrated, collaborators wired).
 */
export class AppReadiness {
  private emitter = new EventEmitter();
  private ready = false;

  get isAppReady(): boolean {
    return this.ready;
  }

  /**
   * Mark the process as ready and run every deferred block.
   * Calling it again has no effect.
   */
  setAppIsReady(): void {
    if (this.ready) {
      return;
    }
    this.ready = true;
    logger.info('App is ready');
    this.emitter.emit('ready');
  }

  /**
   * Run the block now if the process is ready, otherwise once it becomes ready.
   * Errors thrown by the block are logged, never propagated.
   */
  runNowOrWhenAppDidBecomeReady(block: () => void): void {
    if (this.ready) {
      this.runSafely(block);
      return;
    }
    this.emitter.once('ready', () => this.runSafely(block));
  }

  private runSafely(block: () => void): void {
    try {
      block();
    } catch (error) {
      logger.error({ err: error }, 'Readiness block failed');
    }
  }
}
