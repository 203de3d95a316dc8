import { EventEmitter } from 'events';
import { createLogger } from './logger.js';

const logger = createLogger('reachability');

/**
 * Listener invoked whenever reachability changes.
 */
export type ReachabilityListener = (isReachable: boolean) => void;

/**
 * Tracks whether the network is reachable and notifies subscribers on change.
 *
 * The transport layer (or a test) reports connectivity through
 * setReachable(); job queues that require the internet subscribe to
 * restart waiting retries once the network comes back.
 */
export class ReachabilityManager {
  private emitter = new EventEmitter();
  private reachable: boolean;

  constructor(initiallyReachable = true) {
    this.reachable = initiallyReachable;
  }

  get isReachable(): boolean {
    return this.reachable;
  }

  /**
   * Report the current reachability. Subscribers are only notified on change.
   */
  setReachable(reachable: boolean): void {
    if (this.reachable === reachable) {
      return;
    }
    this.reachable = reachable;
    logger.info({ isReachable: reachable }, 'Reachability changed');
    this.emitter.emit('change', reachable);
  }

  /**
   * Subscribe to reachability changes.
   * @returns A function that removes the subscription
   */
  onChange(listener: ReachabilityListener): () => void {
    this.emitter.on('change', listener);
    return () => {
      this.emitter.off('change', listener);
    };
  }
}
