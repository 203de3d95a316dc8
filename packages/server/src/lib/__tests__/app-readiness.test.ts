import { describe, it, expect, vi } from 'vitest';
import { AppReadiness } from '../app-readiness.js';

describe('AppReadiness', () => {
  it('should start not ready', () => {
    expect(new AppReadiness().isAppReady).toBe(false);
  });

  it('should defer blocks until ready', () => {
    const readiness = new AppReadiness();
    const block = vi.fn();

    readiness.runNowOrWhenAppDidBecomeReady(block);
    expect(block).not.toHaveBeenCalled();

    readiness.setAppIsReady();
    expect(block).toHaveBeenCalledTimes(1);
    expect(readiness.isAppReady).toBe(true);
  });

  it('should run blocks immediately once ready', () => {
    const readiness = new AppReadiness();
    readiness.setAppIsReady();
    const block = vi.fn();

    readiness.runNowOrWhenAppDidBecomeReady(block);

    expect(block).toHaveBeenCalledTimes(1);
  });

  it('should run deferred blocks only once when marked ready twice', () => {
    const readiness = new AppReadiness();
    const block = vi.fn();
    readiness.runNowOrWhenAppDidBecomeReady(block);

    readiness.setAppIsReady();
    readiness.setAppIsReady();

    expect(block).toHaveBeenCalledTimes(1);
  });

  it('should keep running other blocks when one throws', () => {
    const readiness = new AppReadiness();
    const second = vi.fn();
    readiness.runNowOrWhenAppDidBecomeReady(() => {
      throw new Error('setup failed');
    });
    readiness.runNowOrWhenAppDidBecomeReady(second);

    readiness.setAppIsReady();

    expect(second).toHaveBeenCalledTimes(1);
  });
});
