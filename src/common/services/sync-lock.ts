import { Logger } from '@nestjs/common';
import { clampTimerDelay } from '../utils/timer-delay';

/**
 * Promise-chained mutex serializing synchronization runs.
 * A holder that exceeds `maxHoldMs` is force-released so a hung exchange
 * cannot block every later caller.
 */
export class SyncLock {
  private readonly logger = new Logger(SyncLock.name);
  private lockPromise: Promise<void> | null = null;
  private releaseFn: (() => void) | null = null;
  private lockTimeout: ReturnType<typeof setTimeout> | null = null;
  private generation = 0;

  constructor(private readonly maxHoldMs: number) {}

  async acquire(): Promise<void> {
    while (this.lockPromise) {
      await this.lockPromise;
    }
    this.generation++;
    this.lockPromise = new Promise<void>((resolve) => {
      this.releaseFn = resolve;
    });
    if (Number.isFinite(this.maxHoldMs)) {
      this.lockTimeout = setTimeout(() => {
        this.logger.error({
          message: `Sync lock timeout, force releasing after ${this.maxHoldMs}ms`,
          module: 'time-sync',
        });
        this.release();
      }, clampTimerDelay(this.maxHoldMs));
    }
  }

  release(): void {
    if (this.lockTimeout) {
      clearTimeout(this.lockTimeout);
      this.lockTimeout = null;
    }
    if (this.releaseFn) {
      const fn = this.releaseFn;
      this.releaseFn = null;
      this.lockPromise = null;
      fn();
    }
  }

  isLocked(): boolean {
    return this.lockPromise !== null;
  }

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    const held = this.generation;
    try {
      return await fn();
    } finally {
      // After a force release the lock may already belong to another caller
      if (this.generation === held) {
        this.release();
      }
    }
  }
}
