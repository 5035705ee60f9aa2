import { AsyncLocalStorage } from 'async_hooks';
import { v4 as uuidv4 } from 'uuid';

// Module-level storage, shared by the Nest facade and the process-wide clock
const correlationStorage = new AsyncLocalStorage<string>();

/**
 * Run `fn` inside a correlation context. Every log line and event produced
 * by the sync run, across awaits, carries the same id.
 *
 * @param correlationId Reuse an id from upstream (e.g. an `x-correlation-id`
 * request header); a fresh UUID v4 otherwise.
 *
 * @example
 * await withCorrelationId(() => this.engine.sync());
 */
export function withCorrelationId<T>(
  fn: () => Promise<T>,
  correlationId: string = uuidv4(),
): Promise<T> {
  return correlationStorage.run(correlationId, fn);
}

/**
 * Current correlation id, or undefined outside a withCorrelationId() call.
 */
export function getCorrelationId(): string | undefined {
  return correlationStorage.getStore();
}
