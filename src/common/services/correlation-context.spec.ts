import { describe, it, expect } from 'vitest';
import { withCorrelationId, getCorrelationId } from './correlation-context';

const UUID_V4 =
  /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

describe('correlation-context', () => {
  describe('withCorrelationId', () => {
    it('should generate unique UUID v4 for each invocation', async () => {
      const id1 = await withCorrelationId(async () => getCorrelationId());
      const id2 = await withCorrelationId(async () => getCorrelationId());

      expect(id1).toMatch(UUID_V4);
      expect(id2).toMatch(UUID_V4);
      expect(id1).not.toBe(id2);
    });

    it('should reuse a correlation id passed in', async () => {
      const id = await withCorrelationId(
        async () => getCorrelationId(),
        'upstream-request-1',
      );

      expect(id).toBe('upstream-request-1');
    });

    it('should maintain correlation ID across await boundaries', async () => {
      const [before, after] = await withCorrelationId(async () => {
        const first = getCorrelationId();
        await new Promise((resolve) => setTimeout(resolve, 10));
        return [first, getCorrelationId()];
      });

      expect(before).toBeDefined();
      expect(after).toBe(before);
    });

    it('should maintain separate IDs for nested contexts', async () => {
      let innerId: string | undefined;

      const outerId = await withCorrelationId(async () => {
        innerId = await withCorrelationId(async () => getCorrelationId());
        return getCorrelationId();
      });

      expect(outerId).toBeDefined();
      expect(innerId).toBeDefined();
      expect(outerId).not.toBe(innerId);
    });
  });

  describe('getCorrelationId', () => {
    it('should return undefined outside context', () => {
      expect(getCorrelationId()).toBeUndefined();
    });

    it('should return undefined after context exits', async () => {
      await withCorrelationId(async () => {
        expect(getCorrelationId()).toBeDefined();
      });

      expect(getCorrelationId()).toBeUndefined();
    });
  });
});
