/**
 * Tests for TraceContext - AsyncLocalStorage-based trace propagation.
 */

import { describe, it, expect } from 'vitest';
import {
  withTraceContext,
  createTraceContext,
  getTraceContext,
  generateChildSpan,
  type TraceContext,
} from '../../../src/core/trace-context.js';

describe('TraceContext', () => {
  it('propagates context through async boundaries', async () => {
    const ctx = createTraceContext('msg_1');
    let captured: TraceContext | undefined;

    await withTraceContext(ctx, async () => {
      expect(getTraceContext()).toEqual(ctx);

      await Promise.all([
        Promise.resolve().then(() => {
          captured = getTraceContext();
        }),
        new Promise((resolve) => setTimeout(resolve, 10)).then(() => {
          expect(getTraceContext()?.traceId).toBe('msg_1');
        }),
      ]);
    });

    expect(captured).toEqual(ctx);
  });

  it('is undefined outside withTraceContext', async () => {
    await withTraceContext(createTraceContext('msg_2'), async () => {
      await Promise.resolve();
    });
    expect(getTraceContext()).toBeUndefined();
  });

  it('keeps concurrent contexts apart', async () => {
    const seen: string[] = [];
    const run = (id: string, delay: number): Promise<void> =>
      withTraceContext(createTraceContext(id), async () => {
        await new Promise((resolve) => setTimeout(resolve, delay));
        seen.push(getTraceContext()?.traceId ?? 'none');
      });

    await Promise.all([run('slow', 20), run('fast', 1)]);

    expect(seen).toEqual(['fast', 'slow']);
  });

  it('nested context overrides the parent', () => {
    withTraceContext(createTraceContext('parent'), () => {
      withTraceContext(createTraceContext('child'), () => {
        expect(getTraceContext()?.traceId).toBe('child');
      });
      expect(getTraceContext()?.traceId).toBe('parent');
    });
  });

  describe('createTraceContext', () => {
    it('carries the user when given', () => {
      const ctx = createTraceContext('msg_3', { userId: '1001' });
      expect(ctx.traceId).toBe('msg_3');
      expect(ctx.userId).toBe('1001');
      expect(ctx.spanId).toMatch(/^root_[0-9a-f]{8}$/);
    });

    it('omits the user otherwise', () => {
      expect('userId' in createTraceContext('tick_1')).toBe(false);
    });
  });

  describe('generateChildSpan', () => {
    it('nests under a parent span', () => {
      expect(generateChildSpan('root_abc')).toMatch(/^root_abc_[0-9a-f]{8}$/);
    });
  });
});
