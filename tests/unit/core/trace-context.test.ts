/**
 * Tests for TraceContext - AsyncLocalStorage-based run and iteration tagging.
 */

import { describe, it, expect } from 'vitest';
import {
  withTraceContext,
  getTraceContext,
  generateRunId,
  iterationContext,
  type TraceContext,
} from '../../../src/core/trace-context.js';

describe('TraceContext', () => {
  describe('Context propagation', () => {
    it('propagates context through async boundaries', async () => {
      const ctx: TraceContext = { traceId: 'run_test1' };
      let captured: TraceContext | undefined;

      await withTraceContext(ctx, async () => {
        expect(getTraceContext()).toEqual(ctx);

        await Promise.all([
          Promise.resolve().then(() => {
            captured = getTraceContext();
          }),
          new Promise((resolve) => setTimeout(resolve, 10)).then(() => {
            expect(getTraceContext()?.traceId).toBe('run_test1');
          }),
        ]);
      });

      expect(captured).toEqual(ctx);
    });

    it('context is undefined outside withTraceContext', () => {
      expect(getTraceContext()).toBeUndefined();
    });

    it('nested contexts override the parent and restore it afterwards', async () => {
      await withTraceContext({ traceId: 'parent' }, async () => {
        await withTraceContext({ traceId: 'child' }, async () => {
          expect(getTraceContext()?.traceId).toBe('child');
        });
        expect(getTraceContext()?.traceId).toBe('parent');
      });
    });
  });

  describe('Ids', () => {
    it('generates run ids', () => {
      expect(generateRunId()).toMatch(/^run_[0-9a-f]{8}$/);
      expect(generateRunId()).not.toBe(generateRunId());
    });

    it('nests iteration spans under the current run', () => {
      const ctx = withTraceContext({ traceId: 'run_abc' }, () => iterationContext(3));

      expect(ctx.traceId).toBe('run_abc');
      expect(ctx.iteration).toBe(3);
      expect(ctx.spanId).toMatch(/^iter_3_[0-9a-f]{8}$/);
    });

    it('starts a fresh run id outside a run', () => {
      expect(iterationContext(1).traceId).toMatch(/^run_/);
    });
  });
});
