/**
 * Telemetry Context and ID Tests
 */

import { describe, it, expect } from 'vitest';
import {
  createChildContext,
  createContext,
  deriveContext,
  getCurrentContext,
  runWithContext,
} from '../context.js';
import { generateRequestId, generateSpanId, generateTraceId } from '../ids.js';

describe('Telemetry IDs', () => {
  it('should generate W3C-sized trace and span ids', () => {
    expect(generateTraceId()).toMatch(/^[0-9a-f]{32}$/);
    expect(generateSpanId()).toMatch(/^[0-9a-f]{16}$/);
    expect(generateTraceId()).not.toBe(generateTraceId());
  });

  it('should generate UUID v4 request ids', () => {
    expect(generateRequestId()).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/
    );
  });
});

describe('Telemetry Context', () => {
  it('should be undefined outside of runWithContext', () => {
    expect(getCurrentContext()).toBeUndefined();
  });

  it('should expose the context inside runWithContext, across awaits', async () => {
    const ctx = createContext('api', { requestId: 'req-1' });

    const seen = await runWithContext(ctx, async () => {
      await new Promise(resolve => setTimeout(resolve, 1));
      return getCurrentContext();
    });

    expect(seen).toBe(ctx);
    expect(getCurrentContext()).toBeUndefined();
  });

  it('should create a child span under the same trace', () => {
    const parent = createContext('api', { requestId: 'req-1' });

    const child = createChildContext(parent, { workflow: 'add-user' });

    expect(child.traceId).toBe(parent.traceId);
    expect(child.parentSpanId).toBe(parent.spanId);
    expect(child.spanId).not.toBe(parent.spanId);
    expect(child.requestId).toBe('req-1');
    expect(child.workflow).toBe('add-user');
  });

  it('should derive a root context when none is active', () => {
    const ctx = deriveContext('engine', { workflow: 'add-user' });

    expect(ctx.source).toBe('engine');
    expect(ctx.parentSpanId).toBeUndefined();
    expect(ctx.workflow).toBe('add-user');
  });

  it('should derive a child of the active context', () => {
    const parent = createContext('api', { requestId: 'req-2' });

    const ctx = runWithContext(parent, () => deriveContext('engine', { executionId: 'exec-1' }));

    expect(ctx.source).toBe('engine');
    expect(ctx.traceId).toBe(parent.traceId);
    expect(ctx.parentSpanId).toBe(parent.spanId);
    expect(ctx.requestId).toBe('req-2');
    expect(ctx.executionId).toBe('exec-1');
  });
});
