/**
 * Telemetry Context
 *
 * Context that flows through a request and the workflow execution it triggers,
 * so every log line from the engine carries the same correlation fields.
 *
 * @module @flowgraph/core/telemetry/context
 */

import { AsyncLocalStorage } from 'async_hooks';
import { generateTraceId, generateSpanId, type TraceId, type SpanId } from './ids.js';

// =============================================================================
// Telemetry Context Types
// =============================================================================

/**
 * Source of the telemetry event
 */
export type TelemetrySource = 'api' | 'engine';

/**
 * Severity levels
 */
export type Severity = 'DEBUG' | 'INFO' | 'NOTICE' | 'WARNING' | 'ERROR' | 'CRITICAL';

/**
 * Core telemetry context
 */
export interface TelemetryContext {
  /** W3C Trace Context trace ID (32 hex chars) */
  traceId: TraceId;
  /** W3C Trace Context span ID (16 hex chars) */
  spanId: SpanId;
  /** Parent span ID if this is a child span */
  parentSpanId?: SpanId;

  /** Workflow name being executed or exported */
  workflow?: string;
  /** Identifier of one workflow execution */
  executionId?: string;
  /** Inbound HTTP request ID */
  requestId?: string;

  source: TelemetrySource;
  timestamp: Date;
}

export type PartialTelemetryContext = Partial<Omit<TelemetryContext, 'traceId' | 'spanId'>> & {
  traceId?: TraceId;
  spanId?: SpanId;
};

// =============================================================================
// Context Storage
// =============================================================================

const telemetryStorage = new AsyncLocalStorage<TelemetryContext>();

/**
 * Get the current telemetry context from async local storage
 */
export function getCurrentContext(): TelemetryContext | undefined {
  return telemetryStorage.getStore();
}

/**
 * Run a function with a telemetry context
 */
export function runWithContext<T>(ctx: TelemetryContext, fn: () => T): T {
  return telemetryStorage.run(ctx, fn);
}

// =============================================================================
// Context Creation
// =============================================================================

/**
 * Create a new root telemetry context
 */
export function createContext(
  source: TelemetrySource,
  overrides?: PartialTelemetryContext
): TelemetryContext {
  return {
    traceId: generateTraceId(),
    spanId: generateSpanId(),
    source,
    timestamp: new Date(),
    ...overrides,
  };
}

/**
 * Create a child context (new span under same trace)
 */
export function createChildContext(
  parent: TelemetryContext,
  overrides?: PartialTelemetryContext
): TelemetryContext {
  return {
    ...parent,
    spanId: generateSpanId(),
    parentSpanId: parent.spanId,
    timestamp: new Date(),
    ...overrides,
  };
}

/**
 * Child of the active context when there is one, otherwise a new root
 */
export function deriveContext(
  source: TelemetrySource,
  overrides?: PartialTelemetryContext
): TelemetryContext {
  const parent = getCurrentContext();
  return parent ? createChildContext(parent, { source, ...overrides }) : createContext(source, overrides);
}
