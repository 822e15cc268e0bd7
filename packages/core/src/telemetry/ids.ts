/**
 * Telemetry IDs
 *
 * Trace and span ids follow the W3C Trace Context sizes (32 and 16 hex
 * characters); request ids are UUID v4.
 *
 * @module @flowgraph/core/telemetry/ids
 */

import { randomBytes, randomUUID } from 'crypto';

export type TraceId = string & { readonly __brand: 'TraceId' };
export type SpanId = string & { readonly __brand: 'SpanId' };
export type RequestId = string & { readonly __brand: 'RequestId' };

export function generateTraceId(): TraceId {
  return randomBytes(16).toString('hex') as TraceId;
}

export function generateSpanId(): SpanId {
  return randomBytes(8).toString('hex') as SpanId;
}

/**
 * Id for an inbound request that did not bring its own `X-Request-ID`
 */
export function generateRequestId(): RequestId {
  return randomUUID() as RequestId;
}
