/**
 * Telemetry Module
 *
 * - W3C Trace Context compatible correlation IDs
 * - AsyncLocalStorage-based context propagation
 * - Structured JSON logging with secret redaction
 *
 * @module @flowgraph/core/telemetry
 */

export {
  type TraceId,
  type SpanId,
  type RequestId,
  generateTraceId,
  generateSpanId,
  generateRequestId,
} from './ids.js';

export {
  type TelemetrySource,
  type Severity,
  type TelemetryContext,
  type PartialTelemetryContext,
  getCurrentContext,
  runWithContext,
  createContext,
  createChildContext,
  deriveContext,
} from './context.js';

export {
  type LoggerConfig,
  type LogEntry,
  Logger,
  SEVERITIES,
  getLogger,
  setLogger,
  createLogger,
} from './logger.js';
