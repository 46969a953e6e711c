/**
 * Telemetry
 *
 * Structured logging and optional OpenTelemetry tracing.
 */

export {
  Logger,
  consoleSink,
  formatPretty,
  getLogger,
  isLogFormat,
  isLogLevel,
  serializeError,
  setLogger,
  type LogEntry,
  type LogFormat,
  type LogLevel,
  type LogSink,
  type LoggerOptions,
  type SerializedError,
} from './logger.ts';

export {
  SpanKind,
  SpanStatusCode,
  TRACER_NAME,
  getOTELTracer,
  isOTELEnabled,
  requestAttributes,
  withSpan,
  type Attributes,
  type CreateSpanOptions,
  type Span,
} from './otel.ts';
