// Graph runtime
export * from './graph';

// Supervisor preset
export * from './supervisor';

// Errors
export {
    GraphError,
    ConfigurationError,
    GraphRunError,
    InvalidUpdateError,
    NodeInvocationError,
    RecursionLimitExceededError,
    CheckpointError,
} from './lib/errors';
export type { ValidationErrorItem } from './lib/errors';

// Logging
export { consoleLogger, noopLogger, createFilteredLogger, createChildLogger } from './lib/logger';
export type { Logger, LogLevel } from './lib/logger';

// Tracing
export {
    NoopTracer,
    setGlobalTracer,
    getGlobalTracer,
    redactContent,
    redactAttributes,
    DEFAULT_TRACER_CONFIG,
} from './lib/tracer';
export type { Span, Tracer, TracerConfig, AttributeValue } from './lib/tracer';
export { OTelTracer } from './lib/otel-tracer';
export type { IOTelTracerProvider } from './lib/otel-tracer';
