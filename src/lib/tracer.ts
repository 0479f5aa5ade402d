/**
 * Tracer abstraction for graph runs.
 * Pluggable tracing with secret redaction and configurable recording of state content.
 * Updates are recorded by default; pass `{ recordUpdates: false }` where state may hold user data.
 */

export type AttributeValue = string | number | boolean;

/** Span interface */
export interface Span {
    /** Set a single attribute */
    setAttribute(key: string, value: AttributeValue): void;
    /** Set multiple attributes */
    setAttributes(attributes: Record<string, AttributeValue>): void;
    /** Record an error */
    recordException(error: Error): void;
    /** Add an event */
    addEvent(name: string, attributes?: Record<string, AttributeValue>): void;
    /** End the span */
    end(): void;
}

/** Tracer configuration */
export interface TracerConfig {
    /** Record node updates on step spans (default: true) */
    recordUpdates?: boolean;
    /** Record the final snapshot on the run span (default: false) */
    recordState?: boolean;
    /** Maximum content length before truncation (default: 1000) */
    maxContentLength?: number;
    /** Sensitive keys to mask */
    sensitiveKeys?: string[];
}

/** Tracer interface */
export interface Tracer {
    /** Start a new span */
    startSpan(name: string, attributes?: Record<string, AttributeValue>): Span;
    /** Execute a function within a span */
    withSpan<T>(name: string, fn: (span: Span) => Promise<T> | T): Promise<T>;
    /** Get the tracer config */
    getConfig(): TracerConfig;
}

/** Default configuration (development friendly) */
export const DEFAULT_TRACER_CONFIG: Required<TracerConfig> = {
    recordUpdates: true,
    recordState: false,
    maxContentLength: 1000,
    sensitiveKeys: ['password', 'apiKey', 'token', 'secret', 'authorization'],
};

/**
 * Redact sensitive information from serialized content.
 * Strategy: truncate first, then regex mask.
 */
export function redactContent(
    content: string,
    config: TracerConfig = DEFAULT_TRACER_CONFIG
): string {
    const maxLen = config.maxContentLength ?? DEFAULT_TRACER_CONFIG.maxContentLength;
    const sensitiveKeys = config.sensitiveKeys ?? DEFAULT_TRACER_CONFIG.sensitiveKeys;

    let result = content;
    if (result.length > maxLen) {
        result = result.substring(0, maxLen) + `... [truncated ${content.length - maxLen} chars]`;
    }

    for (const key of sensitiveKeys) {
        const regex = new RegExp(`("${key}"\\s*:\\s*)"[^"]*"`, 'gi');
        result = result.replace(regex, '$1"[REDACTED]"');
    }

    return result;
}

/**
 * Redact attributes based on config.
 */
export function redactAttributes(
    attributes: Record<string, unknown>,
    config: TracerConfig = DEFAULT_TRACER_CONFIG
): Record<string, AttributeValue> {
    const sensitiveKeys = config.sensitiveKeys ?? DEFAULT_TRACER_CONFIG.sensitiveKeys;
    const result: Record<string, AttributeValue> = {};

    for (const [key, value] of Object.entries(attributes)) {
        const lowerKey = key.toLowerCase();
        const isSensitive = sensitiveKeys.some(sk => lowerKey.includes(sk.toLowerCase()));

        if (isSensitive) {
            result[key] = '[REDACTED]';
        } else if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
            result[key] = value;
        } else if (typeof value === 'object') {
            result[key] = JSON.stringify(value).substring(0, 100);
        } else {
            result[key] = String(value);
        }
    }

    return result;
}

class NoopSpan implements Span {
    setAttribute(_key: string, _value: AttributeValue): void { }
    setAttributes(_attributes: Record<string, AttributeValue>): void { }
    recordException(_error: Error): void { }
    addEvent(_name: string, _attributes?: Record<string, AttributeValue>): void { }
    end(): void { }
}

/**
 * No-op tracer (default when no tracing configured).
 */
export class NoopTracer implements Tracer {
    private readonly config: TracerConfig;

    constructor(config: TracerConfig = {}) {
        this.config = { ...DEFAULT_TRACER_CONFIG, ...config };
    }

    startSpan(_name: string, _attributes?: Record<string, AttributeValue>): Span {
        return new NoopSpan();
    }

    async withSpan<T>(name: string, fn: (span: Span) => Promise<T> | T): Promise<T> {
        const span = this.startSpan(name);
        try {
            return await fn(span);
        } finally {
            span.end();
        }
    }

    getConfig(): TracerConfig {
        return this.config;
    }
}

/** Global tracer instance */
let globalTracer: Tracer = new NoopTracer();

/**
 * Set the global tracer.
 */
export function setGlobalTracer(tracer: Tracer): void {
    globalTracer = tracer;
}

/**
 * Get the global tracer.
 */
export function getGlobalTracer(): Tracer {
    return globalTracer;
}
