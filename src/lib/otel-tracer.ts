/**
 * OpenTelemetry Tracer adapter.
 * Typed structurally against @opentelemetry/api so the package stays optional.
 */

import { NodeInvocationError } from './errors';
import type { AttributeValue, Span, Tracer, TracerConfig } from './tracer';
import { DEFAULT_TRACER_CONFIG, redactAttributes } from './tracer';

interface IOTelSpan {
    setAttribute(key: string, value: AttributeValue | string[] | number[] | boolean[]): this;
    setAttributes(attributes: Record<string, AttributeValue>): this;
    recordException(exception: Error): void;
    setStatus(status: { code: number; message?: string }): this;
    addEvent(name: string, attributes?: Record<string, AttributeValue>): this;
    end(): void;
}

/** `SpanStatusCode.ERROR` */
const STATUS_ERROR = 2;

interface IOTelTracer {
    startSpan(name: string, options?: { attributes?: Record<string, AttributeValue> }): IOTelSpan;
}

export interface IOTelTracerProvider {
    getTracer(name: string, version?: string): IOTelTracer;
}

class OTelSpanWrapper implements Span {
    constructor(
        private readonly otelSpan: IOTelSpan,
        private readonly config: TracerConfig
    ) { }

    setAttribute(key: string, value: AttributeValue): void {
        this.otelSpan.setAttribute(key, value);
    }

    setAttributes(attributes: Record<string, AttributeValue>): void {
        this.otelSpan.setAttributes(redactAttributes(attributes, this.config));
    }

    /** Marks the span failed and tags it with the error class and failing node */
    recordException(error: Error): void {
        this.otelSpan.recordException(error);
        this.otelSpan.setStatus({ code: STATUS_ERROR, message: error.message });
        this.otelSpan.setAttribute('graph.error', error.name);
        if (error instanceof NodeInvocationError) {
            this.otelSpan.setAttribute('graph.error.node', error.node);
        }
    }

    addEvent(name: string, attributes?: Record<string, AttributeValue>): void {
        this.otelSpan.addEvent(name, attributes ? redactAttributes(attributes, this.config) : undefined);
    }

    end(): void {
        this.otelSpan.end();
    }
}

/**
 * OpenTelemetry Tracer implementation.
 *
 * @example
 * ```typescript
 * import { trace } from '@opentelemetry/api';
 * import { OTelTracer, setGlobalTracer } from 'supervisor-graph';
 *
 * setGlobalTracer(new OTelTracer(trace.getTracerProvider(), { recordUpdates: false }));
 * ```
 */
export class OTelTracer implements Tracer {
    private readonly otelTracer: IOTelTracer;
    private readonly config: Required<TracerConfig>;

    constructor(provider: IOTelTracerProvider, config: TracerConfig = {}) {
        this.otelTracer = provider.getTracer('supervisor-graph', '0.1.0');
        this.config = { ...DEFAULT_TRACER_CONFIG, ...config };
    }

    startSpan(name: string, attributes?: Record<string, AttributeValue>): Span {
        const otelSpan = this.otelTracer.startSpan(name, {
            attributes: attributes ? redactAttributes(attributes, this.config) : undefined,
        });
        return new OTelSpanWrapper(otelSpan, this.config);
    }

    async withSpan<T>(name: string, fn: (span: Span) => Promise<T> | T): Promise<T> {
        const span = this.startSpan(name);
        try {
            return await fn(span);
        } catch (error) {
            span.recordException(error instanceof Error ? error : new Error(String(error)));
            throw error;
        } finally {
            span.end();
        }
    }

    getConfig(): TracerConfig {
        return this.config;
    }
}
