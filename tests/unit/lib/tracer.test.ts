import { describe, it, expect, afterEach } from 'vitest';
import {
    NoopTracer,
    getGlobalTracer,
    redactAttributes,
    redactContent,
    setGlobalTracer,
    type AttributeValue,
} from '../../../src/lib/tracer';
import { OTelTracer, type IOTelTracerProvider } from '../../../src/lib/otel-tracer';
import { NodeInvocationError } from '../../../src/lib/errors';
import { RecordingTracer } from '../../mocks/observability';

describe('Tracer', () => {
    describe('redactContent', () => {
        it('should mask sensitive JSON values', () => {
            expect(redactContent('{"token":"placeholder","count":1}')).toBe('{"token":"[REDACTED]","count":1}');
        });

        it('should truncate long content', () => {
            expect(redactContent('a'.repeat(20), { maxContentLength: 10 })).toBe(
                'aaaaaaaaaa... [truncated 10 chars]',
            );
        });
    });

    describe('redactAttributes', () => {
        it('should mask sensitive keys and stringify objects', () => {
            expect(redactAttributes({ apiKey: 'test-secret', count: 2, nested: { a: 1 } })).toEqual({
                apiKey: '[REDACTED]',
                count: 2,
                nested: '{"a":1}',
            });
        });
    });

    describe('NoopTracer', () => {
        it('should return the callback result', async () => {
            const tracer = new NoopTracer();

            await expect(tracer.withSpan('work', () => 42)).resolves.toBe(42);
            expect(tracer.getConfig().recordUpdates).toBe(true);
        });
    });

    describe('global tracer', () => {
        afterEach(() => {
            setGlobalTracer(new NoopTracer());
        });

        it('should be replaceable', () => {
            const tracer = new RecordingTracer();
            setGlobalTracer(tracer);

            expect(getGlobalTracer()).toBe(tracer);
        });
    });

    describe('OTelTracer', () => {
        interface StartedSpan {
            name: string;
            attributes?: Record<string, AttributeValue>;
            events: string[];
            ended: boolean;
            status?: { code: number; message?: string };
        }

        function createProvider(): { provider: IOTelTracerProvider; started: StartedSpan[]; tracerNames: string[] } {
            const started: StartedSpan[] = [];
            const tracerNames: string[] = [];

            class FakeSpan {
                constructor(private readonly record: StartedSpan) { }
                setAttribute(key: string, value: AttributeValue): this {
                    this.record.attributes = { ...this.record.attributes, [key]: value };
                    return this;
                }
                setStatus(status: { code: number; message?: string }): this {
                    this.record.status = status;
                    return this;
                }
                setAttributes(attributes: Record<string, AttributeValue>): this {
                    this.record.attributes = { ...this.record.attributes, ...attributes };
                    return this;
                }
                recordException(): void { }
                addEvent(name: string): this {
                    this.record.events.push(name);
                    return this;
                }
                end(): void {
                    this.record.ended = true;
                }
            }

            const provider: IOTelTracerProvider = {
                getTracer: (name) => {
                    tracerNames.push(name);
                    return {
                        startSpan: (spanName, options) => {
                            const record: StartedSpan = { name: spanName, attributes: options?.attributes, events: [], ended: false };
                            started.push(record);
                            return new FakeSpan(record);
                        },
                    };
                },
            };

            return { provider, started, tracerNames };
        }

        it('should redact attributes passed to the provider', async () => {
            const { provider, started, tracerNames } = createProvider();
            const tracer = new OTelTracer(provider);

            await tracer.withSpan('graph.step', (span) => {
                span.setAttributes({ 'graph.node': 'worker', authorization: 'test-secret' });
                span.addEvent('graph.update');
            });

            expect(tracerNames).toEqual(['supervisor-graph']);
            expect(started).toEqual([
                {
                    name: 'graph.step',
                    attributes: { 'graph.node': 'worker', authorization: '[REDACTED]' },
                    events: ['graph.update'],
                    ended: true,
                },
            ]);
        });
    
        it('should mark a failed span with the error class and node', async () => {
            const { provider, started } = createProvider();
            const tracer = new OTelTracer(provider);

            await expect(
                tracer.withSpan('graph.step', () => {
                    throw new NodeInvocationError('worker', 'Node "worker" failed: boom');
                }),
            ).rejects.toThrow(NodeInvocationError);

            expect(started[0]).toEqual({
                name: 'graph.step',
                attributes: { 'graph.error': 'NodeInvocationError', 'graph.error.node': 'worker' },
                events: [],
                ended: true,
                status: { code: 2, message: 'Node "worker" failed: boom' },
            });
        });
    });
});
