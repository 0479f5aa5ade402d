/**
 * Scheduler / Executor.
 *
 * Drives a single run: invoke the current node on the latest snapshot, merge its
 * update, record the step, resolve the next node, repeat until END.
 */

import { CheckpointError, ConfigurationError, GraphRunError, NodeInvocationError, errorMessage, withSteps } from '../lib/errors';
import type { Logger } from '../lib/logger';
import { createChildLogger } from '../lib/logger';
import type { Span, Tracer } from '../lib/tracer';
import { redactContent } from '../lib/tracer';
import type { EdgeTable, EdgeTarget } from './edges';
import { describeTarget } from './edges';
import { StepGuard, invokeNode } from './guard';
import type { ResolvedRunOptions } from './options';
import { resolveRunOptions } from './options';
import type { NodeRegistry } from './registry';
import type { StateSchema } from './state';
import type {
    CollectRunOptions,
    CompiledGraph,
    GraphDescription,
    InvokeOptions,
    NodeContext,
    ResumeOptions,
    RunResult,
    Snapshot,
    StateUpdate,
    StepEvent,
    StreamRunOptions,
} from './types';
import { END } from './types';

/** Frozen parts of a compiled graph */
export interface GraphDefinition<S extends object> {
    name: string;
    schema: StateSchema<S>;
    registry: NodeRegistry<S>;
    edges: EdgeTable<S>;
    entryPoint: string;
    logger?: Logger;
    tracer?: Tracer;
}

type RunPhase = 'running' | 'completed' | 'cancelled' | 'failed';

interface RunStart<S> {
    state: Snapshot<S>;
    next: EdgeTarget;
    completed: number;
}

/**
 * One execution of a compiled graph. Owns its snapshot lineage, counter and history.
 */
export class GraphRun<S extends object> {
    readonly steps: StepEvent<S>[] = [];
    private phase: RunPhase = 'running';
    private state: Snapshot<S>;
    private next: EdgeTarget;
    private completed: number;
    private readonly guard: StepGuard;
    private readonly logger: Logger;
    private started = false;

    constructor(
        private readonly graph: GraphDefinition<S>,
        private readonly options: ResolvedRunOptions,
        start: RunStart<S>,
    ) {
        this.state = start.state;
        this.next = start.next;
        this.completed = start.completed;
        this.guard = new StepGuard(options.maxSteps, options.signal);
        this.logger = createChildLogger(
            options.logger,
            options.threadId ? { graph: graph.name, threadId: options.threadId } : { graph: graph.name },
        );
    }

    get status(): RunPhase {
        return this.phase;
    }

    /**
     * Lazy, finite, non-restartable sequence of step events.
     * Returning early from the consumer cancels the run.
     */
    async *events(): AsyncGenerator<StepEvent<S>, void, undefined> {
        if (this.started) {
            throw new GraphRunError('Run has already been started');
        }
        this.started = true;

        const span = this.options.tracer.startSpan('graph.run', {
            'graph.name': this.graph.name,
            'graph.max_steps': this.options.maxSteps,
        });
        this.logger.info('Run started', { next: describeTarget(this.next), completed: this.completed });

        try {
            while (this.next !== END) {
                if (this.guard.cancelled) {
                    this.phase = 'cancelled';
                    this.logger.warn('Run cancelled', { steps: this.completed });
                    return;
                }
                this.guard.assertCanContinue(this.completed, this.steps);

                yield await this.step(this.next, span);
            }

            this.phase = 'completed';
            this.logger.info('Run completed', { steps: this.completed });
        } catch (error) {
            this.phase = 'failed';
            if (error instanceof GraphRunError) {
                withSteps(error, this.steps);
            }
            span.recordException(error instanceof Error ? error : new Error(String(error)));
            this.logger.error('Run failed', {
                error: error instanceof Error ? error.name : 'Error',
                message: errorMessage(error),
                steps: this.completed,
            });
            throw error;
        } finally {
            if (this.phase === 'running') {
                // Consumer closed the stream between steps
                this.phase = 'cancelled';
                this.logger.warn('Run cancelled by consumer', { steps: this.completed });
            }
            span.setAttributes({ 'graph.status': this.phase, 'graph.steps': this.completed });
            if (this.options.tracer.getConfig().recordState) {
                span.addEvent('graph.state', {
                    content: redactContent(JSON.stringify(this.state), this.options.tracer.getConfig()),
                });
            }
            span.end();
        }
    }

    /**
     * Run to the end and collect the result.
     */
    async drain(): Promise<RunResult<S>> {
        const iterator = this.events();
        let next = await iterator.next();
        while (!next.done) {
            next = await iterator.next();
        }
        return this.result();
    }

    result(): RunResult<S> {
        return {
            status: this.phase === 'cancelled' ? 'cancelled' : 'completed',
            state: this.state,
            steps: [...this.steps],
        };
    }

    private async step(node: string, runSpan: Span): Promise<StepEvent<S>> {
        const graphNode = this.graph.registry.get(node);
        if (!graphNode) {
            throw new NodeInvocationError(node, `Node not found: ${node}`);
        }

        const stepNumber = this.completed + 1;
        const timeoutMs = this.options.nodeTimeoutMs;
        const context = (signal: AbortSignal): NodeContext => ({
            node,
            step: stepNumber,
            signal,
            logger: this.logger,
        });
        const previous = this.state;

        return this.options.tracer.withSpan('graph.step', async (span) => {
            span.setAttributes({ 'graph.node': node, 'graph.step': stepNumber });

            const capability = graphNode.capability;
            let update: StateUpdate<S> = {};
            let label: string | undefined;

            if (capability.kind === 'router') {
                const chosen = await invokeNode(node, signal => capability.decide(previous, context(signal)), timeoutMs);
                if (!capability.options.includes(chosen)) {
                    throw new NodeInvocationError(node, `Router "${node}" returned undeclared label "${chosen}"`);
                }
                label = chosen;
                if (capability.writeTo) {
                    Reflect.set(update, capability.writeTo, chosen);
                }
            } else {
                update = await invokeNode(node, signal => capability.invoke(previous, context(signal)), timeoutMs);
            }

            const state = this.graph.schema.apply(previous, update, node);

            const edge = this.graph.edges.get(node);
            if (edge?.kind === 'conditional' && edge.decision) {
                const decision = edge.decision;
                const chosen = await invokeNode(node, signal => decision.decide(state, context(signal)), timeoutMs);
                if (!decision.options.includes(chosen)) {
                    throw new NodeInvocationError(node, `Decision for "${node}" returned undeclared label "${chosen}"`);
                }
                label = chosen;
            }

            const next = this.graph.edges.resolve(node, label);

            const event: StepEvent<S> = {
                step: stepNumber,
                node,
                update: Object.freeze({ ...update }),
                state,
                next,
            };
            if (label !== undefined) {
                event.label = label;
            }

            // A step counts once its checkpoint is stored
            await this.checkpoint(event);

            this.state = state;
            this.next = next;
            this.completed = stepNumber;
            this.steps.push(event);

            span.setAttribute('graph.next', describeTarget(next));
            const tracerConfig = this.options.tracer.getConfig();
            if (tracerConfig.recordUpdates) {
                span.addEvent('graph.update', {
                    content: redactContent(JSON.stringify(update), tracerConfig),
                });
            }
            runSpan.addEvent('graph.step', { node, step: stepNumber });
            this.logger.debug('Step completed', {
                step: stepNumber,
                node,
                next: describeTarget(next),
                ...(label !== undefined ? { label } : {}),
            });

            return event;
        });
    }

    private async checkpoint(event: StepEvent<S>): Promise<void> {
        const { checkpointer, threadId } = this.options;
        if (!checkpointer || !threadId) {
            return;
        }
        try {
            await checkpointer.save(threadId, {
                step: event.step,
                node: event.node,
                next: event.next === END ? null : event.next,
                state: this.graph.schema.serialize(event.state),
            });
        } catch (error) {
            throw new CheckpointError<S>(
                threadId,
                `Failed to save checkpoint for thread ${threadId} at step ${event.step}: ${errorMessage(error)}`,
                error,
            );
        }
    }
}

/**
 * Executable form of a validated graph. Safe to share between concurrent runs.
 */
export class CompiledStateGraph<S extends object> implements CompiledGraph<S> {
    constructor(private readonly graph: GraphDefinition<S>) { }

    get name(): string {
        return this.graph.name;
    }

    get entryPoint(): string {
        return this.graph.entryPoint;
    }

    /**
     * Prepare a run without starting it.
     */
    createRun(initialState: StateUpdate<S> = {}, options?: InvokeOptions): GraphRun<S> {
        const resolved = this.resolve(options);
        return new GraphRun(this.graph, resolved, {
            state: this.graph.schema.initialize(initialState),
            next: this.graph.entryPoint,
            completed: 0,
        });
    }

    async invoke(initialState: StateUpdate<S> = {}, options?: InvokeOptions): Promise<RunResult<S>> {
        return this.createRun(initialState, options).drain();
    }

    async *stream(initialState: StateUpdate<S> = {}, options?: InvokeOptions): AsyncGenerator<StepEvent<S>, void, undefined> {
        yield* this.createRun(initialState, options).events();
    }

    run(initialState: StateUpdate<S>, options: StreamRunOptions): AsyncGenerator<StepEvent<S>, void, undefined>;
    run(initialState?: StateUpdate<S>, options?: CollectRunOptions): Promise<RunResult<S>>;
    run(
        initialState: StateUpdate<S> = {},
        options?: StreamRunOptions | CollectRunOptions,
    ): AsyncGenerator<StepEvent<S>, void, undefined> | Promise<RunResult<S>> {
        if (options?.streaming) {
            return this.stream(initialState, options);
        }
        return this.invoke(initialState, options);
    }

    async resume(threadId: string, options: ResumeOptions): Promise<RunResult<S>> {
        const resolved = this.resolve({ ...options, threadId });
        const checkpoint = await options.checkpointer.load(threadId);
        if (!checkpoint) {
            throw new ConfigurationError(`No checkpoint found for thread: ${threadId}`);
        }

        const state = this.graph.schema.deserialize(checkpoint.state);
        const { next, step } = checkpoint.metadata;
        if (next !== null && !this.graph.registry.has(next)) {
            throw new ConfigurationError(`Checkpoint for thread ${threadId} points at unknown node: ${next}`);
        }

        const run = new GraphRun(this.graph, resolved, {
            state,
            next: next ?? END,
            completed: step,
        });
        return run.drain();
    }

    describe(): GraphDescription {
        const nodes = this.graph.registry.ids().map(id => {
            const capability = this.graph.registry.get(id)?.capability;
            return capability?.kind === 'router'
                ? { id, kind: capability.kind, options: [...capability.options] }
                : { id, kind: 'worker' as const };
        });

        const edges = this.graph.edges.all().map(edge => {
            if (edge.kind === 'static') {
                return { kind: 'static' as const, from: edge.from, to: describeTarget(edge.to) };
            }
            const dispatch: Record<string, string> = {};
            for (const [label, target] of Object.entries(edge.dispatch)) {
                dispatch[label] = describeTarget(target);
            }
            return { kind: 'conditional' as const, from: edge.from, dispatch };
        });

        return {
            name: this.graph.name,
            entryPoint: this.graph.entryPoint,
            nodes,
            edges,
        };
    }

    private resolve(options?: InvokeOptions): ResolvedRunOptions {
        return resolveRunOptions(options, { logger: this.graph.logger, tracer: this.graph.tracer });
    }
}
