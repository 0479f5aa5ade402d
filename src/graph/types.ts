/**
 * Graph Runtime types.
 */

import type { Logger } from '../lib/logger';
import type { Tracer } from '../lib/tracer';
import type { Checkpointer } from './checkpointer';

/** Special end symbol */
export const END = Symbol('END');

/** Terminal sentinel type */
export type End = typeof END;

/** Reserved id used for END in serialized form */
export const END_NODE_ID = '__end__';

/** Immutable point-in-time value of the shared state */
export type Snapshot<S> = Readonly<S>;

/** Partial update returned by a worker */
export type StateUpdate<S> = { [K in keyof S]?: S[K] };

/** Context handed to every capability invocation */
export interface NodeContext {
    /** Node being invoked */
    node: string;
    /** 1-based number of the step this invocation produces */
    step: number;
    /** Aborted when the per-node timeout expires */
    signal: AbortSignal;
    logger: Logger;
}

/** Graph node function signature */
export type NodeFunction<S> = (
    state: Snapshot<S>,
    context: NodeContext,
) => Promise<StateUpdate<S>> | StateUpdate<S>;

/** Decision function backing a router or a conditional edge */
export type DecisionFunction<S, L extends string> = (
    state: Snapshot<S>,
    context: NodeContext,
) => Promise<L> | L;

/** Worker capability: free-form logic returning a state update */
export interface WorkerCapability<S> {
    readonly kind: 'worker';
    readonly invoke: NodeFunction<S>;
}

/** Router capability: picks one label from a declared option set */
export interface RouterCapability<S, L extends string = string> {
    readonly kind: 'router';
    readonly options: readonly L[];
    readonly decide: DecisionFunction<S, L>;
    /** Overwrite field that receives the chosen label */
    readonly writeTo?: keyof S & string;
}

export type NodeCapability<S> = WorkerCapability<S> | RouterCapability<S, string>;

/** Registered graph node */
export interface GraphNode<S> {
    name: string;
    capability: NodeCapability<S>;
}

/** Explicit decision for a conditional edge leaving a worker */
export interface EdgeDecision<S, L extends string = string> {
    options: readonly L[];
    decide: DecisionFunction<S, L>;
}

/** Graph edge definition */
export type GraphEdge<S> =
    | { kind: 'static'; from: string; to: string | End }
    | {
        kind: 'conditional';
        from: string;
        dispatch: Readonly<Record<string, string | End>>;
        decision?: EdgeDecision<S>;
    };

/** One completed step of a run */
export interface StepEvent<S> {
    /** 1-based step number */
    step: number;
    node: string;
    update: StateUpdate<S>;
    state: Snapshot<S>;
    /** Resolved target after this step */
    next: string | End;
    /** Label chosen by a router or edge decision */
    label?: string;
}

export type RunStatus = 'completed' | 'cancelled';

/** Outcome of a run that did not fail */
export interface RunResult<S> {
    status: RunStatus;
    state: Snapshot<S>;
    steps: StepEvent<S>[];
}

/** Invoke options */
export interface InvokeOptions {
    /** Thread ID for checkpointing */
    threadId?: string;
    /** Maximum number of steps */
    maxSteps?: number;
    /** Cooperative cancellation, honored at step boundaries */
    signal?: AbortSignal;
    /** Per-node invocation timeout */
    nodeTimeoutMs?: number;
    /** Saves a checkpoint after every step when threadId is set */
    checkpointer?: Checkpointer;
    logger?: Logger;
    tracer?: Tracer;
}

export interface StreamRunOptions extends InvokeOptions {
    streaming: true;
}

export interface CollectRunOptions extends InvokeOptions {
    streaming?: false;
}

/** Plain description of a compiled graph */
export interface GraphDescription {
    name: string;
    entryPoint: string;
    nodes: Array<{ id: string; kind: NodeCapability<unknown>['kind']; options?: string[] }>;
    edges: Array<
        | { kind: 'static'; from: string; to: string }
        | { kind: 'conditional'; from: string; dispatch: Record<string, string> }
    >;
}

/** Compiled graph */
export interface CompiledGraph<S> {
    readonly name: string;
    readonly entryPoint: string;
    invoke(initialState?: StateUpdate<S>, options?: InvokeOptions): Promise<RunResult<S>>;
    stream(initialState?: StateUpdate<S>, options?: InvokeOptions): AsyncGenerator<StepEvent<S>, void, undefined>;
    run(initialState: StateUpdate<S>, options: StreamRunOptions): AsyncGenerator<StepEvent<S>, void, undefined>;
    run(initialState?: StateUpdate<S>, options?: CollectRunOptions): Promise<RunResult<S>>;
    /** Continue the latest checkpoint of a thread */
    resume(threadId: string, options: ResumeOptions): Promise<RunResult<S>>;
    describe(): GraphDescription;
}

export interface ResumeOptions extends Omit<InvokeOptions, 'threadId' | 'checkpointer'> {
    checkpointer: Checkpointer;
}

/** Graph builder config */
export interface StateGraphConfig {
    /** Entry point node */
    entryPoint?: string;
    /** Name used in logs and spans */
    name?: string;
    logger?: Logger;
    tracer?: Tracer;
}
