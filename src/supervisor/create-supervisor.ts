/**
 * Supervisor preset - a router delegates to named workers until it picks FINISH.
 *
 * Every worker hands control back to the supervisor, and the supervisor's dispatch
 * map covers each worker plus the finish label.
 */

import { ConfigurationError } from '../lib/errors';
import type { Logger } from '../lib/logger';
import type { Tracer } from '../lib/tracer';
import type { CompiledStateGraph } from '../graph/executor';
import { router, worker } from '../graph/registry';
import type { StateSchema } from '../graph/state';
import { StateGraph, type RouterLabels } from '../graph/state-graph';
import type { DecisionFunction, End, NodeContext, NodeFunction, Snapshot, WorkerCapability } from '../graph/types';
import { END } from '../graph/types';
import type { MessagesState } from './messages';

export const DEFAULT_FINISH_LABEL = 'FINISH';
export const DEFAULT_SUPERVISOR_NAME = 'supervisor';

export interface SupervisorConfig<S extends object, W extends string, F extends string = typeof DEFAULT_FINISH_LABEL> {
    schema: StateSchema<S>;
    /** Worker id -> capability */
    workers: Record<W, WorkerCapability<S> | NodeFunction<S>>;
    /**
     * Decision capability backing the supervisor router.
     * Must return a worker name or the finish label; anything else fails the run.
     */
    decide: DecisionFunction<S, string>;
    /** Label that ends the run (default: 'FINISH') */
    finishLabel?: F;
    /** Supervisor node id (default: 'supervisor') */
    supervisorName?: string;
    /** Overwrite field that records each decision */
    writeTo?: keyof S & string;
    name?: string;
    logger?: Logger;
    tracer?: Tracer;
}

/**
 * Build and compile a supervisor graph.
 */
export function createSupervisorGraph<S extends object, W extends string, F extends string = typeof DEFAULT_FINISH_LABEL>(
    config: SupervisorConfig<S, W, F>,
): CompiledStateGraph<S> {
    const supervisorName = config.supervisorName ?? DEFAULT_SUPERVISOR_NAME;
    const finishLabel: string = config.finishLabel ?? DEFAULT_FINISH_LABEL;
    const workers: Array<[string, WorkerCapability<S> | NodeFunction<S>]> = Object.entries(config.workers);

    if (workers.length === 0) {
        throw new ConfigurationError('Supervisor requires at least one worker');
    }
    for (const [name] of workers) {
        if (name === supervisorName) {
            throw new ConfigurationError(`Worker name collides with supervisor: ${name}`);
        }
        if (name === finishLabel) {
            throw new ConfigurationError(`Worker name collides with finish label: ${name}`);
        }
    }

    const options = [...workers.map(([name]) => name), finishLabel];
    const dispatch: Record<string, string | End> = { [finishLabel]: END };

    let graph: StateGraph<S, string, RouterLabels> = new StateGraph<S, string, RouterLabels>(config.schema, {
        name: config.name ?? supervisorName,
        entryPoint: supervisorName,
        logger: config.logger,
        tracer: config.tracer,
    });

    graph = graph.addNode(supervisorName, router<S, string>(options, config.decide, { writeTo: config.writeTo }));
    for (const [name, capability] of workers) {
        graph = graph.addNode(name, typeof capability === 'function' ? worker(capability) : capability);
        dispatch[name] = name;
    }
    for (const [name] of workers) {
        graph = graph.addEdge(name, supervisorName);
    }

    return graph.addConditionalEdge(supervisorName, dispatch).compile();
}

/**
 * Wrap a text-producing function as a worker that appends an assistant message
 * tagged with the worker's name.
 */
export function agentWorker(
    name: string,
    fn: (state: Snapshot<MessagesState>, context: NodeContext) => Promise<string> | string,
): WorkerCapability<MessagesState> {
    return worker<MessagesState>(async (state, context) => {
        const content = await fn(state, context);
        return { messages: [{ role: 'assistant', name, content }] };
    });
}
