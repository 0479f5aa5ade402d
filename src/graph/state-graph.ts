/**
 * StateGraph - LangGraph-style graph builder.
 *
 * The builder is immutable: every call returns a new builder whose type tracks the
 * registered node ids and router labels, so edge targets and dispatch maps are
 * checked by the compiler as well as by `compile()`.
 */

import { ConfigurationError } from '../lib/errors';
import { EdgeTable, type EdgeTarget } from './edges';
import { CompiledStateGraph } from './executor';
import { NodeRegistry, isRouter, worker } from './registry';
import type { StateSchema } from './state';
import type {
    EdgeDecision,
    End,
    NodeCapability,
    NodeFunction,
    RouterCapability,
    StateGraphConfig,
    WorkerCapability,
} from './types';
import { END } from './types';

/** Router id -> declared label union */
export type RouterLabels = Record<string, string>;

interface BuilderDraft<S> {
    registry: NodeRegistry<S>;
    edges: EdgeTable<S>;
    entryPoint: string | null;
}

/**
 * StateGraph builder for router-driven workflows.
 *
 * @example
 * ```typescript
 * const app = new StateGraph(schema)
 *     .addNode('supervisor', router(['worker', 'FINISH'], decide))
 *     .addNode('worker', (state) => ({ messages: ['done'] }))
 *     .addConditionalEdge('supervisor', { worker: 'worker', FINISH: END })
 *     .addEdge('worker', 'supervisor')
 *     .setEntryPoint('supervisor')
 *     .compile();
 * ```
 */
export class StateGraph<S extends object, N extends string = never, R extends RouterLabels = Record<never, never>> {
    private readonly registry: NodeRegistry<S>;
    private readonly edges: EdgeTable<S>;
    private readonly entryPoint: string | null;

    constructor(
        private readonly schema: StateSchema<S>,
        private readonly config: StateGraphConfig = {},
        draft?: BuilderDraft<S>,
    ) {
        this.registry = draft?.registry ?? new NodeRegistry<S>();
        this.edges = draft?.edges ?? new EdgeTable<S>();
        this.entryPoint = draft ? draft.entryPoint : config.entryPoint ?? null;
    }

    /**
     * Register a node. A bare function is treated as a worker.
     */
    addNode<K extends string, L extends string>(
        id: K,
        capability: RouterCapability<S, L>,
    ): StateGraph<S, N | K, R & Record<K, L>>;
    addNode<K extends string>(
        id: K,
        capability: WorkerCapability<S> | NodeFunction<S>,
    ): StateGraph<S, N | K, R>;
    addNode(id: string, capability: NodeCapability<S> | NodeFunction<S>): unknown {
        const registry = this.registry.clone();
        registry.register(id, typeof capability === 'function' ? worker(capability) : capability);
        return this.next({ registry });
    }

    /**
     * Add an unconditional edge.
     */
    addEdge(from: N, to: N | End): StateGraph<S, N, R> {
        if (typeof from !== 'string') {
            throw new ConfigurationError('END cannot have outgoing edges');
        }
        const edges = this.edges.clone();
        edges.addStatic(from, to);
        return this.next<N, R>({ edges });
    }

    /**
     * Add a conditional edge.
     * Leaving a router, the router's label selects the target; leaving a worker,
     * an explicit decision runs on the merged snapshot.
     */
    addConditionalEdge<K extends keyof R & N>(
        from: K,
        dispatch: Record<R[K], N | End>,
    ): StateGraph<S, N, R>;
    addConditionalEdge<L extends string>(
        from: Exclude<N, keyof R>,
        dispatch: Record<L, N | End>,
        decision: EdgeDecision<S, L>,
    ): StateGraph<S, N, R>;
    addConditionalEdge(
        from: string,
        dispatch: Record<string, EdgeTarget>,
        decision?: EdgeDecision<S, string>,
    ): unknown {
        if (typeof from !== 'string') {
            throw new ConfigurationError('END cannot have outgoing edges');
        }
        const edges = this.edges.clone();
        edges.addConditional(from, dispatch, decision);
        return this.next<N, R>({ edges });
    }

    /**
     * Set the entry point.
     */
    setEntryPoint(id: N): StateGraph<S, N, R> {
        return this.next<N, R>({ entryPoint: id });
    }

    /**
     * Validate and freeze the graph into an executable form.
     */
    compile(): CompiledStateGraph<S> {
        if (this.entryPoint === null) {
            throw new ConfigurationError('Graph has no entry point');
        }
        if (!this.registry.has(this.entryPoint)) {
            throw new ConfigurationError(`Entry point references unregistered node: ${this.entryPoint}`);
        }

        const registry = this.registry.clone();
        const edges = this.edges.clone();
        edges.validate(registry);
        this.validateRouters(registry);

        const name = this.config.name ?? 'graph';
        const unreachable = this.unreachableFrom(this.entryPoint, registry, edges);
        if (unreachable.length > 0) {
            this.config.logger?.warn('Graph has unreachable nodes', { graph: name, nodes: unreachable });
        }

        return new CompiledStateGraph<S>({
            name,
            schema: this.schema,
            registry: registry.freeze(),
            edges: edges.freeze(),
            entryPoint: this.entryPoint,
            logger: this.config.logger,
            tracer: this.config.tracer,
        });
    }

    private next<N2 extends string, R2 extends RouterLabels>(patch: Partial<BuilderDraft<S>>): StateGraph<S, N2, R2> {
        return new StateGraph<S, N2, R2>(this.schema, this.config, {
            registry: patch.registry ?? this.registry,
            edges: patch.edges ?? this.edges,
            entryPoint: patch.entryPoint !== undefined ? patch.entryPoint : this.entryPoint,
        });
    }

    private validateRouters(registry: NodeRegistry<S>): void {
        for (const id of registry.ids()) {
            const capability = registry.get(id)?.capability;
            if (!capability || !isRouter(capability) || capability.writeTo === undefined) {
                continue;
            }
            const policy = this.schema.policyOf(capability.writeTo);
            if (policy === undefined) {
                throw new ConfigurationError(`Router "${id}" writes to undeclared field: ${capability.writeTo}`);
            }
            if (policy !== 'overwrite') {
                throw new ConfigurationError(`Router "${id}" must write to an overwrite field, got ${policy}: ${capability.writeTo}`);
            }
        }
    }

    private unreachableFrom(entry: string, registry: NodeRegistry<S>, edges: EdgeTable<S>): string[] {
        const seen = new Set<string>([entry]);
        const queue = [entry];

        while (queue.length > 0) {
            const current = queue.shift();
            const edge = current === undefined ? undefined : edges.get(current);
            if (!edge) continue;

            const targets: EdgeTarget[] = edge.kind === 'static' ? [edge.to] : Object.values(edge.dispatch);
            for (const target of targets) {
                if (target !== END && !seen.has(target)) {
                    seen.add(target);
                    queue.push(target);
                }
            }
        }

        return registry.ids().filter(id => !seen.has(id));
    }
}
