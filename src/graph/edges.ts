/**
 * Edge table: static and conditional routing between nodes.
 */

import { ConfigurationError, NodeInvocationError } from '../lib/errors';
import type { NodeRegistry } from './registry';
import { isRouter } from './registry';
import type { EdgeDecision, End, GraphEdge } from './types';
import { END, END_NODE_ID } from './types';

export type EdgeTarget = string | End;

/** Serialized form of an edge target */
export function describeTarget(target: EdgeTarget): string {
    return target === END ? END_NODE_ID : target;
}

function sameKeys(options: readonly string[], dispatch: Readonly<Record<string, EdgeTarget>>): {
    missing: string[];
    extra: string[];
} {
    const declared = new Set(options);
    const keys = Object.keys(dispatch);
    return {
        missing: options.filter(option => !Object.prototype.hasOwnProperty.call(dispatch, option)),
        extra: keys.filter(key => !declared.has(key)),
    };
}

/**
 * Holds at most one outgoing edge per node.
 */
export class EdgeTable<S> {
    private readonly edges = new Map<string, GraphEdge<S>>();
    private frozen = false;

    addStatic(from: string, to: EdgeTarget): this {
        return this.add({ kind: 'static', from, to });
    }

    addConditional(
        from: string,
        dispatch: Readonly<Record<string, EdgeTarget>>,
        decision?: EdgeDecision<S>,
    ): this {
        return this.add({
            kind: 'conditional',
            from,
            dispatch: Object.freeze({ ...dispatch }),
            decision,
        });
    }

    get(from: string): GraphEdge<S> | undefined {
        return this.edges.get(from);
    }

    all(): GraphEdge<S>[] {
        return [...this.edges.values()];
    }

    freeze(): this {
        this.frozen = true;
        return this;
    }

    clone(): EdgeTable<S> {
        const copy = new EdgeTable<S>();
        for (const edge of this.edges.values()) {
            copy.add(edge);
        }
        return copy;
    }

    /**
     * Check every edge against the registry. Throws ConfigurationError on the first problem.
     */
    validate(registry: NodeRegistry<S>): void {
        for (const edge of this.edges.values()) {
            if (!registry.has(edge.from)) {
                throw new ConfigurationError(`Edge references unregistered source node: ${edge.from}`);
            }

            const targets: EdgeTarget[] = edge.kind === 'static' ? [edge.to] : Object.values(edge.dispatch);
            for (const target of targets) {
                if (target !== END && !registry.has(target)) {
                    throw new ConfigurationError(
                        `Edge from "${edge.from}" references unregistered node: ${target}`,
                    );
                }
            }

            if (edge.kind === 'conditional') {
                const options = this.optionsFor(edge, registry);
                const { missing, extra } = sameKeys(options, edge.dispatch);
                if (missing.length > 0 || extra.length > 0) {
                    const parts: string[] = [];
                    if (missing.length > 0) parts.push(`missing labels: ${missing.join(', ')}`);
                    if (extra.length > 0) parts.push(`undeclared labels: ${extra.join(', ')}`);
                    throw new ConfigurationError(
                        `Dispatch map of "${edge.from}" does not match its option set (${parts.join('; ')})`,
                        [
                            ...missing.map(label => ({ path: [edge.from, label], message: 'Missing label' })),
                            ...extra.map(label => ({ path: [edge.from, label], message: 'Undeclared label' })),
                        ],
                    );
                }
            }
        }

        for (const id of registry.ids()) {
            if (!this.edges.has(id)) {
                throw new ConfigurationError(`Node "${id}" has no outgoing edge`);
            }
        }
    }

    /**
     * Resolve the next target after a step.
     *
     * @param label - label already chosen for this step, if any
     */
    resolve(from: string, label: string | undefined): EdgeTarget {
        const edge = this.edges.get(from);
        if (!edge) {
            throw new NodeInvocationError(from, `Node "${from}" has no outgoing edge`);
        }
        if (edge.kind === 'static') {
            return edge.to;
        }
        if (label === undefined || !Object.prototype.hasOwnProperty.call(edge.dispatch, label)) {
            throw new NodeInvocationError(from, `No dispatch target for label "${String(label)}" from "${from}"`);
        }
        return edge.dispatch[label];
    }

    private optionsFor(edge: Extract<GraphEdge<S>, { kind: 'conditional' }>, registry: NodeRegistry<S>): readonly string[] {
        const node = registry.get(edge.from);
        if (node && isRouter(node.capability)) {
            if (edge.decision) {
                throw new ConfigurationError(
                    `Conditional edge from router "${edge.from}" dispatches on the router's label and cannot take an explicit decision`,
                );
            }
            return node.capability.options;
        }
        if (edge.decision) {
            return edge.decision.options;
        }
        throw new ConfigurationError(
            `Conditional edge from worker "${edge.from}" requires an explicit decision`,
        );
    }

    private add(edge: GraphEdge<S>): this {
        if (this.frozen) {
            throw new ConfigurationError(`Cannot add edge from "${edge.from}": edge table is frozen`);
        }
        if (edge.from === END_NODE_ID) {
            throw new ConfigurationError('END cannot have outgoing edges');
        }
        const existing = this.edges.get(edge.from);
        if (existing) {
            throw new ConfigurationError(
                `Node "${edge.from}" already has an outgoing ${existing.kind} edge`,
            );
        }
        this.edges.set(edge.from, edge);
        return this;
    }
}
