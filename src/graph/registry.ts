/**
 * Node registry and capability constructors.
 */

import { ConfigurationError } from '../lib/errors';
import type {
    DecisionFunction,
    GraphNode,
    NodeCapability,
    NodeFunction,
    RouterCapability,
    WorkerCapability,
} from './types';
import { END_NODE_ID } from './types';

/**
 * Wrap a node function as a worker capability.
 */
export function worker<S>(invoke: NodeFunction<S>): WorkerCapability<S> {
    return { kind: 'worker', invoke };
}

/**
 * Build a router capability over a declared option set.
 *
 * @example
 * ```typescript
 * const supervisor = router(['researcher', 'coder', 'FINISH'], (state) => pickNext(state));
 * ```
 */
export function router<S, L extends string>(
    options: readonly L[],
    decide: DecisionFunction<S, L>,
    config: { writeTo?: keyof S & string } = {},
): RouterCapability<S, L> {
    if (options.length === 0) {
        throw new ConfigurationError('Router requires at least one option');
    }
    if (new Set(options).size !== options.length) {
        throw new ConfigurationError(`Router options contain duplicates: ${options.join(', ')}`);
    }
    return {
        kind: 'router',
        options: Object.freeze([...options]),
        decide,
        writeTo: config.writeTo,
    };
}

export function isRouter<S>(capability: NodeCapability<S>): capability is RouterCapability<S, string> {
    return capability.kind === 'router';
}

/**
 * Maps node ids to capabilities. Frozen once a graph compiles.
 */
export class NodeRegistry<S> {
    private readonly nodes = new Map<string, GraphNode<S>>();
    private frozen = false;

    register(id: string, capability: NodeCapability<S>): this {
        if (this.frozen) {
            throw new ConfigurationError(`Cannot register node "${id}": registry is frozen`);
        }
        if (id.length === 0) {
            throw new ConfigurationError('Node id must not be empty');
        }
        if (id === END_NODE_ID) {
            throw new ConfigurationError(`Node id "${END_NODE_ID}" is reserved`);
        }
        if (this.nodes.has(id)) {
            throw new ConfigurationError(`Duplicate node id: ${id}`);
        }
        this.nodes.set(id, { name: id, capability });
        return this;
    }

    get(id: string): GraphNode<S> | undefined {
        return this.nodes.get(id);
    }

    has(id: string): boolean {
        return this.nodes.has(id);
    }

    ids(): string[] {
        return [...this.nodes.keys()];
    }

    get size(): number {
        return this.nodes.size;
    }

    freeze(): this {
        this.frozen = true;
        return this;
    }

    isFrozen(): boolean {
        return this.frozen;
    }

    /** Unfrozen copy sharing the registered capabilities */
    clone(): NodeRegistry<S> {
        const copy = new NodeRegistry<S>();
        for (const node of this.nodes.values()) {
            copy.register(node.name, node.capability);
        }
        return copy;
    }
}
