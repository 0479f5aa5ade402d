import { describe, it, expect } from 'vitest';
import { EdgeTable, describeTarget } from '../../../src/graph/edges';
import { NodeRegistry, router, worker } from '../../../src/graph/registry';
import { END } from '../../../src/graph/types';
import { ConfigurationError, NodeInvocationError } from '../../../src/lib/errors';

function createRegistry(): NodeRegistry<unknown> {
    return new NodeRegistry<unknown>()
        .register('router', router<unknown, 'work' | 'stop'>(['work', 'stop'], () => 'work'))
        .register('worker', worker<unknown>(() => ({})));
}

describe('EdgeTable', () => {
    describe('construction', () => {
        it('should allow one outgoing edge per node', () => {
            const edges = new EdgeTable<unknown>().addStatic('worker', 'router');

            expect(() => edges.addStatic('worker', END)).toThrow(
                'Node "worker" already has an outgoing static edge',
            );
            expect(() => edges.addConditional('worker', { a: END })).toThrow(ConfigurationError);
        });

        it('should refuse edges once frozen', () => {
            const edges = new EdgeTable<unknown>().freeze();

            expect(() => edges.addStatic('worker', END)).toThrow(
                'Cannot add edge from "worker": edge table is frozen',
            );
        });

        it('should refuse edges leaving END', () => {
            expect(() => new EdgeTable<unknown>().addStatic('__end__', 'worker')).toThrow(
                'END cannot have outgoing edges',
            );
        });
    });

    describe('validate', () => {
        it('should accept a complete graph', () => {
            const edges = new EdgeTable<unknown>()
                .addConditional('router', { work: 'worker', stop: END })
                .addStatic('worker', 'router');

            expect(() => edges.validate(createRegistry())).not.toThrow();
        });

        it('should reject an unregistered target', () => {
            const edges = new EdgeTable<unknown>()
                .addConditional('router', { work: 'worker', stop: END })
                .addStatic('worker', 'ghost');

            expect(() => edges.validate(createRegistry())).toThrow(
                'Edge from "worker" references unregistered node: ghost',
            );
        });

        it('should reject an unregistered source', () => {
            const edges = new EdgeTable<unknown>().addStatic('ghost', END);

            expect(() => edges.validate(createRegistry())).toThrow(
                'Edge references unregistered source node: ghost',
            );
        });

        it('should reject a dispatch map missing a declared label', () => {
            const edges = new EdgeTable<unknown>()
                .addConditional('router', { work: 'worker' })
                .addStatic('worker', 'router');

            expect(() => edges.validate(createRegistry())).toThrow(
                'Dispatch map of "router" does not match its option set (missing labels: stop)',
            );
        });

        it('should reject a dispatch map with an undeclared label', () => {
            const edges = new EdgeTable<unknown>()
                .addConditional('router', { work: 'worker', stop: END, retry: 'worker' })
                .addStatic('worker', 'router');

            let caught: unknown;
            try {
                edges.validate(createRegistry());
            } catch (error) {
                caught = error;
            }

            expect(caught).toBeInstanceOf(ConfigurationError);
            expect(caught).toMatchObject({
                message: 'Dispatch map of "router" does not match its option set (undeclared labels: retry)',
                issues: [{ path: ['router', 'retry'], message: 'Undeclared label' }],
            });
        });

        it('should require an explicit decision on a conditional edge leaving a worker', () => {
            const edges = new EdgeTable<unknown>()
                .addConditional('router', { work: 'worker', stop: END })
                .addConditional('worker', { again: 'router', done: END });

            expect(() => edges.validate(createRegistry())).toThrow(
                'Conditional edge from worker "worker" requires an explicit decision',
            );
        });

        it('should refuse an explicit decision on a conditional edge leaving a router', () => {
            const edges = new EdgeTable<unknown>()
                .addConditional('router', { work: 'worker', stop: END }, {
                    options: ['work', 'stop'],
                    decide: () => 'stop',
                })
                .addStatic('worker', 'router');

            expect(() => edges.validate(createRegistry())).toThrow(ConfigurationError);
            expect(() => edges.validate(createRegistry())).toThrow(
                'Conditional edge from router "router" dispatches on the router\'s label and cannot take an explicit decision',
            );
        });

        it('should check a worker decision against its own options', () => {
            const edges = new EdgeTable<unknown>()
                .addConditional('router', { work: 'worker', stop: END })
                .addConditional('worker', { again: 'router', done: END }, {
                    options: ['again', 'done'],
                    decide: () => 'done',
                });

            expect(() => edges.validate(createRegistry())).not.toThrow();
        });

        it('should reject a node without an outgoing edge', () => {
            const edges = new EdgeTable<unknown>().addConditional('router', { work: 'worker', stop: END });

            expect(() => edges.validate(createRegistry())).toThrow('Node "worker" has no outgoing edge');
        });
    });

    describe('resolve', () => {
        const edges = new EdgeTable<unknown>()
            .addConditional('router', { work: 'worker', stop: END })
            .addStatic('worker', 'router');

        it('should follow static edges regardless of label', () => {
            expect(edges.resolve('worker', undefined)).toBe('router');
        });

        it('should follow the dispatch map for a label', () => {
            expect(edges.resolve('router', 'work')).toBe('worker');
            expect(edges.resolve('router', 'stop')).toBe(END);
        });

        it('should fail for a label without a target', () => {
            expect(() => edges.resolve('router', 'retry')).toThrow(NodeInvocationError);
        });

        it('should describe END by its reserved id', () => {
            expect(describeTarget(END)).toBe('__end__');
            expect(describeTarget('worker')).toBe('worker');
        });
    });
});
