import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
    agentWorker,
    createSupervisorGraph,
    lastMessage,
    messagesState,
    ruleDecision,
    scriptedDecision,
    type MessagesState,
} from '../../../src/supervisor';
import { defineState, type StateOf } from '../../../src/graph';
import { ConfigurationError } from '../../../src/lib/errors';

type Route = 'researcher' | 'coder' | 'FINISH';

const routeByLastSpeaker = ruleDecision<MessagesState, Route>(
    [
        { when: (state) => lastMessage(state)?.role === 'user', route: 'researcher' },
        { when: (state) => lastMessage(state)?.name === 'researcher', route: 'coder' },
    ],
    'FINISH',
);

function createTeam() {
    return createSupervisorGraph({
        schema: messagesState(),
        workers: {
            researcher: agentWorker('researcher', (state) => `found: ${state.messages[0]?.content ?? ''}`),
            coder: agentWorker('coder', () => 'patched'),
        },
        decide: routeByLastSpeaker,
        writeTo: 'next',
    });
}

describe('Supervisor', () => {
    describe('createSupervisorGraph', () => {
        it('should delegate to workers until the supervisor finishes', async () => {
            const result = await createTeam().invoke({ messages: [{ role: 'user', content: 'task' }] });

            expect(result.steps.map(step => step.node)).toEqual([
                'supervisor',
                'researcher',
                'supervisor',
                'coder',
                'supervisor',
            ]);
            expect(result.state.messages).toEqual([
                { role: 'user', content: 'task' },
                { role: 'assistant', name: 'researcher', content: 'found: task' },
                { role: 'assistant', name: 'coder', content: 'patched' },
            ]);
            expect(result.state.next).toBe('FINISH');
        });

        it('should route every worker back to the supervisor', () => {
            const description = createTeam().describe();

            expect(description.name).toBe('supervisor');
            expect(description.entryPoint).toBe('supervisor');
            expect(description.nodes).toEqual([
                { id: 'supervisor', kind: 'router', options: ['researcher', 'coder', 'FINISH'] },
                { id: 'researcher', kind: 'worker' },
                { id: 'coder', kind: 'worker' },
            ]);
            expect(description.edges).toEqual([
                { kind: 'static', from: 'researcher', to: 'supervisor' },
                { kind: 'static', from: 'coder', to: 'supervisor' },
                {
                    kind: 'conditional',
                    from: 'supervisor',
                    dispatch: { FINISH: '__end__', researcher: 'researcher', coder: 'coder' },
                },
            ]);
        });

        it('should honor a custom finish label and supervisor name', async () => {
            const app = createSupervisorGraph({
                schema: messagesState(),
                workers: { writer: agentWorker('writer', () => 'draft') },
                decide: scriptedDecision<MessagesState, 'writer' | 'DONE'>(['writer', 'writer', 'DONE']),
                finishLabel: 'DONE',
                supervisorName: 'lead',
            });

            const result = await app.invoke();

            expect(app.entryPoint).toBe('lead');
            expect(result.steps.map(step => step.label).filter(label => label !== undefined)).toEqual([
                'writer',
                'writer',
                'DONE',
            ]);
            expect(result.state.messages.map(message => message.content)).toEqual(['draft', 'draft']);
            expect(result.state.next).toBeNull();
        });

        it('should accept plain worker functions and any state schema', async () => {
            const schema = defineState({ log: z.array(z.string()) }, { log: 'append' });
            type LogState = StateOf<typeof schema>;

            const app = createSupervisorGraph({
                schema,
                workers: { echo: () => ({ log: ['echo'] }) },
                decide: (state: Readonly<LogState>) => (state.log.length < 2 ? 'echo' : 'FINISH'),
            });

            const result = await app.invoke();

            expect(result.state.log).toEqual(['echo', 'echo']);
        });

        it('should require at least one worker', () => {
            expect(() => createSupervisorGraph({
                schema: messagesState(),
                workers: {},
                decide: () => 'FINISH',
            })).toThrow('Supervisor requires at least one worker');
        });

        it('should reject a worker named like the finish label', () => {
            expect(() => createSupervisorGraph({
                schema: messagesState(),
                workers: { FINISH: agentWorker('FINISH', () => '') },
                decide: () => 'FINISH',
            })).toThrow(ConfigurationError);
        });

        it('should reject a worker named like the supervisor', () => {
            expect(() => createSupervisorGraph({
                schema: messagesState(),
                workers: { supervisor: agentWorker('supervisor', () => '') },
                decide: () => 'FINISH',
            })).toThrow('Worker name collides with supervisor: supervisor');
        });
    });

    describe('decisions', () => {
        it('should pick the first matching rule', () => {
            const state = messagesState().initialize({
                messages: [{ role: 'assistant', name: 'researcher', content: 'notes' }],
            });
            const context = {
                node: 'supervisor',
                step: 1,
                signal: new AbortController().signal,
                logger: { debug: () => { }, info: () => { }, warn: () => { }, error: () => { } },
            };

            expect(routeByLastSpeaker(state, context)).toBe('coder');
            expect(routeByLastSpeaker(messagesState().initialize(), context)).toBe('FINISH');
        });
    });
});
