/**
 * Supervisor example: a router hands work to a researcher and a writer, then finishes.
 *
 * Run with any TypeScript runner, e.g. `npx tsx examples/supervisor.ts`.
 */

import {
    agentWorker,
    consoleLogger,
    createFilteredLogger,
    createSupervisorGraph,
    lastMessage,
    messagesState,
    MemoryCheckpointer,
    ruleDecision,
    type MessagesState,
} from '../src';

async function main() {
    const checkpointer = new MemoryCheckpointer();

    const app = createSupervisorGraph({
        schema: messagesState(),
        workers: {
            researcher: agentWorker('researcher', (state) => `Notes on: ${state.messages[0]?.content ?? 'nothing'}`),
            writer: agentWorker('writer', (state) => `Summary of ${state.messages.length - 1} notes`),
        },
        decide: ruleDecision<MessagesState, 'researcher' | 'writer' | 'FINISH'>(
            [
                { when: (state) => lastMessage(state)?.role === 'user', route: 'researcher' },
                { when: (state) => lastMessage(state)?.name === 'researcher', route: 'writer' },
            ],
            'FINISH',
        ),
        writeTo: 'next',
        logger: createFilteredLogger(consoleLogger, 'info'),
    });

    for await (const event of app.stream(
        { messages: [{ role: 'user', content: 'state machines' }] },
        { threadId: 'demo', checkpointer, maxSteps: 10 },
    )) {
        console.log(`#${event.step} ${event.node}${event.label ? ` -> ${event.label}` : ''}`);
    }

    const latest = await checkpointer.load('demo');
    console.log('Final checkpoint:', latest?.metadata.status, JSON.stringify(latest?.state, null, 2));
}

main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
});
