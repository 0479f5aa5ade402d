/**
 * Conversation state shared by a supervisor and its workers.
 */

import { z } from 'zod';
import { defineState, type StateOf } from '../graph/state';
import type { Snapshot } from '../graph/types';

export const messageSchema = z.object({
    role: z.enum(['system', 'user', 'assistant', 'tool']),
    content: z.string(),
    /** Worker that produced the message */
    name: z.string().optional(),
});

export type Message = z.infer<typeof messageSchema>;

/**
 * Schema with an append-only `messages` log and the supervisor's last choice in `next`.
 */
export function messagesState() {
    return defineState(
        {
            messages: z.array(messageSchema),
            next: z.string().nullable().default(null),
        },
        { messages: 'append' },
    );
}

export type MessagesState = StateOf<ReturnType<typeof messagesState>>;

/** Most recent message, if any */
export function lastMessage(state: Snapshot<MessagesState>): Message | undefined {
    return state.messages[state.messages.length - 1];
}
