/**
 * Supervisor preset public exports.
 */

export {
    createSupervisorGraph,
    agentWorker,
    DEFAULT_FINISH_LABEL,
    DEFAULT_SUPERVISOR_NAME,
} from './create-supervisor';
export type { SupervisorConfig } from './create-supervisor';

export { messagesState, messageSchema, lastMessage } from './messages';
export type { Message, MessagesState } from './messages';

export { ruleDecision, scriptedDecision } from './decisions';
export type { DecisionRule } from './decisions';
