/**
 * Deterministic decision capabilities for routers.
 */

import type { DecisionFunction, Snapshot } from '../graph/types';

export interface DecisionRule<S, L extends string> {
    /** Checked in declaration order; the first match wins */
    when: (state: Snapshot<S>) => boolean;
    route: L;
}

/**
 * Build a decision function from ordered rules and a fallback label.
 *
 * @example
 * ```typescript
 * const decide = ruleDecision<MessagesState, 'researcher' | 'FINISH'>(
 *     [{ when: (s) => s.messages.length === 1, route: 'researcher' }],
 *     'FINISH',
 * );
 * ```
 */
export function ruleDecision<S, L extends string>(
    rules: ReadonlyArray<DecisionRule<S, L>>,
    fallback: L,
): DecisionFunction<S, L> {
    return (state) => {
        for (const rule of rules) {
            if (rule.when(state)) {
                return rule.route;
            }
        }
        return fallback;
    };
}

/**
 * Decision that replays a fixed sequence of labels, then repeats the last one.
 * Handy for scripted runs and tests.
 */
export function scriptedDecision<S, L extends string>(labels: readonly [L, ...L[]]): DecisionFunction<S, L> {
    let index = 0;
    return () => {
        const label = labels[Math.min(index, labels.length - 1)];
        index++;
        return label;
    };
}
