/**
 * Termination guard: step limit, cooperative cancellation, node timeouts.
 */

import { NodeInvocationError, RecursionLimitExceededError, errorMessage } from '../lib/errors';
import type { StepEvent } from './types';

export class StepGuard {
    constructor(
        public readonly maxSteps: number,
        private readonly signal?: AbortSignal,
    ) { }

    /** True once the caller asked to stop; checked only between steps */
    get cancelled(): boolean {
        return this.signal?.aborted ?? false;
    }

    /**
     * Throw when running another step would exceed maxSteps.
     */
    assertCanContinue<S>(completed: number, steps: StepEvent<S>[]): void {
        if (completed >= this.maxSteps) {
            throw new RecursionLimitExceededError<S>(this.maxSteps, [...steps]);
        }
    }
}

/**
 * Run one capability invocation, converting failures and timeouts to NodeInvocationError.
 * The callback's signal aborts when the timeout expires.
 */
export async function invokeNode<T>(
    node: string,
    fn: (signal: AbortSignal) => Promise<T> | T,
    timeoutMs?: number,
): Promise<T> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    let timeoutError: NodeInvocationError | undefined;

    try {
        return await new Promise<T>((resolve, reject) => {
            if (timeoutMs !== undefined) {
                timer = setTimeout(() => {
                    timeoutError = new NodeInvocationError(
                        node,
                        `Node "${node}" timed out after ${timeoutMs}ms`,
                        undefined,
                        true,
                    );
                    controller.abort();
                    reject(timeoutError);
                }, timeoutMs);
            }
            // A late settlement after the timeout is ignored by the settled promise
            (async () => fn(controller.signal))().then(resolve, reject);
        });
    } catch (error) {
        if (timeoutError !== undefined && error === timeoutError) {
            throw error;
        }
        throw new NodeInvocationError(node, `Node "${node}" failed: ${errorMessage(error)}`, error);
    } finally {
        if (timer !== undefined) {
            clearTimeout(timer);
        }
    }
}
