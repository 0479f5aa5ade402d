/**
 * Run options: defaults and validation.
 */

import { z } from 'zod';
import { ConfigurationError } from '../lib/errors';
import type { Logger } from '../lib/logger';
import { noopLogger } from '../lib/logger';
import type { Tracer } from '../lib/tracer';
import { getGlobalTracer } from '../lib/tracer';
import type { Checkpointer } from './checkpointer';
import type { InvokeOptions } from './types';

/** Default step limit per run */
export const DEFAULT_MAX_STEPS = 100;

const runOptionsSchema = z.object({
    maxSteps: z.number().int().positive().default(DEFAULT_MAX_STEPS),
    nodeTimeoutMs: z.number().positive().finite().optional(),
    threadId: z.string().min(1).optional(),
});

export interface ResolvedRunOptions {
    maxSteps: number;
    nodeTimeoutMs?: number;
    threadId?: string;
    signal?: AbortSignal;
    checkpointer?: Checkpointer;
    logger: Logger;
    tracer: Tracer;
}

/**
 * Validate caller options and fill defaults from the graph config.
 */
export function resolveRunOptions(
    options: InvokeOptions = {},
    defaults: { logger?: Logger; tracer?: Tracer } = {},
): ResolvedRunOptions {
    const parsed = runOptionsSchema.safeParse({
        maxSteps: options.maxSteps,
        nodeTimeoutMs: options.nodeTimeoutMs,
        threadId: options.threadId,
    });
    if (!parsed.success) {
        throw new ConfigurationError(
            'Invalid run options',
            parsed.error.issues.map(issue => ({ path: [...issue.path], message: issue.message })),
        );
    }

    return {
        ...parsed.data,
        signal: options.signal,
        checkpointer: options.checkpointer,
        logger: options.logger ?? defaults.logger ?? noopLogger,
        tracer: options.tracer ?? defaults.tracer ?? getGlobalTracer(),
    };
}
