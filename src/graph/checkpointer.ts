/**
 * Checkpointer - Run persistence for graph execution.
 *
 * The executor saves one checkpoint per completed step when a run has a threadId,
 * which lets `resume()` continue a thread from its latest step.
 */

import { z } from 'zod';

/**
 * Checkpoint status.
 */
export type CheckpointStatus = 'active' | 'completed';

/**
 * Checkpoint metadata.
 */
export interface CheckpointMetadata {
    /** Unique checkpoint ID */
    id: string;
    /** Thread ID for grouping checkpoints */
    threadId: string;
    /** Creation timestamp */
    createdAt: number;
    /** Step number the checkpoint was taken after */
    step: number;
    /** Node that produced the step */
    node: string;
    /** Next node to run, null when the run reached END */
    next: string | null;
    status: CheckpointStatus;
    /** Optional user-provided metadata */
    custom?: Record<string, unknown>;
}

/** Data the executor hands to a checkpointer */
export interface CheckpointInput {
    step: number;
    node: string;
    next: string | null;
    /** JSON-safe state produced by StateSchema.serialize */
    state: unknown;
}

/**
 * Stored checkpoint data.
 */
export interface Checkpoint {
    metadata: CheckpointMetadata;
    /** Serialized state (JSON) */
    state: unknown;
}

/** Options for saving a checkpoint */
export interface CheckpointSaveOptions {
    /** Custom user metadata */
    custom?: Record<string, unknown>;
}

/** Validates checkpoints read back from external stores */
export const checkpointSchema = z.object({
    metadata: z.object({
        id: z.string(),
        threadId: z.string(),
        createdAt: z.number(),
        step: z.number().int().nonnegative(),
        node: z.string(),
        next: z.string().nullable(),
        status: z.enum(['active', 'completed']),
        custom: z.record(z.unknown()).optional(),
    }),
    state: z.unknown(),
});

/**
 * Checkpointer interface.
 */
export interface Checkpointer {
    /**
     * Save a checkpoint.
     */
    save(threadId: string, input: CheckpointInput, options?: CheckpointSaveOptions): Promise<CheckpointMetadata>;

    /**
     * Load the latest checkpoint for a thread.
     */
    load(threadId: string): Promise<Checkpoint | null>;

    /**
     * List all checkpoints for a thread, newest first.
     */
    list(threadId: string): Promise<CheckpointMetadata[]>;

    /**
     * Delete a checkpoint.
     */
    delete(checkpointId: string): Promise<boolean>;

    /**
     * Clear all checkpoints for a thread.
     */
    clear(threadId: string): Promise<number>;
}

/**
 * Generate a checkpoint id.
 * @public Shared by all Checkpointer implementations.
 */
export function createCheckpointId(threadId: string): string {
    return `ckpt_${threadId}_${Date.now()}_${Math.random().toString(36).slice(2, 8)}`;
}

/**
 * Build checkpoint metadata for a step.
 * @public Shared by all Checkpointer implementations.
 */
export function createCheckpointMetadata(
    threadId: string,
    input: CheckpointInput,
    options?: CheckpointSaveOptions,
): CheckpointMetadata {
    return {
        id: createCheckpointId(threadId),
        threadId,
        createdAt: Date.now(),
        step: input.step,
        node: input.node,
        next: input.next,
        status: input.next === null ? 'completed' : 'active',
        custom: options?.custom,
    };
}

/**
 * In-memory checkpointer implementation.
 * Suitable for testing and short-lived sessions.
 */
export class MemoryCheckpointer implements Checkpointer {
    // Insertion order doubles as recency order
    private readonly checkpoints = new Map<string, Checkpoint>();
    private readonly maxItems: number;

    constructor(options?: { maxItems?: number }) {
        this.maxItems = options?.maxItems ?? 100;
    }

    async save(threadId: string, input: CheckpointInput, options?: CheckpointSaveOptions): Promise<CheckpointMetadata> {
        const metadata = createCheckpointMetadata(threadId, input, options);

        this.checkpoints.set(metadata.id, {
            metadata,
            state: structuredClone(input.state),
        });

        this.cleanup();

        return metadata;
    }

    async load(threadId: string): Promise<Checkpoint | null> {
        let latest: Checkpoint | null = null;

        for (const checkpoint of this.checkpoints.values()) {
            if (checkpoint.metadata.threadId === threadId) {
                latest = checkpoint;
            }
        }

        return latest;
    }

    async list(threadId: string): Promise<CheckpointMetadata[]> {
        const result: CheckpointMetadata[] = [];

        for (const checkpoint of this.checkpoints.values()) {
            if (checkpoint.metadata.threadId === threadId) {
                result.push(checkpoint.metadata);
            }
        }

        return result.reverse();
    }

    async delete(checkpointId: string): Promise<boolean> {
        return this.checkpoints.delete(checkpointId);
    }

    async clear(threadId: string): Promise<number> {
        let count = 0;

        for (const [id, checkpoint] of this.checkpoints) {
            if (checkpoint.metadata.threadId === threadId) {
                this.checkpoints.delete(id);
                count++;
            }
        }

        return count;
    }

    /**
     * Drop the oldest checkpoints to stay under maxItems.
     */
    private cleanup(): void {
        const excess = this.checkpoints.size - this.maxItems;
        if (excess <= 0) {
            return;
        }

        const oldest = Array.from(this.checkpoints.keys()).slice(0, excess);
        for (const id of oldest) {
            this.checkpoints.delete(id);
        }
    }
}
