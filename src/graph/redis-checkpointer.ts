/**
 * Redis Checkpointer implementation.
 * Works with any ioredis-compatible client.
 *
 * @example
 * ```typescript
 * import Redis from 'ioredis';
 * import { RedisCheckpointer } from 'supervisor-graph';
 *
 * const redis = new Redis('redis://localhost:6379');
 * const checkpointer = new RedisCheckpointer(redis, { prefix: 'myapp:' });
 * ```
 */

import type {
    Checkpoint,
    CheckpointInput,
    CheckpointMetadata,
    CheckpointSaveOptions,
    Checkpointer,
} from './checkpointer';
import { GraphError, errorMessage } from '../lib/errors';
import { checkpointSchema, createCheckpointMetadata } from './checkpointer';

/** Redis client interface (compatible with ioredis) */
export interface RedisClient {
    set(key: string, value: string): Promise<'OK' | null>;
    set(key: string, value: string, exMode: 'EX', time: number): Promise<'OK' | null>;
    get(key: string): Promise<string | null>;
    del(...keys: string[]): Promise<number>;
    rpush(key: string, ...values: string[]): Promise<number>;
    lrange(key: string, start: number, stop: number): Promise<string[]>;
    lrem(key: string, count: number, value: string): Promise<number>;
    expire(key: string, seconds: number): Promise<number>;
}

/** Redis checkpointer configuration */
export interface RedisCheckpointerConfig {
    /** Key prefix (default: 'graph:checkpoint:') */
    prefix?: string;
    /** TTL in seconds (default: no expiry) */
    ttlSeconds?: number;
}

/**
 * Redis-based checkpointer.
 * Each thread keeps a list of checkpoint ids in save order.
 */
export class RedisCheckpointer implements Checkpointer {
    private readonly redis: RedisClient;
    private readonly prefix: string;
    private readonly ttlSeconds?: number;

    constructor(client: RedisClient, config: RedisCheckpointerConfig = {}) {
        this.redis = client;
        this.prefix = config.prefix ?? 'graph:checkpoint:';
        this.ttlSeconds = config.ttlSeconds;
    }

    private checkpointKey(id: string): string {
        return `${this.prefix}data:${id}`;
    }

    private threadKey(threadId: string): string {
        return `${this.prefix}thread:${threadId}`;
    }

    async save(threadId: string, input: CheckpointInput, options?: CheckpointSaveOptions): Promise<CheckpointMetadata> {
        const metadata = createCheckpointMetadata(threadId, input, options);
        const checkpoint: Checkpoint = { metadata, state: input.state };

        const key = this.checkpointKey(metadata.id);
        const data = JSON.stringify(checkpoint);

        if (this.ttlSeconds) {
            await this.redis.set(key, data, 'EX', this.ttlSeconds);
        } else {
            await this.redis.set(key, data);
        }

        await this.redis.rpush(this.threadKey(threadId), metadata.id);
        if (this.ttlSeconds) {
            await this.redis.expire(this.threadKey(threadId), this.ttlSeconds);
        }

        return metadata;
    }

    async load(threadId: string): Promise<Checkpoint | null> {
        const ids = await this.redis.lrange(this.threadKey(threadId), 0, -1);

        // Newest first; skip ids whose data expired
        for (let i = ids.length - 1; i >= 0; i--) {
            const checkpoint = await this.read(ids[i]);
            if (checkpoint) {
                return checkpoint;
            }
        }

        return null;
    }

    async list(threadId: string): Promise<CheckpointMetadata[]> {
        const ids = await this.redis.lrange(this.threadKey(threadId), 0, -1);
        const result: CheckpointMetadata[] = [];

        for (const id of [...ids].reverse()) {
            const checkpoint = await this.read(id);
            if (checkpoint) {
                result.push(checkpoint.metadata);
            }
        }

        return result;
    }

    async delete(checkpointId: string): Promise<boolean> {
        const checkpoint = await this.read(checkpointId);
        if (!checkpoint) {
            return false;
        }

        await this.redis.del(this.checkpointKey(checkpointId));
        await this.redis.lrem(this.threadKey(checkpoint.metadata.threadId), 0, checkpointId);

        return true;
    }

    async clear(threadId: string): Promise<number> {
        const ids = await this.redis.lrange(this.threadKey(threadId), 0, -1);
        if (ids.length === 0) {
            return 0;
        }

        const deleted = await this.redis.del(...ids.map(id => this.checkpointKey(id)));
        await this.redis.del(this.threadKey(threadId));

        return deleted;
    }

    private async read(id: string): Promise<Checkpoint | null> {
        const data = await this.redis.get(this.checkpointKey(id));
        if (!data) {
            return null;
        }

        let raw: unknown;
        try {
            raw = JSON.parse(data);
        } catch (error) {
            throw new GraphError(`Corrupt checkpoint ${id}: ${errorMessage(error)}`);
        }

        const parsed = checkpointSchema.safeParse(raw);
        if (!parsed.success) {
            throw new GraphError(`Corrupt checkpoint ${id}: ${parsed.error.issues[0]?.message ?? 'invalid data'}`);
        }
        return { metadata: parsed.data.metadata, state: parsed.data.state };
    }
}
