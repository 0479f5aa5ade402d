/**
 * Graph Runtime public exports.
 */

export { StateGraph } from './state-graph';
export type { RouterLabels } from './state-graph';
export { CompiledStateGraph, GraphRun } from './executor';
export type { GraphDefinition } from './executor';
export { StateSchema, defineState } from './state';
export type { ReducerPolicy, ReducerMap, StateOf, StateZodSchema } from './state';
export { NodeRegistry, worker, router, isRouter } from './registry';
export { EdgeTable, describeTarget } from './edges';
export type { EdgeTarget } from './edges';
export { StepGuard, invokeNode } from './guard';
export { DEFAULT_MAX_STEPS, resolveRunOptions } from './options';
export type { ResolvedRunOptions } from './options';
export { END, END_NODE_ID } from './types';
export type {
    End,
    Snapshot,
    StateUpdate,
    NodeContext,
    NodeFunction,
    DecisionFunction,
    WorkerCapability,
    RouterCapability,
    NodeCapability,
    GraphNode,
    EdgeDecision,
    GraphEdge,
    StepEvent,
    RunStatus,
    RunResult,
    InvokeOptions,
    StreamRunOptions,
    CollectRunOptions,
    ResumeOptions,
    GraphDescription,
    CompiledGraph,
    StateGraphConfig,
} from './types';

// Checkpointers
export { MemoryCheckpointer, checkpointSchema, createCheckpointId, createCheckpointMetadata } from './checkpointer';
export type {
    Checkpointer,
    Checkpoint,
    CheckpointInput,
    CheckpointMetadata,
    CheckpointSaveOptions,
    CheckpointStatus,
} from './checkpointer';

// Redis Checkpointer (any ioredis-compatible client)
export { RedisCheckpointer } from './redis-checkpointer';
export type { RedisClient, RedisCheckpointerConfig } from './redis-checkpointer';
