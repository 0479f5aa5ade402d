import type { StepEvent } from '../graph/types';

export class GraphError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'GraphError';
    }
}

/** Validation error details */
export interface ValidationErrorItem {
    path: (string | number)[];
    message: string;
}

/**
 * Raised while building or compiling a graph, or for invalid run options.
 * A graph that fails here never becomes usable.
 */
export class ConfigurationError extends GraphError {
    issues: ValidationErrorItem[];

    constructor(message: string, issues: ValidationErrorItem[] = []) {
        super(message);
        this.name = 'ConfigurationError';
        this.issues = issues;
    }
}

/**
 * Base for errors that abort a run.
 * Carries the steps completed before the failure.
 */
export class GraphRunError<S = unknown> extends GraphError {
    steps: StepEvent<S>[];

    constructor(message: string, steps: StepEvent<S>[] = []) {
        super(message);
        this.name = 'GraphRunError';
        this.steps = steps;
    }
}

/**
 * An update referenced an undeclared field or carried a value its field rejects.
 */
export class InvalidUpdateError<S = unknown> extends GraphRunError<S> {
    /** Node that produced the update, absent for initial state */
    node?: string;
    issues: ValidationErrorItem[];

    constructor(message: string, issues: ValidationErrorItem[], node?: string, steps: StepEvent<S>[] = []) {
        super(message, steps);
        this.name = 'InvalidUpdateError';
        this.issues = issues;
        this.node = node;
    }
}

/**
 * A capability failed, timed out, or a router returned an undeclared label.
 */
export class NodeInvocationError<S = unknown> extends GraphRunError<S> {
    constructor(
        public readonly node: string,
        message: string,
        public cause?: unknown,
        public readonly timedOut: boolean = false,
        steps: StepEvent<S>[] = [],
    ) {
        super(message, steps);
        this.name = 'NodeInvocationError';
    }
}

/**
 * The step counter would exceed maxSteps before reaching END.
 */
export class RecursionLimitExceededError<S = unknown> extends GraphRunError<S> {
    maxSteps: number;

    constructor(maxSteps: number, steps: StepEvent<S>[] = []) {
        super(`Graph execution exceeded maximum steps: ${maxSteps}`, steps);
        this.name = 'RecursionLimitExceededError';
        this.maxSteps = maxSteps;
    }
}

/**
 * A checkpoint could not be saved. The step being saved is not part of `steps`.
 */
export class CheckpointError<S = unknown> extends GraphRunError<S> {
    constructor(
        public readonly threadId: string,
        message: string,
        public cause?: unknown,
        steps: StepEvent<S>[] = [],
    ) {
        super(message, steps);
        this.name = 'CheckpointError';
    }
}

/**
 * Re-attach history to a run error raised below the executor.
 */
export function withSteps<S>(error: GraphRunError<S>, steps: StepEvent<S>[]): GraphRunError<S> {
    error.steps = [...steps];
    return error;
}

/**
 * Describe an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
