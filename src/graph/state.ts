/**
 * State schema and reducers.
 *
 * A schema is a zod object shape plus a per-field merge policy. The initial state is
 * parsed as a whole; each later update is parsed field by field, so a field's schema
 * runs once on the value that arrives and never again on stored values.
 */

import { z } from 'zod';
import { ConfigurationError, InvalidUpdateError, type ValidationErrorItem } from '../lib/errors';
import { decodeValue, encodeValue } from './codec';
import type { Snapshot, StateUpdate } from './types';

/** Per-field merge policy */
export type ReducerPolicy = 'overwrite' | 'append';

export type ReducerMap<K extends string> = Partial<Record<K, ReducerPolicy>>;

/** Accepts any zod schema regardless of its input type */
export type StateZodSchema<S> = z.ZodType<S, z.ZodTypeDef, unknown>;

/** Field schemas whose parsed value is still an accepted input */
export type UpdatableField<F extends z.ZodTypeAny> = [z.output<F>] extends [z.input<F>] ? F : never;

function toIssues(error: z.ZodError, prefix: (string | number)[] = []): ValidationErrorItem[] {
    return error.issues.map(issue => ({
        path: [...prefix, ...issue.path],
        message: issue.message,
    }));
}

/** True when parsing may change a value rather than only check it */
function transforms(schema: z.ZodTypeAny): boolean {
    if (schema instanceof z.ZodEffects) {
        return schema._def.effect.type !== 'refinement' || transforms(schema.innerType());
    }
    if (schema instanceof z.ZodPipeline) return true;
    if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
        return transforms(schema.unwrap());
    }
    if (schema instanceof z.ZodDefault) return transforms(schema.removeDefault());
    if (schema instanceof z.ZodArray) return transforms(schema.element);
    if (schema instanceof z.ZodObject) {
        const shape: z.ZodRawShape = schema.shape;
        return Object.values(shape).some(transforms);
    }
    if (schema instanceof z.ZodUnion) {
        const options: readonly z.ZodTypeAny[] = schema.options;
        return options.some(transforms);
    }
    return false;
}

function isArraySchema(schema: z.ZodTypeAny): boolean {
    if (schema instanceof z.ZodArray) return true;
    if (schema instanceof z.ZodDefault) return isArraySchema(schema.removeDefault());
    if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
        return isArraySchema(schema.unwrap());
    }
    return false;
}

function isPlainObject(value: unknown): value is object {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Immutable state schema: initializes snapshots and merges updates into them.
 */
export class StateSchema<S extends object> {
    private readonly fields: ReadonlyMap<string, z.ZodTypeAny>;
    private readonly policies: ReadonlyMap<string, ReducerPolicy>;
    private readonly transformed: ReadonlySet<string>;

    constructor(
        private readonly schema: StateZodSchema<S>,
        fieldSchemas: Readonly<Record<string, z.ZodTypeAny>>,
        reducers: Readonly<Record<string, ReducerPolicy | undefined>> = {},
    ) {
        this.fields = new Map(Object.entries(fieldSchemas));

        const policies = new Map<string, ReducerPolicy>();
        for (const name of this.fields.keys()) {
            policies.set(name, reducers[name] ?? 'overwrite');
        }
        for (const name of Object.keys(reducers)) {
            if (!this.fields.has(name)) {
                throw new ConfigurationError(`Reducer declared for unknown field: ${name}`);
            }
        }
        this.policies = policies;
        this.transformed = new Set(
            [...this.fields].filter(([, fieldSchema]) => transforms(fieldSchema)).map(([name]) => name),
        );
    }

    /** Declared field names, in declaration order */
    fieldNames(): string[] {
        return [...this.fields.keys()];
    }

    /** Merge policy of a declared field */
    policyOf(field: string): ReducerPolicy | undefined {
        return this.policies.get(field);
    }

    /**
     * Build the first snapshot of a run. Missing append fields start empty.
     */
    initialize(initial: StateUpdate<S> = {}): Snapshot<S> {
        if (!isPlainObject(initial)) {
            throw new InvalidUpdateError('Initial state must be an object', [
                { path: [], message: 'Expected object' },
            ]);
        }

        const candidate: Record<string, unknown> = {};
        for (const [field, policy] of this.policies) {
            if (policy === 'append') {
                candidate[field] = [];
            }
        }
        const entries: Array<[string, unknown]> = Object.entries(initial);
        this.assertDeclared(entries.map(([field]) => field));
        for (const [field, value] of entries) {
            candidate[field] = value;
        }

        return this.finalize(candidate, 'Invalid initial state');
    }

    /**
     * Merge an update into a snapshot. Never mutates either argument.
     * Only the fields named by the update are parsed; the rest carry over as stored.
     */
    apply(snapshot: Snapshot<S>, update: StateUpdate<S>, node?: string): Snapshot<S> {
        const from = node ? ` from node "${node}"` : '';
        if (!isPlainObject(update)) {
            throw new InvalidUpdateError(
                `Update${from} must be an object`,
                [{ path: [], message: 'Expected object' }],
                node,
            );
        }

        const entries: Array<[string, unknown]> = Object.entries(update);
        this.assertDeclared(entries.map(([field]) => field), node);

        const merged: StateUpdate<S> = { ...update };
        const issues: ValidationErrorItem[] = [];

        for (const [field, value] of entries) {
            const fieldSchema = this.fields.get(field);
            if (!fieldSchema) continue;

            const append = this.policies.get(field) === 'append';
            if (append && !Array.isArray(value)) {
                throw new InvalidUpdateError(
                    `Append field "${field}" requires an array update`,
                    [{ path: [field], message: 'Expected array' }],
                    node,
                );
            }

            // For append fields this checks the new items only
            const parsed = fieldSchema.safeParse(value);
            if (!parsed.success) {
                issues.push(...toIssues(parsed.error, [field]));
                continue;
            }

            if (append) {
                const existing: unknown = Reflect.get(snapshot, field);
                const added: unknown[] = Array.isArray(parsed.data) ? parsed.data : [];
                Reflect.set(merged, field, Object.freeze([...(Array.isArray(existing) ? existing : []), ...added]));
            } else {
                Reflect.set(merged, field, parsed.data);
            }
        }

        if (issues.length > 0) {
            throw new InvalidUpdateError(`Invalid update${from}`, issues, node);
        }

        const next: Snapshot<S> = { ...snapshot, ...merged };
        Object.freeze(next);
        return next;
    }

    /** JSON-safe copy of a snapshot */
    serialize(snapshot: Snapshot<S>): unknown {
        return encodeValue(snapshot);
    }

    /**
     * Rebuild a snapshot from serialized data, validating it.
     * Fields whose schema transforms keep their stored value instead of being parsed twice.
     */
    deserialize(data: unknown): Snapshot<S> {
        const decoded = decodeValue(data);
        if (!isPlainObject(decoded)) {
            throw new InvalidUpdateError('Serialized state must be an object', [
                { path: [], message: 'Expected object' },
            ]);
        }
        const candidate: Record<string, unknown> = {};
        const entries: Array<[string, unknown]> = Object.entries(decoded);
        for (const [field, value] of entries) {
            candidate[field] = value;
        }

        const validated = this.finalize(candidate, 'Invalid serialized state');
        if (this.transformed.size === 0) {
            return validated;
        }

        const restored: Snapshot<S> = { ...validated };
        for (const field of this.transformed) {
            if (Object.prototype.hasOwnProperty.call(candidate, field)) {
                const value = candidate[field];
                Reflect.set(restored, field, Array.isArray(value) ? Object.freeze(value) : value);
            }
        }
        Object.freeze(restored);
        return restored;
    }

    private assertDeclared(fields: string[], node?: string): void {
        const undeclared = fields.filter(field => !this.fields.has(field));
        if (undeclared.length > 0) {
            throw new InvalidUpdateError(
                `Update references undeclared field${undeclared.length > 1 ? 's' : ''}: ${undeclared.join(', ')}`,
                undeclared.map(field => ({ path: [field], message: 'Undeclared field' })),
                node,
            );
        }
    }

    private finalize(candidate: Record<string, unknown>, message: string, node?: string): Snapshot<S> {
        const parsed = this.schema.safeParse(candidate);
        if (!parsed.success) {
            throw new InvalidUpdateError(message, toIssues(parsed.error), node);
        }

        const data = parsed.data;
        for (const [field, policy] of this.policies) {
            const value: unknown = Reflect.get(data, field);
            if (policy === 'append' && Array.isArray(value)) {
                Object.freeze(value);
            }
        }
        return Object.freeze(data);
    }
}

/**
 * Declare a state schema.
 * A field's parsed type must be accepted by its own schema, because workers return
 * parsed values; a transform that changes the type is rejected by the compiler.
 *
 * @example
 * ```typescript
 * const schema = defineState(
 *     { messages: z.array(z.string()), next: z.string().nullable().default(null) },
 *     { messages: 'append' },
 * );
 * ```
 */
export function defineState<T extends z.ZodRawShape>(
    shape: T & { [K in keyof T]: UpdatableField<T[K]> },
    reducers: ReducerMap<keyof T & string> = {},
): StateSchema<z.output<z.ZodObject<T, 'strict'>>> {
    const fields: z.ZodRawShape = shape;
    for (const [field, policy] of Object.entries(reducers)) {
        const fieldSchema = fields[field];
        if (policy === 'append' && fieldSchema && !isArraySchema(fieldSchema)) {
            throw new ConfigurationError(`Append field "${field}" must be declared as an array`);
        }
    }

    const object = z.object<T>(shape).strict();
    return new StateSchema(object, fields, reducers);
}

/** State type described by a schema */
export type StateOf<T> = T extends StateSchema<infer S> ? S : never;
