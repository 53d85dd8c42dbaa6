import { z } from "zod";
import { cloneAware, describeType, freezeDeep } from "../util/clone-aware";
import { StateMergeError, type RunErrorContext } from "./errors";
import { type ExecutionContext } from "./execution-context";
import { type ReducerRegistry } from "./registry";
import { type StateOf } from "./types";

const DETACHED: RunErrorContext = { runId: "", path: [] };

type FieldSchema = z.core.$ZodType;

/**
 * The schema a merged value is checked against. Stored values are already
 * parsed, so a field's transforms must not run again: a pipe is checked against
 * its output side, and a field ending in a transform is not checked at all.
 */
function validatorFor(schema: FieldSchema): FieldSchema | undefined {
    if (schema instanceof z.ZodPipe) {
        return schema.out instanceof z.ZodTransform ? undefined : validatorFor(schema.out);
    }
    if (schema instanceof z.ZodOptional) {
        const inner = validatorFor(schema.unwrap());
        return inner === undefined ? undefined : z.optional(inner);
    }
    if (schema instanceof z.ZodNullable) {
        const inner = validatorFor(schema.unwrap());
        return inner === undefined ? undefined : z.nullable(inner);
    }
    if (schema instanceof z.ZodDefault) {
        return validatorFor(schema.unwrap());
    }
    return schema;
}

/**
 * Holds the state of one run and applies partial updates to it.
 *
 * Each field of an update is combined with the current value through the field's
 * reducer (replace when none is declared), and the merged value is validated
 * against that field's schema. Fields the update does not touch are not
 * checked again. An update is applied completely or not at all: on any failure
 * the previous state is kept and a `StateMergeError` is thrown.
 *
 * Snapshots are deep-frozen copies, so steps and predicates cannot write
 * through them.
 *
 * @class StateStore
 * @template Z - The Zod schema for state
 *
 * @example
 * ```typescript
 * const schema = z.object({
 *   history: z.array(z.string()).register(STATE_MERGE, appendReducer),
 *   total: z.number().register(STATE_MERGE, sumReducer),
 * });
 * const store = new StateStore(schema, ReducerRegistry.fromSchema(schema), { history: [], total: 0 });
 * store.apply({ history: ["a"], total: 10 });
 * store.apply({ history: ["b"], total: 20 });
 * store.snapshot; // { history: ["a", "b"], total: 30 }
 * ```
 */
export class StateStore<Z extends z.ZodObject> {
    private state: StateOf<Z>;

    private frozen?: Readonly<StateOf<Z>>;

    private readonly validators: ReadonlyMap<string, FieldSchema | undefined>;

    /**
     * @param initial - Parsed with the schema; a `ZodError` propagates
     * @param context - When given, merge errors carry its run id, path and current node
     */
    constructor(
        schema: Z,
        private readonly reducers: ReducerRegistry,
        initial: z.input<Z>,
        private readonly context?: ExecutionContext,
    ) {
        this.state = schema.parse(initial);
        this.validators = new Map(
            Object.entries<FieldSchema>(schema.shape).map(([field, fieldSchema]): [string, FieldSchema | undefined] => [
                field,
                validatorFor(fieldSchema),
            ]),
        );
    }

    get snapshot(): Readonly<StateOf<Z>> {
        this.frozen ??= freezeDeep(cloneAware(this.state));
        return this.frozen;
    }

    /**
     * Merges a partial update into the state.
     *
     * @returns The new snapshot
     * @throws {StateMergeError} If a field is undeclared, a reducer throws, or a merged value fails validation
     */
    apply(update: Partial<StateOf<Z>>): Readonly<StateOf<Z>> {
        const current: Record<string, unknown> = Object.fromEntries(Object.entries(this.state));
        const incoming: [string, unknown][] = Object.entries(update);
        const merged = new Map<string, unknown>();

        for (const [field, value] of incoming) {
            if (value === undefined) {
                continue;
            }
            const reducer = this.reducers.get(field);
            const reducerName = reducer.name ?? "custom";
            if (!this.validators.has(field)) {
                throw this.mergeError(field, reducerName, undefined, value, "field is not declared in the state schema");
            }
            const existing = current[field];
            let result: unknown;
            // if there's nothing already present for the field, then we just take the value
            if (existing === undefined || existing === null) {
                result = value;
            } else {
                try {
                    result = reducer.merge(existing, value);
                } catch (err) {
                    const reason = err instanceof Error ? err.message : String(err);
                    throw this.mergeError(field, reducerName, existing, value, reason, err);
                }
            }
            const validator = this.validators.get(field);
            if (validator === undefined) {
                merged.set(field, cloneAware(result));
                continue;
            }
            const parsed = z.safeParse(validator, result);
            if (!parsed.success) {
                const reason = parsed.error.issues[0]?.message ?? "merged value does not match the schema";
                throw this.mergeError(field, reducerName, existing, value, reason, parsed.error);
            }
            merged.set(field, cloneAware(parsed.data));
        }

        if (merged.size === 0) {
            return this.snapshot;
        }

        const state = { ...this.state };
        for (const [field, value] of merged) {
            Reflect.set(state, field, value);
        }
        this.state = state;
        this.frozen = undefined;
        return this.snapshot;
    }

    private mergeError(
        field: string,
        reducer: string,
        existing: unknown,
        incoming: unknown,
        reason: string,
        cause?: unknown,
    ): StateMergeError {
        return new StateMergeError(
            {
                field,
                reducer,
                existingType: describeType(existing),
                incomingType: describeType(incoming),
                nodeId: this.context?.currentNode,
                reason,
            },
            this.context?.failure() ?? DETACHED,
            { cause },
        );
    }
}
