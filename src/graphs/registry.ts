import { z } from "zod";
import { replaceReducer, type Reducer } from "./reducers";

/**
 * Declares how a state field merges updates. Register the field schema with a reducer:
 *
 * @example
 * ```typescript
 * const schema = z.object({
 *   history: z.array(z.string()).register(STATE_MERGE, appendReducer),
 *   total: z.number().register(STATE_MERGE, sumReducer),
 *   current: z.string(),                       // replace
 * });
 * ```
 */
export const STATE_MERGE = z.registry<Reducer<z.$output>>();

type FieldSchema = z.core.$ZodType;

function findReducer(schema: FieldSchema): Reducer<unknown> | undefined {
    const reducer = STATE_MERGE.get(schema);
    if (reducer !== undefined) {
        return reducer;
    }
    // a reducer registered before .optional(), .nullable() or .default() still applies
    if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable || schema instanceof z.ZodDefault) {
        return findReducer(schema.unwrap());
    }
    return undefined;
}

/**
 * Field name to reducer table for one state schema, built once at compile time.
 *
 * @class ReducerRegistry
 */
export class ReducerRegistry {
    private readonly reducers: ReadonlyMap<string, Reducer<unknown>>;

    constructor(reducers: Iterable<readonly [string, Reducer<unknown>]> = []) {
        this.reducers = new Map(reducers);
    }

    /**
     * Reads the reducers registered in `STATE_MERGE` for each field of the schema.
     */
    static fromSchema(schema: z.ZodObject): ReducerRegistry {
        const entries: [string, Reducer<unknown>][] = [];
        for (const [field, fieldSchema] of Object.entries<FieldSchema>(schema.shape)) {
            const reducer = findReducer(fieldSchema);
            if (reducer !== undefined) {
                entries.push([field, reducer]);
            }
        }
        return new ReducerRegistry(entries);
    }

    /** The field's reducer, or replace semantics when none was declared. */
    get(field: string): Reducer<unknown> {
        return this.reducers.get(field) ?? replaceReducer;
    }

    has(field: string): boolean {
        return this.reducers.has(field);
    }

    fields(): string[] {
        return [...this.reducers.keys()];
    }
}
