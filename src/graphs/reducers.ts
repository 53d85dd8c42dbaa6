import { describeType, isPlainObject } from "../util/clone-aware";

/**
 * Combines a field's existing value with the value a node returned for it.
 * `name` shows up in merge error messages.
 */
export interface Reducer<T> {
    name?: string;
    merge(existing: T, incoming: T): T;
}

/** The incoming value overwrites the existing one. Used for fields without a reducer. */
export const replaceReducer = {
    name: "replace",
    merge: <T>(_existing: T, incoming: T): T => incoming,
};

/** Concatenates arrays: `["a"]` then `["b"]` gives `["a", "b"]`. */
export const appendReducer = {
    name: "append",
    merge: <T>(existing: T[], incoming: T[]): T[] => {
        if (!Array.isArray(existing) || !Array.isArray(incoming)) {
            throw new TypeError(`append expects two arrays, got ${describeType(existing)} and ${describeType(incoming)}`);
        }
        return [...existing, ...incoming];
    },
};

/** Adds numbers: `10`, `20`, `30` gives `60`. */
export const sumReducer = {
    name: "sum",
    merge: (existing: number, incoming: number): number => {
        if (typeof existing !== "number" || typeof incoming !== "number") {
            throw new TypeError(`sum expects two numbers, got ${describeType(existing)} and ${describeType(incoming)}`);
        }
        return existing + incoming;
    },
};

/** Shallow object merge, keys from the incoming object win. */
export const mergeReducer = {
    name: "merge",
    merge: <T extends Record<string, unknown>>(existing: T, incoming: T): T => {
        if (!isPlainObject(existing) || !isPlainObject(incoming)) {
            throw new TypeError(`merge expects two plain objects, got ${describeType(existing)} and ${describeType(incoming)}`);
        }
        return { ...existing, ...incoming };
    },
};
