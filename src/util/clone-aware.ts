/**
 * Returns true for values that are plain objects or arrays.
 */
function isPlainContainer(value: unknown): value is Record<string, unknown> | unknown[] {
    if (typeof value !== "object" || value === null) {
        return false;
    }
    if (Array.isArray(value)) {
        return true;
    }
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}

const MAP_MUTATORS = ["set", "delete", "clear"];
const SET_MUTATORS = ["add", "delete", "clear"];
const DATE_MUTATORS = Object.getOwnPropertyNames(Date.prototype).filter((name) => name.startsWith("set"));

/**
 * Shadows the mutating methods of a built-in collection or date with ones that
 * throw, then freezes it. `Object.freeze` alone leaves their internal slots writable.
 */
function lock(target: object, mutators: readonly string[], kind: string): void {
    if (Object.isFrozen(target)) {
        return;
    }
    for (const name of mutators) {
        Object.defineProperty(target, name, {
            value: () => {
                throw new TypeError(`Cannot call ${name} on a read-only ${kind}`);
            },
        });
    }
    Object.freeze(target);
}

// Deep clone of plain objects, arrays, maps, sets and dates.
// Other class instances (clients, messages) are kept by reference.
export function cloneAware<T>(value: T): T;
export function cloneAware(value: unknown): unknown {
    if (value instanceof Date) {
        return new Date(value.getTime());
    }
    if (value instanceof Map) {
        const entries: [unknown, unknown][] = [...value.entries()];
        return new Map(entries.map(([key, item]): [unknown, unknown] => [cloneAware(key), cloneAware(item)]));
    }
    if (value instanceof Set) {
        const items: unknown[] = [...value.values()];
        return new Set(items.map((item) => cloneAware(item)));
    }
    if (!isPlainContainer(value)) {
        return value;
    }

    // The value is an array
    if (Array.isArray(value)) {
        return value.map((item) => cloneAware(item));
    }

    // The value is a plain object
    const newObj: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
        newObj[key] = cloneAware(item);
    }
    return newObj;
}

/**
 * Freezes a value in place, recursing through plain objects, arrays, maps and
 * sets. Maps, sets and dates have their mutating methods replaced by ones that
 * throw a `TypeError`. Used for the read-only snapshots handed to step
 * functions and predicates, and for compiled graphs.
 *
 * @example
 * ```typescript
 * const snapshot = freezeDeep(cloneAware({ items: [1, 2], seen: new Set([1]) }));
 * snapshot.items.push(3); // TypeError
 * snapshot.seen.add(3);   // TypeError
 * ```
 */
export function freezeDeep<T>(value: T): Readonly<T> {
    if (value instanceof Date) {
        lock(value, DATE_MUTATORS, "Date");
    } else if (value instanceof Map) {
        const entries: [unknown, unknown][] = [...value.entries()];
        for (const [key, item] of entries) {
            freezeDeep(key);
            freezeDeep(item);
        }
        lock(value, MAP_MUTATORS, "Map");
    } else if (value instanceof Set) {
        const items: unknown[] = [...value.values()];
        for (const item of items) {
            freezeDeep(item);
        }
        lock(value, SET_MUTATORS, "Set");
    } else if (isPlainContainer(value)) {
        for (const item of Object.values(value)) {
            freezeDeep(item);
        }
        Object.freeze(value);
    }
    return value;
}

/**
 * Describes the runtime type of a value for error messages:
 * `"null"`, `"array"`, the class name of a class instance, or `typeof` otherwise.
 */
export function describeType(value: unknown): string {
    if (value === null) {
        return "null";
    }
    if (Array.isArray(value)) {
        return "array";
    }
    if (typeof value === "object" && value !== null && !isPlainContainer(value)) {
        return value.constructor.name;
    }
    return typeof value;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
    return isPlainContainer(value) && !Array.isArray(value);
}
