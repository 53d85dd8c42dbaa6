import { RoutingError } from "./errors";
import { type ExecutionContext } from "./execution-context";
import { DEFAULT_ROUTE, type Edge } from "./types";

/**
 * Resolves the target of an edge against the current state.
 *
 * A static edge always yields its target. A conditional edge evaluates its
 * predicate, normalizes the key if the edge asks for it, and looks the key up
 * in its routing table, falling back to the table's `DEFAULT_ROUTE` entry.
 *
 * @throws {RoutingError} If the key has no entry and there is no default, if the
 *   predicate throws or returns something other than a string, or if there is no edge
 *
 * @example
 * ```typescript
 * const edge: ConditionalEdge<State> = {
 *   kind: "conditional",
 *   from: "classify",
 *   predicate: (state) => state.priority,
 *   table: new Map([["high", "review"], [DEFAULT_ROUTE, "finalize"]]),
 * };
 * resolveRoute(edge, { priority: "low" }, context); // "finalize"
 * ```
 */
export function resolveRoute<S>(
    edge: Edge<S> | undefined,
    state: Readonly<S>,
    context: ExecutionContext,
    from: string = edge?.from ?? "unknown",
): string {
    if (edge === undefined) {
        throw new RoutingError(from, undefined, context.recorded(), {
            reason: `No edge or conditional edge found after node "${from}"`,
        });
    }
    if (edge.kind === "static") {
        return edge.to;
    }

    let key: unknown;
    try {
        key = edge.predicate(state);
    } catch (err) {
        throw new RoutingError(edge.from, undefined, context.recorded(), {
            cause: err,
            reason: `Routing predicate after node "${edge.from}" failed: ${err instanceof Error ? err.message : String(err)}`,
        });
    }
    if (typeof key !== "string") {
        throw new RoutingError(edge.from, key, context.recorded(), {
            reason: `Routing predicate after node "${edge.from}" returned ${typeof key}, expected a string key`,
        });
    }

    const normalized = edge.normalize ? edge.normalize(key) : key;
    const target = edge.table.get(normalized) ?? edge.table.get(DEFAULT_ROUTE);
    if (target === undefined) {
        throw new RoutingError(edge.from, normalized, context.recorded());
    }
    return target;
}
