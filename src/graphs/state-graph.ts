import { type z } from "zod";
import { compileGraph, type GraphBlueprint } from "./compiler";
import { type CompiledGraph } from "./graph";
import {
    END,
    START,
    type CompileOptions,
    type Edge,
    type Predicate,
    type StateOf,
    type StepFunction,
} from "./types";

/**
 * Routing key to node id. A list of node ids routes each id to itself.
 */
export type RoutingTable = Readonly<Record<string, string>> | readonly string[];

export interface ConditionalEdgeOptions {
    /**
     * Applied to the predicate's key before lookup, e.g. `(key) => key.toLowerCase()`
     * when a step produces "FINISH" as well as "finish".
     */
    normalize?: (key: string) => string;
}

function isTargetList(table: RoutingTable): table is readonly string[] {
    return Array.isArray(table);
}

/**
 * Builder for a graph with arbitrary nodes, static edges and conditional edges.
 * Cycles are allowed; the iteration guard bounds them at run time.
 *
 * Builder methods never throw. Problems are collected and reported together by
 * `compile`, which either returns an immutable `CompiledGraph` or throws a
 * `GraphDefinitionError`.
 *
 * @class StateGraph
 * @template Z - The Zod schema for state
 *
 * @example
 * ```typescript
 * const schema = z.object({
 *   task: z.string(),
 *   next: z.string(),
 *   results: z.record(z.string(), z.string()).register(STATE_MERGE, mergeReducer),
 * });
 *
 * const graph = new StateGraph(schema)
 *   .addNode("supervisor", supervisor)
 *   .addNode("researcher", researcher)
 *   .addNode("writer", writer)
 *   .addNode("finish", finish)
 *   .addConditionalEdge("supervisor", (state) => state.next, ["researcher", "writer", "finish"])
 *   .addEdge("researcher", "supervisor")
 *   .addEdge("writer", "supervisor")
 *   .addEdge("finish", END)
 *   .compile("supervisor", { maxSteps: 10 });
 * ```
 */
export class StateGraph<Z extends z.ZodObject> {
    protected readonly nodes = new Map<string, StepFunction<StateOf<Z>>>();
    protected readonly edges = new Map<string, Edge<StateOf<Z>>>();
    protected readonly issues: string[] = [];

    constructor(protected readonly schema: Z) { }

    /**
     * Registers a node.
     *
     * @param id - Unique name for the node (cannot be "start" or "end")
     * @param step - Called with a read-only snapshot; returns the fields to update
     */
    addNode(id: string, step: StepFunction<StateOf<Z>>): this {
        if (id === START || id === END) {
            this.issues.push(`Node ${id} is reserved`);
        } else if (this.nodes.has(id)) {
            this.issues.push(`Node ${id} already exists`);
        } else {
            this.nodes.set(id, step);
        }
        return this;
    }

    /**
     * Adds an edge the graph always follows from `from` to `to`.
     * `from` may be `START`, `to` may be `END`.
     */
    addEdge(from: string, to: string): this {
        return this.setEdge({ kind: "static", from, to });
    }

    /**
     * Adds an edge whose target is chosen after `from` runs: the predicate's
     * key is looked up in `table`, falling back to a `DEFAULT_ROUTE` entry.
     *
     * @example
     * ```typescript
     * graph.addConditionalEdge(
     *   "classify",
     *   (state) => state.priority,
     *   { high: "review", [DEFAULT_ROUTE]: "finalize" },
     * );
     * ```
     */
    addConditionalEdge(
        from: string,
        predicate: Predicate<StateOf<Z>>,
        table: RoutingTable,
        options: ConditionalEdgeOptions = {},
    ): this {
        const entries: [string, string][] = isTargetList(table)
            ? table.map((target) => [target, target])
            : Object.entries(table);
        if (entries.length === 0) {
            this.issues.push(`No edges defined for conditional edge from ${from}`);
            return this;
        }
        return this.setEdge({
            kind: "conditional",
            from,
            predicate,
            table: new Map(entries),
            normalize: options.normalize,
        });
    }

    /**
     * Validates the graph and freezes it.
     *
     * @param start - The first node; omit it when an edge from `START` is declared
     * @throws {GraphDefinitionError} If the graph is malformed
     */
    compile(start?: string, options?: CompileOptions): CompiledGraph<Z> {
        return compileGraph(this.schema, this.blueprint(), start, options);
    }

    protected blueprint(): GraphBlueprint<StateOf<Z>> {
        return { nodes: this.nodes, edges: this.edges, issues: this.issues };
    }

    private setEdge(edge: Edge<StateOf<Z>>): this {
        if (edge.from === END) {
            this.issues.push(`Edges cannot leave ${END}`);
        } else if (this.edges.has(edge.from)) {
            this.issues.push(`Node ${edge.from} already has an outgoing edge`);
        } else {
            this.edges.set(edge.from, edge);
        }
        return this;
    }
}
