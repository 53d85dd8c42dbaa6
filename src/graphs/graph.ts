import { type z } from "zod";
import { freezeDeep } from "../util/clone-aware";
import { type Logger } from "../util/logger";
import { execute } from "./engine";
import { type ReducerRegistry } from "./registry";
import {
    END,
    START,
    type Edge,
    type GraphDefinition,
    type GraphResult,
    type InvokeOptions,
    type StateOf,
    type StepEvent,
    type StepFunction,
} from "./types";

export { END, START };

function copyEdge<S>(edge: Edge<S>): Edge<S> {
    return edge.kind === "static" ? { ...edge } : { ...edge, table: new Map(edge.table) };
}

/**
 * The immutable, runnable form of a graph, produced by `StateGraph.compile`.
 * Its node and edge maps, edges and routing tables are copies that throw on write.
 * Holds no per-run state: every `invoke` or `stream` call gets its own store,
 * execution context and iteration guard, so one instance can be shared by
 * concurrent runs.
 *
 * @class CompiledGraph
 * @template Z - The Zod schema for state
 *
 * @example
 * ```typescript
 * const graph = new StateGraph(schema)
 *   .addNode("classify", classify)
 *   .addNode("answer", answer)
 *   .addEdge("classify", "answer")
 *   .addEdge("answer", END)
 *   .compile("classify");
 *
 * const { state, path } = await graph.invoke({ question: "..." });
 *
 * for await (const event of graph.stream({ question: "..." })) {
 *   console.log(event.nodeId, event.update);
 * }
 * ```
 */
export class CompiledGraph<Z extends z.ZodObject> implements GraphDefinition<Z> {
    public readonly name: string;
    public readonly schema: Z;
    public readonly nodes: ReadonlyMap<string, StepFunction<StateOf<Z>>>;
    public readonly edges: ReadonlyMap<string, Edge<StateOf<Z>>>;
    public readonly entry: Edge<StateOf<Z>>;
    public readonly reducers: ReducerRegistry;
    public readonly maxSteps: number;
    public readonly logger: Logger;

    constructor(definition: GraphDefinition<Z>) {
        this.name = definition.name;
        this.schema = definition.schema;
        // maps, edges and routing tables are copied, then locked
        this.nodes = freezeDeep(new Map(definition.nodes));
        this.edges = freezeDeep(
            new Map([...definition.edges].map(([from, edge]): [string, Edge<StateOf<Z>>] => [from, copyEdge(edge)])),
        );
        this.entry = freezeDeep(copyEdge(definition.entry));
        this.reducers = definition.reducers;
        this.maxSteps = definition.maxSteps;
        this.logger = definition.logger;
        Object.freeze(this);
    }

    /**
     * The first node of every run, when the entry is a static edge.
     */
    get start(): string | undefined {
        return this.entry.kind === "static" ? this.entry.to : undefined;
    }

    /**
     * Runs the graph to completion.
     *
     * @returns The final snapshot, the run id and the executed path
     * @throws {GraphRunError} When the run aborts; no partial state is returned
     */
    async invoke(input: z.input<Z>, options: InvokeOptions = {}): Promise<GraphResult<StateOf<Z>>> {
        const run = execute(this, input, options);
        let step = await run.next();
        while (!step.done) {
            step = await run.next();
        }
        return step.value;
    }

    /**
     * Runs the graph, yielding one event per node execution. The generator's
     * return value is the same result `invoke` resolves to.
     */
    stream(
        input: z.input<Z>,
        options: InvokeOptions = {},
    ): AsyncGenerator<StepEvent<StateOf<Z>>, GraphResult<StateOf<Z>>, unknown> {
        return execute(this, input, options);
    }
}

/**
 * Runs a compiled graph to completion. Same as `graph.invoke(input, options)`.
 */
export function invoke<Z extends z.ZodObject>(
    graph: CompiledGraph<Z>,
    input: z.input<Z>,
    options?: InvokeOptions,
): Promise<GraphResult<StateOf<Z>>> {
    return graph.invoke(input, options);
}
