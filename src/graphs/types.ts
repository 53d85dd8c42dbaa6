import { type z } from "zod";
import { type Logger } from "../util/logger";
import { type ReducerRegistry } from "./registry";

// Start is not a real node, it's just a way to start the state machine.
export const START = "start";
// End is not a real node, it's just a way to stop the state machine.
export const END = "end";

/** Routing table key used when the predicate's key has no entry of its own. */
export const DEFAULT_ROUTE = "default";

export type StateOf<Z extends z.ZodObject> = z.output<Z>;

/**
 * What a step receives besides the snapshot. Dependencies such as service
 * clients are not carried here; close over them in the function that builds the step.
 */
export interface StepContext {
    readonly runId: string;
    readonly nodeId: string;
    /** 1-based number of this execution within the run. */
    readonly iteration: number;
    /** Nodes executed before this one. */
    readonly path: readonly string[];
    readonly signal?: AbortSignal;
    /** Logger tagged with the run and node ids. */
    readonly logger: Logger;
}

export type StepFunction<S> = (
    state: Readonly<S>,
    context: StepContext,
) => Partial<S> | undefined | Promise<Partial<S> | undefined>;

export type Predicate<S> = (state: Readonly<S>) => string;

export interface StaticEdge {
    readonly kind: "static";
    readonly from: string;
    readonly to: string;
}

export interface ConditionalEdge<S> {
    readonly kind: "conditional";
    readonly from: string;
    readonly predicate: Predicate<S>;
    /** Routing key to target node id. May hold a `DEFAULT_ROUTE` entry. */
    readonly table: ReadonlyMap<string, string>;
    /** Applied to the predicate's key before lookup, e.g. to fold case. */
    readonly normalize?: (key: string) => string;
}

export type Edge<S> = StaticEdge | ConditionalEdge<S>;

/**
 * Everything the engine needs to run a graph. `CompiledGraph` is the only
 * implementation callers normally see.
 */
export interface GraphDefinition<Z extends z.ZodObject> {
    readonly name: string;
    readonly schema: Z;
    readonly nodes: ReadonlyMap<string, StepFunction<StateOf<Z>>>;
    readonly edges: ReadonlyMap<string, Edge<StateOf<Z>>>;
    /** The edge leaving `START`. */
    readonly entry: Edge<StateOf<Z>>;
    readonly reducers: ReducerRegistry;
    readonly maxSteps: number;
    readonly logger: Logger;
}

export interface CompileOptions {
    /** Shows up in log lines. Defaults to "graph". */
    name?: string;
    /** Node executions allowed per run. Defaults to `LOOPGRAPH_MAX_STEPS`. */
    maxSteps?: number;
    logger?: Logger;
}

export interface InvokeOptions {
    runId?: string;
    /** Overrides the compiled limit for this run. */
    maxSteps?: number;
    /** Checked between node executions and passed on to steps. */
    signal?: AbortSignal;
}

export interface StepEvent<S> {
    runId: string;
    nodeId: string;
    iteration: number;
    /** The partial update the node returned. */
    update: Partial<S>;
    /** The snapshot after merging the update. */
    state: Readonly<S>;
}

export interface GraphResult<S> {
    runId: string;
    state: Readonly<S>;
    /** Executed node ids, in order. */
    path: string[];
}
