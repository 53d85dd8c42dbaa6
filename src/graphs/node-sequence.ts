import { type z } from "zod";
import { type GraphBlueprint } from "./compiler";
import { StateGraph } from "./state-graph";
import { END, START, type StateOf, type StepFunction } from "./types";

/**
 * A graph that executes a sequence of nodes linearly.
 * Nodes are executed one after another without branching.
 * Each call to next() adds a node to the sequence.
 *
 * @class NodeSequence
 * @extends {StateGraph<Z>}
 * @template Z - The Zod schema for state
 *
 * @example
 * ```typescript
 * const schema = z.object({ count: z.number() });
 * const sequence = new NodeSequence(schema)
 *   .next((state) => ({ count: state.count + 1 }))
 *   .next((state) => ({ count: state.count * 2 }))
 *   .compile();
 *
 * const result = await sequence.invoke({ count: 5 });
 * // State transitions: 5 -> 6 -> 12
 * ```
 */
export class NodeSequence<Z extends z.ZodObject> extends StateGraph<Z> {
    private last?: string;

    /**
     * Adds the next node in the sequence and wires it after the previous one
     * (or after `START` for the first node). The last node leads to `END`.
     *
     * @param id - Defaults to `node-<index>`
     */
    next(step: StepFunction<StateOf<Z>>, id: string = `node-${this.nodes.size}`): this {
        this.addNode(id, step);
        this.addEdge(this.last ?? START, id);
        this.last = id;
        return this;
    }

    protected override blueprint(): GraphBlueprint<StateOf<Z>> {
        const blueprint = super.blueprint();
        if (this.last === undefined || blueprint.edges.has(this.last)) {
            return blueprint;
        }
        const edges = new Map(blueprint.edges);
        edges.set(this.last, { kind: "static", from: this.last, to: END });
        return { ...blueprint, edges };
    }
}
