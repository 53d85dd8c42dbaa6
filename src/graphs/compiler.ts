import { type z } from "zod";
import { defaultLogger, loadMaxSteps } from "../config";
import { GraphDefinitionError } from "./errors";
import { CompiledGraph } from "./graph";
import { ReducerRegistry } from "./registry";
import { END, START, type CompileOptions, type Edge, type StateOf, type StepFunction } from "./types";

/**
 * What a builder hands to the compiler: its nodes, its edges (the edge leaving
 * `START` keyed under `START`), and the problems it already found.
 */
export interface GraphBlueprint<S> {
    nodes: ReadonlyMap<string, StepFunction<S>>;
    edges: ReadonlyMap<string, Edge<S>>;
    issues: readonly string[];
}

export function edgeTargets<S>(edge: Edge<S>): string[] {
    return edge.kind === "static" ? [edge.to] : [...new Set(edge.table.values())];
}

/**
 * Walks the graph from the entry edge over static edges and declared table
 * targets. Reports reached nodes without an outgoing edge and whether `END`
 * can be reached at all.
 */
function analyzeReachability<S>(entry: Edge<S>, blueprint: GraphBlueprint<S>) {
    const reached = new Set<string>();
    const deadEnds: string[] = [];
    let endReachable = false;
    const queue = edgeTargets(entry);
    while (queue.length > 0) {
        const node = queue.shift();
        if (node === undefined || reached.has(node)) {
            continue;
        }
        if (node === END) {
            endReachable = true;
            continue;
        }
        if (!blueprint.nodes.has(node)) {
            continue;
        }
        reached.add(node);
        const edge = blueprint.edges.get(node);
        if (edge === undefined) {
            deadEnds.push(node);
            continue;
        }
        queue.push(...edgeTargets(edge));
    }
    return { reached, deadEnds, endReachable };
}

/**
 * Validates a blueprint and freezes it into a `CompiledGraph`.
 *
 * @param start - Start node id; when omitted the blueprint must have an edge out of `START`
 * @throws {GraphDefinitionError} Listing every problem found
 */
export function compileGraph<Z extends z.ZodObject>(
    schema: Z,
    blueprint: GraphBlueprint<StateOf<Z>>,
    start?: string,
    options: CompileOptions = {},
): CompiledGraph<Z> {
    const issues = [...blueprint.issues];
    const name = options.name ?? "graph";

    let entry = blueprint.edges.get(START);
    if (start !== undefined) {
        if (entry !== undefined) {
            issues.push(`Start node "${start}" given, but an edge from ${START} is already declared`);
        }
        if (!blueprint.nodes.has(start)) {
            issues.push(`Start node "${start}" is not registered`);
        }
        entry = { kind: "static", from: START, to: start };
    } else if (entry === undefined) {
        issues.push(`No edge or conditional edge found for starting node ${START}`);
    }

    for (const [from, edge] of blueprint.edges) {
        if (from !== START && !blueprint.nodes.has(from)) {
            issues.push(`Edge from unknown node "${from}"`);
        }
        for (const to of edgeTargets(edge)) {
            if (to === START) {
                issues.push(`Edge from "${from}" cannot lead to ${START}`);
            } else if (to !== END && !blueprint.nodes.has(to)) {
                issues.push(`Edge from "${from}" references unknown node "${to}"`);
            }
        }
    }

    const maxSteps = options.maxSteps ?? loadMaxSteps();
    if (!Number.isInteger(maxSteps) || maxSteps < 1) {
        issues.push(`maxSteps must be a positive integer, got ${maxSteps}`);
    }

    const logger = options.logger ?? defaultLogger();
    if (entry !== undefined) {
        const { reached, deadEnds, endReachable } = analyzeReachability(entry, blueprint);
        for (const node of deadEnds) {
            issues.push(`No edge or conditional edge found after node "${node}"`);
        }
        if (!endReachable) {
            issues.push(`${END} is not reachable from ${START}`);
        }
        const unreachable = [...blueprint.nodes.keys()].filter((node) => !reached.has(node));
        if (unreachable.length > 0 && issues.length === 0) {
            logger.warn(`Graph ${name} has nodes unreachable from ${START}: ${unreachable.join(", ")}`);
        }
    }

    if (issues.length > 0 || entry === undefined) {
        throw new GraphDefinitionError(issues);
    }

    return new CompiledGraph({
        name,
        schema,
        nodes: blueprint.nodes,
        edges: new Map([...blueprint.edges].filter(([from]) => from !== START)),
        entry,
        reducers: ReducerRegistry.fromSchema(schema),
        maxSteps,
        logger,
    });
}
