import { createId } from "@paralleldrive/cuid2";
import { type z } from "zod";
import { describeType, isPlainObject } from "../util/clone-aware";
import { type Logger } from "../util/logger";
import { CancelledError, GraphRunError, RoutingError, StepExecutionError } from "./errors";
import { ExecutionContext } from "./execution-context";
import { IterationGuard } from "./iteration-guard";
import { resolveRoute } from "./router";
import { StateStore } from "./state-store";
import {
    END,
    START,
    type GraphDefinition,
    type GraphResult,
    type InvokeOptions,
    type StateOf,
    type StepContext,
    type StepEvent,
    type StepFunction,
} from "./types";

async function runStep<S>(
    step: StepFunction<S>,
    state: Readonly<S>,
    stepContext: StepContext,
    context: ExecutionContext,
): Promise<Partial<S>> {
    let result: Partial<S> | undefined;
    try {
        result = await step(state, stepContext);
    } catch (err) {
        throw new StepExecutionError(stepContext.nodeId, err, context.failure());
    }
    if (result === undefined) {
        return {};
    }
    if (!isPlainObject(result)) {
        throw new StepExecutionError(
            stepContext.nodeId,
            new TypeError(`Step returned ${describeType(result)} instead of a partial state object`),
            context.failure(),
        );
    }
    return result;
}

function createStepContext(
    nodeId: string,
    context: ExecutionContext,
    logger: Logger,
    signal: AbortSignal | undefined,
): StepContext {
    return Object.freeze({
        runId: context.runId,
        nodeId,
        iteration: context.iterationCount + 1,
        path: Object.freeze(context.path),
        signal,
        logger: logger.child({ nodeId }),
    });
}

/**
 * Runs a graph from its entry to `END`, yielding after every node execution.
 *
 * Each run gets its own state store, execution context and iteration guard, so
 * one compiled graph can serve any number of concurrent runs. Nodes execute
 * strictly one at a time: a node's update is merged and its successor resolved
 * before the next node starts. The cancellation signal is checked before each
 * node, never during one.
 *
 * @returns The final snapshot and the executed path once `END` is reached
 * @throws {z.ZodError} If `input` does not match the schema
 * @throws {RangeError} If `options.maxSteps` is not a positive integer
 * @throws {GraphRunError} When the run aborts; see the subclasses
 */
export async function* execute<Z extends z.ZodObject>(
    graph: GraphDefinition<Z>,
    input: z.input<Z>,
    options: InvokeOptions = {},
): AsyncGenerator<StepEvent<StateOf<Z>>, GraphResult<StateOf<Z>>, unknown> {
    const runId = options.runId ?? createId();
    const guard = new IterationGuard(options.maxSteps ?? graph.maxSteps);
    const context = new ExecutionContext(runId);
    const store = new StateStore(graph.schema, graph.reducers, input, context);
    const logger = graph.logger.child({ runId });
    const { signal } = options;

    logger.info(`Starting ${graph.name} (max ${guard.maxSteps} steps)`);
    try {
        let next = resolveRoute(graph.entry, store.snapshot, context, START);
        while (next !== END) {
            if (signal?.aborted) {
                throw new CancelledError(signal.reason, context.recorded());
            }
            const nodeId = next;
            const step = graph.nodes.get(nodeId);
            if (step === undefined) {
                throw new RoutingError(context.currentNode ?? START, nodeId, context.recorded(), {
                    reason: `Node "${nodeId}" not found`,
                });
            }

            context.enter(nodeId);
            const update = await runStep(step, store.snapshot, createStepContext(nodeId, context, logger, signal), context);
            const state = store.apply(update);
            const iteration = context.record();

            next = resolveRoute(graph.edges.get(nodeId), state, context, nodeId);
            logger.debug(`Node ${nodeId} done (${iteration}/${guard.maxSteps}), next: ${next}`, {
                fields: Object.keys(update),
            });
            guard.check(context, next, state);

            yield { runId, nodeId, iteration, update, state };
        }
    } catch (err) {
        if (err instanceof GraphRunError) {
            logger.warn(`${err.name}: ${err.message}`, { path: err.path });
        }
        throw err;
    }

    logger.info(`Finished ${graph.name} after ${context.iterationCount} node executions`);
    return { runId, state: store.snapshot, path: context.path };
}
