import { IterationLimitExceededError } from "./errors";
import { type ExecutionContext } from "./execution-context";
import { END } from "./types";

/**
 * Bounds the number of node executions in one run, so that a cycle whose
 * predicate never routes to `END` cannot run forever. Independent of any
 * counter the application keeps in state.
 *
 * @class IterationGuard
 */
export class IterationGuard {
    /**
     * @throws {RangeError} If `maxSteps` is not a positive integer
     */
    constructor(public readonly maxSteps: number) {
        if (!Number.isInteger(maxSteps) || maxSteps < 1) {
            throw new RangeError(`maxSteps must be a positive integer, got ${maxSteps}`);
        }
    }

    remaining(context: ExecutionContext): number {
        return Math.max(0, this.maxSteps - context.iterationCount);
    }

    /**
     * Called after a node has executed and its successor is known. A run that
     * has used up its executions may still finish if the successor is `END`.
     *
     * @throws {IterationLimitExceededError} If the limit is reached and `next` is not `END`
     */
    check<S>(context: ExecutionContext, next: string, state: Readonly<S>): void {
        if (next !== END && context.iterationCount >= this.maxSteps) {
            throw new IterationLimitExceededError(this.maxSteps, state, context.recorded());
        }
    }
}
