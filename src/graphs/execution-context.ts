import { type RunErrorContext } from "./errors";

/**
 * Tracks where one run is: the node being executed and the nodes executed so far.
 * Created fresh for every run and mutated only by the engine.
 *
 * @class ExecutionContext
 *
 * @example
 * ```typescript
 * const context = new ExecutionContext("run-123");
 * context.enter("classify");
 * context.record();
 * context.path;           // ["classify"]
 * context.iterationCount; // 1
 * ```
 */
export class ExecutionContext {
    private readonly visited: string[] = [];

    private current?: string;

    /**
     * Whether the current node has started but not been recorded
     */
    private pending = false;

    constructor(public readonly runId: string) { }

    /**
     * Executed node ids, in order. A copy, so callers can keep it.
     */
    get path(): string[] {
        return [...this.visited];
    }

    get iterationCount(): number {
        return this.visited.length;
    }

    /**
     * The node currently executing, or the last one executed.
     */
    get currentNode(): string | undefined {
        return this.current;
    }

    /**
     * Marks a node as started.
     */
    enter(nodeId: string): void {
        this.current = nodeId;
        this.pending = true;
    }

    /**
     * Marks the current node as executed.
     *
     * @returns {number} The new iteration count
     */
    record(): number {
        if (this.current === undefined || !this.pending) {
            throw new Error("No started node to record");
        }
        this.visited.push(this.current);
        this.pending = false;
        return this.visited.length;
    }

    /**
     * Error context for a failure inside the current node: the path so far
     * plus the node that failed, if it was not recorded yet.
     */
    failure(): RunErrorContext {
        const path = this.path;
        if (this.pending && this.current !== undefined) {
            path.push(this.current);
        }
        return { runId: this.runId, path };
    }

    /** Error context with the recorded path only. */
    recorded(): RunErrorContext {
        return { runId: this.runId, path: this.path };
    }
}
