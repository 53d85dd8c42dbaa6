/**
 * Base class for everything the engine throws.
 */
export abstract class GraphError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Thrown by `compile` when the graph is malformed. Lists every problem found,
 * not just the first one.
 */
export class GraphDefinitionError extends GraphError {
    constructor(public readonly issues: readonly string[]) {
        super(`Invalid graph definition:\n - ${issues.join("\n - ")}`);
    }
}

export interface RunErrorContext {
    runId: string;
    path: readonly string[];
}

/**
 * Base class for failures that abort a run. Carries the run id and the nodes
 * executed so far, for diagnostics.
 */
export abstract class GraphRunError extends GraphError {
    public readonly runId: string;
    public readonly path: readonly string[];

    constructor(message: string, context: RunErrorContext, options?: { cause?: unknown }) {
        super(message, options);
        this.runId = context.runId;
        this.path = context.path;
    }
}

export class RoutingError extends GraphRunError {
    constructor(
        public readonly nodeId: string,
        public readonly key: unknown,
        context: RunErrorContext,
        options?: { cause?: unknown; reason?: string },
    ) {
        super(
            options?.reason ?? `No route after node "${nodeId}" for key ${JSON.stringify(key)}`,
            context,
            options,
        );
    }
}

export class StepExecutionError extends GraphRunError {
    constructor(public readonly nodeId: string, cause: unknown, context: RunErrorContext) {
        const detail = cause instanceof Error ? cause.message : String(cause);
        super(`Node "${nodeId}" failed: ${detail}`, context, { cause });
    }
}

export interface StateMergeDetails {
    field: string;
    reducer: string;
    existingType: string;
    incomingType: string;
    nodeId?: string;
    reason: string;
}

export class StateMergeError extends GraphRunError {
    public readonly field: string;
    public readonly reducer: string;
    public readonly existingType: string;
    public readonly incomingType: string;
    public readonly nodeId?: string;

    constructor(details: StateMergeDetails, context: RunErrorContext, options?: { cause?: unknown }) {
        super(
            `Cannot merge field "${details.field}" with reducer "${details.reducer}" ` +
            `(existing ${details.existingType}, incoming ${details.incomingType}): ${details.reason}`,
            context,
            options,
        );
        this.field = details.field;
        this.reducer = details.reducer;
        this.existingType = details.existingType;
        this.incomingType = details.incomingType;
        this.nodeId = details.nodeId;
    }
}

export class IterationLimitExceededError<S = Record<string, unknown>> extends GraphRunError {
    constructor(
        public readonly maxSteps: number,
        /** The last merged snapshot before the run was aborted. */
        public readonly state: Readonly<S>,
        context: RunErrorContext,
    ) {
        super(
            `Run stopped after ${maxSteps} node executions without reaching the end: ${context.path.join(" -> ")}`,
            context,
        );
    }
}

export class CancelledError extends GraphRunError {
    constructor(public readonly reason: unknown, context: RunErrorContext) {
        super(`Run cancelled after ${context.path.length} node executions`, context, { cause: reason });
    }
}
