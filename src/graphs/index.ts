export { StateGraph, type ConditionalEdgeOptions, type RoutingTable } from "./state-graph";
export { NodeSequence } from "./node-sequence";
export { CompiledGraph, invoke } from "./graph";
export { compileGraph, type GraphBlueprint } from "./compiler";
export { execute } from "./engine";
export { resolveRoute } from "./router";
export { IterationGuard } from "./iteration-guard";
export { ExecutionContext } from "./execution-context";
export { StateStore } from "./state-store";
export { STATE_MERGE, ReducerRegistry } from "./registry";
export { appendReducer, mergeReducer, replaceReducer, sumReducer, type Reducer } from "./reducers";
export {
    CancelledError,
    GraphDefinitionError,
    GraphError,
    GraphRunError,
    IterationLimitExceededError,
    RoutingError,
    StateMergeError,
    StepExecutionError,
    type RunErrorContext,
    type StateMergeDetails,
} from "./errors";
export {
    DEFAULT_ROUTE,
    END,
    START,
    type CompileOptions,
    type ConditionalEdge,
    type Edge,
    type GraphDefinition,
    type GraphResult,
    type InvokeOptions,
    type Predicate,
    type StateOf,
    type StaticEdge,
    type StepContext,
    type StepEvent,
    type StepFunction,
} from "./types";
