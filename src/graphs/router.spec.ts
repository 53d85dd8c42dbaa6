import { describe, expect, it } from "vitest";
import { RoutingError } from "./errors";
import { ExecutionContext } from "./execution-context";
import { resolveRoute } from "./router";
import { DEFAULT_ROUTE, type ConditionalEdge } from "./types";

interface State {
    priority: string;
}

function conditional(
    table: [string, string][],
    predicate: (state: Readonly<State>) => string = (state) => state.priority,
    normalize?: (key: string) => string,
): ConditionalEdge<State> {
    return { kind: "conditional", from: "classify", predicate, table: new Map(table), normalize };
}

function visitedContext(): ExecutionContext {
    const context = new ExecutionContext("run-1");
    context.enter("classify");
    context.record();
    return context;
}

describe("resolveRoute", () => {
    it("should follow a static edge", () => {
        const target = resolveRoute({ kind: "static", from: "a", to: "b" }, { priority: "high" }, visitedContext());
        expect(target).toBe("b");
    });

    it("should look up the predicate's key", () => {
        const edge = conditional([["high", "review"], ["low", "finalize"]]);
        expect(resolveRoute(edge, { priority: "high" }, visitedContext())).toBe("review");
        expect(resolveRoute(edge, { priority: "low" }, visitedContext())).toBe("finalize");
    });

    it("should fall back to the default route", () => {
        const edge = conditional([["high", "review"], [DEFAULT_ROUTE, "finalize"]]);
        expect(resolveRoute(edge, { priority: "medium" }, visitedContext())).toBe("finalize");
    });

    it("should normalize the key before lookup", () => {
        const edge = conditional([["finish", "end"]], (state) => state.priority, (key) => key.toLowerCase());
        expect(resolveRoute(edge, { priority: "FINISH" }, visitedContext())).toBe("end");
    });

    it("should fail for an unknown key without a default", () => {
        const edge = conditional([["high", "review"]]);

        let caught: unknown;
        try {
            resolveRoute(edge, { priority: "medium" }, visitedContext());
        } catch (err) {
            caught = err;
        }

        expect(caught).toBeInstanceOf(RoutingError);
        expect(caught).toMatchObject({
            message: 'No route after node "classify" for key "medium"',
            nodeId: "classify",
            key: "medium",
            runId: "run-1",
            path: ["classify"],
        });
    });

    it("should wrap a throwing predicate", () => {
        const failure = new Error("priority missing");
        const edge = conditional([["high", "review"]], () => {
            throw failure;
        });

        expect(() => resolveRoute(edge, { priority: "" }, visitedContext())).toThrow(
            new RoutingError("classify", undefined, { runId: "run-1", path: ["classify"] }, {
                reason: 'Routing predicate after node "classify" failed: priority missing',
            }),
        );
    });

    it("should fail when there is no edge", () => {
        expect(() => resolveRoute(undefined, { priority: "" }, visitedContext(), "classify")).toThrow(
            'No edge or conditional edge found after node "classify"',
        );
    });
});
