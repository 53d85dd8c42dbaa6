import { describe, expect, it } from "vitest";
import { z } from "zod";
import { StateMergeError } from "./errors";
import { ExecutionContext } from "./execution-context";
import { appendReducer, sumReducer } from "./reducers";
import { ReducerRegistry, STATE_MERGE } from "./registry";
import { StateStore } from "./state-store";

const schema = z.object({
    history: z.array(z.string()).register(STATE_MERGE, appendReducer),
    total: z.number().register(STATE_MERGE, sumReducer),
    current: z.string(),
});

function createStore(context?: ExecutionContext) {
    return new StateStore(schema, ReducerRegistry.fromSchema(schema), { history: [], total: 0, current: "" }, context);
}

describe("StateStore", () => {
    it("should merge each field with its reducer", () => {
        const store = createStore();
        store.apply({ history: ["a"], total: 10, current: "a" });
        store.apply({ history: ["b"], total: 20, current: "b" });
        const state = store.apply({ history: ["c"], total: 30, current: "c" });

        expect(state).toEqual({ history: ["a", "b", "c"], total: 60, current: "c" });
    });

    it("should leave fields missing from the update untouched", () => {
        const store = createStore();
        store.apply({ current: "x" });
        const state = store.apply({ total: 5 });

        expect(state).toEqual({ history: [], total: 5, current: "x" });
    });

    it("should skip undefined values and keep the same snapshot", () => {
        const store = createStore();
        const before = store.snapshot;

        expect(store.apply({ total: undefined })).toBe(before);
        expect(store.apply({})).toBe(before);
    });

    it("should hand out deep-frozen snapshots", () => {
        const store = createStore();
        store.apply({ history: ["a"] });
        const snapshot = store.snapshot;

        expect(Object.isFrozen(snapshot)).toBe(true);
        expect(Object.isFrozen(snapshot.history)).toBe(true);
        expect(Reflect.set(snapshot, "total", 99)).toBe(false);
        expect(() => snapshot.history.push("b")).toThrow(TypeError);
        expect(store.snapshot).toEqual({ history: ["a"], total: 0, current: "" });
    });

    it("should not be affected by changes to the update after it was applied", () => {
        const store = createStore();
        const history = ["a"];
        store.apply({ history });
        history.push("b");

        expect(store.snapshot.history).toEqual(["a"]);
    });

    it("should take the incoming value when the field has no value yet", () => {
        const optionalSchema = z.object({
            notes: z.array(z.string()).register(STATE_MERGE, appendReducer).optional(),
        });
        const store = new StateStore(optionalSchema, ReducerRegistry.fromSchema(optionalSchema), {});
        store.apply({ notes: ["a"] });
        const state = store.apply({ notes: ["b"] });

        expect(state.notes).toEqual(["a", "b"]);
    });

    it("should hand out read-only copies of dates", () => {
        const dated = z.object({ createdAt: z.date() });
        const createdAt = new Date(0);
        const store = new StateStore(dated, ReducerRegistry.fromSchema(dated), { createdAt });
        const snapshot = store.snapshot;

        expect(snapshot.createdAt).not.toBe(createdAt);
        expect(() => snapshot.createdAt.setTime(1000)).toThrow(TypeError);
        expect(store.snapshot.createdAt.getTime()).toBe(0);
    });

    it("should not let a snapshot's maps and sets write into the state", () => {
        const cached = z.object({
            cache: z.map(z.string(), z.number()),
            seen: z.set(z.string()),
        });
        const store = new StateStore(cached, ReducerRegistry.fromSchema(cached), { cache: new Map(), seen: new Set<string>() });
        const snapshot = store.snapshot;

        expect(() => snapshot.cache.set("sneaky", 1)).toThrow(new TypeError("Cannot call set on a read-only Map"));
        expect(() => snapshot.seen.add("sneaky")).toThrow(new TypeError("Cannot call add on a read-only Set"));
        expect(store.snapshot.cache.size).toBe(0);
        expect(store.snapshot.seen.size).toBe(0);

        const cache = new Map([["a", 1]]);
        const state = store.apply({ cache });
        cache.set("b", 2);
        expect([...state.cache]).toEqual([["a", 1]]);
        expect([...store.snapshot.cache]).toEqual([["a", 1]]);
    });

    describe("transformed fields", () => {
        const named = z.object({
            name: z.string().transform((value) => value.length),
            label: z.string().pipe(z.string().min(1, "label must not be empty")).optional(),
            n: z.number(),
        });

        function createNamedStore() {
            return new StateStore(named, ReducerRegistry.fromSchema(named), { name: "abc", n: 0 });
        }

        it("should not run a field's transform again when other fields change", () => {
            const store = createNamedStore();

            expect(store.apply({ n: 1 })).toEqual({ name: 3, n: 1 });
            expect(store.apply({ n: 2 })).toEqual({ name: 3, n: 2 });
        });

        it("should store updates to a transformed field as they are", () => {
            const store = createNamedStore();

            expect(store.apply({ name: 7 }).name).toBe(7);
        });

        it("should check updates to a piped field against its output schema", () => {
            const store = createNamedStore();

            expect(store.apply({ label: "x" }).label).toBe("x");
            expect(() => store.apply({ label: "" })).toThrow(
                'Cannot merge field "label" with reducer "replace" (existing string, incoming string): label must not be empty',
            );
            expect(store.snapshot.label).toBe("x");
        });
    });

    describe("failures", () => {
        it("should reject fields that are not declared", () => {
            const store = createStore();
            const update = { total: 1, bogus: 1 };

            expect(() => store.apply(update)).toThrow(
                'Cannot merge field "bogus" with reducer "replace" (existing undefined, incoming number): field is not declared in the state schema',
            );
            expect(store.snapshot.total).toBe(0);
        });

        it("should wrap a throwing reducer and keep the previous state", () => {
            const failure = new Error("values must not decrease");
            const monotonic = z.object({
                best: z.number().register(STATE_MERGE, {
                    name: "monotonic",
                    merge: (existing: number, incoming: number): number => {
                        if (incoming < existing) {
                            throw failure;
                        }
                        return incoming;
                    },
                }),
            });
            const store = new StateStore(monotonic, ReducerRegistry.fromSchema(monotonic), { best: 5 });

            let caught: unknown;
            try {
                store.apply({ best: 3 });
            } catch (err) {
                caught = err;
            }

            expect(caught).toBeInstanceOf(StateMergeError);
            expect(caught).toMatchObject({
                message: 'Cannot merge field "best" with reducer "monotonic" (existing number, incoming number): values must not decrease',
                field: "best",
                reducer: "monotonic",
                existingType: "number",
                incomingType: "number",
                cause: failure,
            });
            expect(store.snapshot.best).toBe(5);
        });

        it("should reject a merged state that fails validation", () => {
            const bounded = z.object({
                count: z.number().max(10, "count must stay at or below 10").register(STATE_MERGE, sumReducer),
            });
            const store = new StateStore(bounded, ReducerRegistry.fromSchema(bounded), { count: 8 });

            expect(() => store.apply({ count: 5 })).toThrow(
                'Cannot merge field "count" with reducer "sum" (existing number, incoming number): count must stay at or below 10',
            );
            expect(store.snapshot.count).toBe(8);
        });

        it("should report the run and the node being executed", () => {
            const context = new ExecutionContext("run-1");
            context.enter("first");
            context.record();
            context.enter("second");
            const store = createStore(context);

            const update = { bogus: true, total: 1 };
            let caught: unknown;
            try {
                store.apply(update);
            } catch (err) {
                caught = err;
            }

            expect(caught).toBeInstanceOf(StateMergeError);
            expect(caught).toMatchObject({ runId: "run-1", path: ["first", "second"], nodeId: "second" });
        });

        it("should reject an initial state that does not match the schema", () => {
            const integers = z.object({ total: z.number().int() });

            expect(() => new StateStore(integers, ReducerRegistry.fromSchema(integers), { total: 1.5 })).toThrow(z.ZodError);
        });
    });
});
