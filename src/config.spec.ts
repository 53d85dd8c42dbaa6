import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { z } from "zod";
import { DEFAULT_MAX_STEPS, loadConfig, loadLogLevel, loadMaxSteps } from "./config";

const envFile = fileURLToPath(new URL("./fixtures/engine.env", import.meta.url));

describe("loadConfig", () => {
    it("should fall back to the defaults", () => {
        expect(loadConfig({ env: {} })).toEqual({ maxSteps: DEFAULT_MAX_STEPS, logLevel: "warn" });
        expect(DEFAULT_MAX_STEPS).toBe(25);
    });

    it("should read the variables", () => {
        const config = loadConfig({ env: { LOOPGRAPH_MAX_STEPS: "12", LOOPGRAPH_LOG_LEVEL: "silent" } });
        expect(config).toEqual({ maxSteps: 12, logLevel: "silent" });
    });

    it("should treat empty variables as unset", () => {
        expect(loadConfig({ env: { LOOPGRAPH_MAX_STEPS: "" } }).maxSteps).toBe(DEFAULT_MAX_STEPS);
    });

    it("should read an env file", () => {
        expect(loadConfig({ env: {}, envFile })).toEqual({ maxSteps: 7, logLevel: "debug" });
    });

    it("should let variables win over the env file", () => {
        expect(loadConfig({ env: { LOOPGRAPH_MAX_STEPS: "9" }, envFile })).toEqual({ maxSteps: 9, logLevel: "debug" });
    });

    it.each(["0", "-2", "1.5", "many"])("should reject %s as a step limit", (value) => {
        expect(() => loadConfig({ env: { LOOPGRAPH_MAX_STEPS: value } })).toThrow(z.ZodError);
    });

    it("should reject an unknown log level", () => {
        expect(() => loadConfig({ env: { LOOPGRAPH_LOG_LEVEL: "verbose" } })).toThrow(z.ZodError);
    });

    it("should read the step limit without checking the log level", () => {
        const env = { LOOPGRAPH_MAX_STEPS: "4", LOOPGRAPH_LOG_LEVEL: "verbose" };

        expect(loadMaxSteps({ env })).toBe(4);
        expect(() => loadConfig({ env })).toThrow(z.ZodError);
    });

    it("should read the log level without checking the step limit", () => {
        expect(loadLogLevel({ env: { LOOPGRAPH_MAX_STEPS: "many", LOOPGRAPH_LOG_LEVEL: "info" } })).toBe("info");
        expect(loadLogLevel({ env: {}, envFile })).toBe("debug");
    });
});
