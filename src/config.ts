import { readFileSync } from "node:fs";
import * as dotenv from "dotenv";
import { z } from "zod";
import { createLogger, LOG_LEVELS, type Logger, type LogLevel } from "./util/logger";

export const DEFAULT_MAX_STEPS = 25;

const EnvSchema = z.object({
    LOOPGRAPH_MAX_STEPS: z.coerce.number().int().positive().default(DEFAULT_MAX_STEPS),
    LOOPGRAPH_LOG_LEVEL: z.enum(LOG_LEVELS).default("warn"),
});

export interface EngineConfig {
    /** Node executions allowed per run when neither compile nor invoke sets a limit. */
    maxSteps: number;
    logLevel: LogLevel;
}

export interface LoadConfigOptions {
    /** Variables to read instead of `process.env`. */
    env?: Record<string, string | undefined>;
    /** A dotenv file whose entries apply where `env` has no value. */
    envFile?: string;
}

function readEnv(options: LoadConfigOptions): Record<string, string> {
    const fromFile: Record<string, string> = options.envFile ? dotenv.parse(readFileSync(options.envFile)) : {};
    // real environment variables win over the file, as dotenv does
    const sources: Record<string, string | undefined>[] = [fromFile, options.env ?? process.env];
    const merged: Record<string, string> = {};
    for (const source of sources) {
        for (const [key, value] of Object.entries(source)) {
            // empty variables count as unset, as in a shell `FOO=` line
            if (value !== undefined && value !== "") {
                merged[key] = value;
            }
        }
    }
    return merged;
}

/**
 * Reads engine defaults from the environment.
 *
 * @throws {z.ZodError} If a variable is present but invalid
 *
 * @example
 * ```typescript
 * const config = loadConfig({ envFile: ".env" });
 * const graph = builder.compile("supervisor", { maxSteps: config.maxSteps });
 * ```
 */
export function loadConfig(options: LoadConfigOptions = {}): EngineConfig {
    const parsed = EnvSchema.parse(readEnv(options));
    return {
        maxSteps: parsed.LOOPGRAPH_MAX_STEPS,
        logLevel: parsed.LOOPGRAPH_LOG_LEVEL,
    };
}

/**
 * Reads `LOOPGRAPH_MAX_STEPS` alone, so an invalid log level does not get in the way.
 *
 * @throws {z.ZodError} If the variable is present but invalid
 */
export function loadMaxSteps(options: LoadConfigOptions = {}): number {
    return EnvSchema.pick({ LOOPGRAPH_MAX_STEPS: true }).parse(readEnv(options)).LOOPGRAPH_MAX_STEPS;
}

/**
 * Reads `LOOPGRAPH_LOG_LEVEL` alone, so an invalid step limit does not get in the way.
 *
 * @throws {z.ZodError} If the variable is present but invalid
 */
export function loadLogLevel(options: LoadConfigOptions = {}): LogLevel {
    return EnvSchema.pick({ LOOPGRAPH_LOG_LEVEL: true }).parse(readEnv(options)).LOOPGRAPH_LOG_LEVEL;
}

let rootLogger: Logger | undefined;

/**
 * The logger used by graphs compiled without a `logger` option.
 * Created on first use from `LOOPGRAPH_LOG_LEVEL`.
 */
export function defaultLogger(): Logger {
    rootLogger ??= createLogger(loadLogLevel());
    return rootLogger;
}
