import winston from "winston";

export const LOG_LEVELS = ["error", "warn", "info", "debug", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type Logger = winston.Logger;

const lineFormat = winston.format.combine(
    winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss.SSS" }),
    winston.format.printf((info) => {
        const scope = [info.runId, info.nodeId].filter((part) => part !== undefined).join("/");
        return scope.length > 0
            ? `${info.timestamp} ${info.level} [${scope}]: ${info.message}`
            : `${info.timestamp} ${info.level}: ${info.message}`;
    }),
);

/**
 * Creates a console logger for graph runs.
 * `"silent"` keeps the logger usable but drops every entry.
 *
 * @example
 * ```typescript
 * const logger = createLogger("debug");
 * const graph = builder.compile("classify", { logger });
 * ```
 */
export function createLogger(level: LogLevel): Logger {
    return winston.createLogger({
        level: level === "silent" ? "error" : level,
        silent: level === "silent",
        format: lineFormat,
        transports: [new winston.transports.Console({ stderrLevels: ["error", "warn"] })],
    });
}
