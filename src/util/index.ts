export { cloneAware, describeType, freezeDeep, isPlainObject } from "./clone-aware";
export { createLogger, LOG_LEVELS, type Logger, type LogLevel } from "./logger";
