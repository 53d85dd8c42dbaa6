export * from "./graphs";
export { DEFAULT_MAX_STEPS, loadConfig, loadLogLevel, loadMaxSteps, type EngineConfig, type LoadConfigOptions } from "./config";
export { createLogger, LOG_LEVELS, type Logger, type LogLevel } from "./util";
