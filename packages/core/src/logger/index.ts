export { createLogger, resolveLogLevel, isLogLevel, setLogLevel, logger } from "./logger";
export type { Logger, LogLevel } from "./logger";
