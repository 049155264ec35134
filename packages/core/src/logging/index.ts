export { createLogger, getRootLogger, getComponentLogger, resolveLogLevel, elapsedSeconds } from "./logger"
export type { Logger } from "./logger"
