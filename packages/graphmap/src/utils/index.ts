/**
 * Utilities Module
 */

export { consoleLogger, noopLogger } from "./logger"
export type { Logger } from "./logger"
