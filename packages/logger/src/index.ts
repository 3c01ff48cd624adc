export { createLogger, formatEntry } from './logger'
export type { LogEntry, LogLevel, LogTransport, LoggerMiddlewareConfig } from './logger'
