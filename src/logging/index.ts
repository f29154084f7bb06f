/**
 * grpc-record-store - Logging Module
 */

export { Logger, createLogger, createSilentLogger } from './logger';
export type { LogLevel, LoggerOptions, LogData } from './logger';
