export { type Logger, type LogLevel, createConsoleLogger, silentLogger } from './logger.js';
