/**
 * Utilities Module
 *
 * Shared utility functions used across the codebase.
 */

export { consoleLogger, silentLogger, type Logger } from './logger.js';
