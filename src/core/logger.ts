/**
 * core/logger.ts
 *
 * Singleton pino logger. Every module does:
 *     const log = scopedLogger('tools/window_manager');
 *
 * Logs go to stderr so stdout stays free for the command report.
 * Modules that log at import time must be loaded after initLogger()
 * (the CLI imports the command modules dynamically for that reason).
 */

import pino from 'pino';
import { LogLevel } from './types';

let instance: pino.Logger | null = null;

export function initLogger(level: LogLevel): pino.Logger {
  instance = pino({ level }, pino.destination(2));
  return instance;
}

export function getLogger(): pino.Logger {
  if (!instance) {
    // Fallback for early imports before initLogger is called
    instance = pino({ level: process.env.PRESENTATION_MODE_LOG_LEVEL ?? 'warn' }, pino.destination(2));
  }
  return instance;
}

/**
 * Returns a child logger scoped to a specific module.
 * Usage:  const log = scopedLogger('tools/state_store');
 */
export function scopedLogger(moduleName: string): pino.Logger {
  return getLogger().child({ module: moduleName });
}
