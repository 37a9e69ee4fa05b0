/**
 * Import run logging
 *
 * Every entry is `[module] action` plus a details object, e.g.
 * `[TimetablePipeline] record_skipped { source, uid, kind, reason }`.
 * Console output goes to stderr because stdout carries the generated XML.
 * LOG_LEVEL picks the level and LOG_FILE adds a JSON log file; tests pass
 * `silent` so nothing is printed.
 */

import winston from 'winston';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const ALL_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LoggerOptions {
  level?: LogLevel | string;
  logFile?: string;
  silent?: boolean;
}

export class Logger {
  private winston: winston.Logger;

  constructor(options: LoggerOptions = {}) {
    this.winston = winston.createLogger({
      level: options.level || process.env.LOG_LEVEL || 'info',
      silent: options.silent ?? false,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      transports: [
        new winston.transports.Console({
          stderrLevels: ALL_LEVELS,
          format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
        }),
      ],
    });

    const logFile = options.logFile ?? process.env.LOG_FILE;
    if (logFile) {
      this.winston.add(
        new winston.transports.File({
          filename: logFile,
          maxsize: 10 * 1024 * 1024, // 10MB
          maxFiles: 5,
        })
      );
    }
  }

  debug(module: string, action: string, details: Record<string, unknown>): void {
    this.log('debug', module, action, details);
  }

  info(module: string, action: string, details: Record<string, unknown>): void {
    this.log('info', module, action, details);
  }

  warn(module: string, action: string, details: Record<string, unknown>): void {
    this.log('warn', module, action, details);
  }

  error(module: string, action: string, details: Record<string, unknown>, error?: Error): void {
    const enrichedDetails = { ...details };
    if (error) {
      enrichedDetails.error = error.message;
      enrichedDetails.errorName = error.name;
      enrichedDetails.stack = error.stack;
    }
    this.log('error', module, action, enrichedDetails);
  }

  private log(level: LogLevel, module: string, action: string, details: Record<string, unknown>): void {
    this.winston.log(level, `[${module}] ${action}`, details);
  }
}
