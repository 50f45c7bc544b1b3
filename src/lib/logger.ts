/**
 * Structured logging for Stackreach
 * Outputs JSON lines to a dated log file and a colorized line to the console
 */

import * as fs from 'fs';
import * as path from 'path';
import { env } from './env';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  stage?: string;
  runId?: string;
  message: string;
  data?: Record<string, unknown>;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_PRIORITY;
}

class Logger {
  private logFile: string;
  private stage?: string;
  private runId?: string;
  private minLevel: LogLevel;

  constructor() {
    const today = new Date().toISOString().split('T')[0];
    this.logFile = path.join(env.LOG_DIR, `stackreach-${today}.log`);
    const level = process.env.LOG_LEVEL;
    this.minLevel = isLogLevel(level) ? level : 'info';
  }

  setContext(stage?: string, runId?: string): void {
    this.stage = stage;
    this.runId = runId;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.minLevel];
  }

  private formatEntry(level: LogLevel, message: string, data?: Record<string, unknown>): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      stage: this.stage,
      runId: this.runId,
      message,
      data,
    };
  }

  private write(entry: LogEntry): void {
    const line = JSON.stringify(entry) + '\n';

    fs.appendFileSync(this.logFile, line);

    const colors: Record<LogLevel, string> = {
      debug: '\x1b[90m',  // gray
      info: '\x1b[36m',   // cyan
      warn: '\x1b[33m',   // yellow
      error: '\x1b[31m',  // red
    };
    const reset = '\x1b[0m';
    const prefix = `[${entry.timestamp}] [${entry.level.toUpperCase()}]`;
    const context = entry.stage ? ` [${entry.stage}]` : '';

    console.log(`${colors[entry.level]}${prefix}${context}${reset} ${entry.message}`);
    if (entry.data && Object.keys(entry.data).length > 0) {
      console.log(`  ${JSON.stringify(entry.data)}`);
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('debug')) {
      this.write(this.formatEntry('debug', message, data));
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('info')) {
      this.write(this.formatEntry('info', message, data));
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('warn')) {
      this.write(this.formatEntry('warn', message, data));
    }
  }

  error(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('error')) {
      this.write(this.formatEntry('error', message, data));
    }
  }

  // Per-domain pipeline failure, kept separate so it can be grepped out of the log
  logDomainFailure(domain: string, code: string, message: string, details?: Record<string, unknown>): void {
    const log = code === 'TEMPLATE_RENDER' ? this.error.bind(this) : this.warn.bind(this);
    log(`Domain failure: ${code}`, {
      domain,
      code,
      message,
      ...details,
    });
  }
}

export const logger = new Logger();
