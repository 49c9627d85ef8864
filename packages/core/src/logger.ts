// ============================================================================
// @nucleocode/core — Logging
// ============================================================================

import process from 'node:process';

/**
 * Log levels for nucleocode.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log entry structure.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: Record<string, unknown>;
}

export type LogCallback = (entry: LogEntry) => void;

const callbacks: Set<LogCallback> = new Set();

/**
 * Current log level (controlled by NUCLEOCODE_DEBUG env var).
 */
let currentLevel: LogLevel = 'info';

function initLevel(): void {
  const debug = process.env.NUCLEOCODE_DEBUG;
  if (debug === '1' || debug === 'true') {
    currentLevel = 'debug';
  } else if (debug === 'warn') {
    currentLevel = 'warn';
  } else if (debug === 'error') {
    currentLevel = 'error';
  } else {
    currentLevel = 'info';
  }
}

initLevel();

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function shouldLog(level: LogLevel): boolean {
  return LEVELS[level] >= LEVELS[currentLevel];
}

function log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    level,
    message,
    timestamp: new Date().toISOString(),
    data,
  };

  // stdout is reserved for encoded and decoded payloads
  const dataStr = data ? ` ${JSON.stringify(data)}` : '';
  const msg = `[nucleocode] ${message}${dataStr}`;

  console.warn(msg);

  for (const cb of callbacks) {
    try {
      cb(entry);
    } catch (e) {
      console.error('[nucleocode] Log callback error:', e);
    }
  }
}

/**
 * Debug-level logging. Only logs when NUCLEOCODE_DEBUG=1 is set.
 */
export function debug(message: string, data?: Record<string, unknown>): void {
  log('debug', message, data);
}

/**
 * Warning-level logging (something unexpected but handled).
 */
export function warn(message: string, data?: Record<string, unknown>): void {
  log('warn', message, data);
}

// ---------------------------------------------------------------------------
// Performance Timing
// ---------------------------------------------------------------------------

/**
 * Performance timer for measuring operation duration.
 */
export class Timer {
  private startTime: number;
  private label: string;

  constructor(label: string) {
    this.label = label;
    this.startTime = performance.now();
  }

  endWith(data: Record<string, unknown>): number {
    const duration = performance.now() - this.startTime;
    debug(`${this.label}: ${duration.toFixed(2)}ms`, { ...data, durationMs: duration });
    return duration;
  }
}

export function timer(label: string): Timer {
  return new Timer(label);
}

/**
 * Register a callback for log events. Returns an unsubscribe function.
 */
export function onLog(callback: LogCallback): () => void {
  callbacks.add(callback);
  return () => {
    callbacks.delete(callback);
  };
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}
