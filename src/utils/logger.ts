/**
 * Level-gated console logging with a bracketed component tag
 *
 * Output looks like `⚠️ [AnalysisManager] Fetch failed for https://…`.
 * Hosts and tests can route messages elsewhere through a LogSink.
 */

import type { LOG_LEVELS } from '../config';

export type LogLevel = (typeof LOG_LEVELS)[number];

type EmitLevel = Exclude<LogLevel, 'silent'>;

export type LogSink = (level: EmitLevel, message: string, data?: unknown) => void;

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

const LEVEL_ICON: Record<EmitLevel, string> = {
  error: '❌',
  warn: '⚠️',
  info: '📖',
  debug: '🔍',
};

const consoleSink: LogSink = (level, message, data) => {
  const line = `${LEVEL_ICON[level]} ${message}`;
  const write = level === 'debug' ? console.log : console[level];
  if (data === undefined) {
    write.call(console, line);
  } else {
    write.call(console, line, data);
  }
};

export function createLogger(scope: string, level: LogLevel = 'warn', sink: LogSink = consoleSink): Logger {
  const threshold = LEVEL_RANK[level];

  const emit = (messageLevel: EmitLevel) => (message: string, data?: unknown) => {
    if (LEVEL_RANK[messageLevel] > threshold) return;
    sink(messageLevel, `[${scope}] ${message}`, data);
  };

  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  };
}
