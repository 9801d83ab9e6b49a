/**
 * Structured logging for SensorLink
 */

import pino from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

// Re-export pino.Logger type for convenience
export type Logger = pino.Logger;

export interface LogContext {
  bridgeId?: string;
  sessionId?: string;
  component?: string;
  [key: string]: unknown;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function resolveLevel(value: string | undefined): LogLevel {
  return LOG_LEVELS.find((level) => level === value) ?? 'info';
}

// Create base logger
function createBaseLogger(level: LogLevel = 'info') {
  return pino({
    level,
    transport:
      process.env.NODE_ENV === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
    base: {
      service: 'sensorlink',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
  });
}

// Singleton logger instance
let loggerInstance: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!loggerInstance) {
    loggerInstance = createBaseLogger(resolveLevel(process.env.LOG_LEVEL));
  }
  return loggerInstance;
}

// Create child logger with context
export function createChildLogger(context: LogContext): pino.Logger {
  return getLogger().child(context);
}

// Structured event logging

export function logSessionTransition(
  sessionId: string,
  fromState: string,
  toState: string,
  reason: string
): void {
  getLogger().info(
    {
      event: 'session_transition',
      sessionId,
      fromState,
      toState,
      reason,
    },
    `Session transition: ${fromState} -> ${toState}`
  );
}

export function logCorrelationComputed(
  requestId: string,
  operation: string,
  mode: string,
  latencyMs: number
): void {
  getLogger().info(
    {
      event: 'correlation_computed',
      requestId,
      operation,
      mode,
      latencyMs,
    },
    `Correlation ${operation} computed in ${mode} mode (${latencyMs.toFixed(2)}ms)`
  );
}

export function logDiscoveryQuery(
  domains: readonly string[],
  candidates: number,
  returned: number
): void {
  getLogger().debug(
    {
      event: 'discovery_query',
      domains,
      candidates,
      returned,
    },
    `Discovery matched ${returned} of ${candidates} bridges`
  );
}

// Reset logger (for testing)
export function resetLogger(): void {
  loggerInstance = null;
}
