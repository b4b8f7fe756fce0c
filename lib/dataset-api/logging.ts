/**
 * Structured logging utilities for dataset API operations
 */

type LogLevel = 'info' | 'warn' | 'error' | 'debug';

interface LogContext {
  [key: string]: unknown;
}

const SENSITIVE_KEYS = ['password', 'token', 'authorization', 'secret'];

function debugEnabled(): boolean {
  return process.env.LOG_LEVEL?.toLowerCase() === 'debug' || process.env.NODE_ENV === 'development';
}

/**
 * Structured logger for dataset operations
 * Outputs JSON-formatted logs for easier parsing and monitoring
 */
export function datasetLog(
  level: LogLevel,
  message: string,
  context?: LogContext
): void {
  if (level === 'debug' && !debugEnabled()) {
    return;
  }

  const logEntry = {
    timestamp: new Date().toISOString(),
    level,
    service: 'datasets',
    message,
    ...context,
  };

  const line = JSON.stringify(redactSensitiveData(logEntry));

  switch (level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'debug':
      console.debug(line);
      break;
    default:
      console.log(line);
  }
}

/**
 * Redact sensitive data from log entries
 */
export function redactSensitiveData(data: Record<string, unknown>): Record<string, unknown> {
  const redacted: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(data)) {
    const lowerKey = key.toLowerCase();
    if (SENSITIVE_KEYS.some(sensitive => lowerKey.includes(sensitive))) {
      redacted[key] = '[REDACTED]';
    } else if (Array.isArray(value)) {
      redacted[key] = value.map(entry => (isRecord(entry) ? redactSensitiveData(entry) : entry));
    } else if (isRecord(value)) {
      redacted[key] = redactSensitiveData(value);
    } else {
      redacted[key] = value;
    }
  }

  return redacted;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Generate correlation ID for request tracking
 */
export function generateCorrelationId(): string {
  return `ds_${Date.now()}_${Math.random().toString(36).substring(2, 9)}`;
}

export function logApiRequest(method: string, url: string, correlationId: string): void {
  datasetLog('debug', 'API request', { correlationId, method, url });
}

export function logApiResponse(
  method: string,
  url: string,
  statusCode: number,
  correlationId: string,
  durationMs: number
): void {
  datasetLog('debug', 'API response', {
    correlationId,
    method,
    url,
    statusCode,
    durationMs,
  });
}

export function logApiError(
  method: string,
  url: string,
  error: unknown,
  correlationId: string
): void {
  datasetLog('warn', 'API error', {
    correlationId,
    method,
    url,
    error: error instanceof Error ? error.message : String(error),
  });
}

/**
 * Simple logger object for consistent logging interface
 */
export const logger = {
  info: (message: string, context?: Record<string, unknown>) => {
    datasetLog('info', message, context);
  },
  error: (message: string, context?: Record<string, unknown>) => {
    datasetLog('error', message, context);
  },
  warn: (message: string, context?: Record<string, unknown>) => {
    datasetLog('warn', message, context);
  },
  debug: (message: string, context?: Record<string, unknown>) => {
    datasetLog('debug', message, context);
  },
};
