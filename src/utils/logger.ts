/**
 * Storage MCP Gateway - Structured logging
 *
 * Emits JSON log lines to stderr.
 */

import { SERVER_NAME } from '../constants.js';

/**
 * Log levels
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

/**
 * Log level ordering for comparisons.
 */
const LOG_LEVEL_VALUE: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3
};

/**
 * Log entry shape.
 */
export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  traceId?: string;
  durationMs?: number;
  service: string;
}

// Argument names whose values never reach the log.
const SENSITIVE_PARAM_PATTERN = /password|passwd|secret|token|key|credential/i;
const REDACTED = '[REDACTED]';

/**
 * Tool call trace.
 */
interface ToolTrace {
  traceId: string;
  toolName: string;
  startTime: number;
}

/**
 * Map a textual level (case-insensitive, `warning` accepted) to a LogLevel.
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch ((value ?? '').trim().toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
    case 'warning':
      return LogLevel.WARN;
    case 'error':
    case 'critical':
      return LogLevel.ERROR;
    default:
      return undefined;
  }
}

/**
 * Logger implementation.
 */
export class Logger {
  private minLevel: LogLevel = LogLevel.INFO;
  private readonly service: string = SERVER_NAME;
  private activeTraces: Map<string, ToolTrace> = new Map();

  /**
   * Set the minimum log level.
   */
  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUE[level] >= LOG_LEVEL_VALUE[this.minLevel];
  }

  private generateTraceId(): string {
    return `trace_${Date.now()}_${Math.random().toString(36).slice(2, 8)}`;
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    traceId?: string,
    durationMs?: number
  ): void {
    if (!this.shouldLog(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      service: this.service,
      ...(context && { context }),
      ...(traceId && { traceId }),
      ...(durationMs !== undefined && { durationMs })
    };

    // stdout stays free for process output; logs go to stderr.
    console.error(JSON.stringify(entry));
  }

  debug(message: string, context?: Record<string, unknown>, traceId?: string): void {
    this.log(LogLevel.DEBUG, message, context, traceId);
  }

  info(message: string, context?: Record<string, unknown>, traceId?: string): void {
    this.log(LogLevel.INFO, message, context, traceId);
  }

  warn(message: string, context?: Record<string, unknown>, traceId?: string): void {
    this.log(LogLevel.WARN, message, context, traceId);
  }

  error(message: string, context?: Record<string, unknown>, traceId?: string): void {
    this.log(LogLevel.ERROR, message, context, traceId);
  }

  /**
   * Start tool call tracing.
   */
  startToolCall(toolName: string, params?: Record<string, unknown>, context?: Record<string, unknown>): string {
    const traceId = this.generateTraceId();
    this.activeTraces.set(traceId, { traceId, toolName, startTime: Date.now() });

    this.info(`Tool call started: ${toolName}`, {
      tool: toolName,
      ...context,
      // Avoid logging large parameters.
      params: this.sanitizeParams(params)
    }, traceId);

    return traceId;
  }

  /**
   * End tool call tracing.
   */
  endToolCall(traceId: string, success: boolean): void {
    const trace = this.activeTraces.get(traceId);
    if (!trace) {
      this.warn('Attempted to end unknown trace', { traceId });
      return;
    }

    const durationMs = Date.now() - trace.startTime;
    this.activeTraces.delete(traceId);

    this.log(
      success ? LogLevel.INFO : LogLevel.ERROR,
      `Tool call ${success ? 'completed' : 'failed'}: ${trace.toolName}`,
      { tool: trace.toolName, success },
      traceId,
      durationMs
    );
  }

  /**
   * Record a tool call error with its full context.
   */
  toolError(traceId: string, error: unknown, context?: Record<string, unknown>): void {
    const trace = this.activeTraces.get(traceId);
    const durationMs = trace ? Date.now() - trace.startTime : undefined;

    if (trace) {
      this.activeTraces.delete(traceId);
    }

    this.log(LogLevel.ERROR, `Tool call error: ${trace?.toolName || 'unknown'}`, {
      tool: trace?.toolName,
      ...context,
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined
    }, traceId, durationMs);
  }

  /**
   * Mask sensitive arguments, truncate long strings and arrays, and elide
   * nested objects.
   */
  private sanitizeParams(params?: Record<string, unknown>): Record<string, unknown> | undefined {
    if (!params) return undefined;

    const sanitized: Record<string, unknown> = {};
    const MAX_STRING_LENGTH = 500;
    const MAX_ARRAY_LENGTH = 10;

    for (const [key, value] of Object.entries(params)) {
      if (SENSITIVE_PARAM_PATTERN.test(key)) {
        sanitized[key] = REDACTED;
      } else if (typeof value === 'string') {
        sanitized[key] = value.length > MAX_STRING_LENGTH
          ? `${value.slice(0, MAX_STRING_LENGTH)}... [truncated, ${value.length} chars]`
          : value;
      } else if (Array.isArray(value)) {
        sanitized[key] = value.length > MAX_ARRAY_LENGTH
          ? `[Array of ${value.length} items]`
          : value;
      } else if (typeof value === 'object' && value !== null) {
        sanitized[key] = '[Object]';
      } else {
        sanitized[key] = value;
      }
    }

    return sanitized;
  }

  /**
   * Log the outcome of a gated tool listing.
   */
  toolsListed(count: number, filtersApplied: string[], contextSize: number, context?: Record<string, unknown>): void {
    this.info(`tools/list returned ${count} tools`, {
      ...context,
      filters_applied: filtersApplied,
      context_size: contextSize
    });
  }

  /**
   * Log server startup.
   */
  serverStarted(mode: string, details?: Record<string, unknown>): void {
    this.info('Server started', { mode, ...details });
  }

  /**
   * Log server shutdown.
   */
  serverStopped(reason?: string): void {
    this.info('Server stopped', { reason });
  }
}

// Singleton instance.
export const logger = new Logger();
