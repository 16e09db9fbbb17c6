/** Structured, single-line JSON logging. */

import { getConfiguredLogLevel } from './moduleConfig';

export type LogSeverity = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR' | 'CRITICAL';

export const LOG_SEVERITIES: readonly LogSeverity[] = ['DEBUG', 'INFO', 'WARNING', 'ERROR', 'CRITICAL'];

export type LogStream = 'stdout' | 'stderr';

export class LogHelper {
  // Read from config on first use unless Configure() ran first
  private static threshold: LogSeverity | null = null;
  private static stream: LogStream = 'stdout';

  /**
   * Set the minimum severity written and where lines go.
   * The stdio MCP transport owns stdout, so it configures `stderr`.
   */
  static Configure(opts: { level?: string; stream?: LogStream }): void {
    if (opts.level !== undefined) {
      LogHelper.threshold = LogHelper.ParseSeverity(opts.level);
    }
    if (opts.stream !== undefined) {
      LogHelper.stream = opts.stream;
    }
  }

  /** Case-insensitive; `WARN` is accepted for `WARNING`. Unknown names fall back to INFO. */
  static ParseSeverity(level: string): LogSeverity {
    const upper = level.trim().toUpperCase();
    if (upper === 'WARN') return 'WARNING';
    return LOG_SEVERITIES.find(s => s === upper) ?? 'INFO';
  }

  static IsEnabled(severity: LogSeverity): boolean {
    if (LogHelper.threshold === null) {
      LogHelper.threshold = LogHelper.ParseSeverity(getConfiguredLogLevel());
    }
    return LOG_SEVERITIES.indexOf(severity) >= LOG_SEVERITIES.indexOf(LogHelper.threshold);
  }

  /** Build the log object for a message and optional key-value params. */
  static Format(severity: LogSeverity, message: string, params?: Record<string, unknown>): Record<string, unknown> {
    const logObj: Record<string, unknown> = {
      severity,
      message,
      filter: 'PlotForge',
    };

    if (params) {
      for (const [key, value] of Object.entries(params)) {
        try {
          if (value instanceof Error) {
            logObj[key] = value.stack || value.message;
          } else if (typeof value === 'object' && value !== null) {
            // Ensure we have a plain JSON serializable object/value
            logObj[key] = JSON.parse(JSON.stringify(value));
          } else {
            logObj[key] = value;
          }
        } catch {
          logObj[key] = String(value);
        }
      }
    }

    return logObj;
  }

  static Log(severity: LogSeverity, message: string, params?: Record<string, unknown>): void {
    if (!LogHelper.IsEnabled(severity)) return;
    const line = JSON.stringify(LogHelper.Format(severity, message, params));
    if (LogHelper.stream === 'stderr') {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  static Debug(message: string, params?: Record<string, unknown>): void {
    LogHelper.Log('DEBUG', message, params);
  }

  static Info(message: string, params?: Record<string, unknown>): void {
    LogHelper.Log('INFO', message, params);
  }

  static Warn(message: string, params?: Record<string, unknown>): void {
    LogHelper.Log('WARNING', message, params);
  }

  static Error(message: string, params?: Record<string, unknown>): void {
    LogHelper.Log('ERROR', message, params);
  }
}
