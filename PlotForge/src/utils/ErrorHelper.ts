// ErrorHelper.ts
// Utility for turning thrown values into log lines and user-facing messages

import { PlotError } from '../errors/PlotErrors';
import { LogHelper } from './LogHelper';

export class ErrorHelper {
  /**
   * Message suitable for a tool response or CLI output.
   * @param err The error object or string
   */
  static Describe(err: unknown): string {
    if (err instanceof Error) return err.message;
    if (typeof err === 'string') return err;
    try {
      return JSON.stringify(err);
    } catch {
      return String(err);
    }
  }

  /**
   * Logs an error at ERROR severity with its code and details when it is a PlotError.
   * @param err The error object or message to log
   * @param context Optional context string
   */
  static LogError(err: unknown, context?: string): void {
    LogHelper.Error(ErrorHelper.Describe(err), ErrorHelper.errorParams(err, context));
  }

  private static errorParams(err: unknown, context?: string): Record<string, unknown> {
    const params: Record<string, unknown> = {};
    if (context) params.context = context;
    if (err instanceof PlotError) {
      params.errorCode = err.code;
      params.errorDetails = err.details;
    }
    params.error = err instanceof Error ? err : ErrorHelper.Describe(err);
    return params;
  }
}
