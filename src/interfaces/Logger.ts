export interface Logger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, error?: Error, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;

  // Specialized logging methods for prune runs
  logConfigurationStart(config: Record<string, unknown>): void;
  logSkippedLine(lineNumber: number, reason: string): void;
  logRetentionReason(position: number, total: number, time: string, reasons: string[]): void;
  logPolicySummary(period: string, wanted: number, missing: number, width: number): void;
  logPruneComplete(prunedCount: number, totalCount: number): void;
}

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
}
