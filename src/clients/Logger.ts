import winston from 'winston';
import { Logger as ILogger, LogLevel } from '../interfaces/Logger';

const REPORT_LEVEL = 'report';

// report entries (--why and --summarize output) pass every level filter
const LEVELS: Record<string, number> = {
  error: 0,
  [REPORT_LEVEL]: 0,
  warn: 1,
  info: 2,
  debug: 3
};

const LEVEL_TAGS: Record<string, string> = {
  error: 'error',
  warn: 'warning',
  info: 'info',
  debug: 'debug'
};

export class Logger implements ILogger {
  private winston: winston.Logger;

  constructor(
    private readonly logLevel: LogLevel = LogLevel.INFO,
    private readonly programName: string = 'snapkeep'
  ) {
    this.winston = winston.createLogger({
      levels: LEVELS,
      level: logLevel,
      format: winston.format.combine(
        winston.format.errors({ stack: true }),
        winston.format.printf(info => this.formatEntry(info))
      ),
      transports: [
        // stdout is reserved for the filtered snapshot lines
        new winston.transports.Console({
          stderrLevels: [...Object.values(LogLevel), REPORT_LEVEL]
        })
      ]
    });
  }

  /**
   * Render an entry as "<program>: <tag>: <message>", where the tag is the
   * level unless the entry carries its own. Metadata is only shown when
   * debugging.
   */
  private formatEntry(info: winston.Logform.TransformableInfo): string {
    const { level, message, tag, stack, ...meta } = info;
    const label = typeof tag === 'string' ? tag : LEVEL_TAGS[level] ?? level;
    let line = `${this.programName}: ${label}: ${String(message)}`;

    if (this.logLevel === LogLevel.DEBUG) {
      if (Object.keys(meta).length > 0) {
        line += ` ${JSON.stringify(meta)}`;
      }
      if (typeof stack === 'string') {
        line += `\n${stack}`;
      }
    }
    return line;
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.winston.info(message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.winston.warn(message, meta);
  }

  error(message: string, error?: Error, meta?: Record<string, unknown>): void {
    const errorMeta = {
      ...meta,
      ...(error && {
        error: {
          name: error.name,
          message: error.message,
          stack: error.stack
        }
      })
    };
    this.winston.error(message, errorMeta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.winston.debug(message, meta);
  }

  private report(message: string, meta: Record<string, unknown>): void {
    this.winston.log(REPORT_LEVEL, message, meta);
  }

  logConfigurationStart(config: Record<string, unknown>): void {
    this.debug('Starting with configuration', {
      operation: 'startup',
      config
    });
  }

  logSkippedLine(lineNumber: number, reason: string): void {
    this.warn(reason, {
      operation: 'scan',
      lineNumber
    });
  }

  logRetentionReason(position: number, total: number, time: string, reasons: string[]): void {
    const width = String(total).length;
    const index = String(position).padStart(width, ' ');
    const count = String(total).padStart(width, ' ');
    this.report(`keep [${index}/${count}] ${time} :: ${reasons.join(', ')}`, {
      tag: 'why'
    });
  }

  logPolicySummary(period: string, wanted: number, missing: number, width: number): void {
    let message: string;
    if (missing < 0) {
      message = `(${'*'.repeat(width)}) ${period}`;
    } else {
      message = `(${String(wanted).padStart(width, ' ')}) ${period}`;
      if (missing > 0) {
        message += ` (missing ${missing})`;
      }
    }
    this.report(message, { tag: 'summary' });
  }

  logPruneComplete(prunedCount: number, totalCount: number): void {
    this.report(`pruning ${prunedCount}/${totalCount} snapshots`, {
      tag: 'summary',
      operation: 'prune_complete',
      prunedCount,
      totalCount
    });
  }
}
