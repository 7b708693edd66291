import { createInterface } from 'node:readline';
import { Logger } from '../interfaces/Logger';
import {
  ScannedLine,
  SnapshotScanner as ISnapshotScanner,
  SnapshotScannerOptions
} from '../interfaces/SnapshotScanner';
import { isNamedTimestampFormat } from '../interfaces/PruneConfig';
import { Timestamp, daysInMonth, localTimestamp, timestampInOffset } from '../retention/time';
import { TimestampPattern } from '../utils/TimestampPattern';

export class InputError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'InputError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

const UNIX_TIMESTAMP = /^[+-]?\d+$/;

const ISO_TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})(?:[Tt ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d+))?)?)?\s*(Z|z|[+-]\d{2}(?::?\d{2})?)?$/;

/**
 * Compile an --extract regexp, rejecting more than one capture group
 */
export function compileExtract(source: string): RegExp {
  let extract: RegExp;
  try {
    extract = new RegExp(source);
  } catch (error) {
    throw new InputError(
      `--extract regexp is invalid: ${error instanceof Error ? error.message : String(error)}`,
      error instanceof Error ? error : undefined
    );
  }
  // an alternation with the empty string always matches, exposing every group
  const groups = (new RegExp(`${source}|`).exec('')?.length ?? 1) - 1;
  if (groups > 1) {
    throw new InputError('--extract regexp is invalid: must contain up to one capture group');
  }
  return extract;
}

/**
 * Reads snapshot lines, extracting and parsing the timestamp of each.
 * Lines which cannot be read are kept (with a null timestamp) so they can be
 * passed through, and a warning is logged unless quiet.
 */
export class SnapshotScanner implements ISnapshotScanner {
  private readonly pattern?: TimestampPattern;

  constructor(
    private readonly options: SnapshotScannerOptions,
    private readonly logger: Logger
  ) {
    if (!isNamedTimestampFormat(options.format)) {
      this.pattern = new TimestampPattern(options.format);
    }
  }

  async scan(input: NodeJS.ReadableStream): Promise<ScannedLine[]> {
    const lines: ScannedLine[] = [];
    const reader = createInterface({ input, crlfDelay: Infinity });

    let lineNumber = 0;
    try {
      for await (const text of reader) {
        lineNumber++;
        const scanned = this.scanLine(text, lineNumber);
        if (scanned) {
          lines.push(scanned);
        }
      }
    } catch (error) {
      throw new InputError(
        `failed to read input: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error : undefined
      );
    } finally {
      reader.close();
    }
    return lines;
  }

  scanLine(text: string, lineNumber: number): ScannedLine | null {
    if (text.length === 0) {
      return null;
    }

    let line = text;
    let value: string;
    if (this.options.extract) {
      const match = this.options.extract.exec(text);
      if (!match) {
        this.warn(lineNumber, `no match for --extract in ${JSON.stringify(text)}`);
        return { lineNumber, line, timestamp: null };
      }
      if (this.options.only) {
        line = match[0];
      }
      value = match.length > 1 ? match[1] ?? '' : match[0];
    } else {
      value = text.trim();
    }

    const timestamp = this.parseTimestamp(value);
    if (!timestamp) {
      const reason = this.pattern
        ? `failed to parse timestamp ${JSON.stringify(value)} using pattern ${JSON.stringify(this.pattern.pattern)}`
        : `failed to parse ${this.options.format} timestamp ${JSON.stringify(value)}`;
      this.warn(lineNumber, reason);
    }
    return { lineNumber, line, timestamp };
  }

  parseTimestamp(text: string): Timestamp | null {
    if (this.pattern) {
      return this.pattern.parse(text, this.options.localTime);
    }
    switch (this.options.format) {
      case 'unix-ms':
        return this.parseUnix(text, 1);
      case 'iso':
        return this.parseIso(text);
      default:
        return this.parseUnix(text, 1000);
    }
  }

  private parseUnix(text: string, scale: number): Timestamp | null {
    if (!UNIX_TIMESTAMP.test(text)) {
      return null;
    }
    const instant = new Date(Number(text) * scale);
    if (isNaN(instant.getTime())) {
      return null;
    }
    return this.options.localTime ? localTimestamp(instant) : timestampInOffset(instant, 0);
  }

  private parseIso(text: string): Timestamp | null {
    const match = ISO_TIMESTAMP.exec(text);
    if (!match) {
      return null;
    }
    const [, y, mo, d, h = '0', mi = '0', s = '0', fraction = ''] = match;
    const zone: string | undefined = match[8];
    const year = Number(y);
    const month = Number(mo) - 1;
    const day = Number(d);
    const hour = Number(h);
    const minute = Number(mi);
    const second = Number(s);
    const millisecond = Math.floor(Number(`0.${fraction || '0'}`) * 1000);

    if (
      month < 0 ||
      month > 11 ||
      day < 1 ||
      day > daysInMonth(year, month) ||
      hour > 23 ||
      minute > 59 ||
      second > 59
    ) {
      return null;
    }

    if (zone === undefined) {
      if (this.options.localTime) {
        const local = new Date(0);
        local.setFullYear(year, month, day);
        local.setHours(hour, minute, second, millisecond);
        return localTimestamp(local);
      }
      return timestampInOffset(wallTime(year, month, day, hour, minute, second, millisecond), 0);
    }

    let offset = 0;
    if (zone !== 'Z' && zone !== 'z') {
      const digits = zone.slice(1).replace(':', '');
      offset = Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2) || '0');
      if (zone.startsWith('-')) {
        offset = 0 - offset;
      }
    }
    const wall = wallTime(year, month, day, hour, minute, second, millisecond);
    return timestampInOffset(new Date(wall.getTime() - offset * 60 * 1000), offset);
  }

  private warn(lineNumber: number, reason: string): void {
    if (!this.options.quiet) {
      this.logger.logSkippedLine(lineNumber, reason);
    }
  }
}

function wallTime(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number,
  millisecond: number
): Date {
  const date = new Date(0);
  date.setUTCFullYear(year, month, day);
  date.setUTCHours(hour, minute, second, millisecond);
  return date;
}
