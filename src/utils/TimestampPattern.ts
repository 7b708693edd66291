import { format, isValid, parse } from 'date-fns';
import { Timestamp, localTimestamp, timestampInOffset } from '../retention/time';

// tokens which fix the instant on their own (zone offsets and epoch times)
const ABSOLUTE_TOKENS = new Set(['X', 'x', 't', 'T']);

// missing date fields are taken from here
const REFERENCE_DATE = new Date(1970, 0, 1);

// Mon Jan 2 15:04:05 2006, used to check a pattern can read what it writes
const SAMPLE_DATE = new Date(2006, 0, 2, 15, 4, 5);

export class TimestampPatternError extends Error {
  constructor(
    message: string,
    public readonly pattern: string
  ) {
    super(message);
    this.name = 'TimestampPatternError';
  }
}

/**
 * A date-fns format pattern (e.g. "EEE MMM dd HH:mm:ss yyyy") used to read
 * snapshot times.
 *
 * When the text carries a zone offset it fixes the instant, and calendar days
 * are split in UTC (or the host time zone with localTime). Otherwise the fields
 * are read as UTC, or as host time with localTime.
 */
export class TimestampPattern {
  readonly absolute: boolean;

  constructor(readonly pattern: string) {
    let readable: boolean;
    try {
      readable = isValid(parse(format(SAMPLE_DATE, pattern), pattern, REFERENCE_DATE));
    } catch (error) {
      throw new TimestampPatternError(error instanceof Error ? error.message : String(error), pattern);
    }
    if (!readable) {
      throw new TimestampPatternError('pattern cannot read the times it formats', pattern);
    }
    this.absolute = hasAbsoluteToken(pattern);
  }

  parse(text: string, localTime: boolean): Timestamp | null {
    const parsed = parse(text, this.pattern, REFERENCE_DATE);
    if (!isValid(parsed)) {
      return null;
    }
    if (localTime) {
      return localTimestamp(parsed);
    }
    return timestampInOffset(this.absolute ? parsed : fieldsAsUtc(parsed), 0);
  }
}

/**
 * Whether the pattern has a zone or epoch token outside quoted text
 */
function hasAbsoluteToken(pattern: string): boolean {
  let quoted = false;
  for (const char of pattern) {
    if (char === "'") {
      quoted = !quoted;
    } else if (!quoted && ABSOLUTE_TOKENS.has(char)) {
      return true;
    }
  }
  return false;
}

function fieldsAsUtc(local: Date): Date {
  const utc = new Date(0);
  utc.setUTCFullYear(local.getFullYear(), local.getMonth(), local.getDate());
  utc.setUTCHours(local.getHours(), local.getMinutes(), local.getSeconds(), local.getMilliseconds());
  return utc;
}
