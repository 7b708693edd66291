import { formatDurationSeconds } from './duration';
import {
  Timestamp,
  subtractDays,
  subtractMilliseconds,
  subtractMonths,
  subtractYears
} from './time';
import { Unit, compareUnits, isValidUnit, unitName } from './Unit';

export interface NormalizedPeriod {
  period: Period;
  ok: boolean;
}

const CALENDAR_NOUNS: Partial<Record<Unit, string>> = {
  [Unit.Daily]: 'day',
  [Unit.Monthly]: 'month',
  [Unit.Yearly]: 'year'
};

/**
 * A specific time interval for snapshot retention: one snapshot every
 * `interval` units. The interval is ignored for Unit.Last.
 */
export class Period {
  constructor(
    public readonly unit: Unit,
    public readonly interval: number
  ) {}

  /**
   * Validates and canonicalizes the period. The returned period is only usable
   * if ok is true.
   */
  normalize(): NormalizedPeriod {
    if (this.unit === Unit.Last) {
      return { period: this.interval === 1 ? this : new Period(Unit.Last, 1), ok: true };
    }
    const ok = isValidUnit(this.unit) && Number.isSafeInteger(this.interval) && this.interval > 0;
    return { period: this, ok };
  }

  equals(other: Period): boolean {
    return this.unit === other.unit && this.interval === other.interval;
  }

  compare(other: Period): number {
    return compareUnits(this.unit, other.unit) || Math.sign(this.interval - other.interval);
  }

  /**
   * Canonical "unit:interval" text, usable as a map key.
   */
  key(): string {
    return `${unitName(this.unit)}:${this.interval}`;
  }

  /**
   * The time one interval before t. For Last, this is just before t and has no
   * calendar meaning.
   */
  prevTime(t: Timestamp): Timestamp {
    switch (this.unit) {
      case Unit.Secondly:
        return subtractMilliseconds(t, this.interval * 1000);
      case Unit.Daily:
        return subtractDays(t, this.interval);
      case Unit.Monthly:
        return subtractMonths(t, this.interval);
      case Unit.Yearly:
        return subtractYears(t, this.interval);
      default:
        return subtractMilliseconds(t, 1);
    }
  }

  /**
   * Human-readable form, e.g. "last", "every 1h30m", "every day" or
   * "every 2 months". Empty if the period is invalid.
   */
  toString(): string {
    const { period, ok } = this.normalize();
    if (!ok) {
      return '';
    }
    if (period.unit === Unit.Last) {
      return 'last';
    }
    if (period.unit === Unit.Secondly) {
      return `every ${formatDurationSeconds(period.interval)}`;
    }
    const noun = CALENDAR_NOUNS[period.unit] ?? unitName(period.unit);
    return period.interval === 1 ? `every ${noun}` : `every ${period.interval} ${noun}s`;
  }

  static compare(a: Period, b: Period): number {
    return a.compare(b);
  }
}
