import { Timestamp, wallClock } from './time';

/**
 * Precision and unit of measurement for a retention period.
 *
 * Declaration order is significant: it is the primary sort key of periods.
 */
export enum Unit {
  /** snapshot count */
  Last,
  /** wallclock seconds */
  Secondly,
  /** calendar days */
  Daily,
  /** calendar months */
  Monthly,
  /** calendar years */
  Yearly,
}

export const UNITS: readonly Unit[] = [Unit.Last, Unit.Secondly, Unit.Daily, Unit.Monthly, Unit.Yearly];

const UNIT_NAMES: Record<Unit, string> = {
  [Unit.Last]: 'last',
  [Unit.Secondly]: 'secondly',
  [Unit.Daily]: 'daily',
  [Unit.Monthly]: 'monthly',
  [Unit.Yearly]: 'yearly'
};

export function isValidUnit(unit: number): unit is Unit {
  return Number.isInteger(unit) && unit >= Unit.Last && unit <= Unit.Yearly;
}

/**
 * Lowercase name of the unit, or an empty string if it is not a known unit.
 */
export function unitName(unit: Unit): string {
  return isValidUnit(unit) ? UNIT_NAMES[unit] : '';
}

/**
 * Case-insensitive lookup of a unit by name.
 */
export function parseUnit(name: string): Unit | undefined {
  const lower = name.toLowerCase();
  return UNITS.find(unit => UNIT_NAMES[unit] === lower);
}

export function compareUnits(a: Unit, b: Unit): number {
  return Math.sign(a - b);
}

/**
 * Reports whether two timestamps fall in the same bucket of the unit: the same
 * second for Secondly, the same calendar day, month or year (each in its own
 * offset) for the calendar units, and the same instant for Last.
 */
export function timeEquals(unit: Unit, a: Timestamp, b: Timestamp): boolean {
  switch (unit) {
    case Unit.Last:
      return a.instant.getTime() === b.instant.getTime();
    case Unit.Secondly:
      return Math.floor(a.instant.getTime() / 1000) === Math.floor(b.instant.getTime() / 1000);
  }

  const wa = wallClock(a);
  const wb = wallClock(b);
  switch (unit) {
    case Unit.Daily:
      return (
        wa.getUTCFullYear() === wb.getUTCFullYear() &&
        wa.getUTCMonth() === wb.getUTCMonth() &&
        wa.getUTCDate() === wb.getUTCDate()
      );
    case Unit.Monthly:
      return wa.getUTCFullYear() === wb.getUTCFullYear() && wa.getUTCMonth() === wb.getUTCMonth();
    case Unit.Yearly:
      return wa.getUTCFullYear() === wb.getUTCFullYear();
  }
  return false;
}
