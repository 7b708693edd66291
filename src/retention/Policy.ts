import { parseDurationSeconds, formatDurationSeconds } from './duration';
import { PolicyContractError, PolicyParseError } from './errors';
import { Period } from './Period';
import { Unit, parseUnit, unitName } from './Unit';

/** Count meaning an unbounded number of snapshots. */
export const INFINITE = -1;

interface PolicyEntry {
  period: Period;
  count: number;
}

const INTEGER = /^[+-]?\d+$/;

function parseInteger(text: string): number | undefined {
  if (!INTEGER.test(text)) {
    return undefined;
  }
  const value = Number(text);
  return Number.isSafeInteger(value) ? value : undefined;
}

/**
 * A retention policy: the number of snapshots to retain for each period.
 *
 * Every stored period is valid and normalized, and every stored count is
 * either positive or INFINITE.
 */
export class Policy {
  private readonly counts = new Map<string, PolicyEntry>();

  get size(): number {
    return this.counts.size;
  }

  /**
   * Sets the count for a period, replacing any existing count. A negative count
   * means INFINITE and a count of zero removes the period. Returns false without
   * changing anything if the period or count is invalid.
   */
  set(period: Period, count: number): boolean {
    const normalized = period.normalize();
    if (!normalized.ok || !Number.isInteger(count)) {
      return false;
    }
    const key = normalized.period.key();
    if (count === 0) {
      this.counts.delete(key);
    } else {
      this.counts.set(key, { period: normalized.period, count: count < 0 ? INFINITE : count });
    }
    return true;
  }

  /**
   * Like set, but throws if the period is invalid or has already been used.
   */
  mustSet(unit: Unit, interval: number, count: number): void {
    const period = new Period(unit, interval);
    if (this.get(period) !== 0) {
      throw new PolicyContractError(`duplicate period ${period.key()}`);
    }
    if (!this.set(period, count)) {
      throw new PolicyContractError(`invalid period ${period.key()}`);
    }
  }

  /**
   * Gets the count for a period, or zero if it is unset or invalid.
   */
  get(period: Period): number {
    const normalized = period.normalize();
    if (!normalized.ok) {
      return 0;
    }
    return this.counts.get(normalized.period.key())?.count ?? 0;
  }

  /**
   * The periods in canonical order.
   */
  periods(): Period[] {
    return Array.from(this.counts.values(), entry => entry.period).sort(Period.compare);
  }

  /**
   * Visits every period in canonical order.
   */
  each(visit: (period: Period, count: number) => void): void {
    for (const period of this.periods()) {
      visit(period, this.get(period));
    }
  }

  clone(): Policy {
    const copy = new Policy();
    for (const [key, entry] of this.counts) {
      copy.counts.set(key, { ...entry });
    }
    return copy;
  }

  equals(other: Policy): boolean {
    if (this.size !== other.size) {
      return false;
    }
    for (const { period, count } of this.counts.values()) {
      if (other.get(period) !== count) {
        return false;
      }
    }
    return true;
  }

  /**
   * Human-readable form, e.g. "last (3), every day (7), every year (inf)".
   */
  toString(): string {
    const parts: string[] = [];
    this.each((period, count) => {
      parts.push(`${period} (${count < 0 ? 'inf' : count})`);
    });
    return parts.join(', ');
  }

  /**
   * Canonical rule text accepted by Policy.fromText. All equivalent policies
   * produce the same text.
   */
  toText(): string {
    const rules: string[] = [];
    this.each((period, count) => {
      let rule = count > 0 ? `${count}@` : '';
      rule += unitName(period.unit);
      if (period.interval !== 1) {
        rule +=
          period.unit === Unit.Secondly && period.interval >= 60
            ? `:${formatDurationSeconds(period.interval)}`
            : `:${period.interval}`;
      }
      rules.push(rule);
    });
    return rules.join(' ');
  }

  toJSON(): string {
    return this.toText();
  }

  /**
   * Parses whitespace-separated rules.
   */
  static fromText(text: string): Policy {
    return parsePolicy(...text.split(/\s+/).filter(rule => rule !== ''));
  }
}

/**
 * Parses a policy from rules in the form N@unit:X, where N is the snapshot
 * count, unit is a unit name, and X is the interval.
 *
 * If N is negative, an infinite number of snapshots is retained. N must not be
 * zero, and defaults to infinite if N@ is omitted. X must be greater than zero
 * and defaults to 1. For "last", X must be 1. For "secondly", X can also be a
 * duration like 1h30m. Each rule must be unique by unit:X.
 */
export function parsePolicy(...rules: string[]): Policy {
  const policy = new Policy();

  for (const rule of rules) {
    let countText = '-1';
    let rest = rule;
    const at = rule.indexOf('@');
    if (at >= 0) {
      countText = rule.slice(0, at);
      rest = rule.slice(at + 1);
    }

    let unitText = rest;
    let intervalText = '1';
    const colon = rest.indexOf(':');
    if (colon >= 0) {
      unitText = rest.slice(0, colon);
      intervalText = rest.slice(colon + 1);
    }

    const unit = parseUnit(unitText);
    if (unit === undefined) {
      throw new PolicyParseError(`unknown unit ${JSON.stringify(unitText)}`, rule, 'unit', 'unknown-unit');
    }

    const count = parseInteger(countText);
    if (count === undefined) {
      throw new PolicyParseError(`invalid count ${JSON.stringify(countText)}`, rule, 'count', 'bad-integer');
    }
    if (count === 0) {
      throw new PolicyParseError('count must not be zero', rule, 'count', 'zero-count');
    }

    let interval = parseInteger(intervalText);
    if (interval === undefined && unit === Unit.Secondly) {
      interval = parseDurationSeconds(intervalText);
    }
    if (interval === undefined) {
      throw new PolicyParseError(
        `invalid interval ${JSON.stringify(intervalText)}`,
        rule,
        'interval',
        'bad-integer'
      );
    }
    if (interval < 1) {
      throw new PolicyParseError('interval must be > 0', rule, 'interval', 'invalid-interval');
    }
    if (unit === Unit.Last && interval !== 1) {
      throw new PolicyParseError('interval must be 1 for unit last', rule, 'interval', 'invalid-interval');
    }

    const period = new Period(unit, interval);
    if (policy.get(period) !== 0) {
      throw new PolicyParseError(`duplicate ${period.key()}`, rule, 'period', 'duplicate-period');
    }
    if (!policy.set(period, count)) {
      throw new PolicyParseError(`invalid period ${period.key()}`, rule, 'period', 'invalid-period');
    }
  }

  return policy;
}
