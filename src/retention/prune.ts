import { Period } from './Period';
import { Policy } from './Policy';
import { TimeInput, Timestamp, toTimestamp } from './time';
import { Unit, timeEquals } from './Unit';

export interface PruneResult {
  /**
   * For each input snapshot (same index), the periods requiring it to be
   * retained, in canonical order. Empty if the snapshot can be pruned.
   */
  keep: Period[][];

  /**
   * The number of additional snapshots required to fulfill each period of the
   * original policy, or INFINITE if the period is unbounded. Satisfied periods
   * are absent, so get() returns zero for them.
   */
  need: Policy;
}

interface Retained {
  index: number;
  at: Timestamp;
}

/**
 * Prunes the provided snapshots according to the policy.
 *
 * Snapshots are ordered by their instant; the offset of each timestamp only
 * affects where calendar days, months and years are split. The most recent
 * snapshot in each bucket is preferred. At most one snapshot per bucket is
 * retained for all periods sharing a unit, even with different intervals.
 *
 * With several intervals for the same unit, pruning incrementally (keeping only
 * the output of the previous run) can discard a snapshot a longer interval
 * would have needed later.
 */
export function prune(snapshots: readonly TimeInput[], policy: Policy): PruneResult {
  const need = policy.clone();
  const keep: Period[][] = snapshots.map(() => []);
  const periods = policy.periods();

  const times = snapshots.map(toTimestamp);
  const sorted = times
    .map((_, index) => index)
    .sort((a, b) => times[b].instant.getTime() - times[a].instant.getTime());

  const lastPeriod = new Map<string, Timestamp>();
  const lastUnit = new Map<Unit, Retained>();

  for (const index of sorted) {
    const at = times[index];

    for (const period of periods) {
      const count = need.get(period);
      if (count === 0) {
        continue;
      }

      if (period.unit !== Unit.Last) {
        const last = lastPeriod.get(period.key());
        if (last !== undefined) {
          const boundary = period.prevTime(last);
          if (boundary.instant.getTime() < at.instant.getTime() && !timeEquals(period.unit, boundary, at)) {
            continue; // not due yet
          }
        }

        const retained = lastUnit.get(period.unit);
        if (
          retained !== undefined &&
          retained.index !== index &&
          timeEquals(period.unit, retained.at, at)
        ) {
          continue; // bucket already has a snapshot for this unit
        }

        lastPeriod.set(period.key(), at);
        lastUnit.set(period.unit, { index, at });
      }

      keep[index].push(period);
      if (count > 0) {
        need.set(period, count - 1);
      }
    }
  }

  return { keep, need };
}
