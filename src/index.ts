export { Unit, UNITS, isValidUnit, unitName, parseUnit, compareUnits, timeEquals } from './retention/Unit';
export { Period } from './retention/Period';
export type { NormalizedPeriod } from './retention/Period';
export { Policy, INFINITE, parsePolicy } from './retention/Policy';
export { prune } from './retention/prune';
export type { PruneResult } from './retention/prune';
export { toTimestamp, timestampInOffset, localTimestamp, formatTimestamp } from './retention/time';
export type { Timestamp, TimeInput } from './retention/time';
export { parseDurationSeconds, formatDurationSeconds } from './retention/duration';
export { PolicyParseError, PolicyContractError } from './retention/errors';
export type { PolicyParseErrorKind, PolicyRuleField } from './retention/errors';
