export type PolicyRuleField = 'unit' | 'count' | 'interval' | 'period';

export type PolicyParseErrorKind =
  | 'unknown-unit'
  | 'bad-integer'
  | 'zero-count'
  | 'invalid-interval'
  | 'duplicate-period'
  | 'invalid-period';

/**
 * A policy rule that does not follow the N@unit:X grammar
 */
export class PolicyParseError extends Error {
  constructor(
    message: string,
    public readonly rule: string,
    public readonly field: PolicyRuleField,
    public readonly kind: PolicyParseErrorKind
  ) {
    super(`rule ${JSON.stringify(rule)}: ${message}`);
    this.name = 'PolicyParseError';
  }
}

/**
 * Thrown by the must-succeed policy builders when called with a period that is
 * invalid or already present. This is a bug in the caller.
 */
export class PolicyContractError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PolicyContractError';
  }
}
