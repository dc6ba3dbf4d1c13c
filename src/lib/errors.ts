/**
 * Error types raised by the engine and the wire adapter.
 *
 * Only caller mistakes are errors. Eliminations, starvation and collisions
 * are rule outcomes and live on the state.
 */

export type ContractViolationCode =
  | 'missing-move'
  | 'unknown-agent'
  | 'invalid-direction'
  | 'invalid-position'
  | 'duplicate-agent'
  | 'empty-body'
  | 'invalid-health'
  | 'invalid-dimensions'
  | 'unknown-ruleset';

/** Raised when the engine is called with input that breaks its contract. */
export class ContractViolationError extends Error {
  readonly code: ContractViolationCode;

  constructor(code: ContractViolationCode, message: string) {
    super(message);
    this.name = 'ContractViolationError';
    this.code = code;
  }
}

/** Raised by the wire adapter when a JSON document does not match the game schema. */
export class WireFormatError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid game document: ${issues.join('; ')}`);
    this.name = 'WireFormatError';
    this.issues = issues;
  }
}
