/**
 * pascals-triangle — error classes
 *
 * Three failure kinds get their own class. Reads outside a container's index
 * domain throw the built-in RangeError; non-integer coordinates throw TypeError.
 */

// ─── Errors ───────────────────────────────────────────────────────────────────

/**
 * Malformed construction parameters: a negative row or column number, a
 * position outside [0, n], or backing data too small for the row it claims
 * to represent. Only ever thrown by constructors and factories.
 */
export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DomainError';
  }
}

/**
 * An attempt to move to a part of Pascal's triangle that doesn't exist:
 * above the apex, past the left or right edge, or before the first row,
 * column or entry. `reason` is the short description, e.g. "no entry above".
 */
export class OutOfBoundsError extends Error {
  readonly reason: string;

  constructor(reason: string) {
    super(reason);
    this.name   = 'OutOfBoundsError';
    this.reason = reason;
  }
}

/**
 * Entries adjacent on the same row can be added; an interior entry and one of
 * the two entries directly above it can be subtracted. Any other pairing
 * throws this.
 */
export class NonAdjacentError extends Error {
  constructor() {
    super('entries not appropriately arranged');
    this.name = 'NonAdjacentError';
  }
}

// ─── Argument checks ──────────────────────────────────────────────────────────

/** @internal Throws TypeError unless `value` is a safe integer. */
export function assertInteger(label: string, value: number): void {
  if (!Number.isSafeInteger(value)) {
    throw new TypeError(`${label} must be an integer; got ${value}.`);
  }
}

/** @internal Throws DomainError unless `value` is a non-negative integer. */
export function assertNonNegative(label: string, value: number): void {
  assertInteger(label, value);
  if (value < 0) {
    throw new DomainError(`${label} must be nonnegative; got ${value}.`);
  }
}
