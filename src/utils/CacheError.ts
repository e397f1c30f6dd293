// =============================================================================
// CacheError — typed errors raised while constructing a cache
// =============================================================================
// Only construction can fail. Every operation on a live cache is total and
// reports a missing key through its result, never by throwing.
// =============================================================================

export type CacheErrorCode = 'INVALID_CAPACITY' | 'INVALID_OPTION';

export class CacheError extends Error {
  /** Machine-readable failure kind */
  public readonly code: CacheErrorCode;

  constructor(code: CacheErrorCode, message: string) {
    super(message);
    this.name = 'CacheError';
    this.code = code;

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, CacheError.prototype);
  }
}

/** Capacity was not a positive integer. The cache is not created. */
export class InvalidCapacityError extends CacheError {
  public readonly capacity: number;

  constructor(capacity: number) {
    super('INVALID_CAPACITY', 'invalid capacity');
    this.name = 'InvalidCapacityError';
    this.capacity = capacity;
    Object.setPrototypeOf(this, InvalidCapacityError.prototype);
  }
}

export class InvalidOptionError extends CacheError {
  /** Dotted path of the rejected option, e.g. `reaperIntervalMs` */
  public readonly option: string;

  constructor(option: string, reason: string) {
    super('INVALID_OPTION', `invalid cache option ${option}: ${reason}`);
    this.name = 'InvalidOptionError';
    this.option = option;
    Object.setPrototypeOf(this, InvalidOptionError.prototype);
  }
}

export function isCacheError(err: unknown): err is CacheError {
  return err instanceof CacheError;
}
