// =============================================================================
// CacheError Tests
// =============================================================================
import {
  CacheError,
  InvalidCapacityError,
  InvalidOptionError,
  isCacheError,
} from '../utils/CacheError';

describe('InvalidCapacityError', () => {
  it('should carry the code, name and rejected capacity', () => {
    const err = new InvalidCapacityError(0);

    expect(err.message).toBe('invalid capacity');
    expect(err.name).toBe('InvalidCapacityError');
    expect(err.code).toBe('INVALID_CAPACITY');
    expect(err.capacity).toBe(0);
  });

  it('should keep the prototype chain', () => {
    const err = new InvalidCapacityError(-3);

    expect(err).toBeInstanceOf(InvalidCapacityError);
    expect(err).toBeInstanceOf(CacheError);
    expect(err).toBeInstanceOf(Error);
  });
});

describe('InvalidOptionError', () => {
  it('should name the option in its message', () => {
    const err = new InvalidOptionError('reaperIntervalMs', 'Number must be greater than 0');

    expect(err.message).toBe(
      'invalid cache option reaperIntervalMs: Number must be greater than 0',
    );
    expect(err.option).toBe('reaperIntervalMs');
    expect(err.code).toBe('INVALID_OPTION');
    expect(err).toBeInstanceOf(CacheError);
  });
});

describe('isCacheError', () => {
  it('should recognise cache errors only', () => {
    expect(isCacheError(new InvalidCapacityError(0))).toBe(true);
    expect(isCacheError(new Error('invalid capacity'))).toBe(false);
    expect(isCacheError('invalid capacity')).toBe(false);
  });
});
