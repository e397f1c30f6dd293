// =============================================================================
// Reaper Tests
// =============================================================================
// Tests: periodic ticks, stop(), idempotent stop, owner signal, logging
// =============================================================================

jest.mock('../utils/logger', () => ({
  __esModule: true,
  default: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

import { Reaper } from '../services/reaper';
import logger from '../utils/logger';

let reaper: Reaper | null = null;

beforeEach(() => {
  jest.useFakeTimers();
  jest.clearAllMocks();
});

afterEach(() => {
  reaper?.stop();
  reaper = null;
  jest.useRealTimers();
});

describe('Reaper', () => {
  it('should call sweep once per interval', () => {
    const sweep = jest.fn(() => 0);
    reaper = new Reaper({ sweep, intervalMs: 100, name: 'test' });

    jest.advanceTimersByTime(350);

    expect(sweep).toHaveBeenCalledTimes(3);
    expect(reaper.state).toBe('running');
  });

  it('should not sweep before the first interval', () => {
    const sweep = jest.fn(() => 0);
    reaper = new Reaper({ sweep, intervalMs: 100, name: 'test' });

    jest.advanceTimersByTime(99);

    expect(sweep).not.toHaveBeenCalled();
  });

  it('should stop ticking after stop()', () => {
    const sweep = jest.fn(() => 0);
    reaper = new Reaper({ sweep, intervalMs: 100, name: 'test' });

    jest.advanceTimersByTime(250);
    reaper.stop();
    jest.advanceTimersByTime(1_000);

    expect(sweep).toHaveBeenCalledTimes(2);
    expect(reaper.state).toBe('stopped');
    expect(jest.getTimerCount()).toBe(0);
  });

  it('should accept repeated stop() calls', () => {
    reaper = new Reaper({ sweep: () => 0, intervalMs: 100, name: 'test' });

    reaper.stop();
    reaper.stop();
    reaper.stop();

    expect(reaper.state).toBe('stopped');
    expect(logger.debug).toHaveBeenCalledWith('Reaper stopped', { cache: 'test' });
    // one "started", one "stopped"
    expect(logger.debug).toHaveBeenCalledTimes(2);
  });

  it('should stop when the owner signal aborts', () => {
    const owner = new AbortController();
    const sweep = jest.fn(() => 0);
    reaper = new Reaper({ sweep, intervalMs: 100, signal: owner.signal, name: 'test' });

    owner.abort();
    jest.advanceTimersByTime(1_000);

    expect(sweep).not.toHaveBeenCalled();
    expect(reaper.state).toBe('stopped');
  });

  it('should start stopped when the owner signal is already aborted', () => {
    const owner = new AbortController();
    owner.abort();
    const sweep = jest.fn(() => 0);

    reaper = new Reaper({ sweep, intervalMs: 100, signal: owner.signal, name: 'test' });
    jest.advanceTimersByTime(1_000);

    expect(reaper.state).toBe('stopped');
    expect(sweep).not.toHaveBeenCalled();
    expect(jest.getTimerCount()).toBe(0);
  });

  it('should log the count when a sweep removes entries', () => {
    reaper = new Reaper({ sweep: () => 2, intervalMs: 100, name: 'sessions' });

    jest.advanceTimersByTime(100);

    expect(logger.debug).toHaveBeenCalledWith('Reaper sweep removed expired entries', {
      cache: 'sessions',
      removed: 2,
    });
  });

  it('should stay quiet when a sweep removes nothing', () => {
    reaper = new Reaper({ sweep: () => 0, intervalMs: 100, name: 'sessions' });

    jest.advanceTimersByTime(300);

    expect(logger.debug).not.toHaveBeenCalledWith(
      'Reaper sweep removed expired entries',
      expect.anything(),
    );
  });

  it('should log the start with its interval', () => {
    reaper = new Reaper({ sweep: () => 0, intervalMs: 250, name: 'sessions' });

    expect(logger.debug).toHaveBeenCalledWith('Reaper started', {
      cache: 'sessions',
      intervalMs: 250,
    });
  });
});
