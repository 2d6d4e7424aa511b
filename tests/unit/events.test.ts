import { describe, it, expect, beforeEach, vi } from 'vitest';

vi.mock('../../src/utils/logger.js', () => {
  const mockLogger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  return { logger: mockLogger, createChildLogger: () => mockLogger };
});

import { RegistryEventLog } from '../../src/services/events.js';
import { logger } from '../../src/utils/logger.js';
import { ALICE, BOB } from '../fixtures.js';

describe('RegistryEventLog', () => {
  let log: RegistryEventLog;

  beforeEach(() => {
    vi.clearAllMocks();
    log = new RegistryEventLog();
  });

  it('numbers events from 1 in append order', () => {
    log.append({ type: 'UserRegistered', user: ALICE }, 100);
    log.append({ type: 'UserRegistered', user: BOB }, 101);

    expect(log.list()).toEqual([
      { type: 'UserRegistered', user: ALICE, seq: 1, emittedAt: 100 },
      { type: 'UserRegistered', user: BOB, seq: 2, emittedAt: 101 },
    ]);
    expect(log.size).toBe(2);
  });

  it('lists only events after the given seq', () => {
    log.append({ type: 'UserRegistered', user: ALICE }, 100);
    log.append({ type: 'UserVerified', user: ALICE }, 101);
    log.append({ type: 'UserRegistered', user: BOB }, 102);

    expect(log.list(2).map((event) => event.seq)).toEqual([3]);
    expect(log.list(3)).toEqual([]);
  });

  it('returns copies that cannot rewrite history', () => {
    log.append({ type: 'UserRegistered', user: ALICE }, 100);

    const [first] = log.list();
    if (first) first.emittedAt = 0;

    expect(log.list()[0]?.emittedAt).toBe(100);
  });

  it('keeps notifying other listeners when one throws', () => {
    const received: number[] = [];
    log.subscribe(() => {
      throw new Error('listener failed');
    });
    log.subscribe((event) => received.push(event.seq));

    const event = log.append({ type: 'UserRegistered', user: ALICE }, 100);

    expect(event.seq).toBe(1);
    expect(received).toEqual([1]);
    expect(log.size).toBe(1);
    expect(logger.error).toHaveBeenCalledTimes(1);
  });
});
