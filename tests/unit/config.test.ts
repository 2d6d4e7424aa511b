import { describe, it, expect, vi } from 'vitest';
import { getAddress } from 'viem';

vi.mock('../../src/utils/logger.js', () => {
  const mockLogger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), fatal: vi.fn() };
  return { logger: mockLogger, createChildLogger: () => mockLogger };
});

import { parseConfig } from '../../src/config.js';
import { logger } from '../../src/utils/logger.js';
import { OWNER } from '../fixtures.js';

describe('parseConfig', () => {
  it('applies defaults', () => {
    const config = parseConfig({ REGISTRY_OWNER_ADDRESS: OWNER });

    expect(config).toEqual({
      registry: { ownerAddress: OWNER },
      api: { port: 3000, host: '0.0.0.0', rateLimitPerMinute: 60 },
      logging: { level: 'info' },
    });
  });

  it('reads overrides from the environment', () => {
    const config = parseConfig({
      REGISTRY_OWNER_ADDRESS: OWNER,
      API_PORT: '8080',
      API_HOST: '127.0.0.1',
      RATE_LIMIT_PER_MINUTE: '120',
      LOG_LEVEL: 'debug',
    });

    expect(config.api).toEqual({ port: 8080, host: '127.0.0.1', rateLimitPerMinute: 120 });
    expect(config.logging.level).toBe('debug');
  });

  it('normalizes the owner address to checksum form', () => {
    const lower = '0xabcdefabcdefabcdefabcdefabcdefabcdefabcd';

    const config = parseConfig({ REGISTRY_OWNER_ADDRESS: lower });

    expect(config.registry.ownerAddress).toBe(getAddress(lower));
  });

  it('fails when the owner address is missing', () => {
    expect(() => parseConfig({})).toThrow(/registry\.ownerAddress: Invalid address/);
    expect(logger.fatal).toHaveBeenCalled();
  });

  it('fails on an out-of-range port', () => {
    expect(() => parseConfig({ REGISTRY_OWNER_ADDRESS: OWNER, API_PORT: '70000' })).toThrow(
      /api\.port/
    );
  });
});
