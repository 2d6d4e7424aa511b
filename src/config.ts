import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { logger } from './utils/logger.js';
import { addressSchema } from './utils/address.js';

// Load environment variables from .env.local for development
dotenvConfig({ path: '.env.local' });
dotenvConfig(); // Fallback to .env

/**
 * Configuration schema with Zod validation
 */
const configSchema = z.object({
  registry: z.object({
    // Identity with owner privileges (verification, first responders, emergency services)
    ownerAddress: addressSchema,
  }),

  api: z.object({
    port: z.coerce.number().int().min(1).max(65535).default(3000),
    host: z.string().default('0.0.0.0'),
    rateLimitPerMinute: z.coerce.number().int().min(1).max(10000).default(60),
  }),

  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  }),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Parse and validate configuration from environment variables
 */
export function parseConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig = {
    registry: {
      ownerAddress: env.REGISTRY_OWNER_ADDRESS ?? '',
    },
    api: {
      port: env.API_PORT ?? '3000',
      host: env.API_HOST ?? '0.0.0.0',
      rateLimitPerMinute: env.RATE_LIMIT_PER_MINUTE ?? '60',
    },
    logging: {
      level: env.LOG_LEVEL ?? 'info',
    },
  };

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.issues.map(
      (issue) => `  - ${issue.path.join('.')}: ${issue.message}`
    );
    logger.fatal({ errors: result.error.issues }, 'Configuration validation failed');
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return result.data;
}

let cachedConfig: Config | null = null;

/**
 * Validated configuration, parsed on first use
 */
export function getConfig(): Config {
  if (!cachedConfig) {
    cachedConfig = parseConfig();
  }
  return cachedConfig;
}
