import { configSchema } from './types.js';
import type { CoordinationConfig, CoordinationConfigOverrides } from './types.js';

function parseInteger(value: string | undefined): number | undefined {
  return value !== undefined && value !== '' ? Number(value) : undefined;
}

/**
 * Load configuration from environment variables.
 * Read once at startup; overrides (used by tests and embedders) win over the environment.
 */
export function loadConfig(overrides: CoordinationConfigOverrides = {}): CoordinationConfig {
  const envConfig = {
    storage: {
      dataDir: process.env.AGENTCOORD_DATA_DIR,
      lockStaleMs: parseInteger(process.env.AGENTCOORD_LOCK_STALE_MS),
      maxRetries: parseInteger(process.env.AGENTCOORD_STORAGE_MAX_RETRIES),
      ...overrides.storage,
    },
    locks: {
      defaultTtlSeconds: parseInteger(process.env.AGENTCOORD_LOCK_TTL_SECONDS),
      maxLocksPerAgent: parseInteger(process.env.AGENTCOORD_MAX_LOCKS_PER_AGENT),
      sweepIntervalSeconds: parseInteger(process.env.AGENTCOORD_SWEEP_INTERVAL_SECONDS),
      ...overrides.locks,
    },
    sessionLog: {
      maxEvents: parseInteger(process.env.AGENTCOORD_SESSION_LOG_MAX_EVENTS),
      maxAgeDays: parseInteger(process.env.AGENTCOORD_SESSION_LOG_MAX_AGE_DAYS),
      ...overrides.sessionLog,
    },
    logging: {
      level: process.env.AGENTCOORD_LOG_LEVEL,
      ...overrides.logging,
    },
  };

  // Remove undefined values to let Joi apply defaults
  const cleanConfig = removeUndefined(envConfig);

  // Validate and apply defaults
  const { error, value } = configSchema.validate(cleanConfig, {
    allowUnknown: false,
    stripUnknown: true,
  });

  if (error) {
    throw new Error(`Configuration validation failed: ${error.message}`);
  }

  return value;
}

/**
 * Recursively remove undefined values from an object
 */
function removeUndefined(obj: unknown): unknown {
  if (obj === null || typeof obj !== 'object') {
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map(removeUndefined);
  }

  const cleaned: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (value !== undefined) {
      cleaned[key] = removeUndefined(value);
    }
  }
  return cleaned;
}

/**
 * Get environment-specific configuration examples
 */
export function getConfigExamples(): Record<string, Record<string, string>> {
  return {
    development: {
      AGENTCOORD_DATA_DIR: './data',
      AGENTCOORD_LOG_LEVEL: 'debug',
      AGENTCOORD_LOCK_TTL_SECONDS: '3600',
    },
    production: {
      AGENTCOORD_DATA_DIR: '/var/lib/agent-coord',
      AGENTCOORD_LOG_LEVEL: 'info',
      AGENTCOORD_LOCK_TTL_SECONDS: '86400',
      AGENTCOORD_SWEEP_INTERVAL_SECONDS: '300',
    },
  };
}

export * from './types.js';
