/**
 * Config Service
 *
 * Resolves engine configuration from defaults, VITALS_SYNC_* environment
 * variables and programmatic overrides, in that order of precedence, and
 * validates the result against SyncEngineConfigSchema.
 *
 * @module services/config.service
 * @security
 * - SEC-014: Input validation via Zod schemas
 * - LM-001: Structured logging with secret redaction
 */

import { createLogger, logger } from '../utils/logger';
import {
  type SyncEngineConfig,
  type SyncEngineConfigOverrides,
  DEFAULT_CONFIG,
  safeValidateConfig,
} from '../shared/types/config.types';

// ============================================================================
// Logger Setup (LM-001)
// ============================================================================

const log = createLogger('config-service');

// ============================================================================
// Errors
// ============================================================================

export class ConfigValidationError extends Error {
  /** Flattened `path: message` entries */
  readonly issues: string[];

  constructor(issues: string[]) {
    super('Invalid configuration: ' + issues.join(', '));
    this.name = 'ConfigValidationError';
    this.issues = issues;
    Object.setPrototypeOf(this, ConfigValidationError.prototype);
  }
}

// ============================================================================
// Environment Mapping
// ============================================================================

type Env = Record<string, string | undefined>;

function envNumber(env: Env, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  return Number(raw);
}

function envBoolean(env: Env, key: string): boolean | undefined {
  const raw = env[key]?.trim().toLowerCase();
  if (raw === undefined || raw === '') {
    return undefined;
  }
  return raw === 'true' || raw === '1' || raw === 'yes';
}

function envString(env: Env, key: string): string | undefined {
  const raw = env[key];
  return raw === undefined || raw.trim() === '' ? undefined : raw.trim();
}

/**
 * Apply VITALS_SYNC_* variables on top of a base configuration
 */
export function applyEnv(base: SyncEngineConfig, env: Env = process.env): SyncEngineConfig {
  const logLevel = envString(env, 'VITALS_SYNC_LOG_LEVEL');

  return {
    ...base,
    apiUrl: envString(env, 'VITALS_SYNC_API_URL') ?? base.apiUrl,
    dbPath: envString(env, 'VITALS_SYNC_DB_PATH') ?? base.dbPath,
    timeZone: envString(env, 'VITALS_SYNC_TIME_ZONE') ?? base.timeZone,
    logLevel:
      logLevel === 'debug' || logLevel === 'info' || logLevel === 'warn' || logLevel === 'error'
        ? logLevel
        : base.logLevel,
    dispatcher: {
      ...base.dispatcher,
      maxAttempts: envNumber(env, 'VITALS_SYNC_MAX_ATTEMPTS') ?? base.dispatcher.maxAttempts,
      pollIntervalMs:
        envNumber(env, 'VITALS_SYNC_POLL_INTERVAL_MS') ?? base.dispatcher.pollIntervalMs,
      requestTimeoutMs:
        envNumber(env, 'VITALS_SYNC_REQUEST_TIMEOUT_MS') ?? base.dispatcher.requestTimeoutMs,
      minCallSpacingMs:
        envNumber(env, 'VITALS_SYNC_MIN_CALL_SPACING_MS') ?? base.dispatcher.minCallSpacingMs,
      batchSize: envNumber(env, 'VITALS_SYNC_BATCH_SIZE') ?? base.dispatcher.batchSize,
    },
    dedup: {
      ...base.dedup,
      valueTolerance: envNumber(env, 'VITALS_SYNC_VALUE_TOLERANCE') ?? base.dedup.valueTolerance,
    },
    readPath: {
      stalenessThresholdMs:
        envNumber(env, 'VITALS_SYNC_STALENESS_THRESHOLD_MS') ??
        base.readPath.stalenessThresholdMs,
    },
    remote: {
      supportsUpsert:
        envBoolean(env, 'VITALS_SYNC_SUPPORTS_UPSERT') ?? base.remote.supportsUpsert,
    },
  };
}

/**
 * Merge overrides section by section onto a base configuration
 */
export function mergeConfig(
  base: SyncEngineConfig,
  overrides: SyncEngineConfigOverrides
): SyncEngineConfig {
  return {
    apiUrl: overrides.apiUrl ?? base.apiUrl,
    dbPath: overrides.dbPath ?? base.dbPath,
    timeZone: overrides.timeZone ?? base.timeZone,
    logLevel: overrides.logLevel ?? base.logLevel,
    dispatcher: { ...base.dispatcher, ...overrides.dispatcher },
    dedup: { ...base.dedup, ...overrides.dedup },
    readPath: { ...base.readPath, ...overrides.readPath },
    auth: { ...base.auth, ...overrides.auth },
    remote: { ...base.remote, ...overrides.remote },
    entityTypes: overrides.entityTypes ?? base.entityTypes,
  };
}

// ============================================================================
// Config Service Class
// ============================================================================

export class ConfigService {
  private readonly config: SyncEngineConfig;

  /**
   * @throws ConfigValidationError when the merged configuration is invalid
   * @security SEC-014: Input validation before use
   */
  constructor(overrides: SyncEngineConfigOverrides = {}, env: Env = process.env) {
    const merged = mergeConfig(applyEnv(DEFAULT_CONFIG, env), overrides);
    const validation = safeValidateConfig(merged);

    if (!validation.success) {
      const issues = validation.error.issues.map((e) => e.path.join('.') + ': ' + e.message);
      log.error('Config validation failed', { errorCount: issues.length });
      throw new ConfigValidationError(issues);
    }

    this.config = validation.data;
    logger.setLevel(this.config.logLevel);

    log.info('Configuration resolved', {
      hasApiUrl: !!this.config.apiUrl,
      inMemory: this.config.dbPath === ':memory:',
      timeZone: this.config.timeZone,
      entityTypes: this.config.entityTypes.length,
    });
  }

  getConfig(): SyncEngineConfig {
    return this.config;
  }

  get<K extends keyof SyncEngineConfig>(key: K): SyncEngineConfig[K] {
    return this.config[key];
  }
}

// ============================================================================
// Type Re-exports for Convenience
// ============================================================================

export type { SyncEngineConfig, SyncEngineConfigOverrides };
