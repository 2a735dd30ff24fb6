/**
 * Configuration Types for the Sync Engine
 *
 * Zod schemas, inferred types and defaults for every tunable of the engine.
 *
 * @module shared/types/config.types
 */

import { z } from 'zod';

// ============================================================================
// Validation Schemas
// ============================================================================

/**
 * API URL validation schema
 * Allows HTTP for localhost/127.0.0.1, requires HTTPS otherwise
 */
export const ApiUrlSchema = z
  .string()
  .min(1, 'API URL is required')
  .max(500, 'API URL too long')
  .url('Invalid URL format')
  .refine((url) => {
    const isLocalhost = url.includes('localhost') || url.includes('127.0.0.1');
    if (isLocalhost) {
      return url.startsWith('http://') || url.startsWith('https://');
    }
    return url.startsWith('https://');
  }, 'API URL must use HTTPS (HTTP only allowed for localhost)');

/**
 * IANA time zone used to derive calendar days from value timestamps
 */
export const TimeZoneSchema = z
  .string()
  .min(1)
  .refine((tz) => {
    try {
      new Intl.DateTimeFormat('en-CA', { timeZone: tz });
      return true;
    } catch {
      return false;
    }
  }, 'Unknown time zone');

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const EntityTypeNameSchema = z
  .string()
  .min(1, 'Entity type is required')
  .max(64, 'Entity type too long')
  .regex(/^[a-z][a-z0-9_]*$/, 'Entity type must be snake_case');

/**
 * How a date-granular match combines the stored value with the incoming one
 * - sum: cumulative daily totals (water, calories)
 * - replace: latest value wins (weight)
 */
export const MergeModeSchema = z.enum(['sum', 'replace']);

export const EntityTypeDefinitionSchema = z.object({
  name: EntityTypeNameSchema,
  /** Time-granular types dedup on (day, time bucket); others on day only */
  hasSubDayTime: z.boolean(),
  merge: MergeModeSchema.default('sum'),
});

export const DispatcherConfigSchema = z.object({
  maxAttempts: z.number().int().min(1).max(50),
  baseDelayMs: z.number().int().min(0),
  maxDelayMs: z.number().int().min(0),
  jitterFactor: z.number().min(0).max(1),
  multiplier: z.number().min(1),
  /** Minimum spacing between two gateway calls for one user */
  minCallSpacingMs: z.number().int().min(0),
  pollIntervalMs: z.number().int().min(10),
  batchSize: z.number().int().min(1).max(500),
  requestTimeoutMs: z.number().int().min(100),
  /** Completed events older than this are pruned */
  completedRetentionMs: z.number().int().min(0),
  /** Events stuck in processing longer than this are released on recovery */
  staleProcessingMs: z.number().int().min(0),
  maintenanceIntervalMs: z.number().int().min(1000),
});

export const DedupConfigSchema = z.object({
  valueTolerance: z.number().min(0),
  subDayBucketMinutes: z.number().int().min(1).max(60),
});

export const ReadPathConfigSchema = z.object({
  stalenessThresholdMs: z.number().int().min(0),
});

export const AuthConfigSchema = z.object({
  /** Refresh proactively when the access token expires within this window */
  refreshSkewMs: z.number().int().min(0),
  refreshPath: z.string().startsWith('/'),
});

export const RemoteConfigSchema = z.object({
  /** PUT /records/{backendID} updates in place; when false, updates re-create */
  supportsUpsert: z.boolean(),
});

/**
 * Complete configuration schema
 */
export const SyncEngineConfigSchema = z.object({
  apiUrl: ApiUrlSchema,
  /** SQLite file path, or ':memory:' */
  dbPath: z.string().min(1).max(1000),
  timeZone: TimeZoneSchema,
  logLevel: LogLevelSchema,
  dispatcher: DispatcherConfigSchema,
  dedup: DedupConfigSchema,
  readPath: ReadPathConfigSchema,
  auth: AuthConfigSchema,
  remote: RemoteConfigSchema,
  entityTypes: z.array(EntityTypeDefinitionSchema),
});

// ============================================================================
// Type Exports
// ============================================================================

export type SyncEngineConfig = z.infer<typeof SyncEngineConfigSchema>;
export type DispatcherConfig = z.infer<typeof DispatcherConfigSchema>;
export type DedupConfig = z.infer<typeof DedupConfigSchema>;
export type ReadPathConfig = z.infer<typeof ReadPathConfigSchema>;
export type AuthConfig = z.infer<typeof AuthConfigSchema>;
export type RemoteConfig = z.infer<typeof RemoteConfigSchema>;
export type EntityTypeDefinition = z.infer<typeof EntityTypeDefinitionSchema>;
export type MergeMode = z.infer<typeof MergeModeSchema>;

/**
 * Programmatic overrides: every section may be partially specified
 */
export interface SyncEngineConfigOverrides {
  apiUrl?: string;
  dbPath?: string;
  timeZone?: string;
  logLevel?: SyncEngineConfig['logLevel'];
  dispatcher?: Partial<DispatcherConfig>;
  dedup?: Partial<DedupConfig>;
  readPath?: Partial<ReadPathConfig>;
  auth?: Partial<AuthConfig>;
  remote?: Partial<RemoteConfig>;
  entityTypes?: EntityTypeDefinition[];
}

// ============================================================================
// Default Values
// ============================================================================

export const DEFAULT_ENTITY_TYPES: EntityTypeDefinition[] = [
  { name: 'steps', hasSubDayTime: true, merge: 'sum' },
  { name: 'heart_rate', hasSubDayTime: true, merge: 'replace' },
  { name: 'water_liters', hasSubDayTime: false, merge: 'sum' },
  { name: 'calories_in', hasSubDayTime: false, merge: 'sum' },
  { name: 'active_minutes', hasSubDayTime: false, merge: 'sum' },
  { name: 'weight', hasSubDayTime: false, merge: 'replace' },
  { name: 'mood_score', hasSubDayTime: false, merge: 'replace' },
];

export const DEFAULT_CONFIG: SyncEngineConfig = {
  apiUrl: 'http://localhost:8080',
  dbPath: ':memory:',
  timeZone: 'UTC',
  logLevel: 'info',
  dispatcher: {
    maxAttempts: 5,
    baseDelayMs: 1000,
    maxDelayMs: 10 * 60 * 1000,
    jitterFactor: 0.3,
    multiplier: 2,
    minCallSpacingMs: 250,
    pollIntervalMs: 30_000,
    batchSize: 10,
    requestTimeoutMs: 15_000,
    completedRetentionMs: 24 * 60 * 60 * 1000,
    staleProcessingMs: 5 * 60 * 1000,
    maintenanceIntervalMs: 60 * 60 * 1000,
  },
  dedup: {
    valueTolerance: 0.01,
    subDayBucketMinutes: 1,
  },
  readPath: {
    stalenessThresholdMs: 60 * 60 * 1000,
  },
  auth: {
    refreshSkewMs: 60_000,
    refreshPath: '/auth/refresh',
  },
  remote: {
    supportsUpsert: true,
  },
  entityTypes: DEFAULT_ENTITY_TYPES,
};

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Validate full configuration
 * @throws ZodError on validation failure
 */
export function validateConfig(data: unknown): SyncEngineConfig {
  return SyncEngineConfigSchema.parse(data);
}

/**
 * Safe validation that returns result object
 */
export function safeValidateConfig(data: unknown) {
  return SyncEngineConfigSchema.safeParse(data);
}
