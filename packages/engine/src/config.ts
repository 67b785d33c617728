import { z } from 'zod';
import { DEFAULT_BITRATE_TOLERANCE_PERCENT } from '@flowmesh/core/domain';

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  // Reconciliation
  bitrateTolerancePercent: z.number().min(0).max(100).default(DEFAULT_BITRATE_TOLERANCE_PERCENT),
  ignoreDestinationPort: z.boolean().default(false),

  // Parameter group used to resolve physical interface ids (optional)
  interfaceParameterGroupId: z.number().int().positive().optional(),

  // Table storage (PostgreSQL); in-memory only when unset
  databaseUrl: z.string().url('DATABASE_URL must be a valid PostgreSQL URL').optional(),

  // Environment
  nodeEnv: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Options the reconciliation calls take explicitly.
 */
export type ReconcileOptions = Pick<Config, 'bitrateTolerancePercent' | 'ignoreDestinationPort'>;

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  return Number(value);
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return value === 'true' || value === '1';
}

/**
 * Parse environment variables into configuration
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw = {
    bitrateTolerancePercent: parseNumber(env['FLOW_BITRATE_TOLERANCE_PERCENT']),
    ignoreDestinationPort: parseBoolean(env['FLOW_IGNORE_DESTINATION_PORT']),
    interfaceParameterGroupId: parseNumber(env['FLOW_INTERFACE_PARAMETER_GROUP_ID']),
    databaseUrl: env['DATABASE_URL'] || undefined,
    nodeEnv: env['NODE_ENV'] || 'development',
    logLevel: env['LOG_LEVEL'] || 'info',
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return result.data;
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

// For testing - allow resetting config
export function resetConfig(): void {
  configInstance = null;
}
