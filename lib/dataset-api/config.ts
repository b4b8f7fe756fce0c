import { z } from 'zod';
import { ConfigError } from './errors';
import type { SubstitutionRule, TokenHeaderScheme } from './types';

const DEFAULT_API_BASE = 'api-us.kurtosys.app';

const optionalString = z
  .string()
  .optional()
  .transform(value => (value && value.trim().length > 0 ? value.trim() : undefined));

const timeoutMs = (fallback: number) =>
  z.coerce.number().int('must be a whole number of milliseconds').positive().default(fallback);

/**
 * Dataset migration configuration schema
 * Validates the environment variables that drive both environments and the pipeline
 */
const MigrationEnvSchema = z.object({
  DATASETS_API_BASE: z.string().min(1, 'DATASETS_API_BASE must not be empty').default(DEFAULT_API_BASE),
  SOURCE_API_BASE: optionalString,
  DESTINATION_API_BASE: optionalString,
  SOURCE_USERNAME: z.string().default(''),
  SOURCE_PASSWORD: z.string().default(''),
  SOURCE_CLIENT_NAME: z.string().default(''),
  DESTINATION_USERNAME: z.string().default(''),
  DESTINATION_PASSWORD: z.string().default(''),
  DESTINATION_CLIENT_NAME: z.string().default(''),
  DATASETS_MODE: z.enum(['migration', 'standard']).default('migration'),
  DATASETS_FIND_1: z.string().default('KURTOSYS_RPT_STG.NRC.'),
  DATASETS_REPLACE_1: z.string().default('KURTOSYS_RPT_PRD.NRC.'),
  DATASETS_FIND_2: z.string().default('snowflake_ntam_staging'),
  DATASETS_REPLACE_2: z.string().default('snowflake_ntam_prod'),
  DATASETS_STAGING_DIR: z.string().min(1).default('input_files'),
  DATASETS_CODES_FILE: z.string().min(1).default('dataset_codes.json'),
  DATASETS_TOKEN_HEADER: z
    .string()
    .regex(/^[A-Za-z0-9-]+$/, 'DATASETS_TOKEN_HEADER must be a valid header name')
    .default('Authorization'),
  DATASETS_AUTH_TIMEOUT_MS: timeoutMs(12_000),
  DATASETS_REQUEST_TIMEOUT_MS: timeoutMs(30_000),
});

export interface EnvironmentCredentials {
  username: string;
  password: string;
  clientName: string;
}

export interface EnvironmentConfig {
  baseUrl: string;
  credentials: EnvironmentCredentials;
}

export interface MigrationConfig {
  source: EnvironmentConfig;
  destination: EnvironmentConfig;
  mode: 'migration' | 'standard';
  rules: SubstitutionRule[];
  stagingDir: string;
  codesFile: string;
  tokenHeader: TokenHeaderScheme;
  timeouts: {
    authMs: number;
    requestMs: number;
  };
}

/**
 * Map a header name onto the token scheme: `Authorization` means a bearer token,
 * anything else carries the raw token in that header
 */
export function parseTokenHeader(headerName: string): TokenHeaderScheme {
  if (headerName.toLowerCase() === 'authorization') {
    return { kind: 'bearer' };
  }
  return { kind: 'header', name: headerName };
}

/**
 * Load and validate migration configuration from environment variables
 *
 * @throws {ConfigError} If any variable is present but invalid
 */
export function loadMigrationConfig(env: NodeJS.ProcessEnv = process.env): MigrationConfig {
  const parsed = MigrationEnvSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError('Dataset migration configuration validation failed', issues);
  }

  const vars = parsed.data;
  const sharedBase = vars.DATASETS_API_BASE.trim();

  return {
    source: {
      baseUrl: vars.SOURCE_API_BASE ?? sharedBase,
      credentials: {
        username: vars.SOURCE_USERNAME,
        password: vars.SOURCE_PASSWORD,
        clientName: vars.SOURCE_CLIENT_NAME,
      },
    },
    destination: {
      baseUrl: vars.DESTINATION_API_BASE ?? sharedBase,
      credentials: {
        username: vars.DESTINATION_USERNAME,
        password: vars.DESTINATION_PASSWORD,
        clientName: vars.DESTINATION_CLIENT_NAME,
      },
    },
    mode: vars.DATASETS_MODE,
    rules: [
      { find: vars.DATASETS_FIND_1, replace: vars.DATASETS_REPLACE_1 },
      { find: vars.DATASETS_FIND_2, replace: vars.DATASETS_REPLACE_2 },
    ],
    stagingDir: vars.DATASETS_STAGING_DIR,
    codesFile: vars.DATASETS_CODES_FILE,
    tokenHeader: parseTokenHeader(vars.DATASETS_TOKEN_HEADER),
    timeouts: {
      authMs: vars.DATASETS_AUTH_TIMEOUT_MS,
      requestMs: vars.DATASETS_REQUEST_TIMEOUT_MS,
    },
  };
}

/**
 * Get missing credential variables for one environment
 * Useful for telling the user what to set before authenticating
 */
export function getMissingCredentials(
  role: 'source' | 'destination',
  env: NodeJS.ProcessEnv = process.env
): string[] {
  const prefix = role === 'source' ? 'SOURCE' : 'DESTINATION';
  const missing: string[] = [];

  if (!env[`${prefix}_USERNAME`]) missing.push(`${prefix}_USERNAME`);
  if (!env[`${prefix}_PASSWORD`]) missing.push(`${prefix}_PASSWORD`);
  if (!env[`${prefix}_CLIENT_NAME`]) missing.push(`${prefix}_CLIENT_NAME`);

  return missing;
}
