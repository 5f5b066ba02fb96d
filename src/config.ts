/**
 * Centralized Configuration Module
 *
 * Type-safe configuration loaded from environment variables (and a `.env`
 * file, if present) and validated with zod.
 *
 * Usage:
 *   import { config, validateConfig } from './config';
 *
 *   console.log(config.server.port);
 *   console.log(config.database.path);
 *
 *   // Stricter checks before serving in production (throws if invalid)
 *   validateConfig();
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';

// =============================================================================
// Configuration Schema
// =============================================================================

const DEFAULT_MODEL = 'claude-3-5-haiku-latest';

/**
 * Optional positive integer read from a string variable. Blank values fall
 * back to the default.
 */
function positiveInt(defaultValue: number) {
  return z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.coerce.number().int().positive().default(defaultValue)
  );
}

const configSchema = z.object({
  server: z.object({
    port: positiveInt(3000),
    host: z.string().default('0.0.0.0'),
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  }),

  database: z.object({
    path: z.string().min(1).default('abc-drill.db'),
  }),

  anthropic: z.object({
    apiKey: z.string().optional(),
    model: z.string().default(DEFAULT_MODEL),
    maxTokens: positiveInt(1024),
  }),

  suggestions: z.object({
    perKey: positiveInt(3),
  }),

  cors: z.object({
    allowedOrigins: z.array(z.string()).default([]),
  }),
});

export type Config = z.infer<typeof configSchema>;

// =============================================================================
// Environment Variable Loading
// =============================================================================

/**
 * Parse a comma-separated string into an array of trimmed strings.
 * Returns an empty array if the input is undefined or empty.
 */
function parseCommaSeparated(value: string | undefined): string[] {
  if (!value || value.trim() === '') {
    return [];
  }
  return value.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
}

/**
 * Builds the raw, unvalidated config from an environment map.
 */
function loadFromEnvironment(env: NodeJS.ProcessEnv): Record<string, unknown> {
  return {
    server: {
      port: env.PORT,
      host: env.HOST,
      nodeEnv: env.NODE_ENV || undefined,
    },
    database: {
      path: env.DATABASE_PATH || undefined,
    },
    anthropic: {
      apiKey: env.ANTHROPIC_API_KEY || undefined,
      model: env.ANTHROPIC_MODEL || undefined,
      maxTokens: env.ANTHROPIC_MAX_TOKENS,
    },
    suggestions: {
      perKey: env.SUGGESTIONS_PER_KEY,
    },
    cors: {
      allowedOrigins: parseCommaSeparated(env.ALLOWED_ORIGINS),
    },
  };
}

/**
 * Parses configuration from the given environment.
 *
 * @throws ZodError if a variable has the wrong shape (e.g. PORT=abc)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return configSchema.parse(loadFromEnvironment(env));
}

// =============================================================================
// Configuration Validation
// =============================================================================

/**
 * Configuration validation error with detailed information about missing/invalid values.
 */
export class ConfigValidationError extends Error {
  public readonly missingVars: string[];
  public readonly invalidVars: { name: string; reason: string }[];

  constructor(
    message: string,
    missingVars: string[] = [],
    invalidVars: { name: string; reason: string }[] = []
  ) {
    super(message);
    this.name = 'ConfigValidationError';
    this.missingVars = missingVars;
    this.invalidVars = invalidVars;
  }
}

/**
 * Production checks on top of the schema.
 *
 * The drill itself runs without an API key; only suggestion generation
 * needs one. In production a missing key or a database in memory is
 * treated as a misconfiguration.
 *
 * @throws {ConfigValidationError} If required configuration is missing in production
 */
export function validateConfig(target: Config = config): void {
  if (target.server.nodeEnv !== 'production') {
    return;
  }

  const missingVars: string[] = [];
  const invalidVars: { name: string; reason: string }[] = [];

  if (!target.anthropic.apiKey) {
    missingVars.push('ANTHROPIC_API_KEY');
  }

  if (target.database.path === ':memory:') {
    invalidVars.push({
      name: 'DATABASE_PATH',
      reason: 'an in-memory database loses all knowledge sets on restart',
    });
  }

  if (missingVars.length === 0 && invalidVars.length === 0) {
    return;
  }

  const errorParts: string[] = [];
  if (missingVars.length > 0) {
    errorParts.push(`Missing required environment variables: ${missingVars.join(', ')}`);
  }
  if (invalidVars.length > 0) {
    errorParts.push(
      `Invalid configuration: ${invalidVars.map((v) => `${v.name}: ${v.reason}`).join('; ')}`
    );
  }

  throw new ConfigValidationError(errorParts.join('\n'), missingVars, invalidVars);
}

// =============================================================================
// Configuration Export
// =============================================================================

const parseResult = configSchema.safeParse(loadFromEnvironment(process.env));

if (!parseResult.success) {
  console.error('Invalid configuration schema:');
  console.error(parseResult.error.format());
  process.exit(1);
}

/**
 * The validated, type-safe configuration object, parsed once at load time.
 */
export const config: Config = parseResult.data;

export function isProduction(): boolean {
  return config.server.nodeEnv === 'production';
}

export function isTest(): boolean {
  return config.server.nodeEnv === 'test';
}

export default config;
