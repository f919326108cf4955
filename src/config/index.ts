/**
 * Configuration for request pipelines.
 * @module config
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import { LogLevel } from '../observability/logging.js';

// ============================================================================
// Default Constants
// ============================================================================

/** Library version reported in the default User-Agent. */
export const VERSION = '0.1.0';

/** URL a request description falls back to when it names none. */
export const DEFAULT_BASE_URL = 'http://localhost';

/** Default request timeout in milliseconds. */
export const DEFAULT_TIMEOUT = 30000;

/** Default User-Agent header. */
export const DEFAULT_USER_AGENT = `requestable/${VERSION}`;

// ============================================================================
// Pipeline Configuration
// ============================================================================

/**
 * Pipeline configuration.
 */
export interface PipelineConfig {
  /** Base URL for descriptions that do not set one. */
  defaultBaseUrl: string;
  /** Transport timeout in milliseconds. */
  timeout: number;
  /** User-Agent sent by the pipeline's default builders. */
  userAgent: string;
  /** Minimum log level. */
  logLevel: LogLevel;
}

// ============================================================================
// Zod Validation Schemas
// ============================================================================

function hasHost(value: string): boolean {
  try {
    return new URL(value).host !== '';
  } catch {
    return false;
  }
}

const urlSchema = z.string().url().refine(hasHost, { message: 'URL must include a host' });

/**
 * Zod schema for pipeline configuration.
 */
export const PipelineConfigSchema = z.object({
  defaultBaseUrl: urlSchema,
  timeout: z.number().int().positive(),
  userAgent: z.string().min(1),
  logLevel: z.nativeEnum(LogLevel),
});

// ============================================================================
// Configuration Factory
// ============================================================================

export function createDefaultConfig(): PipelineConfig {
  return {
    defaultBaseUrl: DEFAULT_BASE_URL,
    timeout: DEFAULT_TIMEOUT,
    userAgent: DEFAULT_USER_AGENT,
    logLevel: LogLevel.Info,
  };
}

/**
 * Validates a configuration and returns it.
 *
 * @throws {ConfigurationError} listing every invalid field
 */
export function validateConfig(config: PipelineConfig): PipelineConfig {
  const result = PipelineConfigSchema.safeParse(config);
  if (!result.success) {
    const fields = [...new Set(result.error.issues.map((issue) => issue.path.join('.')))];
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid pipeline configuration: ${details}`, fields);
  }
  return result.data;
}

/**
 * Merges `overrides` onto the defaults and validates the result.
 */
export function createConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  return validateConfig({ ...createDefaultConfig(), ...overrides });
}

/**
 * Environment variables read by {@link configFromEnv}.
 */
export const ENV_VARS = {
  baseUrl: 'REQUESTABLE_BASE_URL',
  timeout: 'REQUESTABLE_TIMEOUT',
  userAgent: 'REQUESTABLE_USER_AGENT',
  logLevel: 'REQUESTABLE_LOG_LEVEL',
} as const;

/**
 * Builds a configuration from environment variables, defaults filling gaps.
 *
 * @throws {ConfigurationError} if a variable holds an invalid value
 */
export function configFromEnv(
  env: Record<string, string | undefined> = process.env
): PipelineConfig {
  const overrides: Partial<PipelineConfig> = {};

  const baseUrl = env[ENV_VARS.baseUrl];
  if (baseUrl) {
    overrides.defaultBaseUrl = baseUrl;
  }

  const timeout = env[ENV_VARS.timeout];
  if (timeout) {
    const ms = Number(timeout);
    if (!Number.isInteger(ms)) {
      throw new ConfigurationError(`${ENV_VARS.timeout} must be an integer, got '${timeout}'`, [
        'timeout',
      ]);
    }
    overrides.timeout = ms;
  }

  const userAgent = env[ENV_VARS.userAgent];
  if (userAgent) {
    overrides.userAgent = userAgent;
  }

  const logLevel = env[ENV_VARS.logLevel];
  if (logLevel) {
    const parsed = z.nativeEnum(LogLevel).safeParse(logLevel.toLowerCase());
    if (!parsed.success) {
      throw new ConfigurationError(`${ENV_VARS.logLevel} must be one of debug, info, warn, error`, [
        'logLevel',
      ]);
    }
    overrides.logLevel = parsed.data;
  }

  return createConfig(overrides);
}
