/**
 * =============================================================================
 * ENVIRONMENT CONFIGURATION
 * =============================================================================
 *
 * Centralized configuration loaded from environment variables.
 * All config access goes through this file - no direct process.env usage elsewhere.
 *
 * API KEYS:
 * - Both keys are optional at startup
 * - Operations that need a key fail with ConfigurationError when it is missing
 * - Reverse geocoding is skipped silently without a geocoder key
 *
 * FOR DEVELOPERS:
 * - Clients take an AppConfig instance, build one with buildConfig(env) in tests
 * - Add new config here, not scattered across the codebase
 * =============================================================================
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { TIMEOUTS } from '../core/constants';

// Load .env file
dotenv.config();

type Env = Record<string, string | undefined>;

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * First non-empty value among several variable names
 */
function getFirst(env: Env, keys: string[]): string {
  for (const key of keys) {
    const value = env[key];
    if (value && value.trim() !== '') {
      return value.trim();
    }
  }
  return '';
}

/**
 * Get optional environment variable with default
 */
function getOptional(env: Env, key: string, defaultValue: string): string {
  return env[key] || defaultValue;
}

/**
 * Get number environment variable
 */
function getNumber(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) || parsed <= 0 ? defaultValue : parsed;
}

// =============================================================================
// CONFIGURATION SCHEMA
// =============================================================================

/**
 * Routing profiles:
 * - routing:    JSON POST to /routing/7.0.0/global (generic driving default)
 * - carrouting: query-string GET to /carrouting/7.0.0/global (truck default)
 */
export const routingProfileSchema = z.enum(['routing', 'carrouting']);
export type RoutingProfile = z.infer<typeof routingProfileSchema>;

const logLevelSchema = z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']);

export interface AppConfig {
  nodeEnv: string;
  logLevel: z.infer<typeof logLevelSchema>;

  routing: {
    apiKey: string;
    profile: RoutingProfile;
    baseUrl: string;
    locale: string;
    timeoutMs: number;
  };

  geocoder: {
    apiKey: string;
    url: string;
    lang: string;
    timeoutMs: number;
  };

  isProduction: boolean;
  isTest: boolean;
}

// =============================================================================
// CONFIGURATION OBJECT
// =============================================================================

/**
 * Build a configuration object from an environment map.
 * Throws with every invalid value listed.
 */
export function buildConfig(env: Env): AppConfig {
  const errors: string[] = [];

  const profile = routingProfileSchema.safeParse(getOptional(env, 'ROUTING_PROFILE', 'routing'));
  if (!profile.success) {
    errors.push(`ROUTING_PROFILE must be one of: ${routingProfileSchema.options.join(', ')}`);
  }

  const logLevel = logLevelSchema.safeParse(getOptional(env, 'LOG_LEVEL', 'info'));
  if (!logLevel.success) {
    errors.push(`LOG_LEVEL must be one of: ${logLevelSchema.options.join(', ')}`);
  }

  if (!profile.success || !logLevel.success) {
    throw new Error(`Configuration Errors:\n${errors.map(e => `  - ${e}`).join('\n')}`);
  }

  const nodeEnv = getOptional(env, 'NODE_ENV', 'development');

  return {
    nodeEnv,
    logLevel: logLevel.data,

    // 2GIS Routing API
    routing: {
      apiKey: getFirst(env, ['ROUTING_API_KEY', 'API_KEY']),
      profile: profile.data,
      baseUrl: getOptional(env, 'ROUTING_BASE_URL', 'https://routing.api.2gis.com'),
      locale: getOptional(env, 'ROUTING_LOCALE', 'ru'),
      timeoutMs: getNumber(env, 'ROUTING_TIMEOUT_MS', TIMEOUTS.ROUTING),
    },

    // Yandex Geocoder
    geocoder: {
      apiKey: getFirst(env, ['GEOCODER_API_KEY', 'YANDEX_API_KEY']),
      url: getOptional(env, 'GEOCODER_URL', 'https://geocode-maps.yandex.ru/1.x'),
      lang: getOptional(env, 'GEOCODER_LANG', 'ru_RU'),
      timeoutMs: getNumber(env, 'GEOCODER_TIMEOUT_MS', TIMEOUTS.GEOCODER),
    },

    isProduction: nodeEnv === 'production',
    isTest: nodeEnv === 'test',
  };
}

/**
 * Application configuration, read once at startup
 */
export const config: AppConfig = buildConfig(process.env);

// =============================================================================
// CONFIGURATION SUMMARY
// =============================================================================
/**
 * QUICK REFERENCE:
 *
 * 1. Routing (required to compute routes):
 *    ROUTING_API_KEY=...            (API_KEY is accepted too)
 *    ROUTING_PROFILE=routing        (or carrouting)
 *
 * 2. Geocoding (required for address-only points):
 *    GEOCODER_API_KEY=...           (YANDEX_API_KEY is accepted too)
 *
 * 3. Timeouts:
 *    ROUTING_TIMEOUT_MS=15000
 *    GEOCODER_TIMEOUT_MS=10000
 */
