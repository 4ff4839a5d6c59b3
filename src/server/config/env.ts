/**
 * Environment Variable Validation
 *
 * Centralized validation of all environment variables.
 * Values are parsed by hand into a typed `Env`; every problem is collected and
 * reported at once so a misconfigured deployment fails on startup.
 */

// Load dotenv early to ensure environment variables are available to the first getEnv() call
import * as dotenv from 'dotenv';
dotenv.config();

import type { LLMProviderType } from '../services/llm/LLMProvider.js';

/**
 * Helper function to safely parse a number from string with default
 */
function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) ? defaultValue : num;
}

function parseFloatEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseFloat(value);
  return isNaN(num) ? defaultValue : num;
}

function parseBooleanEnv(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) return defaultValue;
  return value === 'true';
}

const LLM_PROVIDERS: readonly LLMProviderType[] = ['openai', 'anthropic', 'claude-code'];

function isLLMProviderType(value: string): value is LLMProviderType {
  return LLM_PROVIDERS.some((provider) => provider === value);
}

const DEFAULT_MODELS: Record<LLMProviderType, string> = {
  openai: 'gpt-4o-mini',
  anthropic: 'claude-3-5-sonnet-latest',
  'claude-code': 'sonnet',
};

/**
 * Environment configuration type
 */
export interface Env {
  // Server Configuration
  NODE_ENV: 'development' | 'production' | 'test';
  PORT: number;
  LOG_LEVEL?: string;
  ALLOWED_ORIGINS?: string;

  // Catalog (DataHub GMS)
  DATAHUB_GMS_URL: string;
  DATAHUB_GMS_TOKEN?: string;
  CATALOG_TIMEOUT_MS: number;
  CATALOG_MAX_ATTEMPTS: number;

  // Language model
  LLM_PROVIDER: LLMProviderType;
  LLM_MODEL: string;
  LLM_MAX_TOKENS: number;
  LLM_TEMPERATURE: number;
  OPENAI_API_KEY?: string;
  ANTHROPIC_API_KEY?: string;
  /** Executable run by the claude-code provider */
  CLAUDE_CODE_COMMAND: string;
  LLM_TIMEOUT_MS: number;
  LLM_MAX_ATTEMPTS: number;
  RETRY_BASE_DELAY_MS: number;
  RETRY_MAX_DELAY_MS: number;
  CIRCUIT_FAILURE_THRESHOLD: number;
  CIRCUIT_COOLDOWN_MS: number;

  // Orchestration
  ENRICH_CONCURRENCY: number;
  CACHE_MAX_ENTRIES: number;
  CACHE_MAX_AGE_MS: number;
  STORE_MAX_AGE_MS: number;
  APPLY_CONFIDENCE_THRESHOLD: number;

  // Feature flags
  ENABLE_COLUMN_DESCRIPTIONS: boolean;
  ENABLE_PII_DETECTION: boolean;
  ENABLE_TAG_SUGGESTIONS: boolean;
}

let validatedEnv: Env | null = null;

/**
 * Validate and parse environment variables
 * @throws Error listing every invalid variable
 */
export function validateEnv(): Env {
  if (validatedEnv) {
    return validatedEnv;
  }

  const errors: string[] = [];

  // Validate NODE_ENV
  const nodeEnv = process.env.NODE_ENV || 'development';
  if (nodeEnv !== 'development' && nodeEnv !== 'production' && nodeEnv !== 'test') {
    errors.push(`NODE_ENV: Invalid value "${nodeEnv}". Must be development, production, or test.`);
  }

  // Validate PORT
  const port = parseNumericEnv(process.env.PORT, 4000);
  if (port < 1 || port > 65535) {
    errors.push(`PORT: Invalid value "${process.env.PORT}". Must be between 1 and 65535.`);
  }

  // Validate DATAHUB_GMS_URL
  const gmsUrl = (process.env.DATAHUB_GMS_URL || 'http://localhost:8080').replace(/\/+$/, '');
  if (!/^https?:\/\//.test(gmsUrl)) {
    errors.push(`DATAHUB_GMS_URL: Invalid value "${gmsUrl}". Must be an http(s) URL.`);
  }

  // Validate LLM_PROVIDER
  const providerName = (process.env.LLM_PROVIDER || 'openai').toLowerCase();
  let provider: LLMProviderType = 'openai';
  if (isLLMProviderType(providerName)) {
    provider = providerName;
  } else {
    errors.push(`LLM_PROVIDER: Invalid value "${providerName}". Must be one of: ${LLM_PROVIDERS.join(', ')}.`);
  }

  // Validate sampling parameters
  const temperature = parseFloatEnv(process.env.LLM_TEMPERATURE, 0.3);
  if (temperature < 0 || temperature > 1) {
    errors.push(`LLM_TEMPERATURE: Invalid value "${process.env.LLM_TEMPERATURE}". Must be between 0 and 1.`);
  }

  const confidenceThreshold = parseFloatEnv(process.env.APPLY_CONFIDENCE_THRESHOLD, 0.8);
  if (confidenceThreshold < 0 || confidenceThreshold > 1) {
    errors.push(
      `APPLY_CONFIDENCE_THRESHOLD: Invalid value "${process.env.APPLY_CONFIDENCE_THRESHOLD}". Must be between 0 and 1.`
    );
  }

  // Validate positive integers
  const positive = (name: string, defaultValue: number): number => {
    const value = parseNumericEnv(process.env[name], defaultValue);
    if (value < 1) {
      errors.push(`${name}: Invalid value "${process.env[name]}". Must be a positive integer.`);
    }
    return value;
  };

  const maxTokens = positive('LLM_MAX_TOKENS', 2000);
  const llmTimeout = positive('LLM_TIMEOUT_MS', 120000);
  const llmMaxAttempts = positive('LLM_MAX_ATTEMPTS', 3);
  const retryBaseDelay = positive('RETRY_BASE_DELAY_MS', 1000);
  const retryMaxDelay = positive('RETRY_MAX_DELAY_MS', 30000);
  const circuitThreshold = positive('CIRCUIT_FAILURE_THRESHOLD', 5);
  const circuitCooldown = positive('CIRCUIT_COOLDOWN_MS', 60000);
  const catalogTimeout = positive('CATALOG_TIMEOUT_MS', 30000);
  const catalogMaxAttempts = positive('CATALOG_MAX_ATTEMPTS', 3);
  const concurrency = positive('ENRICH_CONCURRENCY', 5);
  const cacheMaxEntries = positive('CACHE_MAX_ENTRIES', 500);
  const cacheMaxAge = positive('CACHE_MAX_AGE_MS', 24 * 60 * 60 * 1000);
  const storeMaxAge = positive('STORE_MAX_AGE_MS', 7 * 24 * 60 * 60 * 1000);

  const enableDescriptions = parseBooleanEnv(process.env.ENABLE_COLUMN_DESCRIPTIONS, true);
  const enablePii = parseBooleanEnv(process.env.ENABLE_PII_DETECTION, true);
  const enableTags = parseBooleanEnv(process.env.ENABLE_TAG_SUGGESTIONS, true);
  if (!enableDescriptions && !enablePii && !enableTags) {
    errors.push('ENABLE_*: At least one of ENABLE_COLUMN_DESCRIPTIONS, ENABLE_PII_DETECTION, ENABLE_TAG_SUGGESTIONS must be true.');
  }

  if (retryMaxDelay < retryBaseDelay) {
    errors.push('RETRY_MAX_DELAY_MS: Must be greater than or equal to RETRY_BASE_DELAY_MS.');
  }

  // If there are validation errors, throw
  if (errors.length > 0) {
    throw new Error(
      `Environment variable validation failed:\n${errors.map((e) => `  - ${e}`).join('\n')}\n\n` +
        `Please check your .env file or environment variables.`
    );
  }

  // Build validated env object
  validatedEnv = {
    // Server Configuration
    NODE_ENV: nodeEnv === 'production' || nodeEnv === 'test' ? nodeEnv : 'development',
    PORT: port,
    LOG_LEVEL: process.env.LOG_LEVEL,
    ALLOWED_ORIGINS: process.env.ALLOWED_ORIGINS,

    // Catalog
    DATAHUB_GMS_URL: gmsUrl,
    DATAHUB_GMS_TOKEN: process.env.DATAHUB_GMS_TOKEN || undefined,
    CATALOG_TIMEOUT_MS: catalogTimeout,
    CATALOG_MAX_ATTEMPTS: catalogMaxAttempts,

    // Language model
    LLM_PROVIDER: provider,
    LLM_MODEL: process.env.LLM_MODEL || DEFAULT_MODELS[provider],
    LLM_MAX_TOKENS: maxTokens,
    LLM_TEMPERATURE: temperature,
    OPENAI_API_KEY: process.env.OPENAI_API_KEY || undefined,
    ANTHROPIC_API_KEY: process.env.ANTHROPIC_API_KEY || undefined,
    CLAUDE_CODE_COMMAND: process.env.CLAUDE_CODE_COMMAND || 'claude',
    LLM_TIMEOUT_MS: llmTimeout,
    LLM_MAX_ATTEMPTS: llmMaxAttempts,
    RETRY_BASE_DELAY_MS: retryBaseDelay,
    RETRY_MAX_DELAY_MS: retryMaxDelay,
    CIRCUIT_FAILURE_THRESHOLD: circuitThreshold,
    CIRCUIT_COOLDOWN_MS: circuitCooldown,

    // Orchestration
    ENRICH_CONCURRENCY: concurrency,
    CACHE_MAX_ENTRIES: cacheMaxEntries,
    CACHE_MAX_AGE_MS: cacheMaxAge,
    STORE_MAX_AGE_MS: storeMaxAge,
    APPLY_CONFIDENCE_THRESHOLD: confidenceThreshold,

    // Feature flags
    ENABLE_COLUMN_DESCRIPTIONS: enableDescriptions,
    ENABLE_PII_DETECTION: enablePii,
    ENABLE_TAG_SUGGESTIONS: enableTags,
  };

  return validatedEnv;
}

/**
 * Get validated environment variables
 * Validates on first call, then returns cached result
 */
export function getEnv(): Env {
  return validateEnv();
}

/**
 * Reset validated environment cache
 * Used for testing to allow re-validation after env vars change
 */
export function resetEnv(): void {
  validatedEnv = null;
}

/**
 * Check if running in production
 */
export function isProduction(): boolean {
  return getEnv().NODE_ENV === 'production';
}

/**
 * Check if running in test
 */
export function isTest(): boolean {
  return getEnv().NODE_ENV === 'test';
}
