import type { Env } from '../../config/env.js';
import type { SuggestionKind } from '../../types/enrichment.js';
import type { CatalogClient } from '../catalog/CatalogClient.js';
import { DataHubCatalogClient } from '../catalog/DataHubCatalogClient.js';
import type { LLMProvider } from '../llm/LLMProvider.js';
import { createLLMProvider } from '../llm/providerFactory.js';
import { EnrichmentEngine } from './EnrichmentEngine.js';
import { FingerprintCache } from './FingerprintCache.js';
import { SuggestionGenerator } from './SuggestionGenerator.js';
import { InMemorySuggestionStore } from './SuggestionStore.js';

export interface EnrichmentServices {
  engine: EnrichmentEngine;
  catalog: CatalogClient;
  provider: LLMProvider;
}

export function enabledSuggestionKinds(env: Env): SuggestionKind[] {
  const kinds: SuggestionKind[] = [];
  if (env.ENABLE_COLUMN_DESCRIPTIONS) kinds.push('description');
  if (env.ENABLE_PII_DETECTION) kinds.push('pii_tag');
  if (env.ENABLE_TAG_SUGGESTIONS) kinds.push('tag');
  return kinds;
}

/**
 * Wire the engine and its collaborators from configuration.
 * Everything is constructed here and lives as long as the returned engine.
 */
export function createEnrichmentServices(
  env: Env,
  overrides: { catalog?: CatalogClient; provider?: LLMProvider } = {}
): EnrichmentServices {
  const catalog =
    overrides.catalog ??
    new DataHubCatalogClient({
      gmsUrl: env.DATAHUB_GMS_URL,
      token: env.DATAHUB_GMS_TOKEN,
      timeoutMs: env.CATALOG_TIMEOUT_MS,
      maxAttempts: env.CATALOG_MAX_ATTEMPTS,
      retryBaseDelayMs: env.RETRY_BASE_DELAY_MS,
      retryMaxDelayMs: env.RETRY_MAX_DELAY_MS,
    });
  const provider = overrides.provider ?? createLLMProvider(env);

  const generator = new SuggestionGenerator({
    provider,
    model: env.LLM_MODEL,
    maxTokens: env.LLM_MAX_TOKENS,
    temperature: env.LLM_TEMPERATURE,
    timeoutMs: env.LLM_TIMEOUT_MS,
    maxAttempts: env.LLM_MAX_ATTEMPTS,
    baseDelayMs: env.RETRY_BASE_DELAY_MS,
    maxDelayMs: env.RETRY_MAX_DELAY_MS,
    circuitFailureThreshold: env.CIRCUIT_FAILURE_THRESHOLD,
    circuitCooldownMs: env.CIRCUIT_COOLDOWN_MS,
    enabledKinds: enabledSuggestionKinds(env),
  });

  const engine = new EnrichmentEngine({
    catalog,
    generator,
    cache: new FingerprintCache({ maxEntries: env.CACHE_MAX_ENTRIES, maxAgeMs: env.CACHE_MAX_AGE_MS }),
    store: new InMemorySuggestionStore(catalog, {
      confidenceThreshold: env.APPLY_CONFIDENCE_THRESHOLD,
      maxAgeMs: env.STORE_MAX_AGE_MS,
    }),
    concurrency: env.ENRICH_CONCURRENCY,
  });

  return { engine, catalog, provider };
}
