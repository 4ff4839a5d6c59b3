#!/usr/bin/env node
/**
 * Enrichment CLI
 *
 * Runs the enrichment pipelines against the configured catalog and model
 * without starting the HTTP server.
 *
 * Usage:
 *   tsx src/server/scripts/enrich-cli.ts <command> [options]
 *
 * Commands:
 *   enrich <dataset-id> [--apply] [--override] [--output <file>]
 *       Enrich one dataset; with --apply, apply every suggestion right away
 *   batch [dataset-id...] [--platform <name>] [--limit <n>] [--concurrency <n>] [--output <file>]
 *       Enrich the listed datasets, or the datasets the catalog lists
 *   test-connection
 *       Check that the catalog is reachable with the configured token
 */

import { realpathSync } from 'fs';
import { writeFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { getEnv } from '../config/env.js';
import { createEnrichmentServices } from '../services/enrichment/index.js';
import type { BatchResult } from '../services/enrichment/EnrichmentEngine.js';
import type { SuggestionBatch } from '../types/enrichment.js';
import { logger } from '../utils/logger.js';

export type CliCommand = 'enrich' | 'batch' | 'test-connection';

export interface CliOptions {
  command: CliCommand;
  datasetIds: string[];
  apply: boolean;
  override: boolean;
  output?: string;
  platform?: string;
  limit?: number;
  concurrency?: number;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

const COMMANDS: readonly CliCommand[] = ['enrich', 'batch', 'test-connection'];

function isCliCommand(value: string): value is CliCommand {
  return COMMANDS.some((command) => command === value);
}

function parsePositiveInt(flag: string, value: string | undefined): number {
  const parsed = value === undefined ? NaN : parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new CliUsageError(`${flag} expects a positive integer, got "${value ?? ''}"`);
  }
  return parsed;
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith('--')) {
    throw new CliUsageError(`${flag} expects a value`);
  }
  return value;
}

export function parseArgs(argv: readonly string[]): CliOptions {
  const [commandArg, ...args] = argv;
  if (commandArg === undefined || !isCliCommand(commandArg)) {
    throw new CliUsageError(`Unknown command: ${commandArg ?? '(none)'}. Expected one of: ${COMMANDS.join(', ')}`);
  }

  const options: CliOptions = { command: commandArg, datasetIds: [], apply: false, override: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--apply') {
      options.apply = true;
    } else if (arg === '--override') {
      options.override = true;
    } else if (arg === '--output') {
      options.output = requireValue(arg, args[++i]);
    } else if (arg === '--platform') {
      options.platform = requireValue(arg, args[++i]);
    } else if (arg === '--limit') {
      options.limit = parsePositiveInt(arg, args[++i]);
    } else if (arg === '--concurrency') {
      options.concurrency = parsePositiveInt(arg, args[++i]);
    } else if (arg.startsWith('--')) {
      throw new CliUsageError(`Unknown option: ${arg}`);
    } else {
      options.datasetIds.push(arg);
    }
  }

  if (options.command === 'enrich' && options.datasetIds.length !== 1) {
    throw new CliUsageError('enrich expects exactly one dataset identifier');
  }
  if (options.override && !options.apply) {
    throw new CliUsageError('--override only applies together with --apply');
  }

  return options;
}

/**
 * 0 when every dataset succeeded, 1 otherwise
 */
export function batchExitCode(result: BatchResult): number {
  return result.summary.failed === 0 && result.summary.cancelled === 0 && !result.summary.aborted ? 0 : 1;
}

export interface InterruptSource {
  once(event: 'SIGINT', listener: () => void): unknown;
  removeListener(event: 'SIGINT', listener: () => void): unknown;
}

/**
 * Cancel the running command on the first Ctrl+C. The listener is gone after
 * that, so a second one stops the process outright.
 */
export function abortOnInterrupt(source: InterruptSource = process): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onInterrupt = () => {
    console.error('\n⚠️  Interrupted, cancelling (press Ctrl+C again to exit immediately)');
    controller.abort();
  };
  source.once('SIGINT', onInterrupt);
  return {
    signal: controller.signal,
    dispose: () => {
      source.removeListener('SIGINT', onInterrupt);
    },
  };
}

function printBatch(batch: SuggestionBatch): void {
  console.log(`\n${batch.datasetId}${batch.cacheHit ? ' (cached)' : ''}`);
  console.log('─'.repeat(60));
  for (const suggestion of batch.suggestions) {
    const target = suggestion.columnName ?? '<dataset>';
    console.log(`  [${suggestion.kind}] ${target}: ${suggestion.value} (${suggestion.confidence.toFixed(2)})`);
  }
  console.log(`  ${batch.suggestions.length} suggestion(s), ${batch.droppedCount} dropped`);
}

async function writeOutput(path: string | undefined, payload: unknown): Promise<void> {
  if (!path) {
    return;
  }
  await writeFile(path, `${JSON.stringify(payload, null, 2)}\n`, 'utf-8');
  console.log(`\nResults written to ${path}`);
}

async function main(): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(`❌ ${error.message}`);
      return 2;
    }
    throw error;
  }

  const interrupt = abortOnInterrupt();
  try {
    return await runCommand(options, interrupt.signal);
  } finally {
    interrupt.dispose();
  }
}

async function runCommand(options: CliOptions, signal: AbortSignal): Promise<number> {
  const env = getEnv();
  const { engine, catalog } = createEnrichmentServices(env);

  switch (options.command) {
    case 'test-connection': {
      await catalog.checkConnection();
      console.log(`✅ Connected to ${env.DATAHUB_GMS_URL}`);
      return 0;
    }

    case 'enrich': {
      const [datasetId] = options.datasetIds;
      const result = await engine.enrichDataset(datasetId, { signal });
      if (!result.ok) {
        console.error(`❌ ${result.error.code}: ${result.error.message}`);
        return 1;
      }
      printBatch(result.batch);

      if (!options.apply) {
        await writeOutput(options.output, result.batch);
        return 0;
      }

      const report = await engine.applySuggestions(
        result.batch.suggestions.map((suggestion) => suggestion.id),
        { override: options.override }
      );
      for (const outcome of report.outcomes) {
        console.log(`  ${outcome.suggestionId}: ${outcome.result}${outcome.detail ? ` (${outcome.detail})` : ''}`);
      }
      await writeOutput(options.output, { batch: result.batch, apply: report });
      return report.summary.failed === 0 ? 0 : 1;
    }

    case 'batch': {
      let datasetIds = options.datasetIds;
      if (datasetIds.length === 0) {
        const listed = await catalog.listDatasets({ platform: options.platform, limit: options.limit });
        datasetIds = listed.map((dataset) => dataset.datasetId);
        console.log(`Found ${datasetIds.length} dataset(s) in the catalog`);
      }
      if (datasetIds.length === 0) {
        console.log('Nothing to enrich');
        return 0;
      }

      const result = await engine.enrichBatch(datasetIds, { concurrency: options.concurrency, signal });
      for (const entry of result.entries) {
        if (entry.batch) {
          printBatch(entry.batch);
        } else {
          console.log(`\n${entry.datasetId}: ${entry.status}${entry.error ? ` (${entry.error.code}: ${entry.error.message})` : ''}`);
        }
      }

      const { summary } = result;
      console.log(
        `\nSucceeded: ${summary.succeeded}, failed: ${summary.failed}, cancelled: ${summary.cancelled}, ` +
          `cache hits: ${summary.cacheHits}, suggestions: ${summary.suggestions}, dropped: ${summary.dropped}`
      );
      if (summary.aborted) {
        console.error(`⚠️  Batch aborted: ${summary.aborted.reason}`);
      }
      await writeOutput(options.output, result);
      return batchExitCode(result);
    }
  }
}

// Run if called directly (the bin entry is a symlink)
if (process.argv[1] && realpathSync(process.argv[1]) === fileURLToPath(import.meta.url)) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      logger.error({ error }, 'Enrichment CLI failed');
      console.error('❌ Error:', error instanceof Error ? error.message : error);
      process.exitCode = 1;
    });
}
