import type { CatalogClient, ListDatasetsOptions } from '../../services/catalog/CatalogClient.js';
import type { LLMGenerateOptions, LLMMessage, LLMProvider, LLMResponse } from '../../services/llm/LLMProvider.js';
import { DatasetNotFoundError } from '../../types/errors.js';
import type { Column, DatasetSummary, SchemaSnapshot } from '../../types/enrichment.js';

export function makeColumn(name: string, nativeType = 'VARCHAR', extra: Partial<Column> = {}): Column {
  return { name, nativeType, nullable: true, tags: [], ...extra };
}

export function makeSchema(
  datasetId: string,
  columns: readonly (string | Column)[],
  extra: Partial<Omit<SchemaSnapshot, 'datasetId' | 'columns'>> = {}
): SchemaSnapshot {
  return {
    datasetId,
    platform: 'postgres',
    tags: [],
    ...extra,
    columns: columns.map((column) => (typeof column === 'string' ? makeColumn(column) : column)),
  };
}

export interface CatalogWrite {
  operation: 'description' | 'tag';
  datasetId: string;
  columnName?: string;
  value: string;
}

/**
 * In-memory catalog. Unknown datasets raise DatasetNotFoundError like the real client.
 */
export class FakeCatalogClient implements CatalogClient {
  readonly schemas = new Map<string, SchemaSnapshot>();
  /** Errors thrown by fetchSchema for specific datasets */
  readonly fetchFailures = new Map<string, unknown>();
  readonly writes: CatalogWrite[] = [];
  readonly fetched: string[] = [];
  writeFailure: unknown = undefined;
  /** Optional hook run before a write resolves */
  beforeWrite: (() => Promise<void>) | undefined = undefined;
  /** When set, writes show up in later fetches the way DataHub's editable aspects do */
  reflectWrites = false;

  constructor(schemas: readonly SchemaSnapshot[] = []) {
    for (const schema of schemas) {
      this.schemas.set(schema.datasetId, schema);
    }
  }

  setSchema(schema: SchemaSnapshot): void {
    this.schemas.set(schema.datasetId, schema);
  }

  async fetchSchema(datasetId: string): Promise<SchemaSnapshot> {
    this.fetched.push(datasetId);
    const failure = this.fetchFailures.get(datasetId);
    if (failure !== undefined) {
      throw failure;
    }
    const schema = this.schemas.get(datasetId);
    if (!schema) {
      throw new DatasetNotFoundError(datasetId);
    }
    return schema;
  }

  async writeDescription(datasetId: string, columnName: string, text: string): Promise<void> {
    await this.write({ operation: 'description', datasetId, columnName, value: text });
  }

  async addTag(datasetId: string, columnName: string | undefined, tag: string): Promise<void> {
    await this.write({
      operation: 'tag',
      datasetId,
      ...(columnName !== undefined ? { columnName } : {}),
      value: tag,
    });
  }

  async listDatasets(options: ListDatasetsOptions = {}): Promise<DatasetSummary[]> {
    return [...this.schemas.values()]
      .filter((schema) => !options.platform || schema.platform === options.platform)
      .slice(0, options.limit)
      .map((schema) => ({ datasetId: schema.datasetId, platform: schema.platform }));
  }

  async checkConnection(): Promise<void> {}

  private async write(write: CatalogWrite): Promise<void> {
    if (this.beforeWrite) {
      await this.beforeWrite();
    }
    if (this.writeFailure !== undefined) {
      throw this.writeFailure;
    }
    this.writes.push(write);
    if (this.reflectWrites) {
      this.reflect(write);
    }
  }

  private reflect(write: CatalogWrite): void {
    const schema = this.schemas.get(write.datasetId);
    if (!schema) {
      return;
    }
    if (write.columnName === undefined) {
      this.schemas.set(write.datasetId, { ...schema, tags: [...schema.tags, write.value] });
      return;
    }
    const columns = schema.columns.map((column): Column => {
      if (column.name !== write.columnName) {
        return column;
      }
      return write.operation === 'description'
        ? { ...column, description: write.value }
        : { ...column, tags: [...column.tags, write.value] };
    });
    this.schemas.set(write.datasetId, { ...schema, columns });
  }
}

export type ScriptedReply = string | Error;

/**
 * Provider whose answers come from a function of the user prompt and the
 * 1-based call number.
 */
export class ScriptedLLMProvider implements LLMProvider {
  readonly calls: { prompt: string; options?: LLMGenerateOptions }[] = [];

  constructor(
    private readonly respond: (prompt: string, call: number) => ScriptedReply | Promise<ScriptedReply>,
    private readonly name = 'scripted'
  ) {}

  /**
   * Replies in order; the last one repeats once the list runs out
   */
  static sequence(replies: readonly ScriptedReply[]): ScriptedLLMProvider {
    return new ScriptedLLMProvider((_prompt, call) => replies[Math.min(call, replies.length) - 1]);
  }

  async generate(messages: LLMMessage[], options?: LLMGenerateOptions): Promise<LLMResponse> {
    const prompt = messages.find((message) => message.role === 'user')?.content ?? '';
    this.calls.push({ prompt, options });
    const reply = await this.respond(prompt, this.calls.length);
    if (reply instanceof Error) {
      throw reply;
    }
    return { content: reply, model: 'test-model' };
  }

  getName(): string {
    return this.name;
  }
}

export interface CandidateInput {
  column?: string | null;
  kind: string;
  value: string;
  confidence?: number | string | null;
  rationale?: string;
}

export function suggestionsJson(candidates: readonly CandidateInput[]): string {
  return JSON.stringify({ suggestions: candidates });
}

/** Resolves immediately; keeps retry tests off the clock */
export const noSleep = async (): Promise<void> => {};
