/**
 * Model response decoding
 *
 * Turns raw completion text into candidate suggestions. Each candidate is
 * decoded and checked on its own so one bad entry never costs the others.
 */

import { candidateSuggestionSchema, suggestionEnvelopeSchema } from '../../validation/enrichmentSchemas.js';
import type { CandidateSuggestion } from '../../validation/enrichmentSchemas.js';
import type { SchemaSnapshot, SuggestionKind } from '../../types/enrichment.js';
import { normalizeIdentifier } from '../../utils/fingerprints.js';

export type CandidateDecision =
  | { status: 'accepted'; candidate: CandidateSuggestion }
  | { status: 'rejected'; reason: string };

export interface ParsedSuggestions {
  accepted: CandidateSuggestion[];
  /** Candidates that failed decoding or validation; an undecodable response counts as one */
  dropped: number;
  rejections: string[];
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Index just past the bracket that closes the one at `start`, or -1
 */
function findBalancedEnd(text: string, start: number): number {
  const stack: string[] = [];
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }
    if (char === '"') {
      inString = true;
    } else if (char === '{' || char === '[') {
      stack.push(char === '{' ? '}' : ']');
    } else if (char === '}' || char === ']') {
      if (stack.pop() !== char) {
        return -1;
      }
      if (stack.length === 0) {
        return i + 1;
      }
    }
  }
  return -1;
}

/**
 * Pull a JSON value out of model output: the whole text, then a fenced code
 * block, then the first balanced object or array.
 *
 * @returns undefined when nothing decodes
 */
export function extractJson(text: string): unknown {
  const trimmed = text.trim();
  if (!trimmed) {
    return undefined;
  }

  const direct = tryParse(trimmed);
  if (direct.ok) {
    return direct.value;
  }

  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(trimmed);
  if (fenced) {
    const parsed = tryParse(fenced[1].trim());
    if (parsed.ok) {
      return parsed.value;
    }
  }

  for (let start = 0; start < trimmed.length; start++) {
    const char = trimmed[start];
    if (char !== '{' && char !== '[') {
      continue;
    }
    const end = findBalancedEnd(trimmed, start);
    if (end === -1) {
      continue;
    }
    const parsed = tryParse(trimmed.slice(start, end));
    if (parsed.ok) {
      return parsed.value;
    }
  }

  return undefined;
}

/**
 * Decode the response envelope into one decision per element
 *
 * @returns null when the text holds no recognizable envelope
 */
export function decodeCandidates(text: string): CandidateDecision[] | null {
  const envelope = suggestionEnvelopeSchema.safeParse(extractJson(text));
  if (!envelope.success) {
    return null;
  }
  const elements = Array.isArray(envelope.data) ? envelope.data : envelope.data.suggestions;

  return elements.map((element): CandidateDecision => {
    const result = candidateSuggestionSchema.safeParse(element);
    if (result.success) {
      return { status: 'accepted', candidate: result.data };
    }
    const issue = result.error.issues[0];
    return {
      status: 'rejected',
      reason: issue ? `${issue.path.join('.') || 'candidate'}: ${issue.message}` : 'invalid candidate',
    };
  });
}

function candidateKey(candidate: CandidateSuggestion): string {
  return [candidate.column ?? '', candidate.kind, candidate.value.toLowerCase()].join('\u0000');
}

export type ColumnMatch = { status: 'found'; name: string } | { status: 'missing' } | { status: 'ambiguous' };

/**
 * Resolve a column name against a schema: the exact spelling wins, otherwise a
 * case-insensitive match if exactly one column has it.
 */
export function createColumnResolver(schema: SchemaSnapshot): (name: string) => ColumnMatch {
  const exact = new Set(schema.columns.map((column) => column.name));
  const folded = new Map<string, string[]>();
  for (const column of schema.columns) {
    const key = normalizeIdentifier(column.name);
    folded.set(key, [...(folded.get(key) ?? []), column.name]);
  }

  return (name) => {
    if (exact.has(name)) {
      return { status: 'found', name };
    }
    const matches = folded.get(normalizeIdentifier(name)) ?? [];
    if (matches.length === 1) {
      return { status: 'found', name: matches[0] };
    }
    return matches.length === 0 ? { status: 'missing' } : { status: 'ambiguous' };
  };
}

/**
 * Check decoded candidates against the schema they were generated for.
 * Column names are rewritten to the schema's spelling.
 */
export function validateCandidates(
  decisions: readonly CandidateDecision[],
  schema: SchemaSnapshot,
  enabledKinds: readonly SuggestionKind[]
): ParsedSuggestions {
  const resolveColumn = createColumnResolver(schema);
  const seen = new Set<string>();
  const accepted: CandidateSuggestion[] = [];
  const rejections: string[] = [];

  for (const decision of decisions) {
    if (decision.status === 'rejected') {
      rejections.push(decision.reason);
      continue;
    }

    const { candidate } = decision;
    if (!enabledKinds.includes(candidate.kind)) {
      rejections.push(`kind: '${candidate.kind}' is disabled`);
      continue;
    }

    let column: string | undefined;
    if (candidate.column !== undefined) {
      const match = resolveColumn(candidate.column);
      if (match.status === 'missing') {
        rejections.push(`column: '${candidate.column}' does not exist in ${schema.datasetId}`);
        continue;
      }
      if (match.status === 'ambiguous') {
        rejections.push(`column: '${candidate.column}' matches more than one column of ${schema.datasetId} by case`);
        continue;
      }
      column = match.name;
    } else if (candidate.kind === 'description') {
      rejections.push('column: a description must target a column');
      continue;
    }

    const normalized: CandidateSuggestion = { ...candidate, column };
    const key = candidateKey(normalized);
    if (seen.has(key)) {
      rejections.push(`duplicate ${candidate.kind} for '${column ?? schema.datasetId}'`);
      continue;
    }
    seen.add(key);
    accepted.push(normalized);
  }

  return { accepted, dropped: rejections.length, rejections };
}

/**
 * Decode and validate a raw completion in one step
 */
export function parseSuggestionResponse(
  text: string,
  schema: SchemaSnapshot,
  enabledKinds: readonly SuggestionKind[]
): ParsedSuggestions {
  const decisions = decodeCandidates(text);
  if (decisions === null) {
    return { accepted: [], dropped: 1, rejections: ['response: no JSON suggestion list found'] };
  }
  return validateCandidates(decisions, schema, enabledKinds);
}
