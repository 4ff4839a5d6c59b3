/**
 * Fingerprint Utilities
 *
 * Deterministic fingerprinting for catalog schemas. The fingerprint is both the
 * Fingerprint Cache key and the staleness check applied before write-back.
 */

import { createHash } from 'crypto';
import type { SchemaSnapshot } from '../types/enrichment.js';

/**
 * Normalize text for fingerprinting:
 * - Trim whitespace
 * - Collapse multiple whitespace to single space
 * - Normalize newlines to \n
 */
export function normalizeTextForFingerprint(text: string): string {
  return text
    .trim()
    .replace(/\r\n/g, '\n') // Normalize Windows line endings
    .replace(/\r/g, '\n') // Normalize Mac line endings
    .replace(/[ \t]+/g, ' ') // Collapse horizontal whitespace
    .replace(/\n\s+/g, '\n') // Remove leading whitespace after newlines
    .replace(/\s+\n/g, '\n') // Remove trailing whitespace before newlines
    .replace(/\n{3,}/g, '\n\n'); // Collapse multiple newlines to double newline max
}

/**
 * Identifiers (column names, types, tags, platforms) compare case-insensitively
 */
export function normalizeIdentifier(identifier: string): string {
  return identifier.trim().toLowerCase();
}

function normalizeTags(tags: readonly string[]): string[] {
  return [...new Set(tags.map(normalizeIdentifier))].sort();
}

/**
 * Canonical form of a schema. The dataset identifier is deliberately left out:
 * two datasets with the same shape share one fingerprint.
 */
export function normalizeSchemaForFingerprint(schema: SchemaSnapshot): unknown {
  return {
    platform: normalizeIdentifier(schema.platform),
    columns: schema.columns.map((column) => ({
      name: normalizeIdentifier(column.name),
      type: normalizeIdentifier(column.nativeType),
      nullable: column.nullable,
      description: normalizeTextForFingerprint(column.description ?? ''),
      tags: normalizeTags(column.tags),
    })),
    tags: normalizeTags(schema.tags),
  };
}

/**
 * Compute SHA-256 fingerprint of a normalized schema
 *
 * @returns 64-character hex string (sha256)
 */
export function computeSchemaFingerprint(schema: SchemaSnapshot): string {
  const normalized = JSON.stringify(normalizeSchemaForFingerprint(schema));
  return createHash('sha256').update(normalized, 'utf8').digest('hex');
}
