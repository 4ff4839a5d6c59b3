import type { LLMMessage } from '../llm/LLMProvider.js';
import type { SchemaSnapshot, SuggestionKind } from '../../types/enrichment.js';

const SYSTEM_PROMPT = `You are a data catalog curator. You document datasets for analysts and flag columns that hold personal or sensitive data.
Answer with a single JSON object and nothing else.`;

const KIND_INSTRUCTIONS: Record<SuggestionKind, string> = {
  description:
    '- "description": a one or two sentence business description of a column. Only for columns without a useful description.',
  pii_tag:
    '- "pii_tag": the kind of personal or sensitive data a column holds (email, phone, name, address, national_id, birth_date, ip_address, financial, health, credential). Only where the column plausibly holds it.',
  tag: '- "tag": a short lowercase classification tag (e.g. "customer", "finance", "metric"). Leave "column" null for a tag on the whole dataset.',
};

function describeColumns(schema: SchemaSnapshot): string {
  return schema.columns
    .map((column) => {
      let line = `- ${column.name} (${column.nativeType}${column.nullable ? ', nullable' : ''})`;
      if (column.description) {
        line += `\n  Description: ${column.description}`;
      }
      if (column.tags.length > 0) {
        line += `\n  Tags: ${column.tags.join(', ')}`;
      }
      return line;
    })
    .join('\n');
}

/**
 * One prompt covers every enabled suggestion kind for the whole schema
 */
export function buildEnrichmentMessages(schema: SchemaSnapshot, kinds: readonly SuggestionKind[]): LLMMessage[] {
  const header = [
    `Dataset: ${schema.name ?? schema.datasetId}`,
    `Platform: ${schema.platform}`,
    ...(schema.description ? [`Description: ${schema.description}`] : []),
    ...(schema.tags.length > 0 ? [`Tags: ${schema.tags.join(', ')}`] : []),
  ].join('\n');

  const user = `${header}

Columns:
${describeColumns(schema)}

Propose metadata suggestions of these kinds:
${kinds.map((kind) => KIND_INSTRUCTIONS[kind]).join('\n')}

Respond with JSON in exactly this shape:
{
  "suggestions": [
    {
      "column": "column name exactly as listed, or null",
      "kind": "${kinds.join('|')}",
      "value": "proposed text or tag",
      "confidence": 0.0,
      "rationale": "brief explanation"
    }
  ]
}

"confidence" is a number between 0 and 1. Return an empty "suggestions" array if nothing applies.`;

  return [
    { role: 'system', content: SYSTEM_PROMPT },
    { role: 'user', content: user },
  ];
}
