/**
 * Resolve custom field tokens to definitions before any row is processed
 */

import type { Catalog, CustomFieldDefinition, CustomFieldType } from "@/lib/catalog/types";
import { FORMAT_TABLE, parseCustomToken } from "@/lib/ingest/formats";
import type { CustomFieldToken, FieldMapping, FieldScope, SourceRow } from "@/lib/ingest/types";
import { cleanCell, humanize, normalizeDate } from "@/lib/util/text";
import { logger as rootLogger, type Logger } from "@/lib/util/logger";

/** Global fields written from enrichment results */
export const ENRICHMENT_FIELD_TOKENS: readonly CustomFieldToken[] = [
  "custom_global_google_books_id",
  "custom_global_openlibrary_id",
];

/** Leading rows read when guessing the type of an unconfigured field */
export const TYPE_SAMPLE_ROWS = 10;

const NUMERIC = /^[+-]?(\d+\.?\d*|\.\d+)$/;
const BOOLEAN_WORDS = new Set(["true", "false", "yes", "no", "1", "0", "y", "n"]);
const DATE_SHARE = 0.8;

function definitionKey(scope: FieldScope, name: string): string {
  return `${scope}:${name}`;
}

function looksLikeDate(value: string): boolean {
  return value.length >= 8 && /[-/]/.test(value) && normalizeDate(value) !== null;
}

/**
 * Guess a field type from sample cells: number, boolean, date (most samples
 * parse), else text
 */
export function inferFieldType(samples: readonly string[]): CustomFieldType {
  const values = samples.map((sample) => cleanCell(sample)).filter(Boolean);
  if (values.length === 0) return "text";

  if (values.every((value) => NUMERIC.test(value))) return "number";
  if (values.every((value) => BOOLEAN_WORDS.has(value.toLowerCase()))) return "boolean";
  if (values.filter(looksLikeDate).length >= values.length * DATE_SHARE) return "date";
  return "text";
}

export interface EnsureFieldsOptions {
  /** Tokens to provision even though no column maps to them */
  extraTokens?: readonly CustomFieldToken[];
  /** Leading data rows of the file, sampled for field types */
  sampleRows?: readonly SourceRow[];
  log?: Logger;
}

/**
 * Ensure every custom token in the mapping (plus any extra tokens) has a
 * definition visible to the owner, creating missing ones from the field
 * config table or, for unconfigured fields, the column's sampled values.
 * Returns the definitions that were created.
 */
export async function ensureCustomFields(
  catalog: Catalog,
  owner: string,
  mapping: FieldMapping,
  options: EnsureFieldsOptions = {}
): Promise<CustomFieldDefinition[]> {
  const { extraTokens = [], sampleRows = [], log = rootLogger } = options;
  const wanted = new Map<string, { scope: FieldScope; name: string; column: string | null }>();
  for (const { column, token } of mapping) {
    const parsed = parseCustomToken(token);
    if (parsed) wanted.set(definitionKey(parsed.scope, parsed.name), { ...parsed, column });
  }
  for (const token of extraTokens) {
    const parsed = parseCustomToken(token);
    if (parsed && !wanted.has(definitionKey(parsed.scope, parsed.name))) {
      wanted.set(definitionKey(parsed.scope, parsed.name), { ...parsed, column: null });
    }
  }
  if (wanted.size === 0) return [];

  const existing = await catalog.listFieldDefinitions(owner);
  const known = new Set(existing.map((def) => definitionKey(def.scope, def.name)));
  const created: CustomFieldDefinition[] = [];

  for (const [key, field] of wanted) {
    if (known.has(key)) continue;

    const config: { displayName: string; type: CustomFieldType } | undefined = FORMAT_TABLE.customFields[field.name];
    const column = field.column;
    const type =
      config?.type ??
      (column
        ? inferFieldType(sampleRows.slice(0, TYPE_SAMPLE_ROWS).map((row) => row.values[column] ?? ""))
        : "text");
    const definition = await catalog.createFieldDefinition(owner, {
      name: field.name,
      displayName: config?.displayName ?? humanize(field.name),
      type,
      scope: field.scope,
      createdBy: owner,
      description: field.column
        ? `Auto-created during import for column "${field.column}"`
        : "Auto-created during import for enrichment data",
    });
    created.push(definition);
    log.info("Created custom field", { name: field.name, scope: field.scope, type });
  }

  return created;
}
