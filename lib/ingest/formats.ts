/**
 * Declarative format signatures and header alias tables, validated at load
 */

import { z } from "zod";
import formatsJson from "@/lib/ingest/formats.json";
import {
  CANONICAL_FIELDS,
  type CanonicalField,
  type CustomFieldToken,
  type FieldScope,
  type FieldToken,
} from "@/lib/ingest/types";
import type { CustomFieldType } from "@/lib/catalog/types";

const CUSTOM_TOKEN = /^custom_(global|personal)_([a-z0-9][a-z0-9_]*)$/;

const canonicalSet: ReadonlySet<string> = new Set(CANONICAL_FIELDS);

export function isCanonicalField(value: string): value is CanonicalField {
  return canonicalSet.has(value);
}

export function isCustomToken(value: string): value is CustomFieldToken {
  return CUSTOM_TOKEN.test(value);
}

export function isFieldToken(value: string): value is FieldToken {
  return isCanonicalField(value) || isCustomToken(value);
}

/**
 * Split a custom token into scope and field name
 */
export function parseCustomToken(token: string): { scope: FieldScope; name: string } | null {
  const match = token.match(CUSTOM_TOKEN);
  if (!match) return null;
  return { scope: match[1] === "global" ? "global" : "personal", name: match[2] };
}

/** Tokens that may be mapped from more than one column; values are combined */
export const MULTI_VALUED_FIELDS: ReadonlySet<FieldToken> = new Set<FieldToken>([
  "additional_authors",
  "categories",
]);

export const fieldTokenSchema = z.custom<FieldToken>(
  (value) => typeof value === "string" && isFieldToken(value),
  { message: "Unknown field token" }
);

const customFieldTypes = ["text", "textarea", "number", "date", "boolean", "tags", "url"] as const satisfies readonly CustomFieldType[];

const weightTable = z.record(z.string(), z.number().positive());
const aliasTable = z.record(z.string(), fieldTokenSchema);

const formatTableSchema = z.object({
  minConfidence: z.number().min(0).max(1),
  isbnListThreshold: z.number().min(0).max(1),
  sampleLines: z.number().int().positive(),
  signatures: z.object({
    goodreads: weightTable,
    storygraph: weightTable,
    reading_history: weightTable,
  }),
  aliases: z.object({
    goodreads: aliasTable,
    storygraph: aliasTable,
    reading_history: aliasTable,
    isbn_list: aliasTable,
  }),
  keywords: aliasTable,
  customFields: z.record(
    z.string(),
    z.object({
      displayName: z.string().min(1),
      type: z.enum(customFieldTypes),
    })
  ),
});

export type FormatTable = z.infer<typeof formatTableSchema>;

export type SignatureFormat = keyof FormatTable["signatures"];

export type AliasFormat = keyof FormatTable["aliases"];

export const SIGNATURE_FORMATS: readonly SignatureFormat[] = ["goodreads", "storygraph", "reading_history"];

export const FORMAT_TABLE: FormatTable = formatTableSchema.parse(formatsJson);
