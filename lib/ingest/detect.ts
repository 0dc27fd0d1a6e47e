/**
 * Format detection and field mapping for uploaded export files
 */

import { ImportFormatError, MappingError } from "@/lib/ingest/errors";
import { parseSampleLines, readSample, sniffDelimiter, type FileSample } from "@/lib/ingest/csv";
import {
  FORMAT_TABLE,
  MULTI_VALUED_FIELDS,
  SIGNATURE_FORMATS,
  isFieldToken,
  type AliasFormat,
  type SignatureFormat,
} from "@/lib/ingest/formats";
import type { DetectionResult, FieldMapping, FieldToken, ImportFormat } from "@/lib/ingest/types";
import type { MappingTemplate } from "@/lib/templates/types";
import { looksLikeIsbn } from "@/lib/util/isbn";
import { logger } from "@/lib/util/logger";

const ISBN_LIST_HEADER = "ISBN";

/** A saved template is offered only above this header overlap */
export const TEMPLATE_MATCH_THRESHOLD = 0.5;

function headerKey(header: string): string {
  return header.trim().toLowerCase().replace(/\s+/g, " ");
}

/**
 * Weighted signature score per known format: matched weight / total weight
 */
export function scoreFormats(headers: string[]): Record<SignatureFormat, number> {
  const present = new Set(headers.map(headerKey));
  const scores: Record<SignatureFormat, number> = { goodreads: 0, storygraph: 0, reading_history: 0 };

  for (const format of SIGNATURE_FORMATS) {
    const weights = Object.entries(FORMAT_TABLE.signatures[format]);
    const total = weights.reduce((sum, [, weight]) => sum + weight, 0);
    const matched = weights
      .filter(([header]) => present.has(header))
      .reduce((sum, [, weight]) => sum + weight, 0);
    scores[format] = total > 0 ? matched / total : 0;
  }
  return scores;
}

/**
 * Highest-scoring format at or above the confidence floor; ties are unknown
 */
export function classifyHeaders(headers: string[]): { format: ImportFormat; confidence: number } {
  const ranked = Object.entries(scoreFormats(headers)).sort(([, a], [, b]) => b - a);
  const [best, runnerUp] = ranked;
  if (!best) return { format: "unknown", confidence: 0 };

  const [format, confidence] = best;
  if (confidence < FORMAT_TABLE.minConfidence) {
    return { format: "unknown", confidence };
  }
  if (runnerUp && runnerUp[1] === confidence) {
    return { format: "unknown", confidence };
  }
  const known = SIGNATURE_FORMATS.find((f) => f === format);
  return known ? { format: known, confidence } : { format: "unknown", confidence };
}

/**
 * Share of sampled data lines that hold a single ISBN-shaped token.
 * A first line that is itself an ISBN means there is no header row.
 */
export function isbnListShare(rows: string[][]): { share: number; hasHeaderRow: boolean } {
  const singleToken = (row: string[]) => {
    const cells = row.map((c) => c.trim()).filter(Boolean);
    return cells.length === 1 && looksLikeIsbn(cells[0]);
  };

  if (rows.length === 0) return { share: 0, hasHeaderRow: false };
  const hasHeaderRow = !singleToken(rows[0]);
  const data = hasHeaderRow ? rows.slice(1) : rows;
  if (data.length === 0) return { share: 0, hasHeaderRow };

  return { share: data.filter(singleToken).length / data.length, hasHeaderRow };
}

function aliasFor(format: ImportFormat, header: string): FieldToken | undefined {
  const key = headerKey(header);
  if (format === "unknown") {
    const literal = header.trim();
    if (isFieldToken(literal)) return literal;
    return FORMAT_TABLE.keywords[key];
  }
  const table: AliasFormat = format;
  return FORMAT_TABLE.aliases[table][key];
}

/**
 * Propose a mapping for the headers. Single-valued tokens go to the first
 * column that claims them.
 */
export function buildMapping(format: ImportFormat, headers: string[]): FieldMapping {
  const mapping: FieldMapping = [];
  const claimed = new Set<FieldToken>();

  for (const column of headers) {
    const token = aliasFor(format, column);
    if (!token) continue;
    if (claimed.has(token) && !MULTI_VALUED_FIELDS.has(token)) continue;
    claimed.add(token);
    mapping.push({ column, token });
  }
  return mapping;
}

/**
 * Validate a caller-supplied mapping against the file's headers
 */
export function validateMapping(
  entries: ReadonlyArray<{ column: string; token: string }>,
  headers?: string[]
): FieldMapping {
  const known = headers ? new Set(headers) : null;
  const columns = new Set<string>();
  const tokens = new Set<string>();
  const mapping: FieldMapping = [];

  for (const { column, token } of entries) {
    if (!isFieldToken(token)) {
      throw new MappingError(`Unknown field "${token}" for column "${column}"`);
    }
    if (known && !known.has(column)) {
      throw new MappingError(`Column "${column}" is not in the file header`);
    }
    if (columns.has(column)) {
      throw new MappingError(`Column "${column}" is mapped more than once`);
    }
    if (tokens.has(token) && !MULTI_VALUED_FIELDS.has(token)) {
      throw new MappingError(`Field "${token}" is mapped from more than one column`);
    }
    columns.add(column);
    tokens.add(token);
    mapping.push({ column, token });
  }
  return mapping;
}

export function mappedTokens(mapping: FieldMapping): Set<FieldToken> {
  return new Set(mapping.map((entry) => entry.token));
}

/**
 * Header overlap between a file and a saved template: shared headers over the
 * longer of the two header rows
 */
export function headerMatchScore(headers: string[], templateHeaders: string[]): number {
  const present = new Set(headers.map(headerKey).filter(Boolean));
  const saved = new Set(templateHeaders.map(headerKey).filter(Boolean));
  const longest = Math.max(present.size, saved.size);
  if (longest === 0) return 0;

  let matches = 0;
  for (const key of saved) {
    if (present.has(key)) matches++;
  }
  return matches / longest;
}

export interface TemplateMatch {
  template: MappingTemplate;
  score: number;
}

/**
 * Best-scoring template above the threshold; the earlier candidate wins a tie
 */
export function pickTemplate(headers: string[], templates: readonly MappingTemplate[]): TemplateMatch | null {
  let best: TemplateMatch | null = null;
  for (const template of templates) {
    const score = headerMatchScore(headers, template.headers);
    if (score <= TEMPLATE_MATCH_THRESHOLD) continue;
    if (!best || score > best.score) best = { template, score };
  }
  return best;
}

/**
 * The template's mapping, restated against the file's own header spelling.
 * Columns the file lacks are dropped.
 */
export function applyTemplate(template: MappingTemplate, headers: string[]): FieldMapping {
  const byKey = new Map<string, string>();
  for (const header of headers) {
    const key = headerKey(header);
    if (!byKey.has(key)) byKey.set(key, header);
  }

  const entries: FieldMapping = [];
  for (const { column, token } of template.mapping) {
    const actual = byKey.get(headerKey(column));
    if (actual !== undefined) entries.push({ column: actual, token });
  }
  return validateMapping(entries, headers);
}

export interface TemplateDetectionOptions {
  /** Candidates scored against the header row */
  templates?: readonly MappingTemplate[];
  /** Applied whatever its score */
  template?: MappingTemplate;
}

export interface TemplatedDetection extends DetectionResult {
  template: { id: string; name: string; score: number } | null;
}

/**
 * Like detectSample, but a chosen or matching saved template supplies the
 * mapping ahead of the keyword tables
 */
export function detectWithTemplates(sample: FileSample, options: TemplateDetectionOptions = {}): TemplatedDetection {
  const delimiter = sniffDelimiter(sample.text);
  const rows = parseSampleLines(sample.lines.slice(0, 1), delimiter);
  const headers = rows.length > 0 ? rows[0].map((h) => h.trim()) : [];

  let match: TemplateMatch | null = null;
  if (options.template) {
    match = { template: options.template, score: headerMatchScore(headers, options.template.headers) };
  } else if (options.templates && headers.length > 0) {
    match = pickTemplate(headers, options.templates);
  }

  if (match) {
    const mapping = applyTemplate(match.template, headers);
    if (mapping.length === 0) {
      throw new MappingError(`Template "${match.template.name}" matches no column in the file`);
    }
    const classified = classifyHeaders(headers);
    return {
      format: classified.format === "unknown" ? match.template.sourceFormat : classified.format,
      confidence: match.score,
      delimiter,
      headers,
      hasHeaderRow: true,
      mapping,
      template: { id: match.template.id, name: match.template.name, score: match.score },
    };
  }
  return { ...detectSample(sample), template: null };
}

/**
 * Classify a file sample and propose its mapping. Throws ImportFormatError when
 * the sample has no usable header and is not an ISBN list.
 */
export function detectSample(sample: FileSample): DetectionResult {
  const delimiter = sniffDelimiter(sample.text);
  const rows = parseSampleLines(sample.lines.slice(0, FORMAT_TABLE.sampleLines + 1), delimiter);
  if (rows.length === 0) {
    throw new ImportFormatError("The file is empty");
  }

  const headers = rows[0].map((h) => h.trim());
  const { format, confidence } = classifyHeaders(headers);

  if (format !== "unknown") {
    return { format, confidence, delimiter, headers, hasHeaderRow: true, mapping: buildMapping(format, headers) };
  }

  const isbnList = isbnListShare(rows);
  if (isbnList.share >= FORMAT_TABLE.isbnListThreshold) {
    if (!isbnList.hasHeaderRow) {
      return {
        format: "isbn_list",
        confidence: isbnList.share,
        delimiter,
        headers: [ISBN_LIST_HEADER],
        hasHeaderRow: false,
        mapping: [{ column: ISBN_LIST_HEADER, token: "isbn" }],
      };
    }
    const column = headers.find((h) => h.length > 0) ?? ISBN_LIST_HEADER;
    return {
      format: "isbn_list",
      confidence: isbnList.share,
      delimiter,
      headers,
      hasHeaderRow: true,
      mapping: [{ column, token: "isbn" }],
    };
  }

  const mapping = buildMapping("unknown", headers);
  if (mapping.length === 0) {
    throw new ImportFormatError("No recognizable header row and not an ISBN list");
  }
  return { format: "unknown", confidence, delimiter, headers, hasHeaderRow: true, mapping };
}

/**
 * Detect the format of a file on disk
 */
export async function detectFile(
  filePath: string,
  options: TemplateDetectionOptions = {}
): Promise<TemplatedDetection> {
  let sample: FileSample;
  try {
    sample = await readSample(filePath);
  } catch (error) {
    throw new ImportFormatError(`Could not read upload: ${String(error)}`);
  }
  const result = detectWithTemplates(sample, options);
  logger.debug("Detected import format", {
    format: result.format,
    confidence: Number(result.confidence.toFixed(3)),
    columns: result.mapping.length,
    template: result.template?.id ?? null,
  });
  return result;
}
