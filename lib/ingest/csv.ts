/**
 * Delimited-file reading: delimiter sniffing, header sampling and row streaming
 */

import { createReadStream } from "fs";
import { open } from "fs/promises";
import { parse } from "csv-parse";
import { parse as parseSync } from "csv-parse/sync";
import type { Delimiter, SourceRow } from "@/lib/ingest/types";

const DELIMITERS: readonly Delimiter[] = [",", ";", "\t", "|"];
const SNIFF_BYTES = 1024;
const SAMPLE_BYTES = 64 * 1024;

export interface FileSample {
  text: string;
  /** Sample lines with the trailing partial line removed */
  lines: string[];
}

/**
 * Read the head of a file as UTF-8, BOM stripped
 */
export async function readSample(filePath: string, bytes = SAMPLE_BYTES): Promise<FileSample> {
  const handle = await open(filePath, "r");
  try {
    const buffer = Buffer.alloc(bytes);
    const { bytesRead } = await handle.read(buffer, 0, bytes, 0);
    let text = buffer.subarray(0, bytesRead).toString("utf-8");
    if (text.charCodeAt(0) === 0xfeff) {
      text = text.slice(1);
    }

    let lines = text.split(/\r?\n/);
    if (bytesRead === bytes && lines.length > 1) {
      lines = lines.slice(0, -1);
    }
    return { text, lines: lines.filter((line) => line.trim().length > 0) };
  } finally {
    await handle.close();
  }
}

function countOutsideQuotes(line: string, delimiter: Delimiter): number {
  let count = 0;
  let quoted = false;
  for (const ch of line) {
    if (ch === '"') quoted = !quoted;
    else if (ch === delimiter && !quoted) count++;
  }
  return count;
}

/**
 * Pick the delimiter that splits the first KB most consistently.
 * Falls back to comma.
 */
export function sniffDelimiter(sample: string): Delimiter {
  const lines = sample.slice(0, SNIFF_BYTES).split(/\r?\n/).filter((l) => l.trim().length > 0);
  if (lines.length === 0) return ",";

  let best: Delimiter = ",";
  let bestScore = 0;
  for (const delimiter of DELIMITERS) {
    const counts = lines.map((line) => countOutsideQuotes(line, delimiter));
    const headerCount = counts[0];
    if (headerCount === 0) continue;
    const consistent = counts.filter((c) => c === headerCount).length / counts.length;
    const score = headerCount * consistent;
    if (score > bestScore) {
      best = delimiter;
      bestScore = score;
    }
  }
  return best;
}

/**
 * Parse the sampled lines into cells. Returns an empty list for unparseable text.
 */
export function parseSampleLines(lines: string[], delimiter: Delimiter): string[][] {
  if (lines.length === 0) return [];
  try {
    const records: unknown[] = parseSync(lines.join("\n"), {
      delimiter,
      relax_quotes: true,
      relax_column_count: true,
      skip_empty_lines: true,
    });
    return records.filter(Array.isArray).map((record) => record.map((cell) => String(cell)));
  } catch {
    return lines.map((line) => [line]);
  }
}

export interface RowLayout {
  delimiter: Delimiter;
  headers: string[];
  hasHeaderRow: boolean;
}

/**
 * Stream data rows keyed by header. Rows that are blank after splitting are
 * still yielded so callers can count and skip them.
 */
export async function* streamRows(filePath: string, layout: RowLayout): AsyncGenerator<SourceRow> {
  const parser = createReadStream(filePath).pipe(
    parse({
      delimiter: layout.delimiter,
      bom: true,
      relax_quotes: true,
      relax_column_count: true,
      skip_empty_lines: true,
      from_line: layout.hasHeaderRow ? 2 : 1,
    })
  );

  let rowNumber = 0;
  for await (const record of parser) {
    if (!Array.isArray(record)) continue;
    rowNumber++;
    const values: Record<string, string> = {};
    layout.headers.forEach((header, i) => {
      const cell: unknown = record[i];
      values[header] = cell == null ? "" : String(cell);
    });
    yield { rowNumber, values };
  }
}

/**
 * Read every data row into memory
 */
export async function readAllRows(filePath: string, layout: RowLayout): Promise<SourceRow[]> {
  const rows: SourceRow[] = [];
  for await (const row of streamRows(filePath, layout)) {
    rows.push(row);
  }
  return rows;
}
