/**
 * Output formatters: csv (default), json, raw.
 */

import type { StatementResponse } from '../aws/executor.js';
import { toResultSet, type CellValue, type ResultSet } from './result.js';

export type OutputFormat = 'csv' | 'json' | 'raw';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['csv', 'json', 'raw'];

/** Case-insensitive; returns null for unknown names. */
export function parseOutputFormat(value: string): OutputFormat | null {
  const lowered = value.toLowerCase();
  return OUTPUT_FORMATS.find((format) => format === lowered) ?? null;
}

function base64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64');
}

type JsonValue = string | number | boolean | null | JsonValue[];

function toJsonValue(value: CellValue): JsonValue {
  if (value instanceof Uint8Array) return base64(value);
  if (Array.isArray(value)) return value.map(toJsonValue);
  return value;
}

function toCsvText(value: CellValue): string {
  if (value === null) return '';
  if (value instanceof Uint8Array) return base64(value);
  if (Array.isArray(value)) return JSON.stringify(toJsonValue(value));
  return String(value);
}

function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function csvLine(values: string[]): string {
  return `${values.map(escapeCsvField).join(',')}\n`;
}

export function formatCsv(result: ResultSet): string {
  let out = '';
  const updated = result.numberOfRecordsUpdated;
  if (updated !== undefined && (updated > 0 || !result.hasColumnMetadata)) {
    out += `number_of_records_updated: ${updated}\n`;
  }
  if (result.columns.length > 0) {
    out += csvLine(result.columns);
  }
  for (const row of result.rows) {
    out += csvLine(row.map(toCsvText));
  }
  return out;
}

/**
 * One object per row, keys in column order. Objects are written from the
 * (column, value) pairs, so numeric-looking and repeated names stay as given.
 */
export function formatJson(result: ResultSet): string {
  const records = result.rows.map((row) => {
    const pairs = result.columns.map(
      (column, i) => `${JSON.stringify(column)}:${JSON.stringify(i < row.length ? toJsonValue(row[i]) : null)}`,
    );
    return `{${pairs.join(',')}}`;
  });
  return `[${records.join(',')}]`;
}

/** The whole API response, blobs as base64. */
export function formatRaw(response: StatementResponse): string {
  return JSON.stringify(
    response,
    (_key, value: unknown) => (value instanceof Uint8Array ? base64(value) : value),
    2,
  );
}

/** Render a response; the returned text always ends with a newline. */
export function formatResponse(format: OutputFormat, response: StatementResponse): string {
  switch (format) {
    case 'csv':
      return formatCsv(toResultSet(response));
    case 'json':
      return `${formatJson(toResultSet(response))}\n`;
    case 'raw':
      return `${formatRaw(response)}\n`;
  }
}

export { toResultSet, fieldValue } from './result.js';
export type { CellValue, ResultSet } from './result.js';
