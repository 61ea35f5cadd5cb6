/**
 * Normalizes an ExecuteStatement response into columns and typed cells.
 *
 * The Data API models each cell as a union with one populated member;
 * the first populated member (in the order below) wins.
 */

import type { ArrayValue, ColumnMetadata, Field } from '@aws-sdk/client-rds-data';
import type { StatementResponse } from '../aws/executor.js';

export type CellValue = string | number | boolean | null | Uint8Array | CellValue[];

export interface ResultSet {
  columns: string[];
  rows: CellValue[][];
  /** Present when the statement reported it; 0 for plain SELECTs */
  numberOfRecordsUpdated?: number;
  /** False when the response carried no column metadata (e.g. DDL, DML) */
  hasColumnMetadata: boolean;
}

function columnName(column: ColumnMetadata): string {
  return column.label || column.name || '?';
}

function arrayValue(value: ArrayValue): CellValue[] {
  if (value.booleanValues) return value.booleanValues;
  if (value.longValues) return value.longValues;
  if (value.doubleValues) return value.doubleValues;
  if (value.stringValues) return value.stringValues;
  if (value.arrayValues) return value.arrayValues.map(arrayValue);
  return [];
}

export function fieldValue(field: Field): CellValue {
  if (field.isNull) return null;
  if (field.booleanValue !== undefined) return field.booleanValue;
  if (field.longValue !== undefined) return field.longValue;
  if (field.doubleValue !== undefined) return field.doubleValue;
  if (field.stringValue !== undefined) return field.stringValue;
  if (field.blobValue !== undefined) return field.blobValue;
  if (field.arrayValue !== undefined) return arrayValue(field.arrayValue);
  return null;
}

export function toResultSet(response: StatementResponse): ResultSet {
  const metadata = response.columnMetadata;
  return {
    columns: (metadata ?? []).map(columnName),
    rows: (response.records ?? []).map((record) => record.map(fieldValue)),
    ...(response.numberOfRecordsUpdated !== undefined
      ? { numberOfRecordsUpdated: response.numberOfRecordsUpdated }
      : {}),
    hasColumnMetadata: metadata !== undefined,
  };
}
