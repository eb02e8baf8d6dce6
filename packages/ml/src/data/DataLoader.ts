/**
 * DataLoader - reads delimited tabular datasets into memory
 */

import { promises as fs } from 'fs';
import { parse } from 'csv-parse/sync';
import {
  CATEGORICAL_FEATURES,
  LabeledCreditRecord,
  MLError,
  MLErrorCode,
  NUMERIC_FEATURES,
  ScoredLabel,
} from '@creditops/types';

/** Cells stay as read; typed conversion happens per column when mapping records */
export interface DataTable {
  columns: string[];
  rows: Array<Record<string, string>>;
}

export interface LoadOptions {
  delimiter?: string;
}

export interface RecordMapping {
  idColumn?: string;
  targetColumn?: string;
}

function isStringMatrix(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === 'string'))
  );
}

const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

/**
 * Parse delimited text with a header row
 */
export function parseDataset(content: string, options: LoadOptions = {}): DataTable {
  let matrix: unknown;
  try {
    matrix = parse(content, {
      delimiter: options.delimiter ?? ',',
      skip_empty_lines: true,
      trim: true,
      relax_column_count: true,
    });
  } catch (error) {
    throw new MLError(
      MLErrorCode.DATA_LOAD_FAILED,
      `Malformed dataset: ${error instanceof Error ? error.message : String(error)}`,
      error
    );
  }

  if (!isStringMatrix(matrix) || matrix.length === 0) {
    throw new MLError(MLErrorCode.DATA_LOAD_FAILED, 'Dataset has no header row');
  }

  const [columns, ...body] = matrix;

  if (new Set(columns).size !== columns.length) {
    throw new MLError(MLErrorCode.DATA_LOAD_FAILED, 'Dataset header has duplicate columns');
  }

  const rows = body.map((cells, index) => {
    if (cells.length !== columns.length) {
      // header is line 1
      throw new MLError(
        MLErrorCode.DATA_LOAD_FAILED,
        `Row ${index + 2} has ${cells.length} fields, expected ${columns.length}`
      );
    }
    const row: Record<string, string> = {};
    columns.forEach((column, i) => {
      row[column] = cells[i];
    });
    return row;
  });

  return { columns, rows };
}

/**
 * Read a whole dataset file into memory
 */
export async function loadDataset(filePath: string, options: LoadOptions = {}): Promise<DataTable> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new MLError(
      MLErrorCode.DATA_LOAD_FAILED,
      `Cannot read dataset ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      error
    );
  }
  return parseDataset(content, options);
}

function numericCell(row: Record<string, string>, column: string, line: number): number {
  const value = row[column];
  if (!DECIMAL.test(value)) {
    throw new MLError(
      MLErrorCode.DATA_LOAD_FAILED,
      `Row ${line}: column ${column} must be numeric, got "${value}"`
    );
  }
  return Number(value);
}

function targetCell(row: Record<string, string>, column: string, line: number): ScoredLabel {
  const value = row[column];
  if (value === '0') {
    return 0;
  }
  if (value === '1') {
    return 1;
  }
  throw new MLError(MLErrorCode.DATA_LOAD_FAILED, `Row ${line}: target ${column} must be 0 or 1, got "${value}"`);
}

/**
 * Map table rows onto labeled credit records
 */
export function toLabeledRecords(table: DataTable, mapping: RecordMapping = {}): LabeledCreditRecord[] {
  const idColumn = mapping.idColumn ?? 'account_id';
  const targetColumn = mapping.targetColumn ?? 'bad_ind';

  const required = [idColumn, targetColumn, ...NUMERIC_FEATURES, ...CATEGORICAL_FEATURES];
  const missing = required.filter((column) => !table.columns.includes(column));
  if (missing.length > 0) {
    throw new MLError(MLErrorCode.DATA_LOAD_FAILED, `Dataset is missing columns: ${missing.join(', ')}`);
  }

  return table.rows.map((row, index) => {
    const line = index + 2;
    return {
      account_id: row[idColumn],
      amount_6: numericCell(row, 'amount_6', line),
      pur_6: numericCell(row, 'pur_6', line),
      avg_pur_amt_6: numericCell(row, 'avg_pur_amt_6', line),
      avg_interval_pur_6: numericCell(row, 'avg_interval_pur_6', line),
      credit_limit: numericCell(row, 'credit_limit', line),
      marital_status: row.marital_status,
      sex: row.sex,
      education: row.education,
      income: numericCell(row, 'income', line),
      age: numericCell(row, 'age', line),
      bad_ind: targetCell(row, targetColumn, line),
    };
  });
}
