import { scalerConstants } from '../config/config.js';
import { ValidationError, type ValidationErrorCode } from '../errors/index.js';
import type { Cell, MetricSample, QueryColumn, QueryResult, QueryResultTable } from '../types/query.types.js';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const numericTypes: readonly string[] = scalerConstants.query.numericColumnTypes;

interface CellRules {
  label: 'metric' | 'threshold';
  invalidType: ValidationErrorCode;
  notNumeric: ValidationErrorCode;
  negative: ValidationErrorCode;
}

const valueRules: CellRules = {
  label: 'metric',
  invalidType: 'INVALID_VALUE_TYPE',
  notNumeric: 'VALUE_NOT_NUMERIC',
  negative: 'NEGATIVE_VALUE',
};

const thresholdRules: CellRules = {
  label: 'threshold',
  invalidType: 'INVALID_THRESHOLD_TYPE',
  notNumeric: 'THRESHOLD_NOT_NUMERIC',
  negative: 'NEGATIVE_THRESHOLD',
};

/**
 * Whether a parsed body has the shape of a query result document:
 * an object whose tables, when present, are an array of objects
 */
export function isQueryDocument(raw: unknown): boolean {
  if (!isRecord(raw)) {
    return false;
  }
  if (raw.tables === undefined) {
    return true;
  }
  return Array.isArray(raw.tables) && raw.tables.every(isRecord);
}

function fail(code: ValidationErrorCode, details: string): never {
  throw new ValidationError(code, `Error validating Log Analytics request. Details: ${details}`);
}

/**
 * Result Validator
 *
 * Turns the untyped query response into a MetricSample.
 * Decoding is generic (tagged cells); validation is strict and checks both
 * the declared column type and the decoded representation.
 *
 * Expected shape: one table, one row; column 0 holds the metric value,
 * optional column 1 holds a threshold override.
 */
export class ResultValidator {
  /**
   * Decodes a parsed JSON document into tables of tagged cells
   */
  decode(raw: unknown): QueryResult {
    if (!isRecord(raw) || !Array.isArray(raw.tables)) {
      return { tables: [] };
    }
    return { tables: raw.tables.map((table) => this.decodeTable(table)) };
  }

  /**
   * Extracts the metric sample, threshold is -1 when the row has no threshold cell
   * @throws ValidationError describing the first rule the result breaks
   */
  validate(result: QueryResult): MetricSample {
    if (result.tables.length === 0) {
      fail('NO_TABLES', 'there is no results after running your query (no tables)');
    }
    if (result.tables.length > 1) {
      fail('TOO_MANY_TABLES', `too many tables in query result: ${result.tables.length}, expected: 1`);
    }

    const [table] = result.tables;
    if (table.columns.length === 0) {
      fail('NO_COLUMNS', 'there is no results after running your query (no columns)');
    }
    if (table.rows.length === 0) {
      fail('NO_ROWS', 'there is no results after running your query (no rows)');
    }
    if (table.rows.length > 1) {
      fail('TOO_MANY_ROWS', `too many rows in query result: ${table.rows.length}, expected: 1`);
    }

    const [row] = table.rows;
    const sample: MetricSample = { value: 0, threshold: -1 };

    if (row.length > 0 && row[0].kind !== 'null') {
      sample.value = this.readNumber(row[0], table.columns[0], valueRules);
    }

    if (row.length > 1) {
      if (row[1].kind === 'null') {
        fail('EMPTY_THRESHOLD', 'threshold value is empty, check your query');
      }
      sample.threshold = this.readNumber(row[1], table.columns[1], thresholdRules);
    }

    return sample;
  }

  private readNumber(cell: Cell, column: QueryColumn | undefined, rules: CellRules): number {
    const declaredType = column?.type ?? '';
    if (!numericTypes.includes(declaredType)) {
      fail(
        rules.invalidType,
        `${rules.label} value data type should be real, int or long, but received ${declaredType || '(none)'}`
      );
    }
    if (cell.kind !== 'number') {
      return fail(rules.notNumeric, `can not convert ${rules.label} result to a number`);
    }
    if (cell.value < 0) {
      fail(rules.negative, `${rules.label} value should be >=0, but received ${cell.value}`);
    }
    return Math.trunc(cell.value);
  }

  private decodeTable(raw: unknown): QueryResultTable {
    if (!isRecord(raw)) {
      return { name: '', columns: [], rows: [] };
    }
    const columns = Array.isArray(raw.columns) ? raw.columns.map((column) => this.decodeColumn(column)) : [];
    const rows = Array.isArray(raw.rows)
      ? raw.rows.map((row: unknown) => (Array.isArray(row) ? row.map((cell) => this.decodeCell(cell)) : []))
      : [];
    return { name: typeof raw.name === 'string' ? raw.name : '', columns, rows };
  }

  private decodeColumn(raw: unknown): QueryColumn {
    if (!isRecord(raw)) {
      return { name: '', type: '' };
    }
    return {
      name: typeof raw.name === 'string' ? raw.name : '',
      type: typeof raw.type === 'string' ? raw.type : '',
    };
  }

  private decodeCell(raw: unknown): Cell {
    if (raw === null || raw === undefined) {
      return { kind: 'null' };
    }
    if (typeof raw === 'number' && Number.isFinite(raw)) {
      return { kind: 'number', value: raw };
    }
    return { kind: 'other', raw };
  }
}

export const resultValidator = new ResultValidator();
