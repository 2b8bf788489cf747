import { QueryStructure, isBlank } from '../ast/query-structure.js';

export const VALIDATION_MESSAGES = {
  NO_SELECT_COLUMNS: 'At least one SELECT column is required',
  NO_FROM_TABLES: 'At least one FROM table is required',
  BLANK_COLUMN_NAME: 'SELECT column name cannot be empty',
  BLANK_TABLE_NAME: 'FROM table name cannot be empty'
} as const;

/**
 * Collects every structural problem that prevents SQL generation.
 * @returns Human-readable messages; empty when the structure can be rendered
 */
export function validateQueryStructure(structure: QueryStructure): string[] {
  const errors: string[] = [];

  if (structure.selectColumns.length === 0) {
    errors.push(VALIDATION_MESSAGES.NO_SELECT_COLUMNS);
  }
  if (structure.fromTables.length === 0) {
    errors.push(VALIDATION_MESSAGES.NO_FROM_TABLES);
  }

  for (const column of structure.selectColumns) {
    if (isBlank(column.columnName)) {
      errors.push(VALIDATION_MESSAGES.BLANK_COLUMN_NAME);
    }
  }
  for (const table of structure.fromTables) {
    if (isBlank(table.tableName)) {
      errors.push(VALIDATION_MESSAGES.BLANK_TABLE_NAME);
    }
  }

  return errors;
}
