import { isBlank } from '../../ast/query-structure.js';

/**
 * Renders `table.column`, or just `column` when the qualifier is blank
 */
export const qualify = (tableName: string | undefined, columnName: string): string =>
  isBlank(tableName) ? columnName : `${tableName}.${columnName}`;

/**
 * Renders ` AS alias`, or nothing when the alias is blank
 */
export const aliasSuffix = (alias: string | undefined): string =>
  alias === undefined || isBlank(alias) ? '' : ` AS ${alias}`;
