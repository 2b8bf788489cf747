/**
 * SQL structure mapper exports.
 * Converts between editable query structures and SQL text, and binds
 * named parameters for execution.
 */
export * from './core/sql/sql.js';
export * from './core/ast/query-structure.js';
export * from './core/ast/condition-builders.js';
export * from './query-builder/query-structure-builder.js';
export * from './core/logging/mapper-logger.js';
export * from './core/parameters/parameter-extractor.js';
export * from './core/parameters/parameter-binding.js';
export * from './core/generator/base/pagination-strategy.js';
export * from './core/generator/validation.js';
export * from './core/generator/sql-generator.js';
export * from './core/reverse/sql-reverse-engineer.js';
export * from './core/analysis/sql-analyzer.js';
export * from './core/execution/db-executor.js';
export * from './core/execution/executors/sqlite-executor.js';
export * from './core/execution/named-query.js';
