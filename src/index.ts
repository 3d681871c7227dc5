export { default as evaluate, EvaluateOptions } from './evaluate';
export { loadTable, parseTable, Table, TableRecord, RecordId } from './table';
export {
  Statement, SelectStatement, Condition, CompareOp, Reference, Literal,
  JsonValue, assertSelectStatement,
} from './statement';
export { Row } from './row';
export {
  default as compilePredicate, COMPARE_OPS, COMPARATORS, ComparisonKind,
  Comparator, Predicate,
} from './expression/op';
export { default as RowIterator } from './iterator/type';
export { default as TableIterator, TableSource } from './iterator/input';
export { default as SelectIterator } from './iterator/select';
export { default as drainIterator } from './util/drainIterator';
export { default as collectHeader } from './util/header';
export { validateInput, parseStatement, toStatement } from './grammar';
export { runQuery, QueryResult } from './session';
export { renderTable, formatSummary } from './format/table';
export { parseArgs, ShellConfig } from './config';
export { QueryShell, ShellOptions } from './cli/shell';
export {
  InvalidInputError, MalformedRecordError, StatementShapeError,
} from './errors';
export { getLogger, setLogLevel, LogLevel } from './util/logger';
