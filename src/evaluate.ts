import { resolve } from 'path';
import { Statement, assertSelectStatement } from './statement';
import { loadTable } from './table';
import compilePredicate from './expression/op';
import RowIterator from './iterator/type';
import TableIterator from './iterator/input';
import SelectIterator from './iterator/select';
import { getLogger } from './util/logger';

const logger = getLogger('evaluate');

export interface EvaluateOptions {
  // Directory relative source paths resolve against; the working directory
  // when omitted.
  baseDir?: string,
  batchSize?: number,
  // Checked once per scanned record.
  signal?: AbortSignal,
}

/**
 * Builds the lazy row pipeline for a select statement. The source is read on
 * the first `next` call, and again after each `rewind`; a missing source
 * yields no rows.
 */
export default function evaluate(
  statement: Statement, options: EvaluateOptions = {},
): RowIterator {
  assertSelectStatement(statement);
  let path = resolve(options.baseDir ?? process.cwd(), statement.table.value);
  let predicate = statement.condition != null
    ? compilePredicate(statement.condition)
    : null;
  let columns = statement.columns.map(column => column.value);
  logger.debug(() => ['Select', columns, 'from', path,
    predicate != null ? `where ${predicate.field} (${predicate.kind})` : '']);
  let input = new TableIterator(() => loadTable(path), options.batchSize);
  return new SelectIterator(input, columns, predicate, options.signal);
}
