import { performance } from 'perf_hooks';
import { Row } from './row';
import { validateInput } from './grammar';
import evaluate, { EvaluateOptions } from './evaluate';
import drainIterator from './util/drainIterator';
import collectHeader from './util/header';

export interface QueryResult {
  header: string[],
  rows: Row[],
  // Wall-clock time spent parsing, evaluating and collecting the rows.
  elapsedMs: number,
}

/**
 * Runs one statement to completion. Resolves to null for blank input; every
 * failure other than a missing source rejects.
 */
export async function runQuery(
  text: string, options: EvaluateOptions = {},
): Promise<QueryResult | null> {
  let start = performance.now();
  let statement = validateInput(text);
  if (statement == null) return null;
  let iter = evaluate(statement, options);
  let rows = await drainIterator(iter);
  let header = collectHeader(iter.getColumns(), rows);
  return { header, rows, elapsedMs: performance.now() - start };
}
