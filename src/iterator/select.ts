import { Row } from '../row';
import { TableRecord } from '../table';
import { Predicate } from '../expression/op';
import RowIterator from './type';

/**
 * Filters and projects records from its input. A record the predicate rejects
 * is dropped before any of its columns are read; a record whose projection
 * comes out empty is dropped as well.
 */
export default class SelectIterator implements RowIterator {
  input: RowIterator;
  columns: string[];
  predicate: Predicate | null;
  signal: AbortSignal | undefined;
  constructor(
    input: RowIterator, columns: string[], predicate: Predicate | null,
    signal?: AbortSignal,
  ) {
    this.input = input;
    this.columns = columns;
    this.predicate = predicate;
    this.signal = signal;
  }
  project(record: TableRecord): Row | null {
    if (this.predicate != null && !this.predicate.test(record)) return null;
    let row: Row = {};
    let found = false;
    for (let column of this.columns) {
      if (!Object.prototype.hasOwnProperty.call(record, column)) continue;
      row[column] = record[column];
      found = true;
    }
    return found ? row : null;
  }
  async next(limit?: number): Promise<IteratorResult<Row[]>> {
    // Batches that project to nothing are skipped, so every batch handed out
    // holds at least one row.
    while (true) {
      let result = await this.input.next(limit);
      if (result.done) return { done: true, value: undefined };
      let value: Row[] = [];
      for (let record of result.value) {
        this.signal?.throwIfAborted();
        let row = this.project(record);
        if (row != null) value.push(row);
      }
      if (value.length > 0) return { done: false, value };
    }
  }
  getColumns() {
    return this.columns.slice();
  }
  rewind() {
    this.input.rewind();
  }
  [Symbol.asyncIterator]() {
    return this;
  }
}
