import { Row } from '../row';
import { Table, TableRecord } from '../table';
import RowIterator from './type';

export const DEFAULT_BATCH_SIZE = 256;

// Resolves to null when the source does not exist.
export type TableSource = () => Promise<Table | null>;

function assertBatchSize(size: number): void {
  if (!(size > 0)) {
    throw new RangeError('Batch size must be a positive number');
  }
}

export default class TableIterator implements RowIterator {
  source: TableSource;
  batchSize: number;
  records: TableRecord[] | null;
  position: number;
  constructor(source: TableSource, batchSize: number = DEFAULT_BATCH_SIZE) {
    assertBatchSize(batchSize);
    this.source = source;
    this.batchSize = batchSize;
    this.records = null;
    this.position = 0;
  }
  async next(limit: number = this.batchSize): Promise<IteratorResult<Row[]>> {
    assertBatchSize(limit);
    if (this.records == null) {
      let table = await this.source();
      this.records = table == null ? [] : Array.from(table.values());
    }
    if (this.position >= this.records.length) {
      return { done: true, value: undefined };
    }
    let value = this.records.slice(this.position, this.position + limit);
    this.position += value.length;
    return { done: false, value };
  }
  // Keys of every record loaded so far; empty until the first `next`.
  getColumns() {
    let keys = new Set<string>();
    (this.records ?? []).forEach(record => {
      Object.keys(record).forEach(key => keys.add(key));
    });
    return Array.from(keys);
  }
  rewind() {
    this.records = null;
    this.position = 0;
  }
  [Symbol.asyncIterator]() {
    return this;
  }
}
