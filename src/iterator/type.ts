import { Row } from '../row';

export default interface RowIterator extends AsyncIterableIterator<Row[]> {
  // Yields up to `limit` rows per call; the iterator's batch size otherwise.
  next(limit?: number): Promise<IteratorResult<Row[]>>;
  getColumns(): string[];
  // Rewinds the iterator to first position, reloading its source.
  rewind(): void;
}
