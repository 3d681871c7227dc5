import { Row } from '../row';

/**
 * Rows may carry different subsets of the requested columns. The header is
 * every requested column that appears in at least one row, in request order;
 * a renderer leaves the cell blank where a row lacks one.
 */
export default function collectHeader(
  columns: readonly string[], rows: readonly Row[],
): string[] {
  let header: string[] = [];
  for (let column of columns) {
    if (header.includes(column)) continue;
    if (rows.some(row => Object.prototype.hasOwnProperty.call(row, column))) {
      header.push(column);
    }
  }
  return header;
}
