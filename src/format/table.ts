import { JsonValue } from '../statement';
import { Row } from '../row';

function formatCell(value: JsonValue | undefined): string {
  if (value === undefined) return '';
  if (typeof value === 'string') return value;
  return JSON.stringify(value);
}

function getCell(row: Row, key: string): string {
  return formatCell(Object.prototype.hasOwnProperty.call(row, key)
    ? row[key] : undefined);
}

/**
 * Renders rows under a single header as a bordered text table:
 *
 *   +---+---+
 *   | a | b |
 *   +---+---+
 *   | x | 1 |
 *   +---+---+
 */
export function renderTable(
  header: readonly string[], rows: readonly Row[],
): string {
  if (header.length === 0) return '';
  let cells = rows.map(row => header.map(key => getCell(row, key)));
  let widths = header.map((key, i) =>
    Math.max(key.length, ...cells.map(values => values[i].length)));
  let border = '+' + widths.map(width => '-'.repeat(width + 2)).join('+') + '+';
  let line = (values: string[]) =>
    '| ' + values.map((value, i) => value.padEnd(widths[i])).join(' | ') + ' |';
  let output = [border, line(header.slice()), border];
  if (cells.length > 0) {
    cells.forEach(values => output.push(line(values)));
    output.push(border);
  }
  return output.join('\n');
}

export function formatSummary(count: number, elapsedMs: number): string {
  return `${count} ${count === 1 ? 'row' : 'rows'} in ` +
    `${elapsedMs.toFixed(2)} ms`;
}
