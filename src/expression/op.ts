import deepEqual from 'deep-equal';
import { CompareOp, Condition, JsonValue, Literal } from '../statement';
import { TableRecord } from '../table';
import { StatementShapeError } from '../errors';

export type ComparisonKind = 'eq' | 'ne';

export type Comparator = (value: JsonValue, operand: Literal) => boolean;

export const COMPARE_OPS: { readonly [K in CompareOp]: ComparisonKind } = {
  '=': 'eq',
  '!=': 'ne',
};

// `1` and `'1'` are different values.
export const COMPARATORS: { readonly [K in ComparisonKind]: Comparator } = {
  eq: (value, operand) => deepEqual(value, operand, { strict: true }),
  ne: (value, operand) => !deepEqual(value, operand, { strict: true }),
};

export interface Predicate {
  field: string,
  kind: ComparisonKind,
  test: (record: TableRecord) => boolean,
}

export function getComparisonKind(op: string): ComparisonKind {
  if (op === '=' || op === '!=') return COMPARE_OPS[op];
  throw new StatementShapeError(`Unsupported operator ${JSON.stringify(op)}`);
}

/**
 * Binds a condition to a record test. A record without the condition's field
 * fails under every operator, so `=` and `!=` over the same field and literal
 * never both match one record.
 */
export default function compilePredicate(condition: Condition): Predicate {
  let kind = getComparisonKind(condition.op);
  let compare = COMPARATORS[kind];
  let field = condition.args[0].value;
  let operand = condition.args[1].value;
  // Records never hold `-0` (see parseTable); neither does the operand.
  if (Object.is(operand, -0)) operand = 0;
  return {
    field,
    kind,
    test: record => Object.prototype.hasOwnProperty.call(record, field) &&
      compare(record[field], operand),
  };
}
