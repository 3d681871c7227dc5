import { StatementShapeError } from './errors';

export type JsonValue = string | number | boolean | null | JsonValue[] |
  { [key: string]: JsonValue };

export type Literal = string | number | boolean | null;

export interface Reference<T = string> {
  readonly value: T,
}

export type CompareOp = '=' | '!=';

export interface Condition {
  readonly op: CompareOp,
  readonly args: readonly [Reference, Reference<Literal>],
}

/**
 * A single selection over one source file. `table.value` is the source path,
 * `columns` the fields to project in output order, and `condition` an
 * optional comparison of one field against a literal.
 */
export interface SelectStatement {
  readonly type: 'select',
  readonly table: Reference,
  readonly columns: readonly Reference[],
  readonly condition?: Condition,
}

export type Statement = SelectStatement;

function isObject(value: unknown): value is { [key: string]: unknown } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isLiteral(value: unknown): value is Literal {
  return value === null || typeof value === 'string' ||
    typeof value === 'number' || typeof value === 'boolean';
}

function assertReference(value: unknown, where: string): void {
  if (!isObject(value) || typeof value.value !== 'string') {
    throw new StatementShapeError(`Expected a name reference at ${where}`);
  }
}

export function assertSelectStatement(
  value: unknown,
): asserts value is SelectStatement {
  if (!isObject(value)) {
    throw new StatementShapeError('Statement must be an object');
  }
  if (value.type !== 'select') {
    throw new StatementShapeError(
      `Unsupported statement type ${JSON.stringify(value.type)}`);
  }
  assertReference(value.table, 'table');
  let columns = value.columns;
  if (!Array.isArray(columns)) {
    throw new StatementShapeError('Expected a column list');
  }
  columns.forEach((column, i) => assertReference(column, `columns[${i}]`));
  let condition = value.condition;
  if (condition === undefined) return;
  if (!isObject(condition)) {
    throw new StatementShapeError('Condition must be an object');
  }
  if (condition.op !== '=' && condition.op !== '!=') {
    throw new StatementShapeError(
      `Unsupported operator ${JSON.stringify(condition.op)}`);
  }
  let args = condition.args;
  if (!Array.isArray(args) || args.length !== 2) {
    throw new StatementShapeError('Condition takes exactly two arguments');
  }
  assertReference(args[0], 'condition.args[0]');
  let operand: unknown = args[1];
  if (!isObject(operand) || !isLiteral(operand.value)) {
    throw new StatementShapeError('Expected a literal at condition.args[1]');
  }
}
