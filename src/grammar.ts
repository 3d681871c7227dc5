/// <reference path="./types/yasqlp.d.ts" />
import parse, { Expression, SelectStatement as ParsedSelect } from 'yasqlp';
import { Condition, Literal, Reference, Statement } from './statement';
import { InvalidInputError } from './errors';
import { getLogger } from './util/logger';

const logger = getLogger('grammar');

// Anything the adapter cannot express as a statement. Never leaves this module.
class UnsupportedSyntax extends Error {}

function getLiteral(expr: Expression): Literal | undefined {
  switch (expr.type) {
    case 'string':
    case 'number':
    case 'boolean':
      return expr.value;
    case 'null':
      return null;
    case 'unary':
      if (expr.op === '-' && expr.value.type === 'number') {
        return -expr.value.value;
      }
      return undefined;
    default:
      return undefined;
  }
}

function getColumnName(expr: Expression): string | undefined {
  if (expr.type !== 'column' || expr.table != null) return undefined;
  return expr.name;
}

function getCondition(expr: Expression): Condition {
  if (expr.type !== 'compare' || (expr.op !== '=' && expr.op !== '!=')) {
    throw new UnsupportedSyntax('Only = and != conditions are supported');
  }
  let op = expr.op;
  // `'x' = a` reads the same as `a = 'x'`; both operators are symmetric.
  let field = getColumnName(expr.left);
  let operand = getLiteral(expr.right);
  if (field === undefined || operand === undefined) {
    field = getColumnName(expr.right);
    operand = getLiteral(expr.left);
  }
  if (field === undefined || operand === undefined) {
    throw new UnsupportedSyntax('Condition must compare a column to a literal');
  }
  return { op, args: [{ value: field }, { value: operand }] };
}

function getSource(stmt: ParsedSelect): Reference {
  if (stmt.from == null || stmt.from.length !== 1) {
    throw new UnsupportedSyntax('Expected exactly one source');
  }
  let from = stmt.from[0];
  let value = from.table.value;
  if (from.type !== 'normal' || value.type !== 'table') {
    throw new UnsupportedSyntax('Joins and subqueries are not supported');
  }
  // `people.jsonl` arrives as schema `people`, table `jsonl`.
  let path = value.schema != null ? `${value.schema}.${value.name}` : value.name;
  return { value: path };
}

/**
 * Reduces a parsed select to the statement shape the evaluator consumes.
 * Throws on anything beyond one table, plain columns, and a single
 * column-to-literal comparison.
 */
export function toStatement(stmt: ParsedSelect): Statement {
  if ((stmt.groupBy != null && stmt.groupBy.length > 0) ||
    stmt.having != null ||
    (stmt.order != null && stmt.order.length > 0) || stmt.limit != null ||
    (stmt.unions != null && stmt.unions.length > 0)) {
    throw new UnsupportedSyntax('Only plain selects are supported');
  }
  let columns = stmt.columns.map(column => {
    let name = getColumnName(column.value);
    if (name === undefined || column.qualifier === 'distinct') {
      throw new UnsupportedSyntax('Columns must be plain field names');
    }
    return { value: name };
  });
  let statement: Statement = { type: 'select', table: getSource(stmt), columns };
  if (stmt.where == null) return statement;
  return { ...statement, condition: getCondition(stmt.where) };
}

export function parseStatement(text: string): Statement {
  let statements = parse(text);
  if (statements.length !== 1) {
    throw new UnsupportedSyntax('Expected exactly one statement');
  }
  let stmt = statements[0];
  if (stmt.type !== 'select') {
    throw new UnsupportedSyntax('Only select statements are supported');
  }
  return toStatement(stmt);
}

// Trims the input and drops a single trailing statement terminator.
export function stripInput(text: string): string {
  let trimmed = text.trim();
  if (trimmed.endsWith(';')) trimmed = trimmed.slice(0, -1).trim();
  return trimmed;
}

/**
 * Gate in front of the evaluator. Blank input is not an error and yields
 * null; anything that does not parse into a statement raises
 * InvalidInputError without the parser's diagnostic.
 */
export function validateInput(text: string): Statement | null {
  let stripped = stripInput(text);
  if (stripped === '') return null;
  try {
    return parseStatement(stripped);
  } catch (e) {
    logger.debug('Rejected input:', e);
    throw new InvalidInputError();
  }
}
