// yasqlp ships no type declarations. This covers the part of its output that
// the grammar adapter reads; other node kinds are only told apart by `type`.
declare module 'yasqlp' {
  export type NullValue = { type: 'null' };
  export type ColumnValue = {
    type: 'column',
    table?: null | string,
    name: string,
  };
  export type BooleanValue = { type: 'boolean', value: boolean };
  export type NumberValue = { type: 'number', value: number };
  export type StringValue = { type: 'string', value: string };
  export type UnaryExpression = {
    type: 'unary',
    op: '!' | '-' | '~',
    value: Expression,
  };
  export type CompareExpression = {
    type: 'compare',
    op: '!=' | '=' | '>=' | '>' | '<=' | '<' | 'is' | 'like',
    left: Expression,
    right: Expression,
  };
  export type OtherExpression = {
    type: 'wildcard' | 'default' | 'case' | 'function' | 'aggregation' |
      'binary' | 'in' | 'between' | 'logical' | 'exists',
  };
  export type Expression = NullValue | ColumnValue | BooleanValue |
    NumberValue | StringValue | UnaryExpression | CompareExpression |
    OtherExpression;
  export type SelectColumn = {
    qualifier?: null | 'distinct' | 'all',
    name?: null | string,
    value: Expression,
  };
  export type TableRef = {
    type: 'table',
    name: string,
    schema?: null | string,
  };
  export type SelectTable = {
    table: { name?: null | string, value: TableRef | SelectStatement },
  } & ({
    type: 'normal',
  } | {
    type: 'cross' | 'inner' | 'left' | 'right',
    where?: null | Expression,
    natural?: boolean,
  });
  export type SelectStatement = {
    type: 'select',
    columns: SelectColumn[],
    from: null | SelectTable[],
    where: null | Expression,
    groupBy: null | Expression[],
    having: null | Expression,
    order?: null | unknown[],
    limit?: null | { limit: null | number, offset: null | number },
    unions?: null | unknown[],
    unionType?: string,
  };
  export type OtherStatement = { type: 'insert' | 'update' | 'delete' };
  export type Statement = SelectStatement | OtherStatement;
  export default function parse(input: string): Statement[];
}
