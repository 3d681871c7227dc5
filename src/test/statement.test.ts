import { assertSelectStatement } from '../statement';
import { StatementShapeError } from '../errors';

describe('assertSelectStatement', () => {
  it('should accept a well-formed statement', () => {
    expect(() => assertSelectStatement({
      type: 'select',
      table: { value: 'people' },
      columns: [{ value: 'a' }],
      condition: { op: '!=', args: [{ value: 'a' }, { value: null }] },
    })).not.toThrow();
  });
  it('should reject other statement types', () => {
    expect(() => assertSelectStatement({ type: 'insert' }))
      .toThrow('Unsupported statement type "insert"');
    expect(() => assertSelectStatement(null)).toThrow(StatementShapeError);
  });
  it('should reject malformed nodes', () => {
    let base = { type: 'select', table: { value: 'people' }, columns: [] };
    expect(() => assertSelectStatement({ ...base, table: 'people' }))
      .toThrow('Expected a name reference at table');
    expect(() => assertSelectStatement({ ...base, columns: [{ value: 1 }] }))
      .toThrow('Expected a name reference at columns[0]');
    expect(() => assertSelectStatement({
      ...base, condition: { op: '=', args: [{ value: 'a' }] },
    })).toThrow('Condition takes exactly two arguments');
    expect(() => assertSelectStatement({
      ...base, condition: { op: '=', args: [{ value: 'a' }, { value: [] }] },
    })).toThrow('Expected a literal at condition.args[1]');
  });
});
