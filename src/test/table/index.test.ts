import path from 'path';
import { loadTable, parseTable } from '../../table';
import { MalformedRecordError } from '../../errors';
import { getLogLevel, setLogLevel, setLogSink } from '../../util/logger';
import { createDataDir, removeDataDir, ndjson } from '../fixtures';

describe('parseTable', () => {
  let logs: string[];
  let previous = getLogLevel();
  beforeEach(() => {
    logs = [];
    setLogLevel('info');
    setLogSink({ write: (line: string) => logs.push(line) });
  });
  afterEach(() => {
    setLogLevel(previous);
    setLogSink(process.stderr);
  });
  it('should key records by id in file order', () => {
    let table = parseTable('people.jsonl', ndjson(
      { id: 2, name: 'b' }, { id: 1, name: 'a' }, { id: 'x', name: 'c' },
    ));
    expect(Array.from(table.keys())).toEqual([2, 1, 'x']);
    expect(table.get(1)).toEqual({ id: 1, name: 'a' });
  });
  it('should let a later duplicate id overwrite in place', () => {
    let table = parseTable('people.jsonl', ndjson(
      { id: 1, name: 'first' }, { id: 2, name: 'b' }, { id: 1, name: 'last' },
    ));
    expect(Array.from(table.values())).toEqual([
      { id: 1, name: 'last' },
      { id: 2, name: 'b' },
    ]);
    expect(logs).toEqual([
      '[WARN][table] Duplicate id 1 at people.jsonl:3 replaces an earlier ' +
        'record\n',
    ]);
  });
  it('should read negative zero as zero', () => {
    let table = parseTable('t', '{"id":1,"a":-0,"b":{"c":[-0]}}\n');
    let record = table.get(1);
    expect(Object.is(record?.a, 0)).toBe(true);
    expect(record?.b).toEqual({ c: [0] });
  });
  it('should collapse integer ids beyond the safe range', () => {
    let table = parseTable('t',
      '{"id":9007199254740992,"n":1}\n{"id":9007199254740993,"n":2}\n');
    expect(Array.from(table.values())).toEqual([
      { id: 9007199254740992, n: 2 },
    ]);
  });
  it('should keep numeric and string ids apart', () => {
    let table = parseTable('t', ndjson({ id: 1 }, { id: '1' }));
    expect(table.size).toBe(2);
  });
  it('should skip blank lines and accept CRLF', () => {
    let table = parseTable('t',
      '\uFEFF{"id":1,"a":"x"}\r\n\r\n   \r\n{"id":2,"a":"y"}\r\n');
    expect(Array.from(table.values())).toEqual([
      { id: 1, a: 'x' },
      { id: 2, a: 'y' },
    ]);
  });
  it('should reject invalid JSON with its line number', () => {
    let error: unknown;
    try {
      parseTable('bad.jsonl', '{"id":1}\n{"id":2,\n');
    } catch (e) {
      error = e;
    }
    expect(error).toBeInstanceOf(MalformedRecordError);
    if (!(error instanceof MalformedRecordError)) return;
    expect(error.line).toBe(2);
    expect(error.path).toBe('bad.jsonl');
    expect(error.cause).toBeInstanceOf(SyntaxError);
    expect(error.message).toBe('Malformed record at bad.jsonl:2: invalid JSON');
  });
  it('should reject lines that are not objects', () => {
    expect(() => parseTable('t', '[1, 2]\n')).toThrow(
      'Malformed record at t:1: expected a JSON object');
    expect(() => parseTable('t', 'null\n')).toThrow(MalformedRecordError);
  });
  it('should reject records without a usable id', () => {
    expect(() => parseTable('t', '{"id":1}\n{"name":"a"}\n')).toThrow(
      'Malformed record at t:2: expected a string or number id');
    expect(() => parseTable('t', '{"id":{"nested":true}}\n'))
      .toThrow(MalformedRecordError);
  });
});

describe('loadTable', () => {
  let dir: string;
  let logs: string[];
  let previous = getLogLevel();
  beforeEach(() => {
    logs = [];
    setLogLevel('info');
    setLogSink({ write: (line: string) => logs.push(line) });
  });
  afterEach(() => {
    setLogLevel(previous);
    setLogSink(process.stderr);
  });
  beforeEach(async () => {
    dir = await createDataDir({
      'people.jsonl': ndjson({ id: 1, a: 'x' }, { id: 2, a: 'y' }),
    });
  });
  afterEach(() => removeDataDir(dir));
  it('should read a file into a table', async () => {
    let table = await loadTable(path.join(dir, 'people.jsonl'));
    expect(table).not.toBeNull();
    expect(Array.from(table?.values() ?? [])).toEqual([
      { id: 1, a: 'x' },
      { id: 2, a: 'y' },
    ]);
  });
  it('should resolve to null for a missing file', async () => {
    let missing = path.join(dir, 'missing.jsonl');
    expect(await loadTable(missing)).toBeNull();
    expect(logs).toEqual([`[INFO][table] Source not found: ${missing}\n`]);
  });
  it('should propagate other read failures', async () => {
    await expect(loadTable(dir)).rejects.toMatchObject({ code: 'EISDIR' });
  });
});
