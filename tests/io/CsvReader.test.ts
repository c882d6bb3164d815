/**
 * Tests for the CSV reader
 * CSV读取器测试
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, test, expect, beforeAll, afterAll } from 'vitest';
import { parseCsv, readCsvFile, tokenizeCsv, inferColumnType } from '../../src/io';
import { FileReadError, ParseError } from '../../src/errors';
import { columnNames, frameHeight } from '../../src/values';

describe('tokenizeCsv', () => {
  test('should split records and fields', () => {
    expect(tokenizeCsv('a,b\n1,2\n')).toEqual([
      { fields: ['a', 'b'], line: 1 },
      { fields: ['1', '2'], line: 2 }
    ]);
  });

  test('should handle quotes, escaped quotes and embedded delimiters', () => {
    const records = tokenizeCsv('name,note\n"Smith, J","said ""hi"""\n');
    expect(records[1].fields).toEqual(['Smith, J', 'said "hi"']);
  });

  test('should keep newlines inside quoted fields and count lines', () => {
    const records = tokenizeCsv('a,b\n"x\ny",1\n2,3\n');
    expect(records).toEqual([
      { fields: ['a', 'b'], line: 1 },
      { fields: ['x\ny', '1'], line: 2 },
      { fields: ['2', '3'], line: 4 }
    ]);
  });

  test('should accept CRLF and skip blank lines', () => {
    expect(tokenizeCsv('a\r\n\r\n1\r\n\n2').map(r => r.fields)).toEqual([['a'], ['1'], ['2']]);
  });

  test('should keep trailing empty fields', () => {
    expect(tokenizeCsv('1,\n')[0].fields).toEqual(['1', '']);
  });

  test('should reject unterminated quotes', () => {
    expect(() => tokenizeCsv('a\n"abc\n')).toThrow('Unterminated quoted field (line 2)');
  });

  test('should reject invalid delimiters', () => {
    expect(() => tokenizeCsv('a', '::')).toThrow(ParseError);
    expect(() => tokenizeCsv('a', '"')).toThrow('Invalid delimiter "\\""');
  });
});

describe('inferColumnType', () => {
  test('should prefer integers, then floats, then text', () => {
    expect(inferColumnType(['1', '-2', '+3'])).toBe('int64');
    expect(inferColumnType(['1', '2.5'])).toBe('float64');
    expect(inferColumnType(['1e3', '.5', '7.'])).toBe('float64');
    expect(inferColumnType(['abc', '1'])).toBe('utf8');
  });

  test('should ignore empty cells', () => {
    expect(inferColumnType(['', '4', ''])).toBe('int64');
    expect(inferColumnType(['', ''])).toBe('utf8');
    expect(inferColumnType([])).toBe('utf8');
  });
});

describe('parseCsv', () => {
  test('should build typed columns from the header row', () => {
    const frame = parseCsv('id,score,label\n1,2.5,alpha\n2,3,beta\n');

    expect(frame.columns).toEqual([
      { name: 'id', dtype: 'int64', values: [1, 2] },
      { name: 'score', dtype: 'float64', values: [2.5, 3] },
      { name: 'label', dtype: 'utf8', values: ['alpha', 'beta'] }
    ]);
  });

  test('should trim cells and store empty cells as null', () => {
    const frame = parseCsv('a,b\n 3 ,\n,x\n');

    expect(frame.columns).toEqual([
      { name: 'a', dtype: 'int64', values: [3, null] },
      { name: 'b', dtype: 'utf8', values: [null, 'x'] }
    ]);
  });

  test('should name empty header cells by position', () => {
    expect(columnNames(parseCsv('a,,c\n1,2,3\n'))).toEqual(['a', 'column_2', 'c']);
  });

  test('should use the configured delimiter', () => {
    const frame = parseCsv('a;b\n1;2\n', { delimiter: ';' });
    expect(columnNames(frame)).toEqual(['a', 'b']);
    expect(frameHeight(frame)).toBe(1);
  });

  test('should produce an empty frame for a header-only file', () => {
    const frame = parseCsv('a,b\n');
    expect(columnNames(frame)).toEqual(['a', 'b']);
    expect(frameHeight(frame)).toBe(0);
    expect(frame.columns[0].dtype).toBe('utf8');
  });

  test('should fail on empty input', () => {
    expect(() => parseCsv('')).toThrow('CSV input is empty');
    expect(() => parseCsv('\n\n')).toThrow(ParseError);
  });

  test('should fail on duplicate header names', () => {
    expect(() => parseCsv('a,a\n1,2\n')).toThrow("Duplicate column name 'a' (line 1)");
  });

  test('should fail on rows with a different field count', () => {
    let caught: unknown;
    try {
      parseCsv('a,b\n1,2\n3\n');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ParseError);
    expect(caught).toMatchObject({ code: 'ParseFailure', line: 3 });
    expect(caught).toHaveProperty('message', 'Expected 2 fields but found 1 (line 3)');
  });
});

describe('readCsvFile', () => {
  let tempDir: string;

  beforeAll(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'nodeframe-csv-'));
  });

  afterAll(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  test('should read and parse a file', () => {
    const file = path.join(tempDir, 'rows.csv');
    fs.writeFileSync(file, 'x,y\n1,2\n3,4\n5,6\n');

    const frame = readCsvFile(file);
    expect(frameHeight(frame)).toBe(3);
    expect(frame.columns[1]).toEqual({ name: 'y', dtype: 'int64', values: [2, 4, 6] });
  });

  test('should wrap read failures', () => {
    const missing = path.join(tempDir, 'missing.csv');

    let caught: unknown;
    try {
      readCsvFile(missing);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(FileReadError);
    expect(caught).toMatchObject({ code: 'FileReadFailure', path: missing });
    expect(String(caught instanceof Error ? caught.message : '')).toMatch(`Failed to read '${missing}':`);
  });
});
