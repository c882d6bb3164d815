/**
 * CSV reader
 * CSV读取器
 *
 * Reads delimited text into a frame. The first record is the header; column
 * types are inferred from the non-empty cells of each column.
 * 将分隔文本读取为数据表。第一条记录为表头；列类型根据每列的非空单元格推断。
 */

import * as fs from 'fs';
import { FileReadError, ParseError } from '../errors';
import type { Frame, Series, SeriesDType } from '../values';
import { createFrame, createSeries, createTextSeries } from '../values';

/**
 * CSV options
 * CSV选项
 */
export interface CsvOptions {
  /** Field delimiter, one character 字段分隔符，单个字符 */
  delimiter?: string;
  /** File encoding 文件编码 */
  encoding?: BufferEncoding;
}

export const DEFAULT_CSV_OPTIONS: Readonly<Required<CsvOptions>> = {
  delimiter: ',',
  encoding: 'utf-8'
};

/**
 * Tokenized record with the line it starts on (1-based)
 * 带起始行号（从1开始）的记录
 */
export interface CsvRecord {
  fields: string[];
  line: number;
}

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Split text into records. Quoted fields may contain delimiters, newlines
 * and doubled quotes. Blank lines are skipped.
 * 将文本拆分为记录。带引号的字段可以包含分隔符、换行符和双引号。跳过空行。
 */
export function tokenizeCsv(source: string, delimiter: string = DEFAULT_CSV_OPTIONS.delimiter): CsvRecord[] {
  if (delimiter.length !== 1 || delimiter === '"' || delimiter === '\n' || delimiter === '\r') {
    throw new ParseError(`Invalid delimiter ${JSON.stringify(delimiter)}`);
  }

  const records: CsvRecord[] = [];
  let fields: string[] = [];
  let field = '';
  let hasContent = false;
  let inQuotes = false;
  let line = 1;
  let recordLine = 1;

  const endRecord = (): void => {
    if (hasContent) {
      fields.push(field);
      records.push({ fields, line: recordLine });
    }
    fields = [];
    field = '';
    hasContent = false;
  };

  for (let i = 0; i < source.length; i++) {
    const ch = source[i];

    if (inQuotes) {
      if (ch === '"') {
        if (source[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        if (ch === '\n') line++;
        field += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
      hasContent = true;
    } else if (ch === delimiter) {
      fields.push(field);
      field = '';
      hasContent = true;
    } else if (ch === '\r' || ch === '\n') {
      if (ch === '\r' && source[i + 1] === '\n') i++;
      endRecord();
      line++;
      recordLine = line;
    } else {
      field += ch;
      hasContent = true;
    }
  }

  if (inQuotes) {
    throw new ParseError('Unterminated quoted field', recordLine);
  }
  endRecord();

  return records;
}

/**
 * Infer the element type of a column from its trimmed cells
 * 根据修剪后的单元格推断列的元素类型
 */
export function inferColumnType(cells: readonly string[]): SeriesDType {
  const present = cells.filter(cell => cell !== '');
  if (present.length === 0) return 'utf8';
  if (present.every(cell => INTEGER_PATTERN.test(cell))) return 'int64';
  if (present.every(cell => FLOAT_PATTERN.test(cell))) return 'float64';
  return 'utf8';
}

function buildColumn(name: string, cells: readonly string[]): Series {
  const dtype = inferColumnType(cells);
  if (dtype === 'utf8') {
    return createTextSeries(name, cells.map(cell => (cell === '' ? null : cell)));
  }
  return createSeries(name, cells.map(cell => (cell === '' ? null : Number(cell))), dtype);
}

/**
 * Parse CSV text into a frame
 * 将CSV文本解析为数据表
 *
 * @throws ParseError on empty input, duplicate header names or ragged rows 输入为空、表头重复或行长度不一致时抛出
 */
export function parseCsv(source: string, options: CsvOptions = {}): Frame {
  const delimiter = options.delimiter ?? DEFAULT_CSV_OPTIONS.delimiter;
  const records = tokenizeCsv(source, delimiter);

  if (records.length === 0) {
    throw new ParseError('CSV input is empty');
  }

  const [headerRecord, ...rows] = records;
  const header = headerRecord.fields.map((cell, index) => {
    const name = cell.trim();
    return name === '' ? `column_${index + 1}` : name;
  });

  const seen = new Set<string>();
  for (const name of header) {
    if (seen.has(name)) {
      throw new ParseError(`Duplicate column name '${name}'`, headerRecord.line);
    }
    seen.add(name);
  }

  const cells: string[][] = header.map(() => []);
  for (const row of rows) {
    if (row.fields.length !== header.length) {
      throw new ParseError(`Expected ${header.length} fields but found ${row.fields.length}`, row.line);
    }
    row.fields.forEach((value, index) => cells[index].push(value.trim()));
  }

  return createFrame(header.map((name, index) => buildColumn(name, cells[index])));
}

/**
 * Read and parse a CSV file
 * 读取并解析CSV文件
 *
 * @throws FileReadError when the file cannot be read 无法读取文件时抛出
 */
export function readCsvFile(path: string, options: CsvOptions = {}): Frame {
  let source: string;
  try {
    source = fs.readFileSync(path, { encoding: options.encoding ?? DEFAULT_CSV_OPTIONS.encoding });
  } catch (error) {
    throw new FileReadError(path, error);
  }
  return parseCsv(source, options);
}
