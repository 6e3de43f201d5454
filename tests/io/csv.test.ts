import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import * as fc from 'fast-check';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { configure, resetConfig } from '../../src/core/config';
import { ConfigurationError, DataError, FileError } from '../../src/errors';
import { CsvFile, CsvWriter } from '../../src/io/csv';

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'scrubline-csv-'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
  resetConfig();
});

function file(name: string, text: string): string {
  const path = join(dir, name);
  writeFileSync(path, text);
  return path;
}

describe('CsvFile', () => {
  test('reads header and rows with zero-based ids', () => {
    const csv = new CsvFile(file('people.csv', 'name,age\nAnn,42\nBob,17\n'));
    expect(csv.columns).toEqual(['name', 'age']);
    expect([...csv.rows()]).toEqual([
      [0, ['Ann', '42']],
      [1, ['Bob', '17']],
    ]);
  });

  test('can be read more than once', () => {
    const csv = new CsvFile(file('twice.csv', 'a\n1\n2\n'));
    expect([...csv.rows()]).toHaveLength(2);
    expect([...csv.rows()]).toHaveLength(2);
  });

  test('small read chunks give the same rows', () => {
    const path = file('chunks.csv', 'a,b\n"x, y",1\r\n"multi\nline",2\n');
    const expected = [...new CsvFile(path).rows()];
    expect([...new CsvFile(path, { chunkBytes: 3 }).rows()]).toEqual(expected);
    expect(expected[1]).toEqual([1, ['multi\nline', '2']]);
  });

  test('decodes multi-byte characters split across chunks', () => {
    const csv = new CsvFile(file('utf8.csv', 'city\nZürich\nMálaga\n'), { chunkBytes: 2 });
    expect([...csv.rows()].map(([, row]) => row[0])).toEqual(['Zürich', 'Málaga']);
  });

  test('pads short rows with null', () => {
    const csv = new CsvFile(file('short.csv', 'a,b,c\n1\n'));
    expect([...csv.rows()]).toEqual([[0, ['1', null, null]]]);
  });

  test('rejects rows with too many fields', () => {
    const csv = new CsvFile(file('long.csv', 'a,b\n1,2\n3,4,5\n'));
    const run = () => [...csv.rows()];
    expect(run).toThrow(DataError);
    expect(run).toThrow(/record 3 has 3 fields, expected 2/);
  });

  test('headerless files get generated names', () => {
    const csv = new CsvFile(file('raw.csv', '1,2\n3,4\n'), { hasHeader: false });
    expect(csv.columns).toEqual(['column_0', 'column_1']);
    expect([...csv.rows()]).toHaveLength(2);
  });

  test('explicit header replaces the file header', () => {
    const csv = new CsvFile(file('renamed.csv', 'a,b\n1,2\n'), { header: ['x', 'y'] });
    expect(csv.columns).toEqual(['x', 'y']);
    expect([...csv.rows()]).toEqual([[0, ['1', '2']]]);
  });

  test('explicit header names a headerless file', () => {
    const csv = new CsvFile(file('named.csv', '1,2\n'), { header: ['x', 'y'], hasHeader: false });
    expect(csv.columns).toEqual(['x', 'y']);
    expect([...csv.rows()]).toEqual([[0, ['1', '2']]]);
  });

  test('empty file has no columns and no rows', () => {
    const csv = new CsvFile(file('empty.csv', ''));
    expect(csv.columns).toEqual([]);
    expect([...csv.rows()]).toEqual([]);
  });

  test('unquoted null token reads as null', () => {
    const csv = new CsvFile(file('nulls.csv', 'a,b\nNA,"NA"\n'), { nullToken: 'NA' });
    expect([...csv.rows()]).toEqual([[0, [null, 'NA']]]);
  });

  test('tab delimiter for .tsv files', () => {
    const csv = new CsvFile(file('data.tsv', 'a\tb\n1,5\t2\n'));
    expect(csv.delimiter).toBe('\t');
    expect([...csv.rows()]).toEqual([[0, ['1,5', '2']]]);
  });

  test('configured default delimiter', () => {
    configure({ delimiter: ';' });
    const csv = new CsvFile(file('semi.csv', 'a;b\n1;2\n'));
    expect(csv.columns).toEqual(['a', 'b']);
  });

  test('missing file', () => {
    const csv = new CsvFile(join(dir, 'missing.csv'));
    expect(() => csv.columns).toThrow(FileError);
  });

  test('invalid options', () => {
    expect(() => new CsvFile('x.csv', { delimiter: ';;' })).toThrow(ConfigurationError);
    expect(() => new CsvFile('x.csv', { delimiter: '\n' })).toThrow(ConfigurationError);
    expect(() => new CsvFile('x.csv', { delimiter: '"' })).toThrow(ConfigurationError);
    expect(() => new CsvFile('x.csv', { chunkBytes: 0 })).toThrow(ConfigurationError);
  });
});

describe('CsvWriter', () => {
  test('writes header and escaped rows', () => {
    const path = join(dir, 'out.csv');
    const writer = CsvWriter.open(path, ['name', 'note']);
    writer.write(['Ann', 'a,b']);
    writer.write(['Bob', null]);
    writer.write([3, true]);
    writer.close();
    expect(writer.rows).toBe(3);
    expect(writer.closed).toBe(true);
    expect(readFileSync(path, 'utf-8')).toBe('name,note\nAnn,"a,b"\nBob,\n3,true\n');
  });

  test('null token round trip', () => {
    const path = join(dir, 'nulls.csv');
    const writer = CsvWriter.open(path, ['a', 'b'], { nullToken: 'NA' });
    writer.write([null, 'NA']);
    writer.close();
    expect(readFileSync(path, 'utf-8')).toBe('a,b\nNA,"NA"\n');
    expect([...new CsvFile(path, { nullToken: 'NA' }).rows()]).toEqual([[0, [null, 'NA']]]);
  });

  test('flushes when the buffer fills', () => {
    const path = join(dir, 'flush.csv');
    const writer = CsvWriter.open(path, ['a'], { bufferBytes: 4 });
    writer.write(['12345']);
    expect(readFileSync(path, 'utf-8')).toBe('a\n12345\n');
    writer.close();
  });

  test('close is idempotent and writing after close fails', () => {
    const writer = CsvWriter.open(join(dir, 'closed.csv'), ['a']);
    writer.close();
    writer.close();
    expect(() => writer.write(['x'])).toThrow(FileError);
  });

  test('unwritable path', () => {
    expect(() => CsvWriter.open(join(dir, 'no', 'such', 'dir.csv'), ['a'])).toThrow(FileError);
  });

  test('writer of a CsvFile shares its settings', () => {
    const csv = new CsvFile(join(dir, 'shared.tsv'), { nullToken: '-' });
    const writer = csv.writer(['a', 'b']);
    writer.write(['x', null]);
    writer.close();
    expect(readFileSync(csv.path, 'utf-8')).toBe('a\tb\nx\t-\n');
    expect(csv.columns).toEqual(['a', 'b']);
  });

  test('written text reads back unchanged', () => {
    const path = join(dir, 'prop.csv');
    fc.assert(
      fc.property(fc.array(fc.tuple(fc.string(), fc.string()), { maxLength: 8 }), (rows) => {
        const writer = CsvWriter.open(path, ['a', 'b']);
        for (const row of rows) writer.write(row);
        writer.close();
        const read = [...new CsvFile(path).rows()].map(([, row]) => row);
        // A row of two empty strings is written as a lone delimiter and reads back the same
        expect(read).toEqual(rows);
      }),
      { numRuns: 50 },
    );
  });
});
