import { describe, it, expect } from 'vitest';
import { BufferSource, LineReader, StreamingError } from '@kvstream/core';
import { JsonRecordReader, readRecords } from '../../../src/infrastructure/readers/JsonRecordReader.js';
import type { JsonRecord } from '../../../src/domain/model/JsonRecord.js';

function lines(text: string): Iterable<string> {
  return new LineReader().split(text);
}

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

describe('JsonRecordReader', () => {
  describe('sequenceFile()', () => {
    it('should decode KEY<TAB>JSON lines', () => {
      const records = [...JsonRecordReader.sequenceFile().decode(lines('1\t{"A":"B"}\n2\t{"C":"D"}\n'))];

      expect(records).toEqual([
        { key: '1', value: { A: 'B' } },
        { key: '2', value: { C: 'D' } },
      ]);
    });

    it('should decode any JSON value', () => {
      const records = [...JsonRecordReader.sequenceFile().decode(['k\t[1,2]', 'k\t"s"', 'k\tnull', 'k\ttrue'])];

      expect(records.map((r) => r.value)).toEqual([[1, 2], 's', null, true]);
    });

    it('should split at the first separator only', () => {
      const records = [...JsonRecordReader.sequenceFile().decode(['k\t{"text":"a\\tb"}'])];

      expect(records).toEqual([{ key: 'k', value: { text: 'a\tb' } }]);
    });

    it('should use a custom separator', () => {
      const records = [...JsonRecordReader.sequenceFile({ separator: '|' }).decode(['k|{"x":1}'])];

      expect(records).toEqual([{ key: 'k', value: { x: 1 } }]);
    });

    it('should fail to decode a line without separator', () => {
      const reader = JsonRecordReader.sequenceFile();

      expect(() => [...reader.decode(['1\t{}', 'no-separator'])]).toThrow('invalid JSON on line 2');
    });
  });

  describe('textFile()', () => {
    it('should key records by byte offset', () => {
      const text = '{"E":"F"}\n{"G":"H"}\n{"I":"J"}\n';

      const records = [...JsonRecordReader.textFile().decode(lines(text))];

      expect(records).toEqual([
        { key: 0, value: { E: 'F' } },
        { key: 10, value: { G: 'H' } },
        { key: 20, value: { I: 'J' } },
      ]);
    });

    it('should count multi-byte characters and CRLF terminators in offsets', () => {
      const text = '{"v":"é"}\r\n{"v":2}\n';

      const records = [...JsonRecordReader.textFile().decode(lines(text))];

      // '{"v":"é"}' is 10 bytes, plus CRLF
      expect(records.map((r) => r.key)).toEqual([0, 12]);
      expect(records.map((r) => r.value)).toEqual([{ v: 'é' }, { v: 2 }]);
    });

    it('should restart offsets on every pass', () => {
      const reader = JsonRecordReader.textFile();

      const first = [...reader.decode(lines('{}\n{}\n'))].map((r) => r.key);
      const second = [...reader.decode(lines('{}\n'))].map((r) => r.key);

      expect(first).toEqual([0, 3]);
      expect(second).toEqual([0]);
    });

    it('should raise a DECODE error with the line number for invalid JSON', () => {
      const reader = JsonRecordReader.textFile();

      const error = catchError(() => [...reader.decode(lines('{}\n{oops}\n'))]);

      expect(error).toBeInstanceOf(StreamingError);
      expect(error).toMatchObject({ code: 'DECODE', lineNumber: 2, cause: expect.any(SyntaxError) });
    });
  });

  describe('forFormat()', () => {
    it('should build a sequence file reader', () => {
      const records = [...JsonRecordReader.forFormat('SEQUENCE_FILE').decode(['a\t1'])];

      expect(records).toEqual([{ key: 'a', value: 1 }]);
    });

    it('should build a text file reader', () => {
      const records = [...JsonRecordReader.forFormat('TEXT_FILE').decode(['1\n'])];

      expect(records).toEqual([{ key: 0, value: 1 }]);
    });

    it('should throw a configuration error for an unknown format', () => {
      expect(() => JsonRecordReader.forFormat('PARQUET')).toThrow("unknown input format 'PARQUET'");
    });
  });

  describe('read()', () => {
    it('should decode an async line stream', async () => {
      const reader = JsonRecordReader.sequenceFile();
      const source = new BufferSource('x\t{"n":1}\ny\t{"n":2}\n');

      const records: JsonRecord<string>[] = await collect(reader.read(new LineReader().lines(source.read())));

      expect(records).toEqual([
        { key: 'x', value: { n: 1 } },
        { key: 'y', value: { n: 2 } },
      ]);
    });
  });
});

describe('readRecords', () => {
  it('should default to sequence files', async () => {
    const records = await collect(readRecords(new BufferSource('1\t{"A":"B"}\n')));

    expect(records).toEqual([{ key: '1', value: { A: 'B' } }]);
  });

  it('should read text files with offsets', async () => {
    const records = await collect(
      readRecords(new BufferSource('{"E":"F"}\n{"G":"H"}\n'), { inputFormat: 'TEXT_FILE' }),
    );

    expect(records).toEqual([
      { key: 0, value: { E: 'F' } },
      { key: 10, value: { G: 'H' } },
    ]);
  });

  it('should reject an unknown format before reading', () => {
    expect(() => readRecords(new BufferSource('{}\n'), { inputFormat: 'AVRO' })).toThrow(StreamingError);
  });
});
