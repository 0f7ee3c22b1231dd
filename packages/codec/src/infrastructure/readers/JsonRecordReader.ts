import { KV_SEPARATOR, LineReader, StreamingError, parseKeyValueLine, stripLineTerminator } from '@kvstream/core';
import type { DataSource } from '@kvstream/core';
import type { JsonRecord } from '../../domain/model/JsonRecord.js';
import { InputFormat, parseInputFormat } from '../../domain/model/InputFormat.js';

export interface JsonRecordReaderOptions {
  /** Key/value separator for sequence files. Default: tab. */
  readonly separator?: string;
}

export interface ReadRecordsOptions extends JsonRecordReaderOptions {
  /** Format name, validated at call time. Default: `SEQUENCE_FILE`. */
  readonly inputFormat?: string;
}

type LineDecoder<K extends string | number> = (line: string, lineNumber: number) => JsonRecord<K>;

function parseJson(text: string, lineNumber: number): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new StreamingError('DECODE', `JsonRecordReader: invalid JSON on line ${String(lineNumber)}`, {
      lineNumber,
      cause: error,
    });
  }
}

/**
 * Decodes JSON records from the mapper's input lines.
 *
 * Sequence files: `KEY<TAB>JSON` decodes to `{ key: 'KEY', value }`. A line
 * without the separator gets an empty payload, which then fails to decode.
 *
 * Text files: each line is JSON and its key is the UTF-8 byte offset of the
 * line start. Offsets only add up if lines keep their terminators, as
 * `LineReader` yields them.
 */
export class JsonRecordReader<K extends string | number> {
  private constructor(private readonly createDecoder: () => LineDecoder<K>) {}

  static sequenceFile(options?: JsonRecordReaderOptions): JsonRecordReader<string> {
    const separator = options?.separator ?? KV_SEPARATOR;

    return new JsonRecordReader<string>(() => (line, lineNumber) => {
      const { key, payload } = parseKeyValueLine(line, separator);
      return { key, value: parseJson(payload, lineNumber) };
    });
  }

  static textFile(): JsonRecordReader<number> {
    return new JsonRecordReader<number>(() => {
      let offset = 0;
      return (line, lineNumber) => {
        const record = { key: offset, value: parseJson(stripLineTerminator(line), lineNumber) };
        offset += Buffer.byteLength(line, 'utf-8');
        return record;
      };
    });
  }

  /** Reader for a format name from configuration. Throws `CONFIGURATION` for unknown names. */
  static forFormat(
    inputFormat: string,
    options?: JsonRecordReaderOptions,
  ): JsonRecordReader<string> | JsonRecordReader<number> {
    switch (parseInputFormat(inputFormat)) {
      case InputFormat.SEQUENCE_FILE:
        return JsonRecordReader.sequenceFile(options);
      case InputFormat.TEXT_FILE:
        return JsonRecordReader.textFile();
    }
  }

  *decode(lines: Iterable<string>): Iterable<JsonRecord<K>> {
    const decodeLine = this.createDecoder();
    let lineNumber = 0;

    for (const line of lines) {
      lineNumber++;
      yield decodeLine(line, lineNumber);
    }
  }

  async *read(lines: AsyncIterable<string>): AsyncIterable<JsonRecord<K>> {
    const decodeLine = this.createDecoder();
    let lineNumber = 0;

    for await (const line of lines) {
      lineNumber++;
      yield decodeLine(line, lineNumber);
    }
  }
}

/** Source → lines → records. The format is checked before anything is read. */
export function readRecords(
  source: DataSource,
  options?: ReadRecordsOptions,
): AsyncIterable<JsonRecord<string> | JsonRecord<number>> {
  const reader = JsonRecordReader.forFormat(options?.inputFormat ?? InputFormat.SEQUENCE_FILE, options);
  return reader.read(new LineReader().lines(source.read()));
}
