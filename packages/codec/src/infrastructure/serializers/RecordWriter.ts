import { EOL } from 'node:os';
import { KV_SEPARATOR, DEFAULT_FIELD_DELIMITER } from '@kvstream/core';
import { classifyValue } from '../../domain/model/StreamValue.js';
import type { TextSink } from '../../domain/ports/TextSink.js';

export interface RecordWriterOptions {
  /** Default: `process.stdout`. */
  readonly stream?: TextSink;
  /** Delimiter between values. Default: tab. */
  readonly delimiter?: string;
  /** Default: the platform line ending. */
  readonly lineEnding?: string;
}

/** Render one value for the streaming protocol. */
export function formatValue(value: unknown): string {
  switch (classifyValue(value)) {
    case 'structured':
      return JSON.stringify(value instanceof Map ? Object.fromEntries(value) : value);
    case 'boolean':
      return value ? 'TRUE' : 'FALSE';
    case 'scalar':
      return String(value);
  }
}

/** `KEY<TAB>V1<DELIM>V2...<EOL>` */
export function formatRecord(
  key: string | number | bigint,
  values: Iterable<unknown>,
  delimiter: string = DEFAULT_FIELD_DELIMITER,
  lineEnding: string = EOL,
): string {
  return `${String(key)}${KV_SEPARATOR}${Array.from(values, formatValue).join(delimiter)}${lineEnding}`;
}

/**
 * Writes key/value records for the next stage of the job.
 *
 * All values under one key are processed by the same reducer downstream.
 */
export class RecordWriter {
  private readonly stream: TextSink;
  private readonly delimiter: string;
  private readonly lineEnding: string;
  private written = 0;

  constructor(options?: RecordWriterOptions) {
    this.stream = options?.stream ?? process.stdout;
    this.delimiter = options?.delimiter ?? DEFAULT_FIELD_DELIMITER;
    this.lineEnding = options?.lineEnding ?? EOL;
  }

  emit(key: string | number | bigint, values: Iterable<unknown>): void {
    this.stream.write(formatRecord(key, values, this.delimiter, this.lineEnding));
    this.written++;
  }

  get linesWritten(): number {
    return this.written;
  }
}

/** Write a single record. Shorthand for `new RecordWriter(options).emit(key, values)`. */
export function emit(key: string | number | bigint, values: Iterable<unknown>, options?: RecordWriterOptions): void {
  new RecordWriter(options).emit(key, values);
}
