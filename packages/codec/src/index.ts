// Serializer
export { RecordWriter, emit, formatRecord, formatValue } from './infrastructure/serializers/RecordWriter.js';
export type { RecordWriterOptions } from './infrastructure/serializers/RecordWriter.js';
export { classifyValue } from './domain/model/StreamValue.js';
export type { StreamValueKind } from './domain/model/StreamValue.js';
export type { TextSink } from './domain/ports/TextSink.js';

// Record decoder
export { JsonRecordReader, readRecords } from './infrastructure/readers/JsonRecordReader.js';
export type { JsonRecordReaderOptions, ReadRecordsOptions } from './infrastructure/readers/JsonRecordReader.js';
export { InputFormat, isInputFormat, parseInputFormat } from './domain/model/InputFormat.js';
export type { JsonRecord } from './domain/model/JsonRecord.js';

// Field splitting
export { csvFieldSplitter } from './infrastructure/splitters/CsvFieldSplitter.js';
export type { CsvFieldSplitterOptions } from './infrastructure/splitters/CsvFieldSplitter.js';
