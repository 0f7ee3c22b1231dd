// Main entry point
export { ReduceJob } from './ReduceJob.js';
export type { ReduceJobConfig } from './ReduceJob.js';

// Domain model
export type { KeyValueLine } from './domain/model/KeyValueLine.js';
export { parseKeyValueLine, hasSeparator, stripLineTerminator } from './domain/model/KeyValueLine.js';
export type { Group, Row } from './domain/model/Group.js';
export type { Session } from './domain/model/Session.js';
export type { JobOutcome, JobProgress, JobSummary, JobStatusResult } from './domain/model/Job.js';
export { JobStatus } from './domain/model/JobStatus.js';
export { KV_SEPARATOR, DEFAULT_FIELD_DELIMITER } from './domain/model/StreamingDefaults.js';

// Errors
export { StreamingError, isStreamingError } from './domain/errors/StreamingError.js';
export type { StreamingErrorCode, StreamingErrorOptions } from './domain/errors/StreamingError.js';

// Domain services
export { RecordGrouper } from './domain/services/RecordGrouper.js';
export type {
  RecordGrouperOptions,
  DelimitedGrouperOptions,
  RawGrouperOptions,
  KeyFn,
  RowParser,
} from './domain/services/RecordGrouper.js';
export { SessionSplitter, toIntegerTimestamp } from './domain/services/SessionSplitter.js';
export type { SessionSplitterOptions, TimestampFn } from './domain/services/SessionSplitter.js';
export { LineReader } from './domain/services/LineReader.js';
export { delimiterSplitter } from './domain/services/FieldSplitter.js';
export type { FieldSplitter } from './domain/services/FieldSplitter.js';

// Application
export { EventBus } from './application/EventBus.js';

// Ports (for custom implementations)
export type { DataSource, SourceMetadata } from './domain/ports/DataSource.js';
export type { ReduceFn, ReduceContext } from './domain/ports/Reducer.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  JobStartedEvent,
  JobCompletedEvent,
  JobAbortedEvent,
  JobFailedEvent,
  LineMalformedEvent,
  GroupCompletedEvent,
  SessionCompletedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters
export { BufferSource } from './infrastructure/sources/BufferSource.js';
export { FilePathSource } from './infrastructure/sources/FilePathSource.js';
export type { FilePathSourceOptions } from './infrastructure/sources/FilePathSource.js';
export { StreamSource } from './infrastructure/sources/StreamSource.js';
export type { StreamSourceOptions } from './infrastructure/sources/StreamSource.js';
