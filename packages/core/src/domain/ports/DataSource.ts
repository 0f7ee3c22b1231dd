/** Metadata about the data source (optional, for diagnostics). */
export interface SourceMetadata {
  readonly fileName?: string;
  readonly fileSize?: number;
}

/**
 * Port for reading raw streaming input from any origin (stdin, file, buffer).
 *
 * Chunks carry no record boundaries; `LineReader` turns them into lines.
 * The caller owns the underlying resource and its lifecycle.
 */
export interface DataSource {
  /** Yield data chunks as strings or Buffers for lazy consumption. */
  read(): AsyncIterable<string | Buffer>;
  metadata(): SourceMetadata;
}
