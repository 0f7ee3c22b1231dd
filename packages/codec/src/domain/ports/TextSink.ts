/** Anything text can be written to: `process.stdout`, a file stream, a test buffer. */
export interface TextSink {
  write(chunk: string): unknown;
}
