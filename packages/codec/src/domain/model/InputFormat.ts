import { StreamingError } from '@kvstream/core';

/**
 * - `SEQUENCE_FILE`: lines are `KEY<TAB>JSON`; the record key is the text key.
 * - `TEXT_FILE`: lines are plain JSON; the record key is the byte offset of the line.
 */
export const InputFormat = {
  SEQUENCE_FILE: 'SEQUENCE_FILE',
  TEXT_FILE: 'TEXT_FILE',
} as const;

export type InputFormat = (typeof InputFormat)[keyof typeof InputFormat];

export function isInputFormat(value: string): value is InputFormat {
  return value === InputFormat.SEQUENCE_FILE || value === InputFormat.TEXT_FILE;
}

/** Validate a format name coming from configuration. Unknown names are fatal. */
export function parseInputFormat(value: string): InputFormat {
  if (!isInputFormat(value)) {
    throw new StreamingError('CONFIGURATION', `JsonRecordReader: unknown input format '${value}'`);
  }
  return value;
}
