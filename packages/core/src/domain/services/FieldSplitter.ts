import { StreamingError } from '../errors/StreamingError.js';

/** Turns a payload into the fields of one row. */
export type FieldSplitter = (payload: string) => string[];

/**
 * Plain split on every occurrence of `delimiter`, with no quoting rules.
 *
 * An empty payload gives `['']`, and adjacent delimiters give empty fields.
 */
export function delimiterSplitter(delimiter: string): FieldSplitter {
  if (delimiter === '') {
    throw new StreamingError('CONFIGURATION', 'FieldSplitter: delimiter must not be empty');
  }
  return (payload) => payload.split(delimiter);
}
