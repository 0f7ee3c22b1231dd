import Papa from 'papaparse';
import { StreamingError } from '@kvstream/core';
import type { FieldSplitter } from '@kvstream/core';

export interface CsvFieldSplitterOptions {
  /** Default: `','`. */
  readonly delimiter?: string;
  /** Default: `'"'`. */
  readonly quoteChar?: string;
}

/**
 * Field splitter using PapaParse, for payloads whose fields may be quoted:
 * `a,"b,c",d` gives `['a', 'b,c', 'd']`. An empty payload gives `['']`.
 *
 * A payload is always one record: a lone `\r` is field data. Unbalanced
 * quotes throw a `DECODE` {@link StreamingError}.
 */
export function csvFieldSplitter(options?: CsvFieldSplitterOptions): FieldSplitter {
  const delimiter = options?.delimiter ?? ',';
  const quoteChar = options?.quoteChar ?? '"';

  return (payload) => {
    if (payload === '') return [''];

    const result = Papa.parse<string[]>(payload, {
      delimiter,
      quoteChar,
      newline: '\n',
      header: false,
      skipEmptyLines: false,
      dynamicTyping: false,
    });

    const [firstError] = result.errors;
    if (firstError) {
      throw new StreamingError('DECODE', `CsvFieldSplitter: ${firstError.message} in payload ${JSON.stringify(payload)}`, {
        cause: firstError,
      });
    }
    if (result.data.length > 1) {
      throw new StreamingError('DECODE', `CsvFieldSplitter: payload ${JSON.stringify(payload)} holds more than one record`);
    }

    return result.data[0] ?? [''];
  };
}
