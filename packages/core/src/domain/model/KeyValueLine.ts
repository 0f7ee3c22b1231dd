import { KV_SEPARATOR } from './StreamingDefaults.js';

/** One line of the streaming protocol: `KEY<SEP>PAYLOAD`. */
export interface KeyValueLine {
  readonly key: string;
  readonly payload: string;
}

/** Remove a single trailing `\n` or `\r\n`. Other trailing whitespace is payload. */
export function stripLineTerminator(line: string): string {
  if (line.endsWith('\r\n')) return line.slice(0, -2);
  if (line.endsWith('\n')) return line.slice(0, -1);
  return line;
}

/**
 * Split a line at the first separator.
 *
 * A line without the separator is not an error: the whole line becomes the key
 * and the payload is empty. Use {@link hasSeparator} to tell the two apart.
 */
export function parseKeyValueLine(line: string, separator: string = KV_SEPARATOR): KeyValueLine {
  const text = stripLineTerminator(line);
  const at = text.indexOf(separator);

  if (at === -1) {
    return { key: text, payload: '' };
  }
  return { key: text.slice(0, at), payload: text.slice(at + separator.length) };
}

export function hasSeparator(line: string, separator: string = KV_SEPARATOR): boolean {
  return stripLineTerminator(line).includes(separator);
}
