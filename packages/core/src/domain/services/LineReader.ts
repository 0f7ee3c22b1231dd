/**
 * Domain service that cuts a stream of text or byte chunks into lines.
 *
 * Lines are yielded with their terminator, like a file iterator would, so that
 * callers can account for exact byte lengths. The last line is yielded even
 * without a terminator. Byte chunks are decoded as UTF-8 in streaming mode, so
 * a character split across two chunks decodes correctly.
 */
export class LineReader {
  async *lines(chunks: AsyncIterable<string | Uint8Array>): AsyncIterable<string> {
    const decoder = new TextDecoder('utf-8');
    let pending = '';

    for await (const chunk of chunks) {
      // `pending` holds no newline here, so only the appended text is searched.
      const searchFrom = pending.length;
      pending += typeof chunk === 'string' ? decoder.decode() + chunk : decoder.decode(chunk, { stream: true });

      let start = 0;
      let end = pending.indexOf('\n', searchFrom);
      while (end !== -1) {
        yield pending.slice(start, end + 1);
        start = end + 1;
        end = pending.indexOf('\n', start);
      }
      pending = pending.slice(start);
    }

    pending += decoder.decode();
    if (pending !== '') yield pending;
  }

  /** Synchronous counterpart of {@link lines} for text already in memory. */
  *split(text: string): Iterable<string> {
    let start = 0;
    let end = text.indexOf('\n', start);
    while (end !== -1) {
      yield text.slice(start, end + 1);
      start = end + 1;
      end = text.indexOf('\n', start);
    }
    if (start < text.length) yield text.slice(start);
  }
}
