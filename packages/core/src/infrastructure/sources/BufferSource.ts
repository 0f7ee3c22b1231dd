import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';

/** Data source over in-memory content. Handy for tests and small fixtures. */
export class BufferSource implements DataSource {
  private readonly content: Buffer;
  private readonly fileName: string;

  constructor(data: string | Buffer, options?: { readonly fileName?: string }) {
    this.content = typeof data === 'string' ? Buffer.from(data, 'utf-8') : data;
    this.fileName = options?.fileName ?? 'buffer-input';
  }

  async *read(): AsyncIterable<Buffer> {
    yield await Promise.resolve(this.content);
  }

  metadata(): SourceMetadata {
    return { fileName: this.fileName, fileSize: this.content.byteLength };
  }
}
