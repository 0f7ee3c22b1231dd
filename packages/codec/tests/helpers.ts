import type { TextSink } from '../src/domain/ports/TextSink.js';

/** In-memory sink collecting everything written to it. */
export class MemorySink implements TextSink {
  readonly chunks: string[] = [];

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  text(): string {
    return this.chunks.join('');
  }
}
