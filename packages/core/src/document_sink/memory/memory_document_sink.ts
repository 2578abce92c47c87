import type { DocumentSink, SinkWriteResult } from '../document_sink';

/**
 * In-memory DocumentSink for tests. Keeps every write in order.
 */
export class MemoryDocumentSink implements DocumentSink {
  readonly writes: string[] = [];

  constructor(readonly name: string = 'memory') { }

  async write(content: string): Promise<SinkWriteResult> {
    this.writes.push(content);
    return { bytesWritten: Buffer.byteLength(content, 'utf-8') };
  }

  getContent(): string | undefined {
    return this.writes[this.writes.length - 1];
  }
}
