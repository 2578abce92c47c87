import { promises as fs } from 'fs';
import * as path from 'path';
import type { DocumentSink, SinkWriteResult } from '../document_sink';
import { OutputWriteError } from '../../errors';

/**
 * Writes the document next to its destination first and renames it into
 * place, so readers never observe a half-written file.
 */
export class FsDocumentSink implements DocumentSink {
  readonly name: string;

  constructor(private readonly filePath: string) {
    this.name = path.basename(filePath);
  }

  async write(content: string): Promise<SinkWriteResult> {
    const tempPath = path.join(
      path.dirname(this.filePath),
      `.${path.basename(this.filePath)}.${process.pid}.tmp`
    );

    try {
      await fs.writeFile(tempPath, content, 'utf-8');
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw new OutputWriteError(this.filePath, error);
    }

    return { bytesWritten: Buffer.byteLength(content, 'utf-8') };
  }
}
