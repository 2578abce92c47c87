import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FsDocumentSink } from './fs_document_sink';
import { OutputWriteError } from '../../errors';

describe('FsDocumentSink', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'omc-bridge-sink-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should write the content and report its byte size', async () => {
    const outputPath = path.join(tempDir, 'tasks.omc.json');

    const result = await new FsDocumentSink(outputPath).write('[{"name":"Zoë"}]');

    await expect(fs.readFile(outputPath, 'utf-8')).resolves.toBe('[{"name":"Zoë"}]');
    expect(result.bytesWritten).toBe(17);
  });

  it('should replace an existing file', async () => {
    const outputPath = path.join(tempDir, 'tasks.omc.json');
    await fs.writeFile(outputPath, 'old', 'utf-8');

    await new FsDocumentSink(outputPath).write('[]');

    await expect(fs.readFile(outputPath, 'utf-8')).resolves.toBe('[]');
  });

  it('should leave no temporary file behind', async () => {
    const outputPath = path.join(tempDir, 'tasks.omc.json');

    await new FsDocumentSink(outputPath).write('[]');

    await expect(fs.readdir(tempDir)).resolves.toEqual(['tasks.omc.json']);
  });

  it('should raise OutputWriteError when the destination directory does not exist', async () => {
    const outputPath = path.join(tempDir, 'missing', 'tasks.omc.json');

    await expect(new FsDocumentSink(outputPath).write('[]')).rejects.toBeInstanceOf(OutputWriteError);
  });

  it('should leave nothing behind when the destination is a directory', async () => {
    const outputPath = path.join(tempDir, 'occupied');
    await fs.mkdir(outputPath);

    await expect(new FsDocumentSink(outputPath).write('[]')).rejects.toThrow(`Cannot write output ${outputPath}`);
    await expect(fs.readdir(tempDir)).resolves.toEqual(['occupied']);
  });
});
