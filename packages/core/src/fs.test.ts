import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createConfigManager } from './fs';

describe('createConfigManager', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'omc-bridge-fs-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should read the nearest config file above the start path', async () => {
    fs.writeFileSync(path.join(tempDir, 'omc-bridge.config.yml'), 'identifierScope: studio\n');
    const nested = path.join(tempDir, 'exports', 'week-12');
    fs.mkdirSync(nested, { recursive: true });

    const manager = createConfigManager({ startPath: nested });
    const options = await manager.getConversionOptions();

    expect(options.identifierScope).toBe('studio');
  });

  it('should serve defaults when an explicit path is not given and no file exists', async () => {
    const manager = createConfigManager({ startPath: tempDir });

    expect(await manager.getConversionOptions()).toEqual({
      identifierScope: 'shotgrid',
      originalRecordPolicy: 'verbatim',
      progressInterval: 50,
    });
  });
});
