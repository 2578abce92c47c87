import * as fs from 'fs';
import * as path from 'path';
import buildConfig from '../tsup.config';

function readManifest(directory: string): unknown {
  return JSON.parse(fs.readFileSync(path.join(directory, 'package.json'), 'utf-8'));
}

describe('CLI build', () => {
  const cliRoot = path.join(__dirname, '..');

  it('should bundle the core sources into a single CommonJS entry', () => {
    expect(buildConfig).toMatchObject({
      entry: ['src/index.ts'],
      format: ['cjs'],
      outDir: 'dist',
      noExternal: ['@omc-bridge/core'],
    });
  });

  it('should point both bin entries at the bundled executable', () => {
    expect(readManifest(cliRoot)).toMatchObject({
      bin: { 'omc-bridge': 'dist/index.js' },
      scripts: { build: 'tsup' },
    });
    expect(readManifest(path.join(cliRoot, '..', '..'))).toMatchObject({
      bin: { 'omc-bridge': 'packages/cli/dist/index.js' },
    });
  });
});
