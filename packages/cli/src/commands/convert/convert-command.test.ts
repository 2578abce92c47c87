// Mock DependencyInjectionService before importing
jest.mock('../../services/dependency-injection', () => ({
  DependencyInjectionService: {
    getInstance: jest.fn()
  }
}));

import * as path from 'path';
import { ConvertCommand, defaultOutputPath } from './convert-command';
import { DependencyInjectionService } from '../../services/dependency-injection';
import { Config, Conversion, Errors, EventBus, Logger } from '@omc-bridge/core';
import type { RowSource, Verification } from '@omc-bridge/core';
import { MemoryConfigStore, MemoryDocumentSink, MemoryRowSource } from '@omc-bridge/core/memory';

// Mock console methods to capture output
const mockConsoleLog = jest.spyOn(console, 'log').mockImplementation();
const mockConsoleError = jest.spyOn(console, 'error').mockImplementation();
const mockProcessExit = jest.spyOn(process, 'exit').mockImplementation();

const ROWS = [
  { 'Id': '7', 'Pipeline Step': 'Comp', 'Status': 'fin', 'Assigned To': 'Jane Doe' },
  { 'Id': '' },
  { 'Id': '8', 'Pipeline Step': 'Editorial' },
];

describe('defaultOutputPath', () => {
  it('should replace the input extension with .omc.json', () => {
    expect(defaultOutputPath('exports/tasks.csv')).toBe(path.join('exports', 'tasks.omc.json'));
    expect(defaultOutputPath('tasks')).toBe('tasks.omc.json');
  });
});

describe('ConvertCommand', () => {
  let convertCommand: ConvertCommand;
  let sink: MemoryDocumentSink;
  let rowSource: RowSource;
  let configStore: MemoryConfigStore;
  let mockVerificationClient: {
    verify: jest.MockedFunction<(serialized: string, fileName: string) => Promise<Verification.VerificationResult>>;
  };
  let mockDependencyService: {
    getConfigManager: jest.Mock;
    getEventBus: jest.Mock;
    createConversionModule: jest.Mock;
    createRowSource: jest.Mock;
    createDocumentSink: jest.Mock;
    createVerificationClient: jest.Mock;
  };

  beforeEach(() => {
    jest.clearAllMocks();

    sink = new MemoryDocumentSink('tasks.omc.json');
    rowSource = new MemoryRowSource(ROWS, 'tasks.csv');
    configStore = new MemoryConfigStore();
    mockVerificationClient = { verify: jest.fn() };
    const eventBus = new EventBus.EventBus();

    mockDependencyService = {
      getConfigManager: jest.fn(() => new Config.ConfigManager(configStore)),
      getEventBus: jest.fn(() => eventBus),
      createConversionModule: jest.fn((options: Config.ConversionOptions) => new Conversion.ConversionModule({
        eventBus,
        logger: Logger.createLogger('', 'silent'),
        options,
      })),
      createRowSource: jest.fn(() => rowSource),
      createDocumentSink: jest.fn(() => sink),
      createVerificationClient: jest.fn(() => mockVerificationClient),
    };

    // Mock singleton getInstance
    (DependencyInjectionService.getInstance as jest.MockedFunction<typeof DependencyInjectionService.getInstance>)
      .mockReturnValue(mockDependencyService as never);

    convertCommand = new ConvertCommand();
  });

  describe('Conversion', () => {
    it('should write the document next to the input by default', async () => {
      await convertCommand.execute({ input: 'exports/tasks.csv' });

      expect(mockDependencyService.createRowSource).toHaveBeenCalledWith('exports/tasks.csv');
      expect(mockDependencyService.createDocumentSink).toHaveBeenCalledWith(path.join('exports', 'tasks.omc.json'));
      expect(sink.writes).toHaveLength(1);
      expect(JSON.parse(sink.getContent() ?? '')).toHaveLength(2);
      expect(mockProcessExit).not.toHaveBeenCalled();
    });

    it('should print the summary and statistics', async () => {
      await convertCommand.execute({ input: 'exports/tasks.csv', output: 'out/tasks.json' });

      const bytes = Buffer.byteLength(sink.getContent() ?? '', 'utf-8');
      expect(mockConsoleLog).toHaveBeenCalledWith('✅ Converted 2 tasks from exports/tasks.csv');
      expect(mockConsoleLog).toHaveBeenCalledWith(`📄 Output: out/tasks.json (${bytes} bytes)`);
      expect(mockConsoleLog).toHaveBeenCalledWith('⚠️  Skipped 1 of 3 rows without a usable Id');
      expect(mockConsoleLog).toHaveBeenCalledWith('📈 Official OMC Functional Classes:');
      expect(mockConsoleLog).toHaveBeenCalledWith('   • Create Visual Effects: 1 tasks');
      expect(mockConsoleLog).toHaveBeenCalledWith('   • Edit: 1 tasks');
      expect(mockConsoleLog).toHaveBeenCalledWith('   • complete: 1 tasks');
    });

    it('should print nothing in quiet mode', async () => {
      await convertCommand.execute({ input: 'tasks.csv', quiet: true });

      expect(sink.writes).toHaveLength(1);
      expect(mockConsoleLog).not.toHaveBeenCalled();
    });

    it('should print a JSON envelope with --json', async () => {
      await convertCommand.execute({ input: 'tasks.csv', json: true });

      expect(mockConsoleLog).toHaveBeenCalledTimes(1);
      const envelope = JSON.parse(String(mockConsoleLog.mock.calls[0]?.[0]));
      expect(envelope).toMatchObject({
        success: true,
        data: {
          input: 'tasks.csv',
          output: 'tasks.omc.json',
          rowsRead: 3,
          rowsSkipped: 1,
          statistics: { totalEntities: 2 },
        },
      });
    });

    it('should merge command-line overrides over the config file', async () => {
      configStore.setConfig({ identifierScope: 'from-file', progressInterval: 10, logLevel: 'info' });

      await convertCommand.execute({ input: 'tasks.csv', scope: 'studio', policy: 'encoded', config: 'custom.yml' });

      expect(mockDependencyService.getConfigManager).toHaveBeenCalledWith('custom.yml');
      expect(mockDependencyService.createConversionModule).toHaveBeenCalledWith(
        { identifierScope: 'studio', originalRecordPolicy: 'encoded', progressInterval: 10 },
        'info'
      );
    });

    it('should report progress in verbose mode', async () => {
      configStore.setConfig({ progressInterval: 1 });

      await convertCommand.execute({ input: 'tasks.csv', verbose: true });

      expect(mockDependencyService.createConversionModule).toHaveBeenCalledWith(expect.anything(), 'debug');
      expect(mockConsoleLog).toHaveBeenCalledWith('⏳ 1 tasks converted (1/3 rows)');
      expect(mockConsoleLog).toHaveBeenCalledWith('⏳ 2 tasks converted (3/3 rows)');
    });

    it('should reject an unknown policy before converting', async () => {
      await convertCommand.execute({ input: 'tasks.csv', policy: 'raw' });

      expect(mockConsoleError).toHaveBeenCalledWith('❌ Unknown policy "raw" (expected verbatim or encoded)');
      expect(mockProcessExit).toHaveBeenCalledWith(1);
      expect(mockDependencyService.createConversionModule).not.toHaveBeenCalled();
    });
  });

  describe('Error Handling', () => {
    it('should surface input errors and exit 1 without writing', async () => {
      rowSource = {
        name: 'missing.csv',
        readRows: jest.fn().mockRejectedValue(new Errors.InputReadError('missing.csv', new Error('no such file'))),
      };

      await convertCommand.execute({ input: 'missing.csv' });

      expect(mockConsoleError).toHaveBeenCalledWith('❌ Cannot read input missing.csv: no such file');
      expect(mockProcessExit).toHaveBeenCalledWith(1);
      expect(sink.writes).toHaveLength(0);
    });

    it('should include the error code in the JSON envelope', async () => {
      rowSource = {
        name: 'tasks.csv',
        readRows: jest.fn().mockRejectedValue(new Errors.InputStructureError('tasks.csv', 'missing required column "Id" (found: Name)')),
      };

      await convertCommand.execute({ input: 'tasks.csv', json: true });

      const envelope = JSON.parse(String(mockConsoleLog.mock.calls[0]?.[0]));
      expect(envelope).toEqual({
        success: false,
        error: 'Malformed input tasks.csv: missing required column "Id" (found: Name)',
        code: 'INPUT_STRUCTURE_ERROR',
        exitCode: 1,
      });
    });

    it('should prefix unexpected errors', async () => {
      rowSource = { name: 'tasks.csv', readRows: jest.fn().mockRejectedValue(new Error('boom')) };

      await convertCommand.execute({ input: 'tasks.csv' });

      expect(mockConsoleError).toHaveBeenCalledWith('❌ Conversion failed: boom');
    });
  });

  describe('Verification', () => {
    it('should refuse --verify without an endpoint before writing', async () => {
      await convertCommand.execute({ input: 'tasks.csv', verify: true });

      expect(mockConsoleError).toHaveBeenCalledWith(
        '❌ --verify needs an endpoint (use --endpoint or verification.endpoint in the config file)'
      );
      expect(mockProcessExit).toHaveBeenCalledWith(1);
      expect(sink.writes).toHaveLength(0);
    });

    it('should submit the written document and print the outcome', async () => {
      mockVerificationClient.verify.mockResolvedValue({
        outcome: 'success',
        report: { summary: { schema: 'pass' } },
        statusCounts: { pass: 1 },
      });

      await convertCommand.execute({ input: 'tasks.csv', verify: true, endpoint: 'https://checker.example.test/validate' });

      expect(mockDependencyService.createVerificationClient).toHaveBeenCalledWith(
        { endpoint: 'https://checker.example.test/validate', timeoutMs: 30000, fieldName: 'file' },
        'warn'
      );
      expect(mockVerificationClient.verify).toHaveBeenCalledWith(sink.getContent(), 'tasks.omc.json');
      expect(mockConsoleLog).toHaveBeenCalledWith('🔎 Verification: ✅ success');
      expect(mockProcessExit).not.toHaveBeenCalled();
    });

    it('should keep the document and exit 1 on a failure outcome', async () => {
      configStore.setConfig({ verification: { endpoint: 'https://checker.example.test/validate', timeoutMs: 5000 } });
      mockVerificationClient.verify.mockResolvedValue({
        outcome: 'failure',
        report: { summary: { schema: 'fail' } },
        statusCounts: { fail: 1 },
      });

      await convertCommand.execute({ input: 'tasks.csv', verify: true });

      expect(mockDependencyService.createVerificationClient).toHaveBeenCalledWith(
        { endpoint: 'https://checker.example.test/validate', timeoutMs: 5000, fieldName: 'file' },
        'warn'
      );
      expect(sink.writes).toHaveLength(1);
      expect(mockConsoleLog).toHaveBeenCalledWith('🔎 Verification: ❌ failure');
      expect(mockProcessExit).toHaveBeenCalledWith(1);
    });
  });
});
