import { Command } from 'commander';
import { ConvertCommand } from './convert-command';

/**
 * Register the convert command
 */
export function registerConvertCommand(program: Command): void {
  const convertCommand = new ConvertCommand();
  convertCommand.register(program);
}
