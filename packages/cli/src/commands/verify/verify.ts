import { Command } from 'commander';
import { VerifyCommand } from './verify-command';

/**
 * Register the verify command
 */
export function registerVerifyCommand(program: Command): void {
  const verifyCommand = new VerifyCommand();
  verifyCommand.register(program);
}
