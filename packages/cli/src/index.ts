#!/usr/bin/env node

import { Command } from 'commander';
import { registerConvertCommand } from './commands/convert/convert';
import { registerVerifyCommand } from './commands/verify/verify';

const program = new Command();

program
  .name('omc-bridge')
  .description('Convert ShotGrid task exports into MovieLabs OMC Task documents')
  .version('1.0.0');

registerConvertCommand(program);
registerVerifyCommand(program);

program.parseAsync().catch((error: unknown) => {
  console.error('❌ Fatal error:', error);
  process.exit(1);
});
