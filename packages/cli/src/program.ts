import { Command } from 'commander';
import { registerInitCommand } from './commands/init.js';
import { registerAllocateCommand } from './commands/allocate.js';
import { registerCheckCommand } from './commands/check.js';

export const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();
  program
    .name('rct-allocate')
    .description('Randomized controlled trial allocation: assign participants to treatment groups')
    .version(VERSION);

  registerInitCommand(program);
  registerAllocateCommand(program);
  registerCheckCommand(program);

  return program;
}
