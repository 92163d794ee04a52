import { Command } from 'commander';
import { createGenerateCommand } from './commands/generate.js';
import { createStatusCommand } from './commands/status.js';

export function createCLI(): Command {
  const program = new Command()
    .name('lecture-sync')
    .description('Narrated audio + ordered slide images → timed lecture video')
    .version('1.0.0');

  program.addCommand(createGenerateCommand(), { isDefault: true });
  program.addCommand(createStatusCommand());

  return program;
}
