import { Command } from 'commander';
import { registerAllCommands } from './register-commands.js';

export const VERSION = '1.0.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('readme-forge')
    .description('Generate a comprehensive README for any repository with the Groq API')
    .version(VERSION);

  registerAllCommands(program);
  return program;
}
