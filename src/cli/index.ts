#!/usr/bin/env node
// Load environment variables
import 'dotenv/config';
import { Command } from 'commander';
import { registerConfigCommands } from './commands/config';
import { registerProjectCommands } from './commands/project';
import { startREPL } from './repl';

const program = new Command();

program
  .name('bto')
  .description('BTO Portal CLI - apply for, review and book Build-To-Order flats')
  .version('1.0.0');

program
  .command('repl')
  .description('Start an interactive session')
  .action(async () => {
    await startREPL();
  });

// Register command modules
registerProjectCommands(program);
registerConfigCommands(program);

// Parse and execute
program.parseAsync(process.argv).catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
