#!/usr/bin/env node
import { Command } from 'commander';
import { registerSplitCommand } from './commands/split.js';

function createProgram(): Command {
  const program = new Command();
  program
    .name('list-splitter')
    .description('Split Call List and Group List PDFs into one PDF per depot or shipping point')
    .version('0.1.0');

  registerSplitCommand(program);
  return program;
}

await createProgram().parseAsync(process.argv);
