import { Command } from 'commander';
import chalk from 'chalk';
import type { MemoryRecord } from '@starsift/core';
import { getConfig, type GlobalOptions } from '../context.js';
import { createMemoryStore } from '../runtime.js';
import { consoleIO, type CommandIO } from '../io.js';

const SUMMARY_PREVIEW_CHARS = 100;

function describeRecord(record: MemoryRecord): string {
  const title = typeof record.data.title === 'string' ? record.data.title : chalk.dim('untitled');
  const stamp = new Date(record.timestamp * 1000).toISOString();
  return `${chalk.bold(record.key)}  ${title}  ${chalk.dim(stamp)}`;
}

export function renderRecords(records: MemoryRecord[], verbose: boolean, io: CommandIO = consoleIO): void {
  if (records.length === 0) {
    io.out(chalk.dim('No memory records.'));
    return;
  }
  for (const record of records) {
    io.out(describeRecord(record));
    const summary = record.data.summary;
    if (typeof summary === 'string' && summary.length > 0) {
      const preview = verbose ? summary : summary.replace(/\s+/g, ' ').slice(0, SUMMARY_PREVIEW_CHARS);
      io.out(chalk.dim(`  ${preview}`));
    }
  }
}

export function registerMemoryCommand(program: Command): void {
  const memory = program
    .command('memory')
    .description('Inspect and maintain the item memory');

  const openStore = () =>
    createMemoryStore(getConfig(), {
      onMemoryError: err => console.error(chalk.yellow(err.message)),
    });

  memory
    .command('list')
    .description('List stored records')
    .action(async (_options: Record<string, never>, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      const records = openStore().list();

      if (globalOpts.json) {
        console.log(JSON.stringify(records, null, 2));
        return;
      }
      renderRecords(records, globalOpts.verbose === true);
    });

  memory
    .command('search')
    .description('Find records whose summary contains the text (case-insensitive)')
    .argument('<text>', 'Text to look for')
    .action(async (text: string, _options: Record<string, never>, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      const records = openStore().querySimilar(text);

      if (globalOpts.json) {
        console.log(JSON.stringify(records, null, 2));
        return;
      }
      renderRecords(records, globalOpts.verbose === true);
    });

  memory
    .command('compact')
    .description('Drop raw text from stored records')
    .action(async (_options: Record<string, never>, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      const store = openStore();
      const compacted = store.compact();

      if (globalOpts.json) {
        console.log(JSON.stringify({ compacted, path: store.storagePath }, null, 2));
        return;
      }
      console.log(chalk.green(`Compacted ${chalk.bold(String(compacted))} memory records`));
      console.log(chalk.dim(`Memory: ${store.storagePath}`));
    });
}
