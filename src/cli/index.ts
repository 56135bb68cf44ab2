#!/usr/bin/env node
import { Command } from 'commander';
import { createInitCommand } from './commands/init.js';
import { createDbInitCommand } from './commands/db-init.js';
import { createProcessCommand } from './commands/process.js';
import { createHistoryCommand } from './commands/history.js';
import { createShowCommand } from './commands/show.js';
import { createSearchCommand } from './commands/search.js';
import { createAnalyticsCommand } from './commands/analytics.js';
import { createExportCommand } from './commands/export.js';
import { createCleanupCommand } from './commands/cleanup.js';

const program = new Command();

program
  .name('notes-ledger')
  .description('Generate Markdown notes from documents with an LLM and track the cost of every run')
  .version('0.1.0');

program.addCommand(createInitCommand());
program.addCommand(createDbInitCommand());
program.addCommand(createProcessCommand());
program.addCommand(createHistoryCommand());
program.addCommand(createShowCommand());
program.addCommand(createSearchCommand());
program.addCommand(createAnalyticsCommand());
program.addCommand(createExportCommand());
program.addCommand(createCleanupCommand());

program.parseAsync().catch((error: unknown) => {
  console.error('❌ Command failed:', String(error));
  process.exit(1);
});
