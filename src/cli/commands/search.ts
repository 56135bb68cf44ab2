import { Command } from 'commander';
import { withLedger } from '../context.js';
import { parseDate, formatValidationError } from '../utils/validation.js';
import { parseOutputFormat, printJson, printSessionTable } from '../utils/format.js';
import type { SearchFilters } from '../../types/session.js';

export function createSearchCommand(): Command {
  return new Command('search')
    .description('Search sessions by note text, model and creation date')
    .argument('[query]', 'Text the generated notes must contain (case-insensitive)', '')
    .option('-m, --model <model>', 'Only sessions that used this model')
    .option('--from <date>', 'Created on or after this date (YYYY-MM-DD or ISO 8601)')
    .option('--to <date>', 'Created on or before this date (YYYY-MM-DD or ISO 8601)')
    .option('--format <format>', 'Output format (table|json)', 'table')
    .option('--config-path <path>', 'Path to configuration file')
    .action(async (text: string, options: {
      model?: string;
      from?: string;
      to?: string;
      format: string;
      configPath?: string;
    }) => {
      try {
        const filters: SearchFilters = { query: text };
        if (options.model) filters.model = options.model;
        if (options.from) filters.startDate = parseDate(options.from, 'start');
        if (options.to) filters.endDate = parseDate(options.to, 'end');

        await withLedger(options.configPath, async ({ query }) => {
          const sessions = await query.search(filters);
          if (parseOutputFormat(options.format) === 'json') {
            printJson(sessions);
            return;
          }
          console.log(`\n🔍 ${sessions.length} matching session(s)\n`);
          printSessionTable(sessions);
        });
      } catch (error) {
        console.error(formatValidationError(error));
        process.exit(1);
      }
    });
}
