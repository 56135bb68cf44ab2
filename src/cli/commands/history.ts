import { Command } from 'commander';
import { withLedger } from '../context.js';
import { parseInteger, formatValidationError } from '../utils/validation.js';
import { parseOutputFormat, printJson, printSessionTable } from '../utils/format.js';

export function createHistoryCommand(): Command {
  return new Command('history')
    .description('List recent processing sessions, newest first')
    .option('-l, --limit <number>', 'Maximum number of sessions to show', '20')
    .option('--format <format>', 'Output format (table|json)', 'table')
    .option('--config-path <path>', 'Path to configuration file')
    .action(async (options: { limit: string; format: string; configPath?: string }) => {
      try {
        const limit = parseInteger(options.limit, 'Limit', { min: 1, max: 1000 });
        await withLedger(options.configPath, async ({ query }) => {
          const sessions = await query.getHistory(limit);
          if (parseOutputFormat(options.format) === 'json') {
            printJson(sessions);
            return;
          }
          console.log(`\n📜 Processing History (${sessions.length})\n`);
          printSessionTable(sessions);
        });
      } catch (error) {
        console.error(formatValidationError(error));
        process.exit(1);
      }
    });
}
