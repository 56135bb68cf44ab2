import { Command } from 'commander';
import { withLedger } from '../context.js';
import { formatValidationError } from '../utils/validation.js';
import { parseOutputFormat, printAnalytics, printJson } from '../utils/format.js';

export function createAnalyticsCommand(): Command {
  return new Command('analytics')
    .description('Summarise sessions, tokens, cost and model usage')
    .option('--format <format>', 'Output format (table|json)', 'table')
    .option('--config-path <path>', 'Path to configuration file')
    .action(async (options: { format: string; configPath?: string }) => {
      try {
        await withLedger(options.configPath, async ({ query }) => {
          const analytics = await query.getAnalytics();
          if (parseOutputFormat(options.format) === 'json') {
            printJson(analytics);
          } else {
            printAnalytics(analytics);
          }
        });
      } catch (error) {
        console.error(formatValidationError(error));
        process.exit(1);
      }
    });
}
