import { Command } from 'commander';
import { withLedger } from '../context.js';
import { formatValidationError } from '../utils/validation.js';
import { parseOutputFormat, printJson, printSessionDetails } from '../utils/format.js';

export function createShowCommand(): Command {
  return new Command('show')
    .description('Show one session with its files and generated notes')
    .argument('<sessionId>', 'Session id from "notes-ledger history"')
    .option('--no-notes', 'Hide the generated notes content')
    .option('--format <format>', 'Output format (table|json)', 'table')
    .option('--config-path <path>', 'Path to configuration file')
    .action(async (sessionId: string, options: { notes: boolean; format: string; configPath?: string }) => {
      try {
        const found = await withLedger(options.configPath, async ({ query }) => {
          const details = await query.getSessionDetails(sessionId);
          if (!details) {
            return false;
          }
          if (parseOutputFormat(options.format) === 'json') {
            printJson(details);
          } else {
            printSessionDetails(details, options.notes);
          }
          return true;
        });

        if (!found) {
          console.error(`❌ Session not found: ${sessionId}`);
          process.exit(1);
        }
      } catch (error) {
        console.error(formatValidationError(error));
        process.exit(1);
      }
    });
}
