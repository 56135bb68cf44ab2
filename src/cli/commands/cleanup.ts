import { Command } from 'commander';
import { withLedger } from '../context.js';
import { promptConfirm } from '../utils/input.js';
import { parseInteger, formatValidationError } from '../utils/validation.js';

export function createCleanupCommand(): Command {
  return new Command('cleanup')
    .description('Delete sessions (with their files and notes) older than the retention period')
    .option('-d, --days <number>', 'Keep sessions from the last N days (default: retention.days from config)')
    .option('-y, --yes', 'Do not ask for confirmation')
    .option('--config-path <path>', 'Path to configuration file')
    .action(async (options: { days?: string; yes?: boolean; configPath?: string }) => {
      try {
        await withLedger(options.configPath, async ({ config, ledger }) => {
          const days = options.days !== undefined
            ? parseInteger(options.days, 'Days')
            : config.retention.days;

          if (!options.yes) {
            const confirmed = await promptConfirm(
              `Delete every session older than ${days} day(s)? This cannot be undone.`,
              false
            );
            if (!confirmed) {
              console.log('Cleanup cancelled.');
              return;
            }
          }

          const deleted = await ledger.cleanupOldData(days);
          console.log(`🗑️  Removed ${deleted} session(s) older than ${days} day(s)`);
        });
      } catch (error) {
        console.error(formatValidationError(error));
        process.exit(1);
      }
    });
}
