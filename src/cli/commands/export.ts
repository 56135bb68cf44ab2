import { Command } from 'commander';
import { withLedger } from '../context.js';
import { parseExportFormat } from '../../services/export.js';
import { formatValidationError } from '../utils/validation.js';

export function createExportCommand(): Command {
  return new Command('export')
    .description('Export up to 1000 recent sessions to a timestamped CSV or JSON file')
    .argument('<format>', 'csv or json')
    .option('--config-path <path>', 'Path to configuration file')
    .action(async (format: string, options: { configPath?: string }) => {
      try {
        // Reject unknown formats before opening the database
        parseExportFormat(format);

        await withLedger(options.configPath, async ({ exporter }) => {
          const filePath = await exporter.export(format);
          console.log(`✅ Exported to ${filePath}`);
        });
      } catch (error) {
        console.error(formatValidationError(error));
        process.exit(1);
      }
    });
}
