import { Command } from 'commander';
import { ConfigManager } from '../../utils/config.js';
import { OpenAIProvider } from '../../providers/openai.js';
import { CostEstimator } from '../../services/cost-estimator.js';
import { ProgressIndicator } from '../utils/progress.js';
import { promptUser, promptSecret, promptConfirm } from '../utils/input.js';
import { validateApiKey, parseTemperature, parseInteger, formatValidationError } from '../utils/validation.js';

interface InitOptions {
  configPath?: string;
  force?: boolean;
  skipValidation?: boolean;
}

export function createInitCommand(): Command {
  return new Command('init')
    .description('Create the notes-ledger configuration with interactive setup')
    .option('--config-path <path>', 'Path to configuration file')
    .option('--force', 'Overwrite existing configuration')
    .option('--skip-validation', 'Do not call the OpenAI API to check the key')
    .action(async (options: InitOptions) => {
      try {
        await initializeConfiguration(options);
      } catch (error) {
        console.error(formatValidationError(error));
        process.exit(1);
      }
    });
}

async function initializeConfiguration(options: InitOptions): Promise<void> {
  console.log('🚀 Notes Ledger Configuration Setup');
  console.log('');

  const configManager = new ConfigManager(options.configPath);

  if (await configManager.exists() && !options.force) {
    const overwrite = await promptConfirm(
      'Configuration already exists. Do you want to overwrite it?',
      false
    );

    if (!overwrite) {
      console.log('Configuration setup cancelled.');
      return;
    }
  }

  console.log('📋 OpenAI Configuration');
  const apiKey = await configureApiKey(options.skipValidation ?? false);
  console.log('');

  console.log('📋 Processing Configuration');
  const knownModels = new CostEstimator().listModels();
  console.log(`  Priced models: ${knownModels.join(', ')}`);
  const model = await promptUser('Default model', 'gpt-4');
  const temperature = parseTemperature(await promptUser('Temperature (0-1)', '0.3'));
  const retentionDays = parseInteger(await promptUser('Keep history for how many days', '90'), 'Retention days');
  console.log('');

  const progress = new ProgressIndicator('Saving configuration...');
  progress.start();

  try {
    const saved = await configManager.save({
      providers: apiKey ? { openai: { apiKey } } : {},
      processing: { model, temperature },
      retention: { days: retentionDays },
    });
    progress.stop('Configuration saved successfully!');
    console.log(`📁 Config: ${configManager.getConfigPath()}`);
    console.log(`💾 Database: ${saved.database.path}`);
  } catch (error) {
    progress.fail('Failed to save configuration');
    throw error;
  }

  console.log('');
  console.log('✅ Setup complete!');
  console.log('');
  console.log('Next steps:');
  console.log('  1. Initialize the database: notes-ledger db-init');
  console.log('  2. Generate notes: notes-ledger process <files...>');
  console.log('  3. Review runs: notes-ledger history');
  console.log('');
}

/**
 * Ask for an API key until one validates. An empty answer defers to OPENAI_API_KEY.
 */
async function configureApiKey(skipValidation: boolean): Promise<string | undefined> {
  for (;;) {
    const apiKey = await promptSecret('Enter your OpenAI API key (leave empty to use OPENAI_API_KEY)');
    if (apiKey.length === 0) {
      return undefined;
    }

    try {
      validateApiKey(apiKey);

      if (skipValidation) {
        return apiKey;
      }

      const progress = new ProgressIndicator('Validating OpenAI API key...');
      progress.start();

      const valid = await new OpenAIProvider(apiKey).validateApiKey(apiKey);
      if (valid) {
        progress.stop('OpenAI API key is valid!');
        return apiKey;
      }
      progress.fail('Invalid OpenAI API key');
    } catch (error) {
      console.log(formatValidationError(error));
    }

    const retry = await promptConfirm('Would you like to try again?', true);
    if (!retry) {
      throw new Error('OpenAI configuration cancelled');
    }
  }
}
