import { Command } from 'commander';
import { promises as fs } from 'fs';
import path from 'path';
import { withLedger } from '../context.js';
import { OpenAIProvider } from '../../providers/openai.js';
import { DocumentReader } from '../../services/document.js';
import { NotesPipeline } from '../../services/notes-pipeline.js';
import { resolveOpenAIApiKey } from '../../utils/config.js';
import { ProgressIndicator, formatCost, formatSeconds } from '../utils/progress.js';
import { validateFilePath, parseTemperature, formatValidationError } from '../utils/validation.js';

interface ProcessOptions {
  model?: string;
  temperature?: string;
  output?: string;
  configPath?: string;
}

export function createProcessCommand(): Command {
  return new Command('process')
    .description('Generate Markdown notes from text, PDF and JSON files and record the run')
    .argument('<files...>', 'Input files (.txt, .pdf, .json)')
    .option('-m, --model <model>', 'Chat model (default: processing.model from config)')
    .option('-t, --temperature <number>', 'Sampling temperature between 0 and 1')
    .option('-o, --output <path>', 'Write the notes to this file instead of stdout')
    .option('--config-path <path>', 'Path to configuration file')
    .action(async (files: string[], options: ProcessOptions) => {
      try {
        await processFiles(files, options);
      } catch (error) {
        console.error(formatValidationError(error));
        process.exit(1);
      }
    });
}

async function processFiles(filePaths: string[], options: ProcessOptions): Promise<void> {
  filePaths.forEach(validateFilePath);

  await withLedger(options.configPath, async ({ config, ledger, query, logger }) => {
    const model = options.model ?? config.processing.model;
    const temperature = options.temperature !== undefined
      ? parseTemperature(options.temperature)
      : config.processing.temperature;

    const provider = new OpenAIProvider(resolveOpenAIApiKey(config));
    const reader = new DocumentReader({
      maxFileSizeMb: config.processing.maxFileSizeMb,
      supportedFileTypes: config.processing.supportedFileTypes,
    });
    const pipeline = new NotesPipeline(reader, provider, {
      model,
      temperature,
      maxTokens: config.processing.maxTokens,
      prompt: config.processing.prompt,
    });

    const startTime = Date.now();
    const read = await pipeline.readInputs(filePaths);
    for (const message of read.errors) {
      console.error(`⚠️  ${message}`);
    }

    const sessionId = await ledger.startSession(model, temperature, read.inputs);
    logger.debug({ sessionId }, 'Generating notes');

    const progress = new ProgressIndicator(`Generating notes with ${model}...`);
    progress.start();
    const generated = await pipeline.generate(read.documents);

    const errors = [...read.errors, ...generated.errors];
    const success = generated.outputText.length > 0;
    const processingTime = (Date.now() - startTime) / 1000;

    if (success) {
      progress.stop(`Notes generated in ${formatSeconds(processingTime)}`);
      // Delivered before the ledger write, which may still fail
      await deliverNotes(generated.outputText, options.output);
    } else {
      progress.fail('Note generation failed');
      for (const message of generated.errors) {
        console.error(`❌ ${message}`);
      }
      process.exitCode = 1;
    }

    await ledger.completeSession(sessionId, {
      success,
      notesContent: generated.outputText,
      processingTime,
      errorMessage: errors.length > 0 ? errors.join('; ') : null,
    });

    const details = await query.getSessionDetails(sessionId);
    if (!details) {
      return;
    }

    const { session } = details;
    if (generated.usage) {
      logger.info(
        {
          sessionId,
          reportedInputTokens: generated.usage.promptTokens,
          reportedOutputTokens: generated.usage.completionTokens,
          estimatedInputTokens: session.total_input_tokens,
          estimatedOutputTokens: session.total_output_tokens,
        },
        'Provider token usage'
      );
    }

    if (!success) {
      console.error(`Session ${sessionId} recorded as failed.`);
      return;
    }

    console.error(
      `📊 Session ${sessionId}: ${session.total_input_tokens} input / ${session.total_output_tokens} output tokens, ` +
      `estimated ${formatCost(session.estimated_cost_usd)}`
    );
  });
}

async function deliverNotes(notes: string, output: string | undefined): Promise<void> {
  if (!output) {
    console.log(notes);
    return;
  }

  const outputPath = path.resolve(output);
  await fs.writeFile(outputPath, notes, 'utf-8');
  console.error(`📝 Notes written to ${outputPath}`);
}
