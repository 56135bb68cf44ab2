import { z } from 'zod';

export const DEFAULT_NOTES_PROMPT = `You are an expert note-taker. Turn the provided content into well-organised lecture-style notes in Markdown.

Formatting rules:
1. Start with a single "# " title that names the main topic.
2. Use "## " for major sections and "### 1. Name" for numbered topics.
3. Use "- " bullets for main points, indented "  - " for sub-points.
4. **Bold** key terms and use *italics* for emphasis.
5. Leave a blank line between sections.

Keep every fact from the source and do not invent material. Answer only with the notes.`;

export const ModelPriceSchema = z.object({
  input: z.number().nonnegative(),
  output: z.number().nonnegative(),
});

export const NotesConfigSchema = z.object({
  version: z.string().default('0.1.0'),
  providers: z.object({
    openai: z.object({
      apiKey: z.string(),
    }).optional(),
  }).default({}),
  processing: z.object({
    model: z.string().default('gpt-4'),
    temperature: z.number().min(0).max(1).default(0.3),
    maxTokens: z.number().int().positive().default(4000),
    maxFileSizeMb: z.number().positive().default(50),
    supportedFileTypes: z.array(z.string()).default(['.txt', '.pdf', '.json']),
    prompt: z.string().default(DEFAULT_NOTES_PROMPT),
  }).default({}),
  database: z.object({
    path: z.string().default(''),
  }).default({}),
  retention: z.object({
    days: z.number().int().nonnegative().default(90),
  }).default({}),
  export: z.object({
    directory: z.string().default(''),
  }).default({}),
  // Extra or overriding prices, per 1000 tokens.
  pricing: z.record(ModelPriceSchema).default({}),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('warn'),
  }).default({}),
});

export type NotesConfig = z.infer<typeof NotesConfigSchema>;

export type ModelPrice = z.infer<typeof ModelPriceSchema>;
