import { z } from 'zod';

// SQLite has no boolean column type; rows carry 0/1.
const sqliteBoolean = z.union([z.boolean(), z.number().int()]).transform(value => Boolean(value));

export const SessionRowSchema = z.object({
  session_id: z.string(),
  created_at: z.string(),
  model_used: z.string(),
  temperature: z.number(),
  total_files: z.number().int(),
  processing_time_seconds: z.number().nullable().transform(value => value ?? 0),
  total_input_tokens: z.number().int().nullable().transform(value => value ?? 0),
  total_output_tokens: z.number().int().nullable().transform(value => value ?? 0),
  estimated_cost_usd: z.number().nullable().transform(value => value ?? 0),
  success: sqliteBoolean,
  error_message: z.string().nullable(),
  notes_length: z.number().int().nullable().transform(value => value ?? 0),
});

export const ProcessedFileRowSchema = z.object({
  session_id: z.string(),
  filename: z.string(),
  file_type: z.string(),
  file_size_bytes: z.number().int(),
  file_hash: z.string(),
  content_preview: z.string().nullable(),
  processing_success: sqliteBoolean,
  error_message: z.string().nullable(),
});

export const GeneratedNoteRowSchema = z.object({
  session_id: z.string(),
  notes_content: z.string(),
  notes_hash: z.string(),
  created_at: z.string(),
});

/**
 * One processing run. Outcome fields keep their defaults until the run is completed.
 */
export type Session = z.infer<typeof SessionRowSchema>;

export type ProcessedFile = z.infer<typeof ProcessedFileRowSchema>;

export type GeneratedNote = z.infer<typeof GeneratedNoteRowSchema>;

export type SessionSummary = Session;

export interface SessionDetails {
  session: Session;
  files: ProcessedFile[];
  notes: GeneratedNote | null;
}

export const FileInputSchema = z.object({
  filename: z.string().min(1, 'filename cannot be empty'),
  fileType: z.string(),
  fileSize: z.number().int().nonnegative(),
  content: z.string(),
  processingSuccess: z.boolean().default(true),
  errorMessage: z.string().nullable().default(null),
});

export type FileInput = z.input<typeof FileInputSchema>;

export const StartSessionInputSchema = z.object({
  model: z.string().min(1, 'model cannot be empty'),
  temperature: z.number().min(0).max(1),
  files: z.array(FileInputSchema),
});

export const CompleteSessionInputSchema = z.object({
  success: z.boolean(),
  notesContent: z.string().default(''),
  processingTime: z.number().nonnegative().default(0),
  errorMessage: z.string().nullable().default(null),
});

export type CompleteSessionInput = z.input<typeof CompleteSessionInputSchema>;

export interface SearchFilters {
  query?: string;
  model?: string;
  startDate?: Date;
  endDate?: Date;
}

export interface AnalyticsSummary {
  totalSessions: number;
  successfulSessions: number;
  successRatePercent: number;
  totalCostUsd: number;
  totalInputTokens: number;
  totalOutputTokens: number;
  avgProcessingTimeSeconds: number;
  modelUsage: Record<string, number>;
}
