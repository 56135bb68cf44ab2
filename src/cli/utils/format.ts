import type { AnalyticsSummary, SessionDetails, SessionSummary } from '../../types/session.js';
import { formatCost, formatFileSize, formatSeconds } from './progress.js';

export type OutputFormat = 'table' | 'json';

export function parseOutputFormat(value: string): OutputFormat {
  return value === 'json' ? 'json' : 'table';
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

export function statusLabel(session: SessionSummary): string {
  if (session.success) return '✅ success';
  // A run that never completed has no outcome recorded yet.
  return session.error_message ? '❌ failed' : '⏳ pending/failed';
}

export function printSessionTable(sessions: SessionSummary[]): void {
  if (sessions.length === 0) {
    console.log('No sessions found.');
    return;
  }

  for (const session of sessions) {
    console.log(`${session.session_id}  ${new Date(session.created_at).toLocaleString()}  ${statusLabel(session)}`);
    console.log(
      `   🤖 ${session.model_used} (t=${session.temperature})  📄 ${session.total_files} files  ` +
      `🔢 ${session.total_input_tokens} in / ${session.total_output_tokens} out  ` +
      `💰 ${formatCost(session.estimated_cost_usd)}  ⏱️  ${formatSeconds(session.processing_time_seconds)}`
    );
    if (session.error_message) {
      console.log(`   ⚠️  ${truncateText(session.error_message, 100)}`);
    }
  }
}

export function printSessionDetails(details: SessionDetails, showNotes: boolean): void {
  const { session, files, notes } = details;

  console.log(`═══ Session ${session.session_id} ═══`);
  console.log(`📅 Created: ${new Date(session.created_at).toLocaleString()}`);
  console.log(`🤖 Model: ${session.model_used} (temperature ${session.temperature})`);
  console.log(`📊 Status: ${statusLabel(session)}`);
  console.log(`🔢 Tokens: ${session.total_input_tokens} input, ${session.total_output_tokens} output`);
  console.log(`💰 Estimated cost: ${formatCost(session.estimated_cost_usd)}`);
  console.log(`⏱️  Processing time: ${formatSeconds(session.processing_time_seconds)}`);
  console.log(`📝 Notes length: ${session.notes_length} characters`);
  if (session.error_message) {
    console.log(`⚠️  Error: ${session.error_message}`);
  }

  console.log(`\n📂 Files (${files.length}):`);
  for (const file of files) {
    const marker = file.processing_success ? '✅' : '❌';
    console.log(`  ${marker} ${file.filename} [${file.file_type}] ${formatFileSize(file.file_size_bytes)}`);
    if (file.error_message) {
      console.log(`     ${file.error_message}`);
    }
  }

  if (notes) {
    console.log(`\n🔑 Notes hash: ${notes.notes_hash}`);
    if (showNotes) {
      console.log('');
      console.log(notes.notes_content);
    }
  }
}

export function printAnalytics(analytics: AnalyticsSummary): void {
  console.log('📊 Processing Analytics\n');
  console.log(`  • Sessions: ${analytics.totalSessions}`);
  console.log(`  • Successful: ${analytics.successfulSessions} (${analytics.successRatePercent.toFixed(1)}%)`);
  console.log(`  • Total cost: $${analytics.totalCostUsd.toFixed(4)}`);
  console.log(`  • Input tokens: ${analytics.totalInputTokens}`);
  console.log(`  • Output tokens: ${analytics.totalOutputTokens}`);
  console.log(`  • Avg processing time: ${formatSeconds(analytics.avgProcessingTimeSeconds)}`);

  const models = Object.entries(analytics.modelUsage);
  if (models.length > 0) {
    console.log('\n🤖 Model usage:');
    for (const [model, count] of models) {
      console.log(`  • ${model}: ${count}`);
    }
  }
}

export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return text.substring(0, maxLength - 3) + '...';
}
