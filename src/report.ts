/**
 * infrar-transform Report
 * Stable envelope format for machine consumers and a human-readable summary
 */

import { SCHEMA_VERSION } from './config.js';
import type { BatchResult, ScannedFile } from './batch.js';
import type { Provider, SkipCode } from './types.js';

export interface ReportSkip {
  file: string;
  line: number;
  column: number;
  function: string;
  code: SkipCode;
  reason: string;
  detail?: string;
}

export interface ReportFile {
  file: string;
  output?: string;
  status: string;
  transformed: number;
  skipped: number;
  error?: string;
}

export interface TransformReport {
  provider: Provider;
  ok: boolean;
  stats: BatchResult['stats'];
  files: ReportFile[];
  skipped: ReportSkip[];
  failed: Array<{ file: string; error: string }>;
}

export type ReportCommand = 'transform' | 'scan' | 'rules';

/**
 * Stable output shape for machine consumers. Keys are declared, and built,
 * in sorted order so serialized output is deterministic.
 */
export interface ReportEnvelope<T> {
  command: ReportCommand;
  data: T;
  metadata?: Record<string, string>;
  schema_version: string;
  timestamp: number;
}

export function createEnvelope<T>(
  command: ReportCommand,
  data: T,
  metadata?: Record<string, string>
): ReportEnvelope<T> {
  return {
    command,
    data,
    ...(metadata && Object.keys(metadata).length > 0 ? { metadata } : {}),
    schema_version: SCHEMA_VERSION,
    timestamp: Date.now(),
  };
}

export function wrapInEnvelope<T>(command: ReportCommand, data: T, metadata?: Record<string, string>): string {
  return JSON.stringify(createEnvelope(command, data, metadata), null, 2);
}

/**
 * Flatten a batch result into the report every skipped site is listed in
 */
export function buildReport(result: BatchResult): TransformReport {
  const files: ReportFile[] = result.files.map(o => ({
    file: o.file,
    output: o.output,
    status: o.status,
    transformed: o.transformed,
    skipped: o.skipped.length,
    error: o.error,
  }));

  const skipped: ReportSkip[] = result.files.flatMap(o =>
    o.skipped.map(s => ({
      file: s.file,
      line: s.line,
      column: s.column,
      function: s.function,
      code: s.code,
      reason: s.reason,
      detail: s.detail,
    }))
  );

  const failed = result.files.flatMap(o => (o.error !== undefined ? [{ file: o.file, error: o.error }] : []));

  return { provider: result.provider, ok: result.ok, stats: result.stats, files, skipped, failed };
}

/**
 * Format a transform report for the terminal
 */
export function formatReport(report: TransformReport): string {
  const lines: string[] = [];
  const { stats } = report;

  lines.push(`Provider: ${report.provider}`);
  lines.push(
    `Files: ${stats.files} (${stats.transformed_files} transformed, ${stats.failed_files} failed)`
  );
  lines.push(`Calls: ${stats.transformed_calls} rewritten, ${stats.skipped_calls} skipped`);

  if (report.skipped.length > 0) {
    lines.push('');
    lines.push('SKIPPED CALL SITES:');
    for (const skip of report.skipped) {
      const detail = skip.detail ? ` (${skip.detail})` : '';
      lines.push(`  ${skip.file}:${skip.line}:${skip.column} ${skip.function}: ${skip.reason}${detail}`);
    }
  }

  if (report.failed.length > 0) {
    lines.push('');
    lines.push('FAILED FILES:');
    for (const failure of report.failed) {
      lines.push(`  ${failure.file}: ${failure.error}`);
    }
  }

  return lines.join('\n');
}

/**
 * Format scan results for the terminal
 */
export function formatScanOutput(files: ScannedFile[]): string {
  const lines: string[] = [];
  let total = 0;

  for (const scanned of files) {
    if (scanned.error) {
      lines.push(`${scanned.file}: failed: ${scanned.error}`);
      continue;
    }
    for (const { site, skip } of scanned.sites) {
      total++;
      const note = skip ? `  [skip: ${skip.code}]` : '';
      lines.push(`${scanned.file}:${site.line}:${site.column} ${site.qualifiedName}${note}`);
    }
  }

  lines.push('');
  lines.push(`${total} recognized call site(s) in ${files.length} file(s)`);
  return lines.join('\n');
}
