/**
 * infrar-transform Batch Runner
 * Transforms a file or a directory tree of Python sources for one provider
 */

import * as fs from 'fs';
import * as path from 'path';
import { glob } from 'glob';
import pLimit from 'p-limit';
import type { Provider, SdkContract, SkipRecord, TransformResult } from './types.js';
import { MissingRuleError, RuleValidationError } from './errors.js';
import type { RuleRepository } from './rules.js';
import { inspectSource, transform } from './transformer.js';
import type { InspectedSite } from './transformer.js';

export interface BatchOptions {
  provider: Provider;
  input: string;
  output: string;
  repository: RuleRepository;
  concurrency?: number;
  verbose?: boolean;
}

export interface FileOutcome {
  file: string;           // input path, relative to the input directory
  output?: string;        // written path; absent when the file failed
  status: TransformResult['status'] | 'failed';
  transformed: number;
  skipped: SkipRecord[];
  error?: string;
}

export interface BatchStats {
  files: number;
  transformed_files: number;
  failed_files: number;
  transformed_calls: number;
  skipped_calls: number;
}

export interface BatchResult {
  provider: Provider;
  files: FileOutcome[];
  stats: BatchStats;
  ok: boolean;            // false when any file failed to parse
}

export interface ScannedFile {
  file: string;
  sites: InspectedSite[];
  error?: string;
}

const SOURCE_PATTERN = '**/*.py';
const IGNORE = ['**/node_modules/**', '**/__pycache__/**', '**/venv/**', '**/.venv/**', '**/.git/**', 'build/**', 'dist/**'];
const DEFAULT_CONCURRENCY = 8;

// =============================================================================
// FILE DISCOVERY
// =============================================================================

/**
 * Resolve the input to a list of [label, absolute path] pairs.
 * A file input is its own single entry; a directory is globbed for Python sources.
 */
export async function discoverSources(input: string): Promise<Array<{ file: string; absolute: string }>> {
  const stat = await fs.promises.stat(input);
  if (stat.isFile()) {
    return [{ file: path.basename(input), absolute: path.resolve(input) }];
  }

  const files = await glob(SOURCE_PATTERN, { cwd: input, ignore: IGNORE, nodir: true, posix: true });
  return files.sort().map(file => ({ file, absolute: path.resolve(input, file) }));
}

// =============================================================================
// TRANSFORM
// =============================================================================

/**
 * Message for an error confined to one file. Rule set errors concern the
 * whole run and are rethrown.
 */
function fileFailure(error: unknown): string {
  if (error instanceof MissingRuleError || error instanceof RuleValidationError) throw error;
  return error instanceof Error ? error.message : String(error);
}

/**
 * Transform every source under `input` and write results under `output`,
 * mirroring the input tree. Files that cannot be read, parsed or written are
 * reported as failed and do not stop the others.
 * A missing rule aborts the whole run before any file is read.
 */
export async function transformFiles(options: BatchOptions): Promise<BatchResult> {
  const { provider, repository, verbose } = options;
  repository.assertComplete(provider);

  const inputIsFile = (await fs.promises.stat(options.input)).isFile();
  const sources = await discoverSources(options.input);
  const limit = pLimit(Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY));

  if (verbose) {
    console.log(`Transforming ${sources.length} file(s) for ${provider}`);
  }

  const outcomes = await Promise.all(
    sources.map(({ file, absolute }) =>
      limit(async (): Promise<FileOutcome> => {
        try {
          const text = await fs.promises.readFile(absolute, 'utf-8');
          const result = transform(text, provider, { repository, file });

          const target = inputIsFile ? options.output : path.join(options.output, file);
          await fs.promises.mkdir(path.dirname(target), { recursive: true });
          await fs.promises.writeFile(target, result.code, 'utf-8');

          if (verbose) {
            console.log(`  - ${file}: ${result.status} (${result.transformed.length} rewritten, ${result.skipped.length} skipped)`);
          }

          return {
            file,
            output: target,
            status: result.status,
            transformed: result.transformed.length,
            skipped: result.skipped,
          };
        } catch (error) {
          const message = fileFailure(error);
          if (verbose) console.log(`  ✗ ${file}: ${message}`);
          return { file, status: 'failed', transformed: 0, skipped: [], error: message };
        }
      })
    )
  );

  const stats: BatchStats = {
    files: outcomes.length,
    transformed_files: outcomes.filter(o => o.status === 'transformed' || o.status === 'partial').length,
    failed_files: outcomes.filter(o => o.status === 'failed').length,
    transformed_calls: outcomes.reduce((sum, o) => sum + o.transformed, 0),
    skipped_calls: outcomes.reduce((sum, o) => sum + o.skipped.length, 0),
  };

  return { provider, files: outcomes, stats, ok: stats.failed_files === 0 };
}

// =============================================================================
// SCAN
// =============================================================================

/**
 * List recognized call sites under `input` without writing anything
 */
export async function scanFiles(input: string, contract: SdkContract, concurrency = DEFAULT_CONCURRENCY): Promise<ScannedFile[]> {
  const sources = await discoverSources(input);
  const limit = pLimit(Math.max(1, concurrency));

  return Promise.all(
    sources.map(({ file, absolute }) =>
      limit(async (): Promise<ScannedFile> => {
        try {
          const text = await fs.promises.readFile(absolute, 'utf-8');
          return { file, sites: inspectSource(text, contract) };
        } catch (error) {
          return { file, sites: [], error: fileFailure(error) };
        }
      })
    )
  );
}
