#!/usr/bin/env node

/**
 * infrar-transform CLI
 * Rewrites infrar.storage calls into native cloud SDK calls
 */

import { Command } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import { getConfig } from '../config.js';
import type { TransformConfig } from '../config.js';
import { isProvider, PROVIDERS } from '../types.js';
import type { Provider } from '../types.js';
import { loadRuleRepository, formatRulesOutput } from '../rules.js';
import { loadContract } from '../contract.js';
import { transformFiles, scanFiles } from '../batch.js';
import { buildReport, formatReport, formatScanOutput, wrapInEnvelope } from '../report.js';

interface TransformCommandOptions {
  provider?: string;
  input: string;
  output: string;
  rules?: string;
  report?: string;
  json?: boolean;
  verbose?: boolean;
}

interface ScanCommandOptions {
  input: string;
  json?: boolean;
}

interface RulesCommandOptions {
  provider?: string;
  rules?: string;
  json?: boolean;
}

const program = new Command();

program
  .name('infrar-transform')
  .description('Rewrite provider-agnostic infrar.storage calls into native AWS, GCP or Azure SDK calls')
  .version('0.1.0');

function parseProvider(value: string | undefined, config: TransformConfig): Provider {
  const provider = value ?? config.provider;
  if (provider === undefined) {
    throw new Error(`No provider given. Use --provider <${PROVIDERS.join('|')}> or set INFRAR_PROVIDER`);
  }
  const normalized = provider.toLowerCase();
  if (!isProvider(normalized)) {
    throw new Error(`Unknown provider "${provider}". Expected one of: ${PROVIDERS.join(', ')}`);
  }
  return normalized;
}

// =============================================================================
// TRANSFORM COMMAND
// =============================================================================

program
  .command('transform')
  .description('Transform a Python file or directory for one cloud provider')
  .option('-p, --provider <provider>', `Target provider: ${PROVIDERS.join(', ')}`)
  .requiredOption('-i, --input <path>', 'Input file or directory')
  .requiredOption('-o, --output <path>', 'Output file or directory')
  .option('-r, --rules <dir>', 'Directory of <provider>.json rule files')
  .option('--report <file>', 'Write the machine-readable report to a file')
  .option('--json', 'Output the report as JSON')
  .option('-v, --verbose', 'Show per-file progress')
  .action(async (options: TransformCommandOptions) => {
    try {
      const config = getConfig();
      const provider = parseProvider(options.provider, config);
      const verbose = (options.verbose ?? config.verbose) && !options.json;
      const repository = loadRuleRepository({
        rulesDir: options.rules ?? config.rulesDir,
        contractPath: config.contractPath,
      });

      const result = await transformFiles({
        provider,
        input: options.input,
        output: options.output,
        repository,
        concurrency: config.concurrency,
        verbose,
      });

      const report = buildReport(result);
      const metadata = { input: path.resolve(options.input), output: path.resolve(options.output) };

      if (options.report) {
        fs.writeFileSync(options.report, wrapInEnvelope('transform', report, metadata) + '\n', 'utf-8');
      }

      if (options.json) {
        console.log(wrapInEnvelope('transform', report, metadata));
      } else {
        console.log(formatReport(report));
      }

      if (!result.ok) {
        process.exitCode = 1;
      }
    } catch (error) {
      console.error('Transform failed:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

// =============================================================================
// SCAN COMMAND
// =============================================================================

program
  .command('scan')
  .description('List recognized infrar.storage call sites without rewriting')
  .requiredOption('-i, --input <path>', 'Input file or directory')
  .option('--json', 'Output as JSON')
  .action(async (options: ScanCommandOptions) => {
    try {
      const config = getConfig();
      const contract = loadContract(config.contractPath);
      const files = await scanFiles(options.input, contract, config.concurrency);

      if (options.json) {
        const data = files.map(f => ({
          file: f.file,
          error: f.error,
          sites: f.sites.map(({ site, skip }) => ({
            line: site.line,
            column: site.column,
            function: site.qualifiedName,
            capture: site.capture,
            skip: skip?.code,
          })),
        }));
        console.log(wrapInEnvelope('scan', data));
      } else {
        console.log(formatScanOutput(files));
      }

      if (files.some(f => f.error !== undefined)) {
        process.exitCode = 1;
      }
    } catch (error) {
      console.error('Scan failed:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

// =============================================================================
// RULES COMMAND
// =============================================================================

program
  .command('rules')
  .description('List loaded transform rules')
  .option('-p, --provider <provider>', 'Filter by provider')
  .option('-r, --rules <dir>', 'Directory of <provider>.json rule files')
  .option('--json', 'Output as JSON')
  .action((options: RulesCommandOptions) => {
    try {
      const config = getConfig();
      const provider = options.provider === undefined ? undefined : parseProvider(options.provider, config);
      const repository = loadRuleRepository({
        rulesDir: options.rules ?? config.rulesDir,
        contractPath: config.contractPath,
      });

      if (options.json) {
        const data = repository.list(provider).map(rule => ({
          function: rule.function,
          provider: rule.provider,
          template: rule.template,
          imports: rule.imports,
          setup: rule.setup,
          no_capture: rule.noCapture,
        }));
        console.log(wrapInEnvelope('rules', data));
        return;
      }

      console.log(formatRulesOutput(repository, provider));
    } catch (error) {
      console.error('Rules listing failed:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

// =============================================================================
// PARSE AND RUN
// =============================================================================

program.parseAsync().catch((err: unknown) => {
  console.error('Error:', err);
  process.exit(1);
});
