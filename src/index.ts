/**
 * infrar-transform - deployment-time rewriting of infrar.storage calls
 * into native AWS, GCP and Azure SDK calls.
 *
 * @packageDocumentation
 */

// Main exports
export { transform, inspectSource, type TransformOptions, type InspectedSite } from './transformer.js';
export {
  transformFiles,
  scanFiles,
  discoverSources,
  type BatchOptions,
  type BatchResult,
  type BatchStats,
  type FileOutcome,
  type ScannedFile,
} from './batch.js';
export { getConfig, loadConfig, resetConfig, setConfig, SCHEMA_VERSION, type TransformConfig } from './config.js';

// Parsing and scanning
export { tokenize } from './parser/tokenizer.js';
export { parseSourceUnit } from './parser/source-unit.js';
export { scanCallSites, type CallScan, type ScanFailure } from './scanner.js';

// Rules and contract
export { RuleRepository, loadRuleRepository, parseTemplate, formatRulesOutput, type RuleSourceJSON } from './rules.js';
export { parseContract, loadContract, getContractFunction, recognizedNames } from './contract.js';

// Rewriting
export { resolveArguments, type ArgumentResolution } from './resolver.js';
export { Rewriter, instantiate } from './rewriter.js';
export { emit } from './emitter.js';

// Reporting
export {
  wrapInEnvelope,
  createEnvelope,
  buildReport,
  formatReport,
  formatScanOutput,
  type ReportCommand,
  type ReportEnvelope,
  type TransformReport,
  type ReportSkip,
  type ReportFile,
} from './report.js';

// Errors
export {
  TransformError,
  FatalParseError,
  MissingRuleError,
  RuleValidationError,
  RewriteStateError,
  isTransformError,
  type ErrorCode,
} from './errors.js';

// Types
export type * from './types.js';
export { PROVIDERS, SKIP_REASONS, isProvider } from './types.js';
