/**
 * Shared test fixtures for infrar-transform tests
 */

import * as path from 'path';
import { fileURLToPath } from 'url';
import { RuleRepository, loadRuleRepository } from '../rules.js';
import type { RuleSourceJSON } from '../rules.js';
import { loadContract } from '../contract.js';
import { parseSourceUnit } from '../parser/source-unit.js';
import { scanCallSites } from '../scanner.js';
import type { CallScan } from '../scanner.js';
import type { SdkContract, SourceUnit } from '../types.js';

const PACKAGE_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..');

export const RULES_DIR = path.join(PACKAGE_ROOT, 'rules');
export const CONTRACT_PATH = path.join(PACKAGE_ROOT, 'contracts', 'infrar.storage.json');

let repository: RuleRepository | null = null;

/**
 * The rules and contract shipped with the package (loaded once)
 */
export function defaultRepository(): RuleRepository {
  if (!repository) {
    repository = loadRuleRepository({ rulesDir: RULES_DIR, contractPath: CONTRACT_PATH });
  }
  return repository;
}

export function defaultContract(): SdkContract {
  return loadContract(CONTRACT_PATH);
}

/**
 * Parse and scan Python source against the shipped contract
 */
export function scanSource(source: string): { unit: SourceUnit; scan: CallScan } {
  const unit = parseSourceUnit(source);
  return { unit, scan: scanCallSites(unit, defaultContract()) };
}

/**
 * Join lines with '\n' and end with a trailing newline
 */
export function py(...lines: string[]): string {
  return lines.join('\n') + '\n';
}

/**
 * A minimal rule source covering every contract function for one provider
 */
export function createRuleSource(overrides: Partial<RuleSourceJSON> = {}): RuleSourceJSON {
  return {
    provider: 'aws',
    rules: [
      { function: 'upload', template: 'put({bucket}, {source}, {destination})', imports: ['import native'] },
      { function: 'download', template: 'get({bucket}, {source}, {destination})', imports: ['import native'] },
      { function: 'delete', template: 'rm({bucket}, {path})', imports: ['import native'] },
      { function: 'list_objects', template: 'ls({bucket}, {prefix})', imports: ['import native'], no_capture: true },
    ],
    ...overrides,
  };
}
