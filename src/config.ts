/**
 * infrar-transform Configuration
 * Rule/contract locations, default provider and batch settings
 */

import * as path from 'path';
import { fileURLToPath } from 'url';
import { PROVIDERS } from './types.js';
import type { Provider } from './types.js';

export const SCHEMA_VERSION = '1.0';

export interface TransformConfig {
  provider?: Provider;
  rulesDir: string;
  contractPath: string;
  concurrency: number;
  verbose: boolean;
}

// =============================================================================
// DEFAULT CONFIGURATION
// =============================================================================

// src/ and dist/ both sit one level below the package root
const PACKAGE_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');

const DEFAULT_CONFIG: TransformConfig = {
  rulesDir: path.join(PACKAGE_ROOT, 'rules'),
  contractPath: path.join(PACKAGE_ROOT, 'contracts', 'infrar.storage.json'),
  concurrency: 8,
  verbose: false,
};

// =============================================================================
// ENVIRONMENT VARIABLES
// =============================================================================

/**
 * Environment variables that override default config
 *
 * INFRAR_PROVIDER: 'aws' | 'gcp' | 'azure' - Default target provider
 * INFRAR_RULES_DIR: string - Directory of <provider>.json rule files
 * INFRAR_CONTRACT: string - Path to the SDK contract JSON
 * INFRAR_CONCURRENCY: number - Files processed at once in batch mode
 * INFRAR_VERBOSE: 'true' | 'false' - Progress output
 */

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === 'true';
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) || parsed < 1 ? defaultValue : parsed;
}

function getEnvProvider(key: string): Provider | undefined {
  const value = process.env[key]?.toLowerCase();
  return PROVIDERS.find(p => p === value);
}

// =============================================================================
// CONFIGURATION LOADING
// =============================================================================

/**
 * Load configuration from environment and defaults
 */
export function loadConfig(): TransformConfig {
  return {
    provider: getEnvProvider('INFRAR_PROVIDER'),
    rulesDir: process.env['INFRAR_RULES_DIR'] || DEFAULT_CONFIG.rulesDir,
    contractPath: process.env['INFRAR_CONTRACT'] || DEFAULT_CONFIG.contractPath,
    concurrency: getEnvNumber('INFRAR_CONCURRENCY', DEFAULT_CONFIG.concurrency),
    verbose: getEnvBoolean('INFRAR_VERBOSE', DEFAULT_CONFIG.verbose),
  };
}

// =============================================================================
// EXPORT CONFIG SINGLETON
// =============================================================================

let cachedConfig: TransformConfig | null = null;

/**
 * Get the current configuration (cached)
 */
export function getConfig(): TransformConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

/**
 * Reset the cached configuration (for testing)
 */
export function resetConfig(): void {
  cachedConfig = null;
}

/**
 * Override configuration (for testing)
 */
export function setConfig(config: Partial<TransformConfig>): TransformConfig {
  cachedConfig = { ...loadConfig(), ...config };
  return cachedConfig;
}
