/**
 * SDK Call-Signature Contract
 * The recognized module, its functions and their parameter order/defaults
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { ContractFunction, SdkContract } from './types.js';
import { RuleValidationError } from './errors.js';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const ContractSchema = z.object({
  module: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)+$/, 'module must be a dotted path'),
  version: z.string().min(1),
  functions: z
    .array(
      z.object({
        name: z.string().regex(IDENTIFIER),
        params: z.array(
          z.object({
            name: z.string().regex(IDENTIFIER),
            default: z.string().min(1).optional(),
          })
        ),
      })
    )
    .min(1),
});

/**
 * Validate a contract object (already deserialized)
 */
export function parseContract(raw: unknown, source?: string): SdkContract {
  const result = ContractSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`);
    throw new RuleValidationError(`invalid SDK contract: ${issues.join('; ')}`, source);
  }

  const contract = result.data;
  const seen = new Set<string>();
  for (const fn of contract.functions) {
    if (seen.has(fn.name)) {
      throw new RuleValidationError(`duplicate function ${fn.name} in contract`, source);
    }
    seen.add(fn.name);

    let sawDefault = false;
    const params = new Set<string>();
    for (const param of fn.params) {
      if (params.has(param.name)) {
        throw new RuleValidationError(`duplicate parameter ${fn.name}(${param.name})`, source);
      }
      params.add(param.name);
      if (param.default !== undefined) {
        sawDefault = true;
      } else if (sawDefault) {
        throw new RuleValidationError(`parameter ${fn.name}(${param.name}) without default follows a default`, source);
      }
    }
  }

  return contract;
}

/**
 * Load a contract from a JSON file
 */
export function loadContract(contractPath: string): SdkContract {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(contractPath, 'utf-8'));
  } catch (error) {
    throw new RuleValidationError(
      `cannot read SDK contract: ${error instanceof Error ? error.message : String(error)}`,
      path.basename(contractPath)
    );
  }
  return parseContract(raw, path.basename(contractPath));
}

export function getContractFunction(contract: SdkContract, name: string): ContractFunction | undefined {
  return contract.functions.find(fn => fn.name === name);
}

/**
 * Fully qualified names the scanner recognizes (module + function)
 */
export function recognizedNames(contract: SdkContract): Set<string> {
  return new Set(contract.functions.map(fn => `${contract.module}.${fn.name}`));
}
