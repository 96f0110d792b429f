/**
 * infrar-transform Rule Repository
 * Loads, validates and indexes per-(function, provider) transform rules
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { PROVIDERS } from './types.js';
import type { Provider, SdkContract, TemplatePart, TransformRule } from './types.js';
import { MissingRuleError, RuleValidationError } from './errors.js';
import { getContractFunction, loadContract } from './contract.js';

/**
 * JSON format of a rule file, rules/<provider>.json
 */
const RuleJSONSchema = z.object({
  function: z.string().min(1),
  template: z.string().min(1),
  imports: z.array(z.string().regex(/^(import|from)\s+\S/, 'imports must be import statements')).default([]),
  setup: z.array(z.string().min(1)).default([]),
  params: z.record(z.string()).optional(),
  no_capture: z.boolean().default(false),
});

export const RuleSourceSchema = z.object({
  provider: z.enum(PROVIDERS),
  rules: z.array(RuleJSONSchema),
});

export type RuleSourceJSON = z.input<typeof RuleSourceSchema>;

const PLACEHOLDER_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

// =============================================================================
// TEMPLATES
// =============================================================================

/**
 * Split a native-call template into text and `{placeholder}` parts.
 * `{{` and `}}` stand for literal braces.
 */
export function parseTemplate(template: string, source?: string): TemplatePart[] {
  const parts: TemplatePart[] = [];
  let text = '';
  let i = 0;

  while (i < template.length) {
    const ch = template[i];
    if (ch === '{' && template[i + 1] === '{') {
      text += '{';
      i += 2;
    } else if (ch === '}' && template[i + 1] === '}') {
      text += '}';
      i += 2;
    } else if (ch === '{') {
      const close = template.indexOf('}', i);
      if (close === -1) {
        throw new RuleValidationError(`unclosed placeholder in template "${template}"`, source);
      }
      const name = template.slice(i + 1, close);
      if (!PLACEHOLDER_NAME.test(name)) {
        throw new RuleValidationError(`invalid placeholder {${name}} in template "${template}"`, source);
      }
      if (text) parts.push({ kind: 'text', value: text });
      text = '';
      parts.push({ kind: 'placeholder', name });
      i = close + 1;
    } else if (ch === '}') {
      throw new RuleValidationError(`unmatched '}' in template "${template}"`, source);
    } else {
      text += ch;
      i++;
    }
  }

  if (text) parts.push({ kind: 'text', value: text });
  return parts;
}

function placeholdersOf(parts: TemplatePart[]): string[] {
  const names: string[] = [];
  for (const part of parts) {
    if (part.kind === 'placeholder' && !names.includes(part.name)) names.push(part.name);
  }
  return names;
}

// =============================================================================
// REPOSITORY
// =============================================================================

function ruleKey(fn: string, provider: Provider): string {
  return `${fn}:${provider}`;
}

/**
 * Immutable index of transform rules for one SDK contract.
 * Safe to share between concurrent transforms.
 */
export class RuleRepository {
  private readonly index: ReadonlyMap<string, TransformRule>;

  private constructor(
    readonly contract: SdkContract,
    rules: TransformRule[]
  ) {
    const index = new Map<string, TransformRule>();
    for (const rule of rules) {
      index.set(ruleKey(rule.function, rule.provider), Object.freeze(rule));
    }
    this.index = index;
    Object.freeze(this);
  }

  /**
   * Build a repository from already deserialized rule sources.
   * Throws RuleValidationError on the first invalid rule.
   */
  static fromSources(contract: SdkContract, sources: Array<{ name: string; data: unknown }>): RuleRepository {
    const rules: TransformRule[] = [];
    const seen = new Set<string>();

    for (const { name, data } of sources) {
      const parsed = RuleSourceSchema.safeParse(data);
      if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`);
        throw new RuleValidationError(`invalid rule source: ${issues.join('; ')}`, name);
      }

      for (const json of parsed.data.rules) {
        const rule = convertRule(contract, parsed.data.provider, json, name);
        const key = ruleKey(rule.function, rule.provider);
        if (seen.has(key)) {
          throw new RuleValidationError(`duplicate rule for ${rule.function} on ${rule.provider}`, name);
        }
        seen.add(key);
        rules.push(rule);
      }
    }

    return new RuleRepository(contract, rules);
  }

  /**
   * Load every *.json rule file in a directory
   */
  static load(rulesDir: string, contract: SdkContract): RuleRepository {
    if (!fs.existsSync(rulesDir)) {
      throw new RuleValidationError(`rules directory not found: ${rulesDir}`);
    }

    const files = fs.readdirSync(rulesDir).filter(f => f.endsWith('.json')).sort();
    const sources = files.map(file => {
      const content = fs.readFileSync(path.join(rulesDir, file), 'utf-8');
      try {
        const data: unknown = JSON.parse(content);
        return { name: file, data };
      } catch (error) {
        throw new RuleValidationError(
          `invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
          file
        );
      }
    });

    return RuleRepository.fromSources(contract, sources);
  }

  lookup(fn: string, provider: Provider): TransformRule | undefined {
    return this.index.get(ruleKey(fn, provider));
  }

  /**
   * Like lookup, but a missing rule is fatal for the provider run
   */
  require(fn: string, provider: Provider): TransformRule {
    const rule = this.lookup(fn, provider);
    if (!rule) throw new MissingRuleError(fn, provider);
    return rule;
  }

  /**
   * Fail fast before any file is processed if the provider's rule set is incomplete
   */
  assertComplete(provider: Provider): void {
    for (const fn of this.contract.functions) {
      this.require(fn.name, provider);
    }
  }

  list(provider?: Provider): TransformRule[] {
    const rules = Array.from(this.index.values());
    return provider ? rules.filter(r => r.provider === provider) : rules;
  }

  providers(): Provider[] {
    return PROVIDERS.filter(p => this.list(p).length > 0);
  }
}

function convertRule(
  contract: SdkContract,
  provider: Provider,
  json: z.output<typeof RuleJSONSchema>,
  source: string
): TransformRule {
  const fn = getContractFunction(contract, json.function);
  if (!fn) {
    throw new RuleValidationError(`rule for unknown function ${json.function}`, source);
  }

  const parts = parseTemplate(json.template, source);
  const placeholders = placeholdersOf(parts);

  const params: Record<string, string> = {};
  for (const param of fn.params) {
    params[param.name] = param.name;
  }
  for (const [param, placeholder] of Object.entries(json.params ?? {})) {
    if (!(param in params)) {
      throw new RuleValidationError(`${json.function} has no parameter ${param}`, source);
    }
    params[param] = placeholder;
  }

  const mapped = new Set<string>();
  for (const [param, placeholder] of Object.entries(params)) {
    if (!placeholders.includes(placeholder)) {
      throw new RuleValidationError(
        `template for ${json.function} on ${provider} does not cover parameter ${param}`,
        source
      );
    }
    if (mapped.has(placeholder)) {
      throw new RuleValidationError(`placeholder {${placeholder}} is mapped twice in ${json.function}`, source);
    }
    mapped.add(placeholder);
  }
  for (const placeholder of placeholders) {
    if (!mapped.has(placeholder)) {
      throw new RuleValidationError(
        `placeholder {${placeholder}} in ${json.function} on ${provider} has no parameter`,
        source
      );
    }
  }

  return {
    function: json.function,
    provider,
    template: json.template,
    parts,
    placeholders,
    imports: json.imports,
    setup: json.setup,
    params,
    noCapture: json.no_capture,
  };
}

/**
 * Load the contract and rules named by configuration
 */
export function loadRuleRepository(options: { rulesDir: string; contractPath: string }): RuleRepository {
  const contract = loadContract(options.contractPath);
  return RuleRepository.load(options.rulesDir, contract);
}

/**
 * Format loaded rules for human-readable CLI output
 */
export function formatRulesOutput(repository: RuleRepository, provider?: Provider): string {
  const rules = repository.list(provider);
  if (rules.length === 0) {
    return provider ? `No transform rules loaded for ${provider}.` : 'No transform rules loaded.';
  }

  const lines: string[] = [];
  lines.push(`infrar-transform - ${rules.length} rule(s) for ${repository.contract.module} ${repository.contract.version}`);
  lines.push('');

  for (const p of PROVIDERS) {
    const group = rules.filter(r => r.provider === p);
    if (group.length === 0) continue;

    lines.push(`${p.toUpperCase()} (${group.length}):`);
    for (const rule of group) {
      const flag = rule.noCapture ? ' [no-capture]' : '';
      lines.push(`  - ${rule.function}${flag}`);
      lines.push(`    → ${rule.template}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}
