/**
 * infrar-transform Transformation Driver
 * Runs scan -> resolve -> rewrite -> emit for one source file and one provider
 */

import { SKIP_REASONS } from './types.js';
import type {
  CallSite,
  Provider,
  SdkContract,
  SkipCode,
  SkipRecord,
  TransformResult,
} from './types.js';
import { parseSourceUnit } from './parser/source-unit.js';
import { scanCallSites } from './scanner.js';
import { resolveArguments } from './resolver.js';
import { Rewriter } from './rewriter.js';
import { emit } from './emitter.js';
import { loadRuleRepository, type RuleRepository } from './rules.js';
import { getContractFunction } from './contract.js';
import { getConfig } from './config.js';

export interface TransformOptions {
  repository?: RuleRepository; // defaults to the rules and contract named by configuration
  file?: string;               // label for skip records
}

export interface InspectedSite {
  site: CallSite;
  skip?: { code: SkipCode; detail?: string };
}

const DEFAULT_FILE = '<input>';

function toSkipRecord(file: string, site: CallSite, code: SkipCode, detail?: string): SkipRecord {
  return {
    file,
    line: site.line,
    column: site.column,
    function: site.function,
    code,
    reason: SKIP_REASONS[code],
    detail,
  };
}

/**
 * Rewrite every recognized SDK call in `sourceText` into the provider's native call.
 *
 * Call sites that cannot be rewritten are left untouched and reported in `skipped`.
 * Throws FatalParseError when the text cannot be parsed, and MissingRuleError when
 * a recognized function has no rule for the provider.
 */
export function transform(sourceText: string, provider: Provider, options: TransformOptions = {}): TransformResult {
  const repository = options.repository ?? loadRuleRepository(getConfig());
  const file = options.file ?? DEFAULT_FILE;
  const { contract } = repository;

  const unit = parseSourceUnit(sourceText);
  const scan = scanCallSites(unit, contract);

  const recognized = [...scan.sites, ...scan.failures.map(f => f.site)];
  for (const site of recognized) {
    repository.require(site.function, provider);
  }

  const rewriter = new Rewriter(unit, contract);
  const transformed: CallSite[] = [];
  const skipped: Array<{ start: number; record: SkipRecord }> = [];

  for (const site of scan.sites) {
    const rule = repository.require(site.function, provider);
    const signature = getContractFunction(contract, site.function);
    if (!signature) continue;

    const resolution = resolveArguments(site, rule, signature);
    if (!resolution.ok) {
      skipped.push({ start: site.span.start, record: toSkipRecord(file, site, resolution.code, resolution.detail) });
      continue;
    }

    rewriter.rewriteCall(site, rule, resolution.values);
    transformed.push(site);
  }

  for (const failure of scan.failures) {
    let { detail } = failure;
    // The outer call's text still changes when its inner call is rewritten
    if (failure.inner && transformed.includes(failure.inner)) {
      detail = `${detail}; the inner call is rewritten in place`;
    }
    skipped.push({ start: failure.site.span.start, record: toSkipRecord(file, failure.site, failure.code, detail) });
  }

  const edits = rewriter.finalize(scan.references);
  const code = emit(unit, edits);

  skipped.sort((a, b) => a.start - b.start);
  const status = skipped.length > 0 ? 'partial' : transformed.length > 0 ? 'transformed' : 'unmodified';

  return {
    status,
    provider,
    code,
    transformed,
    skipped: skipped.map(s => s.record),
    state: rewriter.state,
  };
}

/**
 * List recognized call sites without rewriting, with the reason a site would be
 * skipped regardless of provider
 */
export function inspectSource(sourceText: string, contract: SdkContract): InspectedSite[] {
  const unit = parseSourceUnit(sourceText);
  const scan = scanCallSites(unit, contract);

  const inspected: InspectedSite[] = [
    ...scan.sites.map(site => ({ site })),
    ...scan.failures.map(f => ({ site: f.site, skip: { code: f.code, detail: f.detail } })),
  ];
  return inspected.sort((a, b) => a.site.span.start - b.site.span.start);
}
