/**
 * infrar-transform Argument Resolver
 * Binds a call site's arguments to the SDK signature under one rule
 */

import type {
  CallSite,
  ContractFunction,
  ResolvedArguments,
  SkipCode,
  TransformRule,
} from './types.js';

export type ArgumentResolution =
  | { ok: true; values: ResolvedArguments }
  | { ok: false; code: SkipCode; detail?: string };

/**
 * Resolve named and positional arguments against the contract signature.
 * Values are never evaluated: literals and expressions pass through as source text.
 */
export function resolveArguments(
  site: CallSite,
  rule: TransformRule,
  signature: ContractFunction
): ArgumentResolution {
  if (rule.noCapture && site.capture !== 'none') {
    const detail = site.capture === 'assignment' && site.captureTarget
      ? `result of ${site.function} is assigned to ${site.captureTarget}`
      : `result of ${site.function} is used as a value`;
    return { ok: false, code: 'capture-unsupported', detail };
  }

  const values: ResolvedArguments = new Map();
  let position = 0;

  for (const arg of site.arguments) {
    if (arg.star) {
      return { ok: false, code: 'star-argument', detail: `${arg.star}${arg.text}` };
    }

    let param: string;
    if (arg.name === undefined) {
      if (position >= signature.params.length) {
        return {
          ok: false,
          code: 'too-many-arguments',
          detail: `${site.function} takes ${signature.params.length} positional argument(s)`,
        };
      }
      param = signature.params[position].name;
      position++;
    } else {
      param = arg.name;
      if (!signature.params.some(p => p.name === param)) {
        return { ok: false, code: 'unknown-argument', detail: `${site.function}() got an unexpected argument '${param}'` };
      }
    }

    if (values.has(param)) {
      return { ok: false, code: 'duplicate-argument', detail: `${site.function}() got multiple values for '${param}'` };
    }
    values.set(param, { kind: arg.literal ? 'literal' : 'expression', text: arg.text });
  }

  for (const param of signature.params) {
    if (values.has(param.name)) continue;
    if (param.default === undefined) {
      return { ok: false, code: 'missing-argument', detail: `${site.function}() missing '${param.name}'` };
    }
    values.set(param.name, { kind: 'default', text: param.default });
  }

  return { ok: true, values };
}
