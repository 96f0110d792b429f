/**
 * infrar-transform Call-Site Scanner
 * Resolves names against the file's imports and locates every call to a
 * recognized SDK function, whatever its formatting.
 */

import type {
  CallArgument,
  CallResolution,
  CallSite,
  CaptureKind,
  ImportStatement,
  ImportedName,
  SdkContract,
  SkipCode,
  SourceUnit,
  Statement,
  Token,
} from './types.js';
import { FatalParseError } from './errors.js';
import { isName, isOp, isSignificant } from './parser/tokenizer.js';
import { recognizedNames } from './contract.js';

// =============================================================================
// TYPES
// =============================================================================

type Binding =
  | { kind: 'import'; target: string; description: string }
  | { kind: 'local'; description: string };

export interface ScanFailure {
  site: CallSite;
  code: SkipCode;
  detail?: string;
  inner?: CallSite; // the recognized call inside a `nested-call` site's arguments
}

export interface CallScan {
  sites: CallSite[];              // sites eligible for rewriting, in source order
  failures: ScanFailure[];        // recognized calls the scanner refuses
  references: Map<string, number>; // uses of each SDK-bound local name outside imports
}

const KEYWORDS = new Set([
  'False', 'None', 'True', 'and', 'as', 'assert', 'async', 'await', 'break', 'class', 'continue',
  'def', 'del', 'elif', 'else', 'except', 'finally', 'for', 'from', 'global', 'if', 'import', 'in',
  'is', 'lambda', 'nonlocal', 'not', 'or', 'pass', 'raise', 'return', 'try', 'while', 'with', 'yield',
]);

const ASSIGNMENT_OPS = new Set([
  '=', '+=', '-=', '*=', '/=', '//=', '%=', '**=', '>>=', '<<=', '&=', '|=', '^=', '@=',
]);

// =============================================================================
// TOKEN NAVIGATION
// =============================================================================

function nextSignificant(tokens: Token[], index: number): number {
  let i = index + 1;
  while (i < tokens.length && !isSignificant(tokens[i]) && tokens[i].kind !== 'newline' && tokens[i].kind !== 'eof') i++;
  return i;
}

function previousSignificant(tokens: Token[], index: number): Token | undefined {
  for (let i = index - 1; i >= 0; i--) {
    if (isSignificant(tokens[i])) return tokens[i];
    if (tokens[i].kind === 'newline') return undefined;
  }
  return undefined;
}

function importTokenRanges(unit: SourceUnit): Array<[number, number]> {
  return unit.imports.map(imp => [imp.statement.first, imp.statement.last]);
}

function inRanges(index: number, ranges: Array<[number, number]>): boolean {
  return ranges.some(([first, last]) => index >= first && index <= last);
}

// =============================================================================
// BINDINGS
// =============================================================================

function isSdkTarget(target: string, contract: SdkContract, recognized: Set<string>): boolean {
  return target === contract.module || contract.module.startsWith(target + '.') || recognized.has(target);
}

/**
 * True when an import entry binds the SDK module, one of its parents, or one of its functions
 */
export function bindsSdk(imp: ImportStatement, entry: ImportedName, contract: SdkContract): boolean {
  const target = imp.kind === 'import' ? entry.name : `${imp.module}.${entry.name}`;
  return isSdkTarget(target, contract, recognizedNames(contract));
}

function collectBindings(unit: SourceUnit, contract: SdkContract): Map<string, Binding[]> {
  const bindings = new Map<string, Binding[]>();
  const add = (name: string, binding: Binding): void => {
    const list = bindings.get(name) ?? [];
    list.push(binding);
    bindings.set(name, list);
  };

  for (const imp of unit.imports) {
    const line = unit.tokens[imp.statement.first].line;
    if (imp.kind === 'import') {
      for (const entry of imp.names) {
        const target = entry.alias ? entry.name : entry.name.split('.')[0];
        add(entry.local, { kind: 'import', target, description: `import ${entry.name} (line ${line})` });
      }
    } else if (imp.star) {
      if (imp.module === contract.module) {
        for (const fn of contract.functions) {
          add(fn.name, {
            kind: 'import',
            target: `${imp.module}.${fn.name}`,
            description: `from ${imp.module} import * (line ${line})`,
          });
        }
      }
    } else {
      for (const entry of imp.names) {
        add(entry.local, {
          kind: 'import',
          target: `${imp.module}.${entry.name}`,
          description: `from ${imp.module} import ${entry.name} (line ${line})`,
        });
      }
    }
  }

  const imports = importTokenRanges(unit);
  const { tokens } = unit;

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (token.kind !== 'name' || inRanges(i, imports)) continue;

    const next = tokens[nextSignificant(tokens, i)];
    if ((token.value === 'def' || token.value === 'class' || token.value === 'as') && isName(next)) {
      if (!KEYWORDS.has(next.value)) {
        add(next.value, { kind: 'local', description: `${token.value} ${next.value} (line ${next.line})` });
      }
    } else if (isOp(next, ':=')) {
      add(token.value, { kind: 'local', description: `${token.value} := (line ${token.line})` });
    }
  }

  for (const statement of unit.statements) {
    for (const name of assignmentTargets(tokens, statement)) {
      add(name.value, { kind: 'local', description: `${name.value} = (line ${name.line})` });
    }
  }

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (isName(token, 'def')) {
      const open = nextSignificant(tokens, nextSignificant(tokens, i));
      if (!isOp(tokens[open], '(')) continue;
      for (const name of parameterNames(tokens, open + 1, tokens[open].depth + 1, ')')) {
        add(name.value, { kind: 'local', description: `parameter ${name.value} (line ${name.line})` });
      }
    } else if (isName(token, 'lambda')) {
      for (const name of parameterNames(tokens, i + 1, token.depth, ':')) {
        add(name.value, { kind: 'local', description: `lambda parameter ${name.value} (line ${name.line})` });
      }
    } else if (isName(token, 'for')) {
      for (const name of loopTargets(tokens, i)) {
        add(name.value, { kind: 'local', description: `for ${name.value} (line ${name.line})` });
      }
    }
  }

  return bindings;
}

/**
 * Parameter names from `start` up to `terminator` at `depth`: plain, defaulted,
 * annotated and starred parameters alike
 */
function parameterNames(tokens: Token[], start: number, depth: number, terminator: string): Token[] {
  const names: Token[] = [];
  let expectName = true;

  for (let i = start; i < tokens.length; i++) {
    const token = tokens[i];
    if (!isSignificant(token)) {
      if (token.kind === 'newline' || token.kind === 'eof') break;
      continue;
    }
    if (token.depth < depth) break;
    if (token.depth > depth) continue;
    if (isOp(token, terminator)) break;

    if (isOp(token, ',')) {
      expectName = true;
    } else if (expectName && (isOp(token, '*') || isOp(token, '**') || isOp(token, '/'))) {
      continue;
    } else if (expectName && token.kind === 'name' && !KEYWORDS.has(token.value)) {
      names.push(token);
      expectName = false;
    } else {
      expectName = false;
    }
  }

  return names;
}

/**
 * Names bound by the target list of `for ... in`, in a statement or a comprehension
 */
function loopTargets(tokens: Token[], forIndex: number): Token[] {
  const depth = tokens[forIndex].depth;
  const names: Token[] = [];

  for (let i = forIndex + 1; i < tokens.length; i++) {
    const token = tokens[i];
    if (!isSignificant(token)) {
      if (token.kind === 'newline' || token.kind === 'eof') break;
      continue;
    }
    if (token.depth < depth || (token.depth === depth && isName(token, 'in'))) break;
    if (token.kind !== 'name' || KEYWORDS.has(token.value)) continue;

    const previous = previousSignificant(tokens, i);
    const next = tokens[nextSignificant(tokens, i)];
    if (isOp(previous, '.') || isOp(next, '.') || isOp(next, '[') || isOp(next, '(')) continue;
    names.push(token);
  }

  return names;
}

/**
 * Names bound by `a = ...`, `a, b = ...` or `a: T = ...`
 */
function assignmentTargets(tokens: Token[], statement: Statement): Token[] {
  const targets: Token[] = [];
  const first = tokens[statement.first];

  for (let i = statement.first; i <= statement.last; i++) {
    const token = tokens[i];
    if (!isSignificant(token)) continue;
    if (token.depth === 0 && isOp(token, '=')) return targets;
    if (token.depth === 0 && isOp(token, ':') && targets.length === 1 && targets[0] === first) {
      // annotated assignment: the annotation binds nothing
      return targets;
    }
    if (token.kind === 'name' && !KEYWORDS.has(token.value)) {
      const previous = previousSignificant(tokens, i);
      if (isOp(previous, '.')) return [];
      targets.push(token);
    } else if (!(token.kind === 'op' && [',', '(', ')', '[', ']', '*'].includes(token.value))) {
      return [];
    }
  }

  return [];
}

/**
 * Resolve a dotted callee chain to a recognized SDK function, if any
 */
function resolveChain(
  chain: string[],
  bindings: Map<string, Binding[]>,
  recognized: Set<string>,
  contract: SdkContract
): CallResolution {
  const bound = bindings.get(chain[0]);
  if (!bound || bound.length === 0) return { kind: 'unrecognized' };

  const rest = chain.slice(1);
  const qualify = (target: string): string => (rest.length > 0 ? `${target}.${rest.join('.')}` : target);

  const sdk = bound
    .filter((b): b is Extract<Binding, { kind: 'import' }> => b.kind === 'import')
    .map(b => qualify(b.target))
    .filter(name => recognized.has(name));

  if (sdk.length === 0) return { kind: 'unrecognized' };

  const qualifiedName = sdk[0];
  const fn = qualifiedName.slice(contract.module.length + 1);
  const consistent = bound.every(b => b.kind === 'import' && qualify(b.target) === qualifiedName);

  if (consistent) {
    return { kind: 'matched', qualifiedName, function: fn };
  }
  return {
    kind: 'ambiguous',
    qualifiedName,
    function: fn,
    bindings: bound.map(b => b.description),
  };
}

// =============================================================================
// CALL PARSING
// =============================================================================

function isLiteral(tokens: Token[]): boolean {
  if (tokens.length === 0) return false;
  if (tokens.every(t => t.kind === 'string')) {
    return tokens.every(t => !/^[a-zA-Z]*[fF]/.test(t.value));
  }
  if (tokens.length === 1) {
    const [t] = tokens;
    return t.kind === 'number' || (t.kind === 'name' && ['True', 'False', 'None'].includes(t.value));
  }
  return tokens.length === 2 && (isOp(tokens[0], '-') || isOp(tokens[0], '+')) && tokens[1].kind === 'number';
}

function parseArguments(
  unit: SourceUnit,
  open: number,
  close: number
): { args: CallArgument[]; hasComment: boolean } {
  const { tokens, text } = unit;
  const depth = tokens[open].depth + 1;
  const pieces: Token[][] = [[]];
  let hasComment = false;

  for (let i = open + 1; i < close; i++) {
    const token = tokens[i];
    if (token.kind === 'comment') hasComment = true;
    if (!isSignificant(token)) continue;
    if (token.depth === depth && isOp(token, ',')) {
      pieces.push([]);
    } else {
      pieces[pieces.length - 1].push(token);
    }
  }

  const args: CallArgument[] = [];
  let sawKeyword = false;

  pieces.forEach((piece, index) => {
    if (piece.length === 0) {
      if (index === pieces.length - 1) return;
      const at = tokens[close];
      throw new FatalParseError('invalid syntax: empty argument', at.line, at.column);
    }

    let value = piece;
    let name: string | undefined;
    let star: '*' | '**' | undefined;

    if (isOp(piece[0], '*') || isOp(piece[0], '**')) {
      star = isOp(piece[0], '*') ? '*' : '**';
      value = piece.slice(1);
    } else if (piece[0].kind === 'name' && isOp(piece[1], '=')) {
      name = piece[0].value;
      value = piece.slice(2);
    }

    if (value.length === 0) {
      throw new FatalParseError('invalid syntax: missing argument value', piece[0].line, piece[0].column);
    }
    if (!name && !star && sawKeyword) {
      throw new FatalParseError('positional argument follows keyword argument', piece[0].line, piece[0].column);
    }
    if (name || star === '**') sawKeyword = true;

    const span = { start: value[0].start, end: value[value.length - 1].end };
    args.push({
      name,
      text: text.slice(span.start, span.end),
      span,
      literal: !star && isLiteral(value),
      star,
    });
  });

  return { args, hasComment };
}

function captureOf(
  unit: SourceUnit,
  statement: Statement | undefined,
  chainStart: number,
  close: number
): { capture: CaptureKind; target?: string } {
  if (!statement) return { capture: 'value' };
  const { tokens, text } = unit;

  if (statement.first === chainStart && statement.last === close) {
    return { capture: 'none' };
  }

  for (let i = statement.first; i < chainStart; i++) {
    const token = tokens[i];
    if (isOp(token, ':=')) {
      const previous = previousSignificant(tokens, i);
      return { capture: 'assignment', target: previous?.value };
    }
    if (token.depth === 0 && token.kind === 'op' && ASSIGNMENT_OPS.has(token.value)) {
      return { capture: 'assignment', target: text.slice(statement.start, token.start).trim() };
    }
  }

  const first = tokens[statement.first];
  if (isName(first, 'return') || isName(first, 'yield')) return { capture: 'return' };
  return { capture: 'value' };
}

// =============================================================================
// SCANNER
// =============================================================================

/**
 * Find every call to a recognized SDK function in a source unit.
 * Throws FatalParseError if a recognized call is itself malformed.
 */
export function scanCallSites(unit: SourceUnit, contract: SdkContract): CallScan {
  const { tokens } = unit;
  const recognized = recognizedNames(contract);
  const bindings = collectBindings(unit, contract);
  const imports = importTokenRanges(unit);

  const sdkLocals = new Set<string>();
  for (const [local, bound] of bindings) {
    if (bound.some(b => b.kind === 'import' && isSdkTarget(b.target, contract, recognized))) {
      sdkLocals.add(local);
    }
  }

  const candidates: Array<{ site: CallSite; failure?: { code: SkipCode; detail?: string } }> = [];
  const references = new Map<string, number>();

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (token.kind !== 'name' || KEYWORDS.has(token.value) || !sdkLocals.has(token.value)) continue;
    if (inRanges(i, imports)) continue;

    const previous = previousSignificant(tokens, i);
    if (isOp(previous, '.') || isName(previous, 'def') || isName(previous, 'class')) continue;

    const after = tokens[nextSignificant(tokens, i)];
    if (token.depth > 0 && isOp(after, '=')) continue; // keyword argument name

    references.set(token.value, (references.get(token.value) ?? 0) + 1);

    const chain = [token.value];
    let end = i;
    for (;;) {
      const dot = nextSignificant(tokens, end);
      const member = nextSignificant(tokens, dot);
      if (!isOp(tokens[dot], '.') || !isName(tokens[member])) break;
      chain.push(tokens[member].value);
      end = member;
    }

    const open = nextSignificant(tokens, end);
    if (!isOp(tokens[open], '(')) continue;

    const resolution = resolveChain(chain, bindings, recognized, contract);
    if (resolution.kind === 'unrecognized') continue;

    let close = open + 1;
    while (!(tokens[close].depth === tokens[open].depth && isOp(tokens[close], ')'))) close++;

    const { args, hasComment } = parseArguments(unit, open, close);
    const statement = unit.statements.find(s => s.first <= i && i <= s.last);
    const { capture, target } = captureOf(unit, statement, i, close);

    const site: CallSite = {
      qualifiedName: resolution.qualifiedName,
      function: resolution.function,
      callee: chain.join('.'),
      arguments: args,
      span: { start: token.start, end: tokens[close].end },
      calleeSpan: { start: token.start, end: tokens[end].end },
      argumentsSpan: { start: tokens[open].end, end: tokens[close].start },
      statement,
      capture,
      captureTarget: target,
      local: token.value,
      line: token.line,
      column: token.column,
    };

    if (resolution.kind === 'ambiguous') {
      candidates.push({
        site,
        failure: { code: 'ambiguous-binding', detail: `${token.value} is bound by ${resolution.bindings.join(', ')}` },
      });
    } else if (hasComment) {
      candidates.push({ site, failure: { code: 'comment-in-arguments' } });
    } else {
      candidates.push({ site });
    }
  }

  const sites: CallSite[] = [];
  const failures: ScanFailure[] = [];

  for (const candidate of candidates) {
    const { site } = candidate;
    const inner = candidates.find(
      other => other !== candidate && other.site.span.start >= site.span.start && other.site.span.end <= site.span.end
    );

    if (candidate.failure) {
      failures.push({ site, ...candidate.failure });
    } else if (inner) {
      failures.push({
        site,
        code: 'nested-call',
        detail: `argument contains a call to ${inner.site.function} (line ${inner.site.line})`,
        inner: inner.site,
      });
    } else {
      sites.push(site);
    }
  }

  return { sites, failures, references };
}
