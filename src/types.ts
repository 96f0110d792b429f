/**
 * infrar-transform Type Definitions
 * Source units, call sites, transform rules and results
 */

// =============================================================================
// PROVIDERS
// =============================================================================

export const PROVIDERS = ['aws', 'gcp', 'azure'] as const;

/**
 * Target cloud vendor with its own native SDK
 */
export type Provider = (typeof PROVIDERS)[number];

export function isProvider(value: string): value is Provider {
  return (PROVIDERS as readonly string[]).includes(value);
}

// =============================================================================
// SOURCE POSITIONS
// =============================================================================

/**
 * Half-open character range [start, end) into the original source text
 */
export interface Span {
  start: number;
  end: number;
}

export interface Position {
  line: number;     // 1-based
  column: number;   // 1-based
}

// =============================================================================
// TOKENS & SOURCE UNIT
// =============================================================================

export type TokenKind =
  | 'name'
  | 'number'
  | 'string'
  | 'op'
  | 'comment'
  | 'newline'   // end of a logical line
  | 'nl'        // line break inside brackets or on a blank/comment-only line
  | 'eof';

export interface Token extends Span, Position {
  kind: TokenKind;
  value: string;
  depth: number;    // bracket depth before this token
}

/**
 * A simple statement: one logical line, or one `;`-separated piece of it,
 * with any compound-statement header (`if x:`) stripped off.
 */
export interface Statement extends Span {
  first: number;        // index of first token
  last: number;         // index of last token (inclusive)
  indent: number;       // indentation width of the enclosing logical line
  topLevel: boolean;
  lineStart: number;    // offset of the logical line's first character
  lineEnd: number;      // offset just past the logical line's newline
  soleOnLine: boolean;  // the statement is the whole logical line
}

export interface ImportedName {
  name: string;         // imported name (module path for `import a.b`)
  alias?: string;
  local: string;        // name bound in the importing scope
  span: Span;           // span of this entry, alias included
}

export interface ImportStatement {
  kind: 'import' | 'from';
  module: string;       // `from <module> import ...`; empty for plain imports
  names: ImportedName[];
  star: boolean;
  parenthesized: boolean;
  statement: Statement;
}

/**
 * A parsed Python file. Owns its token list; the original text is never
 * modified, edits are recorded separately by the rewriter.
 */
export interface SourceUnit {
  text: string;
  tokens: Token[];
  statements: Statement[];
  imports: ImportStatement[];
  prologueEnd: number;          // offset where module-level imports end
  prologueStatements: Statement[];
}

// =============================================================================
// SDK CONTRACT
// =============================================================================

export interface ContractParam {
  name: string;
  default?: string;     // Python source text of the default value
}

export interface ContractFunction {
  name: string;
  params: ContractParam[];
}

export interface SdkContract {
  module: string;       // e.g. "infrar.storage"
  version: string;
  functions: ContractFunction[];
}

// =============================================================================
// CALL SITES
// =============================================================================

export interface CallArgument {
  name?: string;
  text: string;         // verbatim source of the value expression
  span: Span;
  literal: boolean;
  star?: '*' | '**';
}

/**
 * How the call's result is used by its statement
 */
export type CaptureKind = 'none' | 'assignment' | 'return' | 'value';

export interface CallSite extends Position {
  qualifiedName: string;    // infrar.storage.upload
  function: string;         // upload
  callee: string;           // source text of the callee chain
  arguments: CallArgument[];
  span: Span;               // whole call expression
  calleeSpan: Span;
  argumentsSpan: Span;      // inside the parentheses
  statement?: Statement;    // absent when the call sits in a compound statement header
  capture: CaptureKind;
  captureTarget?: string;
  local: string;            // first segment of the callee chain
}

/**
 * Outcome of resolving a callee against the file's bindings
 */
export type CallResolution =
  | { kind: 'matched'; qualifiedName: string; function: string }
  | { kind: 'unrecognized' }
  | { kind: 'ambiguous'; qualifiedName: string; function: string; bindings: string[] };

// =============================================================================
// TRANSFORM RULES
// =============================================================================

export type TemplatePart =
  | { kind: 'text'; value: string }
  | { kind: 'placeholder'; name: string };

export interface TransformRule {
  function: string;
  provider: Provider;
  template: string;
  parts: TemplatePart[];
  placeholders: string[];           // ordered, unique
  imports: string[];
  setup: string[];
  params: Record<string, string>;   // SDK parameter -> placeholder
  noCapture: boolean;
}

export interface ResolvedValue {
  kind: 'literal' | 'expression' | 'default';
  text: string;
}

export type ResolvedArguments = Map<string, ResolvedValue>;

// =============================================================================
// RESULTS
// =============================================================================

export type SkipCode =
  | 'comment-in-arguments'
  | 'capture-unsupported'
  | 'unknown-argument'
  | 'duplicate-argument'
  | 'too-many-arguments'
  | 'missing-argument'
  | 'star-argument'
  | 'ambiguous-binding'
  | 'nested-call';

export interface SkipRecord {
  file: string;
  line: number;
  column: number;
  function: string;
  code: SkipCode;
  reason: string;
  detail?: string;
}

export type RewriteState = 'unmodified' | 'partially-rewritten' | 'finalized';

export interface TransformResult {
  status: 'unmodified' | 'transformed' | 'partial';
  provider: Provider;
  code: string;
  transformed: CallSite[];
  skipped: SkipRecord[];
  state: RewriteState;
}

export interface Edit extends Span {
  text: string;
}

export const SKIP_REASONS: Record<SkipCode, string> = {
  'comment-in-arguments': 'comment inside argument list',
  'capture-unsupported': 'capture unsupported',
  'unknown-argument': 'unrecognized argument name',
  'duplicate-argument': 'duplicate argument',
  'too-many-arguments': 'too many positional arguments',
  'missing-argument': 'missing required argument',
  'star-argument': 'unpacked arguments unsupported',
  'ambiguous-binding': 'ambiguous binding',
  'nested-call': 'nested recognized call',
};
