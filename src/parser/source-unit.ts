/**
 * Source Unit Builder
 * Groups tokens into logical lines and simple statements, parses import
 * statements, and locates the module prologue where native imports go.
 */

import type { ImportStatement, ImportedName, SourceUnit, Statement, Token } from '../types.js';
import { FatalParseError } from '../errors.js';
import { isName, isOp, isSignificant, tokenize } from './tokenizer.js';

const COMPOUND_KEYWORDS = new Set([
  'if', 'elif', 'else', 'for', 'while', 'with', 'try', 'except', 'finally', 'def', 'class', 'async',
]);

// =============================================================================
// ENTRY POINT
// =============================================================================

/**
 * Parse Python source into a SourceUnit.
 * Throws FatalParseError when the text is not well-formed.
 */
export function parseSourceUnit(text: string): SourceUnit {
  const tokens = tokenize(text);
  const statements = buildStatements(text, tokens);
  const imports: ImportStatement[] = [];

  for (const statement of statements) {
    const first = tokens[statement.first];
    if (isName(first, 'import') || isName(first, 'from')) {
      imports.push(parseImport(tokens, statement));
    }
  }

  const prologueStatements = findPrologue(tokens, statements);
  const lastPrologue = prologueStatements[prologueStatements.length - 1];
  // Without a prologue, insert before the first line of code (always at column 1)
  const head = tokens.find(isSignificant);

  let prologueEnd: number;
  if (lastPrologue) {
    prologueEnd = lastPrologue.lineEnd;
  } else if (head) {
    prologueEnd = head.start - (head.column - 1);
  } else {
    prologueEnd = 0;
  }

  return { text, tokens, statements, imports, prologueEnd, prologueStatements };
}

// =============================================================================
// STATEMENTS
// =============================================================================

function buildStatements(text: string, tokens: Token[]): Statement[] {
  const statements: Statement[] = [];
  let lineTokens: number[] = [];

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (token.kind === 'newline') {
      if (lineTokens.length > 0) {
        statements.push(...splitLogicalLine(text, tokens, lineTokens, token.end));
      }
      lineTokens = [];
    } else if (isSignificant(token)) {
      lineTokens.push(i);
    }
  }

  return statements;
}

/**
 * Split one logical line into simple statements at top-level `;` and after
 * a compound statement header (`if x: call()` yields `call()`).
 */
function splitLogicalLine(text: string, tokens: Token[], indexes: number[], lineEnd: number): Statement[] {
  const head = tokens[indexes[0]];
  const indent = head.column - 1;
  const lineStart = head.start - indent;
  const segments: number[][] = [[]];

  for (const index of indexes) {
    const token = tokens[index];
    if (token.depth === 0 && isOp(token, ';')) {
      segments.push([]);
    } else {
      segments[segments.length - 1].push(index);
    }
  }

  const statements: Statement[] = [];
  const nonEmpty = segments.filter(segment => segment.length > 0);

  for (const segment of nonEmpty) {
    let body = segment;
    let nested = false;

    if (isName(tokens[segment[0]]) && COMPOUND_KEYWORDS.has(tokens[segment[0]].value)) {
      const colon = findHeaderColon(tokens, segment);
      if (colon === -1) {
        throw new FatalParseError('expected \':\'', tokens[segment[segment.length - 1]].line, tokens[segment[segment.length - 1]].column);
      }
      body = segment.slice(colon + 1);
      nested = true;
    }

    if (body.length === 0) continue;

    const first = tokens[body[0]];
    const last = tokens[body[body.length - 1]];
    statements.push({
      start: first.start,
      end: last.end,
      first: body[0],
      last: body[body.length - 1],
      indent,
      topLevel: indent === 0 && !nested,
      lineStart,
      lineEnd,
      soleOnLine: nonEmpty.length === 1 && !nested,
    });
  }

  return statements;
}

/**
 * Position (within the segment) of the colon ending a compound header,
 * skipping colons that belong to lambdas.
 */
function findHeaderColon(tokens: Token[], segment: number[]): number {
  let lambdas = 0;
  for (let i = 0; i < segment.length; i++) {
    const token = tokens[segment[i]];
    if (token.depth !== 0) continue;
    if (isName(token, 'lambda')) {
      lambdas++;
    } else if (isOp(token, ':')) {
      if (lambdas === 0) return i;
      lambdas--;
    }
  }
  return -1;
}

// =============================================================================
// IMPORTS
// =============================================================================

function parseImport(tokens: Token[], statement: Statement): ImportStatement {
  const significant: Token[] = [];
  for (let i = statement.first; i <= statement.last; i++) {
    if (isSignificant(tokens[i])) significant.push(tokens[i]);
  }

  let cursor = 0;
  const peek = (): Token | undefined => significant[cursor];
  const malformed = (): FatalParseError => {
    const at = peek() ?? significant[significant.length - 1];
    return new FatalParseError('invalid import statement', at.line, at.column);
  };

  const readDotted = (allowRelative: boolean): string => {
    let name = '';
    if (allowRelative) {
      while (isOp(peek(), '.') || isOp(peek(), '...')) {
        name += significant[cursor].value;
        cursor++;
      }
      if (name !== '' && isName(peek(), 'import')) return name;
    }
    if (isName(peek())) {
      name += significant[cursor].value;
      cursor++;
      while (isOp(peek(), '.') && isName(significant[cursor + 1])) {
        name += '.' + significant[cursor + 1].value;
        cursor += 2;
      }
    }
    if (name === '') throw malformed();
    return name;
  };

  const readAlias = (): string | undefined => {
    if (!isName(peek(), 'as')) return undefined;
    cursor++;
    const alias = peek();
    if (!alias || !isName(alias)) throw malformed();
    cursor++;
    return alias.value;
  };

  if (isName(peek(), 'import')) {
    cursor++;
    const names: ImportedName[] = [];
    do {
      if (names.length > 0) cursor++;
      const startToken = peek();
      if (!startToken) throw malformed();
      const name = readDotted(false);
      const alias = readAlias();
      names.push({
        name,
        alias,
        local: alias ?? name.split('.')[0],
        span: { start: startToken.start, end: significant[cursor - 1].end },
      });
    } while (isOp(peek(), ','));
    if (peek()) throw malformed();
    return { kind: 'import', module: '', names, star: false, parenthesized: false, statement };
  }

  // from <module> import ...
  cursor++;
  const module = readDotted(true);
  if (!isName(peek(), 'import')) throw malformed();
  cursor++;

  if (isOp(peek(), '*')) {
    cursor++;
    if (peek()) throw malformed();
    return { kind: 'from', module, names: [], star: true, parenthesized: false, statement };
  }

  const parenthesized = isOp(peek(), '(');
  if (parenthesized) cursor++;

  const names: ImportedName[] = [];
  while (isName(peek())) {
    const startToken = significant[cursor];
    cursor++;
    const alias = readAlias();
    names.push({
      name: startToken.value,
      alias,
      local: alias ?? startToken.value,
      span: { start: startToken.start, end: significant[cursor - 1].end },
    });
    if (!isOp(peek(), ',')) break;
    cursor++;
  }

  if (parenthesized) {
    if (!isOp(peek(), ')')) throw malformed();
    cursor++;
  }
  if (names.length === 0 || peek()) throw malformed();

  return { kind: 'from', module, names, star: false, parenthesized, statement };
}

// =============================================================================
// PROLOGUE
// =============================================================================

/**
 * Leading top-level statements that native imports must follow: the module
 * docstring, `from __future__` imports and the initial block of imports.
 */
function findPrologue(tokens: Token[], statements: Statement[]): Statement[] {
  const prologue: Statement[] = [];

  for (let i = 0; i < statements.length; i++) {
    const statement = statements[i];
    if (!statement.topLevel || !statement.soleOnLine) break;

    const first = tokens[statement.first];
    const isDocstring = i === 0 && onlyStrings(tokens, statement);
    const isImport = isName(first, 'import') || isName(first, 'from');
    if (!isDocstring && !isImport) break;

    prologue.push(statement);
  }

  return prologue;
}

function onlyStrings(tokens: Token[], statement: Statement): boolean {
  for (let i = statement.first; i <= statement.last; i++) {
    if (isSignificant(tokens[i]) && tokens[i].kind !== 'string') return false;
  }
  return true;
}

/**
 * Significant tokens of a statement, in order
 */
export function statementTokens(unit: SourceUnit, statement: Statement): Token[] {
  const result: Token[] = [];
  for (let i = statement.first; i <= statement.last; i++) {
    if (isSignificant(unit.tokens[i])) result.push(unit.tokens[i]);
  }
  return result;
}
