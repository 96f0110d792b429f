/**
 * Python Tokenizer
 * Splits source text into positioned tokens. Tracks bracket depth and
 * indentation so that malformed files fail here, before any rewriting.
 */

import type { Token, TokenKind } from '../types.js';
import { FatalParseError } from '../errors.js';

// =============================================================================
// LEXICAL TABLES
// =============================================================================

// Longest first
const OPERATORS = [
  '**=', '//=', '>>=', '<<=', '...',
  '->', ':=', '**', '//', '==', '!=', '<=', '>=', '<<', '>>',
  '+=', '-=', '*=', '/=', '%=', '&=', '|=', '^=', '@=',
  '+', '-', '*', '/', '%', '@', '&', '|', '^', '~', '<', '>',
  '(', ')', '[', ']', '{', '}', ',', ':', ';', '.', '=',
];

const OPENERS: Record<string, string> = { '(': ')', '[': ']', '{': '}' };
const CLOSERS: Record<string, string> = { ')': '(', ']': '[', '}': '{' };

const NAME_PATTERN = /[\p{L}\p{Nl}_][\p{L}\p{Nl}\p{Mn}\p{Mc}\p{Nd}\p{Pc}]*/uy;
const NUMBER_PATTERN =
  /(?:0[xX](?:_?[0-9a-fA-F])+|0[oO](?:_?[0-7])+|0[bB](?:_?[01])+|(?:\d(?:_?\d)*(?:\.(?:\d(?:_?\d)*)?)?|\.\d(?:_?\d)*)(?:[eE][+-]?\d(?:_?\d)*)?[jJ]?)/y;
const STRING_PREFIX = /^(?:[rRuUbBfF]|[rR][bBfF]|[bBfF][rR])$/;

interface OpenBracket {
  char: string;
  line: number;
  column: number;
}

// =============================================================================
// TOKENIZER
// =============================================================================

/**
 * Tokenize Python source. Every character of the input belongs to at most
 * one token; whitespace and line continuations are skipped.
 */
export function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  const brackets: OpenBracket[] = [];
  const indents: number[] = [0];

  // A leading byte order mark stays in the text but is not code
  let pos = text.charCodeAt(0) === 0xfeff ? 1 : 0;
  let line = 1;
  let lineStart = pos;
  let atLineStart = true;
  let lineHasTokens = false;
  let expectIndent = false;

  const column = (offset: number): number => offset - lineStart + 1;

  const push = (kind: TokenKind, start: number, end: number, startLine: number, startColumn: number): Token => {
    const token: Token = {
      kind,
      value: text.slice(start, end),
      start,
      end,
      line: startLine,
      column: startColumn,
      depth: brackets.length,
    };
    tokens.push(token);
    if (kind === 'name' || kind === 'number' || kind === 'string' || kind === 'op') {
      lineHasTokens = true;
    }
    return token;
  };

  const endsWithColon = (): boolean => {
    for (let i = tokens.length - 1; i >= 0; i--) {
      const token = tokens[i];
      if (token.kind === 'comment' || token.kind === 'nl') continue;
      return token.kind === 'op' && token.value === ':';
    }
    return false;
  };

  const parseError = (message: string, offset: number): FatalParseError =>
    new FatalParseError(message, line, column(offset));

  const startIndentation = (): void => {
    let width = 0;
    let scan = pos;
    while (scan < text.length && (text[scan] === ' ' || text[scan] === '\t' || text[scan] === '\f')) {
      width = text[scan] === '\t' ? (Math.floor(width / 8) + 1) * 8 : text[scan] === ' ' ? width + 1 : 0;
      scan++;
    }

    const next = text[scan];
    pos = scan;
    // Blank and comment-only lines do not take part in indentation
    if (next === undefined || next === '\n' || next === '\r' || next === '#') return;

    const current = indents[indents.length - 1];
    if (expectIndent) {
      if (width <= current) throw parseError('expected an indented block', scan);
      indents.push(width);
      expectIndent = false;
      return;
    }
    if (width > current) throw parseError('unexpected indent', scan);
    while (width < indents[indents.length - 1]) indents.pop();
    if (width !== indents[indents.length - 1]) {
      throw parseError('unindent does not match any outer indentation level', scan);
    }
  };

  const readString = (start: number, quoteAt: number): void => {
    const startLine = line;
    const startColumn = column(start);
    const quote = text[quoteAt];
    const triple = text.startsWith(quote.repeat(3), quoteAt);
    const delimiter = triple ? quote.repeat(3) : quote;
    let scan = quoteAt + delimiter.length;

    for (;;) {
      if (scan >= text.length) {
        throw new FatalParseError(
          triple ? 'unterminated triple-quoted string literal' : 'unterminated string literal',
          startLine,
          startColumn
        );
      }
      const ch = text[scan];
      if (ch === '\\') {
        // Escapes (and, in raw strings, the quote after a backslash) never terminate
        const escaped = text[scan + 1];
        if (escaped === '\r' && text[scan + 2] === '\n') {
          scan += 3;
          line++;
          lineStart = scan;
        } else if (escaped === '\n' || escaped === '\r') {
          scan += 2;
          line++;
          lineStart = scan;
        } else {
          scan += 2;
        }
        continue;
      }
      if (ch === '\n' || ch === '\r') {
        if (!triple) {
          throw new FatalParseError('unterminated string literal', startLine, startColumn);
        }
        scan += ch === '\r' && text[scan + 1] === '\n' ? 2 : 1;
        line++;
        lineStart = scan;
        continue;
      }
      if (text.startsWith(delimiter, scan)) {
        scan += delimiter.length;
        break;
      }
      scan++;
    }

    const token: Token = {
      kind: 'string',
      value: text.slice(start, scan),
      start,
      end: scan,
      line: startLine,
      column: startColumn,
      depth: brackets.length,
    };
    tokens.push(token);
    lineHasTokens = true;
    pos = scan;
  };

  while (pos < text.length) {
    if (atLineStart) {
      atLineStart = false;
      if (brackets.length === 0) startIndentation();
      if (pos >= text.length) break;
    }

    const ch = text[pos];

    if (ch === ' ' || ch === '\t' || ch === '\f') {
      pos++;
      continue;
    }

    if (ch === '\n' || ch === '\r') {
      const end = ch === '\r' && text[pos + 1] === '\n' ? pos + 2 : pos + 1;
      if (brackets.length === 0 && lineHasTokens) {
        expectIndent = endsWithColon();
        push('newline', pos, end, line, column(pos));
        lineHasTokens = false;
      } else {
        push('nl', pos, end, line, column(pos));
      }
      pos = end;
      line++;
      lineStart = pos;
      atLineStart = true;
      continue;
    }

    if (ch === '\\') {
      const next = text[pos + 1];
      if (next === '\n' || next === '\r') {
        pos += next === '\r' && text[pos + 2] === '\n' ? 3 : 2;
        line++;
        lineStart = pos;
        continue;
      }
      throw parseError('unexpected character after line continuation character', pos);
    }

    if (ch === '#') {
      let end = pos;
      while (end < text.length && text[end] !== '\n' && text[end] !== '\r') end++;
      push('comment', pos, end, line, column(pos));
      pos = end;
      continue;
    }

    if (ch === '"' || ch === "'") {
      readString(pos, pos);
      continue;
    }

    NUMBER_PATTERN.lastIndex = pos;
    if (/[0-9]/.test(ch) || (ch === '.' && /[0-9]/.test(text[pos + 1] ?? ''))) {
      const match = NUMBER_PATTERN.exec(text);
      if (match) {
        push('number', pos, pos + match[0].length, line, column(pos));
        pos += match[0].length;
        continue;
      }
    }

    NAME_PATTERN.lastIndex = pos;
    const name = NAME_PATTERN.exec(text);
    if (name) {
      const word = name[0];
      const after = pos + word.length;
      if (STRING_PREFIX.test(word) && (text[after] === '"' || text[after] === "'")) {
        readString(pos, after);
        continue;
      }
      push('name', pos, after, line, column(pos));
      pos = after;
      continue;
    }

    const op = OPERATORS.find(candidate => text.startsWith(candidate, pos));
    if (op) {
      if (OPENERS[op]) {
        push('op', pos, pos + 1, line, column(pos));
        brackets.push({ char: op, line, column: column(pos) });
      } else if (CLOSERS[op]) {
        const open = brackets[brackets.length - 1];
        if (!open) throw parseError(`unmatched '${op}'`, pos);
        if (open.char !== CLOSERS[op]) {
          throw parseError(`closing parenthesis '${op}' does not match opening parenthesis '${open.char}'`, pos);
        }
        brackets.pop();
        push('op', pos, pos + 1, line, column(pos));
      } else {
        push('op', pos, pos + op.length, line, column(pos));
      }
      pos += op.length;
      continue;
    }

    throw parseError(`invalid character '${ch}'`, pos);
  }

  if (brackets.length > 0) {
    const open = brackets[brackets.length - 1];
    throw new FatalParseError(`'${open.char}' was never closed`, open.line, open.column);
  }

  if (lineHasTokens) {
    expectIndent = endsWithColon();
    push('newline', text.length, text.length, line, column(text.length));
  }
  if (expectIndent) {
    throw new FatalParseError('expected an indented block', line, column(text.length));
  }

  push('eof', text.length, text.length, line, column(text.length));
  return tokens;
}

/**
 * Tokens that carry code, as opposed to comments and line breaks
 */
export function isSignificant(token: Token): boolean {
  return token.kind === 'name' || token.kind === 'number' || token.kind === 'string' || token.kind === 'op';
}

export function isOp(token: Token | undefined, value: string): boolean {
  return token !== undefined && token.kind === 'op' && token.value === value;
}

export function isName(token: Token | undefined, value?: string): boolean {
  return token !== undefined && token.kind === 'name' && (value === undefined || token.value === value);
}
