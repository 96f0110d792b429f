/**
 * infrar-transform Rewriter
 * Records call replacements, native import/setup insertion and SDK import
 * pruning for one source unit. State only moves forward:
 * unmodified -> partially-rewritten -> finalized.
 */

import type {
  CallSite,
  Edit,
  ImportStatement,
  ResolvedArguments,
  RewriteState,
  SdkContract,
  SourceUnit,
  TransformRule,
} from './types.js';
import { RewriteStateError } from './errors.js';
import { bindsSdk } from './scanner.js';

const STATE_ORDER: RewriteState[] = ['unmodified', 'partially-rewritten', 'finalized'];

/**
 * Fill a rule's template with resolved argument text
 */
export function instantiate(rule: TransformRule, values: ResolvedArguments): string {
  const paramFor = new Map<string, string>();
  for (const [param, placeholder] of Object.entries(rule.params)) {
    paramFor.set(placeholder, param);
  }

  return rule.parts
    .map(part => {
      if (part.kind === 'text') return part.value;
      const param = paramFor.get(part.name);
      const value = param === undefined ? undefined : values.get(param);
      if (!value) {
        throw new Error(`No value for placeholder {${part.name}} in ${rule.function} on ${rule.provider}`);
      }
      return value.text;
    })
    .join('');
}

function normalize(statement: string): string {
  return statement.replace(/\s+/g, ' ').trim();
}

export class Rewriter {
  private current: RewriteState = 'unmodified';
  private readonly edits: Edit[] = [];
  private readonly imports: string[] = [];
  private readonly setup: string[] = [];
  private readonly rewritten = new Map<string, number>();
  private firstUse: number | undefined;

  constructor(
    private readonly unit: SourceUnit,
    private readonly contract: SdkContract
  ) {}

  get state(): RewriteState {
    return this.current;
  }

  private transition(to: RewriteState): void {
    const from = STATE_ORDER.indexOf(this.current);
    const target = STATE_ORDER.indexOf(to);
    if (this.current === 'finalized' || target < from) {
      throw new RewriteStateError(this.current, to);
    }
    this.current = to;
  }

  /**
   * Replace one call site with the instantiated template.
   * Returns the replacement text.
   */
  rewriteCall(site: CallSite, rule: TransformRule, values: ResolvedArguments): string {
    const text = instantiate(rule, values);
    this.transition('partially-rewritten');

    this.edits.push({ start: site.span.start, end: site.span.end, text });
    if (this.firstUse === undefined || site.span.start < this.firstUse) {
      this.firstUse = site.span.start;
    }
    for (const statement of rule.imports) {
      if (!this.imports.includes(statement)) this.imports.push(statement);
    }
    for (const statement of rule.setup) {
      if (!this.setup.includes(statement)) this.setup.push(statement);
    }
    this.rewritten.set(site.local, (this.rewritten.get(site.local) ?? 0) + 1);

    return text;
  }

  /**
   * Close the unit and return every edit to emit. A unit with no rewritten
   * call stays unmodified and yields no edits.
   *
   * @param references - uses of each SDK-bound local name, from the scanner
   */
  finalize(references: Map<string, number>): Edit[] {
    if (this.current === 'unmodified') {
      return [];
    }
    this.transition('finalized');

    for (const imp of this.unit.imports) {
      const edit = this.pruneImport(imp, references);
      if (edit) this.edits.push(edit);
    }

    this.edits.push(...this.nativeInsertions());

    return [...this.edits];
  }

  /**
   * Drop SDK import entries whose every use was rewritten
   */
  private pruneImport(imp: ImportStatement, references: Map<string, number>): Edit | null {
    if (imp.star) return null;

    const removable = imp.names.filter(entry => {
      if (!bindsSdk(imp, entry, this.contract)) return false;
      const count = this.rewritten.get(entry.local) ?? 0;
      return count > 0 && (references.get(entry.local) ?? 0) === count;
    });
    if (removable.length === 0) return null;

    const { statement } = imp;
    const remaining = imp.names.filter(entry => !removable.includes(entry));

    if (remaining.length === 0) {
      if (statement.topLevel && statement.soleOnLine) {
        return { start: statement.lineStart, end: statement.lineEnd, text: '' };
      }
      // Keep blocks non-empty and `;`-joined lines valid
      return { start: statement.start, end: statement.end, text: 'pass' };
    }

    const names = remaining.map(entry => this.unit.text.slice(entry.span.start, entry.span.end)).join(', ');
    const text = imp.kind === 'from' ? `from ${imp.module} import ${names}` : `import ${names}`;
    return { start: statement.start, end: statement.end, text };
  }

  /**
   * Native imports and client setup, each at most once and ahead of the first
   * rewritten call. Imports go after the module prologue; setup goes after every
   * native statement the file already has before that call.
   */
  private nativeInsertions(): Edit[] {
    const { text, tokens, statements, prologueEnd } = this.unit;
    const firstUse = this.firstUse ?? prologueEnd;

    // Only whole lines ending before the first use satisfy a requirement
    const present = new Map<string, number>();
    for (const statement of statements) {
      if (!statement.topLevel || statement.lineEnd > firstUse) continue;
      present.set(normalize(text.slice(tokens[statement.first].start, tokens[statement.last].end)), statement.lineEnd);
    }

    const missingImports = this.imports.filter(line => !present.has(normalize(line)));
    const missingSetup = this.setup.filter(line => !present.has(normalize(line)));
    if (missingImports.length === 0 && missingSetup.length === 0) return [];

    const setupAt = Math.max(
      prologueEnd,
      ...[...this.imports, ...this.setup].map(line => present.get(normalize(line)) ?? 0)
    );

    const eol = text.includes('\r\n') ? '\r\n' : '\n';
    const block = (lines: string[]): string => lines.map(line => line + eol).join('');

    if (setupAt === prologueEnd) {
      return [{ start: prologueEnd, end: prologueEnd, text: block([...missingImports, ...missingSetup]) }];
    }
    const edits: Edit[] = [];
    if (missingImports.length > 0) edits.push({ start: prologueEnd, end: prologueEnd, text: block(missingImports) });
    if (missingSetup.length > 0) edits.push({ start: setupAt, end: setupAt, text: block(missingSetup) });
    return edits;
  }
}
