/**
 * infrar-transform Emitter
 * Serializes a source unit plus recorded edits back to text
 */

import type { Edit, SourceUnit } from './types.js';

/**
 * Apply edits in offset order. Text outside every edit is copied unchanged,
 * so a unit without edits comes back byte for byte.
 */
export function emit(unit: SourceUnit, edits: Edit[]): string {
  const { text } = unit;
  if (edits.length === 0) {
    return text;
  }

  const ordered = [...edits].sort((a, b) => a.start - b.start || a.end - b.end);
  const parts: string[] = [];
  let pos = 0;

  for (const edit of ordered) {
    if (edit.start < pos) {
      throw new Error(`Overlapping edits at offset ${edit.start}`);
    }
    if (edit.start > pos) {
      parts.push(text.substring(pos, edit.start));
    }
    parts.push(edit.text);
    pos = edit.end;
  }

  if (pos < text.length) {
    parts.push(text.substring(pos));
  }

  return parts.join('');
}
