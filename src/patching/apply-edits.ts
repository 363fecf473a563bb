import type { EditPlanEntry } from '../core/types.js';
import { boundedPattern } from '../util/regexp.js';

export interface ApplyResult {
  content: string;
  appliedCount: number;
  /** Entries whose search text was no longer present when their turn came. */
  skipped: EditPlanEntry[];
}

/**
 * Apply edits in order to one working copy, so each search sees the effect of
 * the edits before it. Absent search text is skipped and not counted. An entry
 * with a boundary only sees occurrences clear of it.
 *
 * Replacement text is inserted as-is; `$` sequences are not expanded.
 */
export function applyEdits(content: string, edits: readonly EditPlanEntry[]): ApplyResult {
  let working = content;
  let appliedCount = 0;
  const skipped: EditPlanEntry[] = [];

  for (const edit of edits) {
    if (edit.searchText === '') {
      skipped.push(edit);
      continue;
    }

    const next = edit.boundary ? replaceBounded(working, edit) : replacePlain(working, edit);
    if (next === null) {
      skipped.push(edit);
      continue;
    }
    working = next;
    appliedCount++;
  }

  return { content: working, appliedCount, skipped };
}

function replacePlain(content: string, edit: EditPlanEntry): string | null {
  if (!content.includes(edit.searchText)) return null;
  if (edit.scope === 'global') {
    return content.split(edit.searchText).join(edit.replaceText);
  }
  const at = content.indexOf(edit.searchText);
  return content.slice(0, at) + edit.replaceText + content.slice(at + edit.searchText.length);
}

function replaceBounded(content: string, edit: EditPlanEntry): string | null {
  const pattern = boundedPattern(edit.searchText, edit.boundary, edit.scope === 'global' ? 'g' : '');
  if (!pattern.test(content)) return null;
  pattern.lastIndex = 0;
  return content.replace(pattern, () => edit.replaceText);
}
