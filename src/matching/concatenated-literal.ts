import { encodeLiteral } from '../literal/codec.js';
import { escapeRegExp } from '../util/regexp.js';
import type { MatchStrategy } from './strategy.js';

const SEPARATOR = /^\s*\+\s*/;

/** Split into per-line pieces, each keeping its trailing newline. */
function linePieces(text: string): string[] {
  return text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

/**
 * Handles literals written one line per quoted piece:
 *
 *     ExpectedPlan: "Project\n" +
 *         " └─ Table(xy)\n" +
 *         "",
 *
 * The actual value is rebuilt with the separator (and trailing `+ ""`, if any)
 * found in the file.
 */
export const concatenatedLiteralStrategy: MatchStrategy = {
  name: 'concatenated-literal',
  match(record, content) {
    const expectedPieces = linePieces(record.expected).map(encodeLiteral);
    if (expectedPieces.length < 2) return null;

    const body = expectedPieces.map((p) => `"${escapeRegExp(p)}"`).join('\\s*\\+\\s*');
    const found = new RegExp(`${body}(\\s*\\+\\s*"")?`).exec(content);
    if (!found) return null;

    const searchText = found[0];
    const afterFirst = searchText.slice(expectedPieces[0].length + 2);
    const separator = SEPARATOR.exec(afterFirst)?.[0] ?? ' + ';
    const trailing = found[1] ?? '';

    const actualPieces = linePieces(record.actual).map(encodeLiteral);
    const rebuilt = actualPieces.length > 0
      ? actualPieces.map((p) => `"${p}"`).join(separator)
      : '""';

    return {
      searchText,
      replaceText: rebuilt + trailing,
      scope: 'first',
      strategy: 'concatenated-literal',
    };
  },
};
