import { quoteLiteral } from '../literal/codec.js';
import { boundedPattern } from '../util/regexp.js';
import type { EditBoundary } from '../core/types.js';
import type { MatchStrategy } from './strategy.js';

// A quote preceded by a backslash is inside another literal, not the start of one.
const LITERAL_BOUNDARY: EditBoundary = { before: '\\\\' };

/**
 * Finds the whole expected value as a quoted literal and swaps in the actual one.
 * Only the first occurrence is replaced; an identical literal elsewhere may belong
 * to an unrelated test and is left for its own failure record.
 */
export const exactLiteralStrategy: MatchStrategy = {
  name: 'exact-literal',
  match(record, content) {
    const searchText = quoteLiteral(record.expected);
    if (!boundedPattern(searchText, LITERAL_BOUNDARY).test(content)) return null;
    return {
      searchText,
      replaceText: quoteLiteral(record.actual),
      scope: 'first',
      strategy: 'exact-literal',
      boundary: LITERAL_BOUNDARY,
    };
  },
};
