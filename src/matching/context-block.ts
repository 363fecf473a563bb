import { encodeLiteral } from '../literal/codec.js';
import type { MatchStrategy } from './strategy.js';

export const DEFAULT_CONTEXT_RADIUS = 2;

/**
 * Line indices ordered by distance from `origin`, earlier lines first on ties.
 */
function byDistance(origin: number, count: number): number[] {
  const order: number[] = [origin];
  for (let d = 1; d < count; d++) {
    if (origin - d >= 0) order.push(origin - d);
    if (origin + d < count) order.push(origin + d);
  }
  return order;
}

/**
 * Best-effort fallback for literals where something like a plan node name was
 * substituted across lines. Picks an anchor line of `expected` that exists in the
 * file, closest to the first changed line, and replaces the `radius`-line
 * neighbourhood around it.
 */
export function createContextBlockStrategy(radius: number = DEFAULT_CONTEXT_RADIUS): MatchStrategy {
  return {
    name: 'context-block',
    match(record, content) {
      const expectedLines = record.expected.split('\n');
      const actualLines = record.actual.split('\n');
      if (expectedLines.length !== actualLines.length) return null;

      const firstDiff = expectedLines.findIndex((line, i) => line !== actualLines[i]);
      if (firstDiff === -1) return null;

      for (const anchor of byDistance(firstDiff, expectedLines.length)) {
        const anchorText = encodeLiteral(expectedLines[anchor]);
        if (anchorText.trim() === '' || !content.includes(anchorText)) continue;

        const lo = Math.max(0, anchor - radius);
        const hi = Math.min(expectedLines.length, anchor + radius + 1);
        const searchText = encodeLiteral(expectedLines.slice(lo, hi).join('\n'));
        const replaceText = encodeLiteral(actualLines.slice(lo, hi).join('\n'));
        if (searchText === replaceText || !content.includes(searchText)) continue;

        return { searchText, replaceText, scope: 'first', strategy: 'context-block' };
      }

      return null;
    },
  };
}
