import type { EditPlanEntry, FailureRecord } from '../core/types.js';

/**
 * Strategy names in priority order. The chain always runs in this order,
 * whichever subset is enabled.
 */
export const STRATEGY_NAMES = [
  'exact-literal',
  'numeric-field',
  'context-block',
  'concatenated-literal',
] as const;

export type StrategyName = (typeof STRATEGY_NAMES)[number];

/**
 * Locates the text in a fixture file that corresponds to a failure's expected
 * value and produces its replacement. Implementations are pure: they read
 * `content` and never modify it.
 */
export interface MatchStrategy {
  readonly name: StrategyName;
  match(record: FailureRecord, content: string): EditPlanEntry | null;
}

/**
 * Run `record` through `strategies` in order; the first located edit wins.
 */
export function locateEdit(
  record: FailureRecord,
  content: string,
  strategies: readonly MatchStrategy[],
): EditPlanEntry | null {
  for (const strategy of strategies) {
    const entry = strategy.match(record, content);
    if (entry) return entry;
  }
  return null;
}
