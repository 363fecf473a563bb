import { exactLiteralStrategy } from './exact-literal.js';
import { createNumericFieldStrategy, DEFAULT_NUMERIC_LABELS } from './numeric-field.js';
import { createContextBlockStrategy, DEFAULT_CONTEXT_RADIUS } from './context-block.js';
import { concatenatedLiteralStrategy } from './concatenated-literal.js';
import { STRATEGY_NAMES, type MatchStrategy, type StrategyName } from './strategy.js';

export { STRATEGY_NAMES, locateEdit, type MatchStrategy, type StrategyName } from './strategy.js';
export { exactLiteralStrategy } from './exact-literal.js';
export { createNumericFieldStrategy, DEFAULT_NUMERIC_LABELS } from './numeric-field.js';
export { createContextBlockStrategy, DEFAULT_CONTEXT_RADIUS } from './context-block.js';
export { concatenatedLiteralStrategy } from './concatenated-literal.js';

export interface StrategyChainOptions {
  /** Strategies to enable. Defaults to all of them. */
  enabled?: readonly StrategyName[];
  numericLabels?: readonly string[];
  contextRadius?: number;
}

/**
 * Build the matcher chain. Enabled strategies always run in the fixed
 * priority order of {@link STRATEGY_NAMES}, regardless of the order given.
 */
export function buildStrategyChain(options: StrategyChainOptions = {}): MatchStrategy[] {
  const enabled = new Set<StrategyName>(options.enabled ?? STRATEGY_NAMES);

  const all: Record<StrategyName, MatchStrategy> = {
    'exact-literal': exactLiteralStrategy,
    'numeric-field': createNumericFieldStrategy(options.numericLabels ?? DEFAULT_NUMERIC_LABELS),
    'context-block': createContextBlockStrategy(options.contextRadius ?? DEFAULT_CONTEXT_RADIUS),
    'concatenated-literal': concatenatedLiteralStrategy,
  };

  return STRATEGY_NAMES.filter((name) => enabled.has(name)).map((name) => all[name]);
}
