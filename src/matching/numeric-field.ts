import { encodeLiteral } from '../literal/codec.js';
import { boundedPattern, escapeRegExp } from '../util/regexp.js';
import type { EditBoundary } from '../core/types.js';
import type { MatchStrategy } from './strategy.js';

export const DEFAULT_NUMERIC_LABELS = ['estimated cost', 'estimated row count', 'cost', 'rows'];

interface NumericToken {
  label: string;
  value: string;
}

const MASK = '\u0000';
const LABEL_CHAR = '[A-Za-z0-9_]';

/**
 * Where `label=value` may be replaced in the file: not inside a longer word or a
 * longer label ending in `label` (`cost` inside `estimated cost`), and not
 * followed by more digits.
 */
function tokenBoundary(label: string, labels: readonly string[]): EditBoundary {
  const prefixes = labels
    .filter((other) => other.length > label.length && other.endsWith(label))
    .map((other) => escapeRegExp(encodeLiteral(other.slice(0, other.length - label.length))));
  return { before: [LABEL_CHAR, ...prefixes].join('|'), after: '[\\d.]' };
}

/**
 * Patches a single drifted `<label>=<number>` annotation (e.g. `estimated cost=12.5`)
 * instead of the whole literal.
 *
 * Matches only when the two texts are identical once every labeled value is masked,
 * and exactly one distinct `(label, old, new)` change exists. The edit is global:
 * a stale annotation with that exact label and value is taken to denote the same
 * quantity wherever it appears in the file as a whole token.
 */
export function createNumericFieldStrategy(labels: readonly string[] = DEFAULT_NUMERIC_LABELS): MatchStrategy {
  // Longest label first so `estimated cost` wins over `cost` at the same position.
  const alternation = [...labels]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join('|');
  const tokenPattern = new RegExp(`(?<!${LABEL_CHAR})(${alternation})=(-?\\d+(?:\\.\\d+)?)`, 'g');

  const tokenize = (text: string): NumericToken[] =>
    Array.from(text.matchAll(tokenPattern), (m) => ({ label: m[1], value: m[2] }));

  const mask = (text: string): string =>
    text.replace(tokenPattern, (_m, label: string) => `${label}=${MASK}`);

  return {
    name: 'numeric-field',
    match(record, content) {
      if (labels.length === 0) return null;

      const expectedTokens = tokenize(record.expected);
      const actualTokens = tokenize(record.actual);
      if (expectedTokens.length === 0 || actualTokens.length === 0) return null;
      if (mask(record.expected) !== mask(record.actual)) return null;

      const changes = new Map<string, { label: string; from: string; to: string }>();
      for (let i = 0; i < expectedTokens.length; i++) {
        const before = expectedTokens[i];
        const after = actualTokens[i];
        if (before.value === after.value) continue;
        changes.set(`${before.label}${MASK}${before.value}${MASK}${after.value}`, {
          label: before.label,
          from: before.value,
          to: after.value,
        });
      }
      if (changes.size !== 1) return null;

      const [change] = changes.values();
      // A global replace is wrong if the same stale token also appears unchanged.
      for (let i = 0; i < expectedTokens.length; i++) {
        const before = expectedTokens[i];
        if (before.label === change.label && before.value === change.from && actualTokens[i].value !== change.to) {
          return null;
        }
      }

      const searchText = encodeLiteral(`${change.label}=${change.from}`);
      const boundary = tokenBoundary(change.label, labels);
      if (!boundedPattern(searchText, boundary).test(content)) return null;

      return {
        searchText,
        replaceText: encodeLiteral(`${change.label}=${change.to}`),
        scope: 'global',
        strategy: 'numeric-field',
        boundary,
      };
    },
  };
}
