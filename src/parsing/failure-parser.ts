import { decodeLiteral } from '../literal/codec.js';
import type { FailureRecord } from '../core/types.js';

export const DEFAULT_FAILURE_MARKER = 'Not equal:';
export const DEFAULT_FAILURE_WORD = 'FAIL';

export interface ParseOptions {
  /** Text that introduces each mismatch section in the harness output. */
  marker?: string;
}

// A double-quoted literal whose body may contain escaped characters, newlines included.
const QUOTED = '"((?:[^"\\\\]|\\\\[\\s\\S])*)"';
const EXPECTED_PATTERN = new RegExp(`expected:\\s*${QUOTED}`);
const ACTUAL_PATTERN = new RegExp(`actual\\s*:\\s*${QUOTED}`);

/**
 * Extract expected/actual pairs from diff-style harness output.
 *
 * The output is split on the section marker; every section after the first is
 * searched for an `expected:` literal and an `actual:` literal. Sections missing
 * either one are skipped. Records keep harness order and are not deduplicated.
 */
export function parseFailures(output: string, options: ParseOptions = {}): FailureRecord[] {
  const marker = options.marker ?? DEFAULT_FAILURE_MARKER;
  const records: FailureRecord[] = [];

  const sections = output.split(marker);
  for (const section of sections.slice(1)) {
    const expected = EXPECTED_PATTERN.exec(section);
    const actual = ACTUAL_PATTERN.exec(section);
    if (!expected || !actual) continue;

    records.push({
      expected: decodeLiteral(expected[1]),
      actual: decodeLiteral(actual[1]),
    });
  }

  return records;
}

/**
 * Whether the harness signalled a failure at all. Output without the failure
 * word means every selected test passed.
 */
export function hasFailureSignal(output: string, failureWord: string = DEFAULT_FAILURE_WORD): boolean {
  return output.includes(failureWord);
}
