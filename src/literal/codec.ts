/**
 * Conversion between raw multi-line text and the escaped form it takes inside a
 * double-quoted literal in a fixture file.
 *
 * Only three characters are escaped: backslash, double quote and newline.
 */

const ESCAPE_SEQUENCE = /\\(["\\n])/g;

/**
 * Escape raw text for embedding between double quotes.
 * Backslashes are escaped first so the escapes added for quotes and newlines
 * are not escaped a second time.
 */
export function encodeLiteral(raw: string): string {
  return raw
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n');
}

/**
 * Inverse of {@link encodeLiteral}.
 *
 * Newline, quote and backslash escapes are undone in a single left-to-right scan,
 * so `\\n` (an escaped backslash followed by `n`) stays a backslash and an `n`.
 */
export function decodeLiteral(literal: string): string {
  return literal.replace(ESCAPE_SEQUENCE, (_match, ch: string) => {
    if (ch === 'n') return '\n';
    return ch;
  });
}

/** Encode and wrap in double quotes. */
export function quoteLiteral(raw: string): string {
  return `"${encodeLiteral(raw)}"`;
}
