import type { EditBoundary } from '../core/types.js';

/** Escape text so it matches itself when embedded in a RegExp source. */
export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * A RegExp matching `text` literally, but only where it is clear of `boundary`.
 */
export function boundedPattern(text: string, boundary: EditBoundary = {}, flags = ''): RegExp {
  const before = boundary.before ? `(?<!${boundary.before})` : '';
  const after = boundary.after ? `(?!${boundary.after})` : '';
  return new RegExp(`${before}${escapeRegExp(text)}${after}`, flags);
}
