import { describe, it, expect } from 'vitest';
import { firstLine } from '../../src/util/text.js';

describe('firstLine', () => {
  it('returns the first line', () => {
    expect(firstLine('Project\n └─ Table(xy)')).toBe('Project');
  });

  it('shortens long lines', () => {
    expect(firstLine('abcdefghij', 8)).toBe('abcde...');
  });

  it('keeps lines of exactly the maximum length', () => {
    expect(firstLine('abcdefgh', 8)).toBe('abcdefgh');
  });

  it('defaults to 80 characters', () => {
    expect(firstLine('x'.repeat(81))).toBe(`${'x'.repeat(77)}...`);
  });
});
