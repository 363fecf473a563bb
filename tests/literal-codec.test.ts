import { describe, it, expect } from 'vitest';
import { encodeLiteral, decodeLiteral, quoteLiteral } from '../src/literal/codec.js';

describe('encodeLiteral', () => {
  it('escapes newlines as \\n', () => {
    expect(encodeLiteral('a\nb')).toBe('a\\nb');
  });

  it('escapes double quotes', () => {
    expect(encodeLiteral('say "hi"')).toBe('say \\"hi\\"');
  });

  it('escapes backslashes before anything else', () => {
    expect(encodeLiteral('a\\b"c\nd')).toBe('a\\\\b\\"c\\nd');
  });

  it('does not double-escape a literal backslash-n', () => {
    expect(encodeLiteral('x\\ny')).toBe('x\\\\ny');
  });

  it('leaves plain text unchanged', () => {
    expect(encodeLiteral(' └─ Table(xy)')).toBe(' └─ Table(xy)');
  });
});

describe('decodeLiteral', () => {
  it('turns \\n into a newline', () => {
    expect(decodeLiteral('Project\\n └─ Table(xy)\\n')).toBe('Project\n └─ Table(xy)\n');
  });

  it('keeps an escaped backslash followed by n as two characters', () => {
    expect(decodeLiteral('x\\\\ny')).toBe('x\\ny');
  });

  it('unescapes quotes', () => {
    expect(decodeLiteral('say \\"hi\\"')).toBe('say "hi"');
  });

  it('round-trips text containing backslashes, quotes and newlines', () => {
    const samples = [
      '',
      'plain',
      'a\\b',
      '"quoted"',
      'line1\nline2\n',
      'x\\ny',
      '\\"\n\\\\n"',
      'Filter((t.v = "a\\b"))\n └─ Table(t)\n',
    ];
    for (const raw of samples) {
      expect(decodeLiteral(encodeLiteral(raw))).toBe(raw);
    }
  });
});

describe('quoteLiteral', () => {
  it('wraps the encoded text in double quotes', () => {
    expect(quoteLiteral('a\nb')).toBe('"a\\nb"');
  });
});
