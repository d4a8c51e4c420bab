import { describe, it, expect } from 'vitest';
import { normalizeWhitespace } from '../../src/lib/normalize.js';
import { splitLines } from '../../src/lib/lines.js';

const samples = [
  '',
  '\n\n\n',
  '.SH "NAME"\n\n\n.PP\ntext\n',
  '  \n\t\n.PP\n  indented\n \t \n\nend',
  'a  \t\n\t \nb\n\n',
  'no newline at all',
];

describe('normalizeWhitespace', () => {
  it('should collapse runs of blank lines into one newline', () => {
    expect(normalizeWhitespace('a\n\n\nb\n')).toBe('a\nb\n');
  });

  it('should treat lines of spaces and tabs as blank', () => {
    expect(normalizeWhitespace('a  \t\n\t \nb')).toBe('a\nb');
  });

  it('should remove leading blank lines', () => {
    expect(normalizeWhitespace('\n\n  \n.SH "X"\n')).toBe('.SH "X"\n');
    expect(normalizeWhitespace('   x')).toBe('x');
  });

  it('should keep the indentation of non-blank lines', () => {
    expect(normalizeWhitespace('a\n  b\n')).toBe('a\n  b\n');
  });

  it('should leave empty text empty', () => {
    expect(normalizeWhitespace('')).toBe('');
    expect(normalizeWhitespace('\n \n')).toBe('');
  });

  it('should be idempotent', () => {
    for (const sample of samples) {
      const once = normalizeWhitespace(sample);
      expect(normalizeWhitespace(once)).toBe(once);
    }
  });

  it('should never start with whitespace', () => {
    for (const sample of samples) {
      expect(normalizeWhitespace(sample)).not.toMatch(/^\s/);
    }
  });
});

describe('splitLines', () => {
  it('should keep line endings', () => {
    expect(splitLines('a\nb\n')).toEqual(['a\n', 'b\n']);
  });

  it('should keep a last line without a newline', () => {
    expect(splitLines('a\n\nb')).toEqual(['a\n', '\n', 'b']);
  });

  it('should return nothing for empty text', () => {
    expect(splitLines('')).toEqual([]);
  });
});
