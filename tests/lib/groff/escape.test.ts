import { describe, it, expect } from 'vitest';
import {
  escapeText,
  fontEscape,
  protectLineStart,
  quoteArgument,
} from '../../../src/lib/groff/escape.js';

describe('groff escaping', () => {
  describe('escapeText', () => {
    it('should turn backslashes into \\e', () => {
      expect(escapeText('C:\\dir\\file')).toBe('C:\\edir\\efile');
    });

    it('should leave other text alone', () => {
      expect(escapeText('-v, --verbose')).toBe('-v, --verbose');
    });
  });

  describe('protectLineStart', () => {
    it('should guard lines that look like requests', () => {
      expect(protectLineStart('.PP')).toBe('\\&.PP');
      expect(protectLineStart("'br")).toBe("\\&'br");
    });

    it('should not touch other lines', () => {
      expect(protectLineStart('file.txt')).toBe('file.txt');
      expect(protectLineStart(' .PP')).toBe(' .PP');
    });
  });

  describe('fontEscape', () => {
    it('should pick the escape form by name length', () => {
      expect(fontEscape('B')).toBe('\\fB');
      expect(fontEscape('CW')).toBe('\\f(CW');
      expect(fontEscape('TTB')).toBe('\\f[TTB]');
    });
  });

  describe('quoteArgument', () => {
    it('should collapse whitespace and double quotes', () => {
      expect(quoteArgument('  Say "hi"\n now ')).toBe('"Say ""hi"" now"');
    });
  });
});
