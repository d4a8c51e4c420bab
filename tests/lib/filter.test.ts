import { describe, it, expect } from 'vitest';
import {
  filterNode,
  isTableOfContents,
  stripTableOfContents,
} from '../../src/lib/filter.js';
import { textContent } from '../../src/types.js';
import type { HtmlDocument } from '../../src/types.js';
import { el, h, text } from '../utils/factories.js';

const toc = (...children: string[]) =>
  el('div', [['class', 'toc']], h('ul', ...children.map((child) => h('li', child))));

describe('filter', () => {
  describe('isTableOfContents', () => {
    it('should match a div whose class is exactly toc', () => {
      expect(isTableOfContents(el('div', [['class', 'toc']]))).toBe(true);
      expect(isTableOfContents(el('div', [['id', 'main'], ['class', 'toc']]))).toBe(true);
    });

    it('should need both the name and the value to match', () => {
      expect(isTableOfContents(el('div', [['class', 'toc-extra']]))).toBe(false);
      expect(isTableOfContents(el('div', [['id', 'toc']]))).toBe(false);
      expect(isTableOfContents(el('section', [['class', 'toc']]))).toBe(false);
    });
  });

  describe('filterNode', () => {
    it('should pass text through', () => {
      const node = text('.PP');
      expect(filterNode(node)).toBe(node);
    });

    it('should drop a table of contents', () => {
      expect(filterNode(toc('A'))).toBeNull();
    });
  });

  describe('stripTableOfContents', () => {
    it('should remove a top-level block and keep its siblings in order', () => {
      const document: HtmlDocument = [h('h1', 'Name'), toc('A', 'B'), h('p', 'Body'), h('p', 'More')];

      expect(stripTableOfContents(document)).toEqual([h('h1', 'Name'), h('p', 'Body'), h('p', 'More')]);
    });

    it('should remove nested blocks and leave their ancestors in place', () => {
      const document: HtmlDocument = [
        h('body', h('div', h('p', 'Before'), toc('Hidden'), h('p', 'After')), text('\n')),
      ];

      const filtered = stripTableOfContents(document);

      expect(filtered).toEqual([h('body', h('div', h('p', 'Before'), h('p', 'After')), text('\n'))]);
      expect(textContent(filtered)).toBe('BeforeAfter\n');
    });

    it('should remove a table of contents nested in another', () => {
      const document: HtmlDocument = [el('div', [['class', 'toc']], toc('Inner')), h('p', 'Body')];

      expect(stripTableOfContents(document)).toEqual([h('p', 'Body')]);
    });

    it('should not modify its input', () => {
      const document: HtmlDocument = [h('div', toc('A'), h('p', 'Body'))];

      stripTableOfContents(document);

      expect(textContent(document)).toBe('ABody');
    });

    it('should be idempotent', () => {
      const documents: HtmlDocument[] = [
        [],
        [text('only text')],
        [toc('A'), h('p', 'x', toc('B'), h('b', 'y'))],
        [h('ul', h('li', toc('C')), h('li', 'D')), el('div', [['class', 'toc']])],
      ];

      for (const document of documents) {
        const once = stripTableOfContents(document);
        expect(stripTableOfContents(once)).toEqual(once);
      }
    });
  });
});
