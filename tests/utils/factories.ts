/**
 * Builders for parse trees and configuration used across tests
 */

import type { Attribute, ElementNode, HtmlNode, TextNode } from '../../src/types.js';
import type { Html2ManConfigOutput } from '../../src/schemas/config.schema.js';

export const text = (content: string): TextNode => ({ type: 'text', content });

export const el = (
  tag: string,
  attributes: Attribute[] = [],
  ...children: (HtmlNode | string)[]
): ElementNode => ({
  type: 'element',
  tag,
  attributes,
  children: children.map((child) => (typeof child === 'string' ? text(child) : child)),
});

/** Element without attributes. */
export const h = (tag: string, ...children: (HtmlNode | string)[]): ElementNode =>
  el(tag, [], ...children);

export const createMockConfig = (
  overrides?: Partial<Html2ManConfigOutput>
): Html2ManConfigOutput => {
  return {
    format: {
      indent: 4,
      bullet: '\\(bu',
      codeFont: 'CW',
      ...overrides?.format,
    },
    ui: {
      verbose: false,
      ...overrides?.ui,
    },
  };
};
