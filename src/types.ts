/** A single `name="value"` pair, kept in source order. */
export type Attribute = readonly [name: string, value: string];

export interface ElementNode {
  type: 'element';
  tag: string;
  attributes: Attribute[];
  children: HtmlNode[];
}

export interface TextNode {
  type: 'text';
  /** Entity references are already decoded. */
  content: string;
}

export type HtmlNode = ElementNode | TextNode;

export type HtmlDocument = HtmlNode[];

/** Exact pair match: both the name and the value must be equal. */
export const hasAttribute = (element: ElementNode, name: string, value: string): boolean =>
  element.attributes.some(([attrName, attrValue]) => attrName === name && attrValue === value);

export const getAttribute = (element: ElementNode, name: string): string | undefined =>
  element.attributes.find(([attrName]) => attrName === name)?.[1];

/** Concatenated text content of a node sequence, in document order. */
export const textContent = (nodes: HtmlNode[]): string =>
  nodes.map((node) => (node.type === 'text' ? node.content : textContent(node.children))).join('');

export interface FormatOptions {
  /** Indent, in ens, for list items and relative insets. */
  indent: number;
  /** Tag written in front of unordered list items. */
  bullet: string;
  /** Font used for code-like inline tags and preformatted blocks. */
  codeFont: string;
}
