import { hasAttribute } from '../types.js';
import type { ElementNode, HtmlDocument, HtmlNode } from '../types.js';

export const isTableOfContents = (element: ElementNode): boolean =>
  element.tag === 'div' && hasAttribute(element, 'class', 'toc');

/** Filter one node; `null` means the node and everything under it is dropped. */
export const filterNode = (node: HtmlNode): HtmlNode | null => {
  if (node.type === 'text') {
    return node;
  }
  if (isTableOfContents(node)) {
    return null;
  }
  return { ...node, children: filterNodes(node.children) };
};

export const filterNodes = (nodes: HtmlNode[]): HtmlNode[] =>
  nodes.flatMap((node) => {
    const filtered = filterNode(node);
    return filtered ? [filtered] : [];
  });

/** Remove every `<div class="toc">` subtree. Returns a new tree. */
export const stripTableOfContents = (document: HtmlDocument): HtmlDocument =>
  filterNodes(document);
