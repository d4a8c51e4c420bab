import { readFile, writeFile } from 'fs/promises';
import { pathExists } from 'fs-extra';
import { parseHtml } from './parser.js';
import { stripTableOfContents } from './filter.js';
import { GroffFormatter } from './groff/formatter.js';
import { normalizeWhitespace } from './normalize.js';
import { splitLines } from './lines.js';
import { FileNotFoundError, FormattingInternalError } from '../errors.js';
import { logger, formatPath } from '../ui/logger.js';
import type { FormatOptions, HtmlDocument, HtmlNode } from '../types.js';

export interface ConvertOptions {
  format?: Partial<FormatOptions>;
}

const countNodes = (nodes: HtmlNode[]): number =>
  nodes.reduce((total, node) => total + 1 + (node.type === 'element' ? countNodes(node.children) : 0), 0);

export const formatDocument = (
  document: HtmlDocument,
  file: string,
  options: ConvertOptions = {}
): string => {
  try {
    return new GroffFormatter({ file, options: options.format }).format(document);
  } catch (error) {
    throw new FormattingInternalError(file, error);
  }
};

/**
 * Run the whole pipeline on HTML text held in memory: parse line by line,
 * drop the table of contents, emit groff and tidy blank lines.
 */
export const convertHtml = (html: string, file: string, options: ConvertOptions = {}): string => {
  const document = parseHtml(splitLines(html), file);
  const filtered = stripTableOfContents(document);
  logger.debug(`${file}: parsed ${countNodes(document)} nodes, ${countNodes(filtered)} kept`);

  return normalizeWhitespace(formatDocument(filtered, file, options));
};

/**
 * Convert `input` to `output`. The destination is only written once the
 * conversion has succeeded.
 */
export const convertFile = async (
  input: string,
  output: string,
  options: ConvertOptions = {}
): Promise<void> => {
  if (!(await pathExists(input))) {
    throw new FileNotFoundError(input);
  }

  const html = await readFile(input, 'utf-8');
  const groff = convertHtml(html, input, options);
  await writeFile(output, groff, 'utf-8');
  logger.debug(`Wrote ${formatPath(output)}`);
};
