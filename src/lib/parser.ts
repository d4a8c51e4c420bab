import { Parser } from 'htmlparser2';
import { decodeEntities } from './entities.js';
import { MalformedMarkupError, ParserInternalError } from '../errors.js';
import type { Attribute, ElementNode, HtmlDocument, HtmlNode } from '../types.js';

/** Elements that never have content or an end tag. */
export const VOID_ELEMENTS: ReadonlySet<string> = new Set([
  'area',
  'base',
  'br',
  'col',
  'embed',
  'hr',
  'img',
  'input',
  'link',
  'meta',
  'param',
  'source',
  'track',
  'wbr',
]);

/** Elements HTML allows to be closed implicitly. */
export const OPTIONAL_END_TAG: ReadonlySet<string> = new Set([
  'html',
  'head',
  'body',
  'p',
  'li',
  'dt',
  'dd',
  'rt',
  'rp',
  'optgroup',
  'option',
  'colgroup',
  'caption',
  'thead',
  'tbody',
  'tfoot',
  'tr',
  'td',
  'th',
]);

interface OpenElement {
  element: ElementNode;
  /** Offset of the `<` of the start tag. */
  offset: number;
  selfClosing: boolean;
  /** Opened by htmlparser2 for a stray end tag such as `</p>`. */
  implied: boolean;
}

export interface HtmlParserOptions {
  /** Name used in error messages. */
  file?: string;
}

export interface SourcePosition {
  line: number;
  column: number;
}

/**
 * Incremental HTML tree builder.
 *
 * Chunks may be cut anywhere, including inside a tag or an entity reference.
 * Text is held back until the next tag so that references split across chunks
 * decode as one.
 */
export class HtmlParser {
  readonly file: string;
  private readonly parser: Parser;
  private readonly document: HtmlDocument = [];
  private readonly open: OpenElement[] = [];
  private readonly lineStarts: number[] = [0];
  private source = '';
  private text = '';
  private attributes: Attribute[] = [];
  /** Start of a tag whose name was read but whose `>` was not seen yet. */
  private pendingTag: number | null = null;
  private closed = false;
  /** Set while htmlparser2 flushes whatever is left at end of input. */
  private ending = false;

  constructor(options: HtmlParserOptions = {}) {
    this.file = options.file ?? '<input>';
    this.parser = new Parser(
      {
        onopentagname: () => {
          this.flushText();
          this.pendingTag = this.parser.startIndex;
          this.attributes = [];
        },
        onattribute: (name, value) => {
          this.attributes.push([name, decodeEntities(value)]);
        },
        onopentag: (name, _attribs, isImplied) => {
          this.openElement(name, isImplied);
        },
        onclosetag: (name, isImplied) => {
          this.closeElement(name, isImplied);
        },
        oncomment: () => {
          // Comments complete while input is written; one flushed at the end never saw `-->`.
          if (this.ending) {
            throw this.unterminated(this.parser.startIndex);
          }
        },
        onprocessinginstruction: () => {
          if (this.ending) {
            throw this.unterminated(this.parser.startIndex);
          }
        },
        ontext: (data) => {
          const start = this.parser.startIndex;
          if (this.ending && this.source.charAt(start) === '<' && !this.source.startsWith(data, start)) {
            throw this.unterminated(start);
          }
          this.text += data;
        },
      },
      {
        decodeEntities: false,
        lowerCaseTags: true,
        lowerCaseAttributeNames: true,
        recognizeSelfClosing: true,
      }
    );
  }

  feed(chunk: string): void {
    if (this.closed) {
      throw new Error('Cannot feed a parser that has been closed');
    }

    const base = this.source.length;
    for (let i = chunk.indexOf('\n'); i !== -1; i = chunk.indexOf('\n', i + 1)) {
      this.lineStarts.push(base + i + 1);
    }
    this.source += chunk;
    this.parser.write(chunk);
  }

  /** Signal end of input and return the finished document. */
  close(): HtmlDocument {
    if (this.closed) {
      throw new Error('Parser has already been closed');
    }
    this.closed = true;

    this.ending = true;
    this.parser.end();
    this.flushText();

    const dangling =
      this.pendingTag ?? (this.parser.startIndex < this.source.length ? this.parser.startIndex : null);
    if (dangling !== null) {
      throw this.unterminated(dangling);
    }

    return this.document;
  }

  /** Map an absolute offset into the fed text to a 1-based line and column. */
  position(offset: number): SourcePosition {
    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if (this.lineStarts[mid] <= offset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return { line: low + 1, column: offset - this.lineStarts[low] + 1 };
  }

  private openElement(tag: string, isImplied: boolean): void {
    this.flushText();
    this.pendingTag = null;

    const element: ElementNode = {
      type: 'element',
      tag,
      attributes: isImplied ? [] : this.attributes,
      children: [],
    };
    this.attributes = [];
    this.append(element);

    this.open.push({
      element,
      offset: this.parser.startIndex,
      selfClosing: !isImplied && this.source.charAt(this.parser.endIndex - 1) === '/',
      implied: isImplied,
    });
  }

  private closeElement(tag: string, isImplied: boolean): void {
    if (this.pendingTag !== null) {
      throw this.unterminated(this.pendingTag);
    }
    this.flushText();

    const top = this.open.pop();
    if (!top || top.element.tag !== tag) {
      throw new Error(`End of <${tag}> does not match the open element`);
    }

    const implicitCloseAllowed =
      top.selfClosing || VOID_ELEMENTS.has(tag) || OPTIONAL_END_TAG.has(tag);
    if (isImplied && !implicitCloseAllowed) {
      throw this.malformed(top.offset, `unclosed tag <${tag}>`);
    }

    if (top.implied && !VOID_ELEMENTS.has(tag) && top.element.children.length === 0) {
      this.removeLast(top.element);
    }
  }

  private removeLast(element: ElementNode): void {
    const parent = this.open[this.open.length - 1];
    const siblings = parent ? parent.element.children : this.document;
    if (siblings[siblings.length - 1] === element) {
      siblings.pop();
    }
  }

  private flushText(): void {
    if (this.text === '') {
      return;
    }
    this.append({ type: 'text', content: decodeEntities(this.text) });
    this.text = '';
  }

  private append(node: HtmlNode): void {
    const parent = this.open[this.open.length - 1];
    if (parent) {
      parent.element.children.push(node);
    } else {
      this.document.push(node);
    }
  }

  /** Error for markup starting at `offset` that the input ended in the middle of. */
  private unterminated(offset: number): MalformedMarkupError {
    if (this.source.startsWith('<!--', offset)) {
      return this.malformed(offset, 'unterminated comment');
    }
    switch (this.source.charAt(offset + 1)) {
      case '!':
        return this.malformed(offset, 'unterminated declaration');
      case '?':
        return this.malformed(offset, 'unterminated processing instruction');
      default:
        return this.malformed(offset, 'unterminated tag');
    }
  }

  private malformed(offset: number, detail: string): MalformedMarkupError {
    const { line, column } = this.position(offset);
    return new MalformedMarkupError(this.file, line, column, detail);
  }
}

/**
 * Feed `lines` one at a time and return the parsed document. Failures that are
 * not markup errors are reported against the line being fed.
 */
export const parseHtml = (lines: Iterable<string>, file: string): HtmlDocument => {
  const parser = new HtmlParser({ file });
  let lineNumber = 0;
  let current = '';

  try {
    for (const line of lines) {
      lineNumber++;
      current = line;
      parser.feed(line);
    }
    return parser.close();
  } catch (error) {
    if (error instanceof MalformedMarkupError) {
      throw error;
    }
    throw new ParserInternalError(file, Math.max(lineNumber, 1), error, current);
  }
};
