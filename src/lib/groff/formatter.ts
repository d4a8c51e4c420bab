import { logger } from '../../ui/logger.js';
import { splitLines } from '../lines.js';
import { escapeText, fontEscape, protectLineStart, quoteArgument } from './escape.js';
import { StringSink, type OutputSink } from './sink.js';
import { TAG_HANDLERS, type TagHandler } from './handlers.js';
import type { FormatOptions, HtmlDocument, HtmlNode } from '../../types.js';

export const DEFAULT_FORMAT_OPTIONS: Readonly<FormatOptions> = Object.freeze({
  indent: 4,
  bullet: '\\(bu',
  codeFont: 'CW',
});

/** A newline right after `<pre>` is not part of the content. */
const dropLeadingNewline = (nodes: HtmlNode[]): HtmlNode[] => {
  const [first, ...rest] = nodes;
  if (first && first.type === 'text' && /^\r?\n/.test(first.content)) {
    return [{ ...first, content: first.content.replace(/^\r?\n/, '') }, ...rest];
  }
  return nodes;
};

export type ListKind = 'ul' | 'ol' | 'dl';

export interface ListContext {
  kind: ListKind;
  /** Items emitted so far; numbers ordered list items. */
  counter: number;
  depth: number;
}

export interface GroffFormatterOptions {
  /** Source file name, only used in diagnostics. */
  file: string;
  options?: Partial<FormatOptions>;
  sink?: OutputSink;
  handlers?: ReadonlyMap<string, TagHandler>;
}

/**
 * Depth-first groff emitter. Handlers in the tag table drive it through the
 * public primitives below; the formatter keeps track of line starts, the font
 * stack, list nesting and the last request written.
 */
export class GroffFormatter {
  readonly file: string;
  readonly options: Readonly<FormatOptions>;
  private readonly handlers: ReadonlyMap<string, TagHandler>;
  private sink: OutputSink;
  private atLineStart = true;
  /** Last request line, cleared as soon as text follows it. */
  private lastRequest: string | null = null;
  private capturing = false;
  private preformattedDepth = 0;
  private readonly fonts: string[] = ['R'];
  private list: ListContext | null = null;
  private readonly unhandled = new Set<string>();

  constructor({ file, options, sink, handlers }: GroffFormatterOptions) {
    this.file = file;
    this.options = { ...DEFAULT_FORMAT_OPTIONS, ...options };
    this.sink = sink ?? new StringSink();
    this.handlers = handlers ?? TAG_HANDLERS;
  }

  format(document: HtmlDocument): string {
    this.formatNodes(document);
    this.breakLine();
    return this.sink.toString();
  }

  formatNodes(nodes: HtmlNode[]): void {
    for (const node of nodes) {
      this.formatNode(node);
    }
  }

  formatNode(node: HtmlNode): void {
    if (node.type === 'text') {
      this.text(node.content);
      return;
    }

    const handler = this.handlers.get(node.tag);
    if (handler) {
      handler(this, node);
      return;
    }

    if (!this.unhandled.has(node.tag)) {
      this.unhandled.add(node.tag);
      logger.debug(`${this.file}: no rule for <${node.tag}>, formatting its content only`);
    }
    this.formatNodes(node.children);
  }

  get inPreformatted(): boolean {
    return this.preformattedDepth > 0;
  }

  get listContext(): ListContext | null {
    return this.list;
  }

  get currentFont(): string {
    return this.fonts[this.fonts.length - 1] ?? 'R';
  }

  /** End the current output line, if one is open. */
  breakLine(): void {
    if (!this.atLineStart) {
      this.write('\n');
      this.atLineStart = true;
    }
  }

  /** Write a request (or any raw line) on a line of its own. */
  request(...parts: string[]): void {
    if (this.capturing) {
      this.write(' ');
      return;
    }

    const line = parts.join(' ');
    this.breakLine();
    this.write(`${line}\n`);
    this.atLineStart = true;
    this.lastRequest = line;
  }

  paragraph(): void {
    const last = this.lastRequest;
    if (this.list) {
      if (last !== null && (last.startsWith('.IP') || last.startsWith('.TP') || last === '.sp')) {
        return;
      }
      this.request('.sp');
      return;
    }
    if (last === '.PP') {
      return;
    }
    this.request('.PP');
  }

  /** Write raw groff inline, e.g. an escape sequence. */
  inline(groff: string): void {
    this.write(groff);
    this.atLineStart = false;
    this.lastRequest = null;
  }

  text(content: string): void {
    let value = content.replace(/\r\n?/g, '\n');
    if (!this.inPreformatted) {
      value = value.replace(/[ \t\f\v]+/g, ' ');
    }

    for (const line of splitLines(value)) {
      let chunk = line;
      if (this.atLineStart && !this.inPreformatted) {
        chunk = chunk.replace(/^[ \t]+/, '');
        if (chunk === '\n') {
          continue;
        }
      }
      if (chunk === '') {
        continue;
      }

      const escaped = escapeText(chunk);
      this.write(this.atLineStart ? protectLineStart(escaped) : escaped);
      this.atLineStart = chunk.endsWith('\n');
      this.lastRequest = null;
    }
  }

  pushFont(font: string): void {
    this.fonts.push(font);
    this.inline(fontEscape(font));
  }

  /** Return to the font that was current before the matching `pushFont`. */
  popFont(): void {
    if (this.fonts.length > 1) {
      this.fonts.pop();
    }
    this.inline(fontEscape(this.currentFont));
  }

  withFont(font: string, nodes: HtmlNode[]): void {
    this.pushFont(font);
    this.formatNodes(nodes);
    this.popFont();
  }

  /** Open a list; lists inside another list are inset with `.RS`/`.RE`. */
  withList(kind: ListKind, nodes: HtmlNode[]): void {
    const parent = this.list;
    if (parent) {
      this.request('.RS', String(this.options.indent));
    }

    this.list = { kind, counter: 0, depth: parent ? parent.depth + 1 : 0 };
    this.formatNodes(nodes);
    this.list = parent;

    if (parent) {
      this.request('.RE');
    }
  }

  listItem(nodes: HtmlNode[]): void {
    const context = this.list;
    if (!context || context.kind === 'dl') {
      this.paragraph();
      this.formatNodes(nodes);
      return;
    }

    context.counter += 1;
    const mark = context.kind === 'ol' ? `${context.counter}.` : this.options.bullet;
    this.request('.IP', mark, String(this.options.indent));
    this.formatNodes(nodes);
  }

  /**
   * No-fill block in the code font. The font changes are requests of their own
   * so that no output line holds only an escape.
   */
  preformatted(nodes: HtmlNode[]): void {
    const font = this.options.codeFont;
    this.request('.nf');
    this.fonts.push(font);
    this.request('.ft', font);

    this.preformattedDepth += 1;
    this.formatNodes(dropLeadingNewline(nodes));
    this.preformattedDepth -= 1;

    this.fonts.pop();
    this.request('.ft', this.currentFont);
    this.request('.fi');
  }

  heading(macro: string, nodes: HtmlNode[]): void {
    const title = this.capture(() => this.formatNodes(nodes));
    this.request(macro, quoteArgument(title));
    this.paragraph();
  }

  /** Render into a side buffer, with requests reduced to spaces. */
  capture(render: () => void): string {
    const saved = {
      sink: this.sink,
      atLineStart: this.atLineStart,
      lastRequest: this.lastRequest,
      capturing: this.capturing,
    };

    const buffer = new StringSink();
    this.sink = buffer;
    this.atLineStart = false;
    this.capturing = true;

    render();

    this.sink = saved.sink;
    this.atLineStart = saved.atLineStart;
    this.lastRequest = saved.lastRequest;
    this.capturing = saved.capturing;
    return buffer.toString();
  }

  private write(chunk: string): void {
    this.sink.write(chunk);
  }
}
