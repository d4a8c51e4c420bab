import { getAttribute } from '../../types.js';
import type { ElementNode } from '../../types.js';
import type { GroffFormatter } from './formatter.js';

export type TagHandler = (formatter: GroffFormatter, element: ElementNode) => void;

const skip: TagHandler = () => undefined;

const contents: TagHandler = (f, el) => f.formatNodes(el.children);

const font =
  (name: string): TagHandler =>
  (f, el) =>
    f.withFont(name, el.children);

const codeFont: TagHandler = (f, el) => f.withFont(f.options.codeFont, el.children);

const heading =
  (macro: '.SH' | '.SS'): TagHandler =>
  (f, el) =>
    f.heading(macro, el.children);

const shift =
  (up: string, down: string): TagHandler =>
  (f, el) => {
    f.inline(up);
    f.formatNodes(el.children);
    f.inline(down);
  };

const block: TagHandler = (f, el) => {
  f.breakLine();
  f.formatNodes(el.children);
};

const cell =
  (header: boolean): TagHandler =>
  (f, el) => {
    if (header) {
      f.withFont('B', el.children);
    } else {
      f.formatNodes(el.children);
    }
    f.text(' ');
  };

const handlerTable = {
  // Document furniture with nothing to show in a man page
  head: skip,
  title: skip,
  script: skip,
  style: skip,
  meta: skip,
  link: skip,

  html: contents,
  body: contents,
  a: contents,
  span: contents,
  section: contents,
  article: contents,
  main: contents,

  h1: heading('.SH'),
  h2: heading('.SH'),
  h3: heading('.SS'),
  h4: heading('.SS'),
  h5: heading('.SS'),
  h6: heading('.SS'),

  p: (f, el) => {
    f.paragraph();
    f.formatNodes(el.children);
  },
  div: block,
  blockquote: (f, el) => {
    f.request('.RS', String(f.options.indent));
    f.formatNodes(el.children);
    f.request('.RE');
  },

  b: font('B'),
  strong: font('B'),
  i: font('I'),
  em: font('I'),
  u: font('I'),
  var: font('I'),
  cite: font('I'),
  dfn: font('I'),
  code: codeFont,
  tt: codeFont,
  kbd: codeFont,
  samp: codeFont,
  sup: shift('\\u', '\\d'),
  sub: shift('\\d', '\\u'),

  ul: (f, el) => f.withList('ul', el.children),
  ol: (f, el) => f.withList('ol', el.children),
  li: (f, el) => f.listItem(el.children),
  dl: (f, el) => f.withList('dl', el.children),
  dt: (f, el) => {
    f.request('.TP');
    f.formatNodes(el.children);
    f.breakLine();
  },
  dd: block,

  br: (f) => f.request('.br'),
  hr: (f) => f.request("\\l'\\n(.lu'"),
  pre: (f, el) => f.preformatted(el.children),

  img: (f, el) => {
    const alt = getAttribute(el, 'alt');
    if (alt) {
      f.text(alt);
    }
  },

  tr: (f, el) => {
    f.request('.br');
    f.formatNodes(el.children);
  },
  td: cell(false),
  th: cell(true),
} satisfies Record<string, TagHandler>;

/** Tag name → handler. Tags not listed here only have their content formatted. */
export const TAG_HANDLERS: ReadonlyMap<string, TagHandler> = new Map(Object.entries(handlerTable));
