// Trailing blanks, then one or more newlines with only blanks between them.
const BLANK_RUN = /[ \t\n]*\n(?:[ \t]*\n)*/g;

/**
 * Collapse each run of empty or blank-only lines into a single newline and drop
 * leading whitespace. Knows nothing about groff.
 */
export const normalizeWhitespace = (text: string): string =>
  text.replace(BLANK_RUN, '\n').replace(/^\s+/, '');
