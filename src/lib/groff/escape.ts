/** Make a backslash print as itself. */
export const escapeText = (text: string): string => text.replace(/\\/g, '\\e');

/**
 * A line starting with `.` or `'` would be read as a request; a leading `\&`
 * (zero-width) keeps it text.
 */
export const protectLineStart = (line: string): string =>
  line.startsWith('.') || line.startsWith("'") ? `\\&${line}` : line;

export const fontEscape = (font: string): string => {
  if (font.length === 1) {
    return `\\f${font}`;
  }
  if (font.length === 2) {
    return `\\f(${font}`;
  }
  return `\\f[${font}]`;
};

/** Single quoted macro argument: whitespace collapsed, `"` doubled. */
export const quoteArgument = (text: string): string =>
  `"${text.replace(/\s+/g, ' ').trim().replace(/"/g, '""')}"`;
