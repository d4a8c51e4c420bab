/** Split text into lines, each keeping its `\n`; the last may lack one. */
export const splitLines = (text: string): string[] => text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
