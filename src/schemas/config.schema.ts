import { z } from 'zod';

/** groff font names: one or two characters, or a longer name for `\f[...]`. */
const fontNameSchema = z.string().regex(/^[A-Za-z0-9]+$/, 'Font names are letters and digits only');

export const formatConfigSchema = z
  .object({
    /** Indent in ens for list items and insets */
    indent: z.number().int().positive().default(4),
    /** Tag for unordered list items, as groff source */
    bullet: z
      .string()
      .regex(/^\S+$/, 'The bullet is a single macro argument and cannot contain whitespace')
      .default('\\(bu'),
    /** Font for code and preformatted text */
    codeFont: fontNameSchema.default('CW'),
  })
  .default({});

export const html2manConfigSchema = z.object({
  format: formatConfigSchema,

  ui: z
    .object({
      verbose: z.boolean().default(false),
    })
    .default({}),
});

export type Html2ManConfigOutput = z.output<typeof html2manConfigSchema>;

export const defaultConfig: Html2ManConfigOutput = html2manConfigSchema.parse({});
