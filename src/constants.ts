import { join, dirname } from 'path';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';

// Read version from package.json at runtime
const __dirname = dirname(fileURLToPath(import.meta.url));
const packageJsonPath = join(__dirname, '..', 'package.json');

const readVersion = (): string => {
  try {
    const pkg: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return '1.0.0';
  } catch {
    // package.json is not shipped next to a bundled build
    return '1.0.0';
  }
};

export const VERSION = readVersion();
export const DESCRIPTION = 'Convert an HTML manual page into groff man-macro source';
export const APP_NAME = 'html2man';

export const CONFIG_SEARCH_PLACES = [
  'package.json',
  '.html2manrc',
  '.html2manrc.json',
  '.html2manrc.yaml',
  '.html2manrc.yml',
  'html2man.config.js',
  'html2man.config.cjs',
];

/**
 * Named character references with a fixed substitution. These take precedence
 * over the standard HTML table, so `&nbsp;` renders as a plain space that
 * groff is free to fill.
 */
export const ENTITIES: Readonly<Record<string, string>> = Object.freeze({
  nbsp: ' ',
  bull: '*',
});
