import { cosmiconfig } from 'cosmiconfig';
import { html2manConfigSchema, defaultConfig, type Html2ManConfigOutput } from '../schemas/config.schema.js';
import { ConfigError } from '../errors.js';
import { APP_NAME, CONFIG_SEARCH_PLACES } from '../constants.js';
import { logger, formatPath } from '../ui/logger.js';

let cachedConfig: Html2ManConfigOutput | null = null;
let cachedSearchDir: string | null = null;

/**
 * Find and validate the configuration file for `searchFrom` (the current
 * directory by default). Defaults apply when there is none.
 */
export const loadConfig = async (searchFrom: string = process.cwd()): Promise<Html2ManConfigOutput> => {
  if (cachedConfig && cachedSearchDir === searchFrom) {
    return cachedConfig;
  }

  const explorer = cosmiconfig(APP_NAME, { searchPlaces: CONFIG_SEARCH_PLACES });

  let found: Awaited<ReturnType<typeof explorer.search>>;
  try {
    found = await explorer.search(searchFrom);
  } catch (error) {
    throw new ConfigError(
      `Failed to read configuration: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  if (!found || found.isEmpty) {
    cachedConfig = defaultConfig;
    cachedSearchDir = searchFrom;
    return cachedConfig;
  }

  const result = html2manConfigSchema.safeParse(found.config);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration in ${found.filepath}: ${result.error.message}`);
  }

  logger.debug(`Loaded configuration from ${formatPath(found.filepath)}`);
  cachedConfig = result.data;
  cachedSearchDir = searchFrom;
  return cachedConfig;
};

export const clearConfigCache = (): void => {
  cachedConfig = null;
  cachedSearchDir = null;
};
