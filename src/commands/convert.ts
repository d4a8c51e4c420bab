import { loadConfig } from '../lib/config.js';
import { convertFile } from '../lib/convert.js';
import { setVerbose } from '../ui/logger.js';

export const runConvert = async (input: string, output: string): Promise<void> => {
  const config = await loadConfig();
  setVerbose(config.ui.verbose);

  await convertFile(input, output, { format: config.format });
};
