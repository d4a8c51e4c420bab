import { Command } from 'commander';
import chalk from 'chalk';
import { runConvert } from './commands/index.js';
import { APP_NAME, VERSION, DESCRIPTION } from './constants.js';

export const createProgram = (): Command =>
  new Command(APP_NAME)
    .description(DESCRIPTION)
    .version(VERSION, '-v, --version', 'Display version number')
    .helpOption('-h, --help', 'Display this help message')
    .argument('<input>', 'HTML manual page to read')
    .argument('<output>', 'groff file to write')
    .allowExcessArguments(false)
    .configureOutput({
      outputError: (str, write) => write(chalk.red(str)),
    })
    .action(async (input: string, output: string) => {
      await runConvert(input, output);
    });
