import chalk from 'chalk';

export interface Logger {
  debug: (msg: string) => void;
}

let verbose = false;

/** Turn debug output on regardless of the DEBUG environment variable. */
export const setVerbose = (enabled: boolean): void => {
  verbose = enabled;
};

export const isVerbose = (): boolean => verbose || Boolean(process.env.DEBUG);

// Diagnostics go to stderr; stdout is left to whoever pipes us.
export const logger: Logger = {
  debug: (msg: string) => {
    if (isVerbose()) {
      console.error(chalk.gray('⚙'), chalk.gray(msg));
    }
  },
};

export const formatPath = (path: string): string => {
  return chalk.cyan(path);
};
