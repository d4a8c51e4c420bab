import chalk from 'chalk';

export class Html2ManError extends Error {
  constructor(
    message: string,
    public code: string
  ) {
    super(message);
    this.name = 'Html2ManError';
  }
}

const describeCause = (cause: unknown): string => {
  if (cause instanceof Error) {
    return `${cause.name}: ${cause.message}`;
  }
  return String(cause);
};

/** The input violates the tag/attribute grammar. */
export class MalformedMarkupError extends Html2ManError {
  constructor(
    public file: string,
    public line: number,
    public column: number,
    public detail: string
  ) {
    super(`${file}:${line}:${column}: Parse error: ${detail}`, 'MALFORMED_MARKUP');
    this.name = 'MalformedMarkupError';
  }
}

/** Anything else that went wrong while a line was fed to the parser. */
export class ParserInternalError extends Html2ManError {
  constructor(
    public file: string,
    public line: number,
    public override cause: unknown,
    public source: string
  ) {
    super(
      `${file}:${line}:0: Error (${describeCause(cause)}): ${source.replace(/\r?\n$/, '')}`,
      'PARSER_INTERNAL'
    );
    this.name = 'ParserInternalError';
  }
}

export class FormattingInternalError extends Html2ManError {
  constructor(
    public file: string,
    public override cause: unknown
  ) {
    super(`${file}: Formatting error: ${describeCause(cause)}`, 'FORMATTING_INTERNAL');
    this.name = 'FormattingInternalError';
  }
}

export class FileNotFoundError extends Html2ManError {
  constructor(path: string) {
    super(`File not found: ${path}`, 'FILE_NOT_FOUND');
  }
}

export class ConfigError extends Html2ManError {
  constructor(message: string) {
    super(`Configuration error: ${message}`, 'CONFIG_ERROR');
  }
}

export const handleError = (error: unknown): never => {
  if (error instanceof Html2ManError) {
    console.error(chalk.red('x'), error.message);
    process.exit(1);
  }

  if (error instanceof Error) {
    console.error(chalk.red('x'), 'An unexpected error occurred:', error.message);
    if (process.env.DEBUG) {
      console.error(error.stack);
    }
    process.exit(1);
  }

  console.error(chalk.red('x'), 'An unknown error occurred');
  process.exit(1);
};
