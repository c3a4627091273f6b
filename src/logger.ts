import chalk from 'chalk';

export const styleKV = (label: string, value: string | number): string =>
  `${chalk.cyan(label)}: ${chalk.white(String(value))}`;

export const logInfo = (message: string): void => {
  process.stdout.write(`${message}\n`);
};

export const logWarn = (message: string): void => {
  process.stderr.write(`${chalk.yellow('WARN')} ${message}\n`);
};

export const logError = (message: string): void => {
  process.stderr.write(`${chalk.red('ERROR')} ${message}\n`);
};

export const getErrorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);
