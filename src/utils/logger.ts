import chalk from 'chalk';

export type LogLevel = 'quiet' | 'normal' | 'verbose';

let level: LogLevel = 'normal';

export function setLogLevel(next: LogLevel): void {
  level = next;
}

function write(line: string): void {
  process.stdout.write(line + '\n');
}

export const logger = {
  info(message: string): void {
    if (level !== 'quiet') write(message);
  },
  success(message: string): void {
    if (level !== 'quiet') write(chalk.green(`✓ ${message}`));
  },
  warn(message: string): void {
    if (level !== 'quiet') write(chalk.yellow(`! ${message}`));
  },
  error(message: string): void {
    write(chalk.red(`✗ ${message}`));
  },
  debug(message: string): void {
    if (level === 'verbose') write(chalk.gray(`[debug] ${message}`));
  },
  dim(message: string): void {
    if (level !== 'quiet') write(chalk.dim(message));
  },
};
