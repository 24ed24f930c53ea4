import chalk from 'chalk';

export type LogTag = 'DAY' | 'SKIP' | 'OK' | 'ERR' | 'DRY-RUN' | 'WARN' | 'ERROR';

export interface Logger {
  /** Plain line, no tag. */
  info(message: string): void;
  /** Tagged line, e.g. "[SKIP] 2026-02-23: ..." */
  log(tag: LogTag, message: string): void;
}

const TAG_COLORS: Record<LogTag, (text: string) => string> = {
  DAY: chalk.cyan,
  SKIP: chalk.gray,
  OK: chalk.green,
  ERR: chalk.red,
  'DRY-RUN': chalk.magenta,
  WARN: chalk.yellow,
  ERROR: chalk.red.bold,
};

export function createConsoleLogger(): Logger {
  return {
    info(message) {
      // eslint-disable-next-line no-console
      console.log(message);
    },
    log(tag, message) {
      const line = `${TAG_COLORS[tag](`[${tag}]`)} ${message}`;
      if (tag === 'ERR' || tag === 'ERROR') {
        // eslint-disable-next-line no-console
        console.error(line);
      } else if (tag === 'WARN') {
        // eslint-disable-next-line no-console
        console.warn(line);
      } else {
        // eslint-disable-next-line no-console
        console.info(line);
      }
    },
  };
}
