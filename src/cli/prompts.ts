import { createInterface } from 'node:readline/promises';
import { stdin, stdout } from 'node:process';
import type { DayISO } from '../core/app-types';
import { MAX_TASK_WEIGHT, MIN_TASK_WEIGHT } from '../core/constants';
import { formatInputDate, parseInputDate } from '../core/date-utils';
import { InputClosedError, ValidationError } from '../core/errors';
import type { Logger } from '../core/logger';

export type AskFn = (question: string) => Promise<string>;

/**
 * Questions over a readline interface. Once the input ends, the pending
 * question and every later one reject with InputClosedError.
 */
export function createReadlineAsk(
  input: NodeJS.ReadableStream = stdin,
  output: NodeJS.WritableStream = stdout,
): { ask: AskFn; close: () => void } {
  const rl = createInterface({ input, output });
  let closed = false;
  const waiting = new Set<(err: Error) => void>();

  rl.on('close', () => {
    closed = true;
    for (const reject of waiting) reject(new InputClosedError());
    waiting.clear();
  });

  return {
    ask: (question) => {
      if (closed) return Promise.reject(new InputClosedError());
      return new Promise<string>((resolve, reject) => {
        waiting.add(reject);
        void rl.question(question)
          .then(resolve, reject)
          .finally(() => waiting.delete(reject));
      });
    },
    close: () => rl.close(),
  };
}

/**
 * Interactive questions. Each one repeats until the answer parses; the
 * parse error message is printed between attempts.
 */
export class Prompter {
  constructor(
    private readonly ask: AskFn,
    private readonly logger: Logger,
  ) {}

  /**
   * With `defaultYes` a blank answer means yes ("[Y/n]"); otherwise an
   * explicit y or n is required ("[y/n]").
   */
  askYesNo(question: string, defaultYes = false): Promise<boolean> {
    const hint = defaultYes ? '[Y/n]' : '[y/n]';
    return this.askUntilValid(`${question} ${hint}: `, (raw) => {
      const answer = raw.toLowerCase();
      if (answer === 'y' || answer === 'yes' || (defaultYes && answer === '')) return true;
      if (answer === 'n' || answer === 'no') return false;
      throw new ValidationError(defaultYes ? 'Enter Y or N.' : 'Enter y or n.');
    });
  }

  askDate(label: string, defaultDay: DayISO): Promise<DayISO> {
    return this.askUntilValid(`${label} [${formatInputDate(defaultDay)}]: `, (raw) =>
      raw === '' ? defaultDay : parseInputDate(raw),
    );
  }

  askPositiveNumber(label: string, defaultValue: number): Promise<number> {
    return this.askUntilValid(`${label} [${defaultValue}]: `, (raw) => {
      if (raw === '') return defaultValue;
      const n = Number(raw);
      if (!Number.isFinite(n) || n <= 0) throw new ValidationError('Enter a positive number.');
      return n;
    });
  }

  askWeight(issueKey: string, summary: string): Promise<number> {
    return this.askUntilValid(`Weight for ${issueKey} (${summary}) [${MIN_TASK_WEIGHT}-${MAX_TASK_WEIGHT}]: `, (raw) => {
      const n = Number(raw);
      if (!/^[1-9]\d*$/.test(raw) || n < MIN_TASK_WEIGHT || n > MAX_TASK_WEIGHT) {
        throw new ValidationError(`Weight must be an integer from ${MIN_TASK_WEIGHT} to ${MAX_TASK_WEIGHT}.`);
      }
      return n;
    });
  }

  private async askUntilValid<T>(question: string, parse: (raw: string) => T): Promise<T> {
    for (;;) {
      const raw = (await this.ask(question)).trim();
      try {
        return parse(raw);
      } catch (err) {
        if (!(err instanceof ValidationError)) throw err;
        this.logger.info(err.message);
      }
    }
  }
}
