#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { createConsoleLogger } from '../core/logger';
import { JiraApiService } from '../services/JiraApiService';
import { SettingsService, loadEnvFile } from '../services/SettingsService';
import { Prompter, createReadlineAsk } from './prompts';
import { runWorklogFiller } from './run';

interface CliOptions {
  dryRun?: boolean;
  token?: string;
  baseUrl?: string;
  seed?: number;
  envFile: string;
}

function parseSeed(value: string): number {
  if (!/^-?\d+$/.test(value)) throw new InvalidArgumentError('Seed must be an integer.');
  return Number(value);
}

async function main(argv: string[]): Promise<number> {
  const program = new Command();
  program
    .name('worklog-filler')
    .description('Fill the missing hours of each workday with Jira worklogs spread over your open issues')
    .version('0.1.0')
    .option('--dry-run', 'Do not create worklogs, only print planned payloads')
    .option('--token <token>', 'Jira API token (default: DEFAULT_TOKEN)')
    .option('--base-url <url>', 'Jira base URL (default: DEFAULT_BASE_URL)')
    .option('--seed <n>', 'Seed the random draw for a reproducible plan', parseSeed)
    .option('--env-file <path>', '.env file to load', '.env');
  await program.parseAsync(argv);
  const opts = program.opts<CliOptions>();

  loadEnvFile(opts.envFile);
  const logger = createConsoleLogger();
  const settings = new SettingsService(process.env, logger).getAll();
  if (opts.token !== undefined) settings.token = opts.token;
  if (opts.baseUrl !== undefined) settings.baseUrl = opts.baseUrl;

  const { ask, close } = createReadlineAsk();
  try {
    return await runWorklogFiller(
      {
        settings,
        createClient: (baseUrl, token) => new JiraApiService(baseUrl, token),
        prompter: new Prompter(ask, logger),
        logger,
      },
      { dryRun: opts.dryRun === true, seed: opts.seed },
    );
  } finally {
    close();
  }
}

main(process.argv)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(chalk.red(err instanceof Error ? err.message : String(err)));
    process.exitCode = 1;
  });
