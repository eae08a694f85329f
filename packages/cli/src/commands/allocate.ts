import { Command } from 'commander';
import chalk from 'chalk';
import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { ok, err, type Result } from 'neverthrow';
import {
  allocateTrial,
  allocationToRecord,
  formatGroupSizes,
  loadTrialConfig,
  serializeAllocation,
  sizeSpread,
  DEFAULT_TRIAL_FILE,
  type Seed,
  type TrialConfigError,
  type TrialRun,
  type TrialRunError,
} from '@rct-allocate/core';

export interface AllocateOptions {
  seed?: string;
  json?: boolean;
  out?: string;
}

/**
 * Integer-looking seeds become numbers so `--seed 42` matches `seed: 42`
 * in a trial file; anything else is used as a string seed.
 */
export function parseSeedOption(value: string): Seed {
  return /^-?\d+$/.test(value) ? Number(value) : value;
}

/**
 * Format a trial run for terminal display.
 */
export function formatTrialRun(run: TrialRun): string {
  const lines: string[] = [];
  const { config } = run;

  lines.push(chalk.bold(`Trial: ${config.name}`));
  lines.push(`  Strategy:     ${chalk.cyan(config.strategy.type)}`);
  lines.push(`  Participants: ${chalk.cyan(String(config.participants.length))}`);
  lines.push(`  Seed:         ${run.seed === undefined ? chalk.yellow('none') : chalk.cyan(String(run.seed))}`);
  lines.push('');

  for (const [group, members] of run.allocation) {
    lines.push(`${chalk.bold(group)} ${chalk.dim(`(${members.length})`)}`);
    lines.push(`  ${members.length > 0 ? members.join(', ') : chalk.dim('no participants')}`);
  }

  lines.push('');
  lines.push(formatGroupSizes(run.report));

  const spread = sizeSpread(run.report);
  const spreadColor = spread <= 1 ? chalk.green : chalk.yellow;
  lines.push(`Size spread: ${spreadColor(String(spread))}`);
  if (run.copies > 1) {
    lines.push(chalk.dim(`Each participant appears ${run.copies} times (one partition per block size).`));
  }

  return lines.join('\n');
}

/**
 * Format a trial run as JSON. `groups` keeps the declared group order,
 * which object keys lose for integer-like names.
 */
export function formatTrialRunJSON(run: TrialRun): string {
  return JSON.stringify(
    {
      name: run.config.name,
      strategy: run.config.strategy.type,
      seed: run.seed ?? null,
      groups: [...run.allocation.keys()],
      allocation: allocationToRecord(run.allocation),
      groupSizes: Object.fromEntries(run.report),
      spread: sizeSpread(run.report),
    },
    null,
    2,
  );
}

/**
 * Load a trial file, apply the seed override and allocate.
 */
export async function runAllocate(
  filePath: string,
  options: AllocateOptions,
): Promise<Result<TrialRun, TrialConfigError | TrialRunError>> {
  const configResult = await loadTrialConfig(filePath);
  if (configResult.isErr()) {
    return err(configResult.error);
  }

  const overrides = options.seed === undefined ? {} : { seed: parseSeedOption(options.seed) };
  const runResult = allocateTrial(configResult.value, overrides);
  if (runResult.isErr()) {
    return err(runResult.error);
  }
  return ok(runResult.value);
}

export function registerAllocateCommand(program: Command): void {
  program
    .command('allocate')
    .description('Allocate trial participants to groups')
    .argument('[file]', 'Trial definition file', DEFAULT_TRIAL_FILE)
    .option('--seed <seed>', 'Override the seed from the trial file')
    .option('--json', 'Output in JSON format')
    .option('--out <path>', 'Write the allocation as JSON to a file')
    .action(async (file: string, options: AllocateOptions) => {
      try {
        const result = await runAllocate(resolve(process.cwd(), file), options);
        if (result.isErr()) {
          // eslint-disable-next-line no-console
          console.error(chalk.red('Allocation failed:'), result.error.message);
          process.exit(1);
        }
        const run = result.value;

        if (options.out) {
          const outPath = resolve(process.cwd(), options.out);
          await writeFile(outPath, serializeAllocation(run.allocation), 'utf-8');
          if (!options.json) {
            // eslint-disable-next-line no-console
            console.log(chalk.green('Wrote'), outPath);
          }
        }

        // eslint-disable-next-line no-console
        console.log(options.json ? formatTrialRunJSON(run) : formatTrialRun(run));
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        // eslint-disable-next-line no-console
        console.error(chalk.red('Allocation failed:'), message);
        process.exit(1);
      }
    });
}
