import chalk from 'chalk';
import ora from 'ora';
import type { Ora } from 'ora';
import { formatDuration, type StageProgress } from '../index.js';

export interface SpinnerHandle {
  start(text: string): SpinnerHandle;
  succeed(text?: string): SpinnerHandle;
  warn(text?: string): SpinnerHandle;
  stop(): void;
}

/**
 * Lazily started ora spinner. Repeated start() calls only replace the text.
 */
export function createSpinner(): SpinnerHandle {
  let spinner: Ora | undefined;

  return {
    start(text: string) {
      if (!spinner) spinner = ora(text).start();
      else spinner.text = text;
      return this;
    },
    succeed(text?: string) {
      spinner?.succeed(text && chalk.green(text));
      return this;
    },
    warn(text?: string) {
      spinner?.warn(text && chalk.yellow(text));
      return this;
    },
    stop() {
      spinner?.stop();
    },
  };
}

/**
 * One spinner per load-test phase, showing `<label> (completed/total)` and
 * closing with a succeed or warn line once every item of the phase settled.
 */
export interface PhaseProgress {
  begin(label: string, total: number): void;
  update(label: string, progress: StageProgress): void;
  stop(): void;
}

export function createPhaseProgress(
  newSpinner: () => SpinnerHandle = createSpinner,
  now: () => number = Date.now,
): PhaseProgress {
  let spinner = newSpinner();
  let startedAt = 0;

  const finish = (label: string, succeeded: number, failed: number) => {
    const summary = `${label}: ${succeeded} ok, ${failed} failed in ${formatDuration(now() - startedAt)}`;
    if (failed) spinner.warn(summary);
    else spinner.succeed(summary);
  };

  return {
    begin(label, total) {
      spinner.stop();
      startedAt = now();
      spinner = newSpinner().start(`${label} (0/${total})`);
      // an empty phase reports no progress, so it is closed here
      if (total === 0) finish(label, 0, 0);
    },
    update(label, progress) {
      spinner.start(`${label} (${progress.completed}/${progress.total})`);
      if (progress.completed === progress.total) finish(label, progress.succeeded, progress.failed);
    },
    stop() {
      spinner.stop();
    },
  };
}

export const symbols = {
  success: chalk.green('✔'),
  warn: chalk.yellow('⚠'),
};

export function heading(title: string) {
  console.log('\n' + chalk.bold.blue(title));
}

export function kv(label: string, value: string) {
  console.log('  ' + chalk.gray(label + ':') + ' ' + chalk.white(value));
}

export const render = {
  line(msg = '') {
    console.log(msg);
  },
  warn(msg: string) {
    console.log(symbols.warn + ' ' + chalk.yellow(msg));
  },
};
