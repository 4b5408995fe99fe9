import chalk from 'chalk';
import ora from 'ora';
import type {
  RecordErrorEvent,
  RecordScoredEvent,
  RunCompleteEvent,
  ScoredRecord,
  VerificationEngine,
  VerificationStatus,
} from '@clausecheck/core';
import { formatPercent, getStatusBadge } from '../output/index.js';

export interface ProgressOptions {
  /** Print one line per scored record. */
  verbose?: boolean;
  /** Suppress the spinner, e.g. when stdout carries JSON. */
  silent?: boolean;
  log?: (line: string) => void;
}

const STATUS_COLORS: Record<VerificationStatus, (text: string) => string> = {
  exact: chalk.green,
  likely: chalk.yellow,
  flagged: chalk.red,
};

export function formatRecordLine(scored: ScoredRecord): string {
  const { status } = scored.outcome;
  const color = STATUS_COLORS[status];
  return `${color(`${getStatusBadge(status)} ${scored.record.id}`)} ` +
    `${chalk.dim(formatPercent(scored.confidence))} ${chalk.dim('→')} ${scored.routing}`;
}

/**
 * Show engine progress on the terminal. Returns a function that detaches
 * the listeners.
 */
export function trackProgress(engine: VerificationEngine, options: ProgressOptions = {}): () => void {
  const { verbose = false, silent = false } = options;
  const log = options.log ?? ((line: string) => console.log(line));
  const spinner = ora({ text: 'Verifying records', isSilent: silent });
  let started = false;

  const onScored = (event: RecordScoredEvent) => {
    if (!started) {
      spinner.start();
      started = true;
    }
    spinner.text = `Verifying records ${chalk.dim(`${event.index + 1}/${event.total}`)}`;
    if (verbose) {
      spinner.clear();
      log(`  ${formatRecordLine(event.scored)}`);
      spinner.render();
    }
  };

  const onError = (event: RecordErrorEvent) => {
    if (verbose) {
      spinner.clear();
      log(chalk.yellow(`  ⚠ ${event.error.message}`));
      spinner.render();
    }
  };

  const onComplete = (event: RunCompleteEvent) => {
    const { summary } = event;
    const counts = `${summary.byStatus.exact} exact, ${summary.byStatus.likely} likely, ${summary.byStatus.flagged} flagged`;
    const noun = summary.total === 1 ? 'record' : 'records';
    const message = `Verified ${summary.total} ${noun}: ${counts}` +
      chalk.dim(`  ${(event.durationMs / 1000).toFixed(1)}s`);
    if (event.failures.length > 0) {
      spinner.warn(`${message} ${chalk.yellow(`(${event.failures.length} invalid)`)}`);
    } else {
      spinner.succeed(message);
    }
  };

  engine.on('record:scored', onScored);
  engine.on('record:error', onError);
  engine.on('run:complete', onComplete);

  return () => {
    engine.off('record:scored', onScored);
    engine.off('record:error', onError);
    engine.off('run:complete', onComplete);
  };
}
