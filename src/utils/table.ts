import Table = require('cli-table3');
import chalk = require('chalk');

import { WorkerResult, WorkerStopReason } from '../types/SpendTypes';

const STOP_REASON_COLORS: Record<WorkerStopReason, (text: string) => string> = {
  exhausted: chalk.green,
  denied: chalk.green,
  cancelled: chalk.yellow,
  fatal: chalk.red,
};

const MAX_ERROR_WIDTH = 48;

function truncate(text: string, width: number): string {
  return text.length > width ? `${text.slice(0, width - 3)}...` : text;
}

/**
 * Per-worker breakdown of a finished run, ordered by worker id
 */
export function createWorkerTable(workers: WorkerResult[]): string {
  const table = new Table({
    head: ['Worker', 'Stopped', 'Commits', 'Releases', 'Retries', 'Error'].map(label => chalk.bold(label)),
    colAligns: ['right', 'left', 'right', 'right', 'right', 'left'],
  });

  [...workers]
    .sort((a, b) => a.workerId - b.workerId)
    .forEach(worker => {
      table.push([
        String(worker.workerId),
        STOP_REASON_COLORS[worker.stopReason](worker.stopReason),
        String(worker.commits),
        String(worker.releases),
        String(worker.transientFailures),
        worker.error ? truncate(worker.error.message, MAX_ERROR_WIDTH) : '',
      ]);
    });

  return table.toString();
}

export function printWorkerTable(workers: WorkerResult[]): void {
  console.log(createWorkerTable(workers));
}
