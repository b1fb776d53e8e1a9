/**
 * Spend Coordinator - runs N purchase workers against one shared ledger.
 *
 * Inputs are validated before any worker starts. The first fatal worker error
 * stops the rest of the run; an external AbortSignal does the same for an
 * operator interrupt. Either way every worker resolves its open ticket first.
 */

import PQueue from 'p-queue';

import Logger from './utils/logger';
import { SpendLedger, freezeSpendLimit, validateSpendLimit } from './utils/spendLedger';
import { FeeSampler } from './utils/feeSampler';
import { SpendWorker } from './utils/spendWorker';
import { getErrorMessage } from './utils/errorUtils';
import {
  FinalReport,
  LedgerInvariantError,
  LedgerStatus,
  SpendConfigError,
  SpendRunOptions,
  SpendValidationError,
  TerminationReason,
  WorkerResult,
} from './types/SpendTypes';

export const DEFAULT_TRANSIENT_BACKOFF_MS = 250;

/**
 * Reject configuration that must never reach a worker.
 * @throws SpendConfigError for a bad worker count
 * @throws SpendValidationError for bad amounts, limits or fee range
 */
export function validateRunOptions(options: SpendRunOptions): void {
  if (!Number.isSafeInteger(options.workerCount) || options.workerCount <= 0) {
    throw new SpendConfigError(`workerCount must be a positive integer (got ${options.workerCount})`);
  }
  validateSpendLimit(options.limit);
  if (!Number.isSafeInteger(options.perTransactionAmount) || options.perTransactionAmount <= 0) {
    throw new SpendValidationError(
      `perTransactionAmount must be a positive integer (got ${options.perTransactionAmount})`
    );
  }
  const reservationAmount = reservationAmountFor(options);
  if (!Number.isSafeInteger(reservationAmount)) {
    throw new SpendValidationError(
      `Reservation amount per attempt must be a safe integer (got ${reservationAmount})`
    );
  }
  const backoff = options.transientBackoffMs;
  if (backoff !== undefined && (!Number.isFinite(backoff) || backoff < 0)) {
    throw new SpendValidationError(`transientBackoffMs must be a non-negative number (got ${backoff})`);
  }
}

/**
 * Amount each attempt claims on the ledger.
 * With fee headroom the claim covers the largest fee the sampler can produce.
 */
export function reservationAmountFor(options: SpendRunOptions): number {
  const headroom = options.reserveFeeHeadroom ?? true;
  return options.perTransactionAmount + (headroom ? options.limit.feeRange.max : 0);
}

/**
 * Pick the final termination reason from the worker results and the ledger.
 */
export function resolveTermination(
  status: LedgerStatus,
  maxTransactionCount: number,
  cancelled: boolean,
  firstFatal: Error | undefined
): TerminationReason {
  if (firstFatal) return 'FatalError';
  if (status.committedCount >= maxTransactionCount) return 'CountExhausted';
  if (cancelled) return 'Cancelled';
  return 'BudgetExhausted';
}

/**
 * Run a coordinated spend and report the final totals.
 */
export async function runSpend(options: SpendRunOptions): Promise<FinalReport> {
  validateRunOptions(options);

  const startTime = Date.now();
  const { workerCount, submitter } = options;
  // Every later read, including the invariant check, uses this copy
  const limit = freezeSpendLimit(options.limit);
  const ledger = new SpendLedger(limit, { minTransactionAmount: options.minTransactionAmount });
  const reservationAmount = reservationAmountFor({ ...options, limit });

  // Internal stop: raised by the operator signal or by the first fatal error
  const controller = new AbortController();
  const onExternalAbort = () => controller.abort();
  if (options.signal?.aborted) {
    controller.abort();
  } else {
    options.signal?.addEventListener('abort', onExternalAbort, { once: true });
  }

  const fatalErrors: Error[] = [];
  const queue = new PQueue({ concurrency: workerCount });

  Logger.info(
    `[COORDINATOR] Starting ${workerCount} workers: ${options.perTransactionAmount} sats per transaction, ` +
    `fee ${limit.feeRange.min}-${limit.feeRange.max} sats, reserving ${reservationAmount} sats per attempt`
  );

  let workers: WorkerResult[];
  try {
    workers = await Promise.all(
      Array.from({ length: workerCount }, (_, i) =>
        queue.add(async () => {
          const worker = new SpendWorker({
            workerId: i + 1,
            ledger,
            sampler: new FeeSampler(limit.feeRange, options.random),
            submitter,
            perTransactionAmount: options.perTransactionAmount,
            reservationAmount,
            transientBackoffMs: options.transientBackoffMs ?? DEFAULT_TRANSIENT_BACKOFF_MS,
            signal: controller.signal,
          });
          const result = await worker.run();
          if (result.stopReason === 'fatal' && result.error) {
            if (fatalErrors.length > 0) {
              Logger.error(`[COORDINATOR] Worker ${result.workerId} also failed: ${getErrorMessage(result.error)}`);
            } else {
              Logger.error(`[COORDINATOR] Worker ${result.workerId} failed, stopping all workers`, result.error);
              controller.abort();
            }
            fatalErrors.push(result.error);
          }
          return result;
        })
      )
    );
    await queue.onIdle();
  } finally {
    options.signal?.removeEventListener('abort', onExternalAbort);
  }

  const status = await ledger.status();
  const firstFatal: Error | undefined = fatalErrors[0];
  const cancelled = options.signal?.aborted ?? false;
  let terminatedReason = resolveTermination(status, limit.maxTransactionCount, cancelled, firstFatal);
  let error = firstFatal;

  const breach = describeInvariantBreach(status, limit.maxTotalAmount, limit.maxTransactionCount);
  if (breach) {
    Logger.critical(`[COORDINATOR] ${breach}`, status);
    error = new LedgerInvariantError(breach);
    terminatedReason = 'FatalError';
  }

  const report: FinalReport = {
    committedAmount: status.committedAmount,
    committedCount: status.committedCount,
    terminatedReason,
    error,
    workers,
    durationMs: Date.now() - startTime,
  };

  Logger.summary.report({
    terminatedReason,
    committedAmount: report.committedAmount,
    committedCount: report.committedCount,
    maxTotalAmount: limit.maxTotalAmount,
    maxTransactionCount: limit.maxTransactionCount,
    workerCount,
    durationMs: report.durationMs,
    error: error ? getErrorMessage(error) : undefined,
  });

  return report;
}

function describeInvariantBreach(status: LedgerStatus, maxTotalAmount: number, maxTransactionCount: number): string | undefined {
  if (status.openTickets > 0) {
    return `${status.openTickets} reservations left unresolved after all workers stopped`;
  }
  if (status.committedAmount > maxTotalAmount) {
    return `Committed ${status.committedAmount} sats, above the ${maxTotalAmount} sat ceiling`;
  }
  if (status.committedCount > maxTransactionCount) {
    return `Committed ${status.committedCount} transactions, above the limit of ${maxTransactionCount}`;
  }
  return undefined;
}
