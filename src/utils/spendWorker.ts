import Logger from './logger';
import { SpendLedger } from './spendLedger';
import { FeeSampler } from './feeSampler';
import { classifySubmitError, getErrorMessage, toError } from './errorUtils';
import type {
  ReservationTicket,
  SubmitReceipt,
  TransactionSubmitter,
  WorkerResult,
  WorkerState,
  WorkerStopReason,
} from '../types/SpendTypes';

export interface SpendWorkerOptions {
  workerId: number;
  ledger: SpendLedger;
  sampler: FeeSampler;
  submitter: TransactionSubmitter;
  /** Amount handed to the submitter */
  perTransactionAmount: number;
  /** Amount claimed on the ledger per attempt */
  reservationAmount: number;
  transientBackoffMs: number;
  signal: AbortSignal;
}

/**
 * Sleep that wakes early when the signal aborts.
 */
export function pause(ms: number, signal: AbortSignal): Promise<void> {
  if (ms <= 0 || signal.aborted) return Promise.resolve();
  return new Promise<void>(resolve => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * One concurrent purchase loop.
 *
 * Each iteration checks the ledger, samples a fee, reserves, submits, then
 * commits or releases. The ledger lock is only held inside the ledger calls,
 * never across the submission, so other workers keep reserving while this
 * one waits on I/O. Every granted ticket is resolved before run() returns.
 */
export class SpendWorker {
  private state: WorkerState = 'running';
  private commits = 0;
  private releases = 0;
  private transientFailures = 0;
  private attempt = 0;
  private readonly references: string[] = [];

  constructor(private readonly options: SpendWorkerOptions) {}

  getState(): WorkerState {
    return this.state;
  }

  /**
   * Run until a limit, the stop signal or a fatal error ends the loop.
   * Never rejects: failures come back in the result.
   */
  async run(): Promise<WorkerResult> {
    const { workerId, ledger, sampler, signal } = this.options;
    Logger.worker.started(workerId);

    try {
      while (true) {
        if (signal.aborted) {
          return this.stop('cancelled');
        }
        const status = await ledger.status();
        if (status.isExhausted) {
          return this.stop('exhausted');
        }

        // Sampled before reserving so a sampler failure cannot strand a ticket
        const { fee } = sampler.sample();

        this.state = 'reserving';
        const reservation = await ledger.tryReserve(this.options.reservationAmount);
        if (!reservation.granted) {
          return this.stop('denied');
        }

        const failure = await this.attemptPurchase(reservation.ticket, fee);
        if (failure) {
          return this.stop('fatal', failure);
        }
      }
    } catch (error: unknown) {
      // Sampler or ledger failure
      return this.stop('fatal', toError(error));
    }
  }

  /**
   * Submit against a granted ticket and resolve it.
   * Returns the error that should stop the worker, if any.
   */
  private async attemptPurchase(ticket: ReservationTicket, fee: number): Promise<Error | undefined> {
    const { workerId, ledger, submitter, signal } = this.options;
    const attempt = ++this.attempt;

    this.state = 'submitting';
    let receipt: SubmitReceipt;
    try {
      receipt = await submitter.submit({
        amount: this.options.perTransactionAmount,
        fee,
        workerId,
        attempt,
      });
    } catch (error: unknown) {
      this.state = 'resolving';
      await ledger.release(ticket);
      this.releases++;

      if (classifySubmitError(error) === 'fatal') {
        Logger.worker.fatalFailure(workerId, attempt, getErrorMessage(error));
        return toError(error);
      }
      this.transientFailures++;
      Logger.worker.transientFailure(workerId, attempt, getErrorMessage(error));
      this.state = 'running';
      await pause(this.options.transientBackoffMs, signal);
      return undefined;
    }

    this.state = 'resolving';
    try {
      await ledger.commit(ticket, receipt.actualAmount);
    } catch (error: unknown) {
      // The purchase happened but the receipt was unusable; free the slot and stop
      await ledger.release(ticket);
      this.releases++;
      Logger.error(`[WORKER ${workerId}] Could not commit attempt ${attempt}`, error);
      return toError(error);
    }
    this.commits++;
    if (receipt.reference) {
      this.references.push(receipt.reference);
    }
    this.state = 'running';
    return undefined;
  }

  private stop(stopReason: WorkerStopReason, error?: Error): WorkerResult {
    this.state = 'stopped';
    Logger.worker.stopped(this.options.workerId, stopReason, this.commits);
    return {
      workerId: this.options.workerId,
      stopReason,
      error,
      commits: this.commits,
      releases: this.releases,
      transientFailures: this.transientFailures,
      references: [...this.references],
    };
  }
}

export default SpendWorker;
