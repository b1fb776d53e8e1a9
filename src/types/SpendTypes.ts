/**
 * Type definitions shared by the ledger, workers and coordinator.
 * All amounts are integer satoshis.
 */

/**
 * Global stopping conditions for one spend run.
 */
export interface SpendLimit {
  /** Spend ceiling in sats */
  maxTotalAmount: number;
  /** Maximum number of committed transactions */
  maxTransactionCount: number;
  /** Inclusive fee range in sats */
  feeRange: FeeRange;
}

export interface FeeRange {
  min: number;
  max: number;
}

export interface FeeSample {
  readonly fee: number;
}

/**
 * A granted, not yet resolved claim on the ledger.
 * Only the ledger that issued it can resolve it.
 */
export interface ReservationTicket {
  readonly id: number;
  readonly requestedAmount: number;
  readonly reservedAt: number;
}

export type DenialReason = 'budget' | 'count';

export type ReserveResult =
  | { granted: true; ticket: ReservationTicket }
  | { granted: false; reason: DenialReason };

export interface LedgerStatus {
  committedAmount: number;
  committedCount: number;
  reservedAmount: number;
  openTickets: number;
  remainingAmount: number;
  remainingCount: number;
  isExhausted: boolean;
}

export interface LedgerOptions {
  /**
   * Remaining budget below this value counts as exhausted.
   * Defaults to 1, so only a fully spent budget is exhausted.
   */
  minTransactionAmount?: number;
}

/**
 * One purchase attempt handed to the submitter.
 */
export interface PurchaseRequest {
  amount: number;
  fee: number;
  workerId: number;
  attempt: number;
}

export interface SubmitReceipt {
  /** Sats actually debited from the funding wallet */
  actualAmount: number;
  /** Transaction id or other external reference */
  reference?: string;
}

/**
 * External collaborator that performs the purchase.
 * Rejects with a SubmitError (or any error) when the purchase did not take effect.
 */
export interface TransactionSubmitter {
  submit(request: PurchaseRequest): Promise<SubmitReceipt>;
}

export type WorkerState = 'running' | 'reserving' | 'submitting' | 'resolving' | 'stopped';

export type WorkerStopReason = 'exhausted' | 'denied' | 'cancelled' | 'fatal';

export interface WorkerResult {
  workerId: number;
  stopReason: WorkerStopReason;
  error?: Error;
  commits: number;
  releases: number;
  transientFailures: number;
  /** Receipt references of committed purchases, in commit order */
  references: string[];
}

export type TerminationReason = 'BudgetExhausted' | 'CountExhausted' | 'FatalError' | 'Cancelled';

export interface FinalReport {
  committedAmount: number;
  committedCount: number;
  terminatedReason: TerminationReason;
  /** Set when terminatedReason is FatalError */
  error?: Error;
  workers: WorkerResult[];
  durationMs: number;
}

/**
 * Options for a coordinated spend run.
 */
export interface SpendRunOptions {
  workerCount: number;
  limit: SpendLimit;
  /** Purchase amount per transaction, before fees */
  perTransactionAmount: number;
  submitter: TransactionSubmitter;
  /** Reserve perTransactionAmount + feeRange.max instead of the bare amount (default true) */
  reserveFeeHeadroom?: boolean;
  /** Exhaustion policy passed to the ledger (default 1) */
  minTransactionAmount?: number;
  /** Pause after a transient submission failure (default 250ms) */
  transientBackoffMs?: number;
  /** Operator stop signal */
  signal?: AbortSignal;
  /** Random source for fee sampling, one call per sample */
  random?: () => number;
}

/**
 * Validation error thrown when an amount, range or limit is invalid.
 */
export class SpendValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SpendValidationError';
  }
}

/**
 * Configuration error thrown when required config is missing or malformed.
 */
export class SpendConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SpendConfigError';
  }
}

/**
 * Thrown when a ticket is resolved twice or by a ledger that did not issue it.
 */
export class TicketResolutionError extends Error {
  constructor(
    message: string,
    public readonly ticketId: number
  ) {
    super(message);
    this.name = 'TicketResolutionError';
  }
}

/**
 * Thrown when a finished run leaves the ledger in a state that breaks its limits.
 */
export class LedgerInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LedgerInvariantError';
  }
}

export type SubmitErrorKind = 'transient' | 'fatal';

/**
 * Submission failure with an explicit retry classification.
 */
export class SubmitError extends Error {
  constructor(
    message: string,
    public readonly kind: SubmitErrorKind,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'SubmitError';
  }
}
