import {
  PurchaseRequest,
  SubmitError,
  SubmitReceipt,
  TransactionSubmitter,
} from "../types/SpendTypes";

export interface SimulatedSubmitterOptions {
  /** Probability in [0, 1] that an attempt fails transiently */
  failureRate?: number;
  /** Delay before each attempt settles */
  latencyMs?: number;
  random?: () => number;
}

/**
 * Dry-run submitter. Debits amount + fee after a short delay and fails
 * transiently at the configured rate. Nothing leaves the process.
 */
export class SimulatedSubmitter implements TransactionSubmitter {
  private readonly failureRate: number;
  private readonly latencyMs: number;
  private readonly random: () => number;
  private counter = 0;

  constructor(options: SimulatedSubmitterOptions = {}) {
    const failureRate = options.failureRate ?? 0.1;
    if (!Number.isFinite(failureRate) || failureRate < 0 || failureRate > 1) {
      throw new Error(`failureRate must be between 0 and 1 (got ${failureRate})`);
    }
    this.failureRate = failureRate;
    this.latencyMs = Math.max(0, options.latencyMs ?? 50);
    this.random = options.random ?? Math.random;
  }

  async submit(request: PurchaseRequest): Promise<SubmitReceipt> {
    if (this.latencyMs > 0) {
      await new Promise(resolve => setTimeout(resolve, this.latencyMs));
    }
    if (this.random() < this.failureRate) {
      throw new SubmitError('Simulated transient failure', 'transient');
    }
    const id = ++this.counter;
    return {
      actualAmount: request.amount + request.fee,
      reference: `sim-${request.workerId}-${id}`,
    };
  }
}

export default SimulatedSubmitter;
