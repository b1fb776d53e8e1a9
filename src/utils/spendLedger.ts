import { Mutex } from 'async-mutex';

import Logger from './logger';
import {
  LedgerOptions,
  LedgerStatus,
  ReservationTicket,
  ReserveResult,
  SpendLimit,
  SpendValidationError,
  TicketResolutionError,
} from '../types/SpendTypes';

/**
 * Validate a spend limit. Throws SpendValidationError on the first problem found.
 */
export function validateSpendLimit(limit: SpendLimit): void {
  const errors: string[] = [];

  if (!Number.isSafeInteger(limit.maxTotalAmount) || limit.maxTotalAmount <= 0) {
    errors.push(`maxTotalAmount must be a positive integer (got ${limit.maxTotalAmount})`);
  }
  if (!Number.isSafeInteger(limit.maxTransactionCount) || limit.maxTransactionCount <= 0) {
    errors.push(`maxTransactionCount must be a positive integer (got ${limit.maxTransactionCount})`);
  }
  errors.push(...feeRangeErrors(limit.feeRange.min, limit.feeRange.max));

  if (errors.length > 0) {
    throw new SpendValidationError(`Invalid spend limit: ${errors.join('; ')}`);
  }
}

export function feeRangeErrors(min: number, max: number): string[] {
  const errors: string[] = [];
  if (!Number.isSafeInteger(min) || min < 0) {
    errors.push(`fee min must be a non-negative integer (got ${min})`);
  }
  if (!Number.isSafeInteger(max) || max < 0) {
    errors.push(`fee max must be a non-negative integer (got ${max})`);
  }
  if (min > max) {
    errors.push(`fee min (${min}) cannot be greater than fee max (${max})`);
  }
  return errors;
}

/**
 * Copy a limit so later edits to the caller's object cannot move the ceiling.
 */
export function freezeSpendLimit(limit: SpendLimit): Readonly<SpendLimit> {
  return Object.freeze({ ...limit, feeRange: Object.freeze({ ...limit.feeRange }) });
}

/**
 * Spend Ledger
 * Shared accounting for committed spend and transaction count.
 *
 * Budget is claimed up front with tryReserve() and each ticket is later
 * resolved exactly once, by commit() when the purchase went through or by
 * release() when it did not. Every operation runs under one mutex, so a
 * check-and-grant can never interleave with another caller's.
 */
export class SpendLedger {
  private committedAmount = 0;
  private committedCount = 0;
  private reservedAmount = 0;
  private readonly openTickets: Map<number, ReservationTicket> = new Map();
  private ticketCounter = 0;
  private readonly limit: Readonly<SpendLimit>;
  private readonly minTransactionAmount: number;
  private readonly mutex = new Mutex();

  constructor(limit: SpendLimit, options: LedgerOptions = {}) {
    validateSpendLimit(limit);
    this.limit = freezeSpendLimit(limit);

    const minTransactionAmount = options.minTransactionAmount ?? 1;
    if (!Number.isSafeInteger(minTransactionAmount) || minTransactionAmount <= 0) {
      throw new SpendValidationError(`minTransactionAmount must be a positive integer (got ${minTransactionAmount})`);
    }
    this.minTransactionAmount = minTransactionAmount;

    Logger.ledger.init(limit.maxTotalAmount, limit.maxTransactionCount);
  }

  /**
   * Atomically claim budget and one transaction slot.
   * A denial is the normal signal that the limits are used up.
   */
  async tryReserve(requestedAmount: number): Promise<ReserveResult> {
    if (!Number.isSafeInteger(requestedAmount) || requestedAmount <= 0) {
      throw new SpendValidationError(`Reservation amount must be a positive integer (got ${requestedAmount})`);
    }

    return this.mutex.runExclusive(() => {
      const { maxTotalAmount, maxTransactionCount } = this.limit;

      if (this.committedCount + this.openTickets.size >= maxTransactionCount) {
        Logger.ledger.denied('count', requestedAmount, this.remainingAmount());
        return { granted: false, reason: 'count' } as const;
      }
      if (this.committedAmount + this.reservedAmount + requestedAmount > maxTotalAmount) {
        Logger.ledger.denied('budget', requestedAmount, this.remainingAmount());
        return { granted: false, reason: 'budget' } as const;
      }

      const ticket: ReservationTicket = Object.freeze({
        id: ++this.ticketCounter,
        requestedAmount,
        reservedAt: Date.now(),
      });
      this.openTickets.set(ticket.id, ticket);
      this.reservedAmount += requestedAmount;

      Logger.ledger.reserved(ticket.id, requestedAmount, this.reservedAmount, this.committedAmount, maxTotalAmount);
      return { granted: true, ticket } as const;
    });
  }

  /**
   * Confirm a reservation with the amount actually debited.
   * An amount above the reservation is still recorded: the purchase already happened.
   */
  async commit(ticket: ReservationTicket, actualAmount: number): Promise<void> {
    if (!Number.isSafeInteger(actualAmount) || actualAmount < 0) {
      throw new SpendValidationError(`Committed amount must be a non-negative integer (got ${actualAmount})`);
    }

    await this.mutex.runExclusive(() => {
      this.takeTicket(ticket, 'commit');

      if (actualAmount > ticket.requestedAmount) {
        Logger.ledger.overrun(ticket.id, ticket.requestedAmount, actualAmount);
      }
      this.committedAmount += actualAmount;
      this.committedCount++;

      Logger.ledger.committed(ticket.id, actualAmount, this.committedAmount, this.committedCount);
    });
  }

  /**
   * Discard a reservation whose purchase did not take effect.
   */
  async release(ticket: ReservationTicket): Promise<void> {
    await this.mutex.runExclusive(() => {
      this.takeTicket(ticket, 'release');
      Logger.ledger.released(ticket.id, ticket.requestedAmount);
    });
  }

  async status(): Promise<LedgerStatus> {
    return this.mutex.runExclusive(() => this.snapshot());
  }

  /**
   * Remove an open ticket and its reserved amount. Must be called inside the mutex.
   */
  private takeTicket(ticket: ReservationTicket, operation: 'commit' | 'release'): void {
    const open = this.openTickets.get(ticket.id);
    if (open !== ticket) {
      throw new TicketResolutionError(
        `Cannot ${operation} ticket #${ticket.id}: it is already resolved or was not issued by this ledger`,
        ticket.id
      );
    }
    this.openTickets.delete(ticket.id);
    this.reservedAmount -= ticket.requestedAmount;
  }

  private remainingAmount(): number {
    return Math.max(0, this.limit.maxTotalAmount - this.committedAmount - this.reservedAmount);
  }

  private snapshot(): LedgerStatus {
    const { maxTotalAmount, maxTransactionCount } = this.limit;
    const remainingAmount = Math.max(0, maxTotalAmount - this.committedAmount);
    const remainingCount = Math.max(0, maxTransactionCount - this.committedCount);

    return {
      committedAmount: this.committedAmount,
      committedCount: this.committedCount,
      reservedAmount: this.reservedAmount,
      openTickets: this.openTickets.size,
      remainingAmount,
      remainingCount,
      isExhausted:
        this.committedCount >= maxTransactionCount ||
        this.committedAmount >= maxTotalAmount ||
        remainingAmount < this.minTransactionAmount,
    };
  }
}

export default SpendLedger;
