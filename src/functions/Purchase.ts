import { randomUUID } from "crypto";

import axiosInstance, {
  getErrorMessage as getResponseErrorMessage,
  isNonRetryableError,
  isRateLimitError,
} from "../axios/axiosInstance";
import limiter from "../bottleneck";
import Logger from "../utils/logger";
import { classifySubmitError, getErrorResponseData, getErrorStatus } from "../utils/errorUtils";
import { FundingWallet, signMessageDigest } from "../utils/fundingWallet";
import {
  PurchaseRequest,
  SubmitError,
  SubmitReceipt,
  TransactionSubmitter,
} from "../types/SpendTypes";

export interface IPurchaseOrder {
  token: string;
  amountSats: number;
  feeSats: number;
  buyerPaymentAddress: string;
  publicKey: string;
  nonce: string;
}

export interface IPurchaseResponse {
  debitedSats: number;
  txid: string;
}

export interface HttpPurchaseSubmitterOptions {
  apiBaseUrl: string;
  apiKey: string;
  token: string;
  wallet: FundingWallet;
  /** Nonce source, one per order */
  createNonce?: () => string;
}

/**
 * Canonical string that gets signed for an order.
 */
export function serializePurchaseOrder(order: IPurchaseOrder): string {
  return [
    order.token,
    order.amountSats,
    order.feeSats,
    order.buyerPaymentAddress,
    order.nonce,
  ].join(':');
}

/**
 * Map any failure from the purchase endpoint to a classified SubmitError.
 */
export function toSubmitError(error: unknown): SubmitError {
  if (error instanceof SubmitError) return error;

  const message = getResponseErrorMessage(error);
  const status = getErrorStatus(error);
  if (isRateLimitError(error)) {
    return new SubmitError(message, 'transient', status);
  }
  if (isNonRetryableError(error)) {
    return new SubmitError(message, 'fatal', status);
  }
  return new SubmitError(message, classifySubmitError(error), status);
}

function isPurchaseResponse(data: unknown): data is IPurchaseResponse {
  if (!data || typeof data !== 'object') return false;
  const candidate = data as Record<string, unknown>;
  return (
    typeof candidate.debitedSats === 'number' &&
    Number.isSafeInteger(candidate.debitedSats) &&
    candidate.debitedSats >= 0 &&
    typeof candidate.txid === 'string'
  );
}

/**
 * Submits signed purchase orders to the purchase API.
 * Requests go through the shared limiter; network retries are axios-retry's job.
 */
export class HttpPurchaseSubmitter implements TransactionSubmitter {
  private readonly url: string;
  private readonly headers: Record<string, string>;
  private readonly createNonce: () => string;

  constructor(private readonly options: HttpPurchaseSubmitterOptions) {
    this.url = `${options.apiBaseUrl.replace(/\/+$/, '')}/purchase`;
    this.headers = {
      'Content-Type': 'application/json',
      'X-API-Key': options.apiKey,
    };
    this.createNonce = options.createNonce ?? randomUUID;
  }

  async submit(request: PurchaseRequest): Promise<SubmitReceipt> {
    const { token, wallet } = this.options;
    const order: IPurchaseOrder = {
      token,
      amountSats: request.amount,
      feeSats: request.fee,
      buyerPaymentAddress: wallet.paymentAddress,
      publicKey: wallet.publicKey,
      nonce: this.createNonce(),
    };
    const signature = signMessageDigest(wallet, serializePurchaseOrder(order));

    Logger.purchase.submitted(token, request.amount, request.fee);
    let data: unknown;
    try {
      const response = await limiter.schedule(() =>
        axiosInstance.post<unknown>(this.url, { ...order, signature }, {
          headers: { ...this.headers, 'Idempotency-Key': order.nonce },
        })
      );
      data = response.data;
    } catch (error: unknown) {
      Logger.purchase.error(token, getResponseErrorMessage(error), getErrorStatus(error), getErrorResponseData(error));
      throw toSubmitError(error);
    }

    if (!isPurchaseResponse(data)) {
      Logger.purchase.error(token, 'Malformed purchase response', undefined, data);
      throw new SubmitError('Malformed purchase response', 'fatal');
    }
    return { actualAmount: data.debitedSats, reference: data.txid };
  }
}

export default HttpPurchaseSubmitter;
