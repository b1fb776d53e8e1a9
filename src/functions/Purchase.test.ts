import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as bitcoin from 'bitcoinjs-lib';
import { ECPairFactory } from 'ecpair';
import ecc = require('tiny-secp256k1');

// Mock the logger to prevent console output during tests
vi.mock('../utils/logger', () => ({
  default: {
    purchase: {
      submitted: vi.fn(),
      error: vi.fn(),
    },
  },
}));

// Keep the real error helpers, replace the HTTP client
vi.mock('../axios/axiosInstance', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../axios/axiosInstance')>();
  return {
    ...actual,
    default: {
      post: vi.fn(),
    },
  };
});

vi.mock('../bottleneck', () => ({
  default: {
    schedule: vi.fn(<T>(fn: () => Promise<T>) => fn()),
  },
  setRateLimit: vi.fn(),
}));

import axiosInstance from '../axios/axiosInstance';
import limiter from '../bottleneck';
import Logger from '../utils/logger';
import { loadFundingWallet, signMessageDigest, verifyMessageDigest } from '../utils/fundingWallet';
import { SubmitError } from '../types/SpendTypes';
import {
  createMockError,
  createMockNetworkError,
  createMockResponse,
  samplePurchaseResponse,
} from '../__tests__/mocks/axios.mock';
import {
  HttpPurchaseSubmitter,
  IPurchaseOrder,
  serializePurchaseOrder,
  toSubmitError,
} from './Purchase';

const ECPair = ECPairFactory(ecc);

// Generate a valid test WIF deterministically
function generateTestWIF(): string {
  const privateKeyBytes = Buffer.alloc(32, 0);
  privateKeyBytes[31] = 1;
  return ECPair.fromPrivateKey(privateKeyBytes, { network: bitcoin.networks.bitcoin }).toWIF();
}

const wallet = loadFundingWallet(generateTestWIF());

function makeSubmitter(): HttpPurchaseSubmitter {
  let nonce = 0;
  return new HttpPurchaseSubmitter({
    apiBaseUrl: 'http://api.test/',
    apiKey: 'test-secret',
    token: 'TEST-TOKEN',
    wallet,
    createNonce: () => `nonce-${++nonce}`,
  });
}

const request = { amount: 1000, fee: 10, workerId: 1, attempt: 1 };

async function submitAndCatch(submitter: HttpPurchaseSubmitter): Promise<SubmitError> {
  try {
    await submitter.submit(request);
  } catch (error: unknown) {
    if (error instanceof SubmitError) return error;
    throw error;
  }
  throw new Error('expected submit to fail');
}

describe('Purchase', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('serializePurchaseOrder', () => {
    it('should join the signed fields in order', () => {
      const order: IPurchaseOrder = {
        token: 'TEST-TOKEN',
        amountSats: 1000,
        feeSats: 10,
        buyerPaymentAddress: 'bc1qbuyer',
        publicKey: '02abc',
        nonce: 'nonce-1',
      };
      expect(serializePurchaseOrder(order)).toBe('TEST-TOKEN:1000:10:bc1qbuyer:nonce-1');
    });
  });

  describe('toSubmitError', () => {
    it('should pass a SubmitError through unchanged', () => {
      const original = new SubmitError('already classified', 'fatal');
      expect(toSubmitError(original)).toBe(original);
    });

    it('should treat a 503 rate limit message as transient', () => {
      const error = toSubmitError(createMockError(503, { error: 'Rate limit exceeded' }));
      expect(error.kind).toBe('transient');
      expect(error.status).toBe(503);
      expect(error.message).toBe('Rate limit exceeded');
    });

    it('should treat a rejected signature as fatal', () => {
      const error = toSubmitError(createMockError(500, { error: 'Invalid signature' }));
      expect(error.kind).toBe('fatal');
    });

    it('should treat a plain error as fatal', () => {
      expect(toSubmitError(new Error('boom')).kind).toBe('fatal');
    });
  });

  describe('HttpPurchaseSubmitter', () => {
    it('should post a signed order and return the debited amount', async () => {
      vi.mocked(axiosInstance.post).mockResolvedValueOnce(createMockResponse(samplePurchaseResponse));

      const receipt = await makeSubmitter().submit(request);

      expect(receipt).toEqual({ actualAmount: 1010, reference: 'txid-1' });

      const order: IPurchaseOrder = {
        token: 'TEST-TOKEN',
        amountSats: 1000,
        feeSats: 10,
        buyerPaymentAddress: wallet.paymentAddress,
        publicKey: wallet.publicKey,
        nonce: 'nonce-1',
      };
      const signature = signMessageDigest(wallet, serializePurchaseOrder(order));
      expect(verifyMessageDigest(wallet, serializePurchaseOrder(order), signature)).toBe(true);
      expect(axiosInstance.post).toHaveBeenCalledWith(
        'http://api.test/purchase',
        { ...order, signature },
        {
          headers: {
            'Content-Type': 'application/json',
            'X-API-Key': 'test-secret',
            'Idempotency-Key': 'nonce-1',
          },
        }
      );
      expect(limiter.schedule).toHaveBeenCalledTimes(1);
      expect(Logger.purchase.submitted).toHaveBeenCalledWith('TEST-TOKEN', 1000, 10);
    });

    it('should use a fresh nonce for every order', async () => {
      vi.mocked(axiosInstance.post).mockResolvedValue(createMockResponse(samplePurchaseResponse));
      const submitter = makeSubmitter();

      await submitter.submit(request);
      await submitter.submit({ ...request, attempt: 2 });

      expect(axiosInstance.post).toHaveBeenNthCalledWith(
        1,
        'http://api.test/purchase',
        expect.objectContaining({ nonce: 'nonce-1' }),
        { headers: expect.objectContaining({ 'Idempotency-Key': 'nonce-1' }) }
      );
      expect(axiosInstance.post).toHaveBeenNthCalledWith(
        2,
        'http://api.test/purchase',
        expect.objectContaining({ nonce: 'nonce-2' }),
        { headers: expect.objectContaining({ 'Idempotency-Key': 'nonce-2' }) }
      );
    });

    it('should classify a rate limit as transient', async () => {
      vi.mocked(axiosInstance.post).mockRejectedValueOnce(createMockError(429, 'Too many requests'));

      const error = await submitAndCatch(makeSubmitter());

      expect(error.kind).toBe('transient');
      expect(error.status).toBe(429);
      expect(error.message).toBe('Too many requests');
    });

    it('should classify insufficient funds as fatal and log the response', async () => {
      vi.mocked(axiosInstance.post).mockRejectedValueOnce(createMockError(402, { error: 'Insufficient funds' }));

      const error = await submitAndCatch(makeSubmitter());

      expect(error.kind).toBe('fatal');
      expect(error.status).toBe(402);
      expect(Logger.purchase.error).toHaveBeenCalledWith('TEST-TOKEN', 'Insufficient funds', 402, {
        error: 'Insufficient funds',
      });
    });

    it('should classify a server error as transient', async () => {
      vi.mocked(axiosInstance.post).mockRejectedValueOnce(createMockError(500, 'Internal server error'));

      const error = await submitAndCatch(makeSubmitter());

      expect(error.kind).toBe('transient');
      expect(error.message).toBe('Internal server error');
    });

    it('should classify a dropped connection as transient', async () => {
      vi.mocked(axiosInstance.post).mockRejectedValueOnce(createMockNetworkError('ECONNRESET'));

      const error = await submitAndCatch(makeSubmitter());

      expect(error.kind).toBe('transient');
      expect(error.message).toBe('Network error: ECONNRESET');
      expect(error.status).toBeUndefined();
    });

    it('should reject a malformed response as fatal', async () => {
      vi.mocked(axiosInstance.post).mockResolvedValueOnce(createMockResponse({ debitedSats: -5, txid: 'x' }));

      const error = await submitAndCatch(makeSubmitter());

      expect(error.kind).toBe('fatal');
      expect(error.message).toBe('Malformed purchase response');
    });
  });
});
