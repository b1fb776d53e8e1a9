/**
 * Funding wallet derived from the configured WIF.
 * The key never leaves this module except as signatures.
 */

import * as bitcoin from 'bitcoinjs-lib';
import { ECPairFactory, ECPairAPI, ECPairInterface } from 'ecpair';
import ecc = require('tiny-secp256k1');

import { SpendConfigError } from '../types/SpendTypes';
import { getErrorMessage } from './errorUtils';

const ECPair: ECPairAPI = ECPairFactory(ecc);

export interface FundingWallet {
  /** Derived p2wpkh address that pays for purchases */
  paymentAddress: string;
  publicKey: string;
  keyPair: ECPairInterface;
}

/**
 * Derive the funding wallet from a WIF.
 * @throws SpendConfigError if the WIF is empty or malformed
 */
export function loadFundingWallet(
  wif: string,
  network: bitcoin.Network = bitcoin.networks.bitcoin
): FundingWallet {
  if (!wif) {
    throw new SpendConfigError('Invalid WIF: WIF is empty');
  }

  let keyPair: ECPairInterface;
  try {
    keyPair = ECPair.fromWIF(wif, network);
  } catch (error: unknown) {
    throw new SpendConfigError(`Invalid WIF format: ${getErrorMessage(error)}. Check your FUNDING_WIF configuration.`);
  }

  const paymentAddress = bitcoin.payments.p2wpkh({ pubkey: keyPair.publicKey, network }).address;
  if (!paymentAddress) {
    throw new SpendConfigError('Could not derive a payment address from FUNDING_WIF');
  }

  return {
    paymentAddress,
    publicKey: keyPair.publicKey.toString('hex'),
    keyPair,
  };
}

/**
 * Sign the sha256 digest of a message with the funding key.
 * @returns hex-encoded 64-byte compact signature
 */
export function signMessageDigest(wallet: FundingWallet, message: string): string {
  const digest = bitcoin.crypto.sha256(Buffer.from(message, 'utf8'));
  return wallet.keyPair.sign(digest).toString('hex');
}

/**
 * Check a signature produced by signMessageDigest().
 */
export function verifyMessageDigest(wallet: FundingWallet, message: string, signatureHex: string): boolean {
  const digest = bitcoin.crypto.sha256(Buffer.from(message, 'utf8'));
  return wallet.keyPair.verify(digest, Buffer.from(signatureHex, 'hex'));
}
