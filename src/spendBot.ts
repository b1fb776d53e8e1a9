/**
 * Wiring between the environment config and a coordinated spend run.
 * Kept free of side effects so it can be tested without starting a run.
 */

import { setRateLimit } from './bottleneck';
import { HttpPurchaseSubmitter } from './functions/Purchase';
import { SimulatedSubmitter } from './functions/SimulatedPurchase';
import { runSpend } from './coordinator';
import { SpendConfig } from './utils/config';
import { loadFundingWallet } from './utils/fundingWallet';
import Logger from './utils/logger';
import { FinalReport, SpendConfigError, SpendRunOptions, TransactionSubmitter } from './types/SpendTypes';

/**
 * Pick the submitter for this config: simulated in dry-run mode, HTTP otherwise.
 * @throws SpendConfigError when live mode is missing wallet or API settings
 */
export function createSubmitter(config: SpendConfig): TransactionSubmitter {
  if (config.dryRun) {
    Logger.warning('[DRY RUN] Purchases are simulated, nothing is sent');
    return new SimulatedSubmitter({ failureRate: config.simulatedFailureRate });
  }

  if (!config.fundingWIF || !config.apiBaseUrl || !config.apiKey) {
    throw new SpendConfigError('FUNDING_WIF, API_BASE_URL and API_KEY are required unless DRY_RUN is set');
  }

  const wallet = loadFundingWallet(config.fundingWIF);
  setRateLimit(config.rateLimit);
  Logger.info(`[WALLET] Funding from ${wallet.paymentAddress}`);

  return new HttpPurchaseSubmitter({
    apiBaseUrl: config.apiBaseUrl,
    apiKey: config.apiKey,
    token: config.token,
    wallet,
  });
}

export function buildRunOptions(
  config: SpendConfig,
  submitter: TransactionSubmitter,
  signal?: AbortSignal
): SpendRunOptions {
  return {
    workerCount: config.workerCount,
    limit: {
      maxTotalAmount: config.totalAmount,
      maxTransactionCount: config.maxTransactions,
      feeRange: config.feeRange,
    },
    perTransactionAmount: config.price,
    submitter,
    reserveFeeHeadroom: config.reserveFeeHeadroom,
    minTransactionAmount: config.minTransactionAmount,
    transientBackoffMs: config.transientBackoffMs,
    signal,
  };
}

/**
 * Create the submitter for a config and run the spend to completion.
 */
export async function startSpendRun(config: SpendConfig, signal?: AbortSignal): Promise<FinalReport> {
  const submitter = createSubmitter(config);
  return runSpend(buildRunOptions(config, submitter, signal));
}

/**
 * Every committed purchase reference, numbered in worker order.
 */
export function listReferences(report: FinalReport): string[] {
  return report.workers
    .flatMap(worker => worker.references)
    .map((reference, index) => `${index + 1}. ${reference}`);
}
