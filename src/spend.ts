#!/usr/bin/env node

import { config } from "dotenv"

import { describeSpendConfig, loadSpendConfig } from "./utils/config";
import Logger, { setLogLevel } from "./utils/logger";
import { listReferences, startSpendRun } from "./spendBot";
import { printWorkerTable } from "./utils/table";

config()

async function main(): Promise<void> {
  const spendConfig = loadSpendConfig();
  setLogLevel(spendConfig.logLevel);

  Logger.header('SPEND BOT');
  Logger.info('Starting with parameters', describeSpendConfig(spendConfig));

  // First signal: stop issuing new purchases and let in-flight ones settle
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    Logger.warning(`[SHUTDOWN] ${signal} received, finishing in-flight purchases...`);
    controller.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    const report = await startSpendRun(spendConfig, controller.signal);

    printWorkerTable(report.workers);

    const references = listReferences(report);
    if (references.length > 0) {
      Logger.info('Transaction references:');
      references.forEach(line => console.log(`  ${line}`));
    }
    Logger.printStats();

    if (report.terminatedReason === 'FatalError') {
      process.exitCode = 1;
    }
  } finally {
    process.removeListener('SIGINT', onSignal);
    process.removeListener('SIGTERM', onSignal);
  }
}

main().catch((error: unknown) => {
  Logger.error('[STARTUP] Spend run could not start', error);
  process.exitCode = 1;
});
