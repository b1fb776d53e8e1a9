/**
 * Logging utility for the spend bot
 * Color-coded, timestamped console output with level filtering
 */

// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',

  // Foreground colors
  black: '\x1b[30m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',

  // Background colors
  bgRed: '\x1b[41m',
  bgYellow: '\x1b[43m',
};

// Log level system
export enum LogLevel { DEBUG = 0, INFO = 1, WARN = 2, ERROR = 3 }

export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.toLowerCase()) {
    case 'debug': return LogLevel.DEBUG;
    case 'warn': case 'warning': return LogLevel.WARN;
    case 'error': return LogLevel.ERROR;
    default: return LogLevel.INFO;
  }
}

let currentLogLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL);

export function setLogLevel(level: LogLevel): void { currentLogLevel = level; }
export function getLogLevel(): LogLevel { return currentLogLevel; }

function shouldLog(level: LogLevel): boolean { return level >= currentLogLevel; }

type SpendStatKey = 'commits' | 'releases' | 'denials' | 'transientFailures' | 'fatalFailures';

// Spend statistics tracking
export class SpendStats {
  private stats = {
    commits: 0,
    releases: 0,
    denials: 0,
    transientFailures: 0,
    fatalFailures: 0,
    lastReset: Date.now()
  };

  increment(type: SpendStatKey) {
    this.stats[type]++;
  }

  getStats() {
    const runtime = (Date.now() - this.stats.lastReset) / 1000; // seconds
    return {
      ...this.stats,
      runtime: runtime.toFixed(1)
    };
  }

  reset() {
    this.stats = {
      commits: 0,
      releases: 0,
      denials: 0,
      transientFailures: 0,
      fatalFailures: 0,
      lastReset: Date.now()
    };
  }

  printSummary() {
    const stats = this.getStats();
    console.log(`${colors.bright}${colors.cyan}╔════════════════════ SPEND STATISTICS ══════════════════╗${colors.reset}`);
    console.log(`${colors.cyan}║${colors.reset} Runtime:            ${colors.bright}${stats.runtime} seconds${colors.reset}`);
    console.log(`${colors.cyan}║${colors.reset} Commits:            ${colors.green}${colors.bright}${stats.commits}${colors.reset}`);
    console.log(`${colors.cyan}║${colors.reset} Releases:           ${colors.yellow}${colors.bright}${stats.releases}${colors.reset}`);
    console.log(`${colors.cyan}║${colors.reset} Denials:            ${colors.magenta}${colors.bright}${stats.denials}${colors.reset}`);
    console.log(`${colors.cyan}║${colors.reset} Transient failures: ${colors.yellow}${colors.bright}${stats.transientFailures}${colors.reset}`);
    console.log(`${colors.cyan}║${colors.reset} Fatal failures:     ${colors.red}${colors.bright}${stats.fatalFailures}${colors.reset}`);
    console.log(`${colors.bright}${colors.cyan}╚════════════════════════════════════════════════════════╝${colors.reset}\n`);
  }
}

export const spendStats = new SpendStats();

export function getSpendStatsData() {
  return spendStats.getStats();
}

function getTimestamp(): string {
  const now = new Date();
  return now.toLocaleTimeString('en-US', {
    hour12: false,
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit'
  });
}

// Format BTC amount
export function formatBTC(sats: number): string {
  return `${(sats / 1e8).toFixed(8)} BTC`;
}

// Format sats with BTC equivalent
export function formatSats(sats: number): string {
  return `${sats.toLocaleString()} sats (${formatBTC(sats)})`;
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

function printDetails(details: unknown, color: string = colors.dim) {
  if (details) {
    console.log(`  ${color}${JSON.stringify(details, null, 2)}${colors.reset}`);
  }
}

export const Logger = {
  // Debug - Verbose diagnostic output (only visible at LOG_LEVEL=debug)
  debug(message: string, details?: unknown) {
    if (!shouldLog(LogLevel.DEBUG)) return;
    console.log(`${colors.dim}[${getTimestamp()}] ${message}${colors.reset}`);
    printDetails(details);
  },

  info(message: string, details?: unknown) {
    if (!shouldLog(LogLevel.INFO)) return;
    console.log(`${colors.bright}${colors.cyan}[INFO] [${getTimestamp()}]${colors.reset} ${message}`);
    printDetails(details);
  },

  warning(message: string, details?: unknown) {
    if (!shouldLog(LogLevel.WARN)) return;
    console.log(`${colors.bright}${colors.yellow}[WARN] [${getTimestamp()}]${colors.reset} ${colors.yellow}${message}${colors.reset}`);
    printDetails(details);
  },

  error(message: string, error?: unknown) {
    if (!shouldLog(LogLevel.ERROR)) return;
    console.log(`${colors.bright}${colors.red}[ERR] [${getTimestamp()}]${colors.reset} ${colors.red}${message}${colors.reset}`);
    if (error) {
      if (error instanceof Error && error.stack) {
        console.log(`  ${colors.dim}${error.stack}${colors.reset}`);
      } else {
        printDetails(error);
      }
    }
  },

  // Critical - invariant breaches
  critical(message: string, details?: unknown) {
    if (!shouldLog(LogLevel.ERROR)) return;
    console.log(`${colors.bgRed}${colors.bright}${colors.white} CRITICAL [${getTimestamp()}] ${colors.reset} ${colors.red}${colors.bright}${message}${colors.reset}`);
    printDetails(details, colors.red);
  },

  ledger: {
    init(maxTotalAmount: number, maxTransactionCount: number) {
      if (!shouldLog(LogLevel.DEBUG)) return;
      console.log(`${colors.dim}[${getTimestamp()}] [LEDGER] Initialized: ceiling ${formatSats(maxTotalAmount)}, max ${maxTransactionCount} transactions${colors.reset}`);
    },

    reserved(ticketId: number, amount: number, reserved: number, committed: number, max: number) {
      if (!shouldLog(LogLevel.DEBUG)) return;
      console.log(`${colors.dim}[${getTimestamp()}] [LEDGER] Ticket #${ticketId} reserved ${amount} sats (committed ${committed} + reserved ${reserved} / ${max})${colors.reset}`);
    },

    denied(reason: string, requested: number, remaining: number) {
      spendStats.increment('denials');
      if (!shouldLog(LogLevel.DEBUG)) return;
      console.log(`${colors.magenta}[${getTimestamp()}] [LEDGER] Reservation of ${requested} sats denied (${reason} limit, ${remaining} sats remaining)${colors.reset}`);
    },

    committed(ticketId: number, actualAmount: number, committedAmount: number, committedCount: number) {
      spendStats.increment('commits');
      if (!shouldLog(LogLevel.INFO)) return;
      console.log(`${colors.bright}${colors.green}[${getTimestamp()}] COMMITTED${colors.reset} ticket #${ticketId}: ${colors.bright}${formatSats(actualAmount)}${colors.reset} ${colors.dim}(total ${committedAmount} sats, ${committedCount} tx)${colors.reset}`);
    },

    released(ticketId: number, amount: number) {
      spendStats.increment('releases');
      if (!shouldLog(LogLevel.DEBUG)) return;
      console.log(`${colors.dim}[${getTimestamp()}] [LEDGER] Ticket #${ticketId} released ${amount} sats${colors.reset}`);
    },

    overrun(ticketId: number, requested: number, actual: number) {
      if (!shouldLog(LogLevel.WARN)) return;
      console.log(`${colors.yellow}[${getTimestamp()}] [LEDGER] Ticket #${ticketId} debited ${actual} sats, above its ${requested} sat reservation${colors.reset}`);
    },
  },

  worker: {
    started(workerId: number) {
      if (!shouldLog(LogLevel.DEBUG)) return;
      console.log(`${colors.dim}[${getTimestamp()}] [WORKER ${workerId}] Started${colors.reset}`);
    },

    transientFailure(workerId: number, attempt: number, message: string) {
      spendStats.increment('transientFailures');
      if (!shouldLog(LogLevel.WARN)) return;
      console.log(`${colors.yellow}[${getTimestamp()}] [WORKER ${workerId}] Attempt ${attempt} failed, retrying: ${message}${colors.reset}`);
    },

    fatalFailure(workerId: number, attempt: number, message: string) {
      spendStats.increment('fatalFailures');
      if (!shouldLog(LogLevel.ERROR)) return;
      console.log(`${colors.bright}${colors.red}[ERR] [${getTimestamp()}] [WORKER ${workerId}] Attempt ${attempt} failed fatally: ${message}${colors.reset}`);
    },

    stopped(workerId: number, reason: string, commits: number) {
      if (!shouldLog(LogLevel.DEBUG)) return;
      console.log(`${colors.dim}[${getTimestamp()}] [WORKER ${workerId}] Stopped (${reason}) after ${commits} commits${colors.reset}`);
    },
  },

  purchase: {
    submitted(token: string, amount: number, fee: number) {
      if (!shouldLog(LogLevel.DEBUG)) return;
      console.log(`${colors.dim}[${getTimestamp()}] [PURCHASE] ${token}: amount ${amount} sats, fee ${fee} sats${colors.reset}`);
    },

    error(token: string, message: string, httpStatus?: number, response?: unknown) {
      if (!shouldLog(LogLevel.ERROR)) return;
      const statusStr = httpStatus ? ` (HTTP ${httpStatus})` : '';
      console.log(`${colors.red}[ERR] [${getTimestamp()}] [PURCHASE] ${token}${statusStr}: ${message}${colors.reset}`);
      printDetails(response);
    },
  },

  summary: {
    report(data: {
      terminatedReason: string;
      committedAmount: number;
      committedCount: number;
      maxTotalAmount: number;
      maxTransactionCount: number;
      workerCount: number;
      durationMs: number;
      error?: string;
    }) {
      if (!shouldLog(LogLevel.INFO)) return;
      const failed = data.terminatedReason === 'FatalError';
      const reasonColor = failed ? colors.red : colors.green;
      console.log('');
      console.log(`${colors.bright}${colors.cyan}━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━${colors.reset}`);
      console.log(`${colors.bright}[${getTimestamp()}] SPEND RUN SUMMARY${colors.reset}`);
      console.log(`${colors.bright}${colors.cyan}━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━${colors.reset}`);
      console.log(`  Termination:      ${reasonColor}${colors.bright}${data.terminatedReason}${colors.reset}`);
      if (data.error) {
        console.log(`  Cause:            ${colors.red}${data.error}${colors.reset}`);
      }
      console.log(`  Committed amount: ${colors.bright}${formatSats(data.committedAmount)}${colors.reset} / ${data.maxTotalAmount} sats`);
      console.log(`  Committed count:  ${colors.bright}${data.committedCount}${colors.reset} / ${data.maxTransactionCount}`);
      console.log(`  Workers:          ${data.workerCount}`);
      console.log(`  Duration:         ${formatDuration(data.durationMs)}`);
      console.log(`${colors.bright}${colors.cyan}━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━${colors.reset}`);
      console.log('');
    },
  },

  printStats() {
    spendStats.printSummary();
  },

  header(text: string) {
    if (!shouldLog(LogLevel.INFO)) return;
    console.log(`\n${colors.bright}${colors.cyan}╔${'═'.repeat(text.length + 2)}╗${colors.reset}`);
    console.log(`${colors.bright}${colors.cyan}║ ${text} ║${colors.reset}`);
    console.log(`${colors.bright}${colors.cyan}╚${'═'.repeat(text.length + 2)}╝${colors.reset}\n`);
  },
};

export default Logger;
