import { AppError } from "./common/errors";
import { logger as defaultLogger, type AppLogger } from "./common/logger";
import type { Clock } from "./modules/accounts/account";
import {
  AnyAccount,
  CurrentAccount,
  FixedDepositAccount,
  SavingsAccount
} from "./modules/accounts/variants";
import { Bank } from "./modules/bank/bank";

export type DemoOptions = {
  now?: Clock;
  logger?: AppLogger;
};

/**
 * Replays the reference walkthrough: a savings, a current and a fixed-deposit
 * account, a few operations on each, a refused early withdrawal and one
 * transfer. Returns the bank so callers can inspect the final balances.
 */
export function runDemo(options: DemoOptions = {}): Bank<AnyAccount> {
  const log = options.logger ?? defaultLogger;
  const deps = { logger: log, now: options.now };
  const bank = new Bank<AnyAccount>(log);

  const savings = new SavingsAccount("S1001", "Alice", 3.5, 100_000, deps);
  const current = new CurrentAccount("C1001", "Bob", 50_000, 20_000, deps);
  const fixed = new FixedDepositAccount("F1001", "Charlie", 30, 500_000, deps);

  bank.addAccount(savings);
  bank.addAccount(current);
  bank.addAccount(fixed);

  const summarize = (stage: string) => {
    for (const account of bank.listAccounts()) {
      log.info({ stage, accountId: account.accountId }, `\n${account.describe()}`);
    }
  };

  summarize("initial");

  savings.deposit(50_000);
  savings.applyInterest();
  savings.withdraw(20_000);

  current.withdraw(60_000);
  current.deposit(30_000);

  try {
    fixed.withdraw(100_000);
  } catch (error) {
    if (!(error instanceof AppError)) {
      throw error;
    }
    log.warn({ accountId: fixed.accountId, code: error.code }, `Error: ${error.message}`);
  }

  bank.transferFunds("S1001", "C1001", 30_000);

  summarize("final");
  return bank;
}

if (require.main === module) {
  runDemo();
}
