import {
  AccountNotFoundError,
  UnsupportedOperationError
} from "../../common/errors";
import { logger as defaultLogger, type AppLogger } from "../../common/logger";
import { Bank, TransferResult } from "../bank/bank";
import { AccountSnapshot, Clock, OperationResult } from "./account";
import type { CreateAccountBody } from "./schemas";
import {
  AnyAccount,
  BasicAccount,
  CurrentAccount,
  FixedDepositAccount,
  SavingsAccount
} from "./variants";

export type CreateAccountRequest = CreateAccountBody;

export type AccountDetails = AccountSnapshot & { description: string };

export class AccountsService {
  constructor(
    private readonly bank: Bank<AnyAccount>,
    private readonly now: Clock = () => new Date(),
    private readonly logger: AppLogger = defaultLogger
  ) {}

  openAccount(input: CreateAccountRequest): AnyAccount {
    const deps = { logger: this.logger, now: this.now };
    const initial = input.initialBalanceCents ?? 0;
    switch (input.accountType) {
      case "basic":
        return new BasicAccount(input.accountId, input.holderName, initial, deps);
      case "savings":
        return new SavingsAccount(
          input.accountId,
          input.holderName,
          input.interestRatePercent,
          initial,
          deps
        );
      case "current":
        return new CurrentAccount(
          input.accountId,
          input.holderName,
          input.overdraftLimitCents,
          initial,
          deps
        );
      case "fixed_deposit":
        return new FixedDepositAccount(
          input.accountId,
          input.holderName,
          input.lockPeriodDays,
          initial,
          deps
        );
    }
  }

  createAccount(input: CreateAccountRequest): AccountSnapshot {
    const account = this.openAccount(input);
    this.bank.addAccount(account);
    this.logger.info(
      { accountId: account.accountId, accountType: account.accountType },
      "Account opened"
    );
    return account.snapshot();
  }

  listAccounts(): AccountSnapshot[] {
    return this.bank.listAccounts().map((account) => account.snapshot());
  }

  getAccount(accountId: string): AccountDetails {
    const account = this.require(accountId);
    return { ...account.snapshot(), description: account.describe() };
  }

  getBalance(accountId: string): { accountId: string; balanceCents: number } {
    return { accountId, balanceCents: this.require(accountId).getBalance() };
  }

  deposit(accountId: string, amountCents: number): OperationResult {
    return this.require(accountId).deposit(amountCents);
  }

  withdraw(accountId: string, amountCents: number): OperationResult {
    return this.require(accountId).withdraw(amountCents);
  }

  applyInterest(accountId: string): OperationResult {
    const account = this.require(accountId);
    if (account.accountType !== "savings") {
      throw new UnsupportedOperationError(
        `Interest applies only to savings accounts, not ${account.accountType}`
      );
    }
    return account.applyInterest();
  }

  transfer(fromAccountId: string, toAccountId: string, amountCents: number): TransferResult {
    return this.bank.transferFunds(fromAccountId, toAccountId, amountCents);
  }

  private require(accountId: string): AnyAccount {
    const account = this.bank.getAccount(accountId);
    if (!account) {
      throw new AccountNotFoundError(`Account ${accountId} not found`);
    }
    return account;
  }
}
