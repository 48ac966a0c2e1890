import {
  InvalidAmountError,
  InvalidRequestError,
  LockPeriodActiveError,
  OverdraftExceededError
} from "../../common/errors";
import { formatCents, validateCents } from "../../common/money";
import { logger as defaultLogger } from "../../common/logger";
import {
  Account,
  AccountBalance,
  AccountDeps,
  AccountSnapshot,
  Clock,
  MAX_LOCK_PERIOD_DAYS,
  OperationResult,
  describeLines
} from "./account";

const DAY_MS = 24 * 60 * 60 * 1000;

function openingBalance(
  accountId: string,
  holderName: string,
  initialBalanceCents: number,
  deps: AccountDeps
): AccountBalance {
  if (initialBalanceCents < 0) {
    throw new InvalidAmountError("Initial balance must be non-negative");
  }
  validateCents(initialBalanceCents, "Initial balance");
  return new AccountBalance(
    accountId,
    holderName,
    initialBalanceCents,
    deps.logger ?? defaultLogger
  );
}

export class BasicAccount implements Account {
  readonly accountType = "basic";
  private readonly balance: AccountBalance;

  constructor(
    readonly accountId: string,
    readonly holderName: string,
    initialBalanceCents = 0,
    deps: AccountDeps = {}
  ) {
    this.balance = openingBalance(accountId, holderName, initialBalanceCents, deps);
  }

  deposit(amountCents: number): OperationResult {
    return this.balance.credit(amountCents);
  }

  withdraw(amountCents: number): OperationResult {
    return this.balance.debit(amountCents);
  }

  getBalance(): number {
    return this.balance.value;
  }

  describe(): string {
    return describeLines(this, ["Account Type: Basic"]);
  }

  snapshot(): AccountSnapshot {
    return {
      accountType: this.accountType,
      accountId: this.accountId,
      holderName: this.holderName,
      balanceCents: this.balance.value
    };
  }
}

export class SavingsAccount implements Account {
  readonly accountType = "savings";
  private readonly balance: AccountBalance;

  constructor(
    readonly accountId: string,
    readonly holderName: string,
    readonly interestRatePercent: number,
    initialBalanceCents = 0,
    deps: AccountDeps = {}
  ) {
    if (!Number.isFinite(interestRatePercent)) {
      throw new InvalidRequestError("Interest rate must be a finite number");
    }
    this.balance = openingBalance(accountId, holderName, initialBalanceCents, deps);
  }

  deposit(amountCents: number): OperationResult {
    return this.balance.credit(amountCents);
  }

  withdraw(amountCents: number): OperationResult {
    return this.balance.debit(amountCents);
  }

  /** Credits `balance * rate / 100`, rounded to the nearest cent. */
  applyInterest(): OperationResult {
    const interestCents = Math.round(
      (this.balance.value * this.interestRatePercent) / 100
    );
    return this.balance.adjust(interestCents, "Interest applied");
  }

  getBalance(): number {
    return this.balance.value;
  }

  describe(): string {
    return describeLines(this, [
      "Account Type: Savings",
      `Interest Rate: ${this.interestRatePercent}%`
    ]);
  }

  snapshot(): AccountSnapshot {
    return {
      accountType: this.accountType,
      accountId: this.accountId,
      holderName: this.holderName,
      balanceCents: this.balance.value,
      interestRatePercent: this.interestRatePercent
    };
  }
}

export class CurrentAccount implements Account {
  readonly accountType = "current";
  private readonly balance: AccountBalance;

  constructor(
    readonly accountId: string,
    readonly holderName: string,
    readonly overdraftLimitCents: number,
    initialBalanceCents = 0,
    deps: AccountDeps = {}
  ) {
    if (overdraftLimitCents < 0) {
      throw new InvalidAmountError("Overdraft limit must be non-negative");
    }
    validateCents(overdraftLimitCents, "Overdraft limit");
    this.balance = openingBalance(accountId, holderName, initialBalanceCents, deps);
  }

  deposit(amountCents: number): OperationResult {
    return this.balance.credit(amountCents);
  }

  withdraw(amountCents: number): OperationResult {
    return this.balance.debitWithin(
      amountCents,
      this.overdraftLimitCents,
      () => new OverdraftExceededError(),
      " (overdraft allowed)"
    );
  }

  getBalance(): number {
    return this.balance.value;
  }

  describe(): string {
    return describeLines(this, [
      "Account Type: Current",
      `Overdraft Limit: ${formatCents(this.overdraftLimitCents)}`
    ]);
  }

  snapshot(): AccountSnapshot {
    return {
      accountType: this.accountType,
      accountId: this.accountId,
      holderName: this.holderName,
      balanceCents: this.balance.value,
      overdraftLimitCents: this.overdraftLimitCents
    };
  }
}

export class FixedDepositAccount implements Account {
  readonly accountType = "fixed_deposit";
  readonly createdAt: Date;
  private readonly balance: AccountBalance;
  private readonly now: Clock;

  constructor(
    readonly accountId: string,
    readonly holderName: string,
    readonly lockPeriodDays: number,
    initialBalanceCents = 0,
    deps: AccountDeps = {}
  ) {
    if (
      !Number.isSafeInteger(lockPeriodDays) ||
      lockPeriodDays < 0 ||
      lockPeriodDays > MAX_LOCK_PERIOD_DAYS
    ) {
      throw new InvalidRequestError(
        `Lock period must be a whole number of days between 0 and ${MAX_LOCK_PERIOD_DAYS}`
      );
    }
    this.balance = openingBalance(accountId, holderName, initialBalanceCents, deps);
    this.now = deps.now ?? (() => new Date());
    this.createdAt = this.now();
  }

  unlockDate(): Date {
    return new Date(this.createdAt.getTime() + this.lockPeriodDays * DAY_MS);
  }

  isLocked(): boolean {
    return this.now().getTime() < this.unlockDate().getTime();
  }

  deposit(amountCents: number): OperationResult {
    return this.balance.credit(amountCents);
  }

  withdraw(amountCents: number): OperationResult {
    if (this.isLocked()) {
      throw new LockPeriodActiveError(
        `Withdrawal not allowed before ${this.unlockDay()}`
      );
    }
    return this.balance.debit(amountCents);
  }

  getBalance(): number {
    return this.balance.value;
  }

  describe(): string {
    return describeLines(this, [
      "Account Type: Fixed Deposit",
      `Unlock Date: ${this.unlockDay()}`
    ]);
  }

  snapshot(): AccountSnapshot {
    return {
      accountType: this.accountType,
      accountId: this.accountId,
      holderName: this.holderName,
      balanceCents: this.balance.value,
      lockPeriodDays: this.lockPeriodDays,
      createdAt: this.createdAt.toISOString(),
      unlockDate: this.unlockDay()
    };
  }

  private unlockDay(): string {
    return this.unlockDate().toISOString().slice(0, 10);
  }
}

export type AnyAccount =
  | BasicAccount
  | SavingsAccount
  | CurrentAccount
  | FixedDepositAccount;
