import { InsufficientFundsError, InvalidAmountError } from "../../common/errors";
import { formatCents, validatePositiveCents } from "../../common/money";
import type { AppLogger } from "../../common/logger";

export type AccountType = "basic" | "savings" | "current" | "fixed_deposit";

export type Clock = () => Date;

/** Longest fixed-deposit lock accepted, in days (100 years). */
export const MAX_LOCK_PERIOD_DAYS = 36_500;

type SnapshotBase = {
  accountId: string;
  holderName: string;
  balanceCents: number;
};

export type AccountSnapshot =
  | (SnapshotBase & { accountType: "basic" })
  | (SnapshotBase & { accountType: "savings"; interestRatePercent: number })
  | (SnapshotBase & { accountType: "current"; overdraftLimitCents: number })
  | (SnapshotBase & {
      accountType: "fixed_deposit";
      lockPeriodDays: number;
      createdAt: string;
      unlockDate: string;
    });

export type OperationResult = {
  accountId: string;
  balanceCents: number;
  message: string;
};

/**
 * Capabilities shared by every account variant. Variants differ in their
 * withdrawal rule and in the extra lines `describe()` prints.
 */
export interface Account {
  readonly accountId: string;
  readonly holderName: string;
  readonly accountType: AccountType;
  deposit(amountCents: number): OperationResult;
  withdraw(amountCents: number): OperationResult;
  getBalance(): number;
  describe(): string;
  snapshot(): AccountSnapshot;
}

export type AccountDeps = {
  logger?: AppLogger;
  now?: Clock;
};

/**
 * The one place a balance changes. Every variant holds one and routes its
 * deposits and withdrawals through it, so the amount checks and the log
 * line are the same for all of them.
 */
export class AccountBalance {
  constructor(
    private readonly accountId: string,
    private readonly holderName: string,
    private cents: number,
    private readonly logger: AppLogger
  ) {}

  get value(): number {
    return this.cents;
  }

  credit(amountCents: number): OperationResult {
    validatePositiveCents(amountCents);
    this.cents += amountCents;
    return this.confirm(`Deposited ${formatCents(amountCents)}`, amountCents);
  }

  /** Debits under the basic rule: the balance must cover the amount. */
  debit(amountCents: number): OperationResult {
    return this.debitWithin(amountCents, 0, () => {
      const deficit = amountCents - this.cents;
      return new InsufficientFundsError(
        `Insufficient funds: short by ${formatCents(deficit)}`
      );
    });
  }

  /**
   * Debits as long as the balance stays at or above `-headroomCents`.
   * `onShortfall` builds the error thrown otherwise.
   */
  debitWithin(
    amountCents: number,
    headroomCents: number,
    onShortfall: () => Error,
    suffix = ""
  ): OperationResult {
    validatePositiveCents(amountCents);
    if (amountCents > this.cents + headroomCents) {
      throw onShortfall();
    }
    this.cents -= amountCents;
    return this.confirm(`Withdrew ${formatCents(amountCents)}${suffix}`, -amountCents);
  }

  /**
   * Adds a computed adjustment such as interest. The adjustment may be
   * negative, but it and the resulting balance must stay exact whole cents.
   */
  adjust(deltaCents: number, label: string): OperationResult {
    const next = this.cents + deltaCents;
    if (!Number.isSafeInteger(deltaCents) || !Number.isSafeInteger(next)) {
      throw new InvalidAmountError(`${label} exceeds allowed limits`);
    }
    this.cents = next;
    return this.confirm(`${label}: ${formatCents(deltaCents)}`, deltaCents);
  }

  private confirm(action: string, deltaCents: number): OperationResult {
    const message = `[${this.holderName}] ${action}`;
    this.logger.info(
      { accountId: this.accountId, deltaCents, balanceCents: this.cents },
      message
    );
    return { accountId: this.accountId, balanceCents: this.cents, message };
  }
}

export function describeLines(
  account: { accountId: string; holderName: string; getBalance(): number },
  extra: string[]
): string {
  return [
    `Account Number: ${account.accountId}`,
    `Account Holder: ${account.holderName}`,
    `Balance: ${formatCents(account.getBalance())}`,
    ...extra
  ].join("\n");
}
