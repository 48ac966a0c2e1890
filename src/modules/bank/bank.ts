import { AccountNotFoundError, DuplicateAccountError } from "../../common/errors";
import { formatCents } from "../../common/money";
import { logger as defaultLogger, type AppLogger } from "../../common/logger";
import type { Account } from "../accounts/account";
import type { AnyAccount } from "../accounts/variants";

export type TransferResult = {
  fromAccountId: string;
  toAccountId: string;
  amountCents: number;
  fromBalanceCents: number;
  toBalanceCents: number;
  message: string;
};

/**
 * Registry of accounts keyed by account id. The Bank owns the map; accounts
 * are never removed once added.
 */
export class Bank<T extends Account = AnyAccount> {
  private readonly accounts = new Map<string, T>();

  constructor(private readonly logger: AppLogger = defaultLogger) {}

  addAccount(account: T): void {
    if (this.accounts.has(account.accountId)) {
      throw new DuplicateAccountError(
        `Account ${account.accountId} already exists`
      );
    }
    this.accounts.set(account.accountId, account);
    this.logger.debug(
      { accountId: account.accountId, accountType: account.accountType },
      "Account registered"
    );
  }

  getAccount(accountId: string): T | null {
    return this.accounts.get(accountId) ?? null;
  }

  listAccounts(): T[] {
    return [...this.accounts.values()];
  }

  /**
   * Withdraws from the source, then deposits into the destination. There is
   * no compensation step: deposit accepts any amount withdraw accepted, so
   * the second leg cannot fail under the current rules.
   */
  transferFunds(fromId: string, toId: string, amountCents: number): TransferResult {
    const from = this.getAccount(fromId);
    const to = this.getAccount(toId);
    if (!from || !to) {
      const missing = [from ? null : fromId, to ? null : toId].filter(
        (id): id is string => id !== null
      );
      throw new AccountNotFoundError(
        `One or both accounts not found: ${missing.join(", ")}`
      );
    }

    from.withdraw(amountCents);
    to.deposit(amountCents);

    const message = `Transferred ${formatCents(amountCents)} from ${from.holderName} to ${to.holderName}`;
    this.logger.info({ fromId, toId, amountCents }, message);
    return {
      fromAccountId: fromId,
      toAccountId: toId,
      amountCents,
      fromBalanceCents: from.getBalance(),
      toBalanceCents: to.getBalance(),
      message
    };
  }
}
