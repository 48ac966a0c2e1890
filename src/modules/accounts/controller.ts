import { AccountsService, CreateAccountRequest } from "./service";

export class AccountsController {
  constructor(private readonly service: AccountsService) {}

  createAccount(input: CreateAccountRequest) {
    return this.service.createAccount(input);
  }

  listAccounts() {
    return { accounts: this.service.listAccounts() };
  }

  getAccount(accountId: string) {
    return this.service.getAccount(accountId);
  }

  deposit(accountId: string, amountCents: number) {
    return this.service.deposit(accountId, amountCents);
  }

  withdraw(accountId: string, amountCents: number) {
    return this.service.withdraw(accountId, amountCents);
  }

  applyInterest(accountId: string) {
    return this.service.applyInterest(accountId);
  }

  getBalance(accountId: string) {
    return this.service.getBalance(accountId);
  }

  transfer(fromAccountId: string, toAccountId: string, amountCents: number) {
    return this.service.transfer(fromAccountId, toAccountId, amountCents);
  }
}
