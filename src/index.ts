export * from "./common/errors";
export { formatCents, MAX_CENTS } from "./common/money";
export type { AppLogger } from "./common/logger";
export type {
  Account,
  AccountDeps,
  AccountSnapshot,
  AccountType,
  Clock,
  OperationResult
} from "./modules/accounts/account";
export {
  BasicAccount,
  CurrentAccount,
  FixedDepositAccount,
  SavingsAccount
} from "./modules/accounts/variants";
export type { AnyAccount } from "./modules/accounts/variants";
export { Bank } from "./modules/bank/bank";
export type { TransferResult } from "./modules/bank/bank";
export { AccountsService } from "./modules/accounts/service";
export { buildApp } from "./app";
