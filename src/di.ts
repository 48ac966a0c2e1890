import { AccountsController } from "./modules/accounts/controller";
import { AccountsService } from "./modules/accounts/service";
import type { Clock } from "./modules/accounts/account";
import type { AnyAccount } from "./modules/accounts/variants";
import { Bank } from "./modules/bank/bank";
import { logger as defaultLogger, type AppLogger } from "./common/logger";

export type ContainerOptions = {
  now?: Clock;
  logger?: AppLogger;
};

export function createContainer(options: ContainerOptions = {}) {
  const logger = options.logger ?? defaultLogger;

  // In-memory only: the bank lives as long as the process
  const bank = new Bank<AnyAccount>(logger);
  const accountsService = new AccountsService(bank, options.now, logger);
  const accountsController = new AccountsController(accountsService);

  return {
    bank,
    accountsService,
    accountsController
  };
}
