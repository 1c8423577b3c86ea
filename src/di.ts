import { AccountsController } from "./modules/accounts/controller";
import { AccountQueryService } from "./modules/accounts/queries";
import { AccountsService } from "./modules/accounts/service";
import { InterestController } from "./modules/interest/controller";
import { InterestScheduler } from "./modules/interest/scheduler";
import { InterestService } from "./modules/interest/service";
import { LedgerStore } from "./modules/ledger/ledger.store";
import { TransfersController } from "./modules/transfers/controller";
import { TransferService } from "./modules/transfers/service";
import { MemoryLedgerStore, SeedAccount } from "./infra/memory/memoryLedgerStore";
import { MutexMap } from "./infra/memory/mutex";
import { loadSeedAccounts } from "./infra/memory/seed";
import { PostgresLedgerStore } from "./infra/postgres/postgresLedgerStore";
import { getPool } from "./infra/postgres/pool";
import { LoggerLike, silentLogger } from "./common/logger";
import { config } from "./config";

export type ContainerOptions = {
  now?: () => Date;
  logger?: LoggerLike;
  store?: LedgerStore;
  seedAccounts?: SeedAccount[];
  interestRate?: string;
  lockTimeoutMs?: number;
};

function createStore(options: ContainerOptions, logger: LoggerLike): LedgerStore {
  if (options.store) {
    return options.store;
  }
  if (config.REPO_PROVIDER === "postgres") {
    return new PostgresLedgerStore(getPool(), logger);
  }
  // Memory mode keeps balances only for the life of the process.
  return new MemoryLedgerStore(options.seedAccounts ?? loadSeedAccounts(config.SEED_FILE));
}

export function createContainer(options: ContainerOptions = {}) {
  const logger = options.logger ?? silentLogger;
  const now = options.now ?? (() => new Date());

  const store = createStore(options, logger);
  const mutexMap = new MutexMap(options.lockTimeoutMs ?? config.LOCK_TIMEOUT_MS);

  const accountQueries = new AccountQueryService(store);
  const accountsService = new AccountsService(store, mutexMap, accountQueries, now, logger);
  const transferService = new TransferService(store, mutexMap, now, logger);
  const interestService = new InterestService(
    store,
    accountsService,
    options.interestRate ?? config.INTEREST_DAILY_RATE,
    now,
    logger
  );
  const interestScheduler = new InterestScheduler(
    interestService,
    config.INTEREST_INTERVAL_MS,
    logger
  );

  return {
    store,
    mutexMap,
    accountQueries,
    accountsService,
    transferService,
    interestService,
    interestScheduler,
    accountsController: new AccountsController(accountsService, accountQueries),
    transfersController: new TransfersController(transferService),
    interestController: new InterestController(interestService)
  };
}

export type Container = ReturnType<typeof createContainer>;
