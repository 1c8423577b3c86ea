import { AppError, InsufficientFundsError } from "../../common/errors";
import { LoggerLike, silentLogger } from "../../common/logger";
import { assertPositiveCents } from "../../common/money";
import { MutexMap } from "../../infra/memory/mutex";
import {
  AppliedMutation,
  InterestAttachment,
  LedgerMutation,
  LedgerStore
} from "../ledger/ledger.store";
import { AccountInfo, AccountQueryService } from "./queries";

export type BalanceResult = {
  accountId: string;
  balanceCents: number;
  transactionId: number;
};

export type MutationRequestOptions = {
  signal?: AbortSignal;
};

export type CreditOptions = MutationRequestOptions & {
  description: string;
  interest?: InterestAttachment;
};

export class AccountsService {
  constructor(
    private readonly store: LedgerStore,
    private readonly mutexMap: MutexMap,
    private readonly queries: AccountQueryService,
    private readonly now: () => Date = () => new Date(),
    private readonly logger: LoggerLike = silentLogger
  ) {}

  async deposit(
    accountId: string,
    amountCents: number,
    options: MutationRequestOptions = {}
  ): Promise<BalanceResult> {
    const applied = await this.credit(accountId, amountCents, {
      ...options,
      description: "Deposit"
    });
    return toBalanceResult(applied);
  }

  /**
   * Credits a fixed amount. Deposits land here and interest accrual uses
   * creditFromBalance; both share the same lock and atomic unit.
   */
  async credit(
    accountId: string,
    amountCents: number,
    options: CreditOptions
  ): Promise<AppliedMutation> {
    assertPositiveCents(amountCents);
    return this.creditFromBalance(accountId, () => amountCents, options);
  }

  /**
   * Credits an amount derived from the balance read inside the unit. Whatever
   * `amountFor` throws aborts the unit with nothing written.
   */
  async creditFromBalance(
    accountId: string,
    amountFor: (balanceCents: number) => number,
    options: CreditOptions
  ): Promise<AppliedMutation> {
    return this.mutate(
      {
        accountId,
        type: "DEPOSIT",
        description: options.description,
        interest: options.interest,
        delta: (balanceCents) => {
          const amountCents = amountFor(balanceCents);
          assertPositiveCents(amountCents);
          return amountCents;
        }
      },
      options.signal
    );
  }

  async withdraw(
    accountId: string,
    amountCents: number,
    options: MutationRequestOptions = {}
  ): Promise<BalanceResult> {
    assertPositiveCents(amountCents);
    const applied = await this.mutate(
      {
        accountId,
        type: "WITHDRAWAL",
        description: "Withdrawal",
        // Decided against the balance read inside the unit, never a prior read.
        delta: (balanceCents) => {
          if (amountCents > balanceCents) {
            throw new InsufficientFundsError();
          }
          return -amountCents;
        }
      },
      options.signal
    );
    return toBalanceResult(applied);
  }

  getAccountInfo(accountId: string): Promise<AccountInfo> {
    return this.queries.getAccountInfo(accountId);
  }

  private async mutate(
    mutation: LedgerMutation,
    signal?: AbortSignal
  ): Promise<AppliedMutation> {
    const release = await this.mutexMap.lockAll([mutation.accountId]);
    try {
      const applied = await this.store.applyMutation(mutation, {
        timestamp: this.now().toISOString(),
        signal
      });
      this.logger.info(
        {
          accountId: mutation.accountId,
          type: mutation.type,
          amountCents: applied.transaction.amountCents,
          transactionId: applied.transaction.transactionId
        },
        "Ledger mutation committed"
      );
      return applied;
    } catch (error) {
      const code = error instanceof AppError ? error.code : "UNKNOWN";
      this.logger.warn(
        { accountId: mutation.accountId, type: mutation.type, code },
        "Ledger mutation rejected"
      );
      throw error;
    } finally {
      release();
    }
  }
}

function toBalanceResult(applied: AppliedMutation): BalanceResult {
  return {
    accountId: applied.account.accountId,
    balanceCents: applied.account.balanceCents,
    transactionId: applied.transaction.transactionId
  };
}
