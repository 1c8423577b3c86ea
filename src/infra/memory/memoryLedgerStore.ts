import {
  Account,
  AppliedMutation,
  InterestRecord,
  LedgerMutation,
  LedgerStore,
  LedgerTransaction,
  MutationOptions,
  checkedBalance,
  compareRecentFirst
} from "../../modules/ledger/ledger.store";
import {
  AccountNotFoundError,
  ConstraintViolationError,
  InterestAlreadyAccruedError,
  OperationCancelledError
} from "../../common/errors";

export type SeedAccount = {
  accountId: string;
  customerName: string;
  balanceCents: number;
  createdAt: string;
};

/**
 * In-process ledger. A unit stages its changes on copies and commits them
 * without any await in between, so no other operation can observe or
 * interleave with a half-applied unit.
 */
export class MemoryLedgerStore implements LedgerStore {
  private readonly accounts = new Map<string, Account>();
  private readonly transactions: LedgerTransaction[] = [];
  private readonly interestRecords: InterestRecord[] = [];
  private nextTransactionId = 1;
  private nextInterestId = 1;

  constructor(seed: SeedAccount[] = []) {
    for (const account of seed) {
      if (!Number.isSafeInteger(account.balanceCents) || account.balanceCents < 0) {
        throw new ConstraintViolationError(
          `Seed balance for ${account.accountId} must be a non-negative integer of cents`
        );
      }
      this.accounts.set(account.accountId, {
        ...account,
        openingBalanceCents: account.balanceCents
      });
    }
  }

  async getAccount(accountId: string): Promise<Account | null> {
    const account = this.accounts.get(accountId);
    return account ? { ...account } : null;
  }

  async listAccounts(): Promise<Account[]> {
    return [...this.accounts.values()]
      .map((account) => ({ ...account }))
      .sort((a, b) => (a.accountId < b.accountId ? -1 : a.accountId > b.accountId ? 1 : 0));
  }

  async getRecentTransactions(accountId: string, limit: number): Promise<LedgerTransaction[]> {
    return this.transactions
      .filter((tx) => tx.accountId === accountId)
      .sort(compareRecentFirst)
      .slice(0, limit)
      .map((tx) => ({ ...tx }));
  }

  async listTransactions(accountId: string): Promise<LedgerTransaction[]> {
    return this.transactions
      .filter((tx) => tx.accountId === accountId)
      .map((tx) => ({ ...tx }));
  }

  async getInterestHistory(accountId: string): Promise<InterestRecord[]> {
    return this.interestRecords
      .filter((record) => record.accountId === accountId)
      .sort((a, b) => b.calculationDate.localeCompare(a.calculationDate) || b.id - a.id)
      .map((record) => ({ ...record }));
  }

  async applyMutation(
    mutation: LedgerMutation,
    options: MutationOptions
  ): Promise<AppliedMutation> {
    const [applied] = await this.applyMutations([mutation], options);
    return applied;
  }

  async applyMutations(
    mutations: LedgerMutation[],
    options: MutationOptions
  ): Promise<AppliedMutation[]> {
    if (options.signal?.aborted) {
      throw new OperationCancelledError();
    }

    const staged = new Map<string, Account>();
    const pendingTransactions: LedgerTransaction[] = [];
    const pendingInterest: InterestRecord[] = [];
    const results: AppliedMutation[] = [];
    let transactionId = this.nextTransactionId;
    let interestId = this.nextInterestId;

    for (const mutation of mutations) {
      const current = staged.get(mutation.accountId) ?? this.accounts.get(mutation.accountId);
      if (!current) {
        throw new AccountNotFoundError(mutation.accountId);
      }

      const delta = mutation.delta(current.balanceCents);
      const newBalance = checkedBalance(mutation, current.balanceCents, delta);
      const account: Account = { ...current, balanceCents: newBalance };
      staged.set(account.accountId, account);

      const transaction: LedgerTransaction = {
        transactionId: transactionId++,
        accountId: mutation.accountId,
        type: mutation.type,
        amountCents: Math.abs(delta),
        balanceAfterCents: newBalance,
        timestamp: options.timestamp,
        description: mutation.description,
        transferId: mutation.transferId ?? null
      };
      pendingTransactions.push(transaction);

      let interestRecord: InterestRecord | null = null;
      if (mutation.interest) {
        const { calculationDate, rate } = mutation.interest;
        const duplicate =
          this.interestRecords.some(
            (r) => r.accountId === mutation.accountId && r.calculationDate === calculationDate
          ) ||
          pendingInterest.some(
            (r) => r.accountId === mutation.accountId && r.calculationDate === calculationDate
          );
        if (duplicate) {
          throw new InterestAlreadyAccruedError(mutation.accountId, calculationDate);
        }
        interestRecord = {
          id: interestId++,
          accountId: mutation.accountId,
          interestRate: rate,
          calculatedInterestCents: transaction.amountCents,
          calculationDate,
          transactionId: transaction.transactionId
        };
        pendingInterest.push(interestRecord);
      }

      results.push({ account, transaction, interestRecord });
    }

    // Commit: nothing below can throw.
    for (const account of staged.values()) {
      this.accounts.set(account.accountId, account);
    }
    this.transactions.push(...pendingTransactions);
    this.interestRecords.push(...pendingInterest);
    this.nextTransactionId = transactionId;
    this.nextInterestId = interestId;

    return results.map((result) => ({
      account: { ...result.account },
      transaction: { ...result.transaction },
      interestRecord: result.interestRecord ? { ...result.interestRecord } : null
    }));
  }
}
