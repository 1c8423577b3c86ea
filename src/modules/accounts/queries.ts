import { AccountNotFoundError } from "../../common/errors";
import {
  Account,
  InterestRecord,
  LedgerStore,
  LedgerTransaction,
  signedAmount
} from "../ledger/ledger.store";

export const RECENT_TRANSACTIONS_LIMIT = 10;

export type AccountInfo = {
  account: Account;
  recentTransactions: LedgerTransaction[];
  accumulatedInterestCents: number;
};

export type ReconciliationReport = {
  accountId: string;
  balanceCents: number;
  expectedBalanceCents: number;
  transactionCount: number;
  consistent: boolean;
};

/**
 * Read-only views over the ledger. The sub-queries are independent reads and
 * may straddle a concurrent commit.
 */
export class AccountQueryService {
  constructor(private readonly store: LedgerStore) {}

  async getAccountInfo(accountId: string): Promise<AccountInfo> {
    const account = await this.requireAccount(accountId);
    const [recentTransactions, interestHistory] = await Promise.all([
      this.store.getRecentTransactions(accountId, RECENT_TRANSACTIONS_LIMIT),
      this.store.getInterestHistory(accountId)
    ]);
    return {
      account,
      recentTransactions,
      accumulatedInterestCents: interestHistory.reduce(
        (total, record) => total + record.calculatedInterestCents,
        0
      )
    };
  }

  async getInterestHistory(accountId: string): Promise<InterestRecord[]> {
    await this.requireAccount(accountId);
    return this.store.getInterestHistory(accountId);
  }

  async reconcile(accountId: string): Promise<ReconciliationReport> {
    const account = await this.requireAccount(accountId);
    const transactions = await this.store.listTransactions(accountId);
    const expectedBalanceCents = transactions.reduce(
      (balance, tx) => balance + signedAmount(tx),
      account.openingBalanceCents
    );
    return {
      accountId,
      balanceCents: account.balanceCents,
      expectedBalanceCents,
      transactionCount: transactions.length,
      consistent: expectedBalanceCents === account.balanceCents
    };
  }

  private async requireAccount(accountId: string): Promise<Account> {
    const account = await this.store.getAccount(accountId);
    if (!account) {
      throw new AccountNotFoundError(accountId);
    }
    return account;
  }
}
