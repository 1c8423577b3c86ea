import { ConstraintViolationError } from "../../common/errors";

export type TransactionType = "DEPOSIT" | "WITHDRAWAL" | "TRANSFER_IN" | "TRANSFER_OUT";

export const CREDIT_TYPES: ReadonlySet<TransactionType> = new Set(["DEPOSIT", "TRANSFER_IN"]);

export type Account = {
  accountId: string;
  customerName: string;
  balanceCents: number;
  openingBalanceCents: number;
  createdAt: string;
};

export type LedgerTransaction = {
  transactionId: number;
  accountId: string;
  type: TransactionType;
  amountCents: number;
  balanceAfterCents: number;
  timestamp: string;
  description: string;
  transferId: string | null;
};

export type InterestRecord = {
  id: number;
  accountId: string;
  interestRate: string;
  calculatedInterestCents: number;
  calculationDate: string;
  transactionId: number;
};

export type InterestAttachment = {
  rate: string;
  calculationDate: string;
};

/**
 * One read-modify-append step. `delta` is evaluated against the balance read
 * inside the atomic unit and returns the signed change in cents; throwing
 * from it aborts the whole unit.
 */
export type LedgerMutation = {
  accountId: string;
  type: TransactionType;
  description: string;
  delta: (balanceCents: number) => number;
  transferId?: string;
  interest?: InterestAttachment;
};

export type AppliedMutation = {
  account: Account;
  transaction: LedgerTransaction;
  interestRecord: InterestRecord | null;
};

export type MutationOptions = {
  timestamp: string;
  signal?: AbortSignal;
};

export interface LedgerStore {
  getAccount(accountId: string): Promise<Account | null>;
  listAccounts(): Promise<Account[]>;
  getRecentTransactions(accountId: string, limit: number): Promise<LedgerTransaction[]>;
  listTransactions(accountId: string): Promise<LedgerTransaction[]>;
  getInterestHistory(accountId: string): Promise<InterestRecord[]>;

  // Atomic read-modify-append: commits the balance change and the appended
  // rows together or not at all.
  applyMutation(mutation: LedgerMutation, options: MutationOptions): Promise<AppliedMutation>;

  // Multi-account variant: every mutation in the list commits as one unit.
  applyMutations(
    mutations: LedgerMutation[],
    options: MutationOptions
  ): Promise<AppliedMutation[]>;
}

export function signedAmount(transaction: Pick<LedgerTransaction, "type" | "amountCents">): number {
  return CREDIT_TYPES.has(transaction.type) ? transaction.amountCents : -transaction.amountCents;
}

/** Newest first; equal timestamps fall back to the higher transaction id. */
export function compareRecentFirst(a: LedgerTransaction, b: LedgerTransaction): number {
  const byTime = b.timestamp.localeCompare(a.timestamp);
  return byTime !== 0 ? byTime : b.transactionId - a.transactionId;
}

/**
 * Validates a delta against the mutation type and the non-negative balance
 * rule, returning the new balance.
 */
export function checkedBalance(
  mutation: Pick<LedgerMutation, "accountId" | "type">,
  balanceCents: number,
  delta: number
): number {
  if (!Number.isSafeInteger(delta) || delta === 0) {
    throw new ConstraintViolationError(`Invalid balance change for ${mutation.accountId}`);
  }
  const isCredit = CREDIT_TYPES.has(mutation.type);
  if (isCredit !== delta > 0) {
    throw new ConstraintViolationError(
      `${mutation.type} cannot apply a ${delta > 0 ? "positive" : "negative"} change`
    );
  }
  const newBalance = balanceCents + delta;
  if (newBalance < 0) {
    throw new ConstraintViolationError(`Balance of ${mutation.accountId} cannot become negative`);
  }
  if (!Number.isSafeInteger(newBalance)) {
    throw new ConstraintViolationError(`Balance of ${mutation.accountId} exceeds allowed limits`);
  }
  return newBalance;
}
