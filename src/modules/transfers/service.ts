import { randomUUID } from "crypto";
import {
  AccountNotFoundError,
  AppError,
  InsufficientFundsError,
  InvalidTransferError
} from "../../common/errors";
import { LoggerLike, silentLogger } from "../../common/logger";
import { assertPositiveCents } from "../../common/money";
import { MutexMap } from "../../infra/memory/mutex";
import { LedgerStore } from "../ledger/ledger.store";
import { MutationRequestOptions } from "../accounts/service";

export type TransferRequest = {
  fromAccountId: string;
  toAccountId: string;
  amountCents: number;
};

export type TransferConfirmation = {
  transferId: string;
  fromAccountId: string;
  toAccountId: string;
  amountCents: number;
  fromBalanceCents: number;
  toBalanceCents: number;
  timestamp: string;
};

/**
 * Moves money between two accounts as one unit: the debit and the credit
 * commit together or not at all.
 *
 * Locks on both accounts are always taken lowest id first (MutexMap.lockAll,
 * and `FOR UPDATE ... ORDER BY account_id` in PostgreSQL), so A->B and B->A
 * running together queue on the same lock instead of deadlocking.
 */
export class TransferService {
  constructor(
    private readonly store: LedgerStore,
    private readonly mutexMap: MutexMap,
    private readonly now: () => Date = () => new Date(),
    private readonly logger: LoggerLike = silentLogger,
    private readonly generateId: () => string = randomUUID
  ) {}

  async transfer(
    request: TransferRequest,
    options: MutationRequestOptions = {}
  ): Promise<TransferConfirmation> {
    const { fromAccountId, toAccountId, amountCents } = request;

    assertPositiveCents(amountCents);
    if (fromAccountId === toAccountId) {
      throw new InvalidTransferError();
    }

    const [from, to] = await Promise.all([
      this.store.getAccount(fromAccountId),
      this.store.getAccount(toAccountId)
    ]);
    if (!from) {
      throw new AccountNotFoundError(fromAccountId);
    }
    if (!to) {
      throw new AccountNotFoundError(toAccountId);
    }

    const transferId = this.generateId();
    const release = await this.mutexMap.lockAll([fromAccountId, toAccountId]);
    try {
      const timestamp = this.now().toISOString();
      const [debit, credit] = await this.store.applyMutations(
        [
          {
            accountId: fromAccountId,
            type: "TRANSFER_OUT",
            description: `Transfer to ${toAccountId} (ref ${transferId})`,
            transferId,
            delta: (balanceCents) => {
              if (balanceCents < amountCents) {
                throw new InsufficientFundsError();
              }
              return -amountCents;
            }
          },
          {
            accountId: toAccountId,
            type: "TRANSFER_IN",
            description: `Transfer from ${fromAccountId} (ref ${transferId})`,
            transferId,
            delta: () => amountCents
          }
        ],
        { timestamp, signal: options.signal }
      );

      this.logger.info(
        { transferId, fromAccountId, toAccountId, amountCents },
        "Transfer committed"
      );

      return {
        transferId,
        fromAccountId,
        toAccountId,
        amountCents,
        fromBalanceCents: debit.account.balanceCents,
        toBalanceCents: credit.account.balanceCents,
        timestamp
      };
    } catch (error) {
      const code = error instanceof AppError ? error.code : "UNKNOWN";
      this.logger.warn(
        { transferId, fromAccountId, toAccountId, amountCents, code },
        "Transfer aborted"
      );
      throw error;
    } finally {
      release();
    }
  }
}
