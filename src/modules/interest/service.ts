import {
  AppError,
  InterestAlreadyAccruedError,
  NoInterestDueError
} from "../../common/errors";
import { LoggerLike, silentLogger } from "../../common/logger";
import { calculateInterestCents } from "../../common/money";
import { LedgerStore } from "../ledger/ledger.store";
import { AccountsService, MutationRequestOptions } from "../accounts/service";

export type AccrualSummary = {
  calculationDate: string;
  interestRate: string;
  accountsProcessed: number;
  accountsCredited: number;
  totalInterestCents: number;
  skipped: number;
  alreadyAccrued: number;
  failed: number;
};

/**
 * Daily interest at a flat rate. Each account is its own unit through the
 * deposit path, and the interest is computed from the balance read inside
 * that unit. The day key (account, UTC date) keeps a second run on the same
 * day from crediting twice.
 */
export class InterestService {
  constructor(
    private readonly store: LedgerStore,
    private readonly accounts: AccountsService,
    private readonly rate: string,
    private readonly now: () => Date = () => new Date(),
    private readonly logger: LoggerLike = silentLogger
  ) {}

  async accrueDaily(options: MutationRequestOptions = {}): Promise<AccrualSummary> {
    const calculationDate = this.now().toISOString().slice(0, 10);
    const summary: AccrualSummary = {
      calculationDate,
      interestRate: this.rate,
      accountsProcessed: 0,
      accountsCredited: 0,
      totalInterestCents: 0,
      skipped: 0,
      alreadyAccrued: 0,
      failed: 0
    };

    const accounts = await this.store.listAccounts();
    for (const account of accounts) {
      summary.accountsProcessed += 1;
      const { accountId } = account;

      try {
        const applied = await this.accounts.creditFromBalance(
          accountId,
          (balanceCents) => {
            const interestCents = calculateInterestCents(balanceCents, this.rate);
            if (interestCents <= 0) {
              throw new NoInterestDueError(accountId);
            }
            return interestCents;
          },
          {
            description: `Daily interest ${calculationDate}`,
            interest: { rate: this.rate, calculationDate },
            signal: options.signal
          }
        );
        summary.accountsCredited += 1;
        summary.totalInterestCents += applied.transaction.amountCents;
      } catch (error) {
        if (error instanceof NoInterestDueError) {
          summary.skipped += 1;
          continue;
        }
        if (error instanceof InterestAlreadyAccruedError) {
          summary.alreadyAccrued += 1;
          continue;
        }
        summary.failed += 1;
        this.logger.error(
          {
            err: error,
            accountId,
            code: error instanceof AppError ? error.code : "UNKNOWN"
          },
          "Interest accrual failed for account"
        );
      }
    }

    this.logger.info(summary, "Daily interest accrual finished");
    return summary;
  }
}
