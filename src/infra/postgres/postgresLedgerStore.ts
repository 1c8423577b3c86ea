import Decimal from "decimal.js";
import { z } from "zod";
import {
  Account,
  AppliedMutation,
  InterestRecord,
  LedgerMutation,
  LedgerStore,
  LedgerTransaction,
  MutationOptions,
  checkedBalance
} from "../../modules/ledger/ledger.store";
import {
  AccountNotFoundError,
  InterestAlreadyAccruedError,
  OperationCancelledError,
  StorageFailureError,
  StorageTimeoutError
} from "../../common/errors";
import { LoggerLike, silentLogger } from "../../common/logger";
import { pgErrorCode, translatePgError } from "./errors";

export type Queryable = {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
};

export type PoolClientLike = Queryable & {
  release(): void;
};

export type PoolLike = Queryable & {
  connect(): Promise<PoolClientLike>;
};

const isoTimestamp = z
  .union([z.date(), z.string()])
  .transform((value) => new Date(value).toISOString());

const accountRowSchema = z.object({
  accountId: z.string(),
  customerName: z.string(),
  balanceCents: z.coerce.number().int(),
  openingBalanceCents: z.coerce.number().int(),
  createdAt: isoTimestamp
});

const transactionRowSchema = z.object({
  transactionId: z.coerce.number().int(),
  accountId: z.string(),
  type: z.enum(["DEPOSIT", "WITHDRAWAL", "TRANSFER_IN", "TRANSFER_OUT"]),
  amountCents: z.coerce.number().int(),
  balanceAfterCents: z.coerce.number().int(),
  timestamp: isoTimestamp,
  description: z.string(),
  transferId: z.string().nullable()
});

const interestRowSchema = z.object({
  id: z.coerce.number().int(),
  accountId: z.string(),
  interestRate: z.string().transform((value) => new Decimal(value).toString()),
  calculatedInterestCents: z.coerce.number().int(),
  calculationDate: z.string(),
  transactionId: z.coerce.number().int()
});

const ACCOUNT_COLUMNS = `
  account_id AS "accountId",
  customer_name AS "customerName",
  balance_cents AS "balanceCents",
  opening_balance_cents AS "openingBalanceCents",
  created_at AS "createdAt"`;

const TRANSACTION_COLUMNS = `
  transaction_id AS "transactionId",
  account_id AS "accountId",
  type,
  amount_cents AS "amountCents",
  balance_after_cents AS "balanceAfterCents",
  created_at AS "timestamp",
  description,
  transfer_id AS "transferId"`;

const INTEREST_COLUMNS = `
  id,
  account_id AS "accountId",
  interest_rate::text AS "interestRate",
  calculated_interest_cents AS "calculatedInterestCents",
  calculation_date::text AS "calculationDate",
  transaction_id AS "transactionId"`;

function firstRow<T>(rows: unknown[], schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  if (rows.length === 0) {
    throw new StorageFailureError(new Error("Statement returned no rows"));
  }
  return schema.parse(rows[0]);
}

export class PostgresLedgerStore implements LedgerStore {
  constructor(
    private readonly pool: PoolLike,
    private readonly logger: LoggerLike = silentLogger
  ) {}

  async getAccount(accountId: string): Promise<Account | null> {
    const rows = await this.read(
      `SELECT ${ACCOUNT_COLUMNS} FROM accounts WHERE account_id = $1;`,
      [accountId]
    );
    return rows.length > 0 ? accountRowSchema.parse(rows[0]) : null;
  }

  async listAccounts(): Promise<Account[]> {
    const rows = await this.read(
      `SELECT ${ACCOUNT_COLUMNS} FROM accounts ORDER BY account_id COLLATE "C";`
    );
    return rows.map((row) => accountRowSchema.parse(row));
  }

  async getRecentTransactions(accountId: string, limit: number): Promise<LedgerTransaction[]> {
    const rows = await this.read(
      `
      SELECT ${TRANSACTION_COLUMNS}
      FROM transactions
      WHERE account_id = $1
      ORDER BY created_at DESC, transaction_id DESC
      LIMIT $2;
      `,
      [accountId, limit]
    );
    return rows.map((row) => transactionRowSchema.parse(row));
  }

  async listTransactions(accountId: string): Promise<LedgerTransaction[]> {
    const rows = await this.read(
      `
      SELECT ${TRANSACTION_COLUMNS}
      FROM transactions
      WHERE account_id = $1
      ORDER BY transaction_id ASC;
      `,
      [accountId]
    );
    return rows.map((row) => transactionRowSchema.parse(row));
  }

  async getInterestHistory(accountId: string): Promise<InterestRecord[]> {
    const rows = await this.read(
      `
      SELECT ${INTEREST_COLUMNS}
      FROM interest_history
      WHERE account_id = $1
      ORDER BY calculation_date DESC, id DESC;
      `,
      [accountId]
    );
    return rows.map((row) => interestRowSchema.parse(row));
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

    const client = await this.connect();
    try {
      await client.query("BEGIN");

      // Row locks are taken in one statement, in account id order, so two
      // units over the same pair of accounts always lock the lower id first.
      const accountIds = [...new Set(mutations.map((m) => m.accountId))];
      const lockResult = await client.query(
        `
        SELECT ${ACCOUNT_COLUMNS}
        FROM accounts
        WHERE account_id = ANY($1::text[])
        ORDER BY account_id COLLATE "C"
        FOR UPDATE;
        `,
        [accountIds]
      );
      const locked = new Map<string, Account>();
      for (const row of lockResult.rows) {
        const account = accountRowSchema.parse(row);
        locked.set(account.accountId, account);
      }

      const results: AppliedMutation[] = [];
      for (const mutation of mutations) {
        results.push(await this.applyOne(client, locked, mutation, options));
      }

      if (options.signal?.aborted) {
        throw new OperationCancelledError();
      }
      await client.query("COMMIT");
      return results;
    } catch (error) {
      await this.rollback(client, error);
      throw this.fail(error, "Ledger unit failed");
    } finally {
      client.release();
    }
  }

  private async applyOne(
    client: PoolClientLike,
    locked: Map<string, Account>,
    mutation: LedgerMutation,
    options: MutationOptions
  ): Promise<AppliedMutation> {
    const current = locked.get(mutation.accountId);
    if (!current) {
      throw new AccountNotFoundError(mutation.accountId);
    }

    const delta = mutation.delta(current.balanceCents);
    const newBalance = checkedBalance(mutation, current.balanceCents, delta);

    if (mutation.interest) {
      const existing = await client.query(
        `
        SELECT 1 FROM interest_history
        WHERE account_id = $1 AND calculation_date = $2::date;
        `,
        [mutation.accountId, mutation.interest.calculationDate]
      );
      if (existing.rows.length > 0) {
        throw new InterestAlreadyAccruedError(
          mutation.accountId,
          mutation.interest.calculationDate
        );
      }
    }

    const txResult = await client.query(
      `
      INSERT INTO transactions (
        account_id,
        type,
        amount_cents,
        balance_after_cents,
        created_at,
        description,
        transfer_id
      )
      VALUES ($1, $2, $3, $4, $5, $6, $7)
      RETURNING ${TRANSACTION_COLUMNS};
      `,
      [
        mutation.accountId,
        mutation.type,
        Math.abs(delta),
        newBalance,
        options.timestamp,
        mutation.description,
        mutation.transferId ?? null
      ]
    );
    const transaction = firstRow(txResult.rows, transactionRowSchema);

    await client.query(
      `
      UPDATE accounts
      SET balance_cents = $2
      WHERE account_id = $1;
      `,
      [mutation.accountId, newBalance]
    );

    let interestRecord: InterestRecord | null = null;
    if (mutation.interest) {
      try {
        const interestResult = await client.query(
          `
          INSERT INTO interest_history (
            account_id,
            interest_rate,
            calculated_interest_cents,
            calculation_date,
            transaction_id
          )
          VALUES ($1, $2, $3, $4::date, $5)
          RETURNING ${INTEREST_COLUMNS};
          `,
          [
            mutation.accountId,
            mutation.interest.rate,
            transaction.amountCents,
            mutation.interest.calculationDate,
            transaction.transactionId
          ]
        );
        interestRecord = firstRow(interestResult.rows, interestRowSchema);
      } catch (error) {
        // A concurrent run may insert the same day key between the check and here.
        if (pgErrorCode(error) === "23505") {
          throw new InterestAlreadyAccruedError(
            mutation.accountId,
            mutation.interest.calculationDate
          );
        }
        throw error;
      }
    }

    const account: Account = { ...current, balanceCents: newBalance };
    locked.set(account.accountId, account);
    return { account, transaction, interestRecord };
  }

  private async connect(): Promise<PoolClientLike> {
    try {
      return await this.pool.connect();
    } catch (error) {
      throw this.fail(error, "Could not obtain a database connection");
    }
  }

  private async read(text: string, values?: unknown[]): Promise<unknown[]> {
    try {
      const result = await this.pool.query(text, values);
      return result.rows;
    } catch (error) {
      throw this.fail(error, "Ledger read failed");
    }
  }

  private async rollback(client: PoolClientLike, originalError: unknown): Promise<void> {
    try {
      await client.query("ROLLBACK");
    } catch (rollbackError) {
      // Connection may be bad; release in finally still runs.
      this.logger.error(
        {
          err: rollbackError,
          originalError: originalError instanceof Error ? originalError.message : String(originalError)
        },
        "Failed to roll back ledger unit"
      );
    }
  }

  private fail(error: unknown, message: string) {
    const translated = translatePgError(error);
    if (translated instanceof StorageFailureError || translated instanceof StorageTimeoutError) {
      this.logger.error({ err: error, code: translated.code }, message);
    }
    return translated;
  }
}
