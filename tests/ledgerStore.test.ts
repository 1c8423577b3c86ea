import {
  AccountNotFoundError,
  ConstraintViolationError,
  InterestAlreadyAccruedError,
  OperationCancelledError
} from "../src/common/errors";
import { MemoryLedgerStore } from "../src/infra/memory/memoryLedgerStore";
import { LedgerMutation } from "../src/modules/ledger/ledger.store";
import { seedAccounts } from "./fixtures";

const at = (timestamp: string) => ({ timestamp });
const T1 = "2024-03-15T10:00:00.000Z";

function credit(accountId: string, cents: number, extra: Partial<LedgerMutation> = {}): LedgerMutation {
  return { accountId, type: "DEPOSIT", description: "Deposit", delta: () => cents, ...extra };
}

describe("MemoryLedgerStore", () => {
  let store: MemoryLedgerStore;

  beforeEach(() => {
    store = new MemoryLedgerStore(seedAccounts({ ACC002: 50000, ACC001: 100000 }));
  });

  test("lists accounts by id", async () => {
    const accounts = await store.listAccounts();
    expect(accounts.map((a) => a.accountId)).toEqual(["ACC001", "ACC002"]);
    expect(accounts[0].openingBalanceCents).toBe(100000);
  });

  test("a unit with a missing account applies nothing", async () => {
    await expect(
      store.applyMutations([credit("ACC001", 100), credit("NOPE", 100)], at(T1))
    ).rejects.toBeInstanceOf(AccountNotFoundError);

    expect((await store.getAccount("ACC001"))?.balanceCents).toBe(100000);
    expect(await store.listTransactions("ACC001")).toEqual([]);

    const applied = await store.applyMutation(credit("ACC001", 100), at(T1));
    expect(applied.transaction.transactionId).toBe(1);
  });

  test("mutations on the same account within a unit see each other", async () => {
    const results = await store.applyMutations(
      [credit("ACC001", 100), credit("ACC001", 200)],
      at(T1)
    );
    expect(results.map((r) => r.transaction.balanceAfterCents)).toEqual([100100, 100300]);
    expect(results.map((r) => r.account.balanceCents)).toEqual([100100, 100300]);
    expect((await store.getAccount("ACC001"))?.balanceCents).toBe(100300);
  });

  test("a debit that would go negative is a constraint violation", async () => {
    const overdraw: LedgerMutation = {
      accountId: "ACC002",
      type: "WITHDRAWAL",
      description: "Withdrawal",
      delta: () => -50001
    };
    await expect(store.applyMutation(overdraw, at(T1))).rejects.toThrow(
      new ConstraintViolationError("Balance of ACC002 cannot become negative")
    );
    expect((await store.getAccount("ACC002"))?.balanceCents).toBe(50000);
  });

  test("a delta whose sign disagrees with the type is rejected", async () => {
    const wrongSign: LedgerMutation = {
      accountId: "ACC002",
      type: "WITHDRAWAL",
      description: "Withdrawal",
      delta: () => 100
    };
    await expect(store.applyMutation(wrongSign, at(T1))).rejects.toThrow(
      "WITHDRAWAL cannot apply a positive change"
    );
    await expect(store.applyMutation(credit("ACC002", 0), at(T1))).rejects.toThrow(
      "Invalid balance change for ACC002"
    );
  });

  test("an error thrown by a delta aborts the unit", async () => {
    const refusing: LedgerMutation = {
      accountId: "ACC002",
      type: "TRANSFER_OUT",
      description: "Transfer",
      delta: () => {
        throw new Error("refused");
      }
    };
    await expect(
      store.applyMutations([credit("ACC001", 100), refusing], at(T1))
    ).rejects.toThrow("refused");
    expect((await store.getAccount("ACC001"))?.balanceCents).toBe(100000);
  });

  test("an aborted signal cancels before anything is applied", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(
      store.applyMutation(credit("ACC001", 100), { timestamp: T1, signal: controller.signal })
    ).rejects.toBeInstanceOf(OperationCancelledError);
    expect(await store.listTransactions("ACC001")).toEqual([]);
  });

  test("recent transactions are newest first, ties broken by id", async () => {
    await store.applyMutation(credit("ACC001", 1), at("2024-03-15T10:00:00.000Z"));
    await store.applyMutation(credit("ACC001", 2), at("2024-03-15T09:00:00.000Z"));
    await store.applyMutation(credit("ACC001", 3), at("2024-03-15T10:00:00.000Z"));

    const all = await store.getRecentTransactions("ACC001", 10);
    expect(all.map((tx) => tx.transactionId)).toEqual([3, 1, 2]);
    const limited = await store.getRecentTransactions("ACC001", 2);
    expect(limited.map((tx) => tx.transactionId)).toEqual([3, 1]);
  });

  test("interest is recorded once per account and day", async () => {
    const interest = { rate: "0.0005", calculationDate: "2024-03-14" };
    const applied = await store.applyMutation(credit("ACC001", 50, { interest }), at(T1));
    expect(applied.interestRecord).toEqual({
      id: 1,
      accountId: "ACC001",
      interestRate: "0.0005",
      calculatedInterestCents: 50,
      calculationDate: "2024-03-14",
      transactionId: 1
    });

    await expect(
      store.applyMutation(credit("ACC001", 50, { interest }), at(T1))
    ).rejects.toBeInstanceOf(InterestAlreadyAccruedError);
    expect((await store.getAccount("ACC001"))?.balanceCents).toBe(100050);

    await store.applyMutation(
      credit("ACC001", 50, { interest: { rate: "0.0005", calculationDate: "2024-03-15" } }),
      at(T1)
    );
    const history = await store.getInterestHistory("ACC001");
    expect(history.map((r) => [r.id, r.calculationDate])).toEqual([
      [2, "2024-03-15"],
      [1, "2024-03-14"]
    ]);
  });

  test("reads return copies", async () => {
    const account = await store.getAccount("ACC001");
    if (account) {
      account.balanceCents = 0;
    }
    expect((await store.getAccount("ACC001"))?.balanceCents).toBe(100000);
  });

  test("seed balances must be non-negative cents", () => {
    expect(() => new MemoryLedgerStore(seedAccounts({ BAD: -1 }))).toThrow(
      ConstraintViolationError
    );
  });
});
