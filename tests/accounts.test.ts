import { FastifyInstance } from "fastify";
import { buildApp } from "../src/app";
import { StorageFailureError, StorageTimeoutError } from "../src/common/errors";
import { MemoryLedgerStore } from "../src/infra/memory/memoryLedgerStore";
import { Account } from "../src/modules/ledger/ledger.store";
import { FIXED_NOW, seedAccounts } from "./fixtures";

let app: FastifyInstance;
const now = () => FIXED_NOW;

function accounts() {
  return seedAccounts({ ACC001: 100000, ACC002: 50000, ACC003: 10000, ACC004: 0 });
}

async function deposit(accountId: string, amount: unknown) {
  return app.inject({
    method: "POST",
    url: `/accounts/${accountId}/deposit`,
    payload: { amount }
  });
}

async function withdraw(accountId: string, amount: unknown) {
  return app.inject({
    method: "POST",
    url: `/accounts/${accountId}/withdrawal`,
    payload: { amount }
  });
}

beforeEach(async () => {
  app = buildApp({ now, seedAccounts: accounts() });
  await app.ready();
});

afterEach(async () => {
  await app.close();
});

test("deposit credits the balance and appends one DEPOSIT", async () => {
  const res = await deposit("ACC001", 250.5);
  expect(res.statusCode).toBe(200);
  expect(res.json()).toEqual({ accountId: "ACC001", balance: 1250.5, transactionId: 1 });

  const info = await app.inject({ method: "GET", url: "/accounts/ACC001" });
  expect(info.statusCode).toBe(200);
  expect(info.json()).toEqual({
    accountId: "ACC001",
    customerName: "Customer ACC001",
    balance: 1250.5,
    createdAt: "2024-01-01T00:00:00.000Z",
    recentTransactions: [
      {
        transactionId: 1,
        accountId: "ACC001",
        type: "DEPOSIT",
        amount: 250.5,
        balanceAfter: 1250.5,
        timestamp: "2024-03-15T12:00:00.000Z",
        description: "Deposit",
        transferId: null
      }
    ],
    accumulatedInterest: 0
  });
});

test("withdrawal debits the balance", async () => {
  const res = await withdraw("ACC002", 100);
  expect(res.statusCode).toBe(200);
  expect(res.json()).toEqual({ accountId: "ACC002", balance: 400, transactionId: 1 });
});

test("withdrawal above the balance is rejected and changes nothing", async () => {
  const res = await withdraw("ACC003", 150);
  expect(res.statusCode).toBe(400);
  expect(res.json()).toEqual({ error: "INSUFFICIENT_FUNDS", message: "Insufficient funds" });

  const info = await app.inject({ method: "GET", url: "/accounts/ACC003" });
  expect(info.json().balance).toBe(100);
  expect(info.json().recentTransactions).toEqual([]);
});

test("withdrawing the exact balance leaves zero", async () => {
  const res = await withdraw("ACC003", 100);
  expect(res.statusCode).toBe(200);
  expect(res.json().balance).toBe(0);
});

test("zero and negative amounts are rejected as INVALID_AMOUNT", async () => {
  const zero = await deposit("ACC001", 0);
  expect(zero.statusCode).toBe(400);
  expect(zero.json().error).toBe("INVALID_AMOUNT");

  const negative = await withdraw("ACC001", -5);
  expect(negative.statusCode).toBe(400);
  expect(negative.json().error).toBe("INVALID_AMOUNT");

  const info = await app.inject({ method: "GET", url: "/accounts/ACC001" });
  expect(info.json().balance).toBe(1000);
});

test("amounts with more than two decimals are rejected", async () => {
  const res = await deposit("ACC001", 10.005);
  expect(res.statusCode).toBe(400);
  expect(res.json()).toEqual({
    error: "INVALID_AMOUNT",
    message: "Amount must have at most 2 decimal places"
  });
});

test("missing amount is a request validation error", async () => {
  const res = await app.inject({
    method: "POST",
    url: "/accounts/ACC001/deposit",
    payload: {}
  });
  expect(res.statusCode).toBe(400);
  expect(res.json().error).toBe("INVALID_REQUEST");
});

test("malformed account id is a request validation error", async () => {
  const res = await app.inject({ method: "GET", url: "/accounts/ACC$01" });
  expect(res.statusCode).toBe(400);
  expect(res.json().error).toBe("INVALID_REQUEST");
});

test("unknown account returns 404", async () => {
  const info = await app.inject({ method: "GET", url: "/accounts/NOPE" });
  expect(info.statusCode).toBe(404);
  expect(info.json()).toEqual({ error: "ACCOUNT_NOT_FOUND", message: "Account NOPE not found" });

  const res = await deposit("NOPE", 10);
  expect(res.statusCode).toBe(404);
  expect(res.json().error).toBe("ACCOUNT_NOT_FOUND");
});

test("account info lists the ten most recent transactions, newest first", async () => {
  for (let i = 0; i < 12; i++) {
    const res = await deposit("ACC004", 1);
    expect(res.statusCode).toBe(200);
  }

  const info = await app.inject({ method: "GET", url: "/accounts/ACC004" });
  const body = info.json();
  expect(body.balance).toBe(12);
  expect(body.recentTransactions).toHaveLength(10);
  expect(body.recentTransactions[0].transactionId).toBe(12);
  expect(body.recentTransactions[0].balanceAfter).toBe(12);
  expect(body.recentTransactions[9].transactionId).toBe(3);
});

test("reading an account twice with no mutation in between gives the same result", async () => {
  await deposit("ACC001", 250.5);
  await withdraw("ACC001", 50.25);

  const first = await app.inject({ method: "GET", url: "/accounts/ACC001" });
  const second = await app.inject({ method: "GET", url: "/accounts/ACC001" });
  expect(first.statusCode).toBe(200);
  expect(second.json()).toEqual(first.json());
  expect(first.json().recentTransactions).toHaveLength(2);
});

test("reconciliation replays the history against the balance", async () => {
  await deposit("ACC001", 250.5);
  await withdraw("ACC001", 50.25);

  const res = await app.inject({ method: "GET", url: "/accounts/ACC001/reconciliation" });
  expect(res.statusCode).toBe(200);
  expect(res.json()).toEqual({
    accountId: "ACC001",
    balance: 1200.25,
    expectedBalance: 1200.25,
    transactionCount: 2,
    consistent: true
  });
});

test("every response carries a request id", async () => {
  const res = await app.inject({ method: "GET", url: "/health" });
  expect(res.statusCode).toBe(200);
  expect(res.json()).toEqual({ status: "ok" });
  expect(res.headers["x-request-id"]).toBeDefined();
});

test("unknown routes return NOT_FOUND", async () => {
  const res = await app.inject({ method: "GET", url: "/nope" });
  expect(res.statusCode).toBe(404);
  expect(res.json()).toEqual({ error: "NOT_FOUND", message: "Route GET /nope not found" });
});

describe("storage errors", () => {
  class FailingStore extends MemoryLedgerStore {
    constructor(private readonly error: Error) {
      super(accounts());
    }

    async getAccount(): Promise<Account | null> {
      throw this.error;
    }
  }

  async function withStore(error: Error) {
    const failing = buildApp({ now, store: new FailingStore(error) });
    await failing.ready();
    try {
      return await failing.inject({ method: "GET", url: "/accounts/ACC001" });
    } finally {
      await failing.close();
    }
  }

  test("timeouts map to 503 without internal detail", async () => {
    const res = await withStore(new StorageTimeoutError(new Error("lock wait on accounts")));
    expect(res.statusCode).toBe(503);
    expect(res.json()).toEqual({
      error: "STORAGE_TIMEOUT",
      message: "Storage did not respond in time"
    });
  });

  test("failures map to 500 without internal detail", async () => {
    const res = await withStore(new StorageFailureError(new Error("relation missing")));
    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ error: "STORAGE_FAILURE", message: "Unexpected storage error" });
  });

  test("unexpected errors map to INTERNAL_SERVER_ERROR", async () => {
    const res = await withStore(new Error("boom"));
    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ error: "INTERNAL_SERVER_ERROR", message: "Unexpected error" });
  });
});
