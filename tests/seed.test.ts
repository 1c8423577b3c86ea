import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { ZodError } from "zod";
import { loadSeedAccounts } from "../src/infra/memory/seed";

describe("loadSeedAccounts", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "ledger-seed-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("reads the bundled seed file", () => {
    const accounts = loadSeedAccounts("data/seed-accounts.json");
    expect(accounts.map((a) => [a.accountId, a.balanceCents])).toEqual([
      ["ACC001", 100000],
      ["ACC002", 50000],
      ["ACC003", 1000000],
      ["ACC004", 0]
    ]);
    expect(accounts[0]).toEqual({
      accountId: "ACC001",
      customerName: "Ana Torres",
      balanceCents: 100000,
      createdAt: "2024-01-01T00:00:00.000Z"
    });
  });

  test("rejects negative balances", () => {
    const file = join(dir, "seed.json");
    writeFileSync(
      file,
      JSON.stringify([
        { accountId: "X1", customerName: "X", balance: -1, createdAt: "2024-01-01T00:00:00.000Z" }
      ])
    );
    expect(() => loadSeedAccounts(file)).toThrow(ZodError);
  });

  test("rejects balances with sub-cent precision", () => {
    const file = join(dir, "seed.json");
    writeFileSync(
      file,
      JSON.stringify([
        { accountId: "X1", customerName: "X", balance: 1.005, createdAt: "2024-01-01T00:00:00.000Z" }
      ])
    );
    expect(() => loadSeedAccounts(file)).toThrow("Amount must have at most 2 decimal places");
  });
});
