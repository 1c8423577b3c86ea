import type { SeedAccount } from "../src/infra/memory/memoryLedgerStore";

export const FIXED_NOW = new Date("2024-03-15T12:00:00.000Z");

export function seedAccounts(balances: Record<string, number>): SeedAccount[] {
  return Object.entries(balances).map(([accountId, balanceCents]) => ({
    accountId,
    customerName: `Customer ${accountId}`,
    balanceCents,
    createdAt: "2024-01-01T00:00:00.000Z"
  }));
}
