import { readFileSync } from "fs";
import { resolve } from "path";
import { z } from "zod";
import { toCents } from "../../common/money";
import type { SeedAccount } from "./memoryLedgerStore";

const seedFileSchema = z.array(
  z.object({
    accountId: z.string().min(1).max(64).regex(/^[A-Za-z0-9_-]+$/),
    customerName: z.string().min(1),
    balance: z.number().nonnegative(),
    createdAt: z.string().datetime()
  })
);

export function loadSeedAccounts(path: string): SeedAccount[] {
  const raw: unknown = JSON.parse(readFileSync(resolve(process.cwd(), path), "utf8"));
  return seedFileSchema.parse(raw).map((entry) => ({
    accountId: entry.accountId,
    customerName: entry.customerName,
    balanceCents: toCents(entry.balance),
    createdAt: entry.createdAt
  }));
}
