import { z } from "zod";

export const accountIdSchema = z
  .string()
  .min(1)
  .max(64)
  .regex(/^[A-Za-z0-9_-]+$/, "Account ID must contain only letters, numbers, hyphens, and underscores");

export const amountSchema = z.number().finite().positive();

export const accountParamsSchema = z.object({
  accountId: accountIdSchema
});

export const amountBodySchema = z.object({
  amount: amountSchema
});

export type AccountParams = z.infer<typeof accountParamsSchema>;
export type AmountBody = z.infer<typeof amountBodySchema>;
