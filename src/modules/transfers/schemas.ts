import { z } from "zod";
import { accountIdSchema, amountSchema } from "../accounts/schemas";

export const transferBodySchema = z.object({
  fromAccountId: accountIdSchema,
  toAccountId: accountIdSchema,
  amount: amountSchema
});

export type TransferBody = z.infer<typeof transferBodySchema>;
