import { FastifyInstance } from "fastify";
import { clientAbortSignal } from "../../common/http";
import { AccountsController } from "./controller";
import { accountParamsSchema, amountBodySchema } from "./schemas";

const accountParamsJsonSchema = {
  type: "object",
  properties: { accountId: { type: "string" } },
  required: ["accountId"]
};

const amountBodyJsonSchema = {
  type: "object",
  properties: { amount: { type: "number" } },
  required: ["amount"]
};

const transactionJsonSchema = {
  type: "object",
  properties: {
    transactionId: { type: "integer" },
    accountId: { type: "string" },
    type: { type: "string", enum: ["DEPOSIT", "WITHDRAWAL", "TRANSFER_IN", "TRANSFER_OUT"] },
    amount: { type: "number" },
    balanceAfter: { type: "number" },
    timestamp: { type: "string" },
    description: { type: "string" },
    transferId: { type: ["string", "null"] }
  },
  required: [
    "transactionId",
    "accountId",
    "type",
    "amount",
    "balanceAfter",
    "timestamp",
    "description",
    "transferId"
  ]
};

const balanceJsonSchema = {
  type: "object",
  properties: {
    accountId: { type: "string" },
    balance: { type: "number" },
    transactionId: { type: "integer" }
  },
  required: ["accountId", "balance", "transactionId"]
};

export function registerAccountsRoutes(app: FastifyInstance, controller: AccountsController) {
  app.get(
    "/accounts/:accountId",
    {
      schema: {
        tags: ["accounts"],
        summary: "Get account info",
        params: accountParamsJsonSchema,
        response: {
          200: {
            type: "object",
            properties: {
              accountId: { type: "string" },
              customerName: { type: "string" },
              balance: { type: "number" },
              createdAt: { type: "string" },
              recentTransactions: { type: "array", items: transactionJsonSchema },
              accumulatedInterest: { type: "number" }
            },
            required: [
              "accountId",
              "customerName",
              "balance",
              "createdAt",
              "recentTransactions",
              "accumulatedInterest"
            ]
          }
        }
      }
    },
    async (request) => {
      const params = accountParamsSchema.parse(request.params);
      return controller.getAccountInfo(params.accountId);
    }
  );

  app.post(
    "/accounts/:accountId/deposit",
    {
      schema: {
        tags: ["accounts"],
        summary: "Deposit funds",
        params: accountParamsJsonSchema,
        body: amountBodyJsonSchema,
        response: { 200: balanceJsonSchema }
      }
    },
    async (request, reply) => {
      const params = accountParamsSchema.parse(request.params);
      const body = amountBodySchema.parse(request.body);
      return controller.deposit(params.accountId, body.amount, {
        signal: clientAbortSignal(reply)
      });
    }
  );

  app.post(
    "/accounts/:accountId/withdrawal",
    {
      schema: {
        tags: ["accounts"],
        summary: "Withdraw funds",
        params: accountParamsJsonSchema,
        body: amountBodyJsonSchema,
        response: { 200: balanceJsonSchema }
      }
    },
    async (request, reply) => {
      const params = accountParamsSchema.parse(request.params);
      const body = amountBodySchema.parse(request.body);
      return controller.withdraw(params.accountId, body.amount, {
        signal: clientAbortSignal(reply)
      });
    }
  );

  app.get(
    "/accounts/:accountId/interest-history",
    {
      schema: {
        tags: ["interest"],
        summary: "Interest history",
        params: accountParamsJsonSchema,
        response: {
          200: {
            type: "array",
            items: {
              type: "object",
              properties: {
                id: { type: "integer" },
                accountId: { type: "string" },
                interestRate: { type: "number" },
                calculatedInterest: { type: "number" },
                calculationDate: { type: "string" },
                transactionId: { type: "integer" }
              },
              required: [
                "id",
                "accountId",
                "interestRate",
                "calculatedInterest",
                "calculationDate",
                "transactionId"
              ]
            }
          }
        }
      }
    },
    async (request) => {
      const params = accountParamsSchema.parse(request.params);
      return controller.interestHistory(params.accountId);
    }
  );

  app.get(
    "/accounts/:accountId/reconciliation",
    {
      schema: {
        tags: ["accounts"],
        summary: "Reconcile balance against history",
        params: accountParamsJsonSchema,
        response: {
          200: {
            type: "object",
            properties: {
              accountId: { type: "string" },
              balance: { type: "number" },
              expectedBalance: { type: "number" },
              transactionCount: { type: "integer" },
              consistent: { type: "boolean" }
            },
            required: ["accountId", "balance", "expectedBalance", "transactionCount", "consistent"]
          }
        }
      }
    },
    async (request) => {
      const params = accountParamsSchema.parse(request.params);
      return controller.reconcile(params.accountId);
    }
  );
}
