import type { OpenAPIV3 } from "openapi-types";

function json(ref: string): NonNullable<OpenAPIV3.ResponseObject["content"]> {
  return { "application/json": { schema: { $ref: `#/components/schemas/${ref}` } } };
}

function ok(ref: string): OpenAPIV3.ResponsesObject {
  return {
    "200": { description: "OK", content: json(ref) },
    "400": { description: "Invalid request", content: json("Error") },
    "404": { description: "Account not found", content: json("Error") },
    "503": { description: "Storage timeout", content: json("Error") }
  };
}

const accountId: OpenAPIV3.ParameterObject = {
  name: "accountId",
  in: "path",
  required: true,
  schema: { type: "string", pattern: "^[A-Za-z0-9_-]+$", maxLength: 64 }
};

export const openapiDocument: OpenAPIV3.Document = {
  openapi: "3.0.3",
  info: {
    title: "Ledger Engine API",
    description: "Accounts, transfers and daily interest over a double-entry ledger",
    version: "1.0.0"
  },
  paths: {
    "/health": {
      get: {
        summary: "Health check",
        responses: { "200": { description: "OK", content: json("Health") } }
      }
    },
    "/accounts/{accountId}": {
      get: {
        summary: "Account info with recent transactions",
        parameters: [accountId],
        responses: ok("AccountInfo")
      }
    },
    "/accounts/{accountId}/deposit": {
      post: {
        summary: "Deposit funds",
        parameters: [accountId],
        requestBody: { required: true, content: json("AmountBody") },
        responses: ok("Balance")
      }
    },
    "/accounts/{accountId}/withdrawal": {
      post: {
        summary: "Withdraw funds",
        parameters: [accountId],
        requestBody: { required: true, content: json("AmountBody") },
        responses: ok("Balance")
      }
    },
    "/accounts/{accountId}/interest-history": {
      get: {
        summary: "Interest records, newest first",
        parameters: [accountId],
        responses: {
          "200": {
            description: "OK",
            content: {
              "application/json": {
                schema: { type: "array", items: { $ref: "#/components/schemas/InterestRecord" } }
              }
            }
          },
          "404": { description: "Account not found", content: json("Error") }
        }
      }
    },
    "/accounts/{accountId}/reconciliation": {
      get: {
        summary: "Compare the stored balance with the transaction history",
        parameters: [accountId],
        responses: ok("Reconciliation")
      }
    },
    "/transfers": {
      post: {
        summary: "Transfer funds between two accounts",
        requestBody: { required: true, content: json("TransferBody") },
        responses: ok("Transfer")
      }
    },
    "/interest/calculate": {
      post: {
        summary: "Accrue one day of interest on every account",
        responses: { "200": { description: "OK", content: json("AccrualSummary") } }
      }
    }
  },
  components: {
    schemas: {
      Health: {
        type: "object",
        properties: { status: { type: "string" } },
        required: ["status"]
      },
      Error: {
        type: "object",
        properties: {
          error: { type: "string" },
          message: { type: "string" }
        },
        required: ["error", "message"]
      },
      AmountBody: {
        type: "object",
        properties: { amount: { type: "number", exclusiveMinimum: true, minimum: 0 } },
        required: ["amount"]
      },
      TransferBody: {
        type: "object",
        properties: {
          fromAccountId: { type: "string" },
          toAccountId: { type: "string" },
          amount: { type: "number", exclusiveMinimum: true, minimum: 0 }
        },
        required: ["fromAccountId", "toAccountId", "amount"]
      },
      Transaction: {
        type: "object",
        properties: {
          transactionId: { type: "integer" },
          accountId: { type: "string" },
          type: { type: "string", enum: ["DEPOSIT", "WITHDRAWAL", "TRANSFER_IN", "TRANSFER_OUT"] },
          amount: { type: "number" },
          balanceAfter: { type: "number" },
          timestamp: { type: "string", format: "date-time" },
          description: { type: "string" },
          transferId: { type: "string", nullable: true }
        },
        required: ["transactionId", "accountId", "type", "amount", "balanceAfter", "timestamp"]
      },
      AccountInfo: {
        type: "object",
        properties: {
          accountId: { type: "string" },
          customerName: { type: "string" },
          balance: { type: "number" },
          createdAt: { type: "string", format: "date-time" },
          recentTransactions: {
            type: "array",
            items: { $ref: "#/components/schemas/Transaction" }
          },
          accumulatedInterest: { type: "number" }
        },
        required: ["accountId", "customerName", "balance", "recentTransactions"]
      },
      Balance: {
        type: "object",
        properties: {
          accountId: { type: "string" },
          balance: { type: "number" },
          transactionId: { type: "integer" }
        },
        required: ["accountId", "balance", "transactionId"]
      },
      Transfer: {
        type: "object",
        properties: {
          transferId: { type: "string", format: "uuid" },
          fromAccountId: { type: "string" },
          toAccountId: { type: "string" },
          amount: { type: "number" },
          fromBalance: { type: "number" },
          toBalance: { type: "number" },
          timestamp: { type: "string", format: "date-time" }
        },
        required: ["transferId", "fromAccountId", "toAccountId", "amount"]
      },
      InterestRecord: {
        type: "object",
        properties: {
          id: { type: "integer" },
          accountId: { type: "string" },
          interestRate: { type: "number" },
          calculatedInterest: { type: "number" },
          calculationDate: { type: "string", format: "date" },
          transactionId: { type: "integer" }
        },
        required: ["id", "accountId", "interestRate", "calculatedInterest", "calculationDate"]
      },
      AccrualSummary: {
        type: "object",
        properties: {
          calculationDate: { type: "string", format: "date" },
          interestRate: { type: "number" },
          accountsProcessed: { type: "integer" },
          accountsCredited: { type: "integer" },
          totalInterest: { type: "number" },
          skipped: { type: "integer" },
          alreadyAccrued: { type: "integer" },
          failed: { type: "integer" }
        },
        required: ["calculationDate", "accountsProcessed", "totalInterest"]
      },
      Reconciliation: {
        type: "object",
        properties: {
          accountId: { type: "string" },
          balance: { type: "number" },
          expectedBalance: { type: "number" },
          transactionCount: { type: "integer" },
          consistent: { type: "boolean" }
        },
        required: ["accountId", "balance", "expectedBalance", "consistent"]
      }
    }
  }
};
