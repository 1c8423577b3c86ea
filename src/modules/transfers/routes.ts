import { FastifyInstance } from "fastify";
import { clientAbortSignal } from "../../common/http";
import { TransfersController } from "./controller";
import { transferBodySchema } from "./schemas";

export function registerTransfersRoutes(app: FastifyInstance, controller: TransfersController) {
  app.post(
    "/transfers",
    {
      schema: {
        tags: ["transfers"],
        summary: "Transfer funds between accounts",
        body: {
          type: "object",
          properties: {
            fromAccountId: { type: "string" },
            toAccountId: { type: "string" },
            amount: { type: "number" }
          },
          required: ["fromAccountId", "toAccountId", "amount"]
        },
        response: {
          200: {
            type: "object",
            properties: {
              transferId: { type: "string" },
              fromAccountId: { type: "string" },
              toAccountId: { type: "string" },
              amount: { type: "number" },
              fromBalance: { type: "number" },
              toBalance: { type: "number" },
              timestamp: { type: "string" }
            },
            required: [
              "transferId",
              "fromAccountId",
              "toAccountId",
              "amount",
              "fromBalance",
              "toBalance",
              "timestamp"
            ]
          }
        }
      }
    },
    async (request, reply) => {
      const body = transferBodySchema.parse(request.body);
      return controller.transfer(body, { signal: clientAbortSignal(reply) });
    }
  );
}
