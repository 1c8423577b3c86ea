import { FastifyInstance } from "fastify";
import { InterestController } from "./controller";

export function registerInterestRoutes(app: FastifyInstance, controller: InterestController) {
  app.post(
    "/interest/calculate",
    {
      schema: {
        tags: ["interest"],
        summary: "Accrue daily interest for every account",
        response: {
          200: {
            type: "object",
            properties: {
              calculationDate: { type: "string" },
              interestRate: { type: "number" },
              accountsProcessed: { type: "integer" },
              accountsCredited: { type: "integer" },
              totalInterest: { type: "number" },
              skipped: { type: "integer" },
              alreadyAccrued: { type: "integer" },
              failed: { type: "integer" }
            },
            required: [
              "calculationDate",
              "interestRate",
              "accountsProcessed",
              "accountsCredited",
              "totalInterest",
              "skipped",
              "alreadyAccrued",
              "failed"
            ]
          }
        }
      }
    },
    async () => controller.accrue()
  );
}
