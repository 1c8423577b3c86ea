import Fastify, { type FastifyInstance } from "fastify";
import rateLimit from "@fastify/rate-limit";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";
import type { SwaggerOptions } from "@fastify/swagger";
import type { FastifySwaggerUiOptions } from "@fastify/swagger-ui";
import { ZodError } from "zod";
import { AppError } from "./common/errors";
import { openapiDocument } from "./common/openapi";
import { ContainerOptions, createContainer } from "./di";
import { registerAccountsRoutes } from "./modules/accounts/routes";
import { registerInterestRoutes } from "./modules/interest/routes";
import { registerTransfersRoutes } from "./modules/transfers/routes";
import { config } from "./config";
import { closePool, getPool } from "./infra/postgres/pool";

export interface AppOptions extends Omit<ContainerOptions, "logger"> {
  scheduleInterest?: boolean;
}

type ClientError = { statusCode: number; code?: unknown; message: string; validation?: unknown };

function asClientError(error: unknown): ClientError | null {
  if (
    error instanceof Error &&
    "statusCode" in error &&
    typeof error.statusCode === "number" &&
    error.statusCode >= 400 &&
    error.statusCode < 500
  ) {
    return {
      statusCode: error.statusCode,
      code: "code" in error ? error.code : undefined,
      message: error.message,
      validation: "validation" in error ? error.validation : undefined
    };
  }
  return null;
}

export function buildApp(options: AppOptions = {}): FastifyInstance {
  const app = Fastify({
    logger: config.NODE_ENV === "test" ? false : { level: config.LOG_LEVEL },
    bodyLimit: config.BODY_LIMIT_BYTES,
    maxParamLength: config.MAX_PARAM_LENGTH,
    connectionTimeout: config.REQUEST_TIMEOUT_MS,
    requestTimeout: config.REQUEST_TIMEOUT_MS
  });
  const usesPool = !options.store && config.REPO_PROVIDER === "postgres";
  const container = createContainer({ ...options, logger: app.log });

  app.addHook("onRequest", async (request, reply) => {
    reply.header("x-request-id", request.id);
  });

  app.register(rateLimit, {
    max: config.RATE_LIMIT_MAX,
    timeWindow: config.RATE_LIMIT_WINDOW_MS,
    addHeaders: {
      "x-ratelimit-limit": true,
      "x-ratelimit-remaining": true,
      "x-ratelimit-reset": true
    }
  });

  const swaggerOptions: SwaggerOptions = {
    mode: "static",
    specification: {
      document: openapiDocument
    }
  };

  const swaggerUiOptions: FastifySwaggerUiOptions = {
    routePrefix: "/docs",
    uiConfig: {
      docExpansion: "list",
      url: "/docs/json"
    }
  };

  app.register(swagger, swaggerOptions);
  app.register(swaggerUi, swaggerUiOptions);

  app.get("/health", async () => ({ status: "ok" }));

  app.get("/health/db", async () => {
    if (!usesPool) {
      return { status: "skipped" };
    }
    try {
      const pool = getPool();
      const start = Date.now();
      await pool.query("SELECT 1");
      return {
        status: "ok",
        latency: Date.now() - start,
        pool: {
          totalCount: pool.totalCount,
          idleCount: pool.idleCount,
          waitingCount: pool.waitingCount
        }
      };
    } catch (error) {
      app.log.error({ err: error }, "Database health check failed");
      return { status: "down" };
    }
  });

  registerAccountsRoutes(app, container.accountsController);
  registerTransfersRoutes(app, container.transfersController);
  registerInterestRoutes(app, container.interestController);

  app.setErrorHandler((error: unknown, request, reply) => {
    if (error instanceof AppError) {
      if (error.status >= 500) {
        request.log.error({ err: error, cause: error.cause }, "Storage error");
      }
      return reply
        .status(error.status)
        .send({ error: error.code, message: error.message });
    }

    if (error instanceof ZodError) {
      const issues = error.issues.map((issue) => ({
        path: issue.path.join("."),
        code: issue.code,
        message: issue.message
      }));

      const amountIssue = error.issues.find(
        (issue) => issue.path.includes("amount") && issue.code === "too_small"
      );

      if (amountIssue) {
        return reply.status(400).send({
          error: "INVALID_AMOUNT",
          message: "Amount must be greater than zero",
          details: issues
        });
      }

      return reply.status(400).send({
        error: "INVALID_REQUEST",
        message: "Validation failed",
        details: issues
      });
    }

    const clientError = asClientError(error);
    if (clientError) {
      const code =
        clientError.validation !== undefined
          ? "INVALID_REQUEST"
          : clientError.statusCode === 429
            ? "RATE_LIMITED"
            : typeof clientError.code === "string"
              ? clientError.code
              : "BAD_REQUEST";
      return reply
        .status(clientError.statusCode)
        .send({ error: code, message: clientError.message });
    }

    const err = error instanceof Error ? error : new Error("Unknown error");
    request.log.error({ err }, "Unhandled error");
    return reply.status(500).send({
      error: "INTERNAL_SERVER_ERROR",
      message: "Unexpected error"
    });
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      error: "NOT_FOUND",
      message: `Route ${request.method} ${request.url} not found`
    });
  });

  const { scheduleInterest = config.INTEREST_SCHEDULE_ENABLED } = options;
  if (scheduleInterest) {
    app.addHook("onReady", async () => {
      container.interestScheduler.start();
    });
  }

  app.addHook("onClose", async () => {
    await container.interestScheduler.stop();
    container.mutexMap.destroy();
    if (usesPool) {
      await closePool();
    }
  });

  return app;
}
