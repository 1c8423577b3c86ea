import type { FastifyReply } from "fastify";

/**
 * Aborts when the client goes away before the response is written, so a
 * mutation still waiting on its lock or its unit is rolled back.
 */
export function clientAbortSignal(reply: FastifyReply): AbortSignal {
  const controller = new AbortController();
  reply.raw.once("close", () => {
    if (!reply.raw.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
}
