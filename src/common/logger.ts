import pino from "pino";

type LogFn = (context: object, message?: string) => void;

/**
 * The slice of a pino logger the services use. Fastify's `app.log` and a
 * standalone `pino()` instance both satisfy it.
 */
export type LoggerLike = {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
};

export function createLogger(level: string, name = "ledger-engine"): LoggerLike {
  return pino({
    name,
    level,
    serializers: { err: pino.stdSerializers.err },
    formatters: {
      level: (label) => ({ level: label })
    }
  });
}

export const silentLogger: LoggerLike = pino({ level: "silent" });
