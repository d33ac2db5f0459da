import pino from "pino";

/**
 * Builds the structured logger shared by every package. Errors are logged
 * under `error` and serialized with their stack and cause.
 */
export function createLogger(
  level: string = process.env.LOG_LEVEL ?? "info",
  destination?: pino.DestinationStream,
): pino.Logger {
  const options: pino.LoggerOptions = {
    name: "pg-retry-rules",
    level,
    base: undefined,
    serializers: {
      error: pino.stdSerializers.err,
    },
  };
  return destination ? pino(options, destination) : pino(options);
}

export const logger = createLogger();
