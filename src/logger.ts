import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";

export type { Logger };

export function createLogger(level: string, destination?: DestinationStream): Logger {
  const options: LoggerOptions = {
    level,
    base: {
      service: "tabular-normalize",
    },
  };

  return destination ? pino(options, destination) : pino(options);
}
