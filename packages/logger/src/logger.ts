/**
 * Creates structured pino loggers: pretty-printed in development, JSON elsewhere.
 */

import pino, { type Logger as PinoLogger } from "pino";
import { REDACT_PATHS, redactRecord } from "./pii-redactor.js";

/**
 * Re-export the Pino Logger type so consumers do not need a direct pino dependency.
 */
export type Logger = PinoLogger;

export interface CreateLoggerOptions {
  /** Log level (defaults to "info", or "debug" when NODE_ENV is "development"). "silent" disables output. */
  level?: string;
  /** Logical service / component name attached to every log line. */
  service?: string;
  /**
   * Deployment environment, normally `AppConfig.nodeEnv`. Falls back to
   * `process.env.NODE_ENV` when omitted.
   */
  nodeEnv?: string;
  /** Write to this stream instead of stdout. Ignored in development, where pino-pretty owns output. */
  destination?: pino.DestinationStream;
}

function isDevelopment(nodeEnv: string | undefined): boolean {
  return (nodeEnv ?? process.env["NODE_ENV"]) === "development";
}

function buildTransport(development: boolean): pino.TransportSingleOptions | undefined {
  if (development) {
    return {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
  }
  return undefined;
}

export function createLogger(options?: CreateLoggerOptions): Logger {
  const development = isDevelopment(options?.nodeEnv);
  const level = options?.level ?? (development ? "debug" : "info");
  const service = options?.service ?? "docdigest";

  const transport = buildTransport(development);

  const pinoOptions: pino.LoggerOptions = {
    level,
    name: service,
    redact: {
      paths: REDACT_PATHS,
      censor: "[REDACTED]",
    },
    formatters: {
      log: redactRecord,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (transport) {
    return pino({ ...pinoOptions, transport });
  }
  return options?.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions);
}

/**
 * Create a child logger that adds scoped bindings (e.g. `requestId`, `component`)
 * to every line.
 */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}
