import type { Logger as PinoLogger } from "pino";

import { Level } from "../core/level/index.js";
import { sprint, type LogRecord } from "../core/record/index.js";
import type { Sink } from "../core/types.js";

type PinoMethod = "fatal" | "error" | "warn" | "info" | "debug";

const PINO_METHODS: Record<Level, PinoMethod> = {
  [Level.CRITICAL]: "fatal",
  [Level.ERROR]: "error",
  [Level.WARNING]: "warn",
  [Level.NOTICE]: "info",
  [Level.INFO]: "info",
  [Level.DEBUG]: "debug",
};

export function pinoMethodFor(level: Level): PinoMethod {
  return PINO_METHODS[level];
}

/**
 * Forwards records to a pino logger, keeping the record sequence number and
 * module as bindings.
 */
export function createPinoSink(logger: PinoLogger): Sink {
  return {
    log(level: Level, _calldepth: number, record: LogRecord): void {
      const data = record.data();
      logger[pinoMethodFor(level)](
        { seq: data.id, module: data.module },
        data.message,
      );
    },
    print(...args: unknown[]): void {
      logger.info(sprint(args));
    },
    async close(): Promise<void> {
      await new Promise<void>((resolve, reject) => {
        logger.flush((error) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        });
      });
    },
  } satisfies Sink;
}
