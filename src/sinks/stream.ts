import { once } from "node:events";

import type { Level } from "../core/level/index.js";
import { sprint, type LogRecord } from "../core/record/index.js";
import type { Sink } from "../core/types.js";

export interface LineStream extends NodeJS.EventEmitter {
  write(chunk: string): boolean;
}

export interface StreamSinkOptions {
  readonly eol?: string;
}

/**
 * Writes formatted lines to a stream, waiting for `drain` whenever the
 * stream signals backpressure.
 */
export function createStreamSink(
  stream: LineStream,
  options: StreamSinkOptions = {},
): Sink {
  const eol = options.eol ?? "\n";

  const write = async (line: string): Promise<void> => {
    if (!stream.write(`${line}${eol}`)) {
      await once(stream, "drain");
    }
  };

  return {
    async log(_level: Level, calldepth: number, record: LogRecord): Promise<void> {
      await write(record.formatted(calldepth + 1));
    },
    async print(...args: unknown[]): Promise<void> {
      await write(sprint(args));
    },
  } satisfies Sink;
}
