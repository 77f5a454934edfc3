import process from "node:process";

import { levelName } from "../level/index.js";
import type { LogRecord } from "../record/index.js";
import type { Formatter, FormatterOutput } from "../types.js";

export interface TextFormatterOptions {
  readonly pid?: boolean;
}

/**
 * Renders `<ISO time>[ <pid>] <LEVEL> [<module>]: <message>`, the level
 * shortened to four letters.
 */
export function createTextFormatter(
  options: TextFormatterOptions = {},
): Formatter {
  const pid = options.pid === true ? ` ${process.pid}` : "";

  return {
    format(_calldepth: number, record: LogRecord, output: FormatterOutput): void {
      const level = levelName(record.level).slice(0, 4);
      output.write(
        `${record.time.toISOString()}${pid} ${level} [${record.module}]: ${record.message()}`,
      );
    },
  } satisfies Formatter;
}
