import { reportDiagnosticsError } from "../core/diagnostics/index.js";
import type { Level } from "../core/level/index.js";
import type { LoggingRuntime } from "../core/runtime.js";
import type { LeveledBackend } from "../core/types.js";

export type LogArgs = unknown[];

/**
 * Turns one level-method call into a delivery. The promise settles once the
 * backend has taken the record.
 */
export interface LogWriter {
  write(
    level: Level,
    extraCalldepth: number,
    template: string | undefined,
    args: LogArgs,
  ): Promise<void>;
}

export type LogWriteFunction = (
  level: Level,
  extraCalldepth: number,
  template: string | undefined,
  args: LogArgs,
) => Promise<void> | void;

export function createWriter(write: LogWriteFunction): LogWriter {
  return {
    async write(level, extraCalldepth, template, args): Promise<void> {
      await write(level, extraCalldepth, template, args);
    },
  } satisfies LogWriter;
}

export interface WriterTarget {
  readonly module: string;
  readonly backend: LeveledBackend | undefined;
}

// Level methods sit one frame above the writer.
const BASE_CALLDEPTH = 2;

/**
 * Writes records of `target.module` to the target's own backend, or to the
 * runtime's current default backend when it has none.
 */
export function createDefaultWriter(
  runtime: LoggingRuntime,
  target: WriterTarget,
): LogWriter {
  return createWriter((level, extraCalldepth, template, args) => {
    const backend = target.backend ?? runtime.getBackend();
    if (!backend.isEnabledFor(level, target.module)) {
      return undefined;
    }

    const record = runtime.newRecord(target.module, level, template, args);
    return backend
      .log(level, BASE_CALLDEPTH + extraCalldepth, record)
      .catch((error: unknown) => {
        reportDiagnosticsError(runtime.diagnostics("logger"), "log delivery failed", {
          module: target.module,
          level,
          error,
        });
      });
  });
}
