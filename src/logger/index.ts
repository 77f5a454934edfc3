import { basename } from "node:path";
import process from "node:process";

import type { Level } from "../core/level/index.js";
import type { LoggingRuntime } from "../core/runtime.js";
import type { LeveledBackend } from "../core/types.js";
import { BasicLogger, type LevelMethods } from "./basic.js";
import { createDefaultWriter, type LogArgs, type WriterTarget } from "./writer.js";

export interface Logger extends LevelMethods {
  readonly module: string;
  readonly backend: LeveledBackend | undefined;
  isEnabledFor(level: Level): boolean;
  setBackend(backend: LeveledBackend): void;
  fatal(...args: LogArgs): Promise<never>;
  fatalf(template: string, ...args: LogArgs): Promise<never>;
  panic(...args: LogArgs): never;
  panicf(template: string, ...args: LogArgs): never;
}

class LoggerBinding implements WriterTarget {
  public backend: LeveledBackend | undefined;

  public constructor(public readonly module: string) {}
}

/**
 * Named logger of a runtime. Writes go to its own backend once one is set,
 * otherwise to whatever the runtime's default backend is at call time.
 */
export class ModuleLogger extends BasicLogger implements Logger {
  private readonly runtime: LoggingRuntime;
  private readonly binding: LoggerBinding;

  public constructor(runtime: LoggingRuntime, module: string) {
    const binding = new LoggerBinding(module);
    super(createDefaultWriter(runtime, binding), {
      diagnostics: runtime.diagnostics("logger"),
      exit: (code) => runtime.exit(code),
    });
    this.runtime = runtime;
    this.binding = binding;
  }

  public get module(): string {
    return this.binding.module;
  }

  public get backend(): LeveledBackend | undefined {
    return this.binding.backend;
  }

  public setBackend(backend: LeveledBackend): void {
    this.binding.backend = backend;
  }

  public isEnabledFor(level: Level): boolean {
    return targetBackend(this.runtime, this).isEnabledFor(level, this.module);
  }
}

/**
 * Sets `module`'s threshold on the logger's own backend, or on the runtime's
 * default backend when the logger has none.
 */
export function setLogLevel(
  runtime: LoggingRuntime,
  logger: Pick<Logger, "backend">,
  level: Level,
  module: string,
): void {
  targetBackend(runtime, logger).setLevel(level, module);
}

export function getLogLevel(
  runtime: LoggingRuntime,
  logger: Pick<Logger, "backend">,
  module: string,
): Level {
  return targetBackend(runtime, logger).getLevel(module);
}

/**
 * Module name of the running program: the base name of the entry script.
 */
export function programModuleName(
  argv: readonly string[] = process.argv,
): string {
  return basename(argv[1] ?? argv[0] ?? process.argv0);
}

function targetBackend(
  runtime: LoggingRuntime,
  logger: Pick<Logger, "backend">,
): LeveledBackend {
  return logger.backend ?? runtime.getBackend();
}

export {
  BasicLogger,
  LoggerPanicError,
  type BasicLoggerOptions,
  type LevelMethods,
} from "./basic.js";
export { LogPrefix, withPrefix } from "./prefix.js";
export {
  createDefaultWriter,
  createWriter,
  type LogArgs,
  type LogWriteFunction,
  type LogWriter,
  type WriterTarget,
} from "./writer.js";
