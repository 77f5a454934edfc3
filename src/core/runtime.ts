import process from "node:process";
import pino, {
  type Logger as PinoLogger,
  type LoggerOptions as PinoLoggerOptions,
} from "pino";

import { addModuleLevel, LeveledBackendProxy } from "./backend/index.js";
import type { DeliverySink } from "./delivery/index.js";
import {
  createDiagnosticsLogger,
  buildSinkHealthSnapshot,
  scopeDiagnosticsLogger,
  type DiagnosticsSubsystem,
  type SinkHealthSnapshot,
} from "./diagnostics/index.js";
import { createTextFormatter } from "./formatter/index.js";
import { Level } from "./level/index.js";
import { MultiSink } from "./multi-sink/index.js";
import { LogRecord, SequenceCounter } from "./record/index.js";
import { SinkCache } from "./sink-cache/index.js";
import type {
  Clock,
  DiagnosticsLogger,
  Formatter,
  LeveledBackend,
  Sink,
} from "./types.js";
import {
  ModuleLogger,
  programModuleName,
  type Logger,
} from "../logger/index.js";
import { createStreamSink, type LineStream } from "../sinks/stream.js";

export interface CreateLoggingRuntimeOptions {
  readonly logger?: PinoLogger;
  readonly pinoOptions?: PinoLoggerOptions;
  readonly diagnostics?: DiagnosticsLogger;
  readonly clock?: Clock;
  readonly formatter?: Formatter;
  readonly sinks?: readonly Sink[];
  readonly defaultLevel?: Level;
  readonly stream?: LineStream;
  readonly exit?: (code: number) => never;
}

/**
 * Process-level logging state: record sequence, clock, formatter, the default
 * backend, the file sink cache and the logger registry. Created once by the
 * entry point and passed to whatever needs it.
 */
export interface LoggingRuntime {
  readonly sequence: SequenceCounter;
  readonly fileSinks: SinkCache<DeliverySink>;
  now(): Date;
  setClock(clock: Clock): void;
  setFormatter(formatter: Formatter): void;
  newRecord(
    module: string,
    level: Level,
    template: string | undefined,
    args: unknown[],
  ): LogRecord;
  getBackend(): LeveledBackend;
  setBackend(...sinks: Sink[]): LeveledBackend;
  setLevel(level: Level, module: string): void;
  getLevel(module: string): Level;
  defaultBackendProxy(): LeveledBackend;
  getLogger(module: string): Logger;
  /** Logger named after the running program's entry script. */
  mainLogger(): Logger;
  findLogger(module: string): Logger | undefined;
  diagnostics(subsystem: DiagnosticsSubsystem): DiagnosticsLogger;
  exit(code: number): never;
  /** Health of every cached file sink. */
  health(): Promise<SinkHealthSnapshot>;
  reset(): void;
  shutdown(): Promise<void>;
}

const realClock: Clock = () => new Date();

export function createLoggingRuntime(
  options: CreateLoggingRuntimeOptions = {},
): LoggingRuntime {
  const sequence = new SequenceCounter();
  const fileSinks = new SinkCache<DeliverySink>();
  const loggers = new Map<string, Logger>();
  const stream = options.stream ?? process.stderr;
  const exit = options.exit ?? ((code: number): never => process.exit(code));
  const diagnosticsLoggers = new Map<DiagnosticsSubsystem, DiagnosticsLogger>();
  const createSubsystemDiagnostics = resolveDiagnosticsFactory(options);

  let clock = options.clock ?? realClock;
  let formatter = options.formatter ?? createTextFormatter();
  let backend = createDefaultBackend(
    options.sinks ?? [createStreamSink(stream)],
    options.defaultLevel ?? Level.DEBUG,
  );

  const getDiagnostics = (
    subsystem: DiagnosticsSubsystem,
  ): DiagnosticsLogger => {
    const cached = diagnosticsLoggers.get(subsystem);
    if (cached) {
      return cached;
    }
    const created = createSubsystemDiagnostics(subsystem);
    diagnosticsLoggers.set(subsystem, created);
    return created;
  };

  const runtime: LoggingRuntime = {
    sequence,
    fileSinks,
    now(): Date {
      return clock();
    },
    setClock(next: Clock): void {
      clock = next;
    },
    setFormatter(next: Formatter): void {
      formatter = next;
    },
    newRecord(
      module: string,
      level: Level,
      template: string | undefined,
      args: unknown[],
    ): LogRecord {
      return new LogRecord({
        id: sequence.next(),
        time: clock(),
        module,
        level,
        args,
        template,
        formatter,
      });
    },
    getBackend(): LeveledBackend {
      return backend;
    },
    setBackend(...sinks: Sink[]): LeveledBackend {
      const [first] = sinks;
      if (first === undefined) {
        throw new RangeError("setBackend requires at least one sink.");
      }
      backend = addModuleLevel(
        sinks.length === 1 ? first : new MultiSink(sinks),
      );
      return backend;
    },
    setLevel(level: Level, module: string): void {
      backend.setLevel(level, module);
    },
    getLevel(module: string): Level {
      return backend.getLevel(module);
    },
    defaultBackendProxy(): LeveledBackend {
      return new LeveledBackendProxy(() => backend);
    },
    getLogger(module: string): Logger {
      const existing = loggers.get(module);
      if (existing) {
        return existing;
      }
      const created = new ModuleLogger(runtime, module);
      loggers.set(module, created);
      return created;
    },
    mainLogger(): Logger {
      return runtime.getLogger(programModuleName());
    },
    findLogger(module: string): Logger | undefined {
      return loggers.get(module);
    },
    diagnostics: getDiagnostics,
    exit(code: number): never {
      return exit(code);
    },
    async health(): Promise<SinkHealthSnapshot> {
      return buildSinkHealthSnapshot(await fileSinks.settled());
    },
    reset(): void {
      sequence.reset();
      backend = createDefaultBackend([createStreamSink(stream)], Level.DEBUG);
      formatter = createTextFormatter();
      clock = realClock;
    },
    async shutdown(): Promise<void> {
      await fileSinks.closeAll();
    },
  };

  return runtime;
}

function createDefaultBackend(
  sinks: readonly Sink[],
  level: Level,
): LeveledBackend {
  const [first] = sinks;
  if (first === undefined) {
    throw new RangeError("A logging runtime requires at least one sink.");
  }
  const backend = addModuleLevel(
    sinks.length === 1 ? first : new MultiSink(sinks),
  );
  backend.setLevel(level, "");
  return backend;
}

function resolveDiagnosticsFactory(
  options: CreateLoggingRuntimeOptions,
): (subsystem: DiagnosticsSubsystem) => DiagnosticsLogger {
  const custom = options.diagnostics;
  if (custom) {
    return (subsystem) => scopeDiagnosticsLogger(custom, { subsystem });
  }
  const logger = initializeLogger(options.logger, options.pinoOptions);
  return (subsystem) => createDiagnosticsLogger(logger, subsystem);
}

function initializeLogger(
  providedLogger: PinoLogger | undefined,
  options: PinoLoggerOptions | undefined,
): PinoLogger {
  if (providedLogger) {
    return providedLogger;
  }

  return pino(
    {
      name: "leveled-log-core",
      level: "info",
      ...options,
    },
    pino.destination(2),
  );
}
