import { addModuleLevel } from "../core/backend/index.js";
import { Level } from "../core/level/index.js";
import { MultiSink } from "../core/multi-sink/index.js";
import type { LoggingRuntime } from "../core/runtime.js";
import type { DiagnosticsLogger, LeveledBackend, Sink } from "../core/types.js";
import { acquireFileSink, type FileSinkOptions } from "../sinks/file.js";
import { openHttpSink, type HttpSinkOptions } from "../sinks/http.js";

export interface LoggingConfigInput {
  readonly level?: string;
  readonly modules?: readonly ModuleLoggingConfigInput[];
}

export interface ModuleLoggingConfigInput {
  readonly name: string;
  readonly level?: string;
  readonly destinations?: readonly DestinationConfigInput[];
}

export interface DestinationConfigInput {
  readonly dst: string;
  readonly options?: Readonly<Record<string, unknown>>;
}

export type DestinationConfig =
  | HttpDestinationConfig
  | FileDestinationConfig
  | DefaultDestinationConfig;

export interface HttpDestinationConfig {
  readonly kind: "http";
  readonly dst: string;
  readonly url: URL;
  readonly options: HttpSinkOptions;
}

export interface FileDestinationConfig {
  readonly kind: "file";
  readonly dst: string;
  readonly path: string;
  readonly options: FileSinkOptions;
}

export interface DefaultDestinationConfig {
  readonly kind: "default";
  readonly dst: string;
}

export interface ModuleLoggingConfig {
  readonly name: string;
  readonly level: Level | undefined;
  readonly destinations: readonly DestinationConfig[];
}

export interface LoggingConfig {
  readonly level: Level;
  readonly modules: readonly ModuleLoggingConfig[];
}

export interface ModuleSinks {
  readonly sinks: readonly Sink[];
  readonly errors: readonly DestinationError[];
}

export interface DestinationError {
  readonly module: string;
  readonly dst: string;
  readonly error: unknown;
}

export interface AppliedLoggingConfig {
  readonly config: LoggingConfig;
  readonly backends: ReadonlyMap<string, LeveledBackend>;
  readonly errors: readonly DestinationError[];
}

export class InvalidLoggingConfigError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = "InvalidLoggingConfigError";
  }
}

const LEVEL_ALIASES: Readonly<Partial<Record<string, Level>>> = {
  CRITICAL: Level.CRITICAL,
  C: Level.CRITICAL,
  ERROR: Level.ERROR,
  E: Level.ERROR,
  WARNING: Level.WARNING,
  W: Level.WARNING,
  NOTICE: Level.NOTICE,
  N: Level.NOTICE,
  INFO: Level.INFO,
  I: Level.INFO,
  DEBUG: Level.DEBUG,
  D: Level.DEBUG,
};

const DEFAULT_BACKEND_DESTINATIONS: readonly string[] = ["-", "_"];

export function lookupLevel(text: string): Level | undefined {
  return LEVEL_ALIASES[text.trim().toUpperCase()];
}

/**
 * Resolves a level name or one-letter alias, case-insensitively.
 */
export function parseLevel(text: string, fallback: Level = Level.DEBUG): Level {
  return lookupLevel(text) ?? fallback;
}

export function normalizeLoggingConfig(
  input: LoggingConfigInput = {},
): LoggingConfig {
  if (!isPlainObject(input)) {
    throw new InvalidLoggingConfigError(
      "Provide a plain object for logging configuration.",
    );
  }

  const level =
    input.level === undefined ? Level.DEBUG : requireLevel(input.level, "level");

  const modules = input.modules ?? [];
  if (!Array.isArray(modules)) {
    throw new InvalidLoggingConfigError("`modules` must be an array.");
  }

  return {
    level,
    modules: modules.map((module: unknown, index: number) =>
      normalizeModule(module, index),
    ),
  } satisfies LoggingConfig;
}

/**
 * Builds the sinks of one module. Destinations that cannot be opened are
 * skipped and returned as errors, each also reported on diagnostics.
 */
export async function buildModuleSinks(
  module: ModuleLoggingConfig,
  runtime: LoggingRuntime,
): Promise<ModuleSinks> {
  const diagnostics = runtime.diagnostics("config");
  const deliveryDiagnostics = runtime.diagnostics("delivery");
  const sinks: Sink[] = [];
  const errors: DestinationError[] = [];

  for (const destination of module.destinations) {
    try {
      sinks.push(
        await openDestination(destination, runtime, deliveryDiagnostics),
      );
    } catch (error) {
      errors.push({ module: module.name, dst: destination.dst, error });
      diagnostics.error("failed to create destination", {
        module: module.name,
        dst: destination.dst,
        error,
      });
    }
  }

  return { sinks, errors };
}

/**
 * Sets the default and per-module thresholds on the runtime's backend and
 * binds every module with destinations to its own leveled backend.
 */
export async function applyLoggingConfig(
  runtime: LoggingRuntime,
  input: LoggingConfigInput,
): Promise<AppliedLoggingConfig> {
  const config = normalizeLoggingConfig(input);
  const backends = new Map<string, LeveledBackend>();
  const errors: DestinationError[] = [];

  runtime.setLevel(config.level, "");

  for (const module of config.modules) {
    if (module.level !== undefined) {
      runtime.setLevel(module.level, module.name);
    }
    if (module.destinations.length === 0) {
      continue;
    }

    const built = await buildModuleSinks(module, runtime);
    errors.push(...built.errors);
    const [first] = built.sinks;
    if (first === undefined) {
      continue;
    }

    const backend = addModuleLevel(
      built.sinks.length === 1 ? first : new MultiSink(built.sinks),
    );
    backend.setLevel(module.level ?? config.level, "");
    runtime.getLogger(module.name).setBackend(backend);
    backends.set(module.name, backend);
  }

  return { config, backends, errors };
}

/**
 * Plain sink forwarding to whatever the runtime's default backend is at call
 * time, without exposing its threshold table.
 */
export function createDefaultBackendSink(runtime: LoggingRuntime): Sink {
  const proxy = runtime.defaultBackendProxy();
  return {
    log: (level, calldepth, record) => proxy.log(level, calldepth + 1, record),
  } satisfies Sink;
}

async function openDestination(
  destination: DestinationConfig,
  runtime: LoggingRuntime,
  diagnostics: DiagnosticsLogger,
): Promise<Sink> {
  switch (destination.kind) {
    case "http":
      return openHttpSink(destination.url, destination.options, diagnostics);
    case "default":
      return createDefaultBackendSink(runtime);
    case "file":
      return acquireFileSink(
        runtime.fileSinks,
        destination.path,
        destination.options,
        diagnostics,
      );
  }
}

function normalizeModule(value: unknown, index: number): ModuleLoggingConfig {
  if (!isPlainObject(value)) {
    throw new InvalidLoggingConfigError(
      `Module at index ${index} must be a plain object.`,
    );
  }

  const { name, level, destinations } = value;
  if (typeof name !== "string") {
    throw new InvalidLoggingConfigError(
      `Module at index ${index} must define a string name.`,
    );
  }

  const destinationList = destinations ?? [];
  if (!Array.isArray(destinationList)) {
    throw new InvalidLoggingConfigError(
      `Module "${name}" must define destinations as an array.`,
    );
  }

  return {
    name,
    level:
      level === undefined
        ? undefined
        : requireLevel(level, `modules[${index}].level`),
    destinations: destinationList.map(
      (destination: unknown, position: number) =>
        normalizeDestination(destination, name, position),
    ),
  } satisfies ModuleLoggingConfig;
}

function normalizeDestination(
  value: unknown,
  module: string,
  index: number,
): DestinationConfig {
  const where = `Destination #${index} of module "${module}"`;
  if (!isPlainObject(value)) {
    throw new InvalidLoggingConfigError(`${where} must be a plain object.`);
  }

  const { dst, options } = value;
  if (typeof dst !== "string" || dst.length === 0) {
    throw new InvalidLoggingConfigError(
      `${where} must define a non-empty dst.`,
    );
  }

  const rawOptions = options ?? {};
  if (!isPlainObject(rawOptions)) {
    throw new InvalidLoggingConfigError(`${where} options must be an object.`);
  }

  if (dst.startsWith("http:") || dst.startsWith("https:")) {
    let url: URL;
    try {
      url = new URL(dst);
    } catch (error) {
      throw new InvalidLoggingConfigError(
        `${where} has an invalid URL: ${describeError(error)}`,
      );
    }
    return {
      kind: "http",
      dst,
      url,
      options: decodeHttpOptions(rawOptions, where),
    };
  }

  if (DEFAULT_BACKEND_DESTINATIONS.includes(dst)) {
    return { kind: "default", dst };
  }

  return {
    kind: "file",
    dst,
    path: dst,
    options: decodeFileOptions(rawOptions, where),
  };
}

function decodeHttpOptions(
  options: Record<PropertyKey, unknown>,
  where: string,
): HttpSinkOptions {
  const timeout = optionalNumber(options.timeout, `${where} timeout`);
  return {
    async: optionalBoolean(options.async, `${where} async`) ?? true,
    insecure: optionalBoolean(options.insecure, `${where} insecure`) ?? false,
    httpGet: optionalBoolean(options.httpGet, `${where} httpGet`) ?? false,
    formatted: optionalBoolean(options.formatted, `${where} formatted`) ?? false,
    ...(timeout !== undefined ? { timeout } : {}),
  } satisfies HttpSinkOptions;
}

function decodeFileOptions(
  options: Record<PropertyKey, unknown>,
  where: string,
): FileSinkOptions {
  const mode = optionalNumber(options.perm ?? options.mode, `${where} perm`);
  return {
    async: optionalBoolean(options.async, `${where} async`) ?? true,
    truncate: optionalBoolean(options.truncate, `${where} truncate`) ?? false,
    ...(mode !== undefined ? { mode } : {}),
  } satisfies FileSinkOptions;
}

function requireLevel(value: unknown, field: string): Level {
  const level = typeof value === "string" ? lookupLevel(value) : undefined;
  if (level === undefined) {
    throw new InvalidLoggingConfigError(
      `Unknown log level for ${field}: ${String(value)}`,
    );
  }
  return level;
}

function optionalBoolean(value: unknown, field: string): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "boolean") {
    throw new InvalidLoggingConfigError(`${field} must be a boolean.`);
  }
  return value;
}

function optionalNumber(value: unknown, field: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
    throw new InvalidLoggingConfigError(
      `${field} must be a non-negative number.`,
    );
  }
  return value;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isPlainObject(value: unknown): value is Record<PropertyKey, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
