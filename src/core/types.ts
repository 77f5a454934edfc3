import type { Level } from "./level/index.js";
import type { LogRecord } from "./record/index.js";

export type LogMetadata = Record<string, unknown>;

export type Clock = () => Date;

export interface Sink {
  log(level: Level, calldepth: number, record: LogRecord): Promise<void> | void;
  print?(...args: unknown[]): Promise<void> | void;
  close?(): Promise<void> | void;
  getDiagnostics?(): SinkDiagnostics;
}

export interface LeveledBackend {
  log(level: Level, calldepth: number, record: LogRecord): Promise<void>;
  isEnabledFor(level: Level, module: string): boolean;
  setLevel(level: Level, module: string): void;
  getLevel(module: string): Level;
}

export interface SinkDiagnostics {
  readonly isHealthy: boolean;
  readonly details?: Record<string, unknown>;
}

export interface FormatterOutput {
  write(chunk: string): void;
}

export interface Formatter {
  format(calldepth: number, record: LogRecord, output: FormatterOutput): void;
}

export interface DiagnosticsLogger {
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, metadata?: LogMetadata): void;
}

export interface Redactable {
  redacted(): unknown;
}
