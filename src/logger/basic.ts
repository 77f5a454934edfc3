import process from "node:process";

import { reportDiagnosticsError } from "../core/diagnostics/index.js";
import { Level } from "../core/level/index.js";
import { redactArgs, renderMessage } from "../core/record/index.js";
import type { DiagnosticsLogger } from "../core/types.js";
import type { LogArgs, LogWriter } from "./writer.js";

export interface LevelMethods {
  critical(...args: LogArgs): void;
  criticalf(template: string, ...args: LogArgs): void;
  error(...args: LogArgs): void;
  errorf(template: string, ...args: LogArgs): void;
  warning(...args: LogArgs): void;
  warningf(template: string, ...args: LogArgs): void;
  notice(...args: LogArgs): void;
  noticef(template: string, ...args: LogArgs): void;
  info(...args: LogArgs): void;
  infof(template: string, ...args: LogArgs): void;
  debug(...args: LogArgs): void;
  debugf(template: string, ...args: LogArgs): void;
}

export class LoggerPanicError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = "LoggerPanicError";
  }
}

export interface BasicLoggerOptions {
  /** Receives writes that fail. */
  readonly diagnostics: DiagnosticsLogger;
  readonly exit?: (code: number) => never;
}

/**
 * Leveled façade over any {@link LogWriter}.
 */
export class BasicLogger implements LevelMethods {
  public extraCalldepth = 0;

  public readonly writer: LogWriter;

  private readonly diagnostics: DiagnosticsLogger;
  private readonly exit: (code: number) => never;

  public constructor(writer: LogWriter, options: BasicLoggerOptions) {
    this.writer = writer;
    this.diagnostics = options.diagnostics;
    this.exit = options.exit ?? ((code: number): never => process.exit(code));
  }

  /** Logs at CRITICAL, waits for delivery, then exits with status 1. */
  public async fatal(...args: LogArgs): Promise<never> {
    await this.write(Level.CRITICAL, undefined, args);
    return this.exit(1);
  }

  public async fatalf(template: string, ...args: LogArgs): Promise<never> {
    await this.write(Level.CRITICAL, template, args);
    return this.exit(1);
  }

  /** Logs at CRITICAL, then throws {@link LoggerPanicError}. */
  public panic(...args: LogArgs): never {
    throw this.panicWith(undefined, args);
  }

  public panicf(template: string, ...args: LogArgs): never {
    throw this.panicWith(template, args);
  }

  public critical(...args: LogArgs): void {
    void this.write(Level.CRITICAL, undefined, args);
  }

  public criticalf(template: string, ...args: LogArgs): void {
    void this.write(Level.CRITICAL, template, args);
  }

  public error(...args: LogArgs): void {
    void this.write(Level.ERROR, undefined, args);
  }

  public errorf(template: string, ...args: LogArgs): void {
    void this.write(Level.ERROR, template, args);
  }

  public warning(...args: LogArgs): void {
    void this.write(Level.WARNING, undefined, args);
  }

  public warningf(template: string, ...args: LogArgs): void {
    void this.write(Level.WARNING, template, args);
  }

  public notice(...args: LogArgs): void {
    void this.write(Level.NOTICE, undefined, args);
  }

  public noticef(template: string, ...args: LogArgs): void {
    void this.write(Level.NOTICE, template, args);
  }

  public info(...args: LogArgs): void {
    void this.write(Level.INFO, undefined, args);
  }

  public infof(template: string, ...args: LogArgs): void {
    void this.write(Level.INFO, template, args);
  }

  public debug(...args: LogArgs): void {
    void this.write(Level.DEBUG, undefined, args);
  }

  public debugf(template: string, ...args: LogArgs): void {
    void this.write(Level.DEBUG, template, args);
  }

  private panicWith(
    template: string | undefined,
    args: LogArgs,
  ): LoggerPanicError {
    const copy = [...args];
    redactArgs(copy);
    const error = new LoggerPanicError(renderMessage(template, copy));
    void this.write(Level.CRITICAL, template, args);
    return error;
  }

  private write(
    level: Level,
    template: string | undefined,
    args: LogArgs,
  ): Promise<void> {
    let pending: Promise<void>;
    try {
      pending = this.writer.write(level, this.extraCalldepth, template, args);
    } catch (error) {
      pending = Promise.reject(error);
    }
    return pending.catch((error: unknown) => {
      reportDiagnosticsError(this.diagnostics, "log write failed", {
        level,
        error,
      });
    });
  }
}
