import type { Level } from "../core/level/index.js";
import type { LeveledBackend } from "../core/types.js";
import type { LogArgs, Logger } from "./index.js";

export const DEFAULT_PREFIX_SEPARATOR = " ->";

/**
 * Decorates every message of `parent` with a fixed prefix.
 */
export class LogPrefix implements Logger {
  public readonly prefix: string;

  public constructor(
    public readonly parent: Logger,
    prefix: string,
  ) {
    this.prefix = prefix;
  }

  public get module(): string {
    return this.parent.module;
  }

  public get backend(): LeveledBackend | undefined {
    return this.parent.backend;
  }

  public isEnabledFor(level: Level): boolean {
    return this.parent.isEnabledFor(level);
  }

  public setBackend(backend: LeveledBackend): void {
    this.parent.setBackend(backend);
  }

  public fatal(...args: LogArgs): Promise<never> {
    return this.parent.fatal(this.prefix, ...args);
  }

  public fatalf(template: string, ...args: LogArgs): Promise<never> {
    return this.parent.fatalf(this.prefixTemplate(template), ...args);
  }

  public panic(...args: LogArgs): never {
    return this.parent.panic(this.prefix, ...args);
  }

  public panicf(template: string, ...args: LogArgs): never {
    return this.parent.panicf(this.prefixTemplate(template), ...args);
  }

  public critical(...args: LogArgs): void {
    this.parent.critical(this.prefix, ...args);
  }

  public criticalf(template: string, ...args: LogArgs): void {
    this.parent.criticalf(this.prefixTemplate(template), ...args);
  }

  public error(...args: LogArgs): void {
    this.parent.error(this.prefix, ...args);
  }

  public errorf(template: string, ...args: LogArgs): void {
    this.parent.errorf(this.prefixTemplate(template), ...args);
  }

  public warning(...args: LogArgs): void {
    this.parent.warning(this.prefix, ...args);
  }

  public warningf(template: string, ...args: LogArgs): void {
    this.parent.warningf(this.prefixTemplate(template), ...args);
  }

  public notice(...args: LogArgs): void {
    this.parent.notice(this.prefix, ...args);
  }

  public noticef(template: string, ...args: LogArgs): void {
    this.parent.noticef(this.prefixTemplate(template), ...args);
  }

  public info(...args: LogArgs): void {
    this.parent.info(this.prefix, ...args);
  }

  public infof(template: string, ...args: LogArgs): void {
    this.parent.infof(this.prefixTemplate(template), ...args);
  }

  public debug(...args: LogArgs): void {
    this.parent.debug(this.prefix, ...args);
  }

  public debugf(template: string, ...args: LogArgs): void {
    this.parent.debugf(this.prefixTemplate(template), ...args);
  }

  private prefixTemplate(template: string): string {
    return `${this.prefix} ${template}`;
  }
}

export function withPrefix(
  parent: Logger,
  prefix: string,
  separator: string = DEFAULT_PREFIX_SEPARATOR,
): LogPrefix {
  return new LogPrefix(parent, `${prefix.trim()}${separator}`);
}
