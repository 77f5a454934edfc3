import { format } from "node:util";

import type { Level } from "../level/index.js";
import type { Formatter } from "../types.js";
import { redactArgs, renderArg } from "./redaction.js";

export interface RecordData {
  readonly id: number;
  readonly time: Date;
  readonly module: string;
  readonly level: Level;
  readonly message: string;
}

export interface LogRecordInit {
  readonly id: number;
  readonly time: Date;
  readonly module: string;
  readonly level: Level;
  readonly args: unknown[];
  readonly template?: string | undefined;
  readonly formatter: Formatter;
}

interface RecordCache {
  message?: string;
  formatted?: string;
}

/**
 * One log event. The message and the formatted line are computed lazily and
 * memoized on the instance, so a record handed to several delivery paths
 * must be copied with {@link LogRecord.snapshot} first.
 */
export class LogRecord {
  public readonly id: number;
  public readonly time: Date;
  public readonly module: string;
  public readonly level: Level;
  public readonly args: unknown[];

  private readonly template: string | undefined;
  private readonly formatter: Formatter;
  private readonly cache: RecordCache;

  public constructor(init: LogRecordInit, cache: RecordCache = {}) {
    this.id = init.id;
    this.time = init.time;
    this.module = init.module;
    this.level = init.level;
    this.args = init.args;
    this.template = init.template;
    this.formatter = init.formatter;
    this.cache = cache;
  }

  public message(): string {
    if (this.cache.message === undefined) {
      redactArgs(this.args);
      this.cache.message = renderMessage(this.template, this.args);
    }
    return this.cache.message;
  }

  public formatted(calldepth: number): string {
    if (this.cache.formatted === undefined) {
      const chunks: string[] = [];
      this.formatter.format(calldepth + 1, this, {
        write(chunk: string): void {
          chunks.push(chunk);
        },
      });
      this.cache.formatted = chunks.join("");
    }
    return this.cache.formatted;
  }

  public data(): RecordData {
    return Object.freeze({
      id: this.id,
      time: this.time,
      module: this.module,
      level: this.level,
      message: this.message(),
    });
  }

  public snapshot(): LogRecord {
    return new LogRecord(
      {
        id: this.id,
        time: this.time,
        module: this.module,
        level: this.level,
        args: [...this.args],
        template: this.template,
        formatter: this.formatter,
      },
      { ...this.cache },
    );
  }
}

/**
 * Applies `template` with printf-style verbs, or joins the arguments with a
 * single space when there is none.
 */
export function renderMessage(
  template: string | undefined,
  args: readonly unknown[],
): string {
  if (template !== undefined) {
    return format(template, ...args);
  }
  return args.map(renderArg).join(" ");
}

export class SequenceCounter {
  private value = 0;

  public get current(): number {
    return this.value;
  }

  public next(): number {
    this.value += 1;
    return this.value;
  }

  public reset(): void {
    this.value = 0;
  }
}

export {
  isRedactable,
  redact,
  redactArgs,
  renderArg,
  secret,
  sprint,
  type Secret,
} from "./redaction.js";
