import { reportDiagnosticsError } from "../diagnostics/index.js";
import type { Level } from "../level/index.js";
import type { LogRecord } from "../record/index.js";
import type { DiagnosticsLogger, Sink, SinkDiagnostics } from "../types.js";

export interface Closer {
  close(): Promise<void> | void;
}

export interface DeliverySinkOptions {
  readonly name: string;
  readonly sink: Sink;
  readonly async: boolean;
  readonly diagnostics: DiagnosticsLogger;
  readonly closer?: Closer;
}

export class SinkClosedError extends Error {
  public constructor(sinkName: string) {
    super(`Sink "${sinkName}" has been closed.`);
    this.name = "SinkClosedError";
  }
}

/**
 * Adds a delivery mode to a sink. In async mode every call spawns its own
 * task on a private snapshot and resolves at once; task failures are
 * reported through diagnostics and never reach the caller. Async tasks are
 * neither ordered nor awaited.
 */
export class DeliverySink implements Sink {
  public readonly name: string;
  public readonly async: boolean;

  private readonly sink: Sink;
  private readonly diagnostics: DiagnosticsLogger;
  private readonly closer: Closer | undefined;
  private closed = false;
  private failureCount = 0;
  private lastError: unknown;

  public constructor(options: DeliverySinkOptions) {
    this.name = options.name;
    this.async = options.async;
    this.sink = options.sink;
    this.diagnostics = options.diagnostics;
    this.closer = options.closer;
  }

  public async log(
    level: Level,
    calldepth: number,
    record: LogRecord,
  ): Promise<void> {
    this.assertOpen();
    if (this.async) {
      const snapshot = record.snapshot();
      this.spawn(() => this.sink.log(level, calldepth + 1, snapshot));
      return;
    }
    await this.track(() => this.sink.log(level, calldepth + 1, record));
  }

  public async print(...args: unknown[]): Promise<void> {
    this.assertOpen();
    const print = this.sink.print?.bind(this.sink);
    if (!print) {
      return;
    }
    if (this.async) {
      const copy = [...args];
      this.spawn(() => print(...copy));
      return;
    }
    await this.track(() => print(...args));
  }

  public async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.sink.close?.();
    await this.closer?.close();
  }

  public getDiagnostics(): SinkDiagnostics {
    return {
      isHealthy: this.failureCount === 0 && !this.closed,
      details: {
        name: this.name,
        async: this.async,
        closed: this.closed,
        failureCount: this.failureCount,
        ...(this.lastError !== undefined ? { lastError: this.lastError } : {}),
      },
    };
  }

  private spawn(task: () => Promise<void> | void): void {
    setImmediate(() => {
      void this.runDetached(task);
    });
  }

  private async runDetached(task: () => Promise<void> | void): Promise<void> {
    try {
      await task();
    } catch (error) {
      this.recordFailure(error);
      reportDiagnosticsError(this.diagnostics, "async delivery failed", {
        sink: this.name,
        error,
      });
    }
  }

  private async track(task: () => Promise<void> | void): Promise<void> {
    try {
      await task();
    } catch (error) {
      this.recordFailure(error);
      throw error;
    }
  }

  private recordFailure(error: unknown): void {
    this.failureCount += 1;
    this.lastError = error;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new SinkClosedError(this.name);
    }
  }
}
