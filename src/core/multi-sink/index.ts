import type { Level } from "../level/index.js";
import type { LogRecord } from "../record/index.js";
import type { Sink, SinkDiagnostics } from "../types.js";

export class SinkFanOutError extends Error {
  public readonly errors: readonly unknown[];

  public constructor(message: string, errors: readonly unknown[]) {
    super(message);
    this.name = "SinkFanOutError";
    this.errors = errors;
  }
}

/**
 * Delivers every record to each sink in construction order. A failing sink
 * does not stop the remaining ones; failures are reported together once all
 * sinks were tried.
 */
export class MultiSink implements Sink {
  private readonly sinks: readonly Sink[];

  public constructor(sinks: readonly Sink[]) {
    if (sinks.length === 0) {
      throw new RangeError("MultiSink requires at least one sink.");
    }
    this.sinks = [...sinks];
  }

  public get size(): number {
    return this.sinks.length;
  }

  public async log(
    level: Level,
    calldepth: number,
    record: LogRecord,
  ): Promise<void> {
    await this.each("log", (sink) =>
      sink.log(level, calldepth + 1, record.snapshot()),
    );
  }

  public async print(...args: unknown[]): Promise<void> {
    await this.each("print", (sink) => sink.print?.(...args));
  }

  public async close(): Promise<void> {
    await this.each("close", (sink) => sink.close?.());
  }

  public getDiagnostics(): SinkDiagnostics {
    const sinks = this.sinks.map((sink) => sink.getDiagnostics?.());
    return {
      isHealthy: sinks.every((entry) => entry?.isHealthy ?? true),
      details: { sinks },
    };
  }

  private async each(
    operation: string,
    invoke: (sink: Sink) => Promise<void> | void,
  ): Promise<void> {
    const errors: unknown[] = [];
    for (const sink of this.sinks) {
      try {
        await invoke(sink);
      } catch (error) {
        errors.push(error);
      }
    }

    if (errors.length > 0) {
      throw new SinkFanOutError(
        `${errors.length} of ${this.sinks.length} sinks failed to ${operation}.`,
        errors,
      );
    }
  }
}
