import process from "node:process";
import type { Logger as PinoLogger } from "pino";

import type {
  DiagnosticsLogger,
  LogMetadata,
  Sink,
  SinkDiagnostics,
} from "../types.js";

export type DiagnosticsSubsystem = "delivery" | "sinks" | "config" | "logger";

export type SinkHealthStatus = "healthy" | "degraded";

export interface SinkHealthEntry {
  readonly name: string;
  readonly healthy: boolean;
  readonly diagnostics?: SinkDiagnostics;
  readonly diagnosticsError?: unknown;
}

export interface SinkHealthSnapshot {
  readonly status: SinkHealthStatus;
  readonly sinks: readonly SinkHealthEntry[];
}

export function createDiagnosticsLogger(
  logger: PinoLogger,
  subsystem: DiagnosticsSubsystem,
): DiagnosticsLogger {
  const child = logger.child({ subsystem });
  return {
    info(message: string, metadata?: LogMetadata): void {
      child.info(metadata ?? {}, message);
    },
    warn(message: string, metadata?: LogMetadata): void {
      child.warn(metadata ?? {}, message);
    },
    error(message: string, metadata?: LogMetadata): void {
      child.error(metadata ?? {}, message);
    },
  } satisfies DiagnosticsLogger;
}

/**
 * Adds fixed metadata to every entry written through `base`.
 */
export function scopeDiagnosticsLogger(
  base: DiagnosticsLogger,
  scope: LogMetadata,
): DiagnosticsLogger {
  const augment = (metadata?: LogMetadata): LogMetadata => ({
    ...scope,
    ...(metadata ?? {}),
  });

  return {
    info(message: string, metadata?: LogMetadata): void {
      base.info(message, augment(metadata));
    },
    warn(message: string, metadata?: LogMetadata): void {
      base.warn(message, augment(metadata));
    },
    error(message: string, metadata?: LogMetadata): void {
      base.error(message, augment(metadata));
    },
  } satisfies DiagnosticsLogger;
}

export const DIAGNOSTICS_FAILURE_WARNING_CODE = "LEVELED_LOG_DIAGNOSTICS_FAILED";

/**
 * Sends `message` to `diagnostics.error`. If the diagnostics logger throws,
 * the failure becomes a process warning and never reaches the caller.
 */
export function reportDiagnosticsError(
  diagnostics: DiagnosticsLogger,
  message: string,
  metadata: LogMetadata,
): void {
  try {
    diagnostics.error(message, metadata);
  } catch (error) {
    process.emitWarning(
      `Diagnostics logger failed while reporting "${message}".`,
      {
        code: DIAGNOSTICS_FAILURE_WARNING_CODE,
        detail: error instanceof Error ? error.message : String(error),
      },
    );
  }
}

export function buildSinkHealthSnapshot(
  sinks: ReadonlyMap<string, Sink>,
): SinkHealthSnapshot {
  const entries = Array.from(sinks.entries()).map(([name, sink]) =>
    buildSinkHealthEntry(name, sink),
  );

  return {
    status: entries.every((entry) => entry.healthy) ? "healthy" : "degraded",
    sinks: entries,
  } satisfies SinkHealthSnapshot;
}

function buildSinkHealthEntry(name: string, sink: Sink): SinkHealthEntry {
  let diagnostics: SinkDiagnostics | undefined;
  let diagnosticsError: unknown;

  if (typeof sink.getDiagnostics === "function") {
    try {
      diagnostics = sink.getDiagnostics();
    } catch (error) {
      diagnosticsError = error;
    }
  }

  const healthy =
    diagnosticsError === undefined && (diagnostics?.isHealthy ?? true);

  return {
    name,
    healthy,
    ...(diagnostics !== undefined ? { diagnostics } : {}),
    ...(diagnosticsError !== undefined ? { diagnosticsError } : {}),
  } satisfies SinkHealthEntry;
}
