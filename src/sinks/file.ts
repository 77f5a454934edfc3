import { open, type FileHandle } from "node:fs/promises";
import { resolve } from "node:path";

import { DeliverySink } from "../core/delivery/index.js";
import type { Level } from "../core/level/index.js";
import { sprint, type LogRecord } from "../core/record/index.js";
import type { SinkCache } from "../core/sink-cache/index.js";
import type { DiagnosticsLogger, Sink } from "../core/types.js";

export interface FileSinkOptions {
  readonly async?: boolean;
  readonly truncate?: boolean;
  readonly mode?: number;
}

export const DEFAULT_FILE_MODE = 0o666;

export function createFileHandleSink(handle: FileHandle): Sink {
  const write = async (line: string): Promise<void> => {
    await handle.write(`${line}\n`);
  };

  return {
    async log(_level: Level, calldepth: number, record: LogRecord): Promise<void> {
      await write(record.formatted(calldepth + 1));
    },
    async print(...args: unknown[]): Promise<void> {
      await write(sprint(args));
    },
  } satisfies Sink;
}

export async function openFileSink(
  path: string,
  options: FileSinkOptions,
  diagnostics: DiagnosticsLogger,
): Promise<DeliverySink> {
  const flags = options.truncate === true ? "w" : "a";
  const handle = await open(path, flags, options.mode ?? DEFAULT_FILE_MODE);

  return new DeliverySink({
    name: `file:${path}`,
    sink: createFileHandleSink(handle),
    async: options.async ?? false,
    diagnostics,
    closer: handle,
  });
}

/**
 * Returns the one sink for `path`, opening the file on first use. Options of
 * later calls for an already cached path are ignored.
 */
export function acquireFileSink(
  cache: SinkCache<DeliverySink>,
  path: string,
  options: FileSinkOptions,
  diagnostics: DiagnosticsLogger,
): Promise<DeliverySink> {
  const key = resolve(path);
  return cache.acquire(key, () => openFileSink(key, options, diagnostics));
}
