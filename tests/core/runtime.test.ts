import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { EventEmitter } from "node:events";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, join } from "node:path";
import pino from "pino";

import { Level } from "../../src/core/level/index.js";
import {
  createLoggingRuntime,
  type LoggingRuntime,
} from "../../src/core/runtime.js";
import type { DiagnosticsLogger } from "../../src/core/types.js";
import { acquireFileSink } from "../../src/sinks/file.js";
import { FIXED_TIME } from "../fixtures/log-record.js";
import {
  createMemorySinkFixture,
  waitForAsyncWork,
  type MemorySinkFixture,
} from "../fixtures/memory-sink.js";

class FakeStream extends EventEmitter {
  public chunks: string[] = [];

  public write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }
}

describe("createLoggingRuntime", () => {
  let memory: MemorySinkFixture;
  let stream: FakeStream;
  let diagnostics: DiagnosticsLogger;
  let runtime: LoggingRuntime;

  beforeEach(() => {
    memory = createMemorySinkFixture();
    stream = new FakeStream();
    diagnostics = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    runtime = createLoggingRuntime({
      sinks: [memory.sink],
      stream,
      diagnostics,
      clock: () => FIXED_TIME,
    });
  });

  it("gives concurrently created records a permutation of 1..N", async () => {
    const ids = await Promise.all(
      Array.from({ length: 50 }, async (_, index) => {
        await waitForAsyncWork();
        return runtime.newRecord("load", Level.INFO, undefined, [index]).id;
      }),
    );

    expect([...ids].sort((a, b) => a - b)).toEqual(
      Array.from({ length: 50 }, (_, index) => index + 1),
    );
    expect(runtime.sequence.current).toBe(50);
  });

  it("stamps records with the runtime clock and formatter", () => {
    const record = runtime.newRecord("svc", Level.NOTICE, "%s up", ["api"]);

    expect(record.time).toBe(FIXED_TIME);
    expect(record.formatted(0)).toBe(
      "2024-03-01T12:00:00.000Z NOTI [svc]: api up",
    );
  });

  it("gates a child module by its parent's threshold", async () => {
    runtime.setLevel(Level.WARNING, "svc.api");
    const api = runtime.getLogger("svc.api.http");
    const worker = runtime.getLogger("svc.worker");

    api.notice("slow request");
    api.error("upstream failed");
    worker.info("job done");
    await waitForAsyncWork();

    expect(
      memory.entries.map((entry) => [entry.record.module, entry.message]),
    ).toEqual([
      ["svc.api.http", "upstream failed"],
      ["svc.worker", "job done"],
    ]);
    expect(runtime.getLevel("svc.api.http")).toBe(Level.WARNING);
    expect(runtime.getLevel("svc.worker")).toBe(Level.DEBUG);
  });

  it("names the main logger after the entry script", () => {
    const main = runtime.mainLogger();

    expect(main.module).toBe(basename(process.argv[1] ?? ""));
    expect(runtime.mainLogger()).toBe(main);
  });

  it("returns the same logger for a module", () => {
    expect(runtime.findLogger("svc")).toBeUndefined();

    const logger = runtime.getLogger("svc");

    expect(runtime.getLogger("svc")).toBe(logger);
    expect(runtime.findLogger("svc")).toBe(logger);
  });

  it("lets an early proxy follow later backend replacements", async () => {
    const proxy = runtime.defaultBackendProxy();
    const replacement = createMemorySinkFixture();

    runtime.setBackend(replacement.sink);
    await proxy.log(
      Level.INFO,
      0,
      runtime.newRecord("svc", Level.INFO, undefined, ["routed"]),
    );

    expect(memory.entries).toHaveLength(0);
    expect(replacement.entries.map((entry) => entry.message)).toEqual([
      "routed",
    ]);
  });

  it("fans out to every sink passed to setBackend", async () => {
    const first = createMemorySinkFixture();
    const second = createMemorySinkFixture();

    const backend = runtime.setBackend(first.sink, second.sink);
    await backend.log(
      Level.ERROR,
      0,
      runtime.newRecord("svc", Level.ERROR, undefined, ["both"]),
    );

    expect(first.entries).toHaveLength(1);
    expect(second.entries).toHaveLength(1);
    expect(() => runtime.setBackend()).toThrow(RangeError);
  });

  it("restores defaults on reset", async () => {
    runtime.setLevel(Level.ERROR, "");
    runtime.newRecord("svc", Level.INFO, undefined, []);

    runtime.reset();
    runtime.getLogger("svc").info("after reset");
    await waitForAsyncWork();

    expect(runtime.sequence.current).toBe(1);
    expect(runtime.getLevel("")).toBe(Level.DEBUG);
    expect(memory.entries).toHaveLength(0);
    expect(stream.chunks).toHaveLength(1);
    expect(stream.chunks[0]).toMatch(
      /^\d{4}-\d{2}-\d{2}T\S+Z INFO \[svc\]: after reset\n$/,
    );
    expect(runtime.now()).not.toBe(FIXED_TIME);
  });

  it("scopes a supplied diagnostics logger by subsystem", () => {
    const config = runtime.diagnostics("config");

    config.warn("ignored option", { option: "color" });

    expect(runtime.diagnostics("config")).toBe(config);
    expect(diagnostics.warn).toHaveBeenCalledWith("ignored option", {
      subsystem: "config",
      option: "color",
    });
  });

  it("calls the injected exit", () => {
    const exit = vi.fn((code: number): never => {
      throw new Error(`exit ${code}`);
    });
    const withExit = createLoggingRuntime({ sinks: [memory.sink], diagnostics, exit });

    expect(() => withExit.exit(3)).toThrow("exit 3");
    expect(exit).toHaveBeenCalledWith(3);
  });
});

describe("runtime diagnostics over pino", () => {
  it("writes subsystem entries to the supplied pino logger", () => {
    const lines: string[] = [];
    const logger = pino(
      { base: null, timestamp: false },
      {
        write(line: string): void {
          lines.push(line);
        },
      },
    );
    const runtime = createLoggingRuntime({
      sinks: [createMemorySinkFixture().sink],
      logger,
    });

    runtime.diagnostics("delivery").error("async delivery failed", {
      sink: "file:/tmp/a.log",
    });

    expect(lines.map((line): unknown => JSON.parse(line))).toEqual([
      {
        level: 50,
        subsystem: "delivery",
        sink: "file:/tmp/a.log",
        msg: "async delivery failed",
      },
    ]);
  });
});

describe("runtime file sinks", () => {
  let dir: string;
  let runtime: LoggingRuntime;
  const diagnostics: DiagnosticsLogger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "leveled-runtime-"));
    runtime = createLoggingRuntime({
      sinks: [createMemorySinkFixture().sink],
      diagnostics,
    });
  });

  afterEach(async () => {
    await runtime.shutdown();
    await rm(dir, { recursive: true, force: true });
  });

  it("reports cached file sinks in health and closes them on shutdown", async () => {
    const path = join(dir, "app.log");
    const sink = await acquireFileSink(runtime.fileSinks, path, {}, diagnostics);

    const before = await runtime.health();
    await runtime.shutdown();
    const after = await runtime.health();

    expect(before).toEqual({
      status: "healthy",
      sinks: [
        {
          name: path,
          healthy: true,
          diagnostics: {
            isHealthy: true,
            details: {
              name: `file:${path}`,
              async: false,
              closed: false,
              failureCount: 0,
            },
          },
        },
      ],
    });
    expect(after).toEqual({ status: "healthy", sinks: [] });
    expect(sink.getDiagnostics().isHealthy).toBe(false);
  });
});
