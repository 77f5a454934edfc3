import { Bench } from "tinybench";
import { Writable } from "node:stream";
import pino, { type Logger as PinoLogger } from "pino";
import {
  createLoggingRuntime,
  createPinoSink,
  Level,
  type DiagnosticsLogger,
  type Logger,
} from "../src/index.js";

const TARGET_OVERHEAD = 0.25;
const BENCH_DURATION_MS = 1000;
const WARMUP_ITERATIONS = 200;
const MESSAGE = "benchmark message";

interface BenchmarkSetup {
  readonly directLogger: PinoLogger;
  readonly leveledLogger: Logger;
  readonly shutdown: () => Promise<void>;
}

const noop = (): void => {};

const silentDiagnosticsLogger: DiagnosticsLogger = {
  info: noop,
  warn: noop,
  error: noop,
};

function createDevNullLogger(): PinoLogger {
  const stream = new Writable({
    write(_chunk, _encoding, callback) {
      callback();
    },
  });

  return pino(
    {
      level: "debug",
      base: null,
      timestamp: false,
    },
    stream,
  );
}

function setupBenchmark(): BenchmarkSetup {
  const directLogger = createDevNullLogger();
  const sinkLogger = createDevNullLogger();
  const runtime = createLoggingRuntime({
    sinks: [createPinoSink(sinkLogger)],
    diagnostics: silentDiagnosticsLogger,
  });
  runtime.setLevel(Level.INFO, "bench");

  return {
    directLogger,
    leveledLogger: runtime.getLogger("bench.dispatch"),
    shutdown: async () => {
      await runtime.shutdown();
      await flushLogger(sinkLogger);
      await flushLogger(directLogger);
    },
  } satisfies BenchmarkSetup;
}

function flushLogger(logger: PinoLogger): Promise<void> {
  return new Promise((resolve, reject) => {
    logger.flush((error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

function collectHz(taskName: string, bench: Bench) {
  const task = bench.tasks.find((entry) => entry.name === taskName);
  if (!task || !task.result) {
    throw new Error(`Benchmark task '${taskName}' did not complete.`);
  }
  return task.result.hz;
}

function formatPercent(value: number): string {
  return `${(value * 100).toFixed(2)}%`;
}

async function run(): Promise<void> {
  const { directLogger, leveledLogger, shutdown } = setupBenchmark();
  const bench = new Bench({
    time: BENCH_DURATION_MS,
    iterations: 0,
    warmupIterations: WARMUP_ITERATIONS,
  });

  bench.add("pino-baseline", () => {
    directLogger.info({ attempt: 3 }, MESSAGE);
  });

  bench.add("leveled", () => {
    leveledLogger.info(MESSAGE, 3);
  });

  bench.add("leveled-disabled", () => {
    leveledLogger.debug(MESSAGE, 3);
  });

  await bench.warmup();
  await bench.run();

  const baselineHz = collectHz("pino-baseline", bench);
  const leveledHz = collectHz("leveled", bench);
  const disabledHz = collectHz("leveled-disabled", bench);
  const overhead = Math.max(0, (baselineHz - leveledHz) / baselineHz);

  console.log(`pino-baseline   : ${baselineHz.toFixed(2)} ops/sec`);
  console.log(`leveled         : ${leveledHz.toFixed(2)} ops/sec`);
  console.log(`leveled-disabled: ${disabledHz.toFixed(2)} ops/sec`);
  console.log(
    `overhead        : ${formatPercent(overhead)} (target ${formatPercent(TARGET_OVERHEAD)})`,
  );

  if (!Number.isFinite(baselineHz) || baselineHz === 0) {
    throw new Error("Baseline benchmark produced invalid throughput.");
  }

  await shutdown();

  if (overhead > TARGET_OVERHEAD) {
    throw new Error(
      `Leveled dispatch overhead ${formatPercent(overhead)} exceeds target ${formatPercent(TARGET_OVERHEAD)}.`,
    );
  }
}

run().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
