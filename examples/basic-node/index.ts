import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import {
  applyLoggingConfig,
  createLoggingRuntime,
  createTextFormatter,
  Level,
  secret,
  withPrefix,
  type LoggingRuntime,
} from "../../src/index.js";

async function configure(runtime: LoggingRuntime, dir: string): Promise<string> {
  const auditPath = join(dir, "audit.log");

  const applied = await applyLoggingConfig(runtime, {
    level: "info",
    modules: [
      { name: "svc.api", level: "warning" },
      {
        name: "svc.audit",
        level: "notice",
        destinations: [{ dst: auditPath, options: { async: false } }, { dst: "-" }],
      },
    ],
  });

  for (const failure of applied.errors) {
    console.error(`destination ${failure.dst} of ${failure.module} failed`);
  }

  return auditPath;
}

async function main(): Promise<void> {
  const dir = await mkdtemp(join(tmpdir(), "leveled-example-"));
  const runtime = createLoggingRuntime({
    stream: process.stdout,
    formatter: createTextFormatter({ pid: true }),
  });

  try {
    const auditPath = await configure(runtime, dir);

    const api = runtime.getLogger("svc.api");
    api.notice("suppressed: below the svc.api threshold");
    api.errorf("upstream %s answered %d", "billing", 502);

    const worker = withPrefix(runtime.getLogger("svc.worker"), "job-17");
    worker.info("started");
    worker.debugf("%d items queued", 4);

    const audit = runtime.getLogger("svc.audit");
    audit.notice("login", "alice", "password", secret("test-password"));

    console.log("svc.api level:", Level[runtime.getLevel("svc.api")]);
    console.log("sink health:", JSON.stringify(await runtime.health()));

    await runtime.shutdown();
    console.log("audit file:\n" + (await readFile(auditPath, "utf8")));
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
