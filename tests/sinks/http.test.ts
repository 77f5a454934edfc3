import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { once } from "node:events";
import {
  createServer,
  type IncomingMessage,
  type Server,
  type ServerResponse,
} from "node:http";

import { Level } from "../../src/core/level/index.js";
import type { DiagnosticsLogger } from "../../src/core/types.js";
import {
  createHttpSink,
  HttpSinkError,
  openHttpSink,
  serializeRecord,
} from "../../src/sinks/http.js";
import { createLogRecord } from "../fixtures/log-record.js";
import { waitForAsyncWork } from "../fixtures/memory-sink.js";

interface ReceivedRequest {
  readonly method: string | undefined;
  readonly url: URL;
  readonly body: string;
  readonly contentType: string | undefined;
}

type Responder = (response: ServerResponse) => void;

async function listen(server: Server): Promise<URL> {
  server.listen(0, "127.0.0.1");
  await once(server, "listening");
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("Expected the test server to listen on a TCP port.");
  }
  return new URL(`http://127.0.0.1:${address.port}/`);
}

describe("createHttpSink", () => {
  let server: Server;
  let target: URL;
  let received: ReceivedRequest[];
  let respond: Responder;
  let sinks: Array<{ close(): Promise<void> }>;

  beforeEach(async () => {
    received = [];
    sinks = [];
    respond = (response) => {
      response.writeHead(204).end();
    };
    server = createServer((request: IncomingMessage, response) => {
      const chunks: Buffer[] = [];
      request.on("data", (chunk: Buffer) => chunks.push(chunk));
      request.on("end", () => {
        received.push({
          method: request.method,
          url: new URL(request.url ?? "/", target),
          body: Buffer.concat(chunks).toString("utf8"),
          contentType: request.headers["content-type"],
        });
        respond(response);
      });
    });
    target = new URL("/ingest", await listen(server));
  });

  afterEach(async () => {
    server.closeAllConnections();
    await Promise.all(sinks.map((sink) => sink.close()));
    server.close();
    await once(server, "close");
  });

  const track = <T extends { close(): Promise<void> }>(sink: T): T => {
    sinks.push(sink);
    return sink;
  };

  it("posts the record as JSON", async () => {
    const sink = track(createHttpSink(target));

    await sink.log(Level.INFO, 0, createLogRecord({ id: 4, module: "svc.api" }));

    expect(received).toHaveLength(1);
    const [request] = received;
    expect(request?.method).toBe("POST");
    expect(request?.url.pathname).toBe("/ingest");
    expect(request?.contentType).toBe("application/json");
    expect(JSON.parse(request?.body ?? "")).toEqual({
      id: 4,
      time: "2024-03-01T12:00:00.000Z",
      module: "svc.api",
      level: "INFO",
      message: "test-message",
    });
  });

  it("posts the formatted line when configured", async () => {
    const sink = track(createHttpSink(target, { formatted: true }));

    await sink.log(Level.ERROR, 0, createLogRecord());

    expect(received[0]?.body).toBe(
      "2024-03-01T12:00:00.000Z ERRO [test]: test-message",
    );
  });

  it("sends the payload as a query parameter in GET mode", async () => {
    const sink = track(
      createHttpSink(target, { httpGet: true, formatted: true }),
    );

    await sink.log(Level.DEBUG, 0, createLogRecord({ args: ["a&b"] }));

    const [request] = received;
    expect(request?.method).toBe("GET");
    expect(request?.url.searchParams.get("message")).toBe(
      "2024-03-01T12:00:00.000Z DEBU [test]: a&b",
    );
    expect(request?.body).toBe("");
  });

  it("prints plain text with a string marker", async () => {
    const post = track(createHttpSink(target));
    const get = track(createHttpSink(target, { httpGet: true }));

    await post.print("queue ", 3);
    await get.print("queue ", 4);

    expect(received.map((request) => request.method)).toEqual(["POST", "GET"]);
    expect(received[0]?.url.searchParams.get("string")).toBe("true");
    expect(received[0]?.body).toBe("queue 3");
    expect(received[1]?.url.searchParams.get("string")).toBe("queue 4");
  });

  it("rejects error responses with the status code", async () => {
    respond = (response) => {
      response.writeHead(503).end("unavailable");
    };
    const sink = track(createHttpSink(target));

    const result = sink.log(Level.INFO, 0, createLogRecord());

    await expect(result).rejects.toBeInstanceOf(HttpSinkError);
    await expect(result).rejects.toMatchObject({
      statusCode: 503,
      message: `POST ${target.href} responded with 503.`,
    });
  });

  it("rejects a response whose body is cut off", async () => {
    respond = (response) => {
      response.writeHead(200, { "content-length": "100" });
      response.write("partial", () => {
        response.destroy();
      });
    };
    const sink = track(createHttpSink(target, { timeout: 1 }));

    const result = sink.log(Level.INFO, 0, createLogRecord());

    await expect(result).rejects.toBeInstanceOf(HttpSinkError);
    await expect(result).rejects.toThrow(`POST ${target.href} failed:`);
  });

  it("bounds a stalled response body by the timeout", async () => {
    respond = (response) => {
      response.writeHead(200, { "content-length": "100" });
      response.write("partial");
    };
    const sink = track(createHttpSink(target, { timeout: 0.05 }));

    await expect(sink.log(Level.INFO, 0, createLogRecord())).rejects.toThrow(
      `POST ${target.href} timed out after 50ms.`,
    );
  });

  it("rejects requests that exceed the timeout", async () => {
    respond = () => undefined;
    const sink = track(createHttpSink(target, { timeout: 0.05 }));

    await expect(sink.log(Level.INFO, 0, createLogRecord())).rejects.toThrow(
      `POST ${target.href} timed out after 50ms.`,
    );
  });
});

describe("openHttpSink", () => {
  it("reports asynchronous delivery failures on diagnostics", async () => {
    const diagnostics: DiagnosticsLogger = {
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    const server = createServer((_request, response) => {
      response.writeHead(500).end();
    });
    const target = await listen(server);

    const sink = openHttpSink(target, { async: true }, diagnostics);
    await sink.log(Level.INFO, 0, createLogRecord());
    await waitForAsyncWork();
    await vi.waitFor(() => {
      expect(diagnostics.error).toHaveBeenCalledTimes(1);
    });

    expect(sink.name).toBe(`http:${target.href}`);
    expect(diagnostics.error).toHaveBeenCalledWith("async delivery failed", {
      sink: `http:${target.href}`,
      error: expect.any(HttpSinkError),
    });

    await sink.close();
    server.closeAllConnections();
    server.close();
    await once(server, "close");
  });
});

describe("openHttpSink with a cut-off response", () => {
  it("reports the failure on diagnostics in async mode", async () => {
    const diagnostics: DiagnosticsLogger = {
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    const server = createServer((request, response) => {
      request.resume();
      request.on("end", () => {
        response.writeHead(200, { "content-length": "100" });
        response.write("partial", () => {
          response.destroy();
        });
      });
    });
    const target = await listen(server);

    const sink = openHttpSink(target, { timeout: 1, async: true }, diagnostics);
    await sink.log(Level.INFO, 0, createLogRecord());
    await vi.waitFor(() => {
      expect(diagnostics.error).toHaveBeenCalledTimes(1);
    });

    expect(diagnostics.error).toHaveBeenCalledWith("async delivery failed", {
      sink: `http:${target.href}`,
      error: expect.any(HttpSinkError),
    });
    expect(sink.getDiagnostics().details).toMatchObject({ failureCount: 1 });

    await sink.close();
    server.closeAllConnections();
    server.close();
    await once(server, "close");
  });
});

describe("serializeRecord", () => {
  it("uses the level name and ISO time", () => {
    expect(
      serializeRecord(createLogRecord({ level: Level.CRITICAL, args: ["x"] })),
    ).toEqual({
      id: 1,
      time: "2024-03-01T12:00:00.000Z",
      module: "test",
      level: "CRITICAL",
      message: "x",
    });
  });
});
