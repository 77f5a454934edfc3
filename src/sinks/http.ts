import { Agent, fetch } from "undici";

import { DeliverySink } from "../core/delivery/index.js";
import { levelName, type Level } from "../core/level/index.js";
import { sprint, type LogRecord } from "../core/record/index.js";
import type { DiagnosticsLogger, Sink } from "../core/types.js";

export interface HttpSinkOptions {
  /** Bound on one whole request, response body included, in seconds. */
  readonly timeout?: number;
  readonly insecure?: boolean;
  readonly httpGet?: boolean;
  readonly formatted?: boolean;
  readonly async?: boolean;
}

export const DEFAULT_HTTP_TIMEOUT_SECONDS = 2;

export class HttpSinkError extends Error {
  public readonly statusCode: number | undefined;

  public constructor(message: string, statusCode?: number, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "HttpSinkError";
    this.statusCode = statusCode;
  }
}

interface HttpMessage {
  readonly method: "GET" | "POST";
  readonly url: URL;
  readonly body?: string;
  readonly contentType?: string;
}

export type HttpSink = Sink & {
  print(...args: unknown[]): Promise<void>;
  close(): Promise<void>;
};

export function createHttpSink(
  target: URL,
  options: HttpSinkOptions = {},
): HttpSink {
  const timeoutMs = (options.timeout ?? DEFAULT_HTTP_TIMEOUT_SECONDS) * 1000;
  const agent = new Agent({
    connect: { rejectUnauthorized: options.insecure !== true },
  });

  const send = async (message: HttpMessage): Promise<void> => {
    const label = `${message.method} ${target.href}`;
    let status: number;
    try {
      const response = await fetch(message.url, {
        method: message.method,
        dispatcher: agent,
        signal: AbortSignal.timeout(timeoutMs),
        ...(message.body !== undefined
          ? {
              body: message.body,
              headers: {
                "content-type": message.contentType ?? "application/json",
              },
            }
          : {}),
      });
      status = response.status;
      // Drains the body so the connection is reused and a cut-off body fails.
      await response.arrayBuffer();
    } catch (error) {
      throw new HttpSinkError(
        isTimeout(error)
          ? `${label} timed out after ${timeoutMs}ms.`
          : `${label} failed: ${describeError(error)}`,
        undefined,
        error,
      );
    }

    if (status >= 400) {
      throw new HttpSinkError(`${label} responded with ${status}.`, status);
    }
  };

  const withQuery = (key: string, value: string): URL => {
    const url = new URL(target.href);
    url.searchParams.set(key, value);
    return url;
  };

  return {
    async log(_level: Level, calldepth: number, record: LogRecord): Promise<void> {
      const payload =
        options.formatted === true
          ? record.formatted(calldepth + 1)
          : JSON.stringify(serializeRecord(record));

      if (options.httpGet === true) {
        await send({ method: "GET", url: withQuery("message", payload) });
        return;
      }
      await send({
        method: "POST",
        url: target,
        body: payload,
        contentType:
          options.formatted === true ? "text/plain" : "application/json",
      });
    },
    async print(...args: unknown[]): Promise<void> {
      const text = sprint(args);
      if (options.httpGet === true) {
        await send({ method: "GET", url: withQuery("string", text) });
        return;
      }
      await send({
        method: "POST",
        url: withQuery("string", "true"),
        body: text,
        contentType: "text/plain",
      });
    },
    async close(): Promise<void> {
      await agent.close();
    },
  };
}

export function serializeRecord(record: LogRecord): Record<string, unknown> {
  const data = record.data();
  return {
    id: data.id,
    time: data.time.toISOString(),
    module: data.module,
    level: levelName(data.level),
    message: data.message,
  };
}

export function openHttpSink(
  target: URL,
  options: HttpSinkOptions,
  diagnostics: DiagnosticsLogger,
): DeliverySink {
  return new DeliverySink({
    name: `http:${target.href}`,
    sink: createHttpSink(target, options),
    async: options.async ?? false,
    diagnostics,
  });
}

function isTimeout(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "name" in error &&
    error.name === "TimeoutError"
  );
}

function describeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  // Socket failures arrive as "fetch failed" or "terminated" plus a cause.
  return error.cause instanceof Error
    ? `${error.message} (${error.cause.message})`
    : error.message;
}
