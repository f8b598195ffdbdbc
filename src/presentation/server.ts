import { type IncomingMessage, type Server, type ServerResponse, createServer as createHttpServer } from "node:http";
import type { Logger } from "../core/ports/logger.js";
import { brand } from "../core/types/brand.js";
import type { AppConfig } from "../infrastructure/config/config.js";
import { formatAccessLog } from "../shared/log-format.js";
import { generateId } from "../shared/utils/id.js";
import type { RequestContext } from "./context.js";
import type { Router } from "./routes/router.js";

interface ServerDeps {
  readonly config: Pick<AppConfig, "env" | "port" | "host" | "log">;
  readonly logger: Logger;
  readonly router: Router;
}

/** 1 MiB; readings are a few dozen bytes */
const MAX_BODY_BYTES = 1_048_576;

class PayloadTooLargeError extends Error {}

const readBody = async (req: IncomingMessage): Promise<string> => {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > MAX_BODY_BYTES) throw new PayloadTooLargeError("Request body too large");
    chunks.push(buf);
  }
  return Buffer.concat(chunks).toString("utf8");
};

/** Bridge node:http's IncomingMessage to a fetch-style Request */
const toRequest = async (req: IncomingMessage, origin: string): Promise<Request> => {
  const method = req.method ?? "GET";
  const headers = new Headers();
  for (const [key, value] of Object.entries(req.headers)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      for (const v of value) headers.append(key, v);
    } else {
      headers.set(key, value);
    }
  }

  const hasBody = method !== "GET" && method !== "HEAD";
  const body = hasBody ? await readBody(req) : undefined;
  return new Request(new URL(req.url ?? "/", origin), {
    method,
    headers,
    ...(body !== undefined ? { body } : {}),
  });
};

const writeResponse = async (res: ServerResponse, response: Response): Promise<void> => {
  res.statusCode = response.status;
  response.headers.forEach((value, key) => {
    res.setHeader(key, value);
  });
  const body = Buffer.from(await response.arrayBuffer());
  if (body.length > 0) {
    res.end(body);
  } else {
    res.end();
  }
};

const boundPort = (server: Server, fallback: number): number => {
  const address = server.address();
  return typeof address === "object" && address !== null ? address.port : fallback;
};

export interface RunningServer {
  readonly port: number;
  stop(): Promise<void>;
}

export const createServer = (deps: ServerDeps) => {
  const { config, logger, router } = deps;

  /** Pre-serialized error responses */
  const internalErrorBody = JSON.stringify({
    error: { code: "INTERNAL", message: "Internal server error" },
  });
  const tooLargeBody = JSON.stringify({
    error: { code: "BAD_REQUEST", message: "Request body too large" },
  });

  // ── Batched access logger: accumulate lines, flush in bulk ──
  // In production: batches to avoid a stdout write per request
  // In development: writes immediately so logs appear instantly in the terminal
  let logBuffer: string[] = [];
  let logFlushTimer: ReturnType<typeof setTimeout> | null = null;
  const isDev = config.env !== "production";
  const LOG_FLUSH_INTERVAL_MS = 100;

  const flushLogs = (): void => {
    if (logFlushTimer !== null) {
      clearTimeout(logFlushTimer);
      logFlushTimer = null;
    }
    if (logBuffer.length === 0) return;
    const batch = logBuffer;
    logBuffer = [];
    process.stdout.write(batch.join(""));
  };

  const writeLog = (line: string): void => {
    if (isDev) {
      process.stdout.write(line);
      return;
    }
    logBuffer.push(line);
    if (logFlushTimer === null) {
      logFlushTimer = setTimeout(flushLogs, LOG_FLUSH_INTERVAL_MS);
    }
  };

  // "fatal" and "error" = effectively no access log
  const shouldLog = config.log.level !== "fatal" && config.log.level !== "error";

  const jsonError = (body: string, status: number, requestId: string): Response =>
    new Response(body, {
      status,
      headers: { "Content-Type": "application/json", "X-Request-Id": requestId },
    });

  const handle = async (req: IncomingMessage, origin: string): Promise<Response> => {
    const startTime = performance.now();
    const method = req.method ?? "GET";
    const incomingId = req.headers["x-request-id"];
    const requestId = typeof incomingId === "string" && incomingId.length > 0 ? incomingId : generateId();
    const ip = req.socket.remoteAddress ?? "0";

    let request: Request;
    try {
      request = await toRequest(req, origin);
    } catch (e: unknown) {
      if (e instanceof PayloadTooLargeError) return jsonError(tooLargeBody, 413, requestId);
      throw e;
    }

    const path = new URL(request.url).pathname;
    const ctx: RequestContext = {
      requestId: brand<string, "RequestId">(requestId),
      startTime,
      ip,
      method,
      path,
      logger: logger.child({ requestId }),
    };

    let response: Response;
    try {
      response = await router.handle(request, ctx, path);
    } catch (e: unknown) {
      logger.error("Unhandled error", {
        requestId,
        error: e instanceof Error ? e.message : String(e),
        stack: e instanceof Error ? e.stack : undefined,
      });
      response = jsonError(internalErrorBody, 500, requestId);
    }

    response.headers.set("X-Request-Id", requestId);

    if (shouldLog) {
      const durationMs = Math.round((performance.now() - startTime) * 100) / 100;
      writeLog(formatAccessLog(method, path, response.status, durationMs, ip, requestId));
    }

    return response;
  };

  return {
    /** Bind and resolve once listening; config.port 0 picks a free port */
    start(): Promise<RunningServer> {
      const server: Server = createHttpServer();
      server.requestTimeout = 30_000;

      server.on("request", (req: IncomingMessage, res: ServerResponse) => {
        const host = req.headers.host ?? `localhost:${boundPort(server, config.port)}`;
        handle(req, `http://${host}`)
          .then((response) => writeResponse(res, response))
          .catch((e: unknown) => {
            logger.error("Failed to write response", {
              error: e instanceof Error ? e.message : String(e),
            });
            if (!res.headersSent) res.statusCode = 500;
            res.end();
          });
      });

      return new Promise((resolve, reject) => {
        server.once("error", reject);
        server.listen(config.port, config.host, () => {
          server.off("error", reject);
          resolve({
            port: boundPort(server, config.port),
            stop: () =>
              new Promise<void>((done, fail) => {
                flushLogs();
                server.close((e) => (e ? fail(e) : done()));
                server.closeIdleConnections();
              }),
          });
        });
      });
    },
    /** Force-flush any buffered access logs (call before exit) */
    flush: flushLogs,
  };
};
