import http from "node:http";
import { randomUUID } from "node:crypto";

import { createInMemoryStore, type GridStore } from "./engine.js";
import { dispatch, internalError, type RouteContext, type RouteResponse } from "./routes.js";

export interface ServerOptions {
  port?: number;
  maxGrids?: number;
  store?: GridStore;
}

export function createServer(opts: ServerOptions = {}): http.Server {
  const ctx: RouteContext = {
    store: opts.store ?? createInMemoryStore({ maxGrids: opts.maxGrids }),
    startedAt: Date.now(),
  };

  return http.createServer(async (req, res) => {
    const requestId = randomUUID();
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

    try {
      const out = dispatch(ctx, {
        method: req.method ?? "GET",
        pathname: url.pathname,
        contentType: req.headers["content-type"],
        rawBody: await readBody(req),
        requestId,
      });
      send(res, out);
    } catch (e) {
      console.error(`[${requestId}] ${req.method} ${url.pathname} failed:`, e);
      send(res, internalError(url.pathname, requestId));
    }
  });
}

export async function startServer(opts: ServerOptions = {}): Promise<{ server: http.Server; port: number }> {
  const server = createServer(opts);
  const port = opts.port ?? 3000;

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => resolve());
  });

  const addr = server.address();
  const actualPort = typeof addr === "object" && addr ? addr.port : port;
  return { server, port: actualPort };
}

async function readBody(req: http.IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const c of req) chunks.push(Buffer.isBuffer(c) ? c : Buffer.from(c));
  return Buffer.concat(chunks).toString("utf8");
}

function send(res: http.ServerResponse, out: RouteResponse): void {
  res.statusCode = out.status;
  if (out.body === undefined) {
    res.end();
    return;
  }
  res.setHeader("content-type", out.contentType ?? "application/json");
  res.end(JSON.stringify(out.body));
}
