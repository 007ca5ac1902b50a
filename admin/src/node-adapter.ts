import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import { createLogger } from "@hostpanel/lib/shared/logger.ts";
import type { AdminHandler } from "./server.ts";

const log = createLogger("admin");

async function readBody(req: IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
}

/** Convert a Node request into a fetch `Request` addressed at `origin`. */
export async function toFetchRequest(req: IncomingMessage, origin: string): Promise<Request> {
  const headers = new Headers();
  for (const [name, value] of Object.entries(req.headers)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      for (const item of value) headers.append(name, item);
    } else {
      headers.set(name, value);
    }
  }
  const method = req.method ?? "GET";
  const hasBody = method !== "GET" && method !== "HEAD";
  return new Request(new URL(req.url ?? "/", origin), {
    method,
    headers,
    body: hasBody ? await readBody(req) : undefined,
  });
}

export async function writeFetchResponse(res: ServerResponse, response: Response): Promise<void> {
  const body = await response.text();
  res.writeHead(response.status, Object.fromEntries(response.headers.entries()));
  res.end(body);
}

/**
 * Serve `handler` on a Node http server; the caller starts listening.
 * Routing only looks at the path, so requests are addressed at a fixed origin.
 */
export function createNodeServer(handler: AdminHandler, origin = "http://localhost"): Server {
  return createServer((req, res) => {
    toFetchRequest(req, origin)
      .then(handler)
      .then((response) => writeFetchResponse(res, response))
      .catch((error: unknown) => {
        log.error("request failed", { error: error instanceof Error ? error.message : String(error) });
        if (!res.headersSent) res.writeHead(500, { "content-type": "application/json" });
        res.end(JSON.stringify({ error: "internal_error" }));
      });
  });
}
