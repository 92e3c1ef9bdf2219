import {
  createServer,
  type IncomingMessage,
  type Server,
  type ServerResponse,
} from "node:http";
import type { AddressInfo } from "node:net";
import type { ListenOptions, Logger } from "./types.ts";

export type FetchHandler = (request: Request) => Promise<Response>;

export interface ServerHandle {
  readonly hostname: string;
  readonly port: number;
  readonly server: Server;
  close(): Promise<void>;
}

function readBody(req: IncomingMessage): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => resolve(Buffer.concat(chunks)));
    req.on("error", reject);
  });
}

async function toRequest(
  req: IncomingMessage,
  signal: AbortSignal,
): Promise<Request> {
  const host = req.headers.host ?? "localhost";
  const url = new URL(req.url ?? "/", `http://${host}`);
  const method = req.method ?? "GET";

  const headers = new Headers();
  for (const [key, value] of Object.entries(req.headers)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      for (const item of value) headers.append(key, item);
    } else {
      headers.set(key, value);
    }
  }

  const hasBody = method !== "GET" && method !== "HEAD";
  const body = hasBody ? await readBody(req) : undefined;

  return new Request(url, {
    method,
    headers,
    body: body && body.length > 0 ? body : undefined,
    signal,
  });
}

async function writeResponse(
  res: ServerResponse,
  response: Response,
): Promise<void> {
  const headers: Record<string, string> = {};
  response.headers.forEach((value, key) => {
    headers[key] = value;
  });
  res.writeHead(response.status, headers);
  const body = response.body
    ? Buffer.from(await response.arrayBuffer())
    : undefined;
  res.end(body);
}

/**
 * Serve a Fetch API handler over `node:http`.
 */
export function serve(
  handler: FetchHandler,
  options: ListenOptions,
  logger: Logger,
): Promise<ServerHandle> {
  const port = options.port ?? 8000;
  const hostname = options.hostname ?? "0.0.0.0";

  const server = createServer((req, res) => {
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) controller.abort();
    });

    toRequest(req, controller.signal)
      .then(handler)
      .then((response) => writeResponse(res, response))
      .catch((error: unknown) => {
        logger.error("Failed to answer request", {
          url: req.url,
          error: error instanceof Error ? error.message : String(error),
        });
        if (!res.headersSent) res.writeHead(500);
        res.end();
      });
  });

  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, hostname, () => {
      server.off("error", reject);
      const address = server.address();
      const bound: AddressInfo | null =
        typeof address === "object" ? address : null;
      const info = { hostname, port: bound ? bound.port : port };
      options.onListen?.(info);
      resolve({
        ...info,
        server,
        close: () =>
          new Promise<void>((done, fail) =>
            server.close((error) => (error ? fail(error) : done()))
          ),
      });
    });
  });
}
