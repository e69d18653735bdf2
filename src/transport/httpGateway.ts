import { randomUUID } from "node:crypto";
import { createServer, IncomingMessage, ServerResponse } from "node:http";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { describeError, RequestRejectedError } from "../domain/errors.js";
import { Logger, silentLogger } from "../utils/logger.js";

export const MCP_PATH = "/mcp";

const SESSION_HEADER = "mcp-session-id";

export interface HttpGatewayOptions {
  /** Builds a fresh MCP server for every initialized session. */
  serverFactory: () => McpServer;
  maxBodyBytes: number;
  logger?: Logger;
}

interface McpSession {
  server: McpServer;
  transport: StreamableHTTPServerTransport;
}

/** Reads and parses a JSON request body; an empty body parses as `{}`. */
export async function readJsonBody(
  body: AsyncIterable<Buffer | string>,
  maxBytes: number,
): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of body) {
    const buffer = typeof chunk === "string" ? Buffer.from(chunk, "utf-8") : chunk;
    size += buffer.length;
    if (size > maxBytes) {
      throw new RequestRejectedError(`Request body exceeds ${maxBytes} bytes.`, 413);
    }
    chunks.push(buffer);
  }

  const raw = Buffer.concat(chunks).toString("utf-8").trim();
  if (!raw) {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (error) {
    throw new RequestRejectedError(`Invalid JSON body: ${describeError(error)}`, 400);
  }
}

export function sessionIdOf(req: IncomingMessage): string | null {
  const value = req.headers[SESSION_HEADER];
  const sessionId = Array.isArray(value) ? value[0] : value;
  return sessionId || null;
}

/**
 * Streamable HTTP front for the MCP server. Each client gets its own MCP
 * server and transport, keyed by the session id the transport hands out on
 * initialize; every server shares the same suggestion service.
 */
export class McpHttpGateway {
  private readonly sessions = new Map<string, McpSession>();

  private readonly logger: Logger;

  constructor(private readonly options: HttpGatewayOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  async handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    try {
      await this.route(req, res);
    } catch (error) {
      const status = error instanceof RequestRejectedError ? error.status : 500;
      this.logger.error("http request failed", {
        method: req.method,
        path: req.url,
        status,
        reason: describeError(error),
      });
      if (!res.headersSent) {
        sendJsonRpcError(res, status, -32603, describeError(error));
      }
    }
  }

  async closeAll(): Promise<void> {
    const open = [...this.sessions.values()];
    this.sessions.clear();
    await Promise.all(
      open.map(async ({ server, transport }) => {
        await transport.close();
        await server.close();
      }),
    );
  }

  private async route(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const { pathname } = new URL(req.url ?? "/", "http://localhost");
    if (pathname === "/healthz") {
      sendJson(res, 200, { ok: true, sessions: this.sessions.size });
      return;
    }
    if (pathname !== MCP_PATH) {
      sendJson(res, 404, { error: `No route for ${pathname}` });
      return;
    }

    const sessionId = sessionIdOf(req);
    const session = sessionId ? this.sessions.get(sessionId) : undefined;

    switch (req.method) {
      case "POST": {
        const body = await readJsonBody(req, this.options.maxBodyBytes);
        if (session) {
          await session.transport.handleRequest(req, res, body);
        } else if (sessionId) {
          sendJsonRpcError(res, 404, -32001, `Unknown session ${sessionId}`);
        } else if (isInitializeRequest(body)) {
          await this.openSession(req, res, body);
        } else {
          sendJsonRpcError(res, 400, -32000, "Send an initialize request to open a session first");
        }
        return;
      }
      case "GET":
      case "DELETE":
        if (!session) {
          sendJsonRpcError(res, 400, -32000, `Missing or unknown ${SESSION_HEADER} header`);
          return;
        }
        await session.transport.handleRequest(req, res);
        return;
      default:
        res.setHeader("Allow", "GET, POST, DELETE");
        sendJson(res, 405, { error: `Method ${req.method ?? "?"} not allowed` });
    }
  }

  private async openSession(req: IncomingMessage, res: ServerResponse, body: unknown): Promise<void> {
    const server = this.options.serverFactory();
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (sessionId) => {
        this.sessions.set(sessionId, { server, transport });
        this.logger.debug("mcp session opened", { session_id: sessionId });
      },
    });
    transport.onclose = () => {
      if (transport.sessionId) {
        this.forget(transport.sessionId);
      }
    };

    await server.connect(transport);
    await transport.handleRequest(req, res, body);
  }

  private forget(sessionId: string): void {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return;
    }
    this.sessions.delete(sessionId);
    this.logger.debug("mcp session closed", { session_id: sessionId });
    session.server.close().catch((error: unknown) => {
      this.logger.warn("failed to close mcp session", {
        session_id: sessionId,
        reason: describeError(error),
      });
    });
  }
}

/** Serves the gateway until the returned stop function is called. */
export async function listenHttp(
  gateway: McpHttpGateway,
  host: string,
  port: number,
): Promise<() => Promise<void>> {
  const httpServer = createServer((req, res) => {
    void gateway.handle(req, res);
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(port, host, () => {
      httpServer.off("error", reject);
      resolve();
    });
  });

  return async () => {
    await gateway.closeAll();
    await new Promise<void>((resolve, reject) => {
      httpServer.close((error) => (error ? reject(error) : resolve()));
    });
  };
}

function sendJson(res: ServerResponse, status: number, payload: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(payload));
}

function sendJsonRpcError(res: ServerResponse, status: number, code: number, message: string): void {
  sendJson(res, status, { jsonrpc: "2.0", error: { code, message }, id: null });
}
