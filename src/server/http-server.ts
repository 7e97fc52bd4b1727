import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import type { Registry } from "prom-client";
import type { HandlerContext } from "../bot/context";
import type { WebHookHandler } from "../bot/handler";
import { metricsRegistry } from "../bot/metrics";
import { logger } from "../logger";
import { writeJson } from "../utils/http";

export interface HttpServerConfig {
  host?: string;
  port?: number;
  metricsPath?: string;
}

/**
 * Serves web hooks through a top-level WebHookHandler (normally the mux) and
 * the Prometheus metrics of the dispatch engine.
 */
export class HttpServer {
  private server: Server | null = null;
  private readonly registry: Registry;

  constructor(
    private readonly config: HttpServerConfig,
    private readonly hooks: WebHookHandler,
    private readonly context: HandlerContext,
    registry: Registry = metricsRegistry,
  ) {
    this.registry = registry;
  }

  async start(): Promise<void> {
    if (this.server) {
      return;
    }
    const host = this.config.host ?? "127.0.0.1";
    const port = this.config.port ?? 8080;

    const server = createServer((req, res) => {
      void this.handleRequest(req, res);
    });

    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(port, host, () => {
        server.off("error", reject);
        resolve();
      });
    });

    this.server = server;
    logger.info({ host, port: this.getPort() }, "HTTP server listening");
  }

  async stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) {
      return;
    }
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    logger.info("HTTP server stopped");
  }

  /** Bound port, or undefined when not listening. */
  getPort(): number | undefined {
    const address = this.server?.address();
    if (!address || typeof address === "string") {
      return undefined;
    }
    return address.port;
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    try {
      const url = new URL(req.url ?? "/", "http://localhost");
      if (url.pathname === (this.config.metricsPath ?? "/metrics")) {
        await this.serveMetrics(req, res);
        return;
      }
      await this.hooks.serveHttp(req, res, this.context);
    } catch (error) {
      logger.warn({ err: error, url: req.url }, "HTTP request failed");
      if (!res.headersSent) {
        writeJson(res, 500, { error: "internal_error" });
      } else {
        res.end();
      }
    }
  }

  private async serveMetrics(req: IncomingMessage, res: ServerResponse): Promise<void> {
    if (req.method !== "GET" && req.method !== "HEAD") {
      res.setHeader("allow", "GET, HEAD");
      writeJson(res, 405, { error: "method_not_allowed" });
      return;
    }
    const body = await this.registry.metrics();
    res.statusCode = 200;
    res.setHeader("content-type", this.registry.contentType);
    res.end(req.method === "HEAD" ? undefined : body);
  }
}
