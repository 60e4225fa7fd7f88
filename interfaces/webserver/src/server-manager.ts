import { Hono } from "hono";
import { compress } from "hono/compress";
import { etag } from "hono/etag";
import type { Server } from "node:net";
import { serve } from "@hono/node-server";
import type { Dispatcher } from "@operator/core";
import type { ServerInfo } from "@operator/render-context";
import type { Logger } from "@operator/utils";
import { parseBindAddress } from "./config";
import { WebserverStartupError } from "./errors";
import { createRequestHandler, reasonPhrase } from "./request-handler";

export interface ServerManagerOptions {
  dispatcher: Dispatcher;
  logger: Logger;
  bindTo: string;
}

function formatSocketAddress(hostname: string, port: number): string {
  return hostname.includes(":")
    ? `[${hostname}]:${port}`
    : `${hostname}:${port}`;
}

/**
 * Serves a content directory over HTTP
 */
export class ServerManager {
  private logger: Logger;
  private options: ServerManagerOptions;
  private server: Server | null = null;
  private socketAddress: string | null = null;

  constructor(options: ServerManagerOptions) {
    this.logger = options.logger.child("ServerManager");
    this.options = options;
  }

  /**
   * Server info reported to content; the socket address is known once the
   * server is listening
   */
  public getServerInfo(): ServerInfo {
    const { operatorPath, version } = this.options.dispatcher.getConfig();
    return { socketAddress: this.socketAddress, operatorPath, version };
  }

  /**
   * Create the Hono app
   */
  public createApp(): Hono {
    const app = new Hono();

    // Add middleware
    app.use("/*", compress());
    app.use("/*", etag());

    // Rendered content may change on every request
    app.use("/*", async (c, next) => {
      await next();
      c.header("Cache-Control", "no-cache");
    });

    app.get(
      "*",
      createRequestHandler({
        dispatcher: this.options.dispatcher,
        logger: this.logger,
        serverInfo: () => this.getServerInfo(),
      }),
    );

    app.all("*", (c) =>
      c.text(reasonPhrase(405), 405, { Allow: "GET, HEAD" }),
    );

    app.onError((error, c) => {
      this.logger.error(`Unhandled error for ${c.req.path}`, error);
      return c.text(reasonPhrase(500), 500);
    });

    return app;
  }

  /**
   * Refuse to start when the index or error handler route has no content
   */
  public async validateRoutes(): Promise<void> {
    const config = this.options.dispatcher.getConfig();
    const resolver = this.options.dispatcher.getResolver();

    const routes: Array<[string, string | undefined]> = [
      ["index route", config.indexRoute],
      ["error handler route", config.errorHandlerRoute],
    ];
    for (const [name, route] of routes) {
      if (route !== undefined && !(await resolver.hasCandidates(route))) {
        throw new WebserverStartupError(
          `The ${name} ${route} has no content in ${config.contentDirectory}`,
          { route },
        );
      }
    }
  }

  /**
   * Start the server
   */
  async start(): Promise<string> {
    if (this.server) {
      this.logger.warn("Server already running");
      return `http://${this.socketAddress}`;
    }

    const address = parseBindAddress(this.options.bindTo);
    if (!address) {
      throw new WebserverStartupError(
        `Invalid bind address ${this.options.bindTo}`,
        { bindTo: this.options.bindTo },
      );
    }

    await this.validateRoutes();

    this.logger.info(`Starting server on ${this.options.bindTo}`);
    const app = this.createApp();

    const socketAddress = await new Promise<string>((resolve, reject) => {
      const server: Server = serve(
        { fetch: app.fetch, hostname: address.hostname, port: address.port },
        (info) => resolve(formatSocketAddress(address.hostname, info.port)),
      );
      server.once("error", reject);
      this.server = server;
    });

    this.socketAddress = socketAddress;
    const url = `http://${socketAddress}`;
    this.logger.info(`Server started at ${url}`);
    return url;
  }

  /**
   * Stop the server
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      this.logger.warn("Server not running");
      return;
    }

    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    this.server = null;
    this.socketAddress = null;
    this.logger.info("Server stopped");
  }

  /**
   * Get server status
   */
  getStatus(): { running: boolean; url: string | undefined } {
    return {
      running: !!this.server,
      url: this.socketAddress ? `http://${this.socketAddress}` : undefined,
    };
  }
}
