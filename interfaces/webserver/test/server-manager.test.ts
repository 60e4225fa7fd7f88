import { afterEach, describe, it, expect } from "vitest";
import { createOperatorConfig, Dispatcher } from "@operator/core";
import {
  createContentDirectory,
  createSilentLogger,
  shellScript,
  type ContentDirectoryFixture,
} from "@operator/test-utils";
import { ServerManager } from "../src/server-manager";
import { WebserverStartupError } from "../src/errors";

describe("ServerManager", () => {
  let fixture: ContentDirectoryFixture | undefined;

  afterEach(async () => {
    await fixture?.cleanup();
    fixture = undefined;
  });

  async function createManager(
    routes: { errorHandlerRoute?: string; indexRoute?: string } = {},
    bindTo = "127.0.0.1:8080",
  ): Promise<ServerManager> {
    fixture = await createContentDirectory({
      "home.html": "<h1>Home</h1>",
      "home.json.sh": shellScript(`echo '{"page":"home"}'`),
      "echo.json.sh": shellScript('printf "%s" "$OPERATOR_RENDER_DATA"'),
      "error.html.hbs": "{{error.kind}} {{error.status-code}}",
    });
    const logger = createSilentLogger();
    const dispatcher = Dispatcher.createFresh({
      config: createOperatorConfig({
        contentDirectory: fixture.root,
        operatorPath: "/usr/local/bin/operator",
        version: "0.1.0",
        ...routes,
      }),
      logger,
    });
    return new ServerManager({ dispatcher, logger, bindTo });
  }

  describe("requests", () => {
    it("should negotiate on the Accept header", async () => {
      const app = (await createManager()).createApp();

      const res = await app.request("/home", {
        headers: { accept: "text/html" },
      });

      expect(res.status).toBe(200);
      expect(res.headers.get("content-type")).toBe("text/html");
      expect(res.headers.get("cache-control")).toBe("no-cache");
      expect(res.headers.get("etag")).not.toBeNull();
      expect(await res.text()).toBe("<h1>Home</h1>");
    });

    it("should let the URL extension override Accept", async () => {
      const app = (await createManager()).createApp();

      const res = await app.request("/home.json", {
        headers: { accept: "text/html" },
      });

      expect(res.status).toBe(200);
      expect(res.headers.get("content-type")).toBe("application/json");
      expect(await res.text()).toBe('{"page":"home"}\n');
    });

    it("should pass headers and query parameters to content", async () => {
      const app = (await createManager()).createApp();

      const res = await app.request("/echo?page=2", {
        headers: { accept: "application/json", "X-Test": "yes" },
      });
      const data: unknown = await res.json();

      expect(res.status).toBe(200);
      expect(data).toMatchObject({
        request: {
          route: "/echo",
          headers: { accept: "application/json", "x-test": "yes" },
          "query-parameters": { page: "2" },
        },
        "server-info": {
          "socket-address": null,
          "operator-path": "/usr/local/bin/operator",
          version: "0.1.0",
        },
        "target-media-type": "application/json",
      });
    });

    it("should render the error handler with the failure status", async () => {
      const app = (
        await createManager({ errorHandlerRoute: "/error" })
      ).createApp();

      const res = await app.request("/missing", {
        headers: { accept: "text/html" },
      });

      expect(res.status).toBe(404);
      expect(res.headers.get("content-type")).toBe("text/html");
      expect(await res.text()).toBe("NotFound 404");
    });

    it("should answer with the reason phrase when nothing handles a failure", async () => {
      const app = (await createManager()).createApp();

      const res = await app.request("/missing", {
        headers: { accept: "text/html" },
      });

      expect(res.status).toBe(404);
      expect(res.headers.get("content-type")).toBe("text/plain; charset=utf-8");
      expect(await res.text()).toBe("Not Found");
    });

    it("should report ambiguous content as a server error", async () => {
      const app = (await createManager()).createApp();

      const res = await app.request("/home", { headers: { accept: "*/*" } });

      expect(res.status).toBe(500);
      expect(await res.text()).toBe("Internal Server Error");
    });

    it("should reject malformed Accept headers", async () => {
      const app = (await createManager()).createApp();

      const res = await app.request("/home", {
        headers: { accept: "text/html;q=abc" },
      });

      expect(res.status).toBe(400);
      expect((await res.text()).startsWith("Bad Request")).toBe(true);
    });

    it("should serve the index route for /", async () => {
      const app = (await createManager({ indexRoute: "/home" })).createApp();

      const res = await app.request("/", { headers: { accept: "text/html" } });

      expect(res.status).toBe(200);
      expect(await res.text()).toBe("<h1>Home</h1>");
    });

    it("should reject other methods", async () => {
      const app = (await createManager()).createApp();

      const res = await app.request("/home", { method: "POST" });

      expect(res.status).toBe(405);
      expect(res.headers.get("allow")).toBe("GET, HEAD");
    });
  });

  describe("startup", () => {
    it("should accept configured routes that have content", async () => {
      const manager = await createManager({
        errorHandlerRoute: "/error",
        indexRoute: "/home",
      });

      await expect(manager.validateRoutes()).resolves.toBeUndefined();
    });

    it("should refuse an error handler route without content", async () => {
      const manager = await createManager({ errorHandlerRoute: "/oops" });

      await expect(manager.validateRoutes()).rejects.toThrow(
        WebserverStartupError,
      );
    });

    it("should refuse an index route without content", async () => {
      const manager = await createManager({ indexRoute: "/nowhere" });

      await expect(manager.start()).rejects.toThrow(WebserverStartupError);
      expect(manager.getStatus()).toEqual({ running: false, url: undefined });
    });

    it("should refuse an invalid bind address", async () => {
      const manager = await createManager({}, "not-an-address");

      await expect(manager.start()).rejects.toThrow(
        "Invalid bind address not-an-address",
      );
    });
  });
});
