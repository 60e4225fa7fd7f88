import { afterEach, describe, it, expect } from "vitest";
import { parseAcceptHeader, parseMediaType } from "@operator/media-type";
import {
  createContentDirectory,
  createSilentLogger,
  type ContentDirectoryFixture,
} from "@operator/test-utils";
import { createOperatorConfig } from "../src/config";
import { Dispatcher } from "../src/dispatcher";
import { evaluate, get, resolveAndRender } from "../src/operations";
import type { DispatchOutcome } from "../src/types";

function bodyOf(outcome: DispatchOutcome): string {
  if (outcome.status === "failed") {
    throw new Error(`dispatch failed: ${outcome.failure.message}`);
  }
  return outcome.result.body.toString("utf8");
}

describe("front-end operations", () => {
  let fixture: ContentDirectoryFixture | undefined;

  afterEach(async () => {
    await fixture?.cleanup();
    fixture = undefined;
  });

  async function createDispatcher(): Promise<Dispatcher> {
    fixture = await createContentDirectory({
      "info.txt.hbs":
        "{{server-info.operator-path}} {{server-info.version}}|{{server-info.socket-address}}",
      ".partials/nav.html": "<nav></nav>",
    });
    return Dispatcher.createFresh({
      config: createOperatorConfig({
        contentDirectory: fixture.root,
        operatorPath: "/usr/local/bin/operator",
        version: "0.1.0",
      }),
      logger: createSilentLogger(),
    });
  }

  it("should report the socket address when serving", async () => {
    const dispatcher = await createDispatcher();

    const outcome = await resolveAndRender(dispatcher, {
      route: "/info",
      headers: {},
      query: {},
      serverInfo: {
        socketAddress: "127.0.0.1:8080",
        operatorPath: "/usr/local/bin/operator",
        version: "0.1.0",
      },
    });

    expect(bodyOf(outcome)).toBe("/usr/local/bin/operator 0.1.0|127.0.0.1:8080");
  });

  it("should render single routes without a socket address", async () => {
    const dispatcher = await createDispatcher();

    const outcome = await get(dispatcher, {
      route: "/info",
      preferences: parseAcceptHeader("text/plain"),
    });

    expect(bodyOf(outcome)).toBe("/usr/local/bin/operator 0.1.0|");
  });

  it("should evaluate template text against the content directory", async () => {
    const dispatcher = await createDispatcher();

    const result = await evaluate(
      dispatcher,
      '{{get "/.partials/nav"}} at {{request.route}}',
      { mediaType: parseMediaType("text/html") },
    );

    expect(result.body.toString()).toBe("<nav></nav> at /");
    expect(result.mediaType).toEqual(parseMediaType("text/html"));
  });

  it("should evaluate as application/octet-stream by default", async () => {
    const dispatcher = await createDispatcher();

    const result = await evaluate(dispatcher, "{{target-media-type}}");

    expect(result.body.toString()).toBe("application/octet-stream");
    expect(result.mediaType).toEqual(
      parseMediaType("application/octet-stream"),
    );
  });

  it("should evaluate with an explicit media type and route", async () => {
    const dispatcher = await createDispatcher();

    const result = await evaluate(dispatcher, "{{request.route}}", {
      route: "/somewhere",
      mediaType: parseMediaType("text/plain"),
    });

    expect(result.body.toString()).toBe("/somewhere");
    expect(result.mediaType).toEqual(parseMediaType("text/plain"));
  });

  it("should reject invalid template text", async () => {
    const dispatcher = await createDispatcher();

    await expect(evaluate(dispatcher, "{{#if}}")).rejects.toMatchObject({
      kind: "TemplateError",
    });
  });
});
