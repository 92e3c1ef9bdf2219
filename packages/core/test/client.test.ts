import { describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { Rest } from "../src/app/mod.ts";
import { p, reply } from "../src/binding/mod.ts";
import { RestClient } from "../src/client/mod.ts";
import { HttpError, ValidationError } from "../src/errors/mod.ts";
import { defaultProtocol, type Protocol } from "../src/protocol/mod.ts";

const message = z.object({ Message: z.string() });

function createApp(prefix?: string): Rest {
  const app = new Rest({ prefix, logger: { level: "silent" } });

  app.get("/integer/:id", {
    params: [p.int()],
    returns: "body",
    handler: (id) => reply.body(id + 33),
  });

  app.post("/request_body", {
    params: [p.body(message)],
    returns: "body",
    handler: (body) => reply.body({ Message: `${body.Message} teapot` }),
  });

  app.get("/custom_error", {
    returns: "body",
    handler: () => new HttpError("invalid", 400),
  });

  app.get("/headers", {
    params: [p.request()],
    returns: "body",
    handler: (req) => reply.body(req.headers.get("x-client")),
  });

  app.delete("/items/:id", {
    params: [p.uint()],
    returns: "none",
    handler: () => reply.none(),
  });

  return app;
}

async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("expected a rejection");
}

describe("RestClient", () => {
  const app = createApp();
  const client = new RestClient({
    baseUrl: "http://localhost",
    fetch: app.fetch,
  });

  it("should decode a response into its target", async () => {
    expect(await client.get("/integer/10", { target: z.number() })).toBe(43);
  });

  it("should encode the request body", async () => {
    const value = await client.post("/request_body", {
      body: { Message: "hello" },
      target: message,
    });

    expect(value).toEqual({ Message: "hello teapot" });
  });

  it("should reject with the error sent by the server", async () => {
    const error = await rejectionOf(client.get("/custom_error"));

    expect(error).toBeInstanceOf(HttpError);
    expect(error).toHaveProperty("status", 400);
    expect(error).toHaveProperty("message", "invalid");
  });

  it("should surface binding failures", async () => {
    const error = await rejectionOf(
      client.get("/integer/x", { target: z.number() }),
    );

    expect(error).toHaveProperty("status", 422);
  });

  it("should resolve without a target", async () => {
    await expect(client.delete("/items/3")).resolves.toBeUndefined();
  });

  it("should reject a response that fails its target", async () => {
    const error = await rejectionOf(
      client.get("/integer/1", { target: z.string() }),
    );

    expect(error).toBeInstanceOf(ValidationError);
  });

  it("should send default and per-request headers", async () => {
    const withDefaults = new RestClient({
      baseUrl: "http://localhost",
      fetch: app.fetch,
      headers: { "x-client": "default" },
    });

    expect(
      await withDefaults.get("/headers", { target: z.string() }),
    ).toBe("default");
    expect(
      await withDefaults.get("/headers", {
        target: z.string(),
        headers: { "x-client": "override" },
      }),
    ).toBe("override");
  });

  it("should reject with an HttpError for a plain-text error response", async () => {
    const broken: Protocol = {
      decodeRequest: (request, target) =>
        defaultProtocol.decodeRequest(request, target),
      encodeResponse: () => Promise.reject(new Error("encoder down")),
      encodeRequest: (request, value) =>
        defaultProtocol.encodeRequest(request, value),
      decodeResponse: (response, target) =>
        defaultProtocol.decodeResponse(response, target),
    };
    const failing = new Rest({
      protocol: broken,
      logger: { level: "silent" },
    });
    const plain = new RestClient({
      baseUrl: "http://localhost",
      fetch: failing.fetch,
    });

    const error = await rejectionOf(plain.get("/x"));

    expect(error).toBeInstanceOf(HttpError);
    expect(error).toHaveProperty("status", 500);
    expect(error).toHaveProperty("message", "Internal Server Error");
  });

  it("should not decode a successful body without a target", async () => {
    const text = new RestClient({
      baseUrl: "http://localhost",
      fetch: async () => new Response("done", { status: 200 }),
    });

    await expect(text.get("/anything")).resolves.toBeUndefined();
  });

  it("should keep paths with repeated leading slashes on the base host", async () => {
    const fetch = vi.fn(app.fetch);
    const rooted = new RestClient({ baseUrl: "http://localhost", fetch });

    expect(await rooted.get("//integer/2", { target: z.number() })).toBe(35);
    expect(fetch.mock.calls[0][0].url).toBe("http://localhost/integer/2");
  });

  it("should resolve paths under the base URL path", async () => {
    const prefixed = createApp("/api");
    const fetch = vi.fn(prefixed.fetch);
    const scoped = new RestClient({ baseUrl: "http://localhost/api", fetch });

    expect(await scoped.get("/integer/1", { target: z.number() })).toBe(34);
    expect(fetch.mock.calls[0][0].url).toBe("http://localhost/api/integer/1");
  });
});
