import { describe, expect, it } from "vitest";
import { z } from "zod";
import {
  BadRequestError,
  HttpError,
  ValidationError,
} from "../src/errors/mod.ts";
import {
  defaultProtocol,
  isStatusCode,
  JsonProtocol,
  statusCode,
  toJson,
} from "../src/protocol/mod.ts";

const message = z.object({ Message: z.string() });

function get(): Request {
  return new Request("http://localhost/items");
}

function post(body?: string): Request {
  return new Request("http://localhost/items", { method: "POST", body });
}

async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("expected a rejection");
}

describe("JsonProtocol", () => {
  const protocol = new JsonProtocol();

  describe("encodeResponse()", () => {
    it("should answer 200 with a JSON body", async () => {
      const res = await protocol.encodeResponse(get(), 0, undefined, {
        a: 1,
      });

      expect(res.status).toBe(200);
      expect(res.headers.get("Content-Type")).toBe("application/json");
      expect(await res.text()).toBe('{"a":1}');
    });

    it("should answer 201 for a POST with a body", async () => {
      const res = await protocol.encodeResponse(post(), 0, undefined, 0);

      expect(res.status).toBe(201);
      expect(await res.text()).toBe("0");
    });

    it("should answer 204 without a body", async () => {
      const fromGet = await protocol.encodeResponse(get(), 0, undefined, null);
      const fromPost = await protocol.encodeResponse(
        post(),
        0,
        undefined,
        undefined,
      );

      expect(fromGet.status).toBe(204);
      expect(fromPost.status).toBe(204);
      expect(await fromPost.text()).toBe("");
    });

    it("should keep an explicit status", async () => {
      const res = await protocol.encodeResponse(get(), 418, undefined, {
        Message: "teapot",
      });

      expect(res.status).toBe(418);
      expect(await res.json()).toEqual({ Message: "teapot" });
    });

    it("should drop the body of null-body statuses", async () => {
      const res = await protocol.encodeResponse(get(), 204, undefined, {
        ignored: true,
      });

      expect(res.status).toBe(204);
      expect(await res.text()).toBe("");
    });

    it("should write bigints as strings", async () => {
      const res = await protocol.encodeResponse(get(), 0, undefined, {
        id: 9007199254740993n,
      });

      expect(await res.text()).toBe('{"id":"9007199254740993"}');
    });

    it("should encode an HttpError with its status", async () => {
      const res = await protocol.encodeResponse(
        get(),
        0,
        new BadRequestError("invalid"),
        { ignored: true },
      );

      expect(res.status).toBe(400);
      expect(await res.text()).toBe('{"status":400,"message":"invalid"}');
    });

    it("should keep a non-error status carried by an HttpError", async () => {
      const res = await protocol.encodeResponse(
        get(),
        0,
        new HttpError("moved", 302),
        undefined,
      );

      expect(res.status).toBe(302);
      expect(await res.json()).toEqual({ status: 302, message: "moved" });
    });

    it("should encode other errors as 500", async () => {
      const res = await protocol.encodeResponse(
        get(),
        0,
        new Error("error"),
        undefined,
      );

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({ status: 500, message: "error" });
    });

    it("should use the given status for other errors", async () => {
      const res = await protocol.encodeResponse(
        get(),
        422,
        new Error("bad segment"),
        undefined,
      );

      expect(res.status).toBe(422);
      expect(await res.json()).toEqual({ status: 422, message: "bad segment" });
    });

    it("should apply a custom error transformer", async () => {
      const custom = new JsonProtocol({
        transformError: () => new HttpError("unavailable", 503),
      });
      const res = await custom.encodeResponse(
        get(),
        0,
        new Error("secret detail"),
        undefined,
      );

      expect(res.status).toBe(503);
      expect(await res.json()).toEqual({ status: 503, message: "unavailable" });
    });
  });

  describe("decodeRequest()", () => {
    it("should decode and validate a JSON body", async () => {
      const value = await protocol.decodeRequest(
        post('{"Message":"teapot"}'),
        message,
      );

      expect(value).toEqual({ Message: "teapot" });
    });

    it("should reject a body that fails its schema", async () => {
      const error = await rejectionOf(
        protocol.decodeRequest(post('{"Message":1}'), message),
      );

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toHaveProperty("status", 422);
      expect(error).toHaveProperty("issues.0.path", "Message");
    });

    it("should reject malformed JSON", async () => {
      const error = await rejectionOf(
        protocol.decodeRequest(post("{"), message),
      );

      expect(error).toBeInstanceOf(SyntaxError);
    });
  });

  describe("encodeRequest()", () => {
    it("should return the request when there is no value", () => {
      const request = get();
      expect(protocol.encodeRequest(request, undefined)).toBe(request);
    });

    it("should write the value as JSON", async () => {
      const request = protocol.encodeRequest(post(), { Message: "teapot" });

      expect(request.method).toBe("POST");
      expect(request.headers.get("Content-Type")).toBe("application/json");
      expect(request.headers.get("Accept")).toBe("application/json");
      expect(await request.text()).toBe('{"Message":"teapot"}');
    });
  });

  describe("decodeResponse()", () => {
    it("should decode a successful body", async () => {
      const value = await protocol.decodeResponse(
        new Response('{"Message":"teapot"}', { status: 200 }),
        message,
      );

      expect(value).toEqual({ Message: "teapot" });
    });

    it("should rebuild the error from an error body", async () => {
      const error = await rejectionOf(
        protocol.decodeResponse(
          new Response('{"status":400,"message":"invalid"}', { status: 400 }),
          message,
        ),
      );

      expect(error).toBeInstanceOf(HttpError);
      expect(error).toHaveProperty("status", 400);
      expect(error).toHaveProperty("message", "invalid");
    });

    it("should use the text of an error body that is not JSON", async () => {
      const error = await rejectionOf(
        protocol.decodeResponse(
          new Response("Internal Server Error", {
            status: 500,
            headers: { "Content-Type": "text/plain" },
          }),
          message,
        ),
      );

      expect(error).toBeInstanceOf(HttpError);
      expect(error).toHaveProperty("status", 500);
      expect(error).toHaveProperty("message", "Internal Server Error");
    });

    it("should reject a successful body that is not JSON", async () => {
      const error = await rejectionOf(
        protocol.decodeResponse(new Response("ok", { status: 200 }), message),
      );

      expect(error).toBeInstanceOf(SyntaxError);
    });

    it("should fall back to the response status line", async () => {
      const error = await rejectionOf(
        protocol.decodeResponse(
          new Response(null, { status: 502, statusText: "Bad Gateway" }),
          message,
        ),
      );

      expect(error).toHaveProperty("status", 502);
      expect(error).toHaveProperty("message", "Bad Gateway");
    });
  });

  it("should be the default protocol", () => {
    expect(defaultProtocol).toBeInstanceOf(JsonProtocol);
  });
});

describe("status codes", () => {
  it("should accept integers from 200 to 599", () => {
    expect(isStatusCode(200)).toBe(true);
    expect(isStatusCode(599)).toBe(true);
    expect(isStatusCode(199)).toBe(false);
    expect(isStatusCode(600)).toBe(false);
    expect(isStatusCode(204.5)).toBe(false);
    expect(isStatusCode("200")).toBe(false);
  });

  it("should throw for an invalid status", () => {
    expect(statusCode(418)).toBe(418);
    expect(() => statusCode(99)).toThrow("Invalid status code: 99");
  });
});

describe("toJson()", () => {
  it("should stringify nested bigints", () => {
    expect(toJson({ list: [1n, 2] })).toBe('{"list":["1",2]}');
  });
});
