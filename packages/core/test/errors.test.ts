import { describe, expect, it } from "vitest";
import {
  BadRequestError,
  codeForStatus,
  HttpError,
  httpError,
  InternalError,
  isErrorStatus,
  isHttpError,
  isResponseStatus,
  NotFoundError,
  RegistrationError,
  toHttpError,
  ValidationError,
} from "../src/errors/mod.ts";

describe("HttpError", () => {
  it("should create error with defaults", () => {
    const error = new HttpError("Something went wrong");

    expect(error.message).toBe("Something went wrong");
    expect(error.status).toBe(500);
    expect(error.code).toBe("INTERNAL_ERROR");
    expect(error).toBeInstanceOf(Error);
  });

  it("should serialize to the error body", () => {
    const error = new HttpError("invalid", 400, "BAD_REQUEST");

    expect(error.toJSON()).toEqual({ status: 400, message: "invalid" });
    expect(JSON.stringify(error)).toBe('{"status":400,"message":"invalid"}');
    expect(error.toString()).toBe("400: invalid");
  });

  it("should build errors from a status", () => {
    const error = httpError(418, "teapot");

    expect(error.status).toBe(418);
    expect(error.code).toBe("IM_A_TEAPOT");
    expect(codeForStatus(499)).toBe("CLIENT_ERROR");
    expect(codeForStatus(599)).toBe("SERVER_ERROR");
  });
});

describe("HTTP error classes", () => {
  it("should carry their statuses", () => {
    expect(new BadRequestError().status).toBe(400);
    expect(new NotFoundError().message).toBe("Not Found");
    expect(new InternalError().status).toBe(500);
  });

  it("should format validation issues", () => {
    const error = new ValidationError([
      { path: "name", message: "Required" },
      { path: "items[0]", message: "Expected number" },
    ]);

    expect(error.status).toBe(422);
    expect(error.code).toBe("VALIDATION_ERROR");
    expect(error.message).toBe(
      "Validation failed: name: Required; items[0]: Expected number",
    );
    expect(new ValidationError([]).message).toBe("Validation failed");
  });
});

describe("toHttpError()", () => {
  it("should keep an HttpError", () => {
    const error = new NotFoundError("missing");
    expect(toHttpError(error)).toBe(error);
    expect(isHttpError(error)).toBe(true);
  });

  it("should wrap other errors as 500", () => {
    const error = toHttpError(new Error("boom"));

    expect(error.status).toBe(500);
    expect(error.message).toBe("boom");
    expect(toHttpError("oops").message).toBe("oops");
    expect(isHttpError(new Error("plain"))).toBe(false);
  });

  it("should use the fallback status for other errors", () => {
    const error = toHttpError(new Error("bad input"), 422);

    expect(error.status).toBe(422);
    expect(error.code).toBe("UNPROCESSABLE_ENTITY");
  });

  it("should keep any status a response can carry", () => {
    const moved = new HttpError("moved", 302);

    expect(toHttpError(moved)).toBe(moved);
    expect(isResponseStatus(302)).toBe(true);
    expect(isErrorStatus(302)).toBe(false);
  });

  it("should replace a status no response can carry", () => {
    const error = toHttpError(new HttpError("odd", 700));

    expect(error.status).toBe(500);
    expect(error.message).toBe("odd");
    expect(isResponseStatus(700)).toBe(false);
    expect(isResponseStatus(404.5)).toBe(false);
  });

  it("should replace a fallback status that is not an error status", () => {
    expect(toHttpError(new Error("odd"), 302).status).toBe(500);
  });
});

describe("RegistrationError", () => {
  it("should name the route", () => {
    const error = new RegistrationError("GET", "/users/:id", "bad handler");

    expect(error.message).toBe("GET /users/:id: bad handler");
    expect(error.method).toBe("GET");
    expect(error.path).toBe("/users/:id");
  });
});
