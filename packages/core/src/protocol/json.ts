/**
 * JSON implementation of the protocol.
 */

import {
  type ErrorTransformer,
  httpError,
  type HttpError,
  toHttpError,
} from "../errors/mod.ts";
import { createValidationError, validate } from "../schema/mod.ts";
import { NULL_BODY_STATUSES } from "./status.ts";
import type { BodyTarget, Protocol } from "./types.ts";

const JSON_CONTENT_TYPE = "application/json";
const JSON_HEADERS = Object.freeze({ "Content-Type": JSON_CONTENT_TYPE });

export interface JsonProtocolOptions {
  /** Turns handler and binder failures into the error that is sent */
  transformError?: ErrorTransformer;
}

/**
 * Serialize a value as JSON. Bigints are written as decimal strings.
 */
export function toJson(value: unknown): string {
  return JSON.stringify(
    value,
    (_key, v: unknown) => typeof v === "bigint" ? v.toString() : v,
  );
}

function parseJson(text: string): unknown {
  return text.length === 0 ? undefined : JSON.parse(text);
}

/**
 * JSON protocol with a `{ status, message }` error body.
 *
 * @example
 * ```typescript
 * const app = new Rest({ protocol: new JsonProtocol() });
 * ```
 */
export class JsonProtocol implements Protocol {
  private readonly transformError: ErrorTransformer;

  constructor(options: JsonProtocolOptions = {}) {
    this.transformError = options.transformError ?? toHttpError;
  }

  async decodeRequest<T>(request: Request, target: BodyTarget<T>): Promise<T> {
    return this.check(target, parseJson(await request.text()));
  }

  async encodeResponse(
    request: Request,
    status: number,
    error: unknown,
    body: unknown,
  ): Promise<Response> {
    if (error !== undefined && error !== null) {
      const response = this.transformError(error, status);
      return this.encodeResponse(
        request,
        response.status,
        undefined,
        response.toJSON(),
      );
    }

    const hasBody = body !== undefined && body !== null;
    if (status === 0) {
      if (request.method === "POST" && hasBody) {
        status = 201;
      } else if (!hasBody) {
        status = 204;
      } else {
        status = 200;
      }
    }

    const payload = body === undefined || NULL_BODY_STATUSES.has(status)
      ? null
      : toJson(body);
    return new Response(payload, { status, headers: JSON_HEADERS });
  }

  encodeRequest(request: Request, value: unknown): Request {
    if (value === undefined || value === null) {
      return request;
    }
    const headers = new Headers(request.headers);
    headers.set("Content-Type", JSON_CONTENT_TYPE);
    headers.set("Accept", JSON_CONTENT_TYPE);
    return new Request(request, { body: toJson(value), headers });
  }

  async decodeResponse<T>(
    response: Response,
    target: BodyTarget<T>,
  ): Promise<T> {
    const text = await response.text();
    if (response.status < 400) {
      return this.check(target, parseJson(text));
    }
    throw errorFromBody(text, response);
  }

  private async check<T>(target: BodyTarget<T>, value: unknown): Promise<T> {
    const result = await validate(target, value);
    if (!result.success) {
      throw createValidationError(result.issues);
    }
    return result.data;
  }
}

function parseErrorBody(text: string): unknown {
  try {
    return parseJson(text);
  } catch {
    return undefined;
  }
}

/**
 * Rebuild the error an error response carries. A body that is not an
 * error object leaves the response status, and its text or status line as
 * the message.
 */
function errorFromBody(text: string, response: Response): HttpError {
  let status = response.status;
  let message = response.statusText;
  const value = parseErrorBody(text);
  if (value === undefined && text.length > 0) {
    message = text;
  } else if (typeof value === "object" && value !== null) {
    if ("status" in value && typeof value.status === "number") {
      status = value.status;
    }
    if ("message" in value && typeof value.message === "string") {
      message = value.message;
    }
  }
  return httpError(status, message);
}

/**
 * Protocol used by a {@link Rest} instance that is not given one.
 */
export const defaultProtocol: Protocol = new JsonProtocol();
