/**
 * Protocol abstraction: the wire-format boundary between the dispatcher
 * (or a client) and HTTP payloads.
 */

import type { StandardSchema } from "../schema/mod.ts";

/**
 * Target of a decode: a schema that builds and checks the decoded value.
 */
export type BodyTarget<T> = StandardSchema<unknown, T>;

declare const statusCodeBrand: unique symbol;

/**
 * An explicit HTTP status returned by a handler. Create one with
 * {@link statusCode}.
 */
export type StatusCode = number & { readonly [statusCodeBrand]: true };

/**
 * Used by the server to decode request payloads.
 */
export interface ServerDecoder {
  decodeRequest<T>(request: Request, target: BodyTarget<T>): Promise<T>;
}

/**
 * Used by the server to encode responses.
 *
 * `status` 0 lets the encoder pick a default. A non-nullish `error` wins over
 * `body`. The returned Response is the one and only write for the request.
 */
export interface ServerEncoder {
  encodeResponse(
    request: Request,
    status: number,
    error: unknown,
    body: unknown,
  ): Promise<Response>;
}

/**
 * Used by a client to attach a payload to an outgoing request.
 */
export interface ClientEncoder {
  encodeRequest(request: Request, value: unknown): Request;
}

/**
 * Used by a client to decode responses. Error statuses reject with the
 * decoded error body.
 */
export interface ClientDecoder {
  decodeResponse<T>(response: Response, target: BodyTarget<T>): Promise<T>;
}

export interface ServerProtocol extends ServerDecoder, ServerEncoder {}

export interface ClientProtocol extends ClientEncoder, ClientDecoder {}

/**
 * Both client and server protocol.
 */
export interface Protocol extends ServerProtocol, ClientProtocol {}
