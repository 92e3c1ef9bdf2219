import type { HttpMethod } from "@rivet/router";
import { normalizePath } from "../app/helpers.ts";
import {
  type BodyTarget,
  type ClientProtocol,
  defaultProtocol,
} from "../protocol/mod.ts";
import { defineSchema } from "../schema/mod.ts";

export type FetchFn = (request: Request) => Promise<Response>;

/** Anything the `Headers` constructor takes */
export type HeaderValues = ConstructorParameters<typeof Headers>[0];

export interface RestClientConfig {
  /** Absolute URL every request path is resolved against */
  baseUrl: string | URL;
  protocol?: ClientProtocol;
  /** Transport, `globalThis.fetch` when unset */
  fetch?: FetchFn;
  /** Headers sent with every request */
  headers?: HeaderValues;
}

export interface RequestOptions<T = unknown> {
  body?: unknown;
  /** Schema the response body is decoded into */
  target?: BodyTarget<T>;
  signal?: AbortSignal;
  headers?: HeaderValues;
}

type TargetedOptions<T> = RequestOptions<T> & { target: BodyTarget<T> };
type UntargetedOptions = Omit<RequestOptions, "target">;

const LEADING_SLASHES = /^\/+/;

const discard: BodyTarget<undefined> = defineSchema(
  "rivet",
  () => ({ value: undefined }),
);

/**
 * Client for services built with {@link Rest}, speaking the same protocol.
 *
 * Error responses reject with the {@link HttpError} rebuilt from the body.
 * Without a `target` the body of a successful response is not decoded.
 *
 * @example
 * ```typescript
 * const client = new RestClient({ baseUrl: "http://localhost:3000" });
 * const user = await client.get("/users/42", { target: userSchema });
 * await client.post("/users", { body: { name: "Ada" } });
 * ```
 */
export class RestClient {
  private readonly baseUrl: URL;
  private readonly protocol: ClientProtocol;
  private readonly send: FetchFn;
  private readonly headers: Headers;

  constructor(config: RestClientConfig) {
    this.baseUrl = new URL(config.baseUrl);
    this.protocol = config.protocol ?? defaultProtocol;
    this.send = config.fetch ?? ((request) => globalThis.fetch(request));
    this.headers = new Headers(config.headers);
  }

  request<T>(
    method: HttpMethod,
    path: string,
    options: TargetedOptions<T>,
  ): Promise<T>;
  request(
    method: HttpMethod,
    path: string,
    options?: UntargetedOptions,
  ): Promise<void>;
  async request<T>(
    method: HttpMethod,
    path: string,
    options: RequestOptions<T> = {},
  ): Promise<T | void> {
    const headers = new Headers(this.headers);
    new Headers(options.headers).forEach((value, key) => {
      headers.set(key, value);
    });

    // A leading "//" would resolve to another host
    const url = new URL(
      normalizePath(this.baseUrl.pathname, path.replace(LEADING_SLASHES, "")),
      this.baseUrl,
    );
    const request = this.protocol.encodeRequest(
      new Request(url, { method, headers, signal: options.signal }),
      options.body,
    );
    const response = await this.send(request);

    if (options.target) {
      return this.protocol.decodeResponse(response, options.target);
    }
    if (response.status < 400) {
      await response.arrayBuffer();
      return;
    }
    await this.protocol.decodeResponse(response, discard);
  }

  get<T>(path: string, options: TargetedOptions<T>): Promise<T>;
  get(path: string, options?: UntargetedOptions): Promise<void>;
  get<T>(path: string, options?: RequestOptions<T>): Promise<T | void> {
    return this.dispatch("GET", path, options);
  }

  post<T>(path: string, options: TargetedOptions<T>): Promise<T>;
  post(path: string, options?: UntargetedOptions): Promise<void>;
  post<T>(path: string, options?: RequestOptions<T>): Promise<T | void> {
    return this.dispatch("POST", path, options);
  }

  put<T>(path: string, options: TargetedOptions<T>): Promise<T>;
  put(path: string, options?: UntargetedOptions): Promise<void>;
  put<T>(path: string, options?: RequestOptions<T>): Promise<T | void> {
    return this.dispatch("PUT", path, options);
  }

  patch<T>(path: string, options: TargetedOptions<T>): Promise<T>;
  patch(path: string, options?: UntargetedOptions): Promise<void>;
  patch<T>(path: string, options?: RequestOptions<T>): Promise<T | void> {
    return this.dispatch("PATCH", path, options);
  }

  delete<T>(path: string, options: TargetedOptions<T>): Promise<T>;
  delete(path: string, options?: UntargetedOptions): Promise<void>;
  delete<T>(path: string, options?: RequestOptions<T>): Promise<T | void> {
    return this.dispatch("DELETE", path, options);
  }

  private dispatch<T>(
    method: HttpMethod,
    path: string,
    options: RequestOptions<T> = {},
  ): Promise<T | void> {
    const { target } = options;
    return target
      ? this.request(method, path, { ...options, target })
      : this.request(method, path, options);
  }
}
