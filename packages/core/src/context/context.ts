/**
 * Per-request context handed to handlers that declare `p.context()`.
 */

const EMPTY_PARAMS: Record<string, string> = Object.freeze(Object.create(null));

/**
 * Request-scoped data: the matched path parameters, the parsed URL and the
 * cancellation signal of the surrounding server.
 *
 * One instance is created per request and never shared.
 *
 * @example
 * ```typescript
 * app.get("/slow", {
 *   params: [p.context()],
 *   returns: "body",
 *   handler: async (ctx) => reply.body(await work(ctx.signal)),
 * });
 * ```
 */
export class RequestContext {
  readonly request: Request;

  /**
   * Route path parameters, already percent-decoded.
   *
   * @example
   * For route "/users/:id", accessing "/users/123" gives { id: "123" }
   */
  readonly params: Record<string, string>;

  private _state: Record<string, unknown> | null = null;
  private _url: URL | null;
  private readonly _pathname: string;

  constructor(
    request: Request,
    params: Record<string, string> = EMPTY_PARAMS,
    url?: URL,
  ) {
    this.request = request;
    this.params = params;
    this._url = url ?? null;
    this._pathname = url ? url.pathname : new URL(request.url).pathname;
  }

  /**
   * Custom state for sharing data within one request.
   */
  get state(): Record<string, unknown> {
    if (this._state) {
      return this._state;
    }
    const state: Record<string, unknown> = Object.create(null);
    this._state = state;
    return state;
  }

  get url(): URL {
    if (!this._url) {
      this._url = new URL(this.request.url);
    }
    return this._url;
  }

  get method(): string {
    return this.request.method;
  }

  get headers(): Headers {
    return this.request.headers;
  }

  get query(): URLSearchParams {
    return this.url.searchParams;
  }

  get path(): string {
    return this._pathname;
  }

  /**
   * Aborts when the client goes away or the server gives up on the request.
   */
  get signal(): AbortSignal {
    return this.request.signal;
  }
}
