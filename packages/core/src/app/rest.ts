import { type HttpMethod, isHttpMethod, Router } from "@rivet/router";
import {
  type AnyRouteDefinition,
  buildDispatcher,
  type Dispatcher,
  type ParamSpec,
  type ReturnShape,
  type RouteDefinition,
} from "../binding/mod.ts";
import { RequestContext } from "../context/mod.ts";
import { NotFoundError, RegistrationError } from "../errors/mod.ts";
import type { Protocol } from "../protocol/mod.ts";
import { resolveConfig } from "./config.ts";
import { decodeParams, extractPathname, normalizePath } from "./helpers.ts";
import { type ServerHandle, serve } from "./serve.ts";
import type { ListenOptions, Logger, RestConfig, Route } from "./types.ts";

const INTERNAL_ERROR_BODY = "Internal Server Error";

type Specs = readonly ParamSpec<unknown>[];

/**
 * An application that serves plain functions as HTTP handlers.
 *
 * Every route is analysed once when it is added; a definition that cannot
 * be bound throws a {@link RegistrationError} right away.
 *
 * @example
 * ```typescript
 * const app = new Rest();
 *
 * app.get("/users/:id", {
 *   params: [p.uint32()],
 *   returns: "body",
 *   handler: (id) => reply.body({ id }),
 * });
 *
 * await app.listen({ port: 3000 });
 * ```
 */
export class Rest {
  private readonly router = new Router<Dispatcher>();
  private readonly registered: Route[] = [];
  private readonly basePath: string;
  private readonly protocol: Protocol;
  readonly logger: Logger;

  constructor(config: RestConfig = {}) {
    const resolved = resolveConfig(config);
    this.basePath = resolved.prefix;
    this.protocol = resolved.protocol;
    this.logger = resolved.logger;
  }

  /**
   * Register a route. `DEL` is accepted as a spelling of `DELETE`.
   *
   * @throws {RegistrationError}
   */
  add<const P extends Specs = readonly [], S extends ReturnShape = ReturnShape>(
    method: HttpMethod | "DEL",
    path: string,
    definition: RouteDefinition<P, S>,
  ): this {
    const verb = method === "DEL" ? "DELETE" : method;
    const fullPath = normalizePath(this.basePath, path);

    if (!isHttpMethod(verb)) {
      throw new RegistrationError(
        String(method),
        fullPath,
        "unsupported method",
      );
    }

    const stored: AnyRouteDefinition = definition;
    const dispatcher = buildDispatcher(verb, fullPath, stored, {
      protocol: this.protocol,
      logger: this.logger,
    });

    try {
      this.router.add(verb, fullPath, dispatcher);
    } catch (error) {
      throw new RegistrationError(
        verb,
        fullPath,
        error instanceof Error ? error.message : String(error),
      );
    }

    this.registered.push(
      Object.freeze({ method: verb, path: fullPath, definition: stored }),
    );
    this.logger.debug("Route registered", { method: verb, path: fullPath });
    return this;
  }

  get<const P extends Specs = readonly [], S extends ReturnShape = ReturnShape>(
    path: string,
    definition: RouteDefinition<P, S>,
  ): this {
    return this.add("GET", path, definition);
  }

  post<const P extends Specs = readonly [], S extends ReturnShape = ReturnShape>(
    path: string,
    definition: RouteDefinition<P, S>,
  ): this {
    return this.add("POST", path, definition);
  }

  put<const P extends Specs = readonly [], S extends ReturnShape = ReturnShape>(
    path: string,
    definition: RouteDefinition<P, S>,
  ): this {
    return this.add("PUT", path, definition);
  }

  patch<
    const P extends Specs = readonly [],
    S extends ReturnShape = ReturnShape,
  >(path: string, definition: RouteDefinition<P, S>): this {
    return this.add("PATCH", path, definition);
  }

  delete<
    const P extends Specs = readonly [],
    S extends ReturnShape = ReturnShape,
  >(path: string, definition: RouteDefinition<P, S>): this {
    return this.add("DELETE", path, definition);
  }

  del<const P extends Specs = readonly [], S extends ReturnShape = ReturnShape>(
    path: string,
    definition: RouteDefinition<P, S>,
  ): this {
    return this.add("DEL", path, definition);
  }

  head<const P extends Specs = readonly [], S extends ReturnShape = ReturnShape>(
    path: string,
    definition: RouteDefinition<P, S>,
  ): this {
    return this.add("HEAD", path, definition);
  }

  options<
    const P extends Specs = readonly [],
    S extends ReturnShape = ReturnShape,
  >(path: string, definition: RouteDefinition<P, S>): this {
    return this.add("OPTIONS", path, definition);
  }

  /**
   * Registered routes in registration order.
   */
  routes(): readonly Route[] {
    return [...this.registered];
  }

  /**
   * Answer one request. Never rejects.
   */
  fetch = async (req: Request): Promise<Response> => {
    const pathname = extractPathname(req.url);
    const match = isHttpMethod(req.method)
      ? this.router.find(req.method, pathname)
      : null;

    try {
      if (!match) {
        return await this.protocol.encodeResponse(
          req,
          404,
          new NotFoundError(`no route for ${req.method} ${pathname}`),
          undefined,
        );
      }
      const ctx = new RequestContext(req, decodeParams(match.params));
      return await match.handler(ctx);
    } catch (error) {
      this.logger.error("Request failed", {
        method: req.method,
        path: pathname,
        error: error instanceof Error ? error.message : String(error),
      });
      return new Response(INTERNAL_ERROR_BODY, { status: 500 });
    }
  };

  /**
   * Serve {@link fetch} over `node:http`.
   */
  async listen(options: ListenOptions = {}): Promise<ServerHandle> {
    const handle = await serve(this.fetch, options, this.logger);
    this.logger.info("Listening", {
      hostname: handle.hostname,
      port: handle.port,
    });
    return handle;
  }
}
