/**
 * Basic server example demonstrating core Rivet features.
 *
 * Run with:
 *   npm run example
 */

import { HttpError, p, Rest, reply } from "../mod.ts";

const app = new Rest({ logger: { name: "example", level: "debug" } });

app
  .get("/", {
    returns: "body",
    handler: () => reply.body({ message: "Welcome to Rivet!" }),
  })
  .get("/users/:id", {
    params: [p.uint32()],
    returns: "body",
    handler: (id) => reply.body({ id, name: `User ${id}` }),
  })
  .get("/orgs/:org/repos/:repo", {
    params: [p.context(), p.string(), p.string()],
    returns: "body",
    handler: (ctx, org, repo) =>
      reply.body({ org, repo, page: ctx.query.get("page") ?? "1" }),
  })
  .get("/teapot", {
    returns: "status",
    handler: () => reply.status(418),
  })
  .get("/forbidden", {
    returns: "body",
    handler: () => new HttpError("not for you", 403),
  })
  .del("/users/:id", {
    params: [p.uint32()],
    returns: "none",
    handler: () => reply.none(),
  });

await app.listen({
  port: 8000,
  onListen: ({ port }) => {
    console.log(`Server running at http://localhost:${port}`);
    console.log("  GET    http://localhost:8000/users/42");
    console.log("  GET    http://localhost:8000/orgs/acme/repos/core?page=2");
    console.log("  GET    http://localhost:8000/teapot");
    console.log("  DELETE http://localhost:8000/users/42");
  },
});
