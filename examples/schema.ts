/**
 * Request bodies checked by Zod and TypeBox schemas, and a typed client.
 *
 * Run with:
 *   npm run example:schema
 */

import { z } from "zod";
import { p, Rest, RestClient, reply, t } from "../mod.ts";

const user = z.object({
  name: z.string().min(1).max(100),
  email: z.string().email(),
  age: z.number().int().min(0).max(150).optional(),
});

const rename = t.Object({ name: t.String({ minLength: 1 }) });

const app = new Rest({ logger: { level: "warn" } })
  .post("/users", {
    params: [p.body(user)],
    returns: "body",
    handler: (body) =>
      reply.body({ ...body, id: 1, createdAt: new Date().toISOString() }),
  })
  .patch("/users/:id", {
    params: [p.uint32(), p.body(rename)],
    returns: "bodyAndStatus",
    handler: (id, body) => reply.with({ id, name: body.name }, 202),
  })
  .post("/counter", {
    params: [p.int64()],
    returns: "body",
    handler: (value) => reply.body(value + 1n),
  });

const client = new RestClient({ baseUrl: "http://localhost", fetch: app.fetch });

const created = await client.post("/users", {
  body: { name: "Ada", email: "ada@example.com" },
  target: user.extend({ id: z.number() }),
});
console.log("created", created);

const renamed = await client.patch("/users/1", {
  body: { name: "Grace" },
  target: z.object({ id: z.number(), name: z.string() }),
});
console.log("renamed", renamed);

try {
  await client.post("/users", { body: { name: "", email: "nope" } });
} catch (error) {
  console.log("rejected", String(error));
}

const next = await client.post("/counter", {
  body: "9007199254740993",
  target: z.string(),
});
console.log("counter", next);
