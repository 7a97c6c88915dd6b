/**
 * Broker management routes.
 *
 * GET  /api/v1/session                — Credential check
 * GET  /api/v1/machines?name=         — Find a machine by name
 * GET  /api/v1/users?name=            — Find a directory user
 * GET  /api/v1/machines/:uid/users    — List assigned users
 * POST /api/v1/machines/:uid/users    — Assign a user
 */

import { Hono } from "hono";
import { z } from "zod";
import type { InMemoryBroker } from "@vdi-assign/broker";
import type { AppEnv } from "../types.js";
import { createErrorEnvelope } from "../types.js";
import { readBody } from "../middleware/validate.js";

const NameQuerySchema = z.object({
  name: z.string().min(1),
});

const AssignUserSchema = z.object({
  userName: z.string().min(1),
});

export function createBrokerRoutes(broker: InMemoryBroker): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/session", (c) => {
    return c.json({ data: { status: "ok" } });
  });

  routes.get("/machines", async (c) => {
    const query = NameQuerySchema.safeParse(c.req.query());
    if (!query.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Query parameter 'name' is required"),
        400,
      );
    }

    const machine = await broker.findMachine(query.data.name);
    if (machine === null) {
      return c.json(
        createErrorEnvelope("NOT_FOUND", `Machine "${query.data.name}" not found`),
        404,
      );
    }

    return c.json({ data: machine });
  });

  routes.get("/users", async (c) => {
    const query = NameQuerySchema.safeParse(c.req.query());
    if (!query.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Query parameter 'name' is required"),
        400,
      );
    }

    const user = await broker.findUser(query.data.name);
    if (user === null) {
      return c.json(
        createErrorEnvelope("NOT_FOUND", `User "${query.data.name}" not found`),
        404,
      );
    }

    return c.json({ data: user });
  });

  routes.get("/machines/:uid/users", async (c) => {
    const users = await broker.listAssignedUsers(c.req.param("uid"));
    return c.json({ data: users });
  });

  routes.post("/machines/:uid/users", async (c) => {
    const body = await readBody(c, AssignUserSchema);
    if (!body.ok) {
      return body.response;
    }

    const machineUid = c.req.param("uid");
    await broker.assignUser(body.data.userName, machineUid);

    return c.json({ data: { machineUid, userName: body.data.userName } }, 201);
  });

  return routes;
}
