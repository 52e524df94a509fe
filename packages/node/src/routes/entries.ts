/**
 * Journal entry routes.
 *
 * POST   /api/v1/entries                      — Create a draft
 * GET    /api/v1/entries                      — List entries (cursor pagination)
 * GET    /api/v1/entries/:id                  — Get one entry
 * POST   /api/v1/entries/:id/lines            — Add a line to a draft
 * PATCH  /api/v1/entries/:id/lines/:lineId    — Change a draft line
 * DELETE /api/v1/entries/:id/lines/:lineId    — Remove a draft line
 * POST   /api/v1/entries/:id/validate         — Dry-run the posting checks
 * POST   /api/v1/entries/:id/post             — Post a draft
 * POST   /api/v1/entries/:id/void             — Void a draft, or reverse a posted entry
 *
 * Mutations take the entry version the caller last saw; a stale version
 * answers 409 STALE_VERSION.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  AddLineSchema,
  CreateEntrySchema,
  ListEntriesQuerySchema,
  PostEntrySchema,
  UpdateLineSchema,
  VersionQuerySchema,
  VoidEntrySchema,
} from "../types/dto.js";
import { validateBody, validateQuery } from "../middleware/validate.js";
import { createdKey, paginate, sortByCreated } from "../types/pagination.js";

export function createEntryRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(CreateEntrySchema), (c) => {
    const entry = c.get("service").createEntry(c.req.valid("json"));
    return c.json({ data: entry }, 201);
  });

  routes.get("/", validateQuery(ListEntriesQuerySchema), (c) => {
    const query = c.req.valid("query");
    const entries = c.get("service").listEntries({
      statuses: query.status,
      accountId: query.accountId,
      sourceType: query.sourceType,
      fromDate: query.fromDate,
      toDate: query.toDate,
    });

    const page = paginate(sortByCreated(entries), query, createdKey, "created");
    return c.json({ data: page.data, pagination: page.pagination });
  });

  routes.get("/:id", (c) => {
    return c.json({ data: c.get("service").getEntry(c.req.param("id")) });
  });

  routes.post("/:id/lines", validateBody(AddLineSchema), (c) => {
    const body = c.req.valid("json");
    const entry = c.get("service").addLine(c.req.param("id"), body.line, body.version);
    return c.json({ data: entry }, 201);
  });

  routes.patch("/:id/lines/:lineId", validateBody(UpdateLineSchema), (c) => {
    const entry = c
      .get("service")
      .updateLine(c.req.param("id"), c.req.param("lineId"), c.req.valid("json"));
    return c.json({ data: entry });
  });

  routes.delete("/:id/lines/:lineId", validateQuery(VersionQuerySchema), (c) => {
    const { version } = c.req.valid("query");
    const entry = c
      .get("service")
      .removeLine(c.req.param("id"), c.req.param("lineId"), version);
    return c.json({ data: entry });
  });

  routes.post("/:id/validate", (c) => {
    return c.json({ data: c.get("service").checkEntry(c.req.param("id")) });
  });

  routes.post("/:id/post", validateBody(PostEntrySchema), (c) => {
    const { version } = c.req.valid("json");
    const entry = c.get("service").postEntry(c.req.param("id"), version, c.get("actor"));
    return c.json({ data: entry });
  });

  routes.post("/:id/void", validateBody(VoidEntrySchema), (c) => {
    const body = c.req.valid("json");
    const result = c
      .get("service")
      .voidEntry(c.req.param("id"), body.reason, body.version, c.get("actor"));
    return c.json({ data: result });
  });

  return routes;
}
