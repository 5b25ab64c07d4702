/**
 * Category Routes
 *
 * - GET  /                  Categories (?includeInactive=true for all)
 * - POST /                  Create (category:write)
 * - POST /:id/activate      Activate (category:write)
 * - POST /:id/deactivate    Deactivate (category:write)
 */

import { Hono } from "hono";
import type { CategoryService } from "../core/category-service.js";
import type { AppEnv } from "../types/app-env.js";
import { CategoryId } from "../types/branded.js";
import { requirePermission } from "../auth/middleware.js";
import { createCategoryBody, parseJsonBody } from "./request-schemas.js";

export function createCategoryRouter(service: CategoryService): Hono<AppEnv> {
  const router = new Hono<AppEnv>();

  router.get("/", requirePermission("expense:read"), async (c) => {
    const includeInactive = c.req.query("includeInactive") === "true";
    return c.json(await service.listCategories({ includeInactive }));
  });

  router.post("/", requirePermission("category:write"), async (c) => {
    const body = await parseJsonBody(c, createCategoryBody);
    const category = await service.createCategory(body);
    return c.json({ ok: true, category }, 201);
  });

  router.post("/:id/activate", requirePermission("category:write"), async (c) => {
    const categoryId = CategoryId(c.req.param("id"));
    await service.activateCategory(categoryId);
    return c.json({ ok: true, categoryId, isActive: true });
  });

  router.post("/:id/deactivate", requirePermission("category:write"), async (c) => {
    const categoryId = CategoryId(c.req.param("id"));
    await service.deactivateCategory(categoryId);
    return c.json({ ok: true, categoryId, isActive: false });
  });

  return router;
}
