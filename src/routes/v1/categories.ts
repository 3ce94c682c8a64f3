import { Router } from "express";
import type { Services } from "../../services/container.js";
import { categoryBodySchema, searchQuerySchema } from "../../types/schemas.js";
import { pagedBody, pageRequestOf, parseId, parseWith } from "./http.js";
import { category } from "./serializers.js";

export function createCategoriesRouter(services: Pick<Services, "materials">): Router {
  const router = Router();
  const { materials } = services;

  router.get("/categories", (req, res) => {
    const request = pageRequestOf(req);
    res.json(pagedBody(materials.listCategories(request), request, "/categories", category));
  });

  router.get("/categories/public", (_req, res) => {
    res.json(materials.listAllCategories().map(category));
  });

  router.get("/categories/search", (req, res) => {
    const { query } = parseWith(searchQuerySchema, req.query);
    const request = pageRequestOf(req);
    res.json(
      pagedBody(materials.searchCategories(query, request), request, "/categories/search", category, { query })
    );
  });

  router.get("/categories/:id", (req, res) => {
    res.json(category(materials.getCategory(parseId(req.params.id))));
  });

  router.post("/categories", (req, res) => {
    const { name } = parseWith(categoryBodySchema, req.body);
    res.status(201).json(category(materials.createCategory(name)));
  });

  router.put("/categories/:id", (req, res) => {
    const categoryId = parseId(req.params.id);
    const { name } = parseWith(categoryBodySchema, req.body);
    res.json(category(materials.renameCategory(categoryId, name)));
  });

  router.delete("/categories/:id", (req, res) => {
    materials.deleteCategory(parseId(req.params.id));
    res.status(204).end();
  });

  return router;
}
