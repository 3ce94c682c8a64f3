import { Router } from "express";
import type { Services } from "../../services/container.js";
import { catalogItemBodySchema, catalogSearchQuerySchema } from "../../types/schemas.js";
import { pagedBody, pageRequestOf, parseId, parseWith } from "./http.js";
import { catalogItem, catalogItemWithUsage } from "./serializers.js";

export function createCatalogItemsRouter(services: Pick<Services, "catalogItems">): Router {
  const router = Router();
  const { catalogItems } = services;

  router.get("/catalog-items", (req, res) => {
    const request = pageRequestOf(req);
    res.json(pagedBody(catalogItems.listCatalogItems(request), request, "/catalog-items", catalogItem));
  });

  router.get("/catalog-items/public", (_req, res) => {
    res.json(catalogItems.listAllCatalogItems().map(catalogItem));
  });

  // Search results carry last_used so clients can show recently used items first.
  router.get("/catalog-items/search", (req, res) => {
    const { name } = parseWith(catalogSearchQuerySchema, req.query);
    const request = pageRequestOf(req);
    const page = catalogItems.searchCatalogItems(name, request);
    res.json(pagedBody(page, request, "/catalog-items/search", catalogItemWithUsage, { name }));
  });

  router.get("/catalog-items/:id", (req, res) => {
    res.json(catalogItem(catalogItems.getCatalogItem(parseId(req.params.id))));
  });

  router.post("/catalog-items", (req, res) => {
    const { name } = parseWith(catalogItemBodySchema, req.body);
    res.status(201).json(catalogItem(catalogItems.createCatalogItem(name)));
  });

  router.put("/catalog-items/:id", (req, res) => {
    const itemId = parseId(req.params.id);
    const { name } = parseWith(catalogItemBodySchema, req.body);
    res.json(catalogItem(catalogItems.renameCatalogItem(itemId, name)));
  });

  router.delete("/catalog-items/:id", (req, res) => {
    catalogItems.deleteCatalogItem(parseId(req.params.id));
    res.status(204).end();
  });

  return router;
}
