import { Router } from "express";
import type { Services } from "../../services/container.js";
import {
  constructionCreateBodySchema,
  constructionUpdateBodySchema,
  searchQuerySchema,
  statisticsQuerySchema,
  statusFilterSchema,
  storageItemBodySchema,
  storageItemBulkBodySchema,
} from "../../types/schemas.js";
import { pagedBody, pageRequestOf, parseId, parseWith } from "./http.js";
import { construction, constructionStatistics, stockedMaterial, storageItem } from "./serializers.js";

export function createConstructionsRouter(services: Pick<Services, "constructions">): Router {
  const router = Router();
  const { constructions } = services;

  router.get("/constructions", (req, res) => {
    const request = pageRequestOf(req);
    res.json(pagedBody(constructions.listConstructions(request), request, "/constructions", construction));
  });

  router.get("/constructions/public", (_req, res) => {
    res.json(constructions.listAllConstructions().map(construction));
  });

  router.get("/constructions/search", (req, res) => {
    const { query } = parseWith(searchQuerySchema, req.query);
    const { status } = parseWith(statusFilterSchema, req.query);
    const request = pageRequestOf(req);
    const page = constructions.searchConstructions(query, request, status);
    res.json(pagedBody(page, request, "/constructions/search", construction, { query, status }));
  });

  router.get("/constructions/statistics", (req, res) => {
    const { from } = parseWith(statisticsQuerySchema, req.query);
    res.json({ items: constructions.statistics(from).map(constructionStatistics) });
  });

  router.get("/constructions/:id", (req, res) => {
    res.json(construction(constructions.getConstruction(parseId(req.params.id))));
  });

  router.post("/constructions", (req, res) => {
    const body = parseWith(constructionCreateBodySchema, req.body);
    const created = constructions.createConstruction({
      name: body.name,
      description: body.description,
      address: body.address,
      startDate: body.start_date,
      status: body.status,
      imgUrl: body.img_url,
    });
    res.status(201).json(construction(created));
  });

  router.put("/constructions/:id", (req, res) => {
    const constructionId = parseId(req.params.id);
    const body = parseWith(constructionUpdateBodySchema, req.body);
    const updated = constructions.updateConstruction(constructionId, {
      name: body.name,
      description: body.description,
      address: body.address,
      startDate: body.start_date,
      status: body.status,
      imgUrl: body.img_url,
    });
    res.json(construction(updated));
  });

  router.delete("/constructions/:id", (req, res) => {
    constructions.deleteConstruction(parseId(req.params.id));
    res.status(204).end();
  });

  // Stock held on a construction site

  router.get("/constructions/:id/storage-items", (req, res) => {
    const stock = constructions.listStock(parseId(req.params.id));
    res.json({ items: stock.map(stockedMaterial), total: stock.length });
  });

  router.put("/constructions/:id/storage-items", (req, res) => {
    const constructionId = parseId(req.params.id);
    const body = parseWith(storageItemBulkBodySchema, req.body);
    const saved = constructions.setStockBulk(
      constructionId,
      body.items.map((item) => ({ materialId: item.material_id, quantityValue: item.quantity_value }))
    );
    res.json({ items: saved.map(storageItem), total: saved.length });
  });

  router.get("/constructions/:id/storage-items/:materialId", (req, res) => {
    const constructionId = parseId(req.params.id);
    const materialId = parseId(req.params.materialId, "materialId");
    const stocked = constructions.getStock(constructionId, materialId);
    res.json(stockedMaterial(stocked));
  });

  router.put("/constructions/:id/storage-items/:materialId", (req, res) => {
    const constructionId = parseId(req.params.id);
    const materialId = parseId(req.params.materialId, "materialId");
    const { quantity_value } = parseWith(storageItemBodySchema, req.body);
    res.json(storageItem(constructions.setStock(constructionId, materialId, quantity_value)));
  });

  router.delete("/constructions/:id/storage-items/:materialId", (req, res) => {
    constructions.removeStock(parseId(req.params.id), parseId(req.params.materialId, "materialId"));
    res.status(204).end();
  });

  return router;
}
