import { Router } from "express";
import { z } from "zod";
import type { Services } from "../../services/container.js";
import type { MaterialInput } from "../../services/materialStore.js";
import {
  materialBulkBodySchema,
  materialCreateBodySchema,
  materialUpdateBodySchema,
  searchQuerySchema,
  type MaterialCreateBody,
} from "../../types/schemas.js";
import { pagedBody, pageRequestOf, parseId, parseWith } from "./http.js";
import { material } from "./serializers.js";

const categoryFilterSchema = z.object({
  category_id: z.string().uuid().optional(),
});

function toMaterialInput(body: MaterialCreateBody): MaterialInput {
  return {
    categoryId: body.category_id,
    name: body.name,
    description: body.description,
    unit: body.unit,
  };
}

export function createMaterialsRouter(services: Pick<Services, "materials">): Router {
  const router = Router();
  const { materials } = services;

  router.get("/materials", (req, res) => {
    const request = pageRequestOf(req);
    res.json(pagedBody(materials.listMaterials(request), request, "/materials", material));
  });

  router.get("/materials/public", (_req, res) => {
    res.json(materials.listAllMaterials().map(material));
  });

  router.get("/materials/search", (req, res) => {
    const { query } = parseWith(searchQuerySchema, req.query);
    const { category_id } = parseWith(categoryFilterSchema, req.query);
    const request = pageRequestOf(req);
    const page = materials.searchMaterials(query, request, category_id);
    res.json(pagedBody(page, request, "/materials/search", material, { query, category_id }));
  });

  router.get("/materials/category/:categoryId", (req, res) => {
    const categoryId = parseId(req.params.categoryId, "categoryId");
    const request = pageRequestOf(req);
    const page = materials.listMaterialsByCategory(categoryId, request);
    res.json(pagedBody(page, request, `/materials/category/${categoryId}`, material));
  });

  router.get("/materials/by-construction/:constructionId", (req, res) => {
    const constructionId = parseId(req.params.constructionId, "constructionId");
    const request = pageRequestOf(req);
    const page = materials.listMaterialsByConstruction(constructionId, request);
    res.json(pagedBody(page, request, `/materials/by-construction/${constructionId}`, material));
  });

  router.post("/materials/bulk", (req, res) => {
    const body = parseWith(materialBulkBodySchema, req.body);
    const created = materials.createMaterialsBulk(body.map(toMaterialInput));
    res.status(201).json({ items: created.map(material), total: created.length });
  });

  router.get("/materials/:id", (req, res) => {
    res.json(material(materials.getMaterial(parseId(req.params.id))));
  });

  router.post("/materials", (req, res) => {
    const body = parseWith(materialCreateBodySchema, req.body);
    res.status(201).json(material(materials.createMaterial(toMaterialInput(body))));
  });

  router.put("/materials/:id", (req, res) => {
    const materialId = parseId(req.params.id);
    const body = parseWith(materialUpdateBodySchema, req.body);
    const updated = materials.updateMaterial(materialId, {
      categoryId: body.category_id,
      name: body.name,
      description: body.description,
      unit: body.unit,
    });
    res.json(material(updated));
  });

  router.delete("/materials/:id", (req, res) => {
    materials.deleteMaterial(parseId(req.params.id));
    res.status(204).end();
  });

  return router;
}
