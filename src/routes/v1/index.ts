import { Router } from "express";
import type { Services } from "../../services/container.js";
import { createRecipesRouter } from "./recipes.js";
import { createCatalogItemsRouter } from "./catalogItems.js";
import { createUsersRouter } from "./users.js";
import { createConstructionsRouter } from "./constructions.js";
import { createCategoriesRouter } from "./categories.js";
import { createMaterialsRouter } from "./materials.js";

export function createV1Router(services: Services): Router {
  const router = Router();

  router.use("/", createRecipesRouter(services));
  router.use("/", createCatalogItemsRouter(services));
  router.use("/", createUsersRouter(services));
  router.use("/", createConstructionsRouter(services));
  router.use("/", createCategoriesRouter(services));
  router.use("/", createMaterialsRouter(services));

  return router;
}
