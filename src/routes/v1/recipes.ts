import { Router } from "express";
import { currentUserId, requireUser } from "../../middleware/auth.js";
import type { Services } from "../../services/container.js";
import {
  recipeCreateBodySchema,
  recipeUpdateBodySchema,
  searchQuerySchema,
} from "../../types/schemas.js";
import { pagedBody, pageRequestOf, parseId, parseWith } from "./http.js";
import { recipeIngredients, recipeSummary } from "./serializers.js";

export function createRecipesRouter(services: Pick<Services, "recipes" | "recipeCreation">): Router {
  const router = Router();
  const { recipes, recipeCreation } = services;

  router.post("/recipes", requireUser, (req, res) => {
    const body = parseWith(recipeCreateBodySchema, req.body);
    const result = recipeCreation.createRecipeWithIngredients(
      currentUserId(req),
      {
        title: body.title,
        externalUrl: body.external_url ?? null,
        imageUrl: body.image_url ?? null,
        preparationSteps: body.preparation_steps,
        prepTimeMinutes: body.prep_time_minutes,
      },
      body.ingredients.map((ingredient) => ({
        name: ingredient.name,
        quantity: { value: ingredient.quantity_value, unit: ingredient.quantity_unit },
      }))
    );

    res.status(201).json(recipeSummary(result.recipe));
  });

  router.get("/recipes", (req, res) => {
    const request = pageRequestOf(req);
    res.json(pagedBody(recipes.listRecipes(request), request, "/recipes", recipeSummary));
  });

  router.get("/recipes/public", (_req, res) => {
    res.json(recipes.listAllRecipes().map(recipeSummary));
  });

  router.get("/recipes/search", (req, res) => {
    const { query } = parseWith(searchQuerySchema, req.query);
    const request = pageRequestOf(req);
    res.json(
      pagedBody(recipes.searchRecipes(query, request), request, "/recipes/search", recipeSummary, { query })
    );
  });

  router.get("/recipes/my/recipes", requireUser, (req, res) => {
    const request = pageRequestOf(req);
    const page = recipes.listUserRecipes(currentUserId(req), request);
    res.json(pagedBody(page, request, "/recipes/my/recipes", recipeSummary));
  });

  router.get("/recipes/user/:userId", (req, res) => {
    const userId = parseId(req.params.userId, "userId");
    const request = pageRequestOf(req);
    const page = recipes.listUserRecipes(userId, request);
    res.json(pagedBody(page, request, `/recipes/user/${userId}`, recipeSummary));
  });

  router.get("/recipes/:id/ingredients", (req, res) => {
    res.json(recipeIngredients(recipes.getRecipeIngredients(parseId(req.params.id))));
  });

  router.get("/recipes/:id", (req, res) => {
    res.json(recipeSummary(recipes.getRecipe(parseId(req.params.id))));
  });

  router.put("/recipes/:id", requireUser, (req, res) => {
    const recipeId = parseId(req.params.id);
    const body = parseWith(recipeUpdateBodySchema, req.body);
    const updated = recipes.updateRecipe(recipeId, {
      title: body.title,
      externalUrl: body.external_url,
      imageUrl: body.image_url,
      preparationSteps: body.preparation_steps,
      prepTimeMinutes: body.prep_time_minutes,
    });
    res.json(recipeSummary(updated));
  });

  router.delete("/recipes/:id", requireUser, (req, res) => {
    recipes.deleteRecipe(parseId(req.params.id));
    res.status(204).end();
  });

  return router;
}
