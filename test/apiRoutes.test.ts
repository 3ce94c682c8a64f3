import test from "node:test";
import assert from "node:assert/strict";
import { z } from "zod";
import { countRows, createTestContext, FIXED_NOW, jsonRequest, readJSON, withServer } from "./support.js";

const MISSING_ID = "00000000-0000-4000-8000-000000000000";

const recipeSummarySchema = z.object({
  recipe_id: z.string().uuid(),
  user_id: z.string().uuid(),
  title: z.string(),
  external_url: z.string().nullable(),
  image_url: z.string().nullable(),
  preparation_steps: z.string(),
  prep_time_minutes: z.number(),
  created_at: z.string(),
});

const ingredientsSchema = z.object({
  recipe_id: z.string(),
  ingredients: z.array(
    z.object({
      recipe_item_id: z.string(),
      item_id: z.string(),
      ingredient_name: z.string(),
      quantity_value: z.number(),
      quantity_unit: z.string(),
    })
  ),
  total: z.number(),
});

const pageMetaShape = {
  total: z.number(),
  limit: z.number(),
  offset: z.number(),
  page: z.number(),
  has_next: z.boolean(),
  has_prev: z.boolean(),
  links: z.object({ next: z.string().optional(), prev: z.string().optional() }),
};

const errorSchema = z.object({
  error: z.string(),
  message: z.string(),
  details: z.array(z.object({ path: z.string(), message: z.string() })).optional(),
});

function setup() {
  const context = createTestContext();
  const owner = context.services.users.createUser("cook@example.com");
  return { context, owner };
}

test("POST /api/v1/recipes creates a recipe with its ingredients", async () => {
  const { context, owner } = setup();
  context.services.catalogItems.createCatalogItem("Jajka");

  await withServer(context, async (baseURL) => {
    const response = await fetch(
      `${baseURL}/api/v1/recipes`,
      jsonRequest(
        "POST",
        {
          title: "Naleśniki",
          prep_time_minutes: 30,
          ingredients: [
            { name: "Jajka", quantity_value: 2, quantity_unit: "szt" },
            { name: "Mleko", quantity_value: 500, quantity_unit: "ml" },
            { name: "Jajka", quantity_value: 1, quantity_unit: "żółtko" },
          ],
        },
        owner.id
      )
    );

    assert.equal(response.status, 201);
    const recipe = await readJSON(response, recipeSummarySchema.strict());
    assert.deepEqual(recipe, {
      recipe_id: recipe.recipe_id,
      user_id: owner.id,
      title: "Naleśniki",
      external_url: null,
      image_url: null,
      preparation_steps: "",
      prep_time_minutes: 30,
      created_at: FIXED_NOW,
    });

    const ingredientsResponse = await fetch(`${baseURL}/api/v1/recipes/${recipe.recipe_id}/ingredients`);
    assert.equal(ingredientsResponse.status, 200);
    const ingredients = await readJSON(ingredientsResponse, ingredientsSchema);
    assert.equal(ingredients.recipe_id, recipe.recipe_id);
    assert.equal(ingredients.total, 3);
    assert.deepEqual(
      ingredients.ingredients.map((item) => [item.ingredient_name, item.quantity_value, item.quantity_unit]),
      [
        ["Jajka", 2, "szt"],
        ["Mleko", 500, "ml"],
        ["Jajka", 1, "żółtko"],
      ]
    );
    assert.equal(ingredients.ingredients[0]?.item_id, ingredients.ingredients[2]?.item_id);
  });
});

test("POST /api/v1/recipes requires a valid user header", async () => {
  const { context } = setup();

  await withServer(context, async (baseURL) => {
    const missing = await fetch(`${baseURL}/api/v1/recipes`, jsonRequest("POST", { title: "Zupa" }));
    assert.equal(missing.status, 401);
    assert.deepEqual(await readJSON(missing, errorSchema), {
      error: "unauthorized",
      message: "Authentication required",
    });

    const malformed = await fetch(`${baseURL}/api/v1/recipes`, jsonRequest("POST", { title: "Zupa" }, "cook"));
    assert.equal(malformed.status, 401);
    assert.deepEqual(await readJSON(malformed, errorSchema), {
      error: "unauthorized",
      message: "Invalid user identity header",
    });

    const unknown = await fetch(`${baseURL}/api/v1/recipes`, jsonRequest("POST", { title: "Zupa" }, MISSING_ID));
    assert.equal(unknown.status, 404);
    assert.deepEqual(await readJSON(unknown, errorSchema), {
      error: "not_found",
      message: `User with ID ${MISSING_ID} not found`,
    });
  });
});

test("POST /api/v1/recipes rejects a negative quantity and stores nothing", async () => {
  const { context, owner } = setup();

  await withServer(context, async (baseURL) => {
    const response = await fetch(
      `${baseURL}/api/v1/recipes`,
      jsonRequest(
        "POST",
        {
          title: "Placki",
          ingredients: [{ name: "Ziemniaki", quantity_value: -2, quantity_unit: "kg" }],
        },
        owner.id
      )
    );

    assert.equal(response.status, 400);
    assert.deepEqual(await readJSON(response, errorSchema), {
      error: "validation_error",
      message: "Invalid request data",
      details: [{ path: "ingredients.0.quantity_value", message: "Quantity value cannot be negative" }],
    });
    assert.equal(countRows(context.db, "recipes"), 0);
    assert.equal(countRows(context.db, "catalog_items"), 0);
  });
});

test("GET /api/v1/recipes/:id/ingredients returns an empty list for a bare recipe", async () => {
  const { context, owner } = setup();
  const { recipe } = context.services.recipeCreation.createRecipeWithIngredients(owner.id, { title: "Woda" });

  await withServer(context, async (baseURL) => {
    const response = await fetch(`${baseURL}/api/v1/recipes/${recipe.id}/ingredients`);
    assert.equal(response.status, 200);
    assert.deepEqual(await readJSON(response, ingredientsSchema), {
      recipe_id: recipe.id,
      ingredients: [],
      total: 0,
    });
  });
});

test("recipe ids are validated and unknown recipes answer 404", async () => {
  const { context } = setup();

  await withServer(context, async (baseURL) => {
    const invalid = await fetch(`${baseURL}/api/v1/recipes/not-an-id`);
    assert.equal(invalid.status, 400);
    assert.deepEqual(await readJSON(invalid, errorSchema), {
      error: "validation_error",
      message: "Invalid request data",
      details: [{ path: "id", message: "Invalid uuid" }],
    });

    const missing = await fetch(`${baseURL}/api/v1/recipes/${MISSING_ID}/ingredients`);
    assert.equal(missing.status, 404);
  });
});

test("PUT and DELETE /api/v1/recipes/:id update and remove a recipe", async () => {
  const { context, owner } = setup();
  const { recipe } = context.services.recipeCreation.createRecipeWithIngredients(owner.id, { title: "Bigos" });

  await withServer(context, async (baseURL) => {
    const updated = await fetch(
      `${baseURL}/api/v1/recipes/${recipe.id}`,
      jsonRequest("PUT", { title: "Bigos staropolski", prep_time_minutes: 180 }, owner.id)
    );
    assert.equal(updated.status, 200);
    const body = await readJSON(updated, recipeSummarySchema);
    assert.equal(body.title, "Bigos staropolski");
    assert.equal(body.prep_time_minutes, 180);

    const deleted = await fetch(`${baseURL}/api/v1/recipes/${recipe.id}`, {
      method: "DELETE",
      headers: { "x-user-id": owner.id },
    });
    assert.equal(deleted.status, 204);

    const gone = await fetch(`${baseURL}/api/v1/recipes/${recipe.id}`);
    assert.equal(gone.status, 404);
  });
});

test("GET /api/v1/recipes/my/recipes pages the caller's recipes", async () => {
  const { context, owner } = setup();
  for (const title of ["Pierogi", "Kotlet", "Mizeria"]) {
    context.services.recipeCreation.createRecipeWithIngredients(owner.id, { title });
  }

  await withServer(context, async (baseURL) => {
    const response = await fetch(`${baseURL}/api/v1/recipes/my/recipes?limit=2`, {
      headers: { "x-user-id": owner.id },
    });
    assert.equal(response.status, 200);
    const body = await readJSON(response, z.object({ items: z.array(recipeSummarySchema), ...pageMetaShape }));
    assert.equal(body.items.length, 2);
    assert.equal(body.total, 3);
    assert.equal(body.has_next, true);
    assert.deepEqual(body.links, { next: "/api/v1/recipes/my/recipes?limit=2&offset=2" });
  });
});

test("GET /api/v1/recipes/search keeps the query in page links", async () => {
  const { context, owner } = setup();
  for (const title of ["Zupa ogórkowa", "Zupa grzybowa", "Schabowy"]) {
    context.services.recipeCreation.createRecipeWithIngredients(owner.id, { title });
  }

  await withServer(context, async (baseURL) => {
    const response = await fetch(`${baseURL}/api/v1/recipes/search?query=zupa&limit=1&offset=1`);
    const body = await readJSON(response, z.object({ items: z.array(recipeSummarySchema), ...pageMetaShape }));
    assert.equal(body.total, 2);
    assert.equal(body.page, 2);
    assert.deepEqual(body.links, { prev: "/api/v1/recipes/search?query=zupa&limit=1&offset=0" });

    const missingQuery = await fetch(`${baseURL}/api/v1/recipes/search`);
    assert.equal(missingQuery.status, 400);
  });
});

test("GET /api/v1/catalog-items with a huge offset answers an empty last page", async () => {
  const { context } = setup();
  context.services.catalogItems.createCatalogItem("Sól");

  await withServer(context, async (baseURL) => {
    const response = await fetch(`${baseURL}/api/v1/catalog-items?limit=10&offset=1e20`);
    assert.equal(response.status, 200);
    const body = await readJSON(response, z.object({ items: z.array(z.unknown()), ...pageMetaShape }));
    assert.deepEqual(body.items, []);
    assert.equal(body.total, 1);
    assert.equal(body.offset, Number.MAX_SAFE_INTEGER);
    assert.equal(body.has_next, false);
    assert.deepEqual(body.links, {
      prev: `/api/v1/catalog-items?limit=10&offset=${Number.MAX_SAFE_INTEGER - 10}`,
    });
  });
});

test("catalog listing omits last_used while search includes it", async () => {
  const { context, owner } = setup();
  context.services.catalogItems.createCatalogItem("Sól");
  context.services.recipeCreation.createRecipeWithIngredients(owner.id, { title: "Jajko" }, [
    { name: "Jajka", quantity: { value: 1, unit: "szt" } },
  ]);
  context.services.catalogItems.createCatalogItem("Cukier");

  await withServer(context, async (baseURL) => {
    const list = await fetch(`${baseURL}/api/v1/catalog-items?limit=2`);
    const listed = await readJSON(
      list,
      z.object({ items: z.array(z.object({ item_id: z.string(), name: z.string() }).strict()), ...pageMetaShape })
    );
    assert.deepEqual(listed.items.map((item) => item.name), ["Jajka", "Cukier"]);
    assert.deepEqual(
      { total: listed.total, page: listed.page, has_next: listed.has_next, has_prev: listed.has_prev },
      { total: 3, page: 1, has_next: true, has_prev: false }
    );
    assert.deepEqual(listed.links, { next: "/api/v1/catalog-items?limit=2&offset=2" });

    const search = await fetch(`${baseURL}/api/v1/catalog-items/search?name=JAJ`);
    const found = await readJSON(
      search,
      z.object({
        items: z.array(z.object({ item_id: z.string(), name: z.string(), last_used: z.string().nullable() })),
        ...pageMetaShape,
      })
    );
    assert.deepEqual(found.items.map((item) => [item.name, item.last_used]), [["Jajka", FIXED_NOW]]);

    const publicList = await fetch(`${baseURL}/api/v1/catalog-items/public`);
    const all = await readJSON(publicList, z.array(z.object({ item_id: z.string(), name: z.string() })));
    assert.deepEqual(all.map((item) => item.name), ["Jajka", "Cukier", "Sól"]);
  });
});

test("catalog items are created, renamed and protected while in use", async () => {
  const { context, owner } = setup();
  const { recipeItems } = context.services.recipeCreation.createRecipeWithIngredients(owner.id, { title: "Kawa" }, [
    { name: "Mleko", quantity: { value: 50, unit: "ml" } },
  ]);
  const milkId = recipeItems[0]?.itemId;
  assert.ok(milkId);

  await withServer(context, async (baseURL) => {
    const created = await fetch(`${baseURL}/api/v1/catalog-items`, jsonRequest("POST", { name: "Kawa mielona" }));
    assert.equal(created.status, 201);
    const item = await readJSON(created, z.object({ item_id: z.string(), name: z.string() }));
    assert.equal(item.name, "Kawa mielona");

    const duplicate = await fetch(`${baseURL}/api/v1/catalog-items`, jsonRequest("POST", { name: "Mleko" }));
    assert.equal(duplicate.status, 409);
    assert.deepEqual(await readJSON(duplicate, errorSchema), {
      error: "conflict",
      message: "Catalog item with name 'Mleko' already exists",
    });

    const renamed = await fetch(
      `${baseURL}/api/v1/catalog-items/${item.item_id}`,
      jsonRequest("PUT", { name: "Kawa ziarnista" })
    );
    assert.deepEqual(await readJSON(renamed, z.object({ item_id: z.string(), name: z.string() })), {
      item_id: item.item_id,
      name: "Kawa ziarnista",
    });

    const blocked = await fetch(`${baseURL}/api/v1/catalog-items/${milkId}`, { method: "DELETE" });
    assert.equal(blocked.status, 409);

    const removed = await fetch(`${baseURL}/api/v1/catalog-items/${item.item_id}`, { method: "DELETE" });
    assert.equal(removed.status, 204);
  });
});

test("users can be registered, listed and removed", async () => {
  const context = createTestContext();

  await withServer(context, async (baseURL) => {
    const created = await fetch(`${baseURL}/api/v1/users`, jsonRequest("POST", { email: "ola@example.com" }));
    assert.equal(created.status, 201);
    const user = await readJSON(
      created,
      z.object({ user_id: z.string(), email: z.string(), is_admin: z.boolean(), created_at: z.string() })
    );
    assert.deepEqual(user, {
      user_id: user.user_id,
      email: "ola@example.com",
      is_admin: false,
      created_at: FIXED_NOW,
    });

    const duplicate = await fetch(`${baseURL}/api/v1/users`, jsonRequest("POST", { email: "ola@example.com" }));
    assert.equal(duplicate.status, 409);

    const list = await fetch(`${baseURL}/api/v1/users`);
    const page = await readJSON(list, z.object({ items: z.array(z.object({ email: z.string() })), ...pageMetaShape }));
    assert.deepEqual(page.items.map((item) => item.email), ["ola@example.com"]);

    const removed = await fetch(`${baseURL}/api/v1/users/${user.user_id}`, { method: "DELETE" });
    assert.equal(removed.status, 204);
    const gone = await fetch(`${baseURL}/api/v1/users/${user.user_id}`);
    assert.equal(gone.status, 404);
  });
});

test("preflight allows the user header and responses carry security headers", async () => {
  const { context } = setup();

  await withServer(context, async (baseURL) => {
    const preflight = await fetch(`${baseURL}/api/v1/recipes`, {
      method: "OPTIONS",
      headers: {
        origin: "http://localhost:5173",
        "access-control-request-method": "POST",
        "access-control-request-headers": "x-user-id",
      },
    });
    assert.equal(preflight.status, 204);
    assert.equal(preflight.headers.get("access-control-allow-origin"), "*");
    assert.equal(preflight.headers.get("access-control-allow-headers"), "Content-Type,X-User-Id");
    assert.equal(preflight.headers.get("access-control-allow-methods"), "GET,POST,PUT,DELETE,OPTIONS");

    const response = await fetch(`${baseURL}/health/live`);
    assert.equal(response.headers.get("x-content-type-options"), "nosniff");
    assert.equal(response.headers.get("strict-transport-security"), null);
  });
});

test("health endpoints report liveness and readiness", async () => {
  const context = createTestContext();

  await withServer(context, async (baseURL) => {
    const ready = await fetch(`${baseURL}/health/ready`);
    assert.equal(ready.status, 200);
    const body = await readJSON(ready, z.object({ ready: z.boolean(), timestamp: z.string() }));
    assert.equal(body.ready, true);

    const live = await fetch(`${baseURL}/health/live`);
    assert.equal((await readJSON(live, z.object({ alive: z.boolean() }))).alive, true);
  });
});
