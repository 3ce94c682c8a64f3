import test from "node:test";
import assert from "node:assert/strict";
import { openDatabase } from "../src/services/database.js";
import { createStores } from "../src/services/unitOfWork.js";
import { ValidationError } from "../src/middleware/error.js";

const MISSING_ID = "00000000-0000-4000-8000-000000000000";

function setup() {
  const db = openDatabase({ dbPath: ":memory:" });
  const stores = createStores(db);
  const owner = stores.users.create("cook@example.com", false, "2024-05-01T10:00:00.000Z");
  const recipe = stores.recipes.create(owner.id, { title: "Omlet" }, "2024-05-01T10:00:00.000Z");
  return { db, stores, recipe };
}

test("link keeps insertion order, including repeated items", () => {
  const { db, stores, recipe } = setup();
  const eggs = stores.catalogItems.create("Jajka");
  const milk = stores.catalogItems.create("Mleko");

  const first = stores.recipeItems.link(recipe.id, eggs.id, { value: 2, unit: "szt" });
  const second = stores.recipeItems.link(recipe.id, milk.id, { value: 100, unit: "ml" });
  const third = stores.recipeItems.link(recipe.id, eggs.id, { value: 1, unit: "żółtko" });

  const ingredients = stores.recipeItems.listByRecipe(recipe.id);
  assert.deepEqual(
    ingredients.map((ingredient) => [ingredient.recipeItemId, ingredient.ingredientName, ingredient.quantity]),
    [
      [first.id, "Jajka", { value: 2, unit: "szt" }],
      [second.id, "Mleko", { value: 100, unit: "ml" }],
      [third.id, "Jajka", { value: 1, unit: "żółtko" }],
    ]
  );
  db.close();
});

test("link rejects a missing catalog item", () => {
  const { db, stores, recipe } = setup();

  assert.throws(
    () => stores.recipeItems.link(recipe.id, MISSING_ID, { value: 1, unit: "g" }),
    (error: unknown) => {
      assert.ok(error instanceof ValidationError);
      assert.equal(error.message, "Recipe item references a missing recipe or catalog item");
      assert.deepEqual(error.details.map((issue) => issue.path), ["recipe_id", "item_id"]);
      return true;
    }
  );
  assert.deepEqual(stores.recipeItems.listByRecipe(recipe.id), []);
  db.close();
});

test("link rejects a missing recipe", () => {
  const { db, stores } = setup();
  const eggs = stores.catalogItems.create("Jajka");

  assert.throws(() => stores.recipeItems.link(MISSING_ID, eggs.id, { value: 1, unit: "szt" }), ValidationError);
  db.close();
});

test("deleting a recipe removes its links but keeps catalog items", () => {
  const { db, stores, recipe } = setup();
  const eggs = stores.catalogItems.create("Jajka");
  stores.recipeItems.link(recipe.id, eggs.id, { value: 2, unit: "szt" });

  assert.equal(stores.recipes.delete(recipe.id), true);
  assert.deepEqual(stores.recipeItems.listByRecipe(recipe.id), []);
  assert.equal(stores.catalogItems.countRecipeLinks(eggs.id), 0);
  assert.notEqual(stores.catalogItems.findById(eggs.id), null);
  db.close();
});
