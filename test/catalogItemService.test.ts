import test from "node:test";
import assert from "node:assert/strict";
import { ConflictError, NotFoundError } from "../src/middleware/error.js";
import { createTestContext } from "./support.js";

const MISSING_ID = "00000000-0000-4000-8000-000000000000";

test("createCatalogItem rejects a duplicate name", () => {
  const { db, services } = createTestContext();
  services.catalogItems.createCatalogItem("Jajka");

  assert.throws(
    () => services.catalogItems.createCatalogItem("Jajka"),
    (error: unknown) =>
      error instanceof ConflictError && error.message === "Catalog item with name 'Jajka' already exists"
  );
  assert.equal(services.catalogItems.createCatalogItem("jajka").name, "jajka");
  db.close();
});

test("getCatalogItem reports unknown ids", () => {
  const { db, services } = createTestContext();
  assert.throws(
    () => services.catalogItems.getCatalogItem(MISSING_ID),
    (error: unknown) =>
      error instanceof NotFoundError && error.message === `Catalog item with ID ${MISSING_ID} not found`
  );
  db.close();
});

test("renameCatalogItem keeps the item when the name is unchanged", () => {
  const { db, services } = createTestContext();
  const item = services.catalogItems.createCatalogItem("Mleko");
  services.catalogItems.createCatalogItem("Śmietana");

  assert.deepEqual(services.catalogItems.renameCatalogItem(item.id, "Mleko"), item);
  assert.throws(() => services.catalogItems.renameCatalogItem(item.id, "Śmietana"), ConflictError);
  assert.equal(services.catalogItems.renameCatalogItem(item.id, "Mleko 2%").name, "Mleko 2%");
  assert.throws(() => services.catalogItems.renameCatalogItem(MISSING_ID, "Kefir"), NotFoundError);
  db.close();
});

test("deleteCatalogItem is blocked while recipes use the item", () => {
  const { db, services } = createTestContext();
  const owner = services.users.createUser("cook@example.com");
  const { recipeItems } = services.recipeCreation.createRecipeWithIngredients(owner.id, { title: "Kakao" }, [
    { name: "Mleko", quantity: { value: 250, unit: "ml" } },
  ]);
  const itemId = recipeItems[0]?.itemId;
  assert.ok(itemId);

  assert.throws(
    () => services.catalogItems.deleteCatalogItem(itemId),
    (error: unknown) =>
      error instanceof ConflictError && error.message === `Catalog item ${itemId} is used by 1 recipe ingredient(s)`
  );

  const unused = services.catalogItems.createCatalogItem("Kakao");
  services.catalogItems.deleteCatalogItem(unused.id);
  assert.throws(() => services.catalogItems.getCatalogItem(unused.id), NotFoundError);
  db.close();
});

test("searchCatalogItems honours the case sensitivity setting", () => {
  const insensitive = createTestContext();
  const sensitive = createTestContext({ searchCaseSensitive: true });
  for (const { services } of [insensitive, sensitive]) {
    services.catalogItems.createCatalogItem("Jajka");
    services.catalogItems.createCatalogItem("Makaron jajeczny");
  }

  const page = { limit: 20, offset: 0 };
  assert.equal(insensitive.services.catalogItems.searchCatalogItems("JAJ", page).total, 2);
  assert.deepEqual(
    sensitive.services.catalogItems.searchCatalogItems("Jaj", page).items.map((item) => item.name),
    ["Jajka"]
  );
  insensitive.db.close();
  sensitive.db.close();
});
