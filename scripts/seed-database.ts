import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { getEnv } from "../src/config/env.js";
import { createServices } from "../src/services/container.js";
import { openDatabase } from "../src/services/database.js";
import { parseQuantity } from "../src/services/quantity.js";
import { CONSTRUCTION_STATUSES, MATERIAL_UNITS } from "../src/types/contracts.js";
import { logger } from "../src/utils/logger.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const SEED_PATH = path.join(__dirname, "../data/seed.json");

const seedSchema = z.object({
  users: z.array(z.object({ email: z.string().email(), is_admin: z.boolean().default(false) })),
  catalog_items: z.array(z.string().min(1)),
  recipes: z.array(
    z.object({
      owner: z.string().email(),
      title: z.string().min(1),
      preparation_steps: z.string().default(""),
      prep_time_minutes: z.number().int().min(0).default(0),
      ingredients: z.array(z.object({ name: z.string().min(1), quantity: z.string() })),
    })
  ),
  categories: z.array(
    z.object({
      name: z.string().min(1),
      materials: z.array(
        z.object({
          name: z.string().min(1),
          unit: z.enum(MATERIAL_UNITS),
          description: z.string().default(""),
        })
      ),
    })
  ),
  constructions: z.array(
    z.object({
      name: z.string().min(1),
      address: z.string().default(""),
      status: z.enum(CONSTRUCTION_STATUSES),
      stock: z.array(z.object({ material: z.string(), quantity_value: z.number().min(0) })),
    })
  ),
});

type SeedData = z.infer<typeof seedSchema>;

function readSeed(): SeedData {
  const raw: unknown = JSON.parse(fs.readFileSync(SEED_PATH, "utf8"));
  return seedSchema.parse(raw);
}

// Safe to run repeatedly: rows that already exist (by unique name or email) are skipped.
function seed() {
  const env = getEnv();
  const data = readSeed();
  const db = openDatabase({ dbPath: env.DATABASE_PATH });
  const services = createServices(db, { searchCaseSensitive: env.SEARCH_CASE_SENSITIVE });
  const { stores } = services.unitOfWork;

  try {
    services.unitOfWork.run(() => {
      const userIds = new Map<string, string>();
      for (const user of data.users) {
        const existing = stores.users.findByEmail(user.email);
        userIds.set(user.email, existing?.id ?? services.users.createUser(user.email, user.is_admin).id);
      }

      for (const name of data.catalog_items) {
        if (!stores.catalogItems.findByName(name)) {
          services.catalogItems.createCatalogItem(name);
        }
      }

      const existingRecipes = new Set(services.recipes.listAllRecipes().map((r) => `${r.userId}:${r.title}`));
      for (const recipe of data.recipes) {
        const ownerId = userIds.get(recipe.owner);
        if (!ownerId) {
          throw new Error(`Seed recipe '${recipe.title}' names unknown owner ${recipe.owner}`);
        }
        if (existingRecipes.has(`${ownerId}:${recipe.title}`)) {
          continue;
        }
        services.recipeCreation.createRecipeWithIngredients(
          ownerId,
          {
            title: recipe.title,
            preparationSteps: recipe.preparation_steps,
            prepTimeMinutes: recipe.prep_time_minutes,
          },
          recipe.ingredients.map((ingredient) => ({
            name: ingredient.name,
            quantity: parseQuantity(ingredient.quantity),
          }))
        );
      }

      for (const category of data.categories) {
        const categoryId =
          stores.categories.listAll().find((c) => c.name === category.name)?.id ??
          services.materials.createCategory(category.name).id;

        for (const material of category.materials) {
          if (!stores.materials.findByName(material.name)) {
            services.materials.createMaterial({ categoryId, ...material });
          }
        }
      }

      const existingSites = new Set(services.constructions.listAllConstructions().map((c) => c.name));
      for (const site of data.constructions) {
        if (existingSites.has(site.name)) {
          continue;
        }
        const construction = services.constructions.createConstruction({
          name: site.name,
          description: "",
          address: site.address,
          startDate: null,
          status: site.status,
          imgUrl: null,
        });
        for (const entry of site.stock) {
          const material = stores.materials.findByName(entry.material);
          if (!material) {
            throw new Error(`Seed stock for '${site.name}' names unknown material ${entry.material}`);
          }
          services.constructions.setStock(construction.id, material.id, entry.quantity_value);
        }
      }
    });

    logger.info({ msg: "Database seeded", database: env.DATABASE_PATH });
  } finally {
    db.close();
  }
}

seed();
