import type { SQLiteDatabase } from "./database.js";
import { SqliteUnitOfWork, type UnitOfWork } from "./unitOfWork.js";
import { RecipeCreationService } from "./recipeCreation.js";
import { RecipeService } from "./recipeService.js";
import { CatalogItemService } from "./catalogItemService.js";
import { UserService } from "./userService.js";
import { ConstructionService } from "./constructionService.js";
import { MaterialService } from "./materialService.js";

export type Services = {
  unitOfWork: UnitOfWork;
  recipeCreation: RecipeCreationService;
  recipes: RecipeService;
  catalogItems: CatalogItemService;
  users: UserService;
  constructions: ConstructionService;
  materials: MaterialService;
};

export type ServiceOptions = {
  searchCaseSensitive: boolean;
  now?: () => Date;
};

export function createServices(db: SQLiteDatabase, options: ServiceOptions): Services {
  const unitOfWork = new SqliteUnitOfWork(db);
  const now = options.now ?? (() => new Date());
  const listing = { searchCaseSensitive: options.searchCaseSensitive };

  return {
    unitOfWork,
    recipeCreation: new RecipeCreationService(unitOfWork, now),
    recipes: new RecipeService(unitOfWork, listing),
    catalogItems: new CatalogItemService(unitOfWork, listing),
    users: new UserService(unitOfWork, now),
    constructions: new ConstructionService(unitOfWork, { ...listing, now }),
    materials: new MaterialService(unitOfWork, { ...listing, now }),
  };
}
