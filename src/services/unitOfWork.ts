import { isBusy, type SQLiteDatabase } from "./database.js";
import { SqliteCatalogItemStore, type CatalogItemRepository } from "./catalogItemStore.js";
import { SqliteRecipeItemLinker, type RecipeItemLinker } from "./recipeItemLinker.js";
import { SqliteRecipeStore, type RecipeRepository } from "./recipeStore.js";
import { SqliteUserStore, type UserRepository } from "./userStore.js";
import { ConstructionStore } from "./constructionStore.js";
import { CategoryStore } from "./categoryStore.js";
import { MaterialStore } from "./materialStore.js";
import { StorageItemStore } from "./storageItemStore.js";
import { ConflictError } from "../middleware/error.js";

export type Stores = {
  users: UserRepository;
  recipes: RecipeRepository;
  catalogItems: CatalogItemRepository;
  recipeItems: RecipeItemLinker;
  constructions: ConstructionStore;
  categories: CategoryStore;
  materials: MaterialStore;
  storageItems: StorageItemStore;
};

export interface UnitOfWork {
  readonly stores: Stores;
  /**
   * Runs `work` inside one transaction. Returning commits; throwing rolls
   * back every write made through `stores` and rethrows. Nested calls become
   * savepoints of the enclosing transaction. The write lock is taken when the
   * transaction begins; failing to get it raises ConflictError.
   */
  run<T>(work: (stores: Stores) => T): T;
}

export function createStores(db: SQLiteDatabase): Stores {
  return {
    users: new SqliteUserStore(db),
    recipes: new SqliteRecipeStore(db),
    catalogItems: new SqliteCatalogItemStore(db),
    recipeItems: new SqliteRecipeItemLinker(db),
    constructions: new ConstructionStore(db),
    categories: new CategoryStore(db),
    materials: new MaterialStore(db),
    storageItems: new StorageItemStore(db),
  };
}

export class SqliteUnitOfWork implements UnitOfWork {
  readonly stores: Stores;

  constructor(
    private readonly db: SQLiteDatabase,
    stores?: Stores
  ) {
    this.stores = stores ?? createStores(db);
  }

  run<T>(work: (stores: Stores) => T): T {
    const transaction = this.db.transaction((stores: Stores) => work(stores));
    try {
      // IMMEDIATE: no other connection can commit between our reads and writes.
      return transaction.immediate(this.stores);
    } catch (error) {
      if (isBusy(error)) {
        throw new ConflictError("Another write is in progress, retry the request");
      }
      throw error;
    }
  }
}
