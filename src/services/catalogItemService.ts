import { withConflictMapping } from "./database.js";
import type { UnitOfWork } from "./unitOfWork.js";
import { ConflictError, NotFoundError } from "../middleware/error.js";
import { createChildLogger } from "../utils/logger.js";
import type { CatalogItem, Page, PageRequest } from "../types/contracts.js";

type CatalogItemServiceOptions = {
  searchCaseSensitive: boolean;
};

const log = createChildLogger({ component: "catalog-items" });

/**
 * Direct catalog management. Names are taken verbatim, exactly as the recipe
 * path does, so "Jajka" and "jajka" are different items.
 */
export class CatalogItemService {
  constructor(
    private readonly unitOfWork: UnitOfWork,
    private readonly options: CatalogItemServiceOptions
  ) {}

  createCatalogItem(name: string): CatalogItem {
    const item = this.unitOfWork.run((stores) => {
      if (stores.catalogItems.findByName(name)) {
        throw duplicateName(name);
      }
      return withConflictMapping(() => stores.catalogItems.create(name));
    });

    log.info({ msg: "Catalog item created", itemId: item.id, name: item.name });
    return item;
  }

  getCatalogItem(itemId: string): CatalogItem {
    const item = this.unitOfWork.stores.catalogItems.findById(itemId);
    if (!item) {
      throw new NotFoundError("Catalog item", itemId);
    }
    return item;
  }

  renameCatalogItem(itemId: string, name: string): CatalogItem {
    return this.unitOfWork.run((stores) => {
      const current = stores.catalogItems.findById(itemId);
      if (!current) {
        throw new NotFoundError("Catalog item", itemId);
      }
      if (current.name === name) {
        return current;
      }

      const taken = stores.catalogItems.findByName(name);
      if (taken) {
        throw duplicateName(name);
      }

      const renamed = withConflictMapping(() => stores.catalogItems.rename(itemId, name));
      if (!renamed) {
        throw new NotFoundError("Catalog item", itemId);
      }
      return renamed;
    });
  }

  /** @throws ConflictError while any recipe still links to the item */
  deleteCatalogItem(itemId: string): void {
    this.unitOfWork.run((stores) => {
      if (!stores.catalogItems.findById(itemId)) {
        throw new NotFoundError("Catalog item", itemId);
      }

      const links = stores.catalogItems.countRecipeLinks(itemId);
      if (links > 0) {
        throw new ConflictError(`Catalog item ${itemId} is used by ${links} recipe ingredient(s)`);
      }

      stores.catalogItems.delete(itemId);
    });
  }

  listCatalogItems(page: PageRequest): Page<CatalogItem> {
    return this.unitOfWork.stores.catalogItems.listPage(page);
  }

  listAllCatalogItems(): CatalogItem[] {
    return this.unitOfWork.stores.catalogItems.listAll();
  }

  searchCatalogItems(name: string, page: PageRequest): Page<CatalogItem> {
    return this.unitOfWork.stores.catalogItems.listPage(page, {
      name,
      caseSensitive: this.options.searchCaseSensitive,
    });
  }
}

function duplicateName(name: string): ConflictError {
  return new ConflictError(`Catalog item with name '${name}' already exists`);
}
