import type { UnitOfWork } from "./unitOfWork.js";
import type { ConstructionInput } from "./constructionStore.js";
import type { StockedMaterial } from "./storageItemStore.js";
import { NotFoundError } from "../middleware/error.js";
import { createChildLogger } from "../utils/logger.js";
import type {
  Construction,
  ConstructionStatistics,
  ConstructionStatus,
  Page,
  PageRequest,
  StorageItem,
} from "../types/contracts.js";

type ConstructionServiceOptions = {
  searchCaseSensitive: boolean;
  now?: () => Date;
};

const log = createChildLogger({ component: "constructions" });

export class ConstructionService {
  private readonly now: () => Date;

  constructor(
    private readonly unitOfWork: UnitOfWork,
    private readonly options: ConstructionServiceOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  createConstruction(input: ConstructionInput): Construction {
    const construction = this.unitOfWork.run((stores) =>
      stores.constructions.create(input, this.now().toISOString())
    );
    log.info({ msg: "Construction created", constructionId: construction.id });
    return construction;
  }

  getConstruction(constructionId: string): Construction {
    const construction = this.unitOfWork.stores.constructions.findById(constructionId);
    if (!construction) {
      throw new NotFoundError("Construction", constructionId);
    }
    return construction;
  }

  updateConstruction(constructionId: string, patch: Partial<ConstructionInput>): Construction {
    return this.unitOfWork.run((stores) => {
      const updated = stores.constructions.update(constructionId, patch);
      if (!updated) {
        throw new NotFoundError("Construction", constructionId);
      }
      return updated;
    });
  }

  /** Removes the construction and its stock. */
  deleteConstruction(constructionId: string): void {
    const deleted = this.unitOfWork.run((stores) => stores.constructions.delete(constructionId));
    if (!deleted) {
      throw new NotFoundError("Construction", constructionId);
    }
  }

  listConstructions(page: PageRequest): Page<Construction> {
    return this.unitOfWork.stores.constructions.listPage(page);
  }

  listAllConstructions(): Construction[] {
    return this.unitOfWork.stores.constructions.listAll();
  }

  searchConstructions(query: string, page: PageRequest, status?: ConstructionStatus): Page<Construction> {
    return this.unitOfWork.stores.constructions.listPage(page, {
      name: { query, caseSensitive: this.options.searchCaseSensitive },
      status,
    });
  }

  statistics(from?: string): ConstructionStatistics[] {
    return this.unitOfWork.stores.constructions.statistics(this.now().toISOString(), from);
  }

  listStock(constructionId: string): StockedMaterial[] {
    return this.unitOfWork.run((stores) => {
      this.requireConstruction(stores.constructions.findById(constructionId), constructionId);
      return stores.storageItems.listByConstruction(constructionId);
    });
  }

  getStock(constructionId: string, materialId: string): StockedMaterial {
    const stocked = this.listStock(constructionId).find((item) => item.materialId === materialId);
    if (!stocked) {
      throw new NotFoundError("Storage item", `${constructionId}/${materialId}`);
    }
    return stocked;
  }

  setStock(constructionId: string, materialId: string, quantityValue: number): StorageItem {
    return this.unitOfWork.run((stores) => {
      this.requireConstruction(stores.constructions.findById(constructionId), constructionId);
      if (!stores.materials.findById(materialId)) {
        throw new NotFoundError("Material", materialId);
      }
      return stores.storageItems.upsert(constructionId, materialId, quantityValue, this.now().toISOString());
    });
  }

  /** Applies every entry or none of them. */
  setStockBulk(
    constructionId: string,
    entries: Array<{ materialId: string; quantityValue: number }>
  ): StorageItem[] {
    return this.unitOfWork.run(() =>
      entries.map((entry) => this.setStock(constructionId, entry.materialId, entry.quantityValue))
    );
  }

  removeStock(constructionId: string, materialId: string): void {
    const deleted = this.unitOfWork.run((stores) => stores.storageItems.delete(constructionId, materialId));
    if (!deleted) {
      throw new NotFoundError("Storage item", `${constructionId}/${materialId}`);
    }
  }

  private requireConstruction(construction: Construction | null, constructionId: string): void {
    if (!construction) {
      throw new NotFoundError("Construction", constructionId);
    }
  }
}
