import { withConflictMapping } from "./database.js";
import type { UnitOfWork } from "./unitOfWork.js";
import type { MaterialInput } from "./materialStore.js";
import { ConflictError, NotFoundError, ValidationError } from "../middleware/error.js";
import type { Category, Material, Page, PageRequest } from "../types/contracts.js";

type MaterialServiceOptions = {
  searchCaseSensitive: boolean;
  now?: () => Date;
};

/** Material categories and the materials filed under them. */
export class MaterialService {
  private readonly now: () => Date;

  constructor(
    private readonly unitOfWork: UnitOfWork,
    private readonly options: MaterialServiceOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  createCategory(name: string): Category {
    return this.unitOfWork.run((stores) =>
      withConflictMapping(() => stores.categories.create(name, this.now().toISOString()))
    );
  }

  getCategory(categoryId: string): Category {
    const category = this.unitOfWork.stores.categories.findById(categoryId);
    if (!category) {
      throw new NotFoundError("Category", categoryId);
    }
    return category;
  }

  renameCategory(categoryId: string, name: string): Category {
    return this.unitOfWork.run((stores) => {
      const renamed = withConflictMapping(() => stores.categories.rename(categoryId, name));
      if (!renamed) {
        throw new NotFoundError("Category", categoryId);
      }
      return renamed;
    });
  }

  deleteCategory(categoryId: string): void {
    const deleted = this.unitOfWork.run((stores) => stores.categories.delete(categoryId));
    if (!deleted) {
      throw new NotFoundError("Category", categoryId);
    }
  }

  listCategories(page: PageRequest): Page<Category> {
    return this.unitOfWork.stores.categories.listPage(page);
  }

  listAllCategories(): Category[] {
    return this.unitOfWork.stores.categories.listAll();
  }

  searchCategories(query: string, page: PageRequest): Page<Category> {
    return this.unitOfWork.stores.categories.listPage(page, {
      query,
      caseSensitive: this.options.searchCaseSensitive,
    });
  }

  createMaterial(input: MaterialInput): Material {
    return this.unitOfWork.run((stores) =>
      withConflictMapping(() => stores.materials.create(input, this.now().toISOString()))
    );
  }

  /**
   * Creates all materials or none. Names repeated inside the batch and names
   * already stored are reported together.
   */
  createMaterialsBulk(inputs: MaterialInput[]): Material[] {
    const seen = new Set<string>();
    const repeated = new Set<string>();
    for (const input of inputs) {
      if (seen.has(input.name)) {
        repeated.add(input.name);
      }
      seen.add(input.name);
    }
    if (repeated.size > 0) {
      throw new ValidationError("Duplicate names in materials list", [...repeated].map((name) => ({
        path: "name",
        message: `'${name}' appears more than once`,
      })));
    }

    return this.unitOfWork.run((stores) => {
      const existing = inputs.filter((input) => stores.materials.findByName(input.name));
      if (existing.length > 0) {
        throw new ConflictError(
          `Materials already exist: ${existing.map((input) => input.name).join(", ")}`
        );
      }

      const createdAt = this.now().toISOString();
      return inputs.map((input) => withConflictMapping(() => stores.materials.create(input, createdAt)));
    });
  }

  getMaterial(materialId: string): Material {
    const material = this.unitOfWork.stores.materials.findById(materialId);
    if (!material) {
      throw new NotFoundError("Material", materialId);
    }
    return material;
  }

  updateMaterial(materialId: string, patch: Partial<MaterialInput>): Material {
    return this.unitOfWork.run((stores) => {
      const updated = withConflictMapping(() => stores.materials.update(materialId, patch));
      if (!updated) {
        throw new NotFoundError("Material", materialId);
      }
      return updated;
    });
  }

  deleteMaterial(materialId: string): void {
    const deleted = this.unitOfWork.run((stores) => stores.materials.delete(materialId));
    if (!deleted) {
      throw new NotFoundError("Material", materialId);
    }
  }

  listMaterials(page: PageRequest): Page<Material> {
    return this.unitOfWork.stores.materials.listPage(page);
  }

  listAllMaterials(): Material[] {
    return this.unitOfWork.stores.materials.listAll();
  }

  searchMaterials(query: string, page: PageRequest, categoryId?: string): Page<Material> {
    return this.unitOfWork.stores.materials.listPage(page, {
      name: { query, caseSensitive: this.options.searchCaseSensitive },
      categoryId,
    });
  }

  listMaterialsByCategory(categoryId: string, page: PageRequest): Page<Material> {
    return this.unitOfWork.run((stores) => {
      if (!stores.categories.findById(categoryId)) {
        throw new NotFoundError("Category", categoryId);
      }
      return stores.materials.listPage(page, { categoryId });
    });
  }

  listMaterialsByConstruction(constructionId: string, page: PageRequest): Page<Material> {
    return this.unitOfWork.run((stores) => {
      if (!stores.constructions.findById(constructionId)) {
        throw new NotFoundError("Construction", constructionId);
      }
      return stores.materials.listPage(page, { constructionId });
    });
  }
}
