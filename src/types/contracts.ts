export type Quantity = {
  readonly value: number;
  readonly unit: string;
};

export type User = {
  id: string;
  email: string;
  isAdmin: boolean;
  createdAt: string;
};

export type CatalogItem = {
  id: string;
  name: string;
  lastUsed: string | null;
};

export type Recipe = {
  id: string;
  userId: string;
  title: string;
  externalUrl: string | null;
  imageUrl: string | null;
  preparationSteps: string;
  prepTimeMinutes: number;
  createdAt: string;
};

export type RecipeFields = {
  title: string;
  externalUrl?: string | null;
  imageUrl?: string | null;
  preparationSteps?: string;
  prepTimeMinutes?: number;
};

export type RecipeItem = {
  id: string;
  recipeId: string;
  itemId: string;
  quantity: Quantity;
};

export type RecipeIngredient = {
  recipeItemId: string;
  itemId: string;
  ingredientName: string;
  quantity: Quantity;
};

export type IngredientInput = {
  name: string;
  quantity: Quantity;
};

export const CONSTRUCTION_STATUSES = [
  "active",
  "in_progress",
  "inactive",
  "archived",
  "deleted",
  "completed",
  "planned",
] as const;

export type ConstructionStatus = (typeof CONSTRUCTION_STATUSES)[number];

export const MATERIAL_UNITS = [
  "meters",
  "kilograms",
  "cubic_meters",
  "cubic_centimeters",
  "cubic_millimeters",
  "liters",
  "pieces",
  "other",
] as const;

export type MaterialUnit = (typeof MATERIAL_UNITS)[number];

export type Construction = {
  id: string;
  name: string;
  description: string;
  address: string;
  startDate: string | null;
  status: ConstructionStatus;
  imgUrl: string | null;
  createdAt: string;
};

export type Category = {
  id: string;
  name: string;
  createdAt: string;
};

export type Material = {
  id: string;
  categoryId: string;
  name: string;
  description: string;
  unit: MaterialUnit;
  createdAt: string;
};

export type StorageItem = {
  constructionId: string;
  materialId: string;
  quantityValue: number;
  createdAt: string;
};

export type ConstructionStatistics = {
  constructionId: string;
  constructionName: string;
  totalItems: number;
  totalQuantity: number;
  measuredAt: string;
};

export type PageRequest = {
  limit: number;
  offset: number;
};

export type Page<T> = {
  items: T[];
  total: number;
};

export type PageLinks = {
  next?: string;
  prev?: string;
};

export type PageMeta = {
  total: number;
  limit: number;
  offset: number;
  page: number;
  has_next: boolean;
  has_prev: boolean;
  links: PageLinks;
};
