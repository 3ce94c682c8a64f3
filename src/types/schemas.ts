import { z } from "zod";
import { quantityUnitSchema, quantityValueSchema } from "../services/quantity.js";
import { CONSTRUCTION_STATUSES, MATERIAL_UNITS } from "./contracts.js";

export const CATALOG_NAME_MAX = 100;
export const RECIPE_TITLE_MAX = 255;

const httpURL = (max: number) =>
  z
    .string()
    .max(max)
    .url()
    .refine((value) => /^https?:\/\//i.test(value), "URL must use http or https");

export const catalogNameSchema = z
  .string({ required_error: "Name is required" })
  .min(1, "Name cannot be empty")
  .max(CATALOG_NAME_MAX, `Name cannot exceed ${CATALOG_NAME_MAX} characters`);

export const recipeTitleSchema = z
  .string({ required_error: "Title is required" })
  .min(1, "Title cannot be empty")
  .max(RECIPE_TITLE_MAX, `Title cannot exceed ${RECIPE_TITLE_MAX} characters`);

export const prepTimeSchema = z.number().int().min(0, "Preparation time cannot be negative");

// Request bodies (snake_case, as sent over the wire)

export const ingredientBodySchema = z.object({
  name: catalogNameSchema,
  quantity_value: quantityValueSchema,
  quantity_unit: quantityUnitSchema,
});

export const recipeCreateBodySchema = z.object({
  title: recipeTitleSchema,
  external_url: httpURL(2048).nullish(),
  image_url: z.string().max(500).nullish(),
  preparation_steps: z.string().default(""),
  prep_time_minutes: prepTimeSchema.default(0),
  ingredients: z.array(ingredientBodySchema).default([]),
});

export const recipeUpdateBodySchema = z.object({
  title: recipeTitleSchema.optional(),
  external_url: httpURL(2048).nullish(),
  image_url: z.string().max(500).nullish(),
  preparation_steps: z.string().optional(),
  prep_time_minutes: prepTimeSchema.optional(),
});

export const catalogItemBodySchema = z.object({
  name: catalogNameSchema,
});

export const userCreateBodySchema = z.object({
  email: z.string().email().max(255),
  is_admin: z.boolean().default(false),
});

const constructionFields = {
  name: z.string().min(1).max(100),
  description: z.string(),
  address: z.string().max(255),
  start_date: z.string().datetime({ offset: true }).nullable(),
  status: z.enum(CONSTRUCTION_STATUSES),
  img_url: z.string().max(500).nullable(),
};

export const constructionCreateBodySchema = z.object({
  name: constructionFields.name,
  description: constructionFields.description.default(""),
  address: constructionFields.address.default(""),
  start_date: constructionFields.start_date.default(null),
  status: constructionFields.status.default("inactive"),
  img_url: constructionFields.img_url.default(null),
});

export const constructionUpdateBodySchema = z.object({
  name: constructionFields.name.optional(),
  description: constructionFields.description.optional(),
  address: constructionFields.address.optional(),
  start_date: constructionFields.start_date.optional(),
  status: constructionFields.status.optional(),
  img_url: constructionFields.img_url.optional(),
});

export const categoryBodySchema = z.object({
  name: z.string().min(1).max(100),
});

export const materialCreateBodySchema = z.object({
  category_id: z.string().uuid(),
  name: z.string().min(1).max(100),
  description: z.string().default(""),
  unit: z.enum(MATERIAL_UNITS).default("other"),
});

export const materialUpdateBodySchema = z.object({
  category_id: z.string().uuid().optional(),
  name: z.string().min(1).max(100).optional(),
  description: z.string().optional(),
  unit: z.enum(MATERIAL_UNITS).optional(),
});

export const materialBulkBodySchema = z.array(materialCreateBodySchema).min(1);

export const storageItemBodySchema = z.object({
  quantity_value: quantityValueSchema,
});

export const storageItemBulkBodySchema = z.object({
  items: z
    .array(
      z.object({
        material_id: z.string().uuid(),
        quantity_value: quantityValueSchema,
      })
    )
    .min(1),
});

// Query strings

export const searchQuerySchema = z.object({
  query: z.string().min(1, "query is required"),
});

export const catalogSearchQuerySchema = z.object({
  name: z.string().min(1, "name is required"),
});

export const statusFilterSchema = z.object({
  status: z.enum(CONSTRUCTION_STATUSES).optional(),
});

export const idParamSchema = z.string().uuid();

export const statisticsQuerySchema = z.object({
  from: z.string().datetime({ offset: true }).optional(),
});

export type MaterialCreateBody = z.infer<typeof materialCreateBodySchema>;
