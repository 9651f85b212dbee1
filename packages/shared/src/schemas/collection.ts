/**
 * Collection & Item Schemas
 * Descriptive-field validators for collections and collectible items
 */

import { z } from "zod";
import { ALLOWED_URL_PREFIXES, FIELD_LIMITS } from "../constants/index.js";

// ============================================
// COLLECTION FIELDS
// ============================================

export const collectionNameSchema = z
  .string()
  .min(1)
  .max(FIELD_LIMITS.nameMaxLength)
  .refine((value) => value.trim().length > 0, "Name must not be blank");

export const collectionSymbolSchema = z
  .string()
  .min(1)
  .max(FIELD_LIMITS.symbolMaxLength)
  .regex(/^[A-Z0-9]+$/, "Symbol must be uppercase alphanumeric");

export const descriptionSchema = z.string().max(FIELD_LIMITS.descriptionMaxLength);

export const assetUrlSchema = z
  .string()
  .max(FIELD_LIMITS.urlMaxLength)
  .refine(
    (value) => ALLOWED_URL_PREFIXES.some((prefix) => value.startsWith(prefix)),
    `URL must start with one of: ${ALLOWED_URL_PREFIXES.join(", ")}`
  );

// ============================================
// ITEM ATTRIBUTES
// ============================================

export const attributeKeySchema = z.string().min(1).max(FIELD_LIMITS.attributeKeyMaxLength);

export const attributeValueSchema = z.string().max(FIELD_LIMITS.attributeValueMaxLength);

export const itemAttributesSchema = z
  .record(attributeKeySchema, attributeValueSchema)
  .refine(
    (attributes) => Object.keys(attributes).length <= FIELD_LIMITS.maxAttributes,
    `At most ${FIELD_LIMITS.maxAttributes} attributes`
  );

export type ItemAttributes = z.infer<typeof itemAttributesSchema>;

// ============================================
// ITEM METADATA
// ============================================

export const itemMetadataSchema = z.object({
  name: collectionNameSchema,
  description: descriptionSchema,
  url: assetUrlSchema,
  attributes: itemAttributesSchema.default({}),
});

export type ItemMetadataInput = z.input<typeof itemMetadataSchema>;
export type ItemMetadata = z.output<typeof itemMetadataSchema>;
