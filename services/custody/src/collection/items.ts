/**
 * Collectible items
 */

import {
  attributeKeySchema,
  attributeValueSchema,
  assetUrlSchema,
  collectionNameSchema,
  descriptionSchema,
  FIELD_LIMITS,
  type Address,
  type ItemAttributes,
  type ItemMetadata,
} from "@mintvault/shared";
import { custodyError } from "../errors.js";
import { validateField } from "../validation.js";
import type { CollectibleItem, CollectionState, MintMetadata } from "./types.js";

/**
 * Field-by-field so each failure maps to its own code
 */
export function validateItemMetadata(input: MintMetadata): ItemMetadata {
  return {
    name: validateField(collectionNameSchema, input.name, "INVALID_NAME", "name"),
    description: validateField(descriptionSchema, input.description, "INVALID_DESCRIPTION", "description"),
    url: validateField(assetUrlSchema, input.url, "INVALID_URL", "url"),
    attributes: validateAttributes(input.attributes ?? {}),
  };
}

export function validateAttributes(attributes: Record<string, string>): ItemAttributes {
  const validated: ItemAttributes = {};
  for (const [key, value] of Object.entries(attributes)) {
    validated[validateField(attributeKeySchema, key, "INVALID_ATTRIBUTE", "key")] =
      validateField(attributeValueSchema, value, "INVALID_ATTRIBUTE", key);
  }
  if (Object.keys(validated).length > FIELD_LIMITS.maxAttributes) {
    throw custodyError("INVALID_ATTRIBUTE", {
      context: { count: Object.keys(validated).length, max: FIELD_LIMITS.maxAttributes },
    });
  }
  return validated;
}

export function createItem(
  id: string,
  collection: Pick<CollectionState, "id" | "revealTime">,
  owner: Address,
  metadata: ItemMetadata
): CollectibleItem {
  return {
    id,
    collectionId: collection.id,
    name: metadata.name,
    description: metadata.description,
    url: metadata.url,
    creator: owner,
    owner,
    revealed: false,
    revealTime: collection.revealTime,
    attributes: { ...metadata.attributes },
  };
}

/**
 * Merge new attributes over the item's existing ones. Returns the merged set
 * without touching the item.
 */
export function mergeAttributes(
  item: CollectibleItem,
  updates: Record<string, string>
): ItemAttributes {
  return validateAttributes({ ...item.attributes, ...updates });
}
