/**
 * Collection field updates
 *
 * The engine takes a field selector and its raw (string) value. Decoding
 * and applying are separate so the decoded update can be checked against
 * staged state.
 */

import {
  MINTING,
  durationMsSchema,
  positiveAmountSchema,
  timestampMsSchema,
} from "@mintvault/shared";
import { z } from "zod";
import { custodyError } from "../errors.js";
import { validateField } from "../validation.js";
import type { CollectionField, CollectionState, CollectionUpdate } from "./types.js";

export const COLLECTION_FIELDS: readonly CollectionField[] = [
  "price",
  "minting_end",
  "paused",
  "withdrawal_time_lock",
];

const integerStringSchema = z.string().regex(/^\d+$/, "Expected a non-negative integer");

const rawTimestampSchema = integerStringSchema.transform(Number).pipe(timestampMsSchema);
const rawDurationSchema = integerStringSchema.transform(Number).pipe(durationMsSchema);
const rawBooleanSchema = z.enum(["true", "false"]).transform((value) => value === "true");

export function parseCollectionUpdate(field: string, raw: string): CollectionUpdate {
  switch (field) {
    case "price":
      return {
        field,
        value: validateField(positiveAmountSchema, raw, "INVALID_FIELD_VALUE", field),
      };
    case "minting_end":
      return {
        field,
        value: validateField(rawTimestampSchema, raw, "INVALID_FIELD_VALUE", field),
      };
    case "paused":
      return {
        field,
        value: validateField(rawBooleanSchema, raw, "INVALID_FIELD_VALUE", field),
      };
    case "withdrawal_time_lock":
      return {
        field,
        value: validateField(rawDurationSchema, raw, "INVALID_FIELD_VALUE", field),
      };
    default:
      throw custodyError("INVALID_FIELD", {
        context: { field, allowed: COLLECTION_FIELDS },
      });
  }
}

/**
 * Apply an update to (staged) collection state. Returns the new value as a
 * string for the update event.
 */
export function applyCollectionUpdate(state: CollectionState, update: CollectionUpdate): string {
  switch (update.field) {
    case "price":
      if (update.value <= 0n) {
        throw custodyError("INVALID_PRICE", { context: { price: update.value.toString() } });
      }
      state.mintPrice = update.value;
      return update.value.toString();

    case "minting_end": {
      const mintingEnd = validateField(timestampMsSchema, update.value, "INVALID_FIELD_VALUE", update.field);
      if (mintingEnd <= state.mintingStart) {
        throw custodyError("INVALID_TIME_WINDOW", {
          context: { mintingStart: state.mintingStart, mintingEnd },
        });
      }
      if (state.revealTime > mintingEnd + MINTING.revealGraceMs) {
        throw custodyError("INVALID_REVEAL_TIME", {
          context: { revealTime: state.revealTime, mintingEnd },
        });
      }
      state.mintingEnd = mintingEnd;
      return String(mintingEnd);
    }

    case "paused":
      state.paused = update.value;
      return String(update.value);

    case "withdrawal_time_lock":
      state.withdrawalTimeLock = validateField(
        durationMsSchema,
        update.value,
        "INVALID_FIELD_VALUE",
        update.field
      );
      return String(state.withdrawalTimeLock);
  }
}
