import { RequestedItem } from "../types";
import { InputError } from "../errors";

export const DEFAULT_QUANTITY = 1;
export const DEFAULT_UNIT = "each";
export const DEFAULT_CATEGORY = "other";

export type RequestedItemInput = string | Partial<RequestedItem>;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const normalizeOne = (entry: unknown, index: number): RequestedItem => {
  if (typeof entry === "string") {
    if (!entry.trim()) {
      throw new InputError(`Item ${index + 1} is an empty string`);
    }
    return {
      item: entry,
      quantity: DEFAULT_QUANTITY,
      unit: DEFAULT_UNIT,
      category: DEFAULT_CATEGORY,
    };
  }

  if (!isRecord(entry) || typeof entry.item !== "string" || !entry.item.trim()) {
    throw new InputError(`Item ${index + 1} must be a string or an object with a non-empty "item"`);
  }

  const quantity = entry.quantity ?? DEFAULT_QUANTITY;
  const unit = entry.unit ?? DEFAULT_UNIT;
  const category = entry.category ?? DEFAULT_CATEGORY;
  if (typeof quantity !== "number") {
    throw new InputError(`Item ${index + 1} has a non-numeric quantity`);
  }
  if (typeof unit !== "string") {
    throw new InputError(`Item ${index + 1} has a non-string unit`);
  }
  if (typeof category !== "string") {
    throw new InputError(`Item ${index + 1} has a non-string category`);
  }

  return { item: entry.item, quantity, unit, category };
};

/**
 * Turns a raw grocery list (bare strings or partial item records) into requested
 * items with defaults applied. Throws InputError on anything else.
 */
export const normalizeRequestedItems = (input: unknown): RequestedItem[] => {
  if (!Array.isArray(input) || input.length === 0) {
    throw new InputError("Grocery list is required and must be a non-empty array");
  }
  return input.map(normalizeOne);
};
