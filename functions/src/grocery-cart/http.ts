import type { Request } from "firebase-functions/v2/https";
import type { Response } from "express";
import { InputError, NoStoreFoundError } from "../errors";
import { RequestedItem } from "../types";
import { normalizeRequestedItems } from "./input";
import { GroceryCartRequest } from "./types";

export function isValidMethod(request: Request, response: Response) {
  if (request.method !== "POST") {
    response.status(405).json({ error: "Method not allowed" });
    return false;
  }
  return true;
}

/**
 * Reads the grocery list from either `grocery_list` (meal-plan records or strings)
 * or `items` (bare strings). Throws InputError when neither holds a usable list.
 */
export function parseGroceryList(body: GroceryCartRequest | undefined): RequestedItem[] {
  if (!body || typeof body !== "object") {
    throw new InputError("Request body must be a JSON object");
  }
  if (body.min_score !== undefined && typeof body.min_score !== "number") {
    throw new InputError("min_score must be a number");
  }
  for (const field of ["zip", "location_id"] as const) {
    if (body[field] !== undefined && typeof body[field] !== "string") {
      throw new InputError(`${field} must be a string`);
    }
  }
  return normalizeRequestedItems(body.grocery_list ?? body.items);
}

export function errorStatus(error: unknown): number {
  if (error instanceof InputError) {
    return 400;
  }
  if (error instanceof NoStoreFoundError) {
    return 404;
  }
  return 500;
}
