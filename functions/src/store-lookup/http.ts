import { HttpsError } from "firebase-functions/v2/https";
import { STORE_SEARCH_RADIUS_MILES } from "../grocery-cart/constants";

const DEFAULT_LIMIT = 5;

export type StoreLookupQuery = {
  zip?: string;
  radiusMiles: number;
  limit: number;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const positiveNumber = (value: unknown, field: string, fallback: number) => {
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== "number" || !(value > 0)) {
    throw new HttpsError("invalid-argument", `${field} must be a positive number.`);
  }
  return value;
};

/**
 * Validates `{zip?, radius_miles?, limit?}` callable data. The zip may be
 * omitted and resolved from configuration later.
 */
export function parseStoreLookupRequest(data: unknown): StoreLookupQuery {
  if (data === undefined || data === null) {
    return { radiusMiles: STORE_SEARCH_RADIUS_MILES, limit: DEFAULT_LIMIT };
  }
  if (!isRecord(data)) {
    throw new HttpsError("invalid-argument", "Request data must be an object.");
  }
  const { zip } = data;
  if (zip !== undefined && typeof zip !== "string") {
    throw new HttpsError("invalid-argument", "zip must be a string.");
  }
  return {
    zip: typeof zip === "string" ? zip : undefined,
    radiusMiles: positiveNumber(data.radius_miles, "radius_miles", STORE_SEARCH_RADIUS_MILES),
    limit: positiveNumber(data.limit, "limit", DEFAULT_LIMIT),
  };
}
