import { logger } from "firebase-functions/v2";
import { Cart, CatalogService, NotFoundItem, RequestedItem, ResolvedItem } from "../types";
import { RateLimiter } from "../util/rate-limiter";
import { DEFAULT_PACING_MS, STORE_SEARCH_RADIUS_MILES } from "./constants";
import { NoStoreFoundError } from "../errors";
import { resolveGroceryItem, ResolveOptions } from "./resolver";

export type ItemStatus = "PENDING" | "RESOLVING" | "RESOLVED" | "NOT_FOUND";

export interface BuildCartOptions extends ResolveOptions {
  locationId?: string;
  postalCode?: string;
  /** Shared limiter for catalog searches; defaults to one search per DEFAULT_PACING_MS. */
  rateLimiter?: RateLimiter;
  onStatusChange?: (index: number, item: RequestedItem, status: ItemStatus) => void;
}

export const roundToCents = (value: number) => Math.round(value * 100) / 100;

export async function findNearestStoreId(
  catalog: CatalogService,
  postalCode: string | undefined
): Promise<string> {
  if (!postalCode) {
    throw new NoStoreFoundError("");
  }

  logger.info("Finding nearest store", { postalCode });
  const [store] = await catalog.findStores(postalCode, STORE_SEARCH_RADIUS_MILES, 1);
  if (!store) {
    throw new NoStoreFoundError(postalCode);
  }

  logger.info("Using store", { name: store.name, locationId: store.locationId });
  return store.locationId;
}

/**
 * Resolves every requested item against one store, in order and one at a time,
 * and totals the effective prices of what was found.
 */
export async function buildGroceryCart(
  catalog: CatalogService,
  items: RequestedItem[],
  {
    locationId,
    postalCode,
    rateLimiter = new RateLimiter({ intervalMs: DEFAULT_PACING_MS }),
    onStatusChange,
    ...resolveOptions
  }: BuildCartOptions = {}
): Promise<Cart> {
  const storeId = locationId || (await findNearestStoreId(catalog, postalCode));

  const setStatus = (index: number, item: RequestedItem, status: ItemStatus) => {
    onStatusChange?.(index, item, status);
  };
  items.forEach((item, index) => setStatus(index, item, "PENDING"));

  const resolved: ResolvedItem[] = [];
  const notFound: NotFoundItem[] = [];
  let total = 0;

  for (const [index, requested] of items.entries()) {
    logger.info(`[${index + 1}/${items.length}] Searching`, { item: requested.item });
    setStatus(index, requested, "RESOLVING");

    const product = await rateLimiter.schedule(() =>
      resolveGroceryItem(catalog, requested, storeId, resolveOptions)
    );

    if (product) {
      if (product.effective_price) {
        total += product.effective_price;
      }
      resolved.push(product);
      setStatus(index, requested, "RESOLVED");
    } else {
      notFound.push({
        item: requested.item,
        quantity: requested.quantity,
        unit: requested.unit,
        category: requested.category,
      });
      setStatus(index, requested, "NOT_FOUND");
    }
  }

  logger.info("Grocery cart built", {
    locationId: storeId,
    resolved: resolved.length,
    missing: notFound.length,
  });

  return {
    location_id: storeId,
    resolved_items: resolved,
    not_found: notFound,
    estimated_total: roundToCents(total),
    item_count: resolved.length,
    missing_count: notFound.length,
  };
}
