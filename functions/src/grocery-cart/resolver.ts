import { logger } from "firebase-functions/v2";
import { CandidateProduct, CatalogService, RequestedItem, ResolvedItem } from "../types";
import { cleanSearchQuery } from "./core/query";
import { explainScore } from "./core/scoring";
import { selectBest, SelectOptions } from "./core/selector";
import { effectivePrice, filterInStock, primaryItem } from "./core/stock";
import { DEFAULT_SEARCH_LIMIT } from "./constants";

export interface ResolveOptions extends SelectOptions {
  searchLimit?: number;
}

const searchCandidates = async (
  catalog: CatalogService,
  query: string,
  locationId: string,
  limit: number
): Promise<CandidateProduct[]> => {
  try {
    return await catalog.searchProducts(query, locationId, limit);
  } catch (error) {
    logger.warn("Product search failed, treating item as not found", {
      query,
      locationId,
      error: error instanceof Error ? error.message : "Unknown error",
    });
    return [];
  }
};

/**
 * Searches the catalog for one grocery item and returns the best in-stock match
 * with pricing, or null when nothing usable comes back.
 */
export async function resolveGroceryItem(
  catalog: CatalogService,
  requested: RequestedItem,
  locationId: string,
  { searchLimit = DEFAULT_SEARCH_LIMIT, ...selectOptions }: ResolveOptions = {}
): Promise<ResolvedItem | null> {
  const { item: itemName, quantity, unit, category } = requested;
  const searchQuery = cleanSearchQuery(itemName);

  const candidates = await searchCandidates(catalog, searchQuery, locationId, searchLimit);
  const inStock = filterInStock(candidates);

  logger.debug("Filtered candidates", {
    item: itemName,
    searchQuery,
    found: candidates.length,
    inStock: inStock.length,
  });

  const best = selectBest(inStock, itemName, category, selectOptions);
  if (!best) {
    return null;
  }

  const { candidate, score } = best;
  const bestItem = primaryItem(candidate);
  const regularPrice = bestItem?.price?.regular ?? null;
  const promoPrice = bestItem?.price?.promo ?? null;

  logger.debug("Selected candidate", {
    item: itemName,
    productId: candidate.id,
    score,
    breakdown: explainScore(candidate, itemName, category),
  });

  return {
    productId: candidate.id,
    upc: candidate.upc || candidate.id,
    description: candidate.description,
    brand: candidate.brand,
    size: bestItem?.size ?? "",
    regular_price: regularPrice,
    promo_price: promoPrice,
    effective_price: effectivePrice(bestItem),
    in_stock: true,
    fulfillment: bestItem?.fulfillment ?? {},
    search_query: itemName,
    category,
    requested_quantity: quantity,
    requested_unit: unit,
    match_score: score,
    cart_quantity: 1,
  };
}
