import { CandidateItem, CandidateProduct, CatalogService, StoreLocation } from "../types";

export const makeItem = (overrides: Partial<CandidateItem> = {}): CandidateItem => ({
  size: "1 lb",
  price: { regular: 3.99 },
  stockLevel: "HIGH",
  fulfillment: { instore: true },
  ...overrides,
});

export const makeCandidate = (overrides: Partial<CandidateProduct> = {}): CandidateProduct => ({
  id: "0000000000001",
  description: "",
  brand: "",
  categories: [],
  snapEligible: true,
  items: [makeItem()],
  ...overrides,
});

type FakeCatalogOptions = {
  products?: Record<string, CandidateProduct[] | Error>;
  stores?: StoreLocation[];
};

export type FakeCatalog = CatalogService & {
  searches: { query: string; locationId: string; limit?: number }[];
  storeLookups: { postalCode: string; radiusMiles?: number; limit?: number }[];
};

/**
 * In-memory catalog keyed by exact search query. Unknown queries return no hits;
 * an Error value is thrown for that query.
 */
export const createFakeCatalog = ({ products = {}, stores = [] }: FakeCatalogOptions = {}): FakeCatalog => {
  const searches: FakeCatalog["searches"] = [];
  const storeLookups: FakeCatalog["storeLookups"] = [];

  return {
    searches,
    storeLookups,
    async findStores(postalCode, radiusMiles, limit) {
      storeLookups.push({ postalCode, radiusMiles, limit });
      return stores;
    },
    async searchProducts(query, locationId, limit) {
      searches.push({ query, locationId, limit });
      const result = products[query] ?? [];
      if (result instanceof Error) {
        throw result;
      }
      return result;
    },
    async getProductDetail(productId) {
      const all = Object.values(products).flatMap((value) => (value instanceof Error ? [] : value));
      return all.find((candidate) => candidate.id === productId) ?? null;
    },
  };
};
