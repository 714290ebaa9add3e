// Catalog-side types
export interface CandidatePrice {
  regular?: number;
  promo?: number;
}

export interface CandidateItem {
  size?: string;
  price?: CandidatePrice;
  stockLevel?: string;
  fulfillment?: Record<string, boolean>;
}

export interface CandidateProduct {
  id: string;
  upc?: string;
  description: string;
  brand: string;
  categories: string[];
  snapEligible: boolean;
  items: CandidateItem[];
}

export interface StoreLocation {
  locationId: string;
  name: string;
  address: string;
  phone: string;
}

export interface CatalogService {
  findStores(postalCode: string, radiusMiles?: number, limit?: number): Promise<StoreLocation[]>;
  searchProducts(query: string, locationId: string, limit?: number): Promise<CandidateProduct[]>;
  getProductDetail(productId: string, locationId: string): Promise<CandidateProduct | null>;
}

// Grocery list / cart types
export interface RequestedItem {
  item: string;
  quantity: number;
  unit: string;
  category: string;
}

export interface ScoredCandidate {
  candidate: CandidateProduct;
  score: number;
  price: number;
}

export interface ResolvedItem {
  productId: string;
  upc: string;
  description: string;
  brand: string;
  size: string;
  regular_price: number | null;
  promo_price: number | null;
  effective_price: number | null;
  in_stock: boolean;
  fulfillment: Record<string, boolean>;
  search_query: string;
  category: string;
  requested_quantity: number;
  requested_unit: string;
  match_score: number;
  cart_quantity: number;
}

export type NotFoundItem = RequestedItem;

export interface Cart {
  location_id: string;
  resolved_items: ResolvedItem[];
  not_found: NotFoundItem[];
  estimated_total: number;
  item_count: number;
  missing_count: number;
}
