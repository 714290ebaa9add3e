// Raw Kroger API records. Only the fields the catalog client reads are listed.
type KrogerPrice = {
  regular?: number;
  promo?: number;
};

export type KrogerItem = {
  itemId?: string;
  size?: string;
  price?: KrogerPrice;
  inventory?: { stockLevel?: string };
  fulfillment?: Record<string, boolean>;
};

export type KrogerProduct = {
  productId: string;
  upc?: string;
  description?: string;
  brand?: string;
  categories?: string[];
  snapEligible?: boolean;
  items?: KrogerItem[];
};

export type KrogerLocation = {
  locationId: string;
  name?: string;
  phone?: string;
  address?: {
    addressLine1?: string;
    city?: string;
    state?: string;
    zipCode?: string;
  };
};

export type KrogerListResponse<T> = {
  data?: T[];
};

export type KrogerTokenResponse = {
  access_token: string;
  expires_in: number;
};
