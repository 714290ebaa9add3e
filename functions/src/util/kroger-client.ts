import { logger } from "firebase-functions/v2";
import { KROGER_API_BASE_URL, KROGER_AUTH_URL, REQUEST_TIMEOUT_MS } from "../constants";
import { RetrievalError } from "../errors";
import { CandidateProduct, CatalogService, StoreLocation } from "../types";
import {
  KrogerListResponse,
  KrogerLocation,
  KrogerProduct,
  KrogerTokenResponse,
} from "./types";

const APP_SCOPE = "product.compact";
// Refresh a little before the server-side expiry.
const TOKEN_EXPIRY_MARGIN_SECONDS = 60;

type KrogerCatalogOptions = {
  clientId: string;
  clientSecret: string;
  fetchFn?: typeof fetch;
  now?: () => number;
  timeoutMs?: number;
};

type QueryParams = Record<string, string | number>;

type BodyCheck<T> = (body: unknown) => body is T;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isTokenResponse = (body: unknown): body is KrogerTokenResponse =>
  isRecord(body) && typeof body.access_token === "string" && typeof body.expires_in === "number";

const isProduct = (value: unknown): value is KrogerProduct =>
  isRecord(value) && typeof value.productId === "string";

const isLocation = (value: unknown): value is KrogerLocation =>
  isRecord(value) && typeof value.locationId === "string";

const isListOf =
  <T>(isEntry: (value: unknown) => value is T): BodyCheck<KrogerListResponse<T>> =>
  (body: unknown): body is KrogerListResponse<T> =>
    isRecord(body) && (body.data === undefined || (Array.isArray(body.data) && body.data.every(isEntry)));

const isProductDetail = (body: unknown): body is { data?: KrogerProduct } =>
  isRecord(body) && (body.data === undefined || isProduct(body.data));

export const toCandidateProduct = (product: KrogerProduct): CandidateProduct => ({
  id: product.productId,
  upc: product.upc,
  description: product.description || "",
  brand: product.brand || "",
  categories: product.categories || [],
  snapEligible: product.snapEligible ?? true,
  items: (product.items || []).map((item) => ({
    size: item.size,
    price: item.price,
    stockLevel: item.inventory?.stockLevel,
    fulfillment: item.fulfillment,
  })),
});

export const toStoreLocation = (location: KrogerLocation): StoreLocation => {
  const address = location.address || {};
  return {
    locationId: location.locationId,
    name: location.name || "",
    address: `${address.addressLine1 || ""}, ${address.city || ""}, ${address.state || ""} ${
      address.zipCode || ""
    }`,
    phone: location.phone || "",
  };
};

/**
 * Catalog service backed by the Kroger public API. Uses an app-level
 * client-credentials token, cached until shortly before it expires.
 */
export function createKrogerCatalog({
  clientId,
  clientSecret,
  fetchFn = fetch,
  now = Date.now,
  timeoutMs = REQUEST_TIMEOUT_MS,
}: KrogerCatalogOptions): CatalogService {
  let appToken: { value: string; expiresAt: number } | null = null;

  async function send<T>(
    url: string,
    init: RequestInit,
    description: string,
    isExpected: BodyCheck<T>
  ): Promise<T> {
    let response: Response;
    try {
      response = await fetchFn(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
    } catch (error) {
      throw new RetrievalError(
        `${description} failed: ${error instanceof Error ? error.message : "Unknown error"}`,
        undefined,
        { cause: error }
      );
    }

    if (!response.ok) {
      throw new RetrievalError(`${description} failed with status ${response.status}`, response.status);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new RetrievalError(`${description} returned invalid JSON`, response.status, { cause: error });
    }
    if (!isExpected(body)) {
      throw new RetrievalError(`${description} returned an unexpected payload`, response.status);
    }
    return body;
  }

  async function getAppToken(): Promise<string> {
    if (appToken && now() < appToken.expiresAt) {
      return appToken.value;
    }

    const credentials = Buffer.from(`${clientId}:${clientSecret}`).toString("base64");
    const body = await send(
      `${KROGER_AUTH_URL}/token`,
      {
        method: "POST",
        headers: {
          Authorization: `Basic ${credentials}`,
          "Content-Type": "application/x-www-form-urlencoded",
        },
        body: new URLSearchParams({ grant_type: "client_credentials", scope: APP_SCOPE }).toString(),
      },
      "Token request",
      isTokenResponse
    );

    appToken = {
      value: body.access_token,
      expiresAt: now() + (body.expires_in - TOKEN_EXPIRY_MARGIN_SECONDS) * 1000,
    };
    return appToken.value;
  }

  async function get<T>(
    path: string,
    params: QueryParams,
    description: string,
    isExpected: BodyCheck<T>
  ): Promise<T> {
    const token = await getAppToken();
    const url = new URL(`${KROGER_API_BASE_URL}${path}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, String(value));
    }
    return send(
      url.toString(),
      {
        method: "GET",
        headers: { Authorization: `Bearer ${token}`, Accept: "application/json" },
      },
      description,
      isExpected
    );
  }

  return {
    async findStores(postalCode, radiusMiles = 10, limit = 5) {
      const body = await get(
        "/locations",
        {
          "filter.zipCode.near": postalCode,
          "filter.radiusInMiles": radiusMiles,
          "filter.limit": limit,
        },
        "Store lookup",
        isListOf(isLocation)
      );
      const stores = (body.data || []).map(toStoreLocation);
      logger.info("Kroger store lookup results", { postalCode, found: stores.length });
      return stores;
    },

    async searchProducts(query, locationId, limit = 10) {
      const body = await get(
        "/products",
        {
          "filter.term": query,
          "filter.locationId": locationId,
          "filter.limit": limit,
        },
        "Product search",
        isListOf(isProduct)
      );
      const candidates = (body.data || []).map(toCandidateProduct);
      logger.info("Kroger product search results", { query, locationId, hits: candidates.length });
      return candidates;
    },

    async getProductDetail(productId, locationId) {
      const body = await get(
        `/products/${encodeURIComponent(productId)}`,
        { "filter.locationId": locationId },
        "Product detail",
        isProductDetail
      );
      return body.data ? toCandidateProduct(body.data) : null;
    },
  };
}
