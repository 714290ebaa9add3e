import { Cart } from "../types";
import { RequestedItemInput } from "./input";
export * from "../types";

export interface GroceryCartRequest {
  grocery_list?: RequestedItemInput[];
  items?: string[];
  location_id?: string;
  zip?: string;
  min_score?: number;
}

export interface GroceryCartResponse extends Cart {
  cart_id: string;
  processing_time_ms: number;
}
