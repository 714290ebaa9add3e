import { groceryCart } from "./grocery-cart";
import { findNearbyStores } from "./store-lookup";

exports.groceryCart = groceryCart;
exports.findNearbyStores = findNearbyStores;
