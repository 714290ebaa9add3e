import { onRequest } from "firebase-functions/v2/https";
import { logger } from "firebase-functions/v2";
import { getFirestore } from "firebase-admin/firestore";
import { initializeAppIfNeeded } from "../util/firebase";
import { createKrogerCatalog } from "../util/kroger-client";
import { loadStoredSettings, resolveGrocerySettings } from "../util/settings";
import { ErrorContext, notifyError } from "../util/error-notification";
import { FUNCTION_CONFIG, krogerClientIdSecret, krogerClientSecretSecret } from "./constants";
import { errorStatus, isValidMethod, parseGroceryList } from "./http";
import { buildGroceryCart } from "./aggregator";
import { saveCart } from "./persistence";
import { GroceryCartRequest, GroceryCartResponse } from "./types";

initializeAppIfNeeded();

const db = getFirestore();

export const groceryCart = onRequest(FUNCTION_CONFIG, async (request, response) => {
  const startTime = Date.now();
  const failureContext: ErrorContext = { function: "groceryCart" };
  try {
    if (!isValidMethod(request, response)) {
      return;
    }

    const requestData: GroceryCartRequest = request.body;
    const items = parseGroceryList(requestData);
    failureContext.itemCount = items.length;

    const settings = resolveGrocerySettings({
      explicit: { zip: requestData.zip, locationId: requestData.location_id },
      stored: await loadStoredSettings(db),
    });
    failureContext.locationId = settings.locationId;
    failureContext.zip = settings.zip;

    logger.info("Building grocery cart", {
      itemCount: items.length,
      locationId: settings.locationId,
      zip: settings.zip,
    });

    const catalog = createKrogerCatalog({
      clientId: krogerClientIdSecret.value(),
      clientSecret: krogerClientSecretSecret.value(),
    });

    const cart = await buildGroceryCart(catalog, items, {
      locationId: settings.locationId,
      postalCode: settings.zip,
      minScore: requestData.min_score,
    });
    const cartId = await saveCart(db, cart);

    const responseData: GroceryCartResponse = {
      ...cart,
      cart_id: cartId,
      processing_time_ms: Date.now() - startTime,
    };

    logger.info("Grocery cart completed", {
      cartId,
      resolved: cart.item_count,
      missing: cart.missing_count,
      estimatedTotal: cart.estimated_total,
      processingTimeMs: responseData.processing_time_ms,
    });

    response.json(responseData);
  } catch (error) {
    const status = errorStatus(error);
    const details = error instanceof Error ? error.message : "Unknown error";

    if (status === 500) {
      logger.error("Error building grocery cart", { error: details });
      await notifyError(details, failureContext);
      response.status(500).json({ error: "Internal server error", details });
      return;
    }

    logger.warn("Grocery cart request rejected", { status, error: details });
    response.status(status).json({ error: status === 400 ? "Invalid request" : "No store found", details });
  }
});
