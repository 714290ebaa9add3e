import { onCall, HttpsError } from "firebase-functions/v2/https";
import { logger } from "firebase-functions/v2";
import { getFirestore } from "firebase-admin/firestore";
import { krogerClientIdSecret, krogerClientSecretSecret } from "../grocery-cart/constants";
import { initializeAppIfNeeded } from "../util/firebase";
import { createKrogerCatalog } from "../util/kroger-client";
import { loadStoredSettings, resolveGrocerySettings } from "../util/settings";
import { parseStoreLookupRequest } from "./http";

initializeAppIfNeeded();

const db = getFirestore();

export const findNearbyStores = onCall(
  { secrets: [krogerClientIdSecret, krogerClientSecretSecret], cors: true },
  async (request) => {
    const query = parseStoreLookupRequest(request.data);
    const { zip } = resolveGrocerySettings({
      explicit: { zip: query.zip },
      stored: await loadStoredSettings(db),
    });

    if (!zip) {
      throw new HttpsError("invalid-argument", "No zip provided and none is configured.");
    }

    const catalog = createKrogerCatalog({
      clientId: krogerClientIdSecret.value(),
      clientSecret: krogerClientSecretSecret.value(),
    });

    try {
      const stores = await catalog.findStores(zip, query.radiusMiles, query.limit);
      return { stores };
    } catch (error) {
      logger.error("Store lookup failed", {
        zip,
        error: error instanceof Error ? error.message : "Unknown error",
      });
      throw new HttpsError("internal", "Error looking up stores");
    }
  }
);
