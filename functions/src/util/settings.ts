import type { Firestore } from "firebase-admin/firestore";
import { logger } from "firebase-functions/v2";
import { GROCERY_SETTINGS_DOC, SETTINGS_COLLECTION } from "../constants";

export interface GrocerySettings {
  zip?: string;
  locationId?: string;
}

type SettingsSources = {
  explicit?: GrocerySettings;
  env?: NodeJS.ProcessEnv;
  stored?: GrocerySettings;
};

const HARD_DEFAULTS: GrocerySettings = {};

const firstSet = (...values: (string | undefined)[]) => values.find((value) => !!value?.trim());

/**
 * Merges settings with precedence explicit > environment > stored > default.
 * Blank strings are treated as unset.
 */
export const resolveGrocerySettings = ({
  explicit = {},
  env = process.env,
  stored = {},
}: SettingsSources): GrocerySettings => ({
  zip: firstSet(explicit.zip, env.KROGER_ZIP, stored.zip, HARD_DEFAULTS.zip),
  locationId: firstSet(
    explicit.locationId,
    env.KROGER_LOCATION_ID,
    stored.locationId,
    HARD_DEFAULTS.locationId
  ),
});

const optionalString = (value: unknown) => (typeof value === "string" ? value : undefined);

export const loadStoredSettings = async (db: Firestore): Promise<GrocerySettings> => {
  try {
    const snapshot = await db.collection(SETTINGS_COLLECTION).doc(GROCERY_SETTINGS_DOC).get();
    const data = snapshot.data();
    if (!data) {
      return {};
    }
    return {
      zip: optionalString(data.zip),
      locationId: optionalString(data.location_id),
    };
  } catch (error) {
    logger.warn("Could not load stored grocery settings", {
      error: error instanceof Error ? error.message : "Unknown error",
    });
    return {};
  }
};
