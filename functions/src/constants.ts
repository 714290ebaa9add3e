export const KROGER_API_BASE_URL = "https://api.kroger.com/v1";
export const KROGER_AUTH_URL = `${KROGER_API_BASE_URL}/connect/oauth2`;
export const KROGER_CLIENT_ID_SECRET_LITERAL = "KROGER_CLIENT_ID";
export const KROGER_CLIENT_SECRET_SECRET_LITERAL = "KROGER_CLIENT_SECRET";

export const CARTS_COLLECTION = "grocery_carts";
export const SETTINGS_COLLECTION = "settings";
export const GROCERY_SETTINGS_DOC = "grocery";

export const REQUEST_TIMEOUT_MS = 15000;
