import { defineSecret } from "firebase-functions/params";
import { HttpsOptions } from "firebase-functions/v2/https";
import {
  KROGER_CLIENT_ID_SECRET_LITERAL,
  KROGER_CLIENT_SECRET_SECRET_LITERAL,
} from "../constants";

export const DEFAULT_SEARCH_LIMIT = 10;
// Minimum gap between successive product searches.
export const DEFAULT_PACING_MS = 300;
export const STORE_SEARCH_RADIUS_MILES = 10;

export const krogerClientIdSecret = defineSecret(KROGER_CLIENT_ID_SECRET_LITERAL);
export const krogerClientSecretSecret = defineSecret(KROGER_CLIENT_SECRET_SECRET_LITERAL);

export const FUNCTION_CONFIG: HttpsOptions = {
  memory: "512MiB",
  timeoutSeconds: 300,
  secrets: [krogerClientIdSecret, krogerClientSecretSecret],
  region: "us-central1",
  cors: true,
};
