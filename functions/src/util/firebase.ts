import { getApp, getApps, initializeApp } from "firebase-admin/app";
import { logger } from "firebase-functions/v2";

/**
 * Returns the default Admin app, creating it on first use. Both functions call
 * this at load time and share one app per instance.
 */
export const initializeAppIfNeeded = () => {
  if (getApps().length > 0) {
    return getApp();
  }
  const app = initializeApp();
  logger.debug("Admin app initialized", { projectId: app.options.projectId });
  return app;
};
