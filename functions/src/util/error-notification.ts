import { logger } from "firebase-functions/v2";

type FetchFn = typeof fetch;

export type ErrorContext = {
  function: string;
  itemCount?: number;
  locationId?: string;
  zip?: string;
};

export type ErrorReport = {
  error: string;
  summary: string;
  context: ErrorContext;
  timestamp: string;
};

export const describeFailure = (errorMessage: string, context: ErrorContext) => {
  const scope = [
    context.itemCount !== undefined ? `${context.itemCount} items` : null,
    context.locationId ? `store ${context.locationId}` : null,
    context.zip ? `zip ${context.zip}` : null,
  ].filter((part): part is string => part !== null);
  return scope.length > 0
    ? `${context.function} failed (${scope.join(", ")}): ${errorMessage}`
    : `${context.function} failed: ${errorMessage}`;
};

/**
 * Reports a fatal cart failure to ERROR_WEBHOOK_URL. No-op when it is unset;
 * delivery problems are logged, never thrown.
 */
export const notifyError = async (
  errorMessage: string,
  context: ErrorContext,
  webhookUrl = process.env.ERROR_WEBHOOK_URL,
  fetchFn: FetchFn = fetch,
): Promise<void> => {
  if (!webhookUrl) {
    return;
  }

  const report: ErrorReport = {
    error: errorMessage,
    summary: describeFailure(errorMessage, context),
    context,
    timestamp: new Date().toISOString(),
  };

  try {
    const response = await fetchFn(webhookUrl, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(report),
    });
    if (!response.ok) {
      logger.warn("Error webhook rejected the report", {
        httpStatus: response.status,
        function: context.function,
      });
    }
  } catch (deliveryError) {
    logger.warn("Could not deliver error report", {
      function: context.function,
      error: deliveryError instanceof Error ? deliveryError.message : "Unknown error",
    });
  }
};
