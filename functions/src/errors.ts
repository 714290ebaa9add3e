export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InputError";
  }
}

export class NoStoreFoundError extends Error {
  constructor(public readonly postalCode: string) {
    super(
      postalCode
        ? `No stores found near ${postalCode}`
        : "No store location or postal code configured"
    );
    this.name = "NoStoreFoundError";
  }
}

/**
 * Raised by the catalog client when a request fails or returns a non-2xx status.
 */
export class RetrievalError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "RetrievalError";
  }
}
