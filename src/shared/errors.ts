/**
 * The graph store could not be reached. Fatal: the run aborts.
 */
export class StoreConnectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreConnectionError";
  }
}

/**
 * An analysis document failed validation. Fatal for `load`.
 */
export class InvalidDocumentError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "InvalidDocumentError";
  }
}

/**
 * A write reached the entity registry after it was frozen for resolution,
 * or resolution was requested twice.
 */
export class RegistryFrozenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RegistryFrozenError";
  }
}

/**
 * Render an unknown thrown value as a message.
 */
export const errorMessage = (e: unknown): string =>
  e instanceof Error ? e.message : String(e);
