abstract class TrackerError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Role or organization still missing after normalization. The message is consumed. */
export class ExtractionIncompleteError extends TrackerError {}

/** A record store call failed. The message stays unread for the next run. */
export class StoreUnavailableError extends TrackerError {}

/** The language backend could not be reached or refused the request. */
export class LanguageServiceError extends TrackerError {}

/** Missing credentials or a database whose schema does not match. Fatal. */
export class ConfigurationError extends TrackerError {}

export function describeError(error: unknown): string {
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return String(error);
}
