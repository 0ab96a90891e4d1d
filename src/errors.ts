export class RecommenderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Raised when an id is absent from the similarity index or the record store.
 */
export class NotFoundError extends RecommenderError {}

/**
 * Raised for non-positive counts, malformed feature batches and invalid request or config values.
 */
export class InvalidArgumentError extends RecommenderError {}

export function requirePositiveInteger(value: number, name: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidArgumentError(`${name} must be a positive integer, got ${value}`);
  }
}
