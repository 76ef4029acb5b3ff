/**
 * Raised when a required input cannot be read or is not the JSON document
 * the loader expects. Nothing from the failed load is published.
 */
export class DatasetLoadError extends Error {
  constructor(
    message: string,
    readonly input: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'DatasetLoadError';
  }
}
