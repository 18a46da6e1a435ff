/**
 * Raised by the client for transport failures and non-2xx answers.
 * `statusCode` is absent when no response arrived.
 */
export class RegistryClientError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly details?: unknown,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RegistryClientError';
  }
}
