/**
 * src/modules/domains/domain.errors.ts
 *
 * ConfigurationError is fatal at startup and never mapped to a client response
 * directly. A dynamic resolver that fails for one request surfaces through the
 * route guard as a 500 reject.
 */

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
