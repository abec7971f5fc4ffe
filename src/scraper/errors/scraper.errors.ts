export class ConfigurationError extends Error {
  constructor(readonly variable: string) {
    super(`Missing required environment variable ${variable}`);
    this.name = 'ConfigurationError';
  }
}

/**
 * Login was rejected. Aborts the current run before anything is scraped.
 */
export class AuthenticationError extends Error {
  constructor(
    readonly status: number,
    readonly serverMessage?: string,
  ) {
    super(
      serverMessage
        ? `Failed to get token: ${status}, ${serverMessage}`
        : `Failed to get token: ${status}`,
    );
    this.name = 'AuthenticationError';
  }
}

export class DirectoryFetchError extends Error {
  constructor(
    readonly resource: string,
    readonly status?: number,
  ) {
    super(
      status === undefined
        ? `Failed to fetch ${resource}: unexpected response body`
        : `Failed to fetch ${resource}: ${status}`,
    );
    this.name = 'DirectoryFetchError';
  }
}

export class MissingTokenError extends Error {
  constructor() {
    super('Cannot create an authenticated client before a token is attached to the credentials');
    this.name = 'MissingTokenError';
  }
}

export class PriceParseError extends Error {
  constructor(readonly raw: string) {
    super(`Failed to parse price: ${JSON.stringify(raw)}`);
    this.name = 'PriceParseError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
