export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CatalogError';
  }
}

/** The listing endpoint rejected the supplied credentials (HTTP 401/403). */
export class AuthenticationError extends CatalogError {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = 'AuthenticationError';
    this.status = status;
  }
}

/** The listing endpoint could not be reached at all. */
export class NetworkError extends CatalogError {
  constructor(message: string) {
    super(message);
    this.name = 'NetworkError';
  }
}

export class CatalogRequestError extends CatalogError {
  readonly status: number | null;

  constructor(message: string, status: number | null = null) {
    super(message);
    this.name = 'CatalogRequestError';
    this.status = status;
  }
}
