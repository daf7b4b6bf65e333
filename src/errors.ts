export class CatalogError extends Error {
  readonly status?: number;
  readonly body?: string;

  constructor(
    message: string,
    options: { status?: number; body?: string; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "CatalogError";
    this.status = options.status;
    this.body = options.body;
  }
}

/** Rejected credentials. Retrying with the same API key cannot succeed. */
export class CatalogAuthError extends CatalogError {
  constructor(message: string, options: { status?: number; body?: string } = {}) {
    super(message, options);
    this.name = "CatalogAuthError";
  }
}

export class SourceError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "SourceError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function describeError(error: unknown) {
  if (error instanceof Error) return error.message;
  return String(error);
}
