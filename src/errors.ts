/**
 * Custom error classes for the manifest store and its collaborators
 */

export class ManifestError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = "ManifestError";
  }
}

export class StoreKeyError extends ManifestError {
  constructor(public readonly key: string) {
    super(
      `Key ${key} has no associated file. Use addKey() first`,
      "UNREGISTERED_KEY",
    );
    this.name = "StoreKeyError";
  }
}

export class StoreParseError extends ManifestError {
  constructor(
    message: string,
    public readonly file: string,
  ) {
    super(message, "PARSE_ERROR");
    this.name = "StoreParseError";
  }
}

export class ValidationError extends ManifestError {
  constructor(message: string) {
    super(message, "VALIDATION_ERROR");
    this.name = "ValidationError";
  }
}

export class ConfigurationError extends ManifestError {
  constructor(message: string) {
    super(message, "CONFIG_ERROR");
    this.name = "ConfigurationError";
  }
}

export class StateError extends ManifestError {
  constructor(message: string) {
    super(message, "STATE_ERROR");
    this.name = "StateError";
  }
}

export class TableStoreError extends ManifestError {
  constructor(
    message: string,
    code: string,
    public readonly provider: string,
  ) {
    super(message, code);
    this.name = "TableStoreError";
  }
}

export class ConnectionError extends TableStoreError {
  constructor(message: string, provider: string) {
    super(message, "CONNECTION_ERROR", provider);
    this.name = "ConnectionError";
  }
}

export class ResourceNotFoundError extends TableStoreError {
  constructor(message: string, provider: string) {
    super(message, "NOT_FOUND", provider);
    this.name = "ResourceNotFoundError";
  }
}

// Error codes for easy reference
export const ErrorCodes = {
  UNREGISTERED_KEY: "UNREGISTERED_KEY",
  PARSE_ERROR: "PARSE_ERROR",
  VALIDATION_ERROR: "VALIDATION_ERROR",
  CONFIG_ERROR: "CONFIG_ERROR",
  STATE_ERROR: "STATE_ERROR",
  CONNECTION_ERROR: "CONNECTION_ERROR",
  NOT_FOUND: "NOT_FOUND",
  DROP_FAILED: "DROP_FAILED",
  UNKNOWN_ERROR: "UNKNOWN_ERROR",
} as const;

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
