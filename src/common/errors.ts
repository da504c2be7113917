// src/common/errors.ts

/**
 * Base class for every failure the client reports to the user.
 * `code` is stable and safe to match on.
 */
export class McpClientError extends Error {
  constructor(
    message: string,
    public readonly code: string
  ) {
    super(message);
    this.name = "McpClientError";
  }
}

export class ConfigurationError extends McpClientError {
  constructor(message: string, code: string = "CONFIG_ERROR") {
    super(message, code);
    this.name = "ConfigurationError";
  }
}

export class ConfigNotFoundError extends ConfigurationError {
  constructor(public readonly configPath: string) {
    super(`Configuration file not found: ${configPath}`, "CONFIG_NOT_FOUND");
    this.name = "ConfigNotFoundError";
  }
}

export class ConfigMalformedError extends ConfigurationError {
  constructor(message: string) {
    super(message, "CONFIG_MALFORMED");
    this.name = "ConfigMalformedError";
  }
}

export class ServerNotFoundError extends ConfigurationError {
  constructor(
    public readonly serverName: string,
    public readonly available: string[]
  ) {
    super(`Server '${serverName}' not found. Available: ${available.join(", ")}`, "SERVER_NOT_FOUND");
    this.name = "ServerNotFoundError";
  }
}

export class ConnectionError extends McpClientError {
  constructor(message: string) {
    super(message, "CONNECTION_FAILED");
    this.name = "ConnectionError";
  }
}

/** Raised while building a query handler: missing credential, bad provider. */
export class ProviderSetupError extends McpClientError {
  constructor(message: string) {
    super(message, "PROVIDER_SETUP_FAILED");
    this.name = "ProviderSetupError";
  }
}

export class ProviderRequestError extends McpClientError {
  constructor(message: string) {
    super(message, "PROVIDER_REQUEST_FAILED");
    this.name = "ProviderRequestError";
  }
}

export class InvalidToolArgumentsError extends McpClientError {
  constructor(toolName: string, reason: string) {
    super(`Invalid arguments for tool ${toolName}: ${reason}`, "INVALID_TOOL_ARGUMENTS");
    this.name = "InvalidToolArgumentsError";
  }
}

/** Ctrl+C or end of input; the CLI treats it as a normal exit. */
export class UserInterruptError extends McpClientError {
  constructor() {
    super("Interrupted by user", "INTERRUPTED");
    this.name = "UserInterruptError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
