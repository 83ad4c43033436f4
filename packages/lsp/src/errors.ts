export class SidecarSpawnError extends Error {
  constructor(command: string, options?: ErrorOptions) {
    super(`failed to spawn sidecar '${command}'`, options);
    this.name = 'SidecarSpawnError';
  }
}

export class HandshakeError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'HandshakeError';
  }
}

/**
 * Malformed frame, oversized message or invalid JSON on the sidecar's
 * stdout. Fatal for the session.
 */
export class FramingError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'FramingError';
  }
}

export class ConnectionClosedError extends Error {
  constructor(
    message = 'LSP server is no longer running (child process exited)',
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'ConnectionClosedError';
  }
}

export class RequestTimeoutError extends Error {
  constructor(
    readonly method: string,
    readonly timeoutMs: number,
  ) {
    super(`LSP request '${method}' timed out after ${timeoutMs}ms`);
    this.name = 'RequestTimeoutError';
  }
}

/**
 * The sidecar answered with a JSON-RPC error object.
 */
export class ResponseError extends Error {
  constructor(
    readonly method: string,
    readonly code: number,
    message: string,
    readonly data?: unknown,
  ) {
    super(`LSP error for '${method}' (${code}): ${message}`);
    this.name = 'ResponseError';
  }
}

export class ProtocolError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ProtocolError';
  }
}

export class InvalidPathError extends Error {
  constructor(readonly path: string) {
    super(`invalid absolute file path for URI: ${path}`);
    this.name = 'InvalidPathError';
  }
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(
      `invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`,
    );
    this.name = 'ConfigError';
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
