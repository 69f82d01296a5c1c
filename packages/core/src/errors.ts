/** Remote source unreachable, timed out, or answered with a non-2xx status. */
export class FetchError extends Error {
  constructor(
    public readonly endpoint: string,
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(`${endpoint}: ${message}`, options);
    this.name = "FetchError";
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class AuthorizationError extends Error {
  constructor(public readonly chatId: string) {
    super(`Chat ${chatId} is not the operator chat`);
    this.name = "AuthorizationError";
  }
}

/** A command is missing arguments or has a malformed one. The message is the usage hint. */
export class MalformedInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedInputError";
  }
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === "AbortError";
}
