// Operator input errors — reported back to whoever issued the command.

export class InvalidTriggerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidTriggerError';
  }
}

export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

// Transient external-service errors — logged, the cycle is skipped.

export class ContentFetchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ContentFetchError';
  }
}

export class PublishError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PublishError';
  }
}

// Review gate

export class ReviewNotFoundError extends Error {
  constructor(token: string) {
    super(`No preview found for token "${token}"`);
    this.name = 'ReviewNotFoundError';
  }
}

export class AlreadyActionedError extends Error {
  constructor(
    public readonly status: string,
    message = `This preview has already been ${status}`
  ) {
    super(message);
    this.name = 'AlreadyActionedError';
  }
}

export class AlreadyPublishedError extends AlreadyActionedError {
  constructor() {
    super('published', 'This preview has already been published');
    this.name = 'AlreadyPublishedError';
  }
}

// Startup

export class ConfigError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
