export interface FusionSolarErrorDetails {
  /** Application-level code from the response envelope */
  failCode?: number;
  httpStatus?: number;
  cause?: unknown;
}

/**
 * Base class for everything the FusionSolar client raises.
 */
export class FusionSolarError extends Error {
  public readonly failCode?: number;
  public readonly httpStatus?: number;

  constructor(message: string, details: FusionSolarErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'FusionSolarError';
    this.failCode = details.failCode;
    this.httpStatus = details.httpStatus;
  }
}

export class AuthenticationError extends FusionSolarError {
  constructor(message: string, details?: FusionSolarErrorDetails) {
    super(message, details);
    this.name = 'AuthenticationError';
  }
}

export class TransportError extends FusionSolarError {
  constructor(message: string, details?: FusionSolarErrorDetails) {
    super(message, details);
    this.name = 'TransportError';
  }
}

export class RateLimitError extends FusionSolarError {
  constructor(message: string, details?: FusionSolarErrorDetails) {
    super(message, details);
    this.name = 'RateLimitError';
  }
}

export class ApiError extends FusionSolarError {
  constructor(message: string, details?: FusionSolarErrorDetails) {
    super(message, details);
    this.name = 'ApiError';
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
  }
}

export class TopicCollisionError extends Error {
  constructor(public readonly topic: string) {
    super(`Duplicate topic path in snapshot: ${topic}`);
    this.name = 'TopicCollisionError';
  }
}
