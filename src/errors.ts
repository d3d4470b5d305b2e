export type VpsErrorCode =
  | 'UNKNOWN_PLAN'
  | 'INSUFFICIENT_CREDITS'
  | 'CONTAINER_FAILED'
  | 'NOT_FOUND'
  | 'FORBIDDEN'
  | 'INVALID_ACTION'
  | 'INVALID_AMOUNT';

/**
 * Base error with a machine-readable code. Subclasses fix the service name.
 */
export class ServiceError extends Error {
  constructor(
    public readonly serviceName: string,
    message: string,
    public readonly code: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = `${serviceName}Error`;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON() {
    return {
      name: this.name,
      serviceName: this.serviceName,
      message: this.message,
      code: this.code,
      cause: this.cause,
    };
  }
}

export class VpsError extends ServiceError {
  declare readonly code: VpsErrorCode;

  constructor(code: VpsErrorCode, message: string, cause?: unknown) {
    super('Vps', message, code, cause);
  }
}

export class InsufficientCreditsError extends VpsError {
  constructor(
    public readonly cost: number,
    public readonly balance: number
  ) {
    super('INSUFFICIENT_CREDITS', `You need ${cost} credits but have ${balance}.`);
  }
}

export class ConfigError extends ServiceError {
  constructor(message: string, cause?: unknown) {
    super('Config', message, 'CONFIG_ERROR', cause);
  }
}

export class InstallerError extends ServiceError {
  constructor(
    public readonly step: string,
    message: string,
    cause?: unknown
  ) {
    super('Installer', message, 'STEP_FAILED', cause);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
