/**
 * Error types shared by the registry client, the container runtime and the job engine.
 * Each carries the HTTP status the API layer answers with.
 */

export class RegistryManagerError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode = 500, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RegistryManagerError';
    this.statusCode = statusCode;
  }
}

/**
 * Bad or missing submission parameters, rejected before anything is scheduled
 */
export class ValidationError extends RegistryManagerError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 400, options);
    this.name = 'ValidationError';
  }
}

/**
 * Unknown job id, repository, tag, digest or local image
 */
export class NotFoundError extends RegistryManagerError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 404, options);
    this.name = 'NotFoundError';
  }
}

/**
 * Registry or runtime transport failure, including timeouts
 */
export class UnavailableError extends RegistryManagerError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 502, options);
    this.name = 'UnavailableError';
  }
}

/**
 * Registry answered with an error status other than 404
 */
export class RegistryError extends RegistryManagerError {
  constructor(message: string, statusCode = 502, options?: ErrorOptions) {
    super(message, statusCode, options);
    this.name = 'RegistryError';
  }
}

/**
 * A docker command exited non-zero
 */
export class ContainerRuntimeError extends RegistryManagerError {
  readonly exitCode?: number;

  constructor(message: string, options?: ErrorOptions & { exitCode?: number }) {
    super(message, 500, options);
    this.name = 'ContainerRuntimeError';
    if (options?.exitCode !== undefined) {
      this.exitCode = options.exitCode;
    }
  }
}

/**
 * A pull/tag/push/delete/remove step failed while a job was running
 */
export class StepFailureError extends RegistryManagerError {
  readonly step: string;

  constructor(step: string, target: string, options?: ErrorOptions) {
    super(`${step} ${target} failed: ${errorMessage(options?.cause)}`, 500, options);
    this.name = 'StepFailureError';
    this.step = step;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (error === undefined) return 'unknown error';
  return String(error);
}

export function statusCodeOf(error: unknown): number {
  return error instanceof RegistryManagerError ? error.statusCode : 500;
}
