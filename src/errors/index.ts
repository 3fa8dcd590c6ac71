/**
 * Custom error types for the cluster actuator.
 * Callers tell terminal failures from retry signals with the type guards below,
 * never by matching on messages.
 */

/**
 * Base error class for all application errors
 */
export abstract class ApplicationError extends Error {
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown> | undefined;
  public override readonly cause?: Error | undefined;

  constructor(
    message: string,
    public readonly code: string,
    context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context ?? {};
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): {
    name: string;
    message: string;
    code: string;
    timestamp: Date;
    context?: Record<string, unknown>;
    stack?: string;
  } {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp,
      context: this.context,
      stack: this.stack,
    };
  }
}

/**
 * A reconciliation or deletion step failed; carries the cluster and step that failed
 */
export class ActuatorError extends ApplicationError {
  constructor(
    message: string,
    public readonly clusterName: string,
    public readonly step?: string | undefined,
    public override readonly cause?: Error | undefined,
    context?: Record<string, unknown> | undefined,
  ) {
    super(cause ? `${message}: ${cause.message}` : message, 'ACTUATOR_ERROR', {
      ...context,
      clusterName,
      step,
    });
    this.name = 'ActuatorError';
  }
}

/**
 * Non-terminal failure: the controller should retry the same request after a delay
 */
export class RequeueAfterError extends ApplicationError {
  constructor(
    public readonly requeueAfterMs: number,
    public override readonly cause?: Error | undefined,
    context?: Record<string, unknown> | undefined,
  ) {
    super(`requeue in: ${formatDuration(requeueAfterMs)}`, 'REQUEUE_AFTER', {
      ...context,
      requeueAfterMs,
    });
    this.name = 'RequeueAfterError';
  }
}

/**
 * Error thrown when a scope cannot be built for a cluster
 */
export class ScopeError extends ApplicationError {
  constructor(
    message: string,
    public readonly clusterName?: string | undefined,
    public override readonly cause?: Error | undefined,
    context?: Record<string, unknown> | undefined,
  ) {
    super(message, 'SCOPE_ERROR', { ...context, clusterName });
    this.name = 'ScopeError';
  }
}

/**
 * Error returned by the Azure Resource Manager API
 */
export class CloudError extends ApplicationError {
  constructor(
    message: string,
    public readonly statusCode: number,
    code: string = 'CLOUD_ERROR',
    public readonly resourceId?: string | undefined,
    context?: Record<string, unknown> | undefined,
  ) {
    super(message, code, { ...context, statusCode, resourceId });
    this.name = 'CloudError';
  }

  get retryable(): boolean {
    return this.statusCode === 429 || this.statusCode >= 500;
  }
}

/**
 * Error thrown when Kubernetes operations fail
 */
export class KubernetesError extends ApplicationError {
  constructor(
    message: string,
    code: string = 'K8S_ERROR',
    public readonly resource?: string | undefined,
    public readonly namespace?: string | undefined,
    public override readonly cause?: Error | undefined,
    context?: Record<string, unknown> | undefined,
  ) {
    super(message, code, { ...context, resource, namespace });
    this.name = 'KubernetesError';
  }
}

/**
 * Error thrown when validation fails
 */
export class ValidationError extends ApplicationError {
  constructor(
    message: string,
    public readonly fields?: string[],
    public readonly violations?: Array<{ field: string; message: string }>,
    context?: Record<string, unknown>,
  ) {
    super(message, 'VALIDATION_ERROR', { ...context, fields, violations });
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends ApplicationError {
  constructor(
    message: string,
    public readonly configKey?: string,
    context?: Record<string, unknown>,
  ) {
    super(message, 'CONFIG_ERROR', { ...context, configKey });
    this.name = 'ConfigurationError';
  }
}

/**
 * Error thrown when a resource is not found
 */
export class NotFoundError extends ApplicationError {
  constructor(
    message: string,
    public readonly resourceType?: string,
    public readonly resourceId?: string,
    context?: Record<string, unknown>,
  ) {
    super(message, 'NOT_FOUND', { ...context, resourceType, resourceId });
    this.name = 'NotFoundError';
  }
}

/**
 * Error thrown when an operation times out
 */
export class TimeoutError extends ApplicationError {
  constructor(
    message: string,
    public readonly timeoutMs?: number,
    public readonly operation?: string,
    context?: Record<string, unknown>,
  ) {
    super(message, 'TIMEOUT', { ...context, timeoutMs, operation });
    this.name = 'TimeoutError';
  }
}

function formatDuration(ms: number): string {
  return ms % 1000 === 0 ? `${ms / 1000}s` : `${ms}ms`;
}

/**
 * Helper function to check if an error is one of our custom error types
 */
export function isApplicationError(error: unknown): error is ApplicationError {
  return error instanceof ApplicationError;
}

export function isRequeueAfterError(error: unknown): error is RequeueAfterError {
  return error instanceof RequeueAfterError;
}

export function isCloudError(error: unknown): error is CloudError {
  return error instanceof CloudError;
}

export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}

/**
 * Coerce anything thrown into an Error so it can be carried as a cause
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  return new Error(String(error));
}
