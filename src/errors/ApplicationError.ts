/**
 * Error hierarchy
 *
 * Every error a service throws on purpose is an ApplicationError. The code is
 * stable for API clients; statusCode is what errorHandler answers with.
 * Non-operational errors (isOperational = false) are hidden behind a generic
 * 500 message.
 */

export enum ErrorCode {
  // 4xx
  VALIDATION_INPUT_INVALID = 'VALIDATION_INPUT_INVALID',
  RESOURCE_NOT_FOUND = 'RESOURCE_NOT_FOUND',
  RESOURCE_DUPLICATE_ENTRY = 'RESOURCE_DUPLICATE_ENTRY',
  RESOURCE_CROSS_OWNER = 'RESOURCE_CROSS_OWNER',
  AUTH_AUTHENTICATION_FAILED = 'AUTH_AUTHENTICATION_FAILED',
  AUTH_AUTHORIZATION_DENIED = 'AUTH_AUTHORIZATION_DENIED',

  // Database
  DATABASE_CONNECTION_FAILED = 'DATABASE_CONNECTION_FAILED',
  DATABASE_QUERY_FAILED = 'DATABASE_QUERY_FAILED',
  DATABASE_DUPLICATE_KEY = 'DATABASE_DUPLICATE_KEY',
  DATABASE_FOREIGN_KEY_VIOLATION = 'DATABASE_FOREIGN_KEY_VIOLATION',

  // TMDB and the network under it
  NETWORK_CONNECTION_FAILED = 'NETWORK_CONNECTION_FAILED',
  NETWORK_TIMEOUT = 'NETWORK_TIMEOUT',
  PROVIDER_RATE_LIMIT = 'PROVIDER_RATE_LIMIT',
  PROVIDER_SERVER_ERROR = 'PROVIDER_SERVER_ERROR',

  CONFIG_INVALID = 'CONFIG_INVALID',
}

/**
 * Logged with the error, never sent to the client
 */
export interface ErrorContext {
  service?: string;
  /** e.g. 'addMediaToList' */
  operation?: string;
  entityType?: string;
  entityId?: string | number;
  metadata?: Record<string, unknown>;
}

export abstract class ApplicationError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode: number;
  /** false for programmer or configuration mistakes */
  public readonly isOperational: boolean;
  /** Repeating the same call later may succeed (TMDB 429/5xx, timeouts) */
  public readonly retryable: boolean;
  public readonly context: ErrorContext;
  public readonly cause?: Error;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: ErrorCode,
    statusCode: number,
    options: {
      isOperational?: boolean;
      retryable?: boolean;
      context?: ErrorContext;
      cause?: Error;
    } = {}
  ) {
    super(message);

    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = options.isOperational ?? true;
    this.retryable = options.retryable ?? false;
    this.context = options.context ?? {};
    if (options.cause) {
      this.cause = options.cause;
    }
    this.timestamp = new Date();

    Object.setPrototypeOf(this, new.target.prototype);

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Shape written to the log by errorHandler
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      isOperational: this.isOperational,
      retryable: this.retryable,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.cause ? {
        name: this.cause.name,
        message: this.cause.message,
        stack: this.cause.stack,
      } : undefined,
    };
  }
}

// ============================================
// 4xx
// ============================================

/**
 * A single rejected input field, as reported to API clients
 */
export interface ValidationIssue {
  field: string;
  message: string;
  code: string;
}

export class ValidationError extends ApplicationError {
  public readonly details: ValidationIssue[];

  constructor(
    message: string,
    context?: ErrorContext,
    cause?: Error,
    details: ValidationIssue[] = []
  ) {
    super(message, ErrorCode.VALIDATION_INPUT_INVALID, 400, {
      isOperational: true,
      retryable: false,
      ...(context && { context }),
      ...(cause && { cause }),
    });
    this.details = details;
  }
}

export class ResourceError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode,
    statusCode: number,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, statusCode, {
      isOperational: true,
      retryable: false,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

export class ResourceNotFoundError extends ResourceError {
  constructor(
    public readonly resourceType: string,
    public readonly resourceId: string | number,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `${resourceType} not found: ${resourceId}`,
      ErrorCode.RESOURCE_NOT_FOUND,
      404,
      { ...context, entityType: resourceType, entityId: resourceId }
    );
  }
}

/**
 * An insert would break a uniqueness invariant: the same media twice in a
 * list, a taken username/email/nickname, a second profile for one user.
 * The message is safe to show to the end user.
 */
export class DuplicateEntryError extends ResourceError {
  constructor(
    public readonly resourceType: string,
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message || `${resourceType} already exists`,
      ErrorCode.RESOURCE_DUPLICATE_ENTRY,
      409,
      { ...context, entityType: resourceType },
      cause
    );
  }
}

/**
 * An operation would mix resources owned by two different users.
 */
export class CrossOwnerViolationError extends ResourceError {
  constructor(message?: string, context?: ErrorContext) {
    super(
      message || 'Cannot move items between lists of different users',
      ErrorCode.RESOURCE_CROSS_OWNER,
      403,
      context
    );
  }
}

/**
 * Missing, unknown or expired credentials
 */
export class AuthenticationError extends ApplicationError {
  constructor(message: string, context?: ErrorContext, cause?: Error) {
    super(message, ErrorCode.AUTH_AUTHENTICATION_FAILED, 401, {
      isOperational: true,
      retryable: false,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

/**
 * The caller is known but does not own the resource
 */
export class AuthorizationError extends ApplicationError {
  constructor(
    public readonly action: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Not authorized to perform action: ${action}`,
      ErrorCode.AUTH_AUTHORIZATION_DENIED,
      403,
      {
        isOperational: true,
        retryable: false,
        context: { ...context, operation: action },
      }
    );
  }
}

// ============================================
// 5xx and TMDB
// ============================================

export class OperationalError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode,
    statusCode: number,
    retryable: boolean,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, statusCode, {
      isOperational: true,
      retryable,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

export class DatabaseError extends OperationalError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.DATABASE_QUERY_FAILED,
    retryable = false,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, 500, retryable, context, cause);
  }
}

/**
 * Raw UNIQUE constraint failure reported by the driver.
 * Services translate the ones they expect into DuplicateEntryError.
 */
export class DuplicateKeyError extends OperationalError {
  constructor(
    public readonly table: string,
    public readonly key: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Duplicate key in table '${table}': ${key}`,
      ErrorCode.DATABASE_DUPLICATE_KEY,
      409,
      false,
      { ...context, metadata: { ...context?.metadata, table, key } }
    );
  }
}

export class ForeignKeyViolationError extends DatabaseError {
  constructor(
    public readonly constraint: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Foreign key violation: ${constraint}`,
      ErrorCode.DATABASE_FOREIGN_KEY_VIOLATION,
      false,
      { ...context, metadata: { ...context?.metadata, constraint } }
    );
  }
}

/**
 * TMDB unreachable or too slow
 */
export class NetworkError extends OperationalError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.NETWORK_CONNECTION_FAILED,
    public readonly url?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message,
      code,
      503,
      true,
      { ...context, metadata: { ...context?.metadata, url } },
      cause
    );
  }
}

export class ProviderError extends OperationalError {
  constructor(
    message: string,
    public readonly providerName: string,
    code: ErrorCode,
    statusCode: number,
    retryable: boolean,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message,
      code,
      statusCode,
      retryable,
      { ...context, service: providerName },
      cause
    );
  }
}

export class RateLimitError extends ProviderError {
  constructor(
    providerName: string,
    public readonly retryAfter?: number,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Rate limit exceeded for provider: ${providerName}`,
      providerName,
      ErrorCode.PROVIDER_RATE_LIMIT,
      429,
      true,
      { ...context, metadata: { ...context?.metadata, retryAfter } }
    );
  }
}

export class ProviderServerError extends ProviderError {
  constructor(
    providerName: string,
    public readonly httpStatusCode: number,
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message || `Provider server error (${httpStatusCode}): ${providerName}`,
      providerName,
      ErrorCode.PROVIDER_SERVER_ERROR,
      502,
      httpStatusCode >= 500,
      { ...context, metadata: { ...context?.metadata, httpStatusCode } },
      cause
    );
  }
}

export class PermanentError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode,
    statusCode: number,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, statusCode, {
      isOperational: false,
      retryable: false,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

/**
 * A feature needs configuration that is absent, e.g. TMDB_API_KEY
 */
export class ConfigurationError extends PermanentError {
  constructor(
    public readonly configKey: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Configuration error: ${configKey}`,
      ErrorCode.CONFIG_INVALID,
      500,
      { ...context, metadata: { ...context?.metadata, configKey } }
    );
  }
}
