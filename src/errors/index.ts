export {
  ApplicationError,
  ErrorCode,
  type ErrorContext,
  ValidationError,
  type ValidationIssue,
  ResourceError,
  ResourceNotFoundError,
  DuplicateEntryError,
  CrossOwnerViolationError,
  AuthenticationError,
  AuthorizationError,
  OperationalError,
  DatabaseError,
  DuplicateKeyError,
  ForeignKeyViolationError,
  NetworkError,
  ProviderError,
  RateLimitError,
  ProviderServerError,
  PermanentError,
  ConfigurationError,
} from './ApplicationError.js';
