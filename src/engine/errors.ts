export interface ErrorDetail {
  field?: string;
  message: string;
}

export type ErrorCode =
  | "CONFIGURATION_ERROR"
  | "UNKNOWN_BACKEND_TYPE"
  | "SOURCE_NOT_FOUND"
  | "SOURCE_EXISTS"
  | "NOT_FOUND"
  | "DUPLICATE_PATH"
  | "CONFLICT"
  | "CAPABILITY_MISMATCH"
  | "PAYLOAD_TOO_LARGE"
  | "BACKEND_UNAVAILABLE"
  | "INVALID_PAYLOAD"
  | "INVALID_TICKET"
  | "UNAUTHORIZED"
  | "FORBIDDEN"
  | "INTERNAL_ERROR";

export class AppError extends Error {
  code: ErrorCode;
  status: number;
  details?: ErrorDetail[];

  constructor(
    code: ErrorCode,
    status: number,
    message: string,
    details?: ErrorDetail[],
  ) {
    super(message);
    this.name = "AppError";
    this.code = code;
    this.status = status;
    this.details = details;
  }
}

export function isAppError(err: unknown, code?: ErrorCode): err is AppError {
  return err instanceof AppError && (code === undefined || err.code === code);
}

export function configurationError(source: string, msg: string): AppError {
  return new AppError("CONFIGURATION_ERROR", 500, `Source ${source}: ${msg}`);
}

export function unknownBackendTypeError(type: string, known: string[]): AppError {
  return new AppError(
    "UNKNOWN_BACKEND_TYPE",
    400,
    `Unknown backend type: ${type} (available: ${known.join(", ") || "none"})`,
  );
}

export function sourceNotFoundError(slug: string): AppError {
  return new AppError("SOURCE_NOT_FOUND", 404, `Source not found: ${slug}`);
}

export function sourceExistsError(slug: string): AppError {
  return new AppError("SOURCE_EXISTS", 409, `Source already registered: ${slug}`);
}

// Same shape for a missing id and an id the caller may not see.
export function notFoundError(id: string): AppError {
  return new AppError("NOT_FOUND", 404, `File not found: ${id}`);
}

export function duplicatePathError(source: string, path: string): AppError {
  return new AppError(
    "DUPLICATE_PATH",
    409,
    `Source ${source} already has a file at ${path}`,
  );
}

export function conflictError(msg: string): AppError {
  return new AppError("CONFLICT", 409, msg);
}

export function capabilityMismatchError(source: string, operation: string): AppError {
  return new AppError(
    "CAPABILITY_MISMATCH",
    501,
    `Source ${source} does not support ${operation}`,
  );
}

export function payloadTooLargeError(size: number, max: number): AppError {
  return new AppError(
    "PAYLOAD_TOO_LARGE",
    413,
    `File too large: ${size} bytes (max ${max})`,
  );
}

export function backendUnavailableError(source: string, operation: string, cause?: string): AppError {
  const suffix = cause ? `: ${cause}` : "";
  return new AppError(
    "BACKEND_UNAVAILABLE",
    503,
    `Source ${source} unavailable during ${operation}${suffix}`,
  );
}

export function invalidPayloadError(msg: string, details?: ErrorDetail[]): AppError {
  return new AppError("INVALID_PAYLOAD", 400, msg, details);
}

export function invalidTicketError(msg: string): AppError {
  return new AppError("INVALID_TICKET", 400, `Invalid upload ticket: ${msg}`);
}

export function unauthorizedError(msg: string): AppError {
  return new AppError("UNAUTHORIZED", 401, msg);
}

export function forbiddenError(msg: string): AppError {
  return new AppError("FORBIDDEN", 403, msg);
}
