import { inspect } from "node:util";

/**
 * Stable error codes raised by the conversion layer.
 */
export type ConversionErrorCode =
  | "ERR_INVALID_CONFIG"
  | "ERR_EMPTY_CONTENT"
  | "ERR_INVALID_URL"
  | "ERR_HTTP_ERROR"
  | "ERR_NON_HTML_CONTENT"
  | "ERR_FETCH_FAILED"
  | "ERR_FILE_NOT_FOUND"
  | "ERR_NOT_A_FILE"
  | "ERR_READ_FAILED"
  | "ERR_UNSUPPORTED_SOURCE";

export interface ConversionErrorDetails {
  name: string;
  message: string;
  code?: string | number;
  statusCode?: number;
  originalError?: ConversionErrorDetails;
}

/**
 * Error raised by converters, the URL detector and the config factory.
 * The text pipeline itself (preprocessor, postprocessor, path classifier) never throws.
 */
export class ConversionError extends Error {
  /** A specific error code (e.g., ERR_FILE_NOT_FOUND, ERR_HTTP_ERROR). */
  public readonly code: ConversionErrorCode;
  /** The original error object, if available. */
  public readonly originalError?: Error;
  /** HTTP status code, if relevant. */
  public readonly statusCode?: number;

  /**
   * @param message The error message.
   * @param code Error code.
   * @param originalError Optional underlying error.
   * @param statusCode Optional HTTP status code.
   */
  constructor(message: string, code: ConversionErrorCode, originalError?: Error, statusCode?: number) {
    super(message);
    this.name = "ConversionError";
    this.code = code;
    this.originalError = originalError;
    this.statusCode = statusCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConversionError);
    }
  }

  /**
   * Returns a plain object representation with only useful metadata for responses/logging.
   */
  toObject(): ConversionErrorDetails {
    const descriptor: ConversionErrorDetails = {
      name: this.name,
      message: this.message,
      code: this.code,
    };

    if (this.statusCode !== undefined) {
      descriptor.statusCode = this.statusCode;
    }

    const original = serializeUnknownError(this.originalError);
    if (original) {
      descriptor.originalError = original;
    }

    return descriptor;
  }

  toJSON(): ConversionErrorDetails {
    return this.toObject();
  }

  /**
   * Makes console output (`console.error`) display the cleaned error payload without stack noise.
   */
  [inspect.custom](): ConversionErrorDetails {
    return this.toObject();
  }
}

/**
 * Raised when a remote source answers with a non-2xx status.
 */
export class HttpStatusError extends ConversionError {
  constructor(message: string, statusCode: number) {
    super(message, "ERR_HTTP_ERROR", undefined, statusCode);
    this.name = "HttpStatusError";
  }
}

function readProperty(value: object, key: string): unknown {
  return Reflect.get(value, key);
}

function serializeUnknownError(error: unknown): ConversionErrorDetails | undefined {
  if (!error) {
    return undefined;
  }

  if (error instanceof ConversionError) {
    return error.toObject();
  }

  if (typeof error === "object") {
    const name = readProperty(error, "name");
    const message = readProperty(error, "message");
    const descriptor: ConversionErrorDetails = {
      name: typeof name === "string" && name ? name : "Error",
      message: typeof message === "string" ? message : String(error),
    };

    const code = readProperty(error, "code");
    if (typeof code === "string" || typeof code === "number") {
      descriptor.code = code;
    }

    const status = readProperty(error, "statusCode") ?? readProperty(error, "status");
    if (typeof status === "number") {
      descriptor.statusCode = status;
    }

    const nested = serializeUnknownError(readProperty(error, "originalError") ?? readProperty(error, "cause"));
    if (nested) {
      descriptor.originalError = nested;
    }

    return descriptor;
  }

  return {
    name: "Error",
    message: String(error),
  };
}

/**
 * Wraps anything thrown by a collaborator (fs, fetch) into a ConversionError, passing ours through.
 */
export function toConversionError(error: unknown, code: ConversionErrorCode, prefix: string): ConversionError {
  if (error instanceof ConversionError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ConversionError(`${prefix}: ${message}`, code, error instanceof Error ? error : undefined);
}
