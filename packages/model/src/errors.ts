export type PackageModelErrorCode =
  | "INVALID_ARGUMENT"
  | "NO_BEST_VERSION"
  | "INTERNAL_ERROR"
  | "UNKNOWN_ERROR";

export interface StructuredError {
  code: PackageModelErrorCode;
  message: string;
  suggestion?: string;
}

/**
 * Raised for misuse of the API (bad arguments, missing state).
 * Malformed metadata and unparseable specs are never thrown.
 */
export class PackageModelError extends Error implements StructuredError {
  code: PackageModelErrorCode;

  suggestion?: string;

  constructor(error: StructuredError) {
    super(error.message);
    this.name = "PackageModelError";
    this.code = error.code;
    this.suggestion = error.suggestion;
  }
}

function isObjectRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function isPackageModelError(value: unknown): value is PackageModelError {
  if (value instanceof PackageModelError) {
    return true;
  }

  if (!isObjectRecord(value)) {
    return false;
  }

  return typeof value["code"] === "string" && value["name"] === "PackageModelError";
}

export function toPackageModelError(error: unknown): PackageModelError {
  if (error instanceof PackageModelError) {
    return error;
  }

  if (error instanceof Error) {
    return new PackageModelError({
      code: "INTERNAL_ERROR",
      message: error.message,
    });
  }

  return new PackageModelError({
    code: "UNKNOWN_ERROR",
    message: "An unknown error occurred.",
  });
}

export function usageError(message: string, suggestion?: string): PackageModelError {
  return new PackageModelError({
    code: "INVALID_ARGUMENT",
    message,
    suggestion,
  });
}

export function stateError(
  code: PackageModelErrorCode,
  message: string,
  suggestion?: string,
): PackageModelError {
  return new PackageModelError({
    code,
    message,
    suggestion,
  });
}
