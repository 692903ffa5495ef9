export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string,
    public readonly code = "APP_ERROR",
    public readonly details?: unknown
  ) {
    super(message);
    this.name = "AppError";
  }
}

export function notFound(code: string): AppError {
  return new AppError(404, code, code);
}

export function conflict(code: string): AppError {
  return new AppError(409, code, code);
}

export function badRequest(code: string, details?: unknown): AppError {
  return new AppError(400, code, code, details);
}

// Postgres unique_violation, as surfaced by pg through drizzle.
export function isUniqueViolation(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "23505"
  );
}
