import { Pool } from "pg";

export function createPostgresPool(connectionString: string): Pool {
  return new Pool({
    connectionString,
    max: 4,
  });
}

// SQLSTATE 23505: unique_violation.
export function isUniqueViolation(
  error: unknown,
): error is { code: string; constraint?: string } {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "23505"
  );
}

export function toVectorLiteral(values: number[]): string {
  return `[${values.join(",")}]`;
}
