/**
 * AWS SDK exceptions carry the HTTP status in `$metadata`; a 404 on a lookup
 * means the resource is absent rather than that the call failed.
 */
export function isNotFound(error: unknown): boolean {
  if (typeof error !== "object" || error === null) {
    return false;
  }

  if ("name" in error && (error.name === "NotFound" || error.name === "NoSuchBucket")) {
    return true;
  }

  return (
    "$metadata" in error &&
    typeof error.$metadata === "object" &&
    error.$metadata !== null &&
    "httpStatusCode" in error.$metadata &&
    error.$metadata.httpStatusCode === 404
  );
}

export function requireValue<T>(value: T | undefined | null, field: string): T {
  if (value === undefined || value === null) {
    throw new Error(`AWS response is missing ${field}`);
  }
  return value;
}
