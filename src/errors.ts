/**
 * header-replay - Errors
 */

/**
 * RequestError - the replayed request could not produce an HTTP status.
 * Covers connection refused, DNS failure, timeout and requests that cannot be built.
 */
export class RequestError extends Error {
  public readonly url?: string;

  constructor(message: string, url?: string, cause?: Error) {
    super(message, { cause });
    this.name = "RequestError";
    this.url = url;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Converts whatever a catch block received into an Error
 */
export function toError(err: unknown): Error {
  if (err instanceof Error) {
    return err;
  }

  if (err && typeof err === "object" && "message" in err) {
    const error = new Error(String(err.message));
    if ("name" in err && typeof err.name === "string") {
      error.name = err.name;
    }
    return error;
  }

  const message = err == null ? "Null or undefined thrown" : String(err);
  return new Error(message);
}
