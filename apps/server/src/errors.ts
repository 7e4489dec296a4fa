// apps/server/src/errors.ts
//
// Errors raised while serving a single request. Neither type ever takes the
// listener down; the protocol adapters turn them into a 4xx/5xx answer for
// the one caller involved.

export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'HttpError';
  }
}

/** Malformed tool input or query parameters (400). */
export class BadRequestError extends HttpError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(400, message, options);
    this.name = 'BadRequestError';
  }
}

/** Unexpected failure while answering one query (500). */
export class InternalError extends HttpError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(500, message, options);
    this.name = 'InternalError';
  }
}

/** Wraps anything thrown by a handler into an HttpError. */
export function toHttpError(err: unknown): HttpError {
  if (err instanceof HttpError) return err;
  // body-parser tags malformed or oversized bodies with a 4xx status
  if (isClientFault(err)) {
    return err.status === 400
      ? new BadRequestError(err.message, { cause: err })
      : new HttpError(err.status, err.message, { cause: err });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new InternalError(message, { cause: err });
}

function isClientFault(err: unknown): err is Error & { status: number } {
  return (
    err instanceof Error &&
    'status' in err &&
    typeof err.status === 'number' &&
    err.status >= 400 &&
    err.status < 500
  );
}
