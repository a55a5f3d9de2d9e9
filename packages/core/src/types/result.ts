/**
 * Outcome of a remote call.
 *
 * Code-level failures (exceptions raised while building the request or
 * processing the response) are kept apart from network failures, which
 * always carry the HTTP status and the raw response body when there is one.
 */
export type ApiResult<T> =
  | { readonly type: 'success'; readonly value: T }
  | ApiError;

/**
 * Failed remote call
 */
export type ApiError =
  | { readonly type: 'code-error'; readonly error: unknown }
  | { readonly type: 'network-error'; readonly httpCode: number; readonly body?: string };

export function success<T>(value: T): ApiResult<T> {
  return { type: 'success', value };
}

export function codeError(error: unknown): ApiError {
  return { type: 'code-error', error };
}

export function networkError(httpCode: number, body?: string): ApiError {
  return { type: 'network-error', httpCode, body };
}

/**
 * Run a call and turn a thrown exception into a `code-error` result
 */
export async function safeCall<T>(call: () => Promise<T>): Promise<ApiResult<T>> {
  try {
    return success(await call());
  } catch (error) {
    return codeError(error);
  }
}
