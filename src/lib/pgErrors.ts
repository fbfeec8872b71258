export const PG_ERROR = {
  UNIQUE_VIOLATION: '23505',
  NUMERIC_VALUE_OUT_OF_RANGE: '22003'
} as const;

export type PgErrorCode = (typeof PG_ERROR)[keyof typeof PG_ERROR];

/**
 * SQLSTATE of a Postgres error, or null for anything that did not come from the server.
 */
export function pgErrorCode(err: unknown): string | null {
  if (!err || typeof err !== 'object' || !('code' in err)) {
    return null;
  }
  return typeof err.code === 'string' ? err.code : null;
}

export function isPgError(err: unknown, code: PgErrorCode): boolean {
  return pgErrorCode(err) === code;
}

/**
 * Awaits a query and replaces a Postgres error carrying `code` with the error `toError` builds.
 * Every other failure is rethrown unchanged.
 */
export async function translatePgError<T>(pending: Promise<T>, code: PgErrorCode, toError: () => Error): Promise<T> {
  try {
    return await pending;
  } catch (err) {
    if (isPgError(err, code)) throw toError();
    throw err;
  }
}
