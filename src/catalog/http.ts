import { HTTPError, RequestError } from 'got';
import { CatalogApiError } from '../errors.js';

const parseRetryAfter = (value: string | undefined): number | undefined => {
  if (value === undefined) {
    return undefined;
  }
  const seconds = Number.parseInt(value, 10);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
};

/**
 * Convert a got failure into a CatalogApiError carrying what the invoker
 * needs to classify it (status, network code, Retry-After). Anything else is
 * returned unchanged.
 */
export const toCatalogError = (error: unknown, label: string): unknown => {
  if (error instanceof HTTPError) {
    return new CatalogApiError(
      `${label}: ${error.message}`,
      {
        statusCode: error.response.statusCode,
        retryAfterSeconds: parseRetryAfter(error.response.headers['retry-after'])
      },
      error
    );
  }
  if (error instanceof RequestError) {
    return new CatalogApiError(`${label}: ${error.message}`, { code: error.code }, error);
  }
  return error;
};

export const withCatalogErrors = async <T>(label: string, request: () => Promise<T>): Promise<T> => {
  try {
    return await request();
  } catch (error) {
    throw toCatalogError(error, label);
  }
};
