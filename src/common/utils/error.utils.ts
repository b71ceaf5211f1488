import { isAxiosError } from 'axios';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * `catch` can receive anything: AxiosErrors with a provider payload, plain
 * Errors, strings. Prefers the provider's own `error` text when present.
 */
export function extractErrorMessage(error: unknown): string {
  if (isAxiosError(error)) {
    const responseData = error.response?.data as unknown;

    if (isRecord(responseData)) {
      const providerError = responseData.error;

      if (typeof providerError === 'string' && providerError.length > 0) {
        return providerError;
      }

      if (
        isRecord(providerError) &&
        typeof providerError.message === 'string'
      ) {
        return providerError.message;
      }
    }

    if (error.message.length > 0) {
      return error.message;
    }
  }

  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  return 'Unknown error';
}
