import axios from 'axios';
import { FatalSynthesisError, TransientSynthesisError, describeError } from '../../utils/errors';

const RETRYABLE_STATUSES = new Set([408, 409, 425, 429]);

/** Pull a readable message out of an error body, which may be JSON, text or an arraybuffer. */
function responseMessage(data: unknown): string | undefined {
  if (data === undefined || data === null) return undefined;

  let text: string;
  if (Buffer.isBuffer(data)) {
    text = data.toString('utf-8');
  } else if (data instanceof ArrayBuffer) {
    text = Buffer.from(data).toString('utf-8');
  } else if (typeof data === 'string') {
    text = data;
  } else {
    text = JSON.stringify(data);
  }

  return text.length > 300 ? `${text.slice(0, 300)}…` : text;
}

/**
 * Map an HTTP client failure onto the synthesis error taxonomy.
 *
 *   - 400/401/403/404/422 and other 4xx  → fatal (bad key, bad voice, bad input)
 *   - 408/409/425/429 and 5xx           → transient
 *   - no response (timeout, reset, DNS) → transient
 */
export function classifyProviderError(provider: string, error: unknown): TransientSynthesisError | FatalSynthesisError {
  if (error instanceof TransientSynthesisError || error instanceof FatalSynthesisError) {
    return error;
  }

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    const detail = responseMessage(error.response?.data);
    const suffix = detail ? ` - ${detail}` : '';

    if (status === undefined) {
      return new TransientSynthesisError(
        `${provider} request failed without a response (${error.code ?? 'network error'}): ${error.message}`,
        { cause: error }
      );
    }

    if (status === 401 || status === 403) {
      return new FatalSynthesisError(`Invalid ${provider} credentials (HTTP ${status})${suffix}`, { cause: error, status });
    }

    if (RETRYABLE_STATUSES.has(status) || status >= 500) {
      const reason = status === 429 ? 'rate limit exceeded' : 'service error';
      return new TransientSynthesisError(`${provider} ${reason} (HTTP ${status})${suffix}`, { cause: error, status });
    }

    return new FatalSynthesisError(`${provider} rejected the request (HTTP ${status})${suffix}`, { cause: error, status });
  }

  // Unknown failure shapes get the benefit of the doubt
  return new TransientSynthesisError(`${provider} synthesis failed: ${describeError(error)}`, { cause: error });
}
