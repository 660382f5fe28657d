import { REQUEST_TIMEOUT } from '../config';
import { UpstreamFetchError, errorMessage } from '../errors';

export type FetchLike = (
  url: string,
  init?: { headers?: Record<string, string>; signal?: AbortSignal }
) => Promise<Response>;

export interface FetchJsonOptions {
  fetch: FetchLike;
  timeoutMs?: number;
}

/**
 * GET a JSON document. Every failure mode (network, timeout, non-2xx,
 * unparsable body) surfaces as an UpstreamFetchError.
 */
export async function fetchJson(url: string, options: FetchJsonOptions): Promise<unknown> {
  let response: Response;
  try {
    response = await options.fetch(url, {
      headers: { Accept: 'application/json' },
      signal: AbortSignal.timeout(options.timeoutMs ?? REQUEST_TIMEOUT),
    });
  } catch (err) {
    throw new UpstreamFetchError(url, `Request failed: ${errorMessage(err)}`, { cause: err });
  }

  if (!response.ok) {
    await response.body?.cancel();
    throw new UpstreamFetchError(url, `Upstream returned ${response.status}`, {
      status: response.status,
    });
  }

  try {
    const body: unknown = await response.json();
    return body;
  } catch (err) {
    throw new UpstreamFetchError(url, 'Malformed JSON body', { status: response.status, cause: err });
  }
}

/** Strips the api_key query parameter before a URL is logged. */
export function redactUrl(url: string): string {
  return url.replace(/([?&]api_key=)[^&]*/, '$1***');
}
