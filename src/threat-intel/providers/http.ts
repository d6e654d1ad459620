import { ProviderError, describeError } from '../../shared/errors';
import { fetchWithTimeout } from '../../shared/utils/fetch';

/**
 * GET a JSON document, turning transport errors and non-2xx responses into
 * ProviderError
 */
export async function fetchProviderJson(
  provider: string,
  url: string,
  headers: Record<string, string>,
  timeoutMs: number
): Promise<unknown> {
  let response: Response;
  try {
    response = await fetchWithTimeout(url, { headers }, timeoutMs);
  } catch (error) {
    throw new ProviderError(provider, `request failed (${describeError(error)})`, error);
  }

  if (!response.ok) {
    throw new ProviderError(provider, `HTTP ${response.status}`);
  }

  try {
    return await response.json();
  } catch (error) {
    throw new ProviderError(provider, 'response was not valid JSON', error);
  }
}
