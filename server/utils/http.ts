import { ConnectionError, TimeoutError } from '../errors.js';

export const DEFAULT_HTTP_TIMEOUT_MS = 10_000;

function isAbortLike(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

/**
 * `fetch` with a deadline. Network failures become `ConnectionError`, an elapsed deadline
 * becomes `TimeoutError`; HTTP error statuses are returned to the caller untouched.
 */
export async function fetchWithTimeout(
  url: string | URL,
  init: RequestInit,
  timeoutMs: number,
  label: string,
): Promise<Response> {
  try {
    return await fetch(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
  } catch (error) {
    if (isAbortLike(error)) {
      throw new TimeoutError(label, timeoutMs, { cause: error });
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConnectionError(`${label} failed: ${reason}`, { cause: error });
  }
}

/**
 * Parse a JSON body, returning `undefined` for bodies that are not JSON.
 */
export async function readJsonBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (!text) {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return undefined;
  }
}

export function basicAuthorization(clientId: string, clientSecret: string): string {
  const credentials = `${encodeURIComponent(clientId)}:${encodeURIComponent(clientSecret)}`;
  return `Basic ${Buffer.from(credentials).toString('base64')}`;
}
