import { stringifyError } from '../utils/errors.js';
import { AuthenticationError, CatalogRequestError, NetworkError } from './errors.js';

export type CatalogRequest = {
  url: string;
  headers: Record<string, string>;
  /** Provider name used in error messages, e.g. "GitHub". */
  label: string;
  /** Extra lines appended to authentication failures. */
  authGuidance?: string[];
};

const maxBodyInError = 500;

function describeEndpoint(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.host}${parsed.pathname}`;
  } catch {
    return url;
  }
}

export async function fetchCatalogJson(request: CatalogRequest): Promise<unknown> {
  const endpoint = describeEndpoint(request.url);
  let response: Response;
  try {
    response = await fetch(request.url, { method: 'GET', headers: request.headers });
  } catch (err) {
    throw new NetworkError(`${request.label} is unreachable (${endpoint}): ${stringifyError(err)}`);
  }

  if (!response.ok) {
    const text = (await response.text()).trim().slice(0, maxBodyInError);
    if (response.status === 401 || response.status === 403) {
      throw new AuthenticationError(
        [
          `${request.label} rejected the credentials (${response.status}) for ${endpoint}.`,
          ...(request.authGuidance ?? []),
          ...(text ? [`Response: ${text}`] : []),
        ].join('\n'),
        response.status,
      );
    }
    throw new CatalogRequestError(
      `${request.label} request failed: ${response.status} ${endpoint}${text ? ` ${text}` : ''}`,
      response.status,
    );
  }

  try {
    return await response.json();
  } catch (err) {
    throw new CatalogRequestError(
      `${request.label} returned a malformed response for ${endpoint}: ${stringifyError(err)}`,
      response.status,
    );
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
